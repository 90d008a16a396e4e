import { describe, it, expect } from 'vitest';

// ============================================================================
// Barrel Export Verification
// Ensures all public API exports are accessible from the package entry point
// ============================================================================

describe('Barrel Export (src/index.ts)', () => {
    it('should export the factory and domain classes', async () => {
        const mod = await import('../src/index.js');

        expect(mod.IconFactory).toBeTypeOf('function');
        expect(mod.Icon).toBeTypeOf('function');
        expect(mod.DEFAULT_SET).toBe('default');
    });

    it('should export the building blocks', async () => {
        const mod = await import('../src/index.js');

        expect(mod.SetRegistry).toBeTypeOf('function');
        expect(mod.Resolver).toBeTypeOf('function');
        expect(mod.MemoryContentCache).toBeTypeOf('function');
        expect(mod.NodeFileStore).toBeTypeOf('function');
        expect(mod.mergeAttributes).toBeTypeOf('function');
        expect(mod.normalizeCallSite).toBeTypeOf('function');
        expect(mod.stripPrefix).toBeTypeOf('function');
    });

    it('should export configuration helpers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.loadConfig).toBeTypeOf('function');
        expect(mod.mergeConfig).toBeTypeOf('function');
        expect(mod.createFactory).toBeTypeOf('function');
        expect(mod.IconsConfigSchema).toBeDefined();
        expect(mod.CONFIG_FILENAMES).toEqual(['svg-icons.yaml', 'svg-icons.yml', 'svg-icons.json']);
    });

    it('should export errors and observability', async () => {
        const mod = await import('../src/index.js');

        expect(new mod.SvgNotFoundError('a', 'b')).toBeInstanceOf(mod.IconError);
        expect(mod.IconReadError).toBeTypeOf('function');
        expect(mod.IconSetNotFoundError).toBeTypeOf('function');
        expect(mod.IconsConfigError).toBeTypeOf('function');
        expect(mod.createDebugObserver).toBeTypeOf('function');
    });
});
