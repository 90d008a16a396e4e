import { describe, it, expect, vi } from 'vitest';
import { MemoryContentCache } from '../../src/cache/ContentCache.js';

describe('MemoryContentCache', () => {
    it('should load a path once and serve it from memory afterwards', () => {
        const cache = new MemoryContentCache();
        const load = vi.fn((path: string) => `<svg>${path}</svg>`);

        expect(cache.getOrLoad('/a.svg', load)).toBe('<svg>/a.svg</svg>');
        expect(cache.getOrLoad('/a.svg', load)).toBe('<svg>/a.svg</svg>');
        expect(load).toHaveBeenCalledTimes(1);
    });

    it('should key entries by path', () => {
        const cache = new MemoryContentCache();
        const load = vi.fn((path: string) => path);

        cache.getOrLoad('/a.svg', load);
        cache.getOrLoad('/b.svg', load);

        expect(load).toHaveBeenCalledTimes(2);
        expect(cache.size).toBe(2);
        expect(cache.has('/a.svg')).toBe(true);
        expect(cache.has('/c.svg')).toBe(false);
    });

    it('should cache empty files', () => {
        const cache = new MemoryContentCache();
        const load = vi.fn(() => '');

        cache.getOrLoad('/empty.svg', load);
        cache.getOrLoad('/empty.svg', load);

        expect(load).toHaveBeenCalledTimes(1);
    });

    it('should not store anything when loading throws', () => {
        const cache = new MemoryContentCache();
        const failing = (): string => { throw new Error('EACCES'); };

        expect(() => cache.getOrLoad('/locked.svg', failing)).toThrow('EACCES');
        expect(cache.has('/locked.svg')).toBe(false);
        expect(cache.getOrLoad('/locked.svg', () => '<svg/>')).toBe('<svg/>');
    });

    it('should reload after clear()', () => {
        const cache = new MemoryContentCache();
        const load = vi.fn(() => '<svg/>');

        cache.getOrLoad('/a.svg', load);
        cache.clear();
        expect(cache.size).toBe(0);
        cache.getOrLoad('/a.svg', load);

        expect(load).toHaveBeenCalledTimes(2);
    });
});
