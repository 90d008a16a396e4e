/**
 * IconsConfig — Icon Sets, Filters and the Global Class
 *
 * Can be loaded from a YAML/JSON file (`svg-icons.yaml`) or passed
 * programmatically. Validated with zod before anything is registered.
 *
 * ```yaml
 * sets:
 *   default:
 *     path: resources/svg
 *     prefix: icon
 *   heroicons:
 *     path: node_modules/heroicons/24/outline
 *     prefix: heroicon
 *     class: w-6 h-6
 * filters:
 *   default: [flag, solid.camera]
 * class: icon
 * ```
 *
 * @module
 */
import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { IconsConfigError } from '../errors.js';
import { IconFactory, type IconFactoryOptions } from '../IconFactory.js';

// ── Schema ───────────────────────────────────────────────

export const IconSetConfigSchema = z.object({
    path: z.string().min(1, 'Icon set path must not be empty'),
    prefix: z.string().optional(),
    class: z.string().optional(),
    attributes: z.record(z.string()).optional(),
}).strict();

export const IconsConfigSchema = z.object({
    sets: z.record(IconSetConfigSchema).optional(),
    filters: z.record(z.array(z.string())).optional(),
    class: z.string().optional(),
}).strict();

/** Shape accepted from files and callers; every key is optional */
export type PartialIconsConfig = z.input<typeof IconsConfigSchema>;

export type IconSetConfig = z.output<typeof IconSetConfigSchema>;

/** Configuration with defaults applied */
export interface IconsConfig {
    /** Sets in registration order */
    readonly sets: Readonly<Record<string, IconSetConfig>>;
    readonly filters: Readonly<Record<string, readonly string[]>>;
    /** Class applied to every icon */
    readonly class: string;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: IconsConfig = {
    sets: {},
    filters: {},
    class: '',
};

// ── Merge Helper ─────────────────────────────────────────

/**
 * Validate a partial config and fill in defaults.
 *
 * @param source - Label for error messages, usually the config file path
 * @throws {IconsConfigError} when the input does not match the schema
 */
export function mergeConfig(partial: unknown, source?: string): IconsConfig {
    const parsed = IconsConfigSchema.safeParse(partial ?? {});
    if (!parsed.success) throw new IconsConfigError(parsed.error, source);

    return {
        sets: parsed.data.sets ?? DEFAULT_CONFIG.sets,
        filters: parsed.data.filters ?? DEFAULT_CONFIG.filters,
        class: parsed.data.class ?? DEFAULT_CONFIG.class,
    };
}

/** Resolve relative set paths against `baseDir`. */
export function resolveSetPaths(config: IconsConfig, baseDir: string): IconsConfig {
    const sets = Object.fromEntries(
        Object.entries(config.sets).map(([name, set]): [string, IconSetConfig] => [
            name,
            { ...set, path: isAbsolute(set.path) ? set.path : resolve(baseDir, set.path) },
        ]),
    );
    return { ...config, sets };
}

// ── Factory Wiring ───────────────────────────────────────

/**
 * Build a factory from configuration: sets in config order, then filters.
 * Relative set paths resolve against `baseDir` (default: `process.cwd()`).
 */
export function createFactory(
    config: IconsConfig,
    options: Omit<IconFactoryOptions, 'defaultClass'> & { readonly baseDir?: string | undefined } = {},
): IconFactory {
    const { baseDir, ...factoryOptions } = options;
    const resolved = resolveSetPaths(config, baseDir ?? process.cwd());

    const factory = new IconFactory({ ...factoryOptions, defaultClass: resolved.class });
    for (const [name, set] of Object.entries(resolved.sets)) {
        factory.add(name, set);
    }
    return factory.addFilters(resolved.filters);
}
