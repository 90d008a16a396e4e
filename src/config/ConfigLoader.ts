/**
 * ConfigLoader — YAML/JSON Configuration File Reader
 *
 * Finds `svg-icons.yaml` (or an explicit file), validates it and merges
 * with defaults. Relative set paths resolve against the directory of the
 * file they were read from.
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { mergeConfig, resolveSetPaths, type IconsConfig } from './IconsConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'svg-icons.yaml',
    'svg-icons.yml',
    'svg-icons.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load icon configuration.
 *
 * An explicit `configPath` must exist. Without one, the first of
 * {@link CONFIG_FILENAMES} found in `cwd` is used; with none present the
 * defaults apply.
 *
 * @throws {IconsConfigError} when the file content fails validation
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): IconsConfig {
    const file = locateConfigFile(configPath, cwd);
    return file === undefined ? mergeConfig({}) : readConfigFile(file);
}

/**
 * Absolute path of the config file to read, or `undefined` when the
 * defaults apply.
 */
export function locateConfigFile(configPath: string | undefined, cwd: string): string | undefined {
    if (configPath) {
        const explicit = resolve(cwd, configPath);
        if (!existsSync(explicit)) throw new Error(`Config file not found: "${explicit}"`);
        return explicit;
    }

    return CONFIG_FILENAMES
        .map(filename => join(cwd, filename))
        .find(candidate => existsSync(candidate));
}

// ── Internal ─────────────────────────────────────────────

function readConfigFile(file: string): IconsConfig {
    const text = readFileSync(file, 'utf-8');
    const raw: unknown = extname(file) === '.json' ? JSON.parse(text) : parseYaml(text);

    return resolveSetPaths(mergeConfig(raw, file), dirname(file));
}
