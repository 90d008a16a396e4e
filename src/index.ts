/**
 * @module
 * @description
 * Resolve SVG icons by name across prefixed icon sets, cache their
 * contents and render them with merged attributes.
 */
// ── Factory ──────────────────────────────────────────────
/** @category Factory */
export { IconFactory } from './IconFactory.js';
/** @category Factory */
export type { IconFactoryOptions, IconFile, GetFilesOptions } from './IconFactory.js';

// ── Domain ───────────────────────────────────────────────
/** @category Domain */
export { Icon, escapeAttribute } from './domain/Icon.js';
/** @category Domain */
export { DEFAULT_SET } from './registry/IconSet.js';
/** @category Domain */
export type { Attributes, IconSet, IconSetOptions } from './registry/IconSet.js';

// ── Building Blocks ──────────────────────────────────────
/** @category Building Blocks */
export { SetRegistry } from './registry/SetRegistry.js';
/** @category Building Blocks */
export type { FilterMap } from './registry/SetRegistry.js';
/** @category Building Blocks */
export { Resolver } from './resolver/Resolver.js';
/** @category Building Blocks */
export type { ResolvedIcon } from './resolver/Resolver.js';
/** @category Building Blocks */
export { stripPrefix, withPrefix, nameToRelativePath, relativePathToName } from './resolver/prefix.js';
/** @category Building Blocks */
export { MemoryContentCache } from './cache/ContentCache.js';
/** @category Building Blocks */
export type { ContentCache } from './cache/ContentCache.js';
/** @category Building Blocks */
export { mergeAttributes, normalizeCallSite, joinClasses } from './attributes/AttributeMerger.js';
/** @category Building Blocks */
export type { ClassOrAttributes, CallSite, MergeInput } from './attributes/AttributeMerger.js';
/** @category Building Blocks */
export { NodeFileStore } from './filesystem/FileStore.js';
/** @category Building Blocks */
export type { FileStore } from './filesystem/FileStore.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export {
    IconsConfigSchema, IconSetConfigSchema,
    DEFAULT_CONFIG, mergeConfig, resolveSetPaths, createFactory,
} from './config/IconsConfig.js';
/** @category Configuration */
export type { IconsConfig, IconSetConfig, PartialIconsConfig } from './config/IconsConfig.js';
/** @category Configuration */
export { loadConfig, locateConfigFile, CONFIG_FILENAMES } from './config/ConfigLoader.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    IconError, SvgNotFoundError, IconReadError,
    IconSetNotFoundError, IconsConfigError,
} from './errors.js';
/** @category Errors */
export type { IconErrorCode } from './errors.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn,
    ResolveEvent, CacheEvent, NotFoundEvent, FilesEvent,
} from './observability/DebugObserver.js';
