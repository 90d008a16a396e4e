/**
 * IconFactory — Public Entry Point
 *
 * Owns one {@link SetRegistry} and one {@link ContentCache}, and answers two
 * questions: "give me this icon" and "give me every file of this set".
 * Instances share nothing, so several factories can live side by side.
 *
 * @example
 * ```typescript
 * import { IconFactory } from 'svg-iconsets';
 *
 * const icons = new IconFactory({ defaultClass: 'icon' })
 *     .add('default', { path: './resources/svg', prefix: 'icon' })
 *     .add('heroicons', { path: './node_modules/heroicons/24/outline', prefix: 'heroicon' });
 *
 * icons.svg('heroicon-camera', 'w-6 h-6').render();
 * icons.svg('solid.camera', { 'aria-hidden': 'true' }).render();
 * ```
 *
 * @module
 */
import { join } from 'node:path';
import { mergeAttributes, normalizeCallSite, type ClassOrAttributes } from './attributes/AttributeMerger.js';
import { MemoryContentCache, type ContentCache } from './cache/ContentCache.js';
import { Icon } from './domain/Icon.js';
import { IconSetNotFoundError, SvgNotFoundError } from './errors.js';
import { NodeFileStore, type FileStore } from './filesystem/FileStore.js';
import type { DebugObserverFn } from './observability/DebugObserver.js';
import type { Attributes, IconSet, IconSetOptions } from './registry/IconSet.js';
import { SetRegistry, type FilterMap } from './registry/SetRegistry.js';
import { Resolver } from './resolver/Resolver.js';
import { isSvgFile, nameToRelativePath, relativePathToName, stripPrefix, withPrefix } from './resolver/prefix.js';

// ── Types ────────────────────────────────────────────────

export interface IconFactoryOptions {
    /** Filesystem access (default: {@link NodeFileStore}) */
    readonly fileStore?: FileStore | undefined;
    /** Contents cache (default: unbounded {@link MemoryContentCache}) */
    readonly cache?: ContentCache | undefined;
    /** Class applied to every icon of every set */
    readonly defaultClass?: string | undefined;
    /** Receives lookup diagnostics; see `createDebugObserver()` */
    readonly debug?: DebugObserverFn | undefined;
}

/** One SVG file belonging to a set */
export interface IconFile {
    readonly set: string;
    /** Logical name relative to the set root, e.g. `solid.camera` */
    readonly name: string;
    /** Name as requested through `svg()`, e.g. `icon-solid.camera` */
    readonly prefixedName: string;
    /** Absolute path of the file */
    readonly path: string;
}

/** Overrides for a single `getFiles()` call */
export interface GetFilesOptions {
    readonly path?: string | undefined;
    readonly prefix?: string | undefined;
}

// ── Factory ──────────────────────────────────────────────

export class IconFactory {
    private readonly _registry = new SetRegistry();
    private readonly _files: FileStore;
    private readonly _cache: ContentCache;
    private readonly _resolver: Resolver;
    private readonly _defaultClass: string;
    private readonly _debug: DebugObserverFn | undefined;

    constructor(options: IconFactoryOptions = {}) {
        this._files = options.fileStore ?? new NodeFileStore();
        this._cache = options.cache ?? new MemoryContentCache();
        this._defaultClass = options.defaultClass ?? '';
        this._debug = options.debug;
        this._resolver = new Resolver(this._registry, this._files, this._debug);
    }

    /** Register or replace an icon set. */
    add(name: string, options: IconSetOptions): this {
        this._registry.add(name, options);
        return this;
    }

    /**
     * Restrict bulk listings of the given sets to the listed names.
     * Sets not mentioned keep their previous filters.
     */
    addFilters(filters: FilterMap): this {
        this._registry.addFilters(filters);
        return this;
    }

    all(): ReadonlyMap<string, IconSet> {
        return this._registry.all();
    }

    get defaultClass(): string {
        return this._defaultClass;
    }

    /**
     * Look up an icon by name.
     *
     * ```typescript
     * factory.svg('camera');
     * factory.svg('camera', 'w-6');                     // extra class
     * factory.svg('camera', 'w-6', { id: 'cam' });      // class + attributes
     * factory.svg('camera', { class: 'only-this' });    // replaces all classes
     * ```
     *
     * @throws {SvgNotFoundError} when no set has a file for the name
     * @throws {IconReadError} when the file exists but cannot be read
     */
    svg(name: string, classOrAttributes?: ClassOrAttributes, attributes?: Attributes): Icon {
        const resolved = this._resolver.resolve(name);
        const set = this._registry.get(resolved.set);
        const callSite = normalizeCallSite(classOrAttributes, attributes);

        return new Icon(
            resolved.name,
            this.contents(resolved.path),
            mergeAttributes({
                globalClass: this._defaultClass,
                setClass: set?.defaultClass ?? '',
                setAttributes: set?.defaultAttributes ?? {},
                className: callSite.className,
                attributes: callSite.attributes,
            }),
        );
    }

    /**
     * Every SVG file of a set, sorted by logical name. When the set has a
     * filter list, only the listed icons are returned, in filter order and
     * once each, however many entries name them.
     *
     * @throws {IconSetNotFoundError} for an unregistered set without `options.path`
     * @throws {SvgNotFoundError} when a filtered name has no file
     */
    getFiles(setName: string, options: GetFilesOptions = {}): IconFile[] {
        const set = this._registry.get(setName);
        const root = options.path ?? set?.path;
        if (root === undefined) throw new IconSetNotFoundError(setName);

        const prefix = options.prefix ?? set?.prefix ?? '';
        const toFile = (name: string): IconFile => ({
            set: setName,
            name,
            prefixedName: withPrefix(name, prefix),
            path: join(root, nameToRelativePath(name)),
        });

        const filters = this._registry.filtersFor(setName);
        const files = filters
            ? [...new Set(filters.map(entry => this.filteredName(root, prefix, entry, setName)))].map(toFile)
            : this._files.list(root).filter(isSvgFile).map(relativePathToName).sort().map(toFile);

        this._debug?.({
            type: 'files',
            set: setName,
            count: files.length,
            filtered: filters !== undefined,
            timestamp: Date.now(),
        });

        return files;
    }

    /** Drop every cached file. Nothing calls this implicitly. */
    clearCache(): void {
        this._cache.clear();
    }

    // ── Internal ─────────────────────────────────────────

    private contents(path: string): string {
        if (this._debug) {
            this._debug({ type: 'cache', path, hit: this._cache.has(path), timestamp: Date.now() });
        }
        return this._cache.getOrLoad(path, file => this._files.read(file));
    }

    /** A filter entry may be written with or without the set's prefix. */
    private filteredName(root: string, prefix: string, entry: string, setName: string): string {
        const candidates = [entry, stripPrefix(entry, prefix)];
        const found = candidates.find(name => this._files.exists(join(root, nameToRelativePath(name))));
        if (found === undefined) {
            throw new SvgNotFoundError(stripPrefix(entry, prefix), setName);
        }
        return found;
    }
}
