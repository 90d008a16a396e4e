/**
 * ContentCache — Read-Through Store of Icon File Contents
 *
 * Keyed by absolute file path. The bundled {@link MemoryContentCache} keeps
 * every entry for the life of the process: icon corpora are small and
 * static, so there is no TTL and no eviction. Hand a different
 * implementation to the factory when a bound is needed.
 *
 * @module
 */

export interface ContentCache {
    /**
     * Cached contents for `path`, calling `load` only when the path has
     * not been seen before.
     */
    getOrLoad(path: string, load: (path: string) => string): string;
    has(path: string): boolean;
    clear(): void;
    readonly size: number;
}

export class MemoryContentCache implements ContentCache {
    private readonly _entries = new Map<string, string>();

    getOrLoad(path: string, load: (path: string) => string): string {
        const cached = this._entries.get(path);
        if (cached !== undefined) return cached;

        const contents = load(path);
        this._entries.set(path, contents);
        return contents;
    }

    has(path: string): boolean {
        return this._entries.has(path);
    }

    clear(): void {
        this._entries.clear();
    }

    get size(): number {
        return this._entries.size;
    }
}
