/**
 * Resolver — Requested Name → Set + File
 *
 * Walks the registry's search order and returns the first set holding a
 * file for the name. Each set strips its own prefix independently, so
 * `heroicon-camera` is looked up as `camera` in the `heroicon` set and as
 * `heroicon-camera` everywhere else.
 *
 * @module
 */
import { join } from 'node:path';
import { SvgNotFoundError } from '../errors.js';
import type { FileStore } from '../filesystem/FileStore.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { DEFAULT_SET } from '../registry/IconSet.js';
import type { SetRegistry } from '../registry/SetRegistry.js';
import { nameToRelativePath, stripPrefix } from './prefix.js';

export interface ResolvedIcon {
    /** Name of the set that holds the file */
    readonly set: string;
    /** Prefix-stripped logical name, dot-separated */
    readonly name: string;
    /** Absolute path of the SVG file */
    readonly path: string;
}

export class Resolver {
    constructor(
        private readonly _registry: SetRegistry,
        private readonly _files: FileStore,
        private readonly _debug?: DebugObserverFn | undefined,
    ) {}

    /**
     * @throws {SvgNotFoundError} naming the last set checked when no set
     *   has a file for the name
     */
    resolve(requested: string): ResolvedIcon {
        const start = this._debug ? performance.now() : 0;

        let lastSet = DEFAULT_SET;
        let lastName = requested;

        for (const set of this._registry.searchOrder()) {
            const name = stripPrefix(requested, set.prefix);
            const path = join(set.path, nameToRelativePath(name));

            if (this._files.exists(path)) {
                this._debug?.({
                    type: 'resolve',
                    requested,
                    set: set.name,
                    name,
                    path,
                    durationMs: performance.now() - start,
                    timestamp: Date.now(),
                });
                return { set: set.name, name, path };
            }

            lastSet = set.name;
            lastName = name;
        }

        this._debug?.({
            type: 'not-found',
            requested,
            set: lastSet,
            name: lastName,
            timestamp: Date.now(),
        });
        throw new SvgNotFoundError(lastName, lastSet);
    }
}
