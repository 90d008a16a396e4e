/**
 * DebugObserver — Opt-in Lookup Diagnostics
 *
 * Typed debug events emitted while icons are resolved, loaded and listed.
 * When no observer is configured (the default) nothing is built or
 * emitted.
 *
 * @example
 * ```typescript
 * import { IconFactory, createDebugObserver } from 'svg-iconsets';
 *
 * // Default: compact console.debug output
 * const factory = new IconFactory({ debug: createDebugObserver() });
 *
 * // Custom handler
 * const factory = new IconFactory({
 *     debug: createDebugObserver((event) => metrics.increment(`icons.${event.type}`)),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted when a requested name is matched to a file. */
export interface ResolveEvent {
    readonly type: 'resolve';
    /** Name as passed by the caller */
    readonly requested: string;
    readonly set: string;
    /** Prefix-stripped logical name */
    readonly name: string;
    readonly path: string;
    /** Milliseconds spent probing sets */
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted for every content lookup, hit or miss. */
export interface CacheEvent {
    readonly type: 'cache';
    readonly path: string;
    readonly hit: boolean;
    readonly timestamp: number;
}

/** Emitted right before a `SvgNotFoundError` is thrown. */
export interface NotFoundEvent {
    readonly type: 'not-found';
    readonly requested: string;
    /** Last set checked */
    readonly set: string;
    readonly name: string;
    readonly timestamp: number;
}

/** Emitted after a set's files have been enumerated. */
export interface FilesEvent {
    readonly type: 'files';
    readonly set: string;
    readonly count: number;
    /** Whether a filter list narrowed the result */
    readonly filtered: boolean;
    readonly timestamp: number;
}

export type DebugEvent =
    | ResolveEvent
    | CacheEvent
    | NotFoundEvent
    | FilesEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * Returns `handler` when given; otherwise a default that prints:
 *
 * ```
 * [svg-iconsets] resolve   icon-camera → default/camera 0.2ms
 * [svg-iconsets] cache     /icons/camera.svg miss
 * [svg-iconsets] files     default 4 (filtered)
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[svg-iconsets]';

        switch (event.type) {
            case 'resolve':
                console.debug(`${prefix} resolve   ${event.requested} → ${event.set}/${event.name} ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'cache':
                console.debug(`${prefix} cache     ${event.path} ${event.hit ? 'hit' : 'miss'}`);
                break;

            case 'not-found':
                console.debug(`${prefix} NOT FOUND ${event.requested} (last set: ${event.set})`);
                break;

            case 'files': {
                const note = event.filtered ? ' (filtered)' : '';
                console.debug(`${prefix} files     ${event.set} ${event.count}${note}`);
                break;
            }
        }
    };
}
