/**
 * Errors — Typed Failures for Icon Lookup
 *
 * Every failure the package raises carries a stable `code` so call sites
 * can branch without matching on message text:
 *
 * - `SvgNotFoundError`      — no file backs the requested (or filtered) name
 * - `IconReadError`         — the file exists but could not be read
 * - `IconSetNotFoundError`  — a bulk listing named an unregistered set
 * - `IconsConfigError`      — configuration failed schema validation
 *
 * @example
 * ```typescript
 * try {
 *     factory.svg('money');
 * } catch (e) {
 *     if (e instanceof SvgNotFoundError) {
 *         console.log(e.iconName); // "money"
 *         console.log(e.setName);  // "default"
 *     }
 * }
 * ```
 *
 * @module
 */
import type { ZodError } from 'zod';

/** Error codes raised by this package */
export type IconErrorCode =
    | 'SVG_NOT_FOUND'
    | 'ICON_READ_FAILED'
    | 'ICON_SET_NOT_FOUND'
    | 'INVALID_CONFIG';

/** Base class for every error thrown by the package. */
export abstract class IconError extends Error {
    abstract readonly code: IconErrorCode;
}

// ── Lookup ───────────────────────────────────────────────

/**
 * Raised when a requested icon resolves to no existing file, or when a
 * set's filter list names an icon that has no file.
 */
export class SvgNotFoundError extends IconError {
    readonly code = 'SVG_NOT_FOUND' as const;
    /** Prefix-stripped logical name that was looked up */
    readonly iconName: string;
    /** Set against which the final check failed */
    readonly setName: string;

    constructor(iconName: string, setName: string) {
        super(`Svg by name "${iconName}" from set "${setName}" not found.`);
        this.name = 'SvgNotFoundError';
        this.iconName = iconName;
        this.setName = setName;
    }
}

/** Raised by a FileStore when an icon file exists but cannot be read. */
export class IconReadError extends IconError {
    readonly code = 'ICON_READ_FAILED' as const;
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Unable to read icon file "${path}": ${reason}`, { cause });
        this.name = 'IconReadError';
        this.path = path;
    }
}

/** Raised when a bulk listing targets a set that was never registered. */
export class IconSetNotFoundError extends IconError {
    readonly code = 'ICON_SET_NOT_FOUND' as const;
    readonly setName: string;

    constructor(setName: string) {
        super(`Icon set "${setName}" is not registered.`);
        this.name = 'IconSetNotFoundError';
        this.setName = setName;
    }
}

// ── Configuration ────────────────────────────────────────

/**
 * Wraps a `ZodError` from config validation with one line per issue:
 *
 * ```
 * Invalid icons config:
 *   • 'sets.default.path': Required
 * ```
 */
export class IconsConfigError extends IconError {
    readonly code = 'INVALID_CONFIG' as const;

    constructor(zodError: ZodError, source?: string) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        const origin = source ? ` (${source})` : '';
        super(`Invalid icons config${origin}:\n${fieldErrors}`, { cause: zodError });
        this.name = 'IconsConfigError';
    }
}
