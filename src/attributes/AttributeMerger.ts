/**
 * AttributeMerger — Final Attribute Set for a Rendered Icon
 *
 * Precedence, lowest first:
 *
 * 1. set default attributes
 * 2. call-site attributes (verbatim, `class` included)
 * 3. computed `class`: global class + set class + call-site class,
 *    only when the call-site attributes carry no `class` of their own
 *
 * Passing `class` inside the attributes replaces the computed classes
 * instead of appending to them.
 *
 * @module
 */
import type { Attributes } from '../registry/IconSet.js';

/** Second positional argument of `svg()`: a class string or an attribute map */
export type ClassOrAttributes = string | Attributes;

/** Call-site arguments reduced to one shape */
export interface CallSite {
    readonly className: string;
    readonly attributes: Attributes;
}

export interface MergeInput {
    readonly globalClass: string;
    readonly setClass: string;
    readonly setAttributes: Attributes;
    readonly className: string;
    readonly attributes: Attributes;
}

/**
 * Normalize both `svg()` calling conventions:
 *
 * ```typescript
 * normalizeCallSite('w-6', { id: 'a' }); // { className: 'w-6', attributes: { id: 'a' } }
 * normalizeCallSite({ class: 'w-6' });   // { className: '', attributes: { class: 'w-6' } }
 * ```
 */
export function normalizeCallSite(
    classOrAttributes: ClassOrAttributes = '',
    attributes: Attributes = {},
): CallSite {
    if (typeof classOrAttributes === 'string') {
        return { className: classOrAttributes, attributes };
    }
    return { className: '', attributes: { ...classOrAttributes, ...attributes } };
}

export function mergeAttributes(input: MergeInput): Attributes {
    const merged: Record<string, string> = {
        ...input.setAttributes,
        ...input.attributes,
    };

    if (Object.hasOwn(input.attributes, 'class')) return merged;

    const className = joinClasses(input.globalClass, input.setClass, input.className);
    if (className === '') {
        delete merged['class'];
    } else {
        merged['class'] = className;
    }
    return merged;
}

/** Space-join class lists, skipping empty ones. */
export function joinClasses(...classes: readonly string[]): string {
    return classes
        .map(value => value.trim())
        .filter(value => value !== '')
        .join(' ');
}
