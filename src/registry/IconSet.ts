/** Name of the fallback set, always searched last. */
export const DEFAULT_SET = 'default';

/** Attribute name → value, in render order */
export type Attributes = Readonly<Record<string, string>>;

/** Options accepted when registering a set */
export interface IconSetOptions {
    /** Root directory of the set's SVG files */
    readonly path: string;
    /** Names starting with `${prefix}-` are looked up in this set without it */
    readonly prefix?: string | undefined;
    /** Class applied to every icon from this set */
    readonly class?: string | undefined;
    /** Attributes applied to every icon from this set */
    readonly attributes?: Attributes | undefined;
}

/** A registered, normalized icon set */
export interface IconSet {
    readonly name: string;
    readonly path: string;
    /** `''` when the set has no prefix */
    readonly prefix: string;
    /** `''` when the set adds no class */
    readonly defaultClass: string;
    /** Never contains `class`; see {@link IconSet.defaultClass} */
    readonly defaultAttributes: Attributes;
}
