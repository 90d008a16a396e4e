/**
 * Icon — Resolved SVG Ready to Embed
 *
 * Immutable result of `IconFactory.svg()`: the logical name, the raw file
 * contents and the merged attributes. Only the contents are cached; a new
 * Icon is built for every lookup.
 *
 * @module
 */
import type { Attributes } from '../registry/IconSet.js';

const ROOT_TAG = /<(svg)\b((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/i;
const ATTRIBUTE = /([^\s=/>]+)(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'>]+))?/g;

export class Icon {
    private readonly _name: string;
    private readonly _contents: string;
    private readonly _attributes: Attributes;

    constructor(name: string, contents: string, attributes: Attributes = {}) {
        this._name = name;
        this._contents = contents;
        this._attributes = Object.freeze({ ...attributes });
        Object.freeze(this);
    }

    /** Prefix-stripped logical name, e.g. `solid.camera` */
    name(): string {
        return this._name;
    }

    /** Raw markup as read from disk */
    contents(): string {
        return this._contents;
    }

    /** Alias of {@link Icon.contents} */
    content(): string {
        return this._contents;
    }

    attributes(): Attributes {
        return this._attributes;
    }

    /**
     * Markup with the root `<svg>` tag carrying the merged attributes.
     *
     * Attributes already on the tag keep their source text unless a merged
     * attribute of the same name replaces them; merged attributes follow,
     * HTML-escaped. Names match case-sensitively, as in XML, so `viewbox`
     * does not replace `viewBox`. Nothing outside the root tag changes.
     */
    render(): string {
        const entries = Object.entries(this._attributes);
        if (entries.length === 0) return this._contents;

        const match = ROOT_TAG.exec(this._contents);
        if (!match) return this._contents;

        const [tag, tagName = 'svg', existing = '', selfClosing = ''] = match;
        const overridden = new Set(entries.map(([key]) => key));

        const kept = [...existing.matchAll(ATTRIBUTE)]
            .filter(([, key = '']) => !overridden.has(key))
            .map(([raw]) => raw);

        const added = entries.map(([key, value]) => `${key}="${escapeAttribute(value)}"`);
        const rebuilt = `<${tagName} ${[...kept, ...added].join(' ')}${selfClosing}>`;

        return this._contents.slice(0, match.index) + rebuilt + this._contents.slice(match.index + tag.length);
    }

    toHtml(): string {
        return this.render();
    }

    toString(): string {
        return this.render();
    }
}

export function escapeAttribute(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/"/g, '&quot;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}
