/**
 * SetRegistry — Ordered Icon Set Configuration
 *
 * Holds every registered icon set plus the per-set filter lists. Pure
 * in-memory state; registration order matters because the resolver walks
 * non-default sets newest-first.
 *
 * @module
 */
import { joinClasses } from '../attributes/AttributeMerger.js';
import { DEFAULT_SET } from './IconSet.js';
import type { Attributes, IconSet, IconSetOptions } from './IconSet.js';

/** Set name → allowed logical names */
export type FilterMap = Readonly<Record<string, readonly string[]>>;

export class SetRegistry {
    private readonly _sets = new Map<string, IconSet>();
    private readonly _filters = new Map<string, readonly string[]>();

    /**
     * Register or replace a set. Replacing keeps the name's original
     * registration position.
     */
    add(name: string, options: IconSetOptions): void {
        this._sets.set(name, createIconSet(name, options));
    }

    get(name: string): IconSet | undefined {
        return this._sets.get(name);
    }

    all(): ReadonlyMap<string, IconSet> {
        return this._sets;
    }

    /** Merge filter lists. A set named again replaces its previous list. */
    addFilters(filters: FilterMap): void {
        for (const [set, names] of Object.entries(filters)) {
            this._filters.set(set, Object.freeze([...names]));
        }
    }

    /** Filter list for a set, or `undefined` when the set is unfiltered */
    filtersFor(name: string): readonly string[] | undefined {
        return this._filters.get(name);
    }

    /**
     * Sets in lookup order: every set except `"default"`, most recently
     * registered first, then `"default"` last.
     */
    searchOrder(): IconSet[] {
        const ordered = [...this._sets.values()]
            .filter(set => set.name !== DEFAULT_SET)
            .reverse();

        const fallback = this._sets.get(DEFAULT_SET);
        if (fallback) ordered.push(fallback);

        return ordered;
    }
}

// ── Internal ─────────────────────────────────────────────

function createIconSet(name: string, options: IconSetOptions): IconSet {
    const source: Attributes = options.attributes ?? {};
    const { class: attributeClass, ...attributes } = source;

    return Object.freeze({
        name,
        path: options.path,
        prefix: options.prefix ?? '',
        defaultClass: joinClasses(options.class ?? '', attributeClass ?? ''),
        defaultAttributes: Object.freeze({ ...attributes }),
    });
}
