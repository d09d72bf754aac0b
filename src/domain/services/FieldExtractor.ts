import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { PageDocument } from '../entities/PageDocument';

/**
 * One way of locating a field. Strategies are tried in order and the first
 * one yielding a non-empty value wins.
 */
export interface SelectorStrategy {
    name: string;
    selector: string;
    /** Read this attribute instead of the element text. */
    attribute?: string;
}

export type FieldSpec = readonly SelectorStrategy[];

export type FieldResult =
    | { found: true; values: string[]; strategyUsed: string }
    | { found: false };

/**
 * Locates the entries of a list section and the fields inside each entry.
 */
export interface ListSpec {
    items: FieldSpec;
    fields: Readonly<Record<string, FieldSpec>>;
    /** Sub-entries of one entry, e.g. several roles under one employer. */
    nestedItems?: FieldSpec;
}

export interface RawItem {
    fields: Record<string, string[]>;
    nested: RawItem[];
}

export type ItemsResult =
    | { found: true; items: RawItem[]; strategyUsed: string }
    | { found: false };

/**
 * Read-only extraction of raw text fragments from a page document.
 * Absence is a normal outcome; only a detached document raises
 * ExtractionError (from PageDocument.query).
 */
export class FieldExtractor {

    /**
     * Returns the values of the first strategy that matches, or an empty list.
     */
    public extract(document: PageDocument, spec: FieldSpec): string[] {
        const result = this.lookup(document, spec);
        return result.found ? result.values : [];
    }

    public lookup(document: PageDocument, spec: FieldSpec): FieldResult {
        const $ = document.query();
        return this.lookupIn($, $.root(), spec, []);
    }

    /**
     * Finds the top-level entries of a list and extracts every field of
     * each entry. Fields of nested entries are not attributed to their parent.
     */
    public extractItems(document: PageDocument, spec: ListSpec): ItemsResult {
        const $ = document.query();
        const located = this.locate($, $.root(), spec.items);
        if (!located) return { found: false };

        const items = located.elements.map(element => this.readItem($, element, spec));
        return { found: true, items, strategyUsed: located.strategyUsed };
    }

    private readItem($: CheerioAPI, element: Element, spec: ListSpec): RawItem {
        const scope = $(element);
        const nestedElements = spec.nestedItems
            ? this.locate($, scope, spec.nestedItems)?.elements ?? []
            : [];

        const fields: Record<string, string[]> = {};
        for (const [field, fieldSpec] of Object.entries(spec.fields)) {
            const result = this.lookupIn($, scope, fieldSpec, nestedElements);
            fields[field] = result.found ? result.values : [];
        }

        const nested = nestedElements.map(child => this.readItem($, child, { ...spec, nestedItems: undefined }));
        return { fields, nested };
    }

    private lookupIn(
        $: CheerioAPI,
        scope: Cheerio<AnyNode>,
        spec: FieldSpec,
        excluded: readonly Element[]
    ): FieldResult {
        for (const strategy of spec) {
            const matches = this.select(scope, strategy);
            const values: string[] = [];

            for (const element of matches) {
                if (excluded.some(outer => outer === element || isAncestor(outer, element))) continue;

                const node = $(element);
                const raw = strategy.attribute ? node.attr(strategy.attribute) ?? '' : node.text();
                const value = cleanText(raw);
                if (value) values.push(value);
            }

            if (values.length > 0) {
                return { found: true, values, strategyUsed: strategy.name };
            }
        }
        return { found: false };
    }

    private locate(
        $: CheerioAPI,
        scope: Cheerio<AnyNode>,
        spec: FieldSpec
    ): { elements: Element[]; strategyUsed: string } | null {
        for (const strategy of spec) {
            const matches = this.select(scope, strategy);
            const topLevel = matches.filter(element => !matches.some(other => other !== element && isAncestor(other, element)));
            if (topLevel.length > 0) {
                return { elements: topLevel, strategyUsed: strategy.name };
            }
        }
        return null;
    }

    private select(scope: Cheerio<AnyNode>, strategy: SelectorStrategy): Element[] {
        try {
            return scope.find(strategy.selector).toArray();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`[FieldExtractor] Strategy "${strategy.name}" has an unusable selector: ${reason}`);
            return [];
        }
    }
}

function isAncestor(candidate: AnyNode, node: AnyNode): boolean {
    let parent = node.parent;
    while (parent) {
        if (parent === candidate) return true;
        parent = parent.parent;
    }
    return false;
}

export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
