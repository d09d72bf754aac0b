import * as cheerio from 'cheerio';
import { ExtractionError } from '../errors/ProfileToolError';

/**
 * A parsed snapshot of one page, handed out by a profile session.
 * Once the owning session closes the document is detached and any
 * further query raises ExtractionError.
 */
export class PageDocument {
    private detached = false;
    private readonly $: cheerio.CheerioAPI;

    constructor(public readonly url: string, html: string) {
        this.$ = cheerio.load(html);
    }

    get isDetached(): boolean {
        return this.detached;
    }

    /**
     * Returns the query root for read-only traversal.
     */
    query(): cheerio.CheerioAPI {
        if (this.detached) {
            throw new ExtractionError(`Document for ${this.url} is detached from its session`);
        }
        return this.$;
    }

    detach(): void {
        this.detached = true;
    }
}
