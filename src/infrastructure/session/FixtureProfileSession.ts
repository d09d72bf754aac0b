import fs from 'fs/promises';
import path from 'path';
import { PageDocument } from '../../domain/entities/PageDocument';
import { ExtractionError, NavigationError } from '../../domain/errors/ProfileToolError';
import { IProfileSession } from '../../domain/ports/IProfileSession';

/**
 * Serves saved profile pages from a directory, for offline runs and tests.
 *
 * `<profile>/` maps to `profile.html`, `<profile>/details/skills/` to
 * `details-skills.html`, `<profile>/overlay/contact-info/` to
 * `overlay-contact-info.html`.
 */
export class FixtureProfileSession implements IProfileSession {
    readonly supportsDetailViews = true;
    private readonly documents: PageDocument[] = [];
    private current: PageDocument | null = null;
    private closed = false;

    constructor(private readonly fixturesDir: string, private readonly profileUrl: string) { }

    async navigate(url: string, signal?: AbortSignal): Promise<PageDocument> {
        if (this.closed) {
            throw new NavigationError('Session is closed', url);
        }

        const fileName = this.fileNameFor(url);
        if (!fileName) {
            throw new NavigationError(`No fixture mapping for ${url}`, url);
        }

        let html: string;
        try {
            html = await fs.readFile(path.join(this.fixturesDir, fileName), { encoding: 'utf-8', signal });
        } catch {
            throw new NavigationError(signal?.aborted ? 'Navigation aborted' : `Page not found (no fixture ${fileName})`, url);
        }

        const document = new PageDocument(url, html);
        this.documents.push(document);
        this.current = document;
        return document;
    }

    currentDocument(): PageDocument {
        if (!this.current || this.closed) {
            throw new ExtractionError('No document loaded in this session');
        }
        return this.current;
    }

    async close(): Promise<void> {
        this.closed = true;
        for (const document of this.documents) document.detach();
    }

    private fileNameFor(url: string): string | null {
        if (!url.startsWith(this.profileUrl)) return null;
        const segments = url.slice(this.profileUrl.length).split(/[/?#]/).filter(Boolean);
        return `${segments.length > 0 ? segments.join('-') : 'profile'}.html`;
    }
}
