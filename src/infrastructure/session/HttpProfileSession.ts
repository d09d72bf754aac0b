import axios from 'axios';
import * as cheerio from 'cheerio';
import { PageDocument } from '../../domain/entities/PageDocument';
import { AuthenticationError, ExtractionError, NavigationError } from '../../domain/errors/ProfileToolError';
import { IProfileSession } from '../../domain/ports/IProfileSession';
import { isRetryableHttpError } from '../RetryUtils';

const LOGIN_MARKERS = 'form.login__form, input[name="session_password"], input#password, [data-test-id="challenge-form"]';

/**
 * Loads server-rendered profile pages over HTTP with an existing session
 * cookie, using axios + cheerio.
 */
export class HttpProfileSession implements IProfileSession {
    readonly supportsDetailViews = true;
    private readonly timeout: number;
    private readonly userAgent: string;
    private readonly documents: PageDocument[] = [];
    private current: PageDocument | null = null;
    private closed = false;

    constructor(private readonly cookie: string, options?: { timeout?: number; userAgent?: string }) {
        if (!cookie) {
            throw new AuthenticationError('A session cookie is required for HTTP sessions');
        }
        this.timeout = options?.timeout ?? 30000;
        this.userAgent = options?.userAgent ?? 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
    }

    async navigate(url: string, signal?: AbortSignal): Promise<PageDocument> {
        if (this.closed) {
            throw new NavigationError('Session is closed', url);
        }

        let html: string;
        try {
            const response = await axios.get<string>(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.5',
                    'Cookie': this.cookie,
                },
                timeout: this.timeout,
                maxRedirects: 5,
                responseType: 'text',
                signal,
            });
            html = String(response.data);
        } catch (error) {
            if (axios.isCancel(error)) {
                throw new NavigationError('Navigation aborted', url);
            }
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                if (status === 401 || status === 403) {
                    throw new AuthenticationError(`Session rejected (${status}) while loading ${url}`);
                }
                if (error.code === 'ECONNABORTED') {
                    throw new NavigationError(`Page load timed out after ${this.timeout}ms`, url, true);
                }
                if (status === 404) {
                    throw new NavigationError('Page not found (404)', url);
                }
                throw new NavigationError(`Failed to load page: ${error.message}`, url, isRetryableHttpError(error));
            }
            throw error;
        }

        if (cheerio.load(html)(LOGIN_MARKERS).length > 0) {
            throw new AuthenticationError('Session cookie is not signed in (login page returned)');
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
}
