import { Browser, BrowserContext, chromium, Page } from 'playwright-core';
import { PageDocument } from '../../domain/entities/PageDocument';
import {
    AuthenticationError,
    ConfigurationError,
    ExtractionError,
    NavigationError,
} from '../../domain/errors/ProfileToolError';
import { IProfileSession } from '../../domain/ports/IProfileSession';
import { isRetryableHttpError } from '../RetryUtils';

export interface BrowserSessionOptions {
    profileUrl: string;
    email: string;
    password: string;
    headless?: boolean;
    executablePath?: string;
    /** Budget of one navigation step; page loads are bounded below it. */
    timeoutMs?: number;
}

/** Time kept back from the step budget for scrolling and settling. */
const SETTLE_MARGIN_MS = 1000;
const SETTLE_WAIT_MS = 500;

const CHALLENGE_SELECTORS = '[data-test-id="challenge-form"], .challenge-form, #input__phone_verification_pin';

/**
 * Chromium session driven by playwright-core. Logs in once, then snapshots
 * the HTML of every page it navigates to.
 */
export class BrowserProfileSession implements IProfileSession {
    readonly supportsDetailViews = true;
    private readonly documents: PageDocument[] = [];
    private readonly pageTimeoutMs: number;
    private current: PageDocument | null = null;
    private closed = false;

    private constructor(
        private readonly browser: Browser,
        private readonly context: BrowserContext,
        private readonly page: Page,
        private readonly timeoutMs: number
    ) {
        this.pageTimeoutMs = Math.max(SETTLE_MARGIN_MS, timeoutMs - SETTLE_MARGIN_MS);
    }

    /**
     * Launches the browser and signs in.
     * @throws AuthenticationError when the credentials or a security challenge stop the login
     */
    static async open(options: BrowserSessionOptions): Promise<BrowserProfileSession> {
        let browser: Browser;
        try {
            browser = await chromium.launch({
                headless: options.headless ?? true,
                executablePath: options.executablePath,
                args: ['--no-sandbox', '--disable-setuid-sandbox'],
            });
        } catch (error) {
            throw new ConfigurationError(
                `Could not launch Chromium (set BROWSER_EXECUTABLE_PATH): ${error instanceof Error ? error.message : String(error)}`
            );
        }

        const timeoutMs = options.timeoutMs ?? 30000;
        try {
            const context = await browser.newContext({
                userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
                viewport: { width: 1440, height: 900 },
                locale: 'en-US',
            });
            const page = await context.newPage();
            page.setDefaultTimeout(timeoutMs);

            const session = new BrowserProfileSession(browser, context, page, timeoutMs);
            await session.login(new URL(options.profileUrl).origin, options.email, options.password);
            return session;
        } catch (error) {
            await browser.close();
            throw error;
        }
    }

    private async login(origin: string, email: string, password: string): Promise<void> {
        console.log('[BrowserSession] Signing in...');
        await this.page.goto(`${origin}/login`, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
        await this.page.fill('#username', email);
        await this.page.fill('#password', password);
        await this.page.click("[type='submit']");
        await this.page.waitForLoadState('domcontentloaded');

        const url = this.page.url();
        if (url.includes('checkpoint') || url.includes('challenge') || (await this.page.$(CHALLENGE_SELECTORS))) {
            throw new AuthenticationError('Login stopped by a security challenge (second factor or captcha)');
        }
        if (url.includes('/login') || url.includes('/uas/login')) {
            throw new AuthenticationError('Credentials were rejected');
        }
        console.log('[BrowserSession] Signed in');
    }

    async navigate(url: string, signal?: AbortSignal): Promise<PageDocument> {
        if (this.closed) {
            throw new NavigationError('Session is closed', url);
        }

        let status: number | undefined;
        try {
            const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.pageTimeoutMs });
            status = response?.status();
            if (!signal?.aborted) {
                // Lazy sections render on scroll
                await this.page.mouse.wheel(0, 20000);
                await this.page.waitForTimeout(SETTLE_WAIT_MS);
            }
        } catch (error) {
            throw new NavigationError(`Failed to load page: ${error instanceof Error ? error.message : String(error)}`, url, true);
        }

        if (signal?.aborted) {
            throw new NavigationError('Navigation aborted', url);
        }
        if (status !== undefined && status >= 400) {
            throw new NavigationError(`Page returned status ${status}`, url, isRetryableHttpError({ status }));
        }
        const finalUrl = this.page.url();
        if (finalUrl.includes('/login') || finalUrl.includes('/authwall')) {
            throw new AuthenticationError('Session was signed out while navigating');
        }
        if (trimPath(finalUrl) !== trimPath(url)) {
            throw new NavigationError(`Redirected to ${finalUrl}`, url);
        }

        const document = new PageDocument(finalUrl, await this.page.content());
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
        if (this.closed) return;
        this.closed = true;
        for (const document of this.documents) document.detach();
        try {
            await this.context.close();
        } finally {
            await this.browser.close();
        }
    }
}

function trimPath(url: string): string {
    return new URL(url).pathname.replace(/\/+$/, '');
}
