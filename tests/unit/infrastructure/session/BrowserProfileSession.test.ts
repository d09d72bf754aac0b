/**
 * Unit tests for BrowserProfileSession (playwright-core mocked)
 */
import { AuthenticationError, ConfigurationError, NavigationError } from '../../../../src/domain/errors/ProfileToolError';
import { BrowserProfileSession } from '../../../../src/infrastructure/session/BrowserProfileSession';

const mockLaunch = jest.fn();

jest.mock('playwright-core', () => ({
    chromium: {
        launch: (...args: unknown[]) => mockLaunch(...args),
    },
}));

const ORIGIN = 'https://profiles.example.com';
const PROFILE_URL = `${ORIGIN}/in/jane/`;

interface FakeBrowserOptions {
    afterLogin?: string;
    challengeElement?: boolean;
    status?: number;
    redirectTo?: string;
}

function fakeBrowser(options: FakeBrowserOptions = {}) {
    let currentUrl = 'about:blank';
    const page = {
        setDefaultTimeout: jest.fn(),
        goto: jest.fn(async (url: string) => {
            currentUrl = options.redirectTo && !url.endsWith('/login') ? options.redirectTo : url;
            return { status: () => options.status ?? 200 };
        }),
        fill: jest.fn().mockResolvedValue(undefined),
        click: jest.fn(async () => {
            currentUrl = options.afterLogin ?? `${ORIGIN}/feed/`;
        }),
        waitForLoadState: jest.fn().mockResolvedValue(undefined),
        $: jest.fn().mockResolvedValue(options.challengeElement ? {} : null),
        url: jest.fn(() => currentUrl),
        mouse: { wheel: jest.fn().mockResolvedValue(undefined) },
        waitForTimeout: jest.fn().mockResolvedValue(undefined),
        content: jest.fn().mockResolvedValue('<html><body><h1>Jane Placeholder</h1></body></html>'),
    };
    const context = {
        newPage: jest.fn().mockResolvedValue(page),
        close: jest.fn().mockResolvedValue(undefined),
    };
    const browser = {
        newContext: jest.fn().mockResolvedValue(context),
        close: jest.fn().mockResolvedValue(undefined),
    };
    return { browser, context, page };
}

function open() {
    return BrowserProfileSession.open({
        profileUrl: PROFILE_URL,
        email: 'jane@example.com',
        password: 'test-password',
        timeoutMs: 10000,
    });
}

describe('BrowserProfileSession', () => {
    beforeEach(() => {
        mockLaunch.mockReset();
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should sign in and snapshot navigated pages', async () => {
        const { browser, page } = fakeBrowser();
        mockLaunch.mockResolvedValue(browser);

        const session = await open();
        const document = await session.navigate(PROFILE_URL);

        expect(mockLaunch).toHaveBeenCalledWith(expect.objectContaining({ headless: true }));
        expect(page.goto).toHaveBeenCalledWith(`${ORIGIN}/login`, expect.objectContaining({ timeout: 10000 }));
        expect(page.fill).toHaveBeenCalledWith('#username', 'jane@example.com');
        expect(page.fill).toHaveBeenCalledWith('#password', 'test-password');
        expect(page.goto).toHaveBeenLastCalledWith(PROFILE_URL, expect.objectContaining({ timeout: 9000 }));
        expect(page.mouse.wheel).toHaveBeenCalled();
        expect(document.url).toBe(PROFILE_URL);
        expect(document.query()('h1').text()).toBe('Jane Placeholder');
    });

    it('should fail with AuthenticationError on a security challenge and close the browser', async () => {
        const { browser } = fakeBrowser({ afterLogin: `${ORIGIN}/checkpoint/challenge/1` });
        mockLaunch.mockResolvedValue(browser);

        await expect(open()).rejects.toThrow(AuthenticationError);
        expect(browser.close).toHaveBeenCalledTimes(1);
    });

    it('should detect a challenge form on the landing page', async () => {
        const { browser } = fakeBrowser({ challengeElement: true });
        mockLaunch.mockResolvedValue(browser);

        await expect(open()).rejects.toThrow('security challenge');
    });

    it('should report rejected credentials', async () => {
        const { browser } = fakeBrowser({ afterLogin: `${ORIGIN}/login?error=1` });
        mockLaunch.mockResolvedValue(browser);

        await expect(open()).rejects.toThrow('Credentials were rejected');
    });

    it('should raise ConfigurationError when Chromium cannot be launched', async () => {
        mockLaunch.mockRejectedValue(new Error('Executable not found'));

        await expect(open()).rejects.toThrow(ConfigurationError);
    });

    it('should map error statuses to NavigationError', async () => {
        const { browser } = fakeBrowser({ status: 404 });
        mockLaunch.mockResolvedValue(browser);
        const session = await open();

        await expect(session.navigate(`${PROFILE_URL}details/projects/`)).rejects.toMatchObject({
            name: 'NavigationError',
            transient: false,
        });
    });

    it('should treat a rate-limited page as transient', async () => {
        const { browser } = fakeBrowser({ status: 429 });
        mockLaunch.mockResolvedValue(browser);
        const session = await open();

        await expect(session.navigate(PROFILE_URL)).rejects.toMatchObject({ name: 'NavigationError', transient: true });
    });

    it('should stop after the page load once the navigation is aborted', async () => {
        const { browser, page } = fakeBrowser();
        mockLaunch.mockResolvedValue(browser);
        const session = await open();
        const controller = new AbortController();
        controller.abort();

        await expect(session.navigate(PROFILE_URL, controller.signal)).rejects.toThrow('Navigation aborted');
        expect(page.mouse.wheel).not.toHaveBeenCalled();
        expect(page.content).not.toHaveBeenCalled();
    });

    it('should treat a redirect to another profile as a navigation failure', async () => {
        const { browser } = fakeBrowser({ redirectTo: `${ORIGIN}/in/someone-else/` });
        mockLaunch.mockResolvedValue(browser);
        const session = await open();

        await expect(session.navigate(PROFILE_URL)).rejects.toThrow(NavigationError);
    });

    it('should close the context and browser once', async () => {
        const { browser, context } = fakeBrowser();
        mockLaunch.mockResolvedValue(browser);
        const session = await open();
        const document = await session.navigate(PROFILE_URL);

        await session.close();
        await session.close();

        expect(document.isDetached).toBe(true);
        expect(context.close).toHaveBeenCalledTimes(1);
        expect(browser.close).toHaveBeenCalledTimes(1);
    });
});
