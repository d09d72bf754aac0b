/**
 * Unit tests for HttpProfileSession
 */
import nock from 'nock';
import { AuthenticationError, NavigationError } from '../../../../src/domain/errors/ProfileToolError';
import { HttpProfileSession } from '../../../../src/infrastructure/session/HttpProfileSession';

const ORIGIN = 'https://profiles.example.com';
const PROFILE_URL = `${ORIGIN}/in/jane/`;
const COOKIE = 'li_at=test-session';

describe('HttpProfileSession', () => {
    beforeEach(() => {
        nock.cleanAll();
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
        nock.enableNetConnect();
    });

    it('should load a page with the session cookie', async () => {
        nock(ORIGIN)
            .get('/in/jane/')
            .matchHeader('cookie', COOKIE)
            .reply(200, '<html><body><h1>Jane Placeholder</h1></body></html>');
        const session = new HttpProfileSession(COOKIE);

        const document = await session.navigate(PROFILE_URL);

        expect(document.url).toBe(PROFILE_URL);
        expect(document.query()('h1').text()).toBe('Jane Placeholder');
        expect(session.currentDocument()).toBe(document);
    });

    it('should require a cookie', () => {
        expect(() => new HttpProfileSession('')).toThrow(AuthenticationError);
    });

    it('should treat a returned login page as an authentication failure', async () => {
        nock(ORIGIN).get('/in/jane/').reply(200, '<html><body><form class="login__form"></form></body></html>');

        await expect(new HttpProfileSession(COOKIE).navigate(PROFILE_URL)).rejects.toThrow(AuthenticationError);
    });

    it('should map a rejected session to AuthenticationError', async () => {
        nock(ORIGIN).get('/in/jane/').reply(403, 'Forbidden');

        await expect(new HttpProfileSession(COOKIE).navigate(PROFILE_URL)).rejects.toThrow('Session rejected (403)');
    });

    it('should map a missing page to a permanent NavigationError', async () => {
        nock(ORIGIN).get('/in/jane/details/projects/').reply(404, 'Not found');

        const result = new HttpProfileSession(COOKIE).navigate(`${PROFILE_URL}details/projects/`);

        await expect(result).rejects.toThrow(NavigationError);
        await expect(result).rejects.toMatchObject({ transient: false, url: `${PROFILE_URL}details/projects/` });
    });

    it('should map server errors to a transient NavigationError', async () => {
        nock(ORIGIN).get('/in/jane/').reply(503, 'Unavailable');

        await expect(new HttpProfileSession(COOKIE).navigate(PROFILE_URL)).rejects.toMatchObject({
            name: 'NavigationError',
            transient: true,
        });
    });

    it('should report an aborted navigation without sending it', async () => {
        const controller = new AbortController();
        controller.abort();

        const result = new HttpProfileSession(COOKIE).navigate(PROFILE_URL, controller.signal);

        await expect(result).rejects.toThrow('Navigation aborted');
        await expect(result).rejects.toMatchObject({ transient: false });
    });

    it('should detach documents and refuse navigation after close', async () => {
        nock(ORIGIN).get('/in/jane/').reply(200, '<html><body><h1>Jane</h1></body></html>');
        const session = new HttpProfileSession(COOKIE);
        const document = await session.navigate(PROFILE_URL);

        await session.close();

        expect(document.isDetached).toBe(true);
        await expect(session.navigate(PROFILE_URL)).rejects.toThrow('Session is closed');
    });
});
