import { Config } from '../../config';
import { ConfigurationError } from '../../domain/errors/ProfileToolError';
import { ProfileSessionFactory } from '../../domain/ports/IProfileSession';
import { BrowserProfileSession } from './BrowserProfileSession';
import { FixtureProfileSession } from './FixtureProfileSession';
import { HttpProfileSession } from './HttpProfileSession';

/**
 * Picks the session adapter for the configured mode.
 */
export function createSessionFactory(config: Config): ProfileSessionFactory {
    switch (config.sessionMode) {
        case 'browser':
            return async () => {
                const { email, password } = config.credentials;
                if (!email || !password) {
                    throw new ConfigurationError('Browser sessions need PROFILE_EMAIL and PROFILE_PASSWORD');
                }
                return BrowserProfileSession.open({
                    profileUrl: config.profileUrl,
                    email,
                    password,
                    headless: config.browser.headless,
                    executablePath: config.browser.executablePath,
                    timeoutMs: config.stepTimeoutMs,
                });
            };
        case 'http':
            return async () => new HttpProfileSession(config.sessionCookie ?? '', { timeout: config.stepTimeoutMs });
        case 'fixtures':
            return async () => {
                if (!config.fixturesDir) {
                    throw new ConfigurationError('Fixture sessions need FIXTURES_DIR');
                }
                return new FixtureProfileSession(config.fixturesDir, config.profileUrl);
            };
    }
}
