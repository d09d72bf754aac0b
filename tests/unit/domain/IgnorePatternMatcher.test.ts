/**
 * Unit tests for the ignore-file matcher
 */
import { isPathIgnored } from '../../../src/domain/services/IgnorePatternMatcher';

describe('isPathIgnored', () => {
    it('should ignore files inside an ignored directory', () => {
        expect(isPathIgnored('data/profile_raw.json', 'data/')).toBe(true);
        expect(isPathIgnored('nested/data/profile_raw.json', 'data/')).toBe(true);
    });

    it('should not treat a directory pattern as matching a file of that name', () => {
        expect(isPathIgnored('data', 'data/')).toBe(false);
    });

    it('should match wildcards against the file name', () => {
        expect(isPathIgnored('data/profile_raw.json', '*_raw.json')).toBe(true);
        expect(isPathIgnored('data/profile.json', '*_raw.json')).toBe(false);
        expect(isPathIgnored('data/profile_raw.json', 'profile_ra?.json')).toBe(true);
    });

    it('should anchor patterns that contain a slash', () => {
        expect(isPathIgnored('output/resume.md', '/output')).toBe(true);
        expect(isPathIgnored('src/output/resume.md', '/output')).toBe(false);
        expect(isPathIgnored('a/b/secrets/key.json', '**/secrets/*.json')).toBe(true);
    });

    it('should let the last matching line win', () => {
        const content = '*.json\n!data/profile_raw.json\n';

        expect(isPathIgnored('data/profile_raw.json', content)).toBe(false);
        expect(isPathIgnored('data/other.json', content)).toBe(true);
    });

    it('should skip comments and blank lines', () => {
        expect(isPathIgnored('data/profile_raw.json', '# data/\n\n')).toBe(false);
    });
});
