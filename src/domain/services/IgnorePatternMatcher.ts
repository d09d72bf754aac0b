/**
 * Subset of ignore-file semantics: `#` comments, `!` negation (last match
 * wins), `*`, `**` and `?` wildcards, trailing `/` for directories and
 * anchoring by a leading or inner slash.
 */
export function isPathIgnored(relativePath: string, ignoreContent: string): boolean {
    const target = relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
    let ignored = false;

    for (const rawLine of ignoreContent.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;

        const negate = line.startsWith('!');
        const pattern = negate ? line.slice(1) : line;
        if (patternMatches(pattern, target)) {
            ignored = !negate;
        }
    }
    return ignored;
}

function patternMatches(pattern: string, target: string): boolean {
    const dirOnly = pattern.endsWith('/');
    let body = dirOnly ? pattern.slice(0, -1) : pattern;
    const anchored = body.startsWith('/') || body.includes('/');
    body = body.replace(/^\//, '');
    if (!body) return false;

    const regex = globToRegExp(body);
    const segments = target.split('/');

    if (anchored) {
        for (let i = 1; i <= segments.length; i++) {
            if (dirOnly && i === segments.length) continue;
            if (regex.test(segments.slice(0, i).join('/'))) return true;
        }
        return false;
    }

    return segments.some((segment, i) => !(dirOnly && i === segments.length - 1) && regex.test(segment));
}

function globToRegExp(glob: string): RegExp {
    let source = '';
    let rest = glob;
    if (rest.startsWith('**/')) {
        source = '(?:.*/)?';
        rest = rest.slice(3);
    }
    for (let i = 0; i < rest.length; i++) {
        const char = rest[i];
        if (char === '*' && rest[i + 1] === '*') {
            source += '.*';
            i++;
        } else if (char === '*') {
            source += '[^/]*';
        } else if (char === '?') {
            source += '[^/]';
        } else {
            source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
        }
    }
    return new RegExp(`^${source}$`);
}
