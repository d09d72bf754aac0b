import { DateRange, PartialDate } from '../entities/ProfileRecord';

const MONTH_NAMES = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];
const MONTH_LABELS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const ONGOING_PATTERN = /^(present|current|now)$/i;
const SEPARATOR_PATTERN = /\s*(?:-|–|—|\bto\b)\s*/i;
const POINT_PATTERN = /^(?:([A-Za-z]{3,9})\.?\s+)?(\d{4})$/;
const YEAR_TOKEN_PATTERN = /\b(?:19|20)\d{2}\b/g;

/**
 * Parses free-text durations such as "Jan 2020 - Present" or "2018 – 2021".
 *
 * Never throws: text it cannot read comes back with confidence 'low' and the
 * original text in `raw`.
 */
export class DateRangeParser {

    public parse(text: string): DateRange {
        const raw = (text ?? '').replace(/\s+/g, ' ').trim();
        // "Jan 2020 - Present · 4 yrs 2 mos"
        const body = raw.split('·')[0].trim();

        const strict = this.parseStrict(body, raw);
        if (strict) return strict;

        // A lone year somewhere in otherwise unreadable text becomes the start.
        const years = body.match(YEAR_TOKEN_PATTERN) ?? [];
        if (years.length === 1) {
            return { start: { year: parseInt(years[0], 10) }, ongoing: false, confidence: 'low', raw };
        }

        return { ongoing: false, confidence: 'low', raw };
    }

    private parseStrict(body: string, raw: string): DateRange | null {
        if (!body) return null;

        const parts = body.split(SEPARATOR_PATTERN).map(p => p.trim());
        if (parts.length === 1) {
            const start = this.parsePoint(parts[0]);
            return start ? { start, ongoing: false, confidence: 'high', raw } : null;
        }
        if (parts.length !== 2) return null;

        const start = this.parsePoint(parts[0]);
        if (!start) return null;

        if (ONGOING_PATTERN.test(parts[1])) {
            return { start, ongoing: true, confidence: 'high', raw };
        }

        const end = this.parsePoint(parts[1]);
        if (!end || comparePartialDates(start, end) > 0) return null;

        return { start, end, ongoing: false, confidence: 'high', raw };
    }

    private parsePoint(text: string): PartialDate | null {
        const match = POINT_PATTERN.exec(text);
        if (!match) return null;

        const year = parseInt(match[2], 10);
        if (!match[1]) return { year };

        const month = monthIndex(match[1]);
        return month === null ? null : { year, month };
    }
}

function monthIndex(word: string): number | null {
    const lower = word.toLowerCase();
    const index = MONTH_NAMES.findIndex(name => lower === name || lower === name.slice(0, 3));
    if (index !== -1) return index + 1;
    return lower === 'sept' ? 9 : null;
}

export function formatPartialDate(date: PartialDate): string {
    return date.month ? `${MONTH_LABELS[date.month - 1]} ${date.year}` : `${date.year}`;
}

/**
 * Serializes a range back to the text form `DateRangeParser.parse` reads.
 * Low-confidence ranges return their raw text. With `openEndedAsPresent`
 * a range without an end is shown as current.
 */
export function formatDateRange(range: DateRange, options?: { openEndedAsPresent?: boolean }): string {
    if (range.confidence === 'low' || !range.start) {
        return range.raw;
    }
    const start = formatPartialDate(range.start);
    if (range.end) {
        return `${start} - ${formatPartialDate(range.end)}`;
    }
    if (range.ongoing || options?.openEndedAsPresent) {
        return `${start} - Present`;
    }
    return start;
}

/**
 * Orders dates chronologically; a missing month sorts before January.
 */
export function comparePartialDates(a: PartialDate, b: PartialDate): number {
    if (a.year !== b.year) return a.year - b.year;
    return (a.month ?? 0) - (b.month ?? 0);
}
