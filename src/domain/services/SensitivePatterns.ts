/**
 * Regex sources for personal identifiers. Stored as sources and compiled per
 * use so no caller shares `lastIndex` state.
 */

export const EMAIL_PATTERN = '[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,}';

export const PHONE_PATTERNS: readonly string[] = [
    // +49 151 2345 6789, +1 (555) 123-4567
    '\\+\\d{1,3}[\\s.-]?\\(?\\d{1,4}\\)?(?:[\\s.-]?\\d{2,4}){2,4}',
    // (555) 123-4567, 555.123.4567
    '\\(?\\b\\d{3}\\)?[\\s.-]?\\d{3}[\\s.-]?\\d{4}\\b',
];

export const CONTACT_IDENTIFIER_PATTERNS: readonly string[] = [EMAIL_PATTERN, ...PHONE_PATTERNS];

export const NATIONAL_ID_PATTERN = '\\b\\d{3}-\\d{2}-\\d{4}\\b';

export const PAYMENT_CARD_PATTERN = '\\b(?:\\d[ -]?){12,18}\\d\\b';

export function compile(source: string, flags = 'g'): RegExp {
    return new RegExp(source, flags);
}

/**
 * Every email or phone-shaped substring of the text.
 */
export function findContactIdentifiers(text: string): string[] {
    return CONTACT_IDENTIFIER_PATTERNS.flatMap(source => text.match(compile(source)) ?? []);
}

export function replaceContactIdentifiers(text: string, replacement: string): string {
    return CONTACT_IDENTIFIER_PATTERNS.reduce((current, source) => current.replace(compile(source), replacement), text);
}

export function containsNationalId(text: string): boolean {
    return compile(NATIONAL_ID_PATTERN, '').test(text);
}

/**
 * True when the text holds a 13-19 digit number passing the Luhn checksum.
 */
export function containsPaymentCard(text: string): boolean {
    const candidates = text.match(compile(PAYMENT_CARD_PATTERN)) ?? [];
    return candidates.some(candidate => passesLuhn(candidate.replace(/\D/g, '')));
}

function passesLuhn(digits: string): boolean {
    if (digits.length < 13 || digits.length > 19) return false;
    let sum = 0;
    for (let i = 0; i < digits.length; i++) {
        let digit = parseInt(digits[digits.length - 1 - i], 10);
        if (i % 2 === 1) {
            digit *= 2;
            if (digit > 9) digit -= 9;
        }
        sum += digit;
    }
    return sum % 10 === 0;
}
