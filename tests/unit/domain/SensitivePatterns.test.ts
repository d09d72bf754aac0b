/**
 * Unit tests for personal identifier patterns
 */
import {
    containsNationalId,
    containsPaymentCard,
    findContactIdentifiers,
    replaceContactIdentifiers,
} from '../../../src/domain/services/SensitivePatterns';

describe('SensitivePatterns', () => {
    it('should find emails and phone numbers', () => {
        const found = findContactIdentifiers('Mail jane@example.com or call +1 555 010 0199');

        expect(found).toContain('jane@example.com');
        expect(found).toContain('+1 555 010 0199');
    });

    it('should find nothing in plain prose', () => {
        expect(findContactIdentifiers('Led the platform team from 2019 to 2021.')).toEqual([]);
    });

    it('should replace every identifier', () => {
        expect(replaceContactIdentifiers('Reach me at jane@example.com or +1 555 010 0199.', '[removed]'))
            .toBe('Reach me at [removed] or [removed].');
    });

    it('should detect national id numbers', () => {
        expect(containsNationalId('SSN 123-45-6789')).toBe(true);
        expect(containsNationalId('2019-2021')).toBe(false);
    });

    it('should detect payment card numbers only when the checksum holds', () => {
        expect(containsPaymentCard('card 4111 1111 1111 1111')).toBe(true);
        expect(containsPaymentCard('order 1234 5678 9012 3456')).toBe(false);
        expect(containsPaymentCard('Jan 2019 - Dec 2021')).toBe(false);
    });
});
