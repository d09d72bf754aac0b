import { PrivacyLevel } from './ProfileRecord';

export type RedactionAction = 'remove' | 'mask' | 'keep';

/**
 * Fields a policy decides on. `narrative` covers summary, descriptions and
 * recommendation text.
 */
export type RedactableField =
    | 'email'
    | 'phone'
    | 'profileUrl'
    | 'website'
    | 'address'
    | 'location'
    | 'narrative';

export interface RedactionPolicy {
    readonly level: PrivacyLevel;
    readonly actions: Readonly<Record<RedactableField, RedactionAction>>;
    /**
     * Regex sources (case-insensitive). Free-text fields matching any of them
     * are removed when `narrative` is not kept.
     */
    readonly sensitivePatterns: readonly string[];
    /** Replace email and phone patterns found inside any text. */
    readonly scrubContactPatterns: boolean;
}

export const DEFAULT_SENSITIVE_PATTERNS: readonly string[] = [
    '\\bconfidential\\b',
    '\\bproprietary\\b',
    '\\bclassified\\b',
    '\\binternal[- ]only\\b',
    '\\brestricted\\b',
    '\\bsalary\\b',
    '\\bcompensation\\b',
    '\\$\\s*\\d[\\d,]*(?:\\.\\d{2})?\\s*(?:k|thousand|million)?\\b',
];

const LEVEL_ACTIONS: Record<PrivacyLevel, Record<RedactableField, RedactionAction>> = {
    strict: {
        email: 'remove',
        phone: 'remove',
        profileUrl: 'remove',
        website: 'remove',
        address: 'remove',
        location: 'mask',
        narrative: 'remove',
    },
    normal: {
        email: 'mask',
        phone: 'mask',
        profileUrl: 'mask',
        website: 'keep',
        address: 'mask',
        location: 'keep',
        narrative: 'keep',
    },
    minimal: {
        email: 'keep',
        phone: 'keep',
        profileUrl: 'keep',
        website: 'keep',
        address: 'keep',
        location: 'keep',
        narrative: 'keep',
    },
};

/**
 * Builds the policy for a named level. The returned value is frozen.
 */
export function createRedactionPolicy(
    level: PrivacyLevel,
    sensitivePatterns: readonly string[] = DEFAULT_SENSITIVE_PATTERNS
): RedactionPolicy {
    for (const source of sensitivePatterns) {
        try {
            new RegExp(source, 'i');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new Error(`Invalid sensitive keyword pattern "${source}": ${reason}`);
        }
    }

    return Object.freeze({
        level,
        actions: Object.freeze({ ...LEVEL_ACTIONS[level] }),
        sensitivePatterns: Object.freeze([...sensitivePatterns]),
        scrubContactPatterns: level === 'strict',
    });
}

export function isPrivacyLevel(value: string): value is PrivacyLevel {
    return value === 'strict' || value === 'normal' || value === 'minimal';
}
