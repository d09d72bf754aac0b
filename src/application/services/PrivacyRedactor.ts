import { ContactInfo, DateRange, ProfileRecord } from '../../domain/entities/ProfileRecord';
import { RedactableField, RedactionAction, RedactionPolicy } from '../../domain/entities/RedactionPolicy';
import { compile, replaceContactIdentifiers } from '../../domain/services/SensitivePatterns';

export const REMOVED_PLACEHOLDER = '[removed]';

export function maskEmail(email: string): string {
    const at = email.lastIndexOf('@');
    if (at < 1) return '***';
    const domain = email.slice(at + 1);
    const dot = domain.lastIndexOf('.');
    const tld = dot >= 0 ? domain.slice(dot) : '';
    return `${email[0]}***@***${tld}`;
}

export function maskPhone(phone: string): string {
    const digits = phone.replace(/\D/g, '');
    return digits.length >= 2 ? `***-***-**${digits.slice(-2)}` : '***-***-****';
}

export function maskUrl(url: string): string {
    try {
        return `${new URL(url).origin}/***`;
    } catch {
        return '***';
    }
}

/**
 * Keeps only the broadest part of a place ("Berlin, Germany" -> "Germany").
 */
export function maskPlace(place: string): string {
    const parts = place.split(',').map(p => p.trim()).filter(Boolean);
    return parts.length > 0 ? parts[parts.length - 1] : '***';
}

const MASKS: Record<Exclude<RedactableField, 'narrative'>, (value: string) => string> = {
    email: maskEmail,
    phone: maskPhone,
    profileUrl: maskUrl,
    website: maskUrl,
    address: maskPlace,
    location: maskPlace,
};

interface TextMappers {
    text: (value: string) => string;
    /** Returning undefined drops the field. */
    narrative: (value: string) => string | undefined;
}

/**
 * Produces a redacted copy of a profile record. Pure: the input is never
 * touched, and applying the same policy twice gives the same result.
 */
export class PrivacyRedactor {

    redact(record: ProfileRecord, policy: RedactionPolicy): ProfileRecord {
        const patterns = policy.sensitivePatterns.map(source => compile(source, 'i'));
        const isSensitive = (value: string) => patterns.some(pattern => pattern.test(value));
        const scrub = (value: string) => policy.scrubContactPatterns
            ? replaceContactIdentifiers(value, REMOVED_PLACEHOLDER)
            : value;
        const dropNarrative = policy.actions.narrative !== 'keep';

        const mapped = mapRecordText(record, {
            text: scrub,
            narrative: value => (dropNarrative && isSensitive(value) ? undefined : scrub(value)),
        });

        const skills = dropNarrative
            ? mapped.skills.filter(skill => !isSensitive(skill.name))
            : mapped.skills;

        const result: ProfileRecord = {
            ...mapped,
            skills,
            contact: this.redactContact(record.contact, policy),
            extraction: {
                ...mapped.extraction,
                profileUrl: policy.actions.profileUrl === 'keep'
                    ? record.extraction.profileUrl
                    : maskUrl(record.extraction.profileUrl),
            },
            redaction: { level: policy.level },
        };

        const location = applyAction(policy.actions.location, mapped.location, MASKS.location);
        if (location === undefined) {
            delete result.location;
        } else {
            result.location = location;
        }
        return result;
    }

    private redactContact(contact: ContactInfo, policy: RedactionPolicy): ContactInfo {
        const result: ContactInfo = {};
        const fields = ['email', 'phone', 'profileUrl', 'website', 'address'] as const;
        for (const field of fields) {
            const value = applyAction(policy.actions[field], contact[field], MASKS[field]);
            if (value !== undefined) result[field] = value;
        }
        return result;
    }
}

function applyAction(action: RedactionAction, value: string | undefined, mask: (value: string) => string): string | undefined {
    if (value === undefined) return undefined;
    switch (action) {
        case 'remove':
            return undefined;
        case 'mask':
            return mask(value);
        case 'keep':
            return value;
    }
}

function mapRange(range: DateRange | undefined, mappers: TextMappers): DateRange | undefined {
    return range && { ...range, raw: mappers.text(range.raw) };
}

function optional(value: string | undefined, map: (value: string) => string | undefined): string | undefined {
    return value === undefined ? undefined : map(value);
}

/**
 * Rebuilds the record with every text field passed through a mapper.
 * Contact info and extraction metadata are copied as they are.
 */
function mapRecordText(record: ProfileRecord, mappers: TextMappers): ProfileRecord {
    const { text, narrative } = mappers;
    return prune({
        ...record,
        name: text(record.name),
        headline: optional(record.headline, narrative),
        location: optional(record.location, text),
        summary: optional(record.summary, narrative),
        contact: { ...record.contact },
        experience: record.experience.map(group => ({
            ...group,
            employer: text(group.employer),
            roles: group.roles.map(role => prune({
                ...role,
                title: text(role.title),
                employer: text(role.employer),
                employmentType: optional(role.employmentType, text),
                location: optional(role.location, text),
                dates: mapRange(role.dates, mappers),
                description: optional(role.description, narrative),
            })),
        })),
        skills: record.skills.map(skill => ({ ...skill, name: text(skill.name) })),
        education: record.education.map(entry => prune({
            ...entry,
            institution: text(entry.institution),
            degree: optional(entry.degree, text),
            fieldOfStudy: optional(entry.fieldOfStudy, text),
            grade: optional(entry.grade, text),
            activities: optional(entry.activities, narrative),
            dates: mapRange(entry.dates, mappers),
            description: optional(entry.description, narrative),
        })),
        certifications: record.certifications.map(entry => prune({
            ...entry,
            name: text(entry.name),
            issuer: optional(entry.issuer, text),
            issued: mapRange(entry.issued, mappers),
            expires: mapRange(entry.expires, mappers),
            credentialId: optional(entry.credentialId, text),
            url: optional(entry.url, text),
        })),
        projects: record.projects.map(entry => prune({
            ...entry,
            name: text(entry.name),
            associatedWith: optional(entry.associatedWith, text),
            url: optional(entry.url, text),
            dates: mapRange(entry.dates, mappers),
            description: optional(entry.description, narrative),
        })),
        languages: record.languages.map(entry => prune({
            ...entry,
            name: text(entry.name),
            proficiency: optional(entry.proficiency, text),
        })),
        recommendations: record.recommendations.map(entry => prune({
            ...entry,
            author: text(entry.author),
            relationship: optional(entry.relationship, text),
            text: optional(entry.text, narrative),
        })),
        volunteering: record.volunteering.map(entry => prune({
            ...entry,
            role: text(entry.role),
            organization: text(entry.organization),
            cause: optional(entry.cause, text),
            dates: mapRange(entry.dates, mappers),
            description: optional(entry.description, narrative),
        })),
        honors: record.honors.map(entry => prune({
            ...entry,
            title: text(entry.title),
            issuer: optional(entry.issuer, text),
            dates: mapRange(entry.dates, mappers),
            description: optional(entry.description, narrative),
        })),
        publications: record.publications.map(entry => prune({
            ...entry,
            title: text(entry.title),
            publisher: optional(entry.publisher, text),
            url: optional(entry.url, text),
            dates: mapRange(entry.dates, mappers),
            description: optional(entry.description, narrative),
        })),
        extraction: {
            ...record.extraction,
            sections: { ...record.extraction.sections },
        },
    });
}

/**
 * Drops keys whose value is undefined so copies compare and serialize
 * like the originals.
 */
function prune<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        if (Reflect.get(value, key) === undefined) {
            Reflect.deleteProperty(value, key);
        }
    }
    return value;
}
