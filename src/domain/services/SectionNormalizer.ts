import {
    CertificationEntry,
    DateRange,
    EducationEntry,
    EmployerGroup,
    ExperienceEntry,
    HonorEntry,
    LanguageEntry,
    ProjectEntry,
    PublicationEntry,
    RecommendationEntry,
    SectionName,
    SkillEntry,
    VolunteerEntry,
} from '../entities/ProfileRecord';
import { comparePartialDates, DateRangeParser } from './DateRangeParser';
import { RawItem } from './FieldExtractor';
import { SkillClassifier } from './SkillClassifier';
import { SkillRegistry } from './SkillRegistry';

/**
 * An entry dropped during normalization. Logged, never fatal.
 */
export interface NormalizationWarning {
    section: SectionName;
    index: number;
    reason: string;
}

export interface NormalizationResult<T> {
    entries: T[];
    warnings: NormalizationWarning[];
}

const EMPLOYMENT_TYPES = [
    'full-time',
    'part-time',
    'contract',
    'contractor',
    'freelance',
    'self-employed',
    'internship',
    'apprenticeship',
    'seasonal',
    'temporary',
    'permanent',
];

const DURATION_PATTERN = /^(?:less than a year|\d+\s+(?:yrs?|years?|mos?|months?)(?:\s+\d+\s+(?:mos?|months?))?)$/i;
const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/;
const COUNT_SUFFIX_PATTERN = /^(.*?)\s*\((\d+)\)$/;
const ENDORSEMENT_LABEL_PATTERN = /^(\d+)\+?\s+endorsements?$/i;

export interface CleanedEmployer {
    name: string;
    employmentType?: string;
    unresolved: boolean;
}

/**
 * Strips "· Full-time"-style annotations from a captured employer name.
 * When nothing but an annotation was captured the result is flagged
 * unresolved and keeps the label text instead of guessing a name.
 */
export function cleanEmployerName(text: string): CleanedEmployer {
    const parts = text.split(/\s*[·•]\s*/).map(p => p.trim()).filter(Boolean);
    let employmentType: string | undefined;
    const remaining: string[] = [];

    for (const part of parts) {
        if (!employmentType && isEmploymentType(part)) {
            employmentType = part;
        } else if (!DURATION_PATTERN.test(part)) {
            remaining.push(part);
        }
    }

    const name = remaining[0] ?? '';
    if (!name) {
        return { name: employmentType ?? 'Unknown employer', employmentType, unresolved: true };
    }
    if (isEmploymentType(name)) {
        return { name, employmentType: employmentType ?? name, unresolved: true };
    }
    return { name, employmentType, unresolved: false };
}

function isEmploymentType(text: string): boolean {
    return EMPLOYMENT_TYPES.includes(text.trim().toLowerCase());
}

export function employerKey(name: string): string {
    return name.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Reads an endorsement count from "Python (12)" or from a label such as
 * "12 endorsements". Anything else means no count.
 */
export function parseSkillText(name: string, labels: readonly string[] = []): { name: string; endorsements?: number } {
    const trimmed = name.replace(/\s+/g, ' ').trim();
    const suffix = COUNT_SUFFIX_PATTERN.exec(trimmed);
    if (suffix && suffix[1]) {
        return { name: suffix[1], endorsements: parseInt(suffix[2], 10) };
    }

    for (const label of labels) {
        const match = ENDORSEMENT_LABEL_PATTERN.exec(label.trim());
        if (match) return { name: trimmed, endorsements: parseInt(match[1], 10) };
    }
    return { name: trimmed };
}

/**
 * Orders experience entries most recent first; undated entries go last.
 * Array.prototype.sort is stable, so ties keep extraction order.
 */
function byStartDescending(a: ExperienceEntry, b: ExperienceEntry): number {
    const aStart = a.dates?.start;
    const bStart = b.dates?.start;
    if (!aStart && !bStart) return 0;
    if (!aStart) return 1;
    if (!bStart) return -1;
    return comparePartialDates(bStart, aStart);
}

function dateKey(range?: DateRange): string {
    if (!range) return '';
    if (range.confidence === 'low') return range.raw.toLowerCase();
    return JSON.stringify([range.start ?? null, range.end ?? null, range.ongoing]);
}

/**
 * Drops entries whose title, employer and date range repeat an earlier entry.
 */
export function dedupeExperience(entries: readonly ExperienceEntry[]): ExperienceEntry[] {
    const seen = new Set<string>();
    return entries.filter(entry => {
        const key = [employerKey(entry.title), employerKey(entry.employer), dateKey(entry.dates)].join('|');
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/**
 * Groups entries by cleaned employer name. Unresolved employers never merge,
 * since the shared label says nothing about who the employer was.
 */
export function groupExperience(entries: readonly ExperienceEntry[]): EmployerGroup[] {
    const groups = new Map<string, EmployerGroup>();

    entries.forEach((entry, index) => {
        const key = entry.employerUnresolved ? `unresolved#${index}` : employerKey(entry.employer);
        const group = groups.get(key);
        if (group) {
            group.roles.push(entry);
        } else {
            groups.set(key, {
                employer: entry.employer,
                employerUnresolved: entry.employerUnresolved,
                roles: [entry],
            });
        }
    });

    const result = Array.from(groups.values());
    for (const group of result) {
        group.roles.sort(byStartDescending);
    }
    return result.sort((a, b) => byStartDescending(a.roles[0], b.roles[0]));
}

/**
 * Turns raw extracted items into typed entries, one method per section.
 */
export class SectionNormalizer {
    constructor(
        private readonly dates: DateRangeParser = new DateRangeParser(),
        private readonly classifier: SkillClassifier = new SkillClassifier()
    ) { }

    normalizeExperience(items: readonly RawItem[]): NormalizationResult<EmployerGroup> {
        const warnings: NormalizationWarning[] = [];
        const entries: ExperienceEntry[] = [];

        items.forEach((item, index) => {
            if (item.nested.length > 0) {
                const employer = cleanEmployerName(first(item.fields.title) ?? '');
                const groupType = cleanEmployerName(first(item.fields.subtitle) ?? '').employmentType;
                for (const role of item.nested) {
                    const entry = this.buildRole(role, employer, groupType);
                    if (entry) {
                        entries.push(entry);
                    } else {
                        warnings.push({ section: 'experience', index, reason: 'grouped role without a title' });
                    }
                }
                return;
            }

            const employer = cleanEmployerName(first(item.fields.subtitle) ?? '');
            const entry = this.buildRole(item, employer);
            if (entry) {
                entries.push(entry);
            } else {
                warnings.push({ section: 'experience', index, reason: 'entry without a title' });
            }
        });

        return { entries: groupExperience(dedupeExperience(entries)), warnings };
    }

    private buildRole(item: RawItem, employer: CleanedEmployer, groupType?: string): ExperienceEntry | null {
        const title = first(item.fields.title);
        if (!title) return null;

        const captions = item.fields.captions ?? [];
        const dateText = captions.find(looksLikeDate);
        const locationText = captions.find(c => c !== dateText && !DURATION_PATTERN.test(c));
        const roleType = cleanEmployerName(first(item.fields.subtitle) ?? '').employmentType;

        const entry: ExperienceEntry = {
            title,
            employer: employer.name,
            employerUnresolved: employer.unresolved,
        };
        const employmentType = employer.employmentType ?? roleType ?? groupType;
        if (employmentType) entry.employmentType = employmentType;
        if (locationText) entry.location = locationText.split('·')[0].trim();
        if (dateText) entry.dates = this.dates.parse(dateText);
        const description = joined(item.fields.description);
        if (description) entry.description = description;
        return entry;
    }

    normalizeSkills(items: readonly RawItem[], registry: SkillRegistry = new SkillRegistry()): NormalizationResult<SkillEntry> {
        const warnings: NormalizationWarning[] = [];

        items.forEach((item, index) => {
            const rawName = first(item.fields.title);
            if (!rawName) {
                warnings.push({ section: 'skills', index, reason: 'skill without a name' });
                return;
            }
            const labels = [...(item.fields.subtitle ?? []), ...(item.fields.captions ?? []), ...(item.fields.description ?? [])];
            const parsed = parseSkillText(rawName, labels);
            if (this.classifier.isIgnoredLabel(parsed.name)) {
                warnings.push({ section: 'skills', index, reason: `page label "${parsed.name}" is not a skill` });
                return;
            }
            registry.add(parsed.name, parsed.endorsements, this.classifier.classify(parsed.name));
        });

        return { entries: registry.list(), warnings };
    }

    normalizeEducation(items: readonly RawItem[]): NormalizationResult<EducationEntry> {
        return this.each(items, 'education', 'institution', item => {
            const institution = first(item.fields.title);
            if (!institution) return null;

            const entry: EducationEntry = { institution };
            const subtitle = first(item.fields.subtitle);
            if (subtitle) {
                const [degree, ...rest] = subtitle.split(',').map(p => p.trim());
                if (degree) entry.degree = degree;
                if (rest.length > 0 && rest.join(', ')) entry.fieldOfStudy = rest.join(', ');
            }

            const captions = item.fields.captions ?? [];
            const dateText = captions.find(looksLikeDate);
            if (dateText) entry.dates = this.dates.parse(dateText);
            const grade = captions.find(c => /^grade:/i.test(c));
            if (grade) entry.grade = grade.replace(/^grade:\s*/i, '');

            const descriptions: string[] = [];
            for (const text of item.fields.description ?? []) {
                if (/^activities and societies:/i.test(text)) {
                    entry.activities = text.replace(/^activities and societies:\s*/i, '');
                } else if (/^grade:/i.test(text)) {
                    entry.grade = entry.grade ?? text.replace(/^grade:\s*/i, '');
                } else {
                    descriptions.push(text);
                }
            }
            if (descriptions.length > 0) entry.description = descriptions.join('\n');
            return entry;
        });
    }

    normalizeCertifications(items: readonly RawItem[]): NormalizationResult<CertificationEntry> {
        return this.each(items, 'certifications', 'name', item => {
            const name = first(item.fields.title);
            if (!name) return null;

            const entry: CertificationEntry = { name };
            const issuer = first(item.fields.subtitle);
            if (issuer) entry.issuer = issuer;

            for (const caption of item.fields.captions ?? []) {
                for (const part of caption.split(/\s*·\s*/)) {
                    if (/^issued\b/i.test(part)) {
                        entry.issued = this.dates.parse(part.replace(/^issued\s*/i, ''));
                    } else if (/^expire[sd]\b/i.test(part)) {
                        entry.expires = this.dates.parse(part.replace(/^expire[sd]\s*/i, ''));
                    } else if (/^credential id\b/i.test(part)) {
                        entry.credentialId = part.replace(/^credential id\s*/i, '');
                    }
                }
            }
            const url = first(item.fields.link);
            if (url) entry.url = url;
            return entry;
        });
    }

    normalizeProjects(items: readonly RawItem[]): NormalizationResult<ProjectEntry> {
        return this.each(items, 'projects', 'name', item => {
            const name = first(item.fields.title);
            if (!name) return null;

            const entry: ProjectEntry = { name };
            const dateText = (item.fields.captions ?? []).find(looksLikeDate) ?? (item.fields.subtitle ?? []).find(looksLikeDate);
            if (dateText) entry.dates = this.dates.parse(dateText);
            const associated = [...(item.fields.subtitle ?? []), ...(item.fields.captions ?? [])]
                .find(text => /^associated with\b/i.test(text));
            if (associated) entry.associatedWith = associated.replace(/^associated with\s*/i, '');
            const description = joined((item.fields.description ?? []).filter(text => !/^associated with\b/i.test(text)));
            if (description) entry.description = description;
            const url = first(item.fields.link);
            if (url) entry.url = url;
            return entry;
        });
    }

    normalizeLanguages(items: readonly RawItem[]): NormalizationResult<LanguageEntry> {
        return this.each(items, 'languages', 'name', item => {
            const name = first(item.fields.title);
            if (!name) return null;
            const entry: LanguageEntry = { name };
            const proficiency = first(item.fields.captions) ?? first(item.fields.subtitle);
            if (proficiency) entry.proficiency = proficiency;
            return entry;
        });
    }

    normalizeRecommendations(items: readonly RawItem[]): NormalizationResult<RecommendationEntry> {
        return this.each(items, 'recommendations', 'author', item => {
            const author = first(item.fields.title);
            if (!author) return null;
            const entry: RecommendationEntry = { author };
            const relationship = first(item.fields.captions) ?? first(item.fields.subtitle);
            if (relationship) entry.relationship = relationship;
            const text = joined(item.fields.description);
            if (text) entry.text = text;
            return entry;
        });
    }

    normalizeVolunteering(items: readonly RawItem[]): NormalizationResult<VolunteerEntry> {
        return this.each(items, 'volunteering', 'role or organization', item => {
            const role = first(item.fields.title);
            const organization = first(item.fields.subtitle);
            if (!role || !organization) return null;

            const entry: VolunteerEntry = { role, organization };
            const captions = item.fields.captions ?? [];
            const dateText = captions.find(looksLikeDate);
            if (dateText) entry.dates = this.dates.parse(dateText);
            const cause = captions.find(c => c !== dateText && !DURATION_PATTERN.test(c));
            if (cause) entry.cause = cause;
            const description = joined(item.fields.description);
            if (description) entry.description = description;
            return entry;
        });
    }

    normalizeHonors(items: readonly RawItem[]): NormalizationResult<HonorEntry> {
        return this.each(items, 'honors', 'title', item => {
            const title = first(item.fields.title);
            if (!title) return null;

            const entry: HonorEntry = { title };
            for (const part of splitDots(item.fields.subtitle)) {
                if (/^issued by\b/i.test(part)) {
                    entry.issuer = part.replace(/^issued by\s*/i, '');
                } else if (looksLikeDate(part)) {
                    entry.dates = this.dates.parse(part);
                }
            }
            const description = joined(item.fields.description);
            if (description) entry.description = description;
            return entry;
        });
    }

    normalizePublications(items: readonly RawItem[]): NormalizationResult<PublicationEntry> {
        return this.each(items, 'publications', 'title', item => {
            const title = first(item.fields.title);
            if (!title) return null;

            const entry: PublicationEntry = { title };
            for (const part of splitDots(item.fields.subtitle)) {
                if (looksLikeDate(part)) {
                    entry.dates = this.dates.parse(part);
                } else if (!entry.publisher) {
                    entry.publisher = part;
                }
            }
            const url = first(item.fields.link);
            if (url) entry.url = url;
            const description = joined(item.fields.description);
            if (description) entry.description = description;
            return entry;
        });
    }

    private each<T>(
        items: readonly RawItem[],
        section: SectionName,
        identity: string,
        build: (item: RawItem) => T | null
    ): NormalizationResult<T> {
        const entries: T[] = [];
        const warnings: NormalizationWarning[] = [];
        items.forEach((item, index) => {
            const entry = build(item);
            if (entry) {
                entries.push(entry);
            } else {
                warnings.push({ section, index, reason: `missing ${identity}` });
            }
        });
        return { entries, warnings };
    }
}

function first(values: readonly string[] | undefined): string | undefined {
    const value = values?.find(v => v.trim().length > 0);
    return value?.trim();
}

function joined(values: readonly string[] | undefined): string | undefined {
    const parts = (values ?? []).map(v => v.trim()).filter(Boolean);
    return parts.length > 0 ? parts.join('\n') : undefined;
}

function splitDots(values: readonly string[] | undefined): string[] {
    return (values ?? []).flatMap(v => v.split(/\s*·\s*/)).map(p => p.trim()).filter(Boolean);
}

function looksLikeDate(text: string): boolean {
    return YEAR_PATTERN.test(text) || /\bpresent\b/i.test(text);
}
