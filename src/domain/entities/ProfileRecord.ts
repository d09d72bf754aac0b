/**
 * ProfileRecord - the structured result of one extraction run.
 *
 * Created once per run by the assembler. The redactor and the renderers
 * read it and never mutate it.
 */

export type PrivacyLevel = 'strict' | 'normal' | 'minimal';

/**
 * A month-precision date as it appears on a profile. Month is 1-12.
 */
export interface PartialDate {
    year: number;
    month?: number;
}

/**
 * Result of parsing a free-text duration.
 * `end` is absent both for an explicit "Present" (ongoing = true) and for a
 * single open-ended date. Low-confidence ranges carry only the raw text.
 */
export interface DateRange {
    start?: PartialDate;
    end?: PartialDate;
    ongoing: boolean;
    confidence: 'high' | 'low';
    raw: string;
}

export interface ContactInfo {
    email?: string;
    phone?: string;
    profileUrl?: string;
    website?: string;
    address?: string;
}

export interface ExperienceEntry {
    title: string;
    employer: string;
    /** Set when the captured employer text was only an employment-type label. */
    employerUnresolved: boolean;
    employmentType?: string;
    location?: string;
    dates?: DateRange;
    description?: string;
}

export interface EmployerGroup {
    employer: string;
    employerUnresolved: boolean;
    /** Most recent first. */
    roles: ExperienceEntry[];
}

export interface SkillEntry {
    name: string;
    endorsements?: number;
    category?: string;
}

export interface EducationEntry {
    institution: string;
    degree?: string;
    fieldOfStudy?: string;
    grade?: string;
    activities?: string;
    dates?: DateRange;
    description?: string;
}

export interface CertificationEntry {
    name: string;
    issuer?: string;
    issued?: DateRange;
    expires?: DateRange;
    credentialId?: string;
    url?: string;
}

export interface ProjectEntry {
    name: string;
    dates?: DateRange;
    associatedWith?: string;
    description?: string;
    url?: string;
}

export interface LanguageEntry {
    name: string;
    proficiency?: string;
}

export interface RecommendationEntry {
    author: string;
    relationship?: string;
    text?: string;
}

export interface VolunteerEntry {
    role: string;
    organization: string;
    cause?: string;
    dates?: DateRange;
    description?: string;
}

export interface HonorEntry {
    title: string;
    issuer?: string;
    dates?: DateRange;
    description?: string;
}

export interface PublicationEntry {
    title: string;
    publisher?: string;
    dates?: DateRange;
    url?: string;
    description?: string;
}

export type SectionName =
    | 'experience'
    | 'skills'
    | 'education'
    | 'certifications'
    | 'projects'
    | 'languages'
    | 'recommendations'
    | 'volunteering'
    | 'honors'
    | 'publications';

export const SECTION_NAMES: readonly SectionName[] = [
    'experience',
    'skills',
    'education',
    'certifications',
    'projects',
    'languages',
    'recommendations',
    'volunteering',
    'honors',
    'publications',
];

/**
 * Per-section progress:
 * NOT_STARTED -> NAVIGATED -> EXTRACTED -> NORMALIZED
 * NOT_STARTED -> FALLBACK_EXTRACTED -> NORMALIZED
 * NOT_STARTED -> SKIPPED
 */
export type SectionState =
    | 'NOT_STARTED'
    | 'NAVIGATED'
    | 'EXTRACTED'
    | 'FALLBACK_EXTRACTED'
    | 'NORMALIZED'
    | 'SKIPPED';

export interface ExtractionMetadata {
    profileUrl: string;
    extractedAt: string;
    sections: Partial<Record<SectionName, SectionState>>;
}

export interface ProfileRecord {
    name: string;
    headline?: string;
    location?: string;
    contact: ContactInfo;
    summary?: string;
    experience: EmployerGroup[];
    skills: SkillEntry[];
    education: EducationEntry[];
    certifications: CertificationEntry[];
    projects: ProjectEntry[];
    languages: LanguageEntry[];
    recommendations: RecommendationEntry[];
    volunteering: VolunteerEntry[];
    honors: HonorEntry[];
    publications: PublicationEntry[];
    extraction: ExtractionMetadata;
    /** Present once a redaction policy has been applied. */
    redaction?: { level: PrivacyLevel };
}

/**
 * Creates an empty record for the given identity.
 */
export function createProfileRecord(name: string, profileUrl: string, extractedAt: Date = new Date()): ProfileRecord {
    if (!name || name.trim().length === 0) {
        throw new Error('ProfileRecord name cannot be empty');
    }
    return {
        name: name.trim(),
        contact: {},
        experience: [],
        skills: [],
        education: [],
        certifications: [],
        projects: [],
        languages: [],
        recommendations: [],
        volunteering: [],
        honors: [],
        publications: [],
        extraction: {
            profileUrl,
            extractedAt: extractedAt.toISOString(),
            sections: {},
        },
    };
}

/**
 * Flattens employer groups back into a list of entries, group by group.
 */
export function flattenExperience(groups: readonly EmployerGroup[]): ExperienceEntry[] {
    return groups.flatMap(group => group.roles);
}
