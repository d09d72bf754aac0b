import { DateRange, ProfileRecord, SkillEntry } from '../../domain/entities/ProfileRecord';
import { formatDateRange } from '../../domain/services/DateRangeParser';
import { OTHER_CATEGORY } from '../../domain/services/SkillClassifier';

/**
 * Format-independent shape of a resume. Markdown and HTML renderers walk
 * the same layout so both show the same sections in the same order.
 */
export interface LayoutItem {
    text: string;
    emphasize: boolean;
    details: string[];
    notes: string[];
}

export interface LayoutGroup {
    heading: string;
    items: LayoutItem[];
}

export interface LayoutSection {
    heading: string;
    paragraphs: string[];
    groups: LayoutGroup[];
    items: LayoutItem[];
}

export interface ResumeLayout {
    name: string;
    headline?: string;
    contact: string[];
    sections: LayoutSection[];
}

function item(text: string, details: Array<string | undefined>, notes: Array<string | undefined> = [], emphasize = true): LayoutItem {
    return {
        text,
        emphasize,
        details: details.filter((d): d is string => !!d),
        notes: notes.filter((n): n is string => !!n).flatMap(n => n.split('\n')).map(n => n.trim()).filter(Boolean),
    };
}

function section(heading: string, parts: Partial<Omit<LayoutSection, 'heading'>>): LayoutSection {
    return { heading, paragraphs: parts.paragraphs ?? [], groups: parts.groups ?? [], items: parts.items ?? [] };
}

function dates(range: DateRange | undefined, openEndedAsPresent = false): string | undefined {
    return range ? formatDateRange(range, { openEndedAsPresent }) || undefined : undefined;
}

function prefixed(prefix: string, value: string | undefined): string | undefined {
    return value ? `${prefix} ${value}` : undefined;
}

function skillText(skill: SkillEntry): string {
    if (skill.endorsements === undefined) return skill.name;
    return `${skill.name} (${skill.endorsements} endorsement${skill.endorsements === 1 ? '' : 's'})`;
}

/**
 * Categories in first-seen order, uncategorized skills last.
 */
export function groupSkills(skills: readonly SkillEntry[]): LayoutGroup[] {
    const groups = new Map<string, LayoutItem[]>();
    for (const skill of skills) {
        const category = skill.category ?? OTHER_CATEGORY;
        const items = groups.get(category) ?? [];
        items.push(item(skillText(skill), [], [], false));
        groups.set(category, items);
    }
    const ordered = Array.from(groups.entries()).filter(([category]) => category !== OTHER_CATEGORY);
    const other = groups.get(OTHER_CATEGORY);
    if (other) ordered.push([OTHER_CATEGORY, other]);
    return ordered.map(([heading, items]) => ({ heading, items }));
}

/**
 * Builds the layout. Sections with no entries are left out entirely.
 */
export function buildResumeLayout(record: ProfileRecord): ResumeLayout {
    const { contact } = record;
    const sections: LayoutSection[] = [];

    if (record.summary) {
        sections.push(section('Summary', { paragraphs: record.summary.split(/\n+/).map(p => p.trim()).filter(Boolean) }));
    }
    if (record.skills.length > 0) {
        sections.push(section('Skills', { groups: groupSkills(record.skills) }));
    }
    if (record.experience.length > 0) {
        sections.push(section('Experience', {
            groups: record.experience.map(group => ({
                heading: group.employerUnresolved ? `${group.employer} (employer unresolved)` : group.employer,
                items: group.roles.map(role => item(
                    role.title,
                    [dates(role.dates, true), role.employmentType, role.location],
                    [role.description]
                )),
            })),
        }));
    }
    if (record.education.length > 0) {
        sections.push(section('Education', {
            items: record.education.map(entry => item(
                entry.institution,
                [[entry.degree, entry.fieldOfStudy].filter(Boolean).join(', '), dates(entry.dates)],
                [prefixed('Grade:', entry.grade), prefixed('Activities:', entry.activities), entry.description]
            )),
        }));
    }
    if (record.certifications.length > 0) {
        sections.push(section('Certifications', {
            items: record.certifications.map(entry => item(
                entry.name,
                [
                    entry.issuer,
                    prefixed('Issued', dates(entry.issued)),
                    prefixed('Expires', dates(entry.expires)),
                    prefixed('Credential ID', entry.credentialId),
                ],
                [entry.url]
            )),
        }));
    }
    if (record.projects.length > 0) {
        sections.push(section('Projects', {
            items: record.projects.map(entry => item(
                entry.name,
                [dates(entry.dates), prefixed('Associated with', entry.associatedWith)],
                [entry.description, entry.url]
            )),
        }));
    }
    if (record.languages.length > 0) {
        sections.push(section('Languages', {
            items: record.languages.map(entry => item(entry.name, [entry.proficiency])),
        }));
    }
    if (record.recommendations.length > 0) {
        sections.push(section('Recommendations', {
            items: record.recommendations.map(entry => item(entry.author, [entry.relationship], [entry.text])),
        }));
    }
    if (record.volunteering.length > 0) {
        sections.push(section('Volunteering', {
            items: record.volunteering.map(entry => item(
                entry.role,
                [entry.organization, dates(entry.dates, true), entry.cause],
                [entry.description]
            )),
        }));
    }
    if (record.honors.length > 0) {
        sections.push(section('Honors & Awards', {
            items: record.honors.map(entry => item(entry.title, [entry.issuer, dates(entry.dates)], [entry.description])),
        }));
    }
    if (record.publications.length > 0) {
        sections.push(section('Publications', {
            items: record.publications.map(entry => item(
                entry.title,
                [entry.publisher, dates(entry.dates)],
                [entry.description, entry.url]
            )),
        }));
    }

    const layout: ResumeLayout = {
        name: record.name,
        contact: [record.location, contact.email, contact.phone, contact.profileUrl, contact.website, contact.address]
            .filter((part): part is string => !!part),
        sections,
    };
    if (record.headline) layout.headline = record.headline;
    return layout;
}
