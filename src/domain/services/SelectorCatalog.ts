import { SectionName } from '../entities/ProfileRecord';
import { FieldSpec, ListSpec } from './FieldExtractor';

/**
 * Selector strategies for the profile pages, primary first.
 * The `data-*` fallbacks match the saved-page format and older layouts.
 */

export const TOP_CARD: Readonly<Record<'name' | 'headline' | 'location' | 'summary', FieldSpec>> = {
    name: [
        { name: 'top-card-heading', selector: 'h1.text-heading-xlarge' },
        { name: 'left-panel-heading', selector: '.pv-text-details__left-panel h1' },
        { name: 'profile-header-name', selector: '.profile-header__name' },
        { name: 'data-field', selector: '[data-field="name"]' },
    ],
    headline: [
        { name: 'top-card-headline', selector: '.text-body-medium.break-words' },
        { name: 'left-panel-headline', selector: '.pv-text-details__left-panel .text-body-medium' },
        { name: 'profile-header-headline', selector: '.profile-header__headline' },
        { name: 'data-field', selector: '[data-field="headline"]' },
    ],
    location: [
        { name: 'top-card-location', selector: '.text-body-small.inline.t-black--light.break-words' },
        { name: 'left-panel-location', selector: '.pv-text-details__left-panel .text-body-small' },
        { name: 'profile-header-location', selector: '.profile-header__location' },
        { name: 'data-field', selector: '[data-field="location"]' },
    ],
    summary: [
        { name: 'about-section', selector: 'section:has(#about) .inline-show-more-text span[aria-hidden="true"]' },
        { name: 'about-text', selector: '.pv-about__text, .about-section__text' },
        { name: 'data-field', selector: '[data-field="summary"]' },
    ],
};

export const CONTACT_OVERLAY: Readonly<Record<'email' | 'phone' | 'profileUrl' | 'website' | 'address', FieldSpec>> = {
    email: [
        { name: 'mailto-link', selector: 'a[href^="mailto:"]', attribute: 'href' },
        { name: 'ci-email', selector: '.ci-email .pv-contact-info__contact-link' },
        { name: 'data-field', selector: '[data-field="email"]' },
    ],
    phone: [
        { name: 'ci-phone', selector: '.ci-phone li span.t-14' },
        { name: 'tel-link', selector: 'a[href^="tel:"]' },
        { name: 'data-field', selector: '[data-field="phone"]' },
    ],
    profileUrl: [
        { name: 'ci-vanity-url', selector: '.ci-vanity-url a', attribute: 'href' },
        { name: 'data-field', selector: '[data-field="profile-url"]' },
    ],
    website: [
        { name: 'ci-websites', selector: '.ci-websites a', attribute: 'href' },
        { name: 'data-field', selector: '[data-field="website"]' },
    ],
    address: [
        { name: 'ci-address', selector: '.ci-address a, .ci-address span.t-14' },
        { name: 'data-field', selector: '[data-field="address"]' },
    ],
};

/**
 * Every list entry shares one layout: a bold title, a subtitle line,
 * grey caption lines (dates, location, credential ids) and a description.
 */
const ENTRY_FIELDS: Readonly<Record<string, FieldSpec>> = {
    title: [
        { name: 'bold-title', selector: '.mr1.t-bold span[aria-hidden="true"]' },
        { name: 'bold-any', selector: '.t-bold span[aria-hidden="true"]' },
        { name: 'data-field', selector: '[data-field="title"]' },
    ],
    subtitle: [
        { name: 'normal-subtitle', selector: 'span.t-14.t-normal:not(.t-black--light) > span[aria-hidden="true"]' },
        { name: 'data-field', selector: '[data-field="subtitle"]' },
    ],
    captions: [
        { name: 'caption-wrapper', selector: '.pvs-entity__caption-wrapper[aria-hidden="true"]' },
        { name: 'light-captions', selector: 'span.t-14.t-normal.t-black--light > span[aria-hidden="true"]' },
        { name: 'data-field', selector: '[data-field="caption"]' },
    ],
    description: [
        { name: 'show-more-text', selector: '.pvs-entity__sub-components .inline-show-more-text span[aria-hidden="true"]' },
        { name: 'sub-components', selector: '.pvs-entity__sub-components span[aria-hidden="true"]' },
        { name: 'data-field', selector: '[data-field="description"]' },
    ],
    link: [
        { name: 'credential-link', selector: 'a[aria-label^="Show credential"], a[aria-label^="Show publication"], a[aria-label^="Show project"]', attribute: 'href' },
        { name: 'data-field', selector: 'a[data-field="link"]', attribute: 'href' },
    ],
};

const NESTED_ENTRIES: FieldSpec = [
    { name: 'sub-component-entries', selector: '.pvs-entity__sub-components li.pvs-list__paged-list-item' },
    { name: 'data-nested', selector: '[data-nested-item]' },
];

export interface SectionSelectors {
    section: SectionName;
    /** Path segment under `<profile>/details/`. */
    detailPath: string;
    detail: ListSpec;
    overview: ListSpec;
}

function sectionSelectors(section: SectionName, detailPath: string, anchor: string, nested = false): SectionSelectors {
    const base = { fields: ENTRY_FIELDS, nestedItems: nested ? NESTED_ENTRIES : undefined };
    return {
        section,
        detailPath,
        detail: {
            ...base,
            items: [
                { name: 'detail-paged-list', selector: 'main .pvs-list__container li.pvs-list__paged-list-item' },
                { name: 'detail-artdeco-list', selector: 'main li.artdeco-list__item' },
                { name: 'data-item', selector: '[data-section-item]' },
            ],
        },
        overview: {
            ...base,
            items: [
                { name: 'overview-anchor', selector: `section:has(#${anchor}) li.artdeco-list__item` },
                { name: 'data-section', selector: `section[data-section="${section}"] [data-section-item]` },
            ],
        },
    };
}

export const SECTION_SELECTORS: Readonly<Record<SectionName, SectionSelectors>> = {
    experience: sectionSelectors('experience', 'experience', 'experience', true),
    skills: sectionSelectors('skills', 'skills', 'skills'),
    education: sectionSelectors('education', 'education', 'education'),
    certifications: sectionSelectors('certifications', 'certifications', 'licenses_and_certifications'),
    projects: sectionSelectors('projects', 'projects', 'projects'),
    languages: sectionSelectors('languages', 'languages', 'languages'),
    recommendations: sectionSelectors('recommendations', 'recommendations', 'recommendations'),
    volunteering: sectionSelectors('volunteering', 'volunteering-experiences', 'volunteering_experience'),
    honors: sectionSelectors('honors', 'honors', 'honors_and_awards'),
    publications: sectionSelectors('publications', 'publications', 'publications'),
};

export const CONTACT_OVERLAY_PATH = 'overlay/contact-info';
