import { PageDocument } from '../domain/entities/PageDocument';
import {
    ContactInfo,
    createProfileRecord,
    ProfileRecord,
    SECTION_NAMES,
    SectionName,
    SectionState,
} from '../domain/entities/ProfileRecord';
import {
    AuthenticationError,
    ExtractionError,
    NavigationError,
    ProfileIdentityError,
    RunCancelledError,
} from '../domain/errors/ProfileToolError';
import { IProfileSession } from '../domain/ports/IProfileSession';
import { FieldExtractor, RawItem } from '../domain/services/FieldExtractor';
import { NormalizationWarning, SectionNormalizer } from '../domain/services/SectionNormalizer';
import { CONTACT_OVERLAY, CONTACT_OVERLAY_PATH, SECTION_SELECTORS, TOP_CARD } from '../domain/services/SelectorCatalog';
import { StepTimeoutError, withRetry, withTimeout } from '../infrastructure/RetryUtils';

export interface AssemblerOptions {
    /** Overview page of the profile, with a trailing slash. */
    profileUrl: string;
    stepTimeoutMs: number;
    /** Extra attempts for transient navigation failures. */
    navigationRetries: number;
    retryBackoffMs?: number;
    sections?: readonly SectionName[];
    now?: () => Date;
}

export interface AssemblyResult {
    record: ProfileRecord;
    warnings: NormalizationWarning[];
}

/**
 * Builds one ProfileRecord from an authenticated session.
 *
 * Sections are visited one after another (the session is not reentrant).
 * Each section tries its detail view first and falls back to the overview
 * page; a section that yields nothing is SKIPPED and the run goes on.
 * Only a missing profile name or an unreachable overview page is fatal.
 */
export class ProfileAssembler {
    private readonly extractor: FieldExtractor;
    private readonly normalizer: SectionNormalizer;

    constructor(
        private readonly session: IProfileSession,
        private readonly options: AssemblerOptions,
        extractor?: FieldExtractor,
        normalizer?: SectionNormalizer
    ) {
        this.extractor = extractor ?? new FieldExtractor();
        this.normalizer = normalizer ?? new SectionNormalizer();
    }

    async assemble(signal?: AbortSignal): Promise<AssemblyResult> {
        const { profileUrl } = this.options;
        console.log(`[ProfileAssembler] Loading profile overview`);

        const overview = await this.loadOverview(signal);
        const record = this.readIdentity(overview);
        const warnings: NormalizationWarning[] = [];

        record.contact = await this.readContact(overview, signal);

        for (const section of this.options.sections ?? SECTION_NAMES) {
            throwIfAborted(signal);
            const state = await this.processSection(section, overview, record, warnings, signal);
            record.extraction.sections[section] = state;
        }

        for (const warning of warnings) {
            console.warn(`[ProfileAssembler] Dropped ${warning.section} entry #${warning.index}: ${warning.reason}`);
        }

        const skipped = SECTION_NAMES.filter(s => record.extraction.sections[s] === 'SKIPPED');
        console.log(`[ProfileAssembler] Assembled profile from ${profileUrl} (${skipped.length} section(s) skipped)`);
        return { record, warnings };
    }

    private async loadOverview(signal?: AbortSignal): Promise<PageDocument> {
        const { profileUrl } = this.options;
        try {
            return await this.navigate(profileUrl, 'profile overview', signal);
        } catch (error) {
            if (error instanceof StepTimeoutError) {
                throw new NavigationError(`Profile page did not load within ${error.timeoutMs}ms`, profileUrl);
            }
            throw error;
        }
    }

    private readIdentity(overview: PageDocument): ProfileRecord {
        const { profileUrl } = this.options;
        let name: string | undefined;
        try {
            name = this.extractor.extract(overview, TOP_CARD.name)[0];
        } catch (error) {
            if (error instanceof ExtractionError) {
                throw new ProfileIdentityError(`Profile name could not be read: ${error.message}`, profileUrl);
            }
            throw error;
        }
        if (!name) {
            throw new ProfileIdentityError('Profile name not found with any selector strategy', profileUrl);
        }

        const record = createProfileRecord(name, profileUrl, this.options.now?.() ?? new Date());
        const headline = this.extractor.extract(overview, TOP_CARD.headline)[0];
        const location = this.extractor.extract(overview, TOP_CARD.location)[0];
        const summary = this.extractor.extract(overview, TOP_CARD.summary).join('\n');
        if (headline) record.headline = headline;
        if (location) record.location = location;
        if (summary) record.summary = summary;
        return record;
    }

    /**
     * Reads the contact overlay when the session can open it, otherwise
     * whatever contact links the overview carries. Never fatal.
     */
    private async readContact(overview: PageDocument, signal?: AbortSignal): Promise<ContactInfo> {
        let source = overview;
        if (this.session.supportsDetailViews) {
            try {
                source = await this.navigate(`${this.options.profileUrl}${CONTACT_OVERLAY_PATH}/`, 'contact info', signal);
            } catch (error) {
                rethrowFatal(error);
                console.warn(`[ProfileAssembler] Contact overlay unavailable: ${describe(error)}`);
            }
        }

        const contact: ContactInfo = {};
        try {
            const email = this.extractor.extract(source, CONTACT_OVERLAY.email).find(v => v.includes('@'));
            const phone = this.extractor.extract(source, CONTACT_OVERLAY.phone)[0];
            const profileUrl = this.extractor.extract(source, CONTACT_OVERLAY.profileUrl)[0];
            const website = this.extractor.extract(source, CONTACT_OVERLAY.website)[0];
            const address = this.extractor.extract(source, CONTACT_OVERLAY.address)[0];
            if (email) contact.email = email.replace(/^mailto:/i, '').split('?')[0];
            if (phone) contact.phone = phone;
            if (profileUrl) contact.profileUrl = absoluteUrl(profileUrl, this.options.profileUrl);
            if (website) contact.website = website;
            if (address) contact.address = address;
        } catch (error) {
            rethrowFatal(error);
            console.warn(`[ProfileAssembler] Contact info could not be read: ${describe(error)}`);
        }
        contact.profileUrl = contact.profileUrl ?? this.options.profileUrl;
        return contact;
    }

    private async processSection(
        section: SectionName,
        overview: PageDocument,
        record: ProfileRecord,
        warnings: NormalizationWarning[],
        signal?: AbortSignal
    ): Promise<SectionState> {
        const selectors = SECTION_SELECTORS[section];
        let state: SectionState = 'NOT_STARTED';
        let items: RawItem[] | null = null;

        if (this.session.supportsDetailViews) {
            const url = `${this.options.profileUrl}details/${selectors.detailPath}/`;
            try {
                const detail = await this.navigate(url, `${section} detail view`, signal);
                state = 'NAVIGATED';
                const result = this.extractor.extractItems(detail, selectors.detail);
                if (result.found) {
                    items = result.items;
                    state = 'EXTRACTED';
                }
            } catch (error) {
                rethrowFatal(error);
                console.warn(`[ProfileAssembler] ${section} detail view failed: ${describe(error)}`);
            }
        }

        if (!items) {
            try {
                const result = this.extractor.extractItems(overview, selectors.overview);
                if (result.found) {
                    items = result.items;
                    state = 'FALLBACK_EXTRACTED';
                }
            } catch (error) {
                rethrowFatal(error);
                console.warn(`[ProfileAssembler] ${section} overview fallback failed: ${describe(error)}`);
            }
        }

        if (!items) {
            console.log(`[ProfileAssembler] ${section}: no data, skipped`);
            return 'SKIPPED';
        }

        const count = this.normalizeInto(section, items, record, warnings);
        console.log(`[ProfileAssembler] ${section}: ${count} entries (${state === 'EXTRACTED' ? 'detail view' : 'overview'})`);
        return 'NORMALIZED';
    }

    private normalizeInto(
        section: SectionName,
        items: RawItem[],
        record: ProfileRecord,
        warnings: NormalizationWarning[]
    ): number {
        const n = this.normalizer;
        switch (section) {
            case 'experience': {
                const result = n.normalizeExperience(items);
                record.experience = result.entries;
                warnings.push(...result.warnings);
                return result.entries.reduce((total, group) => total + group.roles.length, 0);
            }
            case 'skills': {
                const result = n.normalizeSkills(items);
                record.skills = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'education': {
                const result = n.normalizeEducation(items);
                record.education = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'certifications': {
                const result = n.normalizeCertifications(items);
                record.certifications = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'projects': {
                const result = n.normalizeProjects(items);
                record.projects = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'languages': {
                const result = n.normalizeLanguages(items);
                record.languages = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'recommendations': {
                const result = n.normalizeRecommendations(items);
                record.recommendations = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'volunteering': {
                const result = n.normalizeVolunteering(items);
                record.volunteering = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'honors': {
                const result = n.normalizeHonors(items);
                record.honors = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
            case 'publications': {
                const result = n.normalizePublications(items);
                record.publications = result.entries;
                warnings.push(...result.warnings);
                return result.entries.length;
            }
        }
    }

    private navigate(url: string, label: string, signal?: AbortSignal): Promise<PageDocument> {
        return withRetry(
            () => this.navigateOnce(url, label, signal),
            {
                maxAttempts: this.options.navigationRetries + 1,
                initialBackoffMs: this.options.retryBackoffMs ?? 1000,
                isRetryable: error => error instanceof NavigationError && error.transient,
                onRetry: (attempt, error) => console.warn(`[ProfileAssembler] Retrying ${label} (attempt ${attempt}): ${describe(error)}`),
                signal,
            }
        );
    }

    /**
     * One bounded navigation. A navigation given up on (timeout or cancel)
     * is aborted and awaited before returning, so two never overlap on the
     * session.
     */
    private async navigateOnce(url: string, label: string, signal?: AbortSignal): Promise<PageDocument> {
        const step = new AbortController();
        const abortStep = () => step.abort();
        signal?.addEventListener('abort', abortStep, { once: true });

        const pending = this.session.navigate(url, step.signal);
        try {
            return await withTimeout(pending, this.options.stepTimeoutMs, label, signal);
        } catch (error) {
            if (error instanceof StepTimeoutError || error instanceof RunCancelledError) {
                step.abort();
                await pending.then(
                    () => console.warn(`[ProfileAssembler] Abandoned ${label} finished after ${describe(error)}`),
                    settled => console.warn(`[ProfileAssembler] Abandoned ${label} ended: ${describe(settled)}`)
                );
            }
            throw error;
        } finally {
            signal?.removeEventListener('abort', abortStep);
        }
    }
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new RunCancelledError('Profile assembly cancelled');
    }
}

/**
 * Cancellation and authentication failures end the run; everything else
 * is contained at section level.
 */
function rethrowFatal(error: unknown): void {
    if (error instanceof RunCancelledError || error instanceof AuthenticationError) {
        throw error;
    }
}

function absoluteUrl(href: string, base: string): string {
    try {
        return new URL(href, base).toString();
    } catch {
        return href;
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
