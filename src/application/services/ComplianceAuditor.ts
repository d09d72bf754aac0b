import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    ComplianceFinding,
    ComplianceReport,
    createComplianceReport,
    Remediation,
    Severity,
} from '../../domain/entities/ComplianceReport';
import { FilesystemState, hasRetentionElapsed } from '../../domain/entities/FilesystemState';
import { flattenExperience, ProfileRecord } from '../../domain/entities/ProfileRecord';
import { DEFAULT_SENSITIVE_PATTERNS } from '../../domain/entities/RedactionPolicy';
import { ComplianceViolation } from '../../domain/errors/ProfileToolError';
import { isPathIgnored } from '../../domain/services/IgnorePatternMatcher';
import {
    compile,
    containsNationalId,
    containsPaymentCard,
    findContactIdentifiers,
} from '../../domain/services/SensitivePatterns';

export const RECOMMENDED_MAX_RETENTION_HOURS = 24;

export interface RuleViolation {
    message: string;
    path?: string;
}

/**
 * One independent audit rule. Findings appear in rule registration order.
 *
 * `record` is the record published as output (already redacted), or null
 * when no output record is being audited. Raw data is never passed here;
 * the retention rules cover it through the filesystem state.
 */
export interface AuditRule {
    id: string;
    /** Prefix for finding ids, e.g. RAW -> RAW-001. */
    code: string;
    severity: Severity;
    autoFixable: boolean;
    check(record: ProfileRecord | null, state: FilesystemState): RuleViolation[];
}

export interface RemovalResult {
    deleted: string[];
    errors: string[];
    /** Set when a deletion certificate was persisted for this removal. */
    certificateId?: string;
}

/**
 * Deletes raw data files on behalf of fix mode.
 */
export interface RawDataRemover {
    deleteFiles(paths: string[]): Promise<RemovalResult>;
}

function sameDirectory(a: string, b: string): boolean {
    return path.resolve(a) === path.resolve(b);
}

export const RAW_DATA_PAST_RETENTION: AuditRule = {
    id: 'raw-data-past-retention',
    code: 'RAW',
    severity: 'critical',
    autoFixable: true,
    check: (_record, state) => state.rawDataFiles
        .filter(file => hasRetentionElapsed(file.modifiedAt, state.retentionHours, state.now))
        .map(file => ({
            message: `Raw data file is still present past the ${state.retentionHours}h retention window`,
            path: file.path,
        })),
};

export const REDACTION_NOT_APPLIED: AuditRule = {
    id: 'redaction-not-applied',
    code: 'RED',
    severity: 'high',
    autoFixable: false,
    check: (record, state) => {
        const violations: RuleViolation[] = state.outputs
            .filter(output => !output.redactionLevel)
            .map(output => ({
                message: 'Output document was persisted without a redaction policy applied',
                path: path.join(state.outputDir, output.file),
            }));
        if (record && !record.redaction && state.outputs.length > 0 && violations.length === 0) {
            violations.push({ message: 'Published record carries no redaction marker but output documents exist' });
        }
        return violations;
    },
};

export const OUTPUT_ALONGSIDE_RAW_DATA: AuditRule = {
    id: 'output-alongside-raw-data',
    code: 'LOC',
    severity: 'high',
    autoFixable: false,
    check: (_record, state) => {
        const rawPaths = new Set([state.rawDataPath, ...state.rawDataFiles.map(file => file.path)]);
        return Array.from(rawPaths)
            .filter(rawPath => sameDirectory(path.dirname(rawPath), state.outputDir))
            .filter(rawPath => state.outputs.length > 0 || state.rawDataFiles.some(file => file.path === rawPath))
            .map(rawPath => ({
                message: `Raw data location shares the output directory ${state.outputDir}`,
                path: rawPath,
            }));
    },
};

export const RAW_DATA_NOT_IGNORED: AuditRule = {
    id: 'raw-data-not-ignored',
    code: 'VCS',
    severity: 'medium',
    autoFixable: false,
    check: (_record, state) => {
        if (!state.ignoreFile) {
            return [{ message: 'No version-control ignore file found; raw data could be committed' }];
        }
        const root = path.dirname(state.ignoreFile.path);
        const candidates = new Set([state.rawDataPath, ...state.rawDataFiles.map(file => file.path)]);
        const violations: RuleViolation[] = [];
        for (const candidate of candidates) {
            const relative = path.relative(root, path.resolve(candidate)).split(path.sep).join('/');
            if (relative.startsWith('..') || path.isAbsolute(relative)) continue;
            if (!isPathIgnored(relative, state.ignoreFile.content)) {
                violations.push({ message: `Ignore file has no pattern excluding ${relative}`, path: candidate });
            }
        }
        return violations;
    },
};

export const RETENTION_ABOVE_RECOMMENDED: AuditRule = {
    id: 'retention-above-recommended',
    code: 'RET',
    severity: 'low',
    autoFixable: false,
    check: (_record, state) => state.retentionHours > RECOMMENDED_MAX_RETENTION_HOURS
        ? [{ message: `Retention of ${state.retentionHours}h exceeds the recommended ${RECOMMENDED_MAX_RETENTION_HOURS}h` }]
        : [],
};

export const SENSITIVE_NUMBER_IN_RECORD: AuditRule = {
    id: 'sensitive-number-in-record',
    code: 'PII',
    severity: 'critical',
    autoFixable: false,
    check: record => {
        if (!record) return [];
        const texts = recordFreeText(record);
        const violations: RuleViolation[] = [];
        if (texts.some(containsNationalId)) {
            violations.push({ message: 'Record text contains a national identification number pattern' });
        }
        if (texts.some(containsPaymentCard)) {
            violations.push({ message: 'Record text contains a payment card number' });
        }
        return violations;
    },
};

export const CONTACT_IDENTIFIER_EXPOSED: AuditRule = {
    id: 'contact-identifier-exposed',
    code: 'CON',
    severity: 'high',
    autoFixable: false,
    check: record => {
        if (!record) return [];
        const { email, phone } = record.contact;
        const violations: RuleViolation[] = [];
        if (email && findContactIdentifiers(email).length > 0) {
            violations.push({ message: 'Contact email is published unmasked; render at the normal or strict privacy level' });
        }
        if (phone && findContactIdentifiers(phone).length > 0) {
            violations.push({ message: 'Contact phone number is published unmasked; render at the normal or strict privacy level' });
        }
        return violations;
    },
};

const STREET_KEYWORD = /\b(?:st|street|ave|avenue|rd|road|blvd|boulevard|ln|lane|dr|drive)\b/i;

export function looksLikeStreetAddress(value: string): boolean {
    return /\d/.test(value) && STREET_KEYWORD.test(value);
}

export const STREET_ADDRESS_IN_LOCATION: AuditRule = {
    id: 'street-address-in-location',
    code: 'ADR',
    severity: 'medium',
    autoFixable: false,
    check: record => {
        if (!record) return [];
        const fields: Array<[string, string | undefined]> = [
            ['location', record.location],
            ['contact address', record.contact.address],
        ];
        return fields
            .filter(([, value]) => value !== undefined && looksLikeStreetAddress(value))
            .map(([field]) => ({ message: `Published ${field} looks like a full street address; keep only city and country` }));
    },
};

/**
 * Flags output text that still matches a sensitive keyword pattern, e.g.
 * narrative kept under the normal or minimal level.
 */
export function createSensitiveKeywordRule(patterns: readonly string[] = DEFAULT_SENSITIVE_PATTERNS): AuditRule {
    const compiled = patterns.map(source => compile(source, 'i'));
    return {
        id: 'sensitive-keyword-in-text',
        code: 'KEY',
        severity: 'medium',
        autoFixable: false,
        check: record => {
            if (!record) return [];
            const texts = [...recordFreeText(record), ...record.skills.map(skill => skill.name)];
            return compiled
                .filter(pattern => texts.some(text => pattern.test(text)))
                .map(pattern => ({ message: `Published text matches the sensitive keyword pattern ${pattern.source}` }));
        },
    };
}

const INTERNAL_REFERENCE = /\b(?:internal|intranet|vpn|admin|root|localhost)\b/i;
const RIGHTS_NOTICE = /©|\(c\)|\bcopyright\b|\btrademark\b|™|®/i;

export const INTERNAL_REFERENCE_OR_NOTICE: AuditRule = {
    id: 'internal-reference-or-notice',
    code: 'REF',
    severity: 'low',
    autoFixable: false,
    check: record => {
        if (!record) return [];
        const texts = recordFreeText(record);
        const violations: RuleViolation[] = [];
        if (texts.some(text => INTERNAL_REFERENCE.test(text))) {
            violations.push({ message: 'Published text references internal systems or infrastructure' });
        }
        if (texts.some(text => RIGHTS_NOTICE.test(text))) {
            violations.push({ message: 'Published text carries copyright or trademark notices' });
        }
        return violations;
    },
};

/**
 * The rule set in registration order. Custom keyword patterns replace the
 * defaults for the sensitive keyword rule only.
 */
export function createDefaultRules(sensitivePatterns?: readonly string[]): readonly AuditRule[] {
    return [
        RAW_DATA_PAST_RETENTION,
        REDACTION_NOT_APPLIED,
        OUTPUT_ALONGSIDE_RAW_DATA,
        RAW_DATA_NOT_IGNORED,
        RETENTION_ABOVE_RECOMMENDED,
        SENSITIVE_NUMBER_IN_RECORD,
        CONTACT_IDENTIFIER_EXPOSED,
        STREET_ADDRESS_IN_LOCATION,
        createSensitiveKeywordRule(sensitivePatterns),
        INTERNAL_REFERENCE_OR_NOTICE,
    ];
}

export const DEFAULT_RULES: readonly AuditRule[] = createDefaultRules();

function recordFreeText(record: ProfileRecord): string[] {
    const texts: Array<string | undefined> = [
        record.headline,
        record.summary,
        ...flattenExperience(record.experience).flatMap(role => [role.title, role.description]),
        ...record.education.flatMap(entry => [entry.description, entry.activities]),
        ...record.projects.map(entry => entry.description),
        ...record.recommendations.map(entry => entry.text),
        ...record.volunteering.map(entry => entry.description),
        ...record.honors.map(entry => entry.description),
        ...record.publications.map(entry => entry.description),
    ];
    return texts.filter((text): text is string => typeof text === 'string');
}

export interface ComplianceAuditorOptions {
    minimumSeverity: Severity;
    rules?: readonly AuditRule[];
    /** Keyword patterns for the default rule set; ignored when `rules` is given. */
    sensitivePatterns?: readonly string[];
    idFactory?: () => string;
}

/**
 * Runs the rule set against the published record (optional) and a
 * filesystem snapshot.
 */
export class ComplianceAuditor {
    private readonly rules: readonly AuditRule[];
    private readonly minimumSeverity: Severity;
    private readonly idFactory: () => string;

    constructor(options: ComplianceAuditorOptions) {
        this.rules = options.rules ?? createDefaultRules(options.sensitivePatterns);
        this.minimumSeverity = options.minimumSeverity;
        this.idFactory = options.idFactory ?? uuidv4;
    }

    /**
     * @param published the redacted record written as output, or null to
     * audit the filesystem alone
     */
    audit(published: ProfileRecord | null, state: FilesystemState, remediations: Remediation[] = []): ComplianceReport {
        const findings: Array<Omit<ComplianceFinding, 'blocking'>> = [];

        for (const rule of this.rules) {
            rule.check(published, state).forEach((violation, index) => {
                findings.push({
                    id: `${rule.code}-${String(index + 1).padStart(3, '0')}`,
                    ruleId: rule.id,
                    severity: rule.severity,
                    message: violation.message,
                    autoFixable: rule.autoFixable,
                    ...(violation.path ? { path: violation.path } : {}),
                });
            });
        }

        const report = createComplianceReport(this.idFactory(), findings, this.minimumSeverity, state.now, remediations);
        console.log(`[ComplianceAuditor] ${report.findings.length} finding(s), ${report.passed ? 'passed' : 'failed'} at minimum severity ${this.minimumSeverity}`);
        return report;
    }

    /**
     * Applies the auto-fixable findings (deleting stale raw data files) and
     * reports each change made.
     */
    async fix(report: ComplianceReport, remover: RawDataRemover): Promise<Remediation[]> {
        const remediations: Remediation[] = [];
        for (const finding of report.findings) {
            if (!finding.autoFixable || !finding.path) continue;

            const { deleted, errors, certificateId } = await remover.deleteFiles([finding.path]);
            const remediation: Remediation = {
                findingId: finding.id,
                action: 'deleted raw data file',
                path: finding.path,
                success: deleted.length > 0 && errors.length === 0,
            };
            if (errors.length > 0) remediation.error = errors.join('; ');
            if (certificateId) remediation.certificateId = certificateId;
            remediations.push(remediation);
            console.log(`[ComplianceAuditor] Fix ${finding.id}: ${remediation.success ? 'deleted' : 'could not delete'} ${finding.path}`);
        }
        return remediations;
    }

    /**
     * @throws ComplianceViolation when the report did not pass
     */
    enforce(report: ComplianceReport): void {
        if (!report.passed) {
            throw new ComplianceViolation(report);
        }
    }
}

export function formatReport(report: ComplianceReport, format: 'json' | 'text'): string {
    if (format === 'json') {
        return JSON.stringify(report, null, 2);
    }

    const lines = [
        `Compliance report ${report.id}`,
        `Audited at: ${report.auditedAt}`,
        `Minimum severity: ${report.minimumSeverity}`,
        `Result: ${report.passed ? 'PASSED' : 'FAILED'}`,
        '',
    ];
    if (report.findings.length === 0) {
        lines.push('No findings.');
    }
    for (const finding of report.findings) {
        const location = finding.path ? ` (${finding.path})` : '';
        const fixable = finding.autoFixable ? ' [auto-fixable]' : '';
        lines.push(`[${finding.severity.toUpperCase()}] ${finding.id} ${finding.ruleId}: ${finding.message}${location}${fixable}`);
    }
    if (report.remediations.length > 0) {
        lines.push('', 'Remediations:');
        for (const remediation of report.remediations) {
            const outcome = remediation.success ? 'done' : `failed: ${remediation.error ?? 'unknown error'}`;
            const certificate = remediation.certificateId ? ` (certificate ${remediation.certificateId})` : '';
            lines.push(`- ${remediation.findingId} ${remediation.action}${remediation.path ? ` ${remediation.path}` : ''}: ${outcome}${certificate}`);
        }
    }
    return lines.join('\n');
}
