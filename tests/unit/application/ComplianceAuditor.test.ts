/**
 * Unit tests for ComplianceAuditor
 */
import {
    ComplianceAuditor,
    DEFAULT_RULES,
    formatReport,
    looksLikeStreetAddress,
    RawDataRemover,
} from '../../../src/application/services/ComplianceAuditor';
import { PrivacyRedactor } from '../../../src/application/services/PrivacyRedactor';
import { createComplianceReport } from '../../../src/domain/entities/ComplianceReport';
import { FilesystemState } from '../../../src/domain/entities/FilesystemState';
import { PrivacyLevel, ProfileRecord } from '../../../src/domain/entities/ProfileRecord';
import { createRedactionPolicy } from '../../../src/domain/entities/RedactionPolicy';
import { ComplianceViolation } from '../../../src/domain/errors/ProfileToolError';
import { sampleRecord } from '../../helpers/sampleRecord';

const NOW = new Date('2026-01-15T10:00:00.000Z');
const HOURS_AGO = (hours: number) => new Date(NOW.getTime() - hours * 60 * 60 * 1000);

function redactedRecord(level: PrivacyLevel = 'strict'): ProfileRecord {
    return new PrivacyRedactor().redact(sampleRecord(), createRedactionPolicy(level));
}

function cleanState(overrides: Partial<FilesystemState> = {}): FilesystemState {
    return {
        now: NOW,
        retentionHours: 24,
        rawDataPath: '/work/data/profile_raw.json',
        rawDataFiles: [],
        outputDir: '/work/output',
        outputs: [{ file: 'resume.md', format: 'markdown', redactionLevel: 'normal', renderedAt: NOW.toISOString() }],
        ignoreFile: { path: '/work/.gitignore', content: 'node_modules/\ndata/\n' },
        ...overrides,
    };
}

describe('ComplianceAuditor', () => {
    let auditor: ComplianceAuditor;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        auditor = new ComplianceAuditor({ minimumSeverity: 'medium', idFactory: () => 'report-1' });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should register the rules in a fixed order', () => {
        expect(DEFAULT_RULES.map(rule => rule.id)).toEqual([
            'raw-data-past-retention',
            'redaction-not-applied',
            'output-alongside-raw-data',
            'raw-data-not-ignored',
            'retention-above-recommended',
            'sensitive-number-in-record',
            'contact-identifier-exposed',
            'street-address-in-location',
            'sensitive-keyword-in-text',
            'internal-reference-or-notice',
        ]);
    });

    it('should pass a clean workspace', () => {
        const report = auditor.audit(redactedRecord(), cleanState());

        expect(report.id).toBe('report-1');
        expect(report.findings).toEqual([]);
        expect(report.passed).toBe(true);
        expect(report.auditedAt).toBe('2026-01-15T10:00:00.000Z');
    });

    it('should report stale raw data and unredacted output', () => {
        const report = auditor.audit(null, cleanState({
            rawDataFiles: [{ path: '/work/data/profile_raw.json', modifiedAt: HOURS_AGO(48) }],
            outputs: [{ file: 'resume.md', format: 'markdown', renderedAt: NOW.toISOString() }],
        }));

        expect(report.findings).toEqual([
            {
                id: 'RAW-001',
                ruleId: 'raw-data-past-retention',
                severity: 'critical',
                message: 'Raw data file is still present past the 24h retention window',
                autoFixable: true,
                blocking: true,
                path: '/work/data/profile_raw.json',
            },
            {
                id: 'RED-001',
                ruleId: 'redaction-not-applied',
                severity: 'high',
                message: 'Output document was persisted without a redaction policy applied',
                autoFixable: false,
                blocking: true,
                path: '/work/output/resume.md',
            },
        ]);
        expect(report.passed).toBe(false);
    });

    it('should not flag raw data still inside its retention window', () => {
        const report = auditor.audit(null, cleanState({
            rawDataFiles: [{ path: '/work/data/profile_raw.json', modifiedAt: HOURS_AGO(2) }],
        }));

        expect(report.findings).toEqual([]);
    });

    it('should keep findings below the threshold non-blocking', () => {
        const report = auditor.audit(null, cleanState({ retentionHours: 48 }));

        expect(report.findings.map(f => [f.id, f.blocking])).toEqual([['RET-001', false]]);
        expect(report.passed).toBe(true);
    });

    it('should flag a missing ignore file', () => {
        const report = auditor.audit(null, cleanState({ ignoreFile: undefined }));

        expect(report.findings.map(f => f.id)).toEqual(['VCS-001']);
        expect(report.findings[0].message).toBe('No version-control ignore file found; raw data could be committed');
    });

    it('should flag a raw data path the ignore file does not cover', () => {
        const report = auditor.audit(null, cleanState({ ignoreFile: { path: '/work/.gitignore', content: 'node_modules/\n' } }));

        expect(report.findings).toEqual([expect.objectContaining({
            id: 'VCS-001',
            severity: 'medium',
            message: 'Ignore file has no pattern excluding data/profile_raw.json',
            path: '/work/data/profile_raw.json',
        })]);
    });

    it('should flag raw data stored in the output directory', () => {
        const report = auditor.audit(null, cleanState({
            rawDataPath: '/work/output/profile_raw.json',
            ignoreFile: { path: '/work/.gitignore', content: 'output/\n' },
        }));

        expect(report.findings.map(f => f.id)).toEqual(['LOC-001']);
    });

    it('should flag national id and payment card numbers in record text', () => {
        const record = redactedRecord();
        record.summary = 'SSN 123-45-6789, card 4111 1111 1111 1111';

        const report = auditor.audit(record, cleanState());

        expect(report.findings.map(f => [f.id, f.severity])).toEqual([['PII-001', 'critical'], ['PII-002', 'critical']]);
    });

    it('should flag a published record without a redaction marker when outputs exist', () => {
        const record = redactedRecord();
        delete record.redaction;

        const report = auditor.audit(record, cleanState());

        expect(report.findings).toEqual([{
            id: 'RED-001',
            ruleId: 'redaction-not-applied',
            severity: 'high',
            message: 'Published record carries no redaction marker but output documents exist',
            autoFixable: false,
            blocking: true,
        }]);
        expect(auditor.audit(record, cleanState({ outputs: [] })).findings).toEqual([]);
    });

    it('should flag contact details published unmasked', () => {
        const report = auditor.audit(redactedRecord('minimal'), cleanState());

        expect(report.findings.filter(f => f.ruleId === 'contact-identifier-exposed')).toEqual([
            {
                id: 'CON-001',
                ruleId: 'contact-identifier-exposed',
                severity: 'high',
                message: 'Contact email is published unmasked; render at the normal or strict privacy level',
                autoFixable: false,
                blocking: true,
            },
            {
                id: 'CON-002',
                ruleId: 'contact-identifier-exposed',
                severity: 'high',
                message: 'Contact phone number is published unmasked; render at the normal or strict privacy level',
                autoFixable: false,
                blocking: true,
            },
        ]);
    });

    it('should accept masked contact details', () => {
        const report = auditor.audit(redactedRecord('normal'), cleanState());

        expect(report.findings.map(f => f.ruleId)).not.toContain('contact-identifier-exposed');
    });

    it('should flag a full street address', () => {
        const record = redactedRecord();
        record.location = '221 Baker Street, London';

        const report = auditor.audit(record, cleanState());

        expect(report.findings.map(f => [f.id, f.severity, f.message])).toEqual([
            ['ADR-001', 'medium', 'Published location looks like a full street address; keep only city and country'],
        ]);
    });

    it('should tell street addresses from plain places', () => {
        expect(looksLikeStreetAddress('12 Main St')).toBe(true);
        expect(looksLikeStreetAddress('Example Street 1, Berlin')).toBe(true);
        expect(looksLikeStreetAddress('Main Street, Springfield')).toBe(false);
        expect(looksLikeStreetAddress('Berlin 10115')).toBe(false);
    });

    it('should flag sensitive keywords left in published text', () => {
        const report = auditor.audit(redactedRecord('normal'), cleanState());

        expect(report.findings.map(f => [f.id, f.severity, f.message])).toEqual([
            ['KEY-001', 'medium', 'Published text matches the sensitive keyword pattern \\bconfidential\\b'],
            ['KEY-002', 'medium', 'Published text matches the sensitive keyword pattern \\bsalary\\b'],
        ]);
    });

    it('should check custom keyword patterns', () => {
        const custom = new ComplianceAuditor({ minimumSeverity: 'medium', sensitivePatterns: ['\\bbilling\\b'], idFactory: () => 'report-1' });

        const report = custom.audit(redactedRecord(), cleanState());

        expect(report.findings.map(f => f.id)).toEqual(['KEY-001']);
    });

    it('should note internal references and rights notices without blocking', () => {
        const record = redactedRecord();
        record.summary = 'Ran the intranet VPN. Product names are a trademark © of Acme Corp.';

        const report = auditor.audit(record, cleanState());

        expect(report.findings.map(f => [f.id, f.severity, f.blocking])).toEqual([
            ['REF-001', 'low', false],
            ['REF-002', 'low', false],
        ]);
        expect(report.passed).toBe(true);
    });

    describe('fix()', () => {
        it('should delete the files of auto-fixable findings', async () => {
            const remover: RawDataRemover = {
                deleteFiles: jest.fn().mockResolvedValue({ deleted: ['/work/data/profile_raw.json'], errors: [], certificateId: 'cert-1' }),
            };
            const report = auditor.audit(null, cleanState({
                rawDataFiles: [{ path: '/work/data/profile_raw.json', modifiedAt: HOURS_AGO(48) }],
                outputs: [{ file: 'resume.md', format: 'markdown', renderedAt: NOW.toISOString() }],
            }));

            const remediations = await auditor.fix(report, remover);

            expect(remover.deleteFiles).toHaveBeenCalledTimes(1);
            expect(remover.deleteFiles).toHaveBeenCalledWith(['/work/data/profile_raw.json']);
            expect(remediations).toEqual([{
                findingId: 'RAW-001',
                action: 'deleted raw data file',
                path: '/work/data/profile_raw.json',
                success: true,
                certificateId: 'cert-1',
            }]);
        });

        it('should record a failed deletion', async () => {
            const remover: RawDataRemover = {
                deleteFiles: jest.fn().mockResolvedValue({ deleted: [], errors: ['EACCES'] }),
            };
            const report = auditor.audit(null, cleanState({
                rawDataFiles: [{ path: '/work/data/profile_raw.json', modifiedAt: HOURS_AGO(48) }],
            }));

            const [remediation] = await auditor.fix(report, remover);

            expect(remediation.success).toBe(false);
            expect(remediation.error).toBe('EACCES');
        });
    });

    describe('enforce()', () => {
        it('should throw ComplianceViolation carrying the report', () => {
            const report = auditor.audit(null, cleanState({ ignoreFile: undefined }));

            expect(() => auditor.enforce(report)).toThrow(ComplianceViolation);
            expect(() => auditor.enforce(report)).toThrow('Compliance audit failed with 1 blocking finding(s)');
        });

        it('should accept a passing report', () => {
            expect(() => auditor.enforce(auditor.audit(null, cleanState()))).not.toThrow();
        });
    });
});

describe('formatReport', () => {
    const report = createComplianceReport('report-1', [{
        id: 'RET-001',
        ruleId: 'retention-above-recommended',
        severity: 'low',
        message: 'Retention of 48h exceeds the recommended 24h',
        autoFixable: false,
    }], 'medium', NOW);

    it('should render a text summary', () => {
        expect(formatReport(report, 'text')).toBe([
            'Compliance report report-1',
            'Audited at: 2026-01-15T10:00:00.000Z',
            'Minimum severity: medium',
            'Result: PASSED',
            '',
            '[LOW] RET-001 retention-above-recommended: Retention of 48h exceeds the recommended 24h',
        ].join('\n'));
    });

    it('should list remediations', () => {
        const withFix = createComplianceReport('report-2', [], 'medium', NOW, [
            { findingId: 'RAW-001', action: 'deleted raw data file', path: '/work/data/profile_raw.json', success: true, certificateId: 'cert-1' },
        ]);

        expect(formatReport(withFix, 'text').split('\n').slice(-3)).toEqual([
            '',
            'Remediations:',
            '- RAW-001 deleted raw data file /work/data/profile_raw.json: done (certificate cert-1)',
        ]);
    });

    it('should render JSON that parses back to the report', () => {
        expect(JSON.parse(formatReport(report, 'json'))).toEqual(report);
    });
});
