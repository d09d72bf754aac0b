import { ResumePipeline } from '../application/ResumePipeline';
import { ComplianceAuditor, formatReport } from '../application/services/ComplianceAuditor';
import { PrivacyRedactor } from '../application/services/PrivacyRedactor';
import { Config, OUTPUT_FORMATS, OutputFormat } from '../config';
import { ComplianceReport } from '../domain/entities/ComplianceReport';
import { createRedactionPolicy } from '../domain/entities/RedactionPolicy';
import { ProfileRecord } from '../domain/entities/ProfileRecord';
import { ConfigurationError, ProfileToolError } from '../domain/errors/ProfileToolError';
import { createRawDataRetentionService } from '../infrastructure/compliance/RawDataRetentionService';
import { FileSystemStateScanner } from '../infrastructure/compliance/FileSystemStateScanner';
import { DocumentWriter } from '../infrastructure/output/DocumentWriter';
import { ResumeRenderer } from '../infrastructure/rendering/ResumeRenderer';
import { createSessionFactory } from '../infrastructure/session/SessionFactory';
import { ProfileDataStore } from '../infrastructure/storage/ProfileDataStore';

export type CommandName = 'generate' | 'audit' | 'render';

export interface CliArgs {
    command: CommandName;
    fix: boolean;
    reportFormat: 'json' | 'text';
    input?: string;
    format?: OutputFormat;
}

export const EXIT_CODES = {
    success: 0,
    unknown: 1,
    config: 2,
    auth: 3,
    extraction: 4,
    output: 5,
    compliance: 6,
    cancelled: 130,
} as const;

const USAGE = 'Usage: profile-resume [generate | audit [--fix] [--format json|text] [--input <record.json>] | render --input <raw.json> [--format markdown|html|json]]';

/**
 * @throws ConfigurationError for unknown commands or flags
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const [first, ...rest] = argv;
    const command = first ?? 'generate';
    if (command !== 'generate' && command !== 'audit' && command !== 'render') {
        throw new ConfigurationError(`Unknown command "${command}". ${USAGE}`);
    }

    const args: CliArgs = { command, fix: false, reportFormat: 'text' };
    for (let i = 0; i < rest.length; i++) {
        const flag = rest[i];
        const value = rest[i + 1];
        if (flag === '--fix' && command === 'audit') {
            args.fix = true;
        } else if (flag === '--input' && value) {
            args.input = value;
            i++;
        } else if (flag === '--format' && value && command === 'audit' && (value === 'json' || value === 'text')) {
            args.reportFormat = value;
            i++;
        } else if (flag === '--format' && value && command === 'render') {
            const format = OUTPUT_FORMATS.find(f => f === value);
            if (!format) throw new ConfigurationError(`Unknown output format "${value}". ${USAGE}`);
            args.format = format;
            i++;
        } else {
            throw new ConfigurationError(`Unexpected argument "${flag}". ${USAGE}`);
        }
    }

    if (command === 'render' && !args.input) {
        throw new ConfigurationError(`render needs --input <raw.json>. ${USAGE}`);
    }
    return args;
}

/**
 * Maps a failure to a process exit code by the phase it happened in.
 */
export function exitCodeFor(error: unknown): number {
    if (!(error instanceof ProfileToolError)) return EXIT_CODES.unknown;
    switch (error.phase) {
        case 'config':
            return EXIT_CODES.config;
        case 'auth':
            return EXIT_CODES.auth;
        case 'navigation':
        case 'extraction':
            return EXIT_CODES.extraction;
        case 'output':
            return EXIT_CODES.output;
        case 'compliance':
            return EXIT_CODES.compliance;
        case 'cancelled':
            return EXIT_CODES.cancelled;
    }
}

export function describeFailure(error: unknown): string {
    if (error instanceof ProfileToolError) {
        return `${error.phase} phase failed: ${error.message}`;
    }
    return `unexpected failure: ${error instanceof Error ? error.message : String(error)}`;
}

function createScanner(config: Config): FileSystemStateScanner {
    return new FileSystemStateScanner({
        rawDataPath: config.rawDataPath,
        outputDir: config.outputDir,
        workspaceDir: config.workspaceDir,
        retentionHours: config.retentionHours,
    });
}

export async function runGenerate(config: Config, signal?: AbortSignal): Promise<number> {
    const pipeline = new ResumePipeline(config, {
        openSession: createSessionFactory(config),
        store: new ProfileDataStore(),
        renderer: new ResumeRenderer(),
        writer: new DocumentWriter(config.outputDir),
        scanner: createScanner(config),
    });
    const result = await pipeline.run(signal);
    console.log(`✅ Resume: ${result.documentPath}`);
    console.log(`📋 Compliance report: ${result.reportPath}`);
    return EXIT_CODES.success;
}

/**
 * Audits previously saved data. A record carrying a redaction marker is
 * audited as published output; an unredacted record is raw data and is
 * covered by the retention rules only. With `fix`, stale raw data files are
 * deleted and the audit runs again on the new state.
 */
export async function runAudit(config: Config, args: CliArgs): Promise<{ code: number; report: ComplianceReport }> {
    const store = new ProfileDataStore();
    const scanner = createScanner(config);
    const auditor = new ComplianceAuditor({
        minimumSeverity: config.minAuditSeverity,
        sensitivePatterns: config.sensitivePatterns,
    });

    let published: ProfileRecord | null = null;
    const input = args.input ?? config.rawDataPath;
    if (args.input || await store.exists(input)) {
        const record = await store.load(input);
        published = record.redaction ? record : null;
    }

    let report = auditor.audit(published, await scanner.scan());
    if (args.fix) {
        const retention = createRawDataRetentionService({
            retentionHours: config.retentionHours,
            certificateDir: config.certificateDir,
        });
        const remediations = await auditor.fix(report, retention);
        if (published && !(await store.exists(input))) {
            published = null;
        }
        report = auditor.audit(published, await scanner.scan(), remediations);
    }

    console.log(formatReport(report, args.reportFormat));
    return { code: report.passed ? EXIT_CODES.success : EXIT_CODES.compliance, report };
}

/**
 * Re-renders a saved raw record through the configured redaction policy.
 */
export async function runRender(config: Config, args: CliArgs): Promise<number> {
    if (!args.input) throw new ConfigurationError('render needs --input <raw.json>');
    const record = await new ProfileDataStore().load(args.input);
    const format = args.format ?? config.outputFormat;

    const redacted = new PrivacyRedactor().redact(record, createRedactionPolicy(config.privacyLevel, config.sensitivePatterns));
    const renderer = new ResumeRenderer();
    const target = await new DocumentWriter(config.outputDir).writeDocument(
        renderer.render(redacted, format),
        renderer.fileNameFor(format),
        { format, redactionLevel: redacted.redaction?.level }
    );
    console.log(`✅ Resume: ${target}`);
    return EXIT_CODES.success;
}
