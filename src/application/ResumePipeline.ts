import type { Config } from '../config';
import { ComplianceReport } from '../domain/entities/ComplianceReport';
import { FilesystemState } from '../domain/entities/FilesystemState';
import { PrivacyLevel, ProfileRecord } from '../domain/entities/ProfileRecord';
import { createRedactionPolicy } from '../domain/entities/RedactionPolicy';
import { RunCancelledError } from '../domain/errors/ProfileToolError';
import { ProfileSessionFactory } from '../domain/ports/IProfileSession';
import { NormalizationWarning } from '../domain/services/SectionNormalizer';
import { AssemblyResult, ProfileAssembler } from './ProfileAssembler';
import { ComplianceAuditor, formatReport } from './services/ComplianceAuditor';
import { PrivacyRedactor } from './services/PrivacyRedactor';

/**
 * Collaborators the pipeline drives. Infrastructure adapters satisfy these.
 */
export interface PipelineDependencies {
    openSession: ProfileSessionFactory;
    store: { save(record: ProfileRecord, filePath: string): Promise<void> };
    renderer: {
        render(record: ProfileRecord, format: Config['outputFormat']): Buffer;
        fileNameFor(format: Config['outputFormat']): string;
    };
    writer: {
        writeDocument(bytes: Buffer, fileName: string, meta: { format: string; redactionLevel?: PrivacyLevel }): Promise<string>;
        writeAuxiliary(content: string, fileName: string): Promise<string>;
    };
    scanner: { scan(now?: Date): Promise<FilesystemState> };
    redactor?: PrivacyRedactor;
    auditor?: ComplianceAuditor;
}

export interface PipelineResult {
    record: ProfileRecord;
    documentPath: string;
    reportPath: string;
    report: ComplianceReport;
    warnings: NormalizationWarning[];
    rawDataPath?: string;
}

export const COMPLIANCE_REPORT_FILE = 'compliance-report.json';

/**
 * One run: extract -> (keep raw) -> redact -> render -> write -> audit.
 *
 * The session is closed on every exit path. Nothing is written before
 * assembly completes, so a cancelled or failed extraction leaves no data
 * behind. A failed audit raises ComplianceViolation after the outputs
 * exist.
 */
export class ResumePipeline {
    private readonly redactor: PrivacyRedactor;
    private readonly auditor: ComplianceAuditor;

    constructor(private readonly config: Config, private readonly deps: PipelineDependencies) {
        this.redactor = deps.redactor ?? new PrivacyRedactor();
        this.auditor = deps.auditor ?? new ComplianceAuditor({
            minimumSeverity: config.minAuditSeverity,
            sensitivePatterns: config.sensitivePatterns,
        });
    }

    async run(signal?: AbortSignal): Promise<PipelineResult> {
        const { config, deps } = this;

        const { record: raw, warnings } = await this.extract(signal);
        if (signal?.aborted) {
            throw new RunCancelledError('Run cancelled after extraction; nothing was written');
        }

        let rawDataPath: string | undefined;
        if (config.keepRawData) {
            await deps.store.save(raw, config.rawDataPath);
            rawDataPath = config.rawDataPath;
        }

        const policy = createRedactionPolicy(config.privacyLevel, config.sensitivePatterns);
        const redacted = this.redactor.redact(raw, policy);

        const fileName = deps.renderer.fileNameFor(config.outputFormat);
        const bytes = deps.renderer.render(redacted, config.outputFormat);
        const documentPath = await deps.writer.writeDocument(bytes, fileName, {
            format: config.outputFormat,
            redactionLevel: redacted.redaction?.level,
        });

        const state = await deps.scanner.scan();
        const report = this.auditor.audit(redacted, state);
        const reportPath = await deps.writer.writeAuxiliary(formatReport(report, 'json'), COMPLIANCE_REPORT_FILE);

        this.auditor.enforce(report);

        console.log(`[ResumePipeline] Resume written to ${documentPath}`);
        return { record: redacted, documentPath, reportPath, report, warnings, rawDataPath };
    }

    private async extract(signal?: AbortSignal): Promise<AssemblyResult> {
        const session = await this.deps.openSession();
        try {
            const assembler = new ProfileAssembler(session, {
                profileUrl: this.config.profileUrl,
                stepTimeoutMs: this.config.stepTimeoutMs,
                navigationRetries: this.config.navigationRetries,
            });
            return await assembler.assemble(signal);
        } finally {
            try {
                await session.close();
            } catch (error) {
                console.error('[ResumePipeline] Failed to close session:', error);
            }
        }
    }
}
