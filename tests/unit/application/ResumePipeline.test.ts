/**
 * Unit tests for ResumePipeline with in-memory collaborators
 */
import { COMPLIANCE_REPORT_FILE, PipelineDependencies, ResumePipeline } from '../../../src/application/ResumePipeline';
import { Config, loadConfig } from '../../../src/config';
import { FilesystemState } from '../../../src/domain/entities/FilesystemState';
import {
    ComplianceViolation,
    ProfileIdentityError,
    RunCancelledError,
} from '../../../src/domain/errors/ProfileToolError';
import { ResumeRenderer } from '../../../src/infrastructure/rendering/ResumeRenderer';
import { FakeProfileSession } from '../../helpers/FakeProfileSession';

const PROFILE_URL = 'https://profiles.example.com/in/jane/';

const OVERVIEW = `
<main>
    <h1 class="text-heading-xlarge">Jane Placeholder</h1>
    <div class="text-body-medium break-words">Staff Engineer</div>
</main>`;

const CONTACT = '<div class="ci-email"><a href="mailto:jane@example.com">jane@example.com</a></div>';

function cleanState(): FilesystemState {
    return {
        now: new Date('2026-01-15T10:00:00.000Z'),
        retentionHours: 0,
        rawDataPath: '/work/data/profile_raw.json',
        rawDataFiles: [],
        outputDir: '/work/output',
        outputs: [{ file: 'resume.md', format: 'markdown', redactionLevel: 'normal', renderedAt: '2026-01-15T10:00:00.000Z' }],
        ignoreFile: { path: '/work/.gitignore', content: 'data/\n' },
    };
}

describe('ResumePipeline', () => {
    let config: Config;
    let session: FakeProfileSession;
    let deps: {
        openSession: jest.Mock;
        store: { save: jest.Mock };
        renderer: ResumeRenderer;
        writer: { writeDocument: jest.Mock; writeAuxiliary: jest.Mock };
        scanner: { scan: jest.Mock };
    };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });

        config = loadConfig({
            PROFILE_URL,
            SESSION_MODE: 'fixtures',
            FIXTURES_DIR: '/unused',
            OUTPUT_DIR: '/work/output',
            RAW_DATA_PATH: '/work/data/profile_raw.json',
            STEP_TIMEOUT_MS: '5000',
            NAVIGATION_RETRIES: '0',
        });
        session = new FakeProfileSession({
            [PROFILE_URL]: OVERVIEW,
            [`${PROFILE_URL}overlay/contact-info/`]: CONTACT,
        });
        deps = {
            openSession: jest.fn().mockResolvedValue(session),
            store: { save: jest.fn().mockResolvedValue(undefined) },
            renderer: new ResumeRenderer(),
            writer: {
                writeDocument: jest.fn().mockResolvedValue('/work/output/resume.md'),
                writeAuxiliary: jest.fn().mockResolvedValue(`/work/output/${COMPLIANCE_REPORT_FILE}`),
            },
            scanner: { scan: jest.fn().mockResolvedValue(cleanState()) },
        };
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function pipeline(overrides: Partial<Config> = {}): ResumePipeline {
        const dependencies: PipelineDependencies = deps;
        return new ResumePipeline({ ...config, ...overrides }, dependencies);
    }

    it('should extract, redact, render and audit', async () => {
        const result = await pipeline().run();

        expect(result.documentPath).toBe('/work/output/resume.md');
        expect(result.reportPath).toBe('/work/output/compliance-report.json');
        expect(result.report.passed).toBe(true);
        expect(result.record.contact.email).toBe('j***@***.com');
        expect(result.record.redaction).toEqual({ level: 'normal' });
        expect(result.rawDataPath).toBeUndefined();
        expect(session.closed).toBe(true);
        expect(deps.store.save).not.toHaveBeenCalled();

        expect(deps.writer.writeDocument).toHaveBeenCalledWith(expect.any(Buffer), 'resume.md', {
            format: 'markdown',
            redactionLevel: 'normal',
        });
        const markdown = String(deps.writer.writeDocument.mock.calls[0][0]);
        expect(markdown).toBe([
            '# Jane Placeholder',
            '',
            '**Staff Engineer**',
            '',
            'j***@***.com | https://profiles.example.com/***',
            '',
        ].join('\n'));
    });

    it('should save the unredacted record only when raw data is kept', async () => {
        const result = await pipeline({ keepRawData: true, retentionHours: 24 }).run();

        expect(deps.store.save).toHaveBeenCalledTimes(1);
        const [saved, savedPath] = deps.store.save.mock.calls[0];
        expect(saved.contact.email).toBe('jane@example.com');
        expect(savedPath).toBe('/work/data/profile_raw.json');
        expect(result.rawDataPath).toBe('/work/data/profile_raw.json');
    });

    it('should close the session and write nothing when extraction fails', async () => {
        session = new FakeProfileSession({ [PROFILE_URL]: '<main></main>' });
        deps.openSession.mockResolvedValue(session);

        await expect(pipeline().run()).rejects.toThrow(ProfileIdentityError);

        expect(session.closed).toBe(true);
        expect(deps.writer.writeDocument).not.toHaveBeenCalled();
        expect(deps.store.save).not.toHaveBeenCalled();
    });

    it('should write nothing when cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(pipeline().run(controller.signal)).rejects.toThrow(RunCancelledError);

        expect(session.closed).toBe(true);
        expect(deps.writer.writeDocument).not.toHaveBeenCalled();
    });

    it('should write the report and then fail on blocking findings', async () => {
        deps.scanner.scan.mockResolvedValue({
            ...cleanState(),
            rawDataFiles: [{ path: '/work/data/profile_raw.json', modifiedAt: new Date('2026-01-14T10:00:00.000Z') }],
        });

        await expect(pipeline().run()).rejects.toThrow(ComplianceViolation);

        expect(deps.writer.writeDocument).toHaveBeenCalledTimes(1);
        expect(deps.writer.writeAuxiliary).toHaveBeenCalledWith(expect.stringContaining('"ruleId": "raw-data-past-retention"'), COMPLIANCE_REPORT_FILE);
    });
});
