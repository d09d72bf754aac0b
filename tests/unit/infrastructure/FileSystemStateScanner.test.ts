/**
 * Unit tests for FileSystemStateScanner
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileSystemStateScanner } from '../../../src/infrastructure/compliance/FileSystemStateScanner';
import { DocumentWriter } from '../../../src/infrastructure/output/DocumentWriter';

describe('FileSystemStateScanner', () => {
    let workspace: string;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'state-scan-'));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(workspace, { recursive: true, force: true });
    });

    function scanner(retentionHours = 0): FileSystemStateScanner {
        return new FileSystemStateScanner({
            rawDataPath: path.join(workspace, 'data', 'profile_raw.json'),
            outputDir: path.join(workspace, 'output'),
            workspaceDir: workspace,
            retentionHours,
        });
    }

    it('should describe an empty workspace', async () => {
        const now = new Date('2026-01-15T10:00:00.000Z');

        expect(await scanner(12).scan(now)).toEqual({
            now,
            retentionHours: 12,
            rawDataPath: path.join(workspace, 'data', 'profile_raw.json'),
            rawDataFiles: [],
            outputDir: path.join(workspace, 'output'),
            outputs: [],
        });
    });

    it('should find raw data files, outputs and the ignore file', async () => {
        const rawPath = path.join(workspace, 'data', 'profile_raw.json');
        await fs.mkdir(path.dirname(rawPath), { recursive: true });
        await fs.writeFile(rawPath, '{}', 'utf-8');
        await fs.writeFile(path.join(workspace, 'notes_raw.json'), '{}', 'utf-8');
        await fs.writeFile(path.join(workspace, 'notes.json'), '{}', 'utf-8');
        await fs.writeFile(path.join(workspace, '.gitignore'), 'data/\n', 'utf-8');
        await new DocumentWriter(path.join(workspace, 'output')).writeDocument(Buffer.from('# Jane\n'), 'resume.md', {
            format: 'markdown',
            redactionLevel: 'strict',
        });

        const state = await scanner().scan();

        expect(state.rawDataFiles.map(file => file.path).sort()).toEqual([
            rawPath,
            path.join(workspace, 'notes_raw.json'),
        ].sort());
        expect(state.rawDataFiles[0].modifiedAt).toBeInstanceOf(Date);
        expect(state.outputs.map(output => [output.file, output.redactionLevel])).toEqual([['resume.md', 'strict']]);
        expect(state.ignoreFile).toEqual({ path: path.join(workspace, '.gitignore'), content: 'data/\n' });
    });
});
