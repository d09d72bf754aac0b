import fs from 'fs/promises';
import path from 'path';
import { FilesystemState, IgnoreFile, RawDataFile } from '../../domain/entities/FilesystemState';
import { readManifest } from '../output/DocumentWriter';

/** File names that look like saved raw profile data. */
export const RAW_DATA_FILE_PATTERN = /(^profile_raw.*|_raw)\.json$/i;

export interface FileSystemStateScannerOptions {
    rawDataPath: string;
    outputDir: string;
    workspaceDir: string;
    retentionHours: number;
    ignoreFileName?: string;
}

/**
 * Collects the filesystem facts the compliance audit needs: raw data files
 * on disk, the output manifest and the workspace ignore file.
 */
export class FileSystemStateScanner {
    constructor(private readonly options: FileSystemStateScannerOptions) { }

    async scan(now: Date = new Date()): Promise<FilesystemState> {
        const { rawDataPath, outputDir, retentionHours } = this.options;
        const manifest = await readManifest(outputDir);

        const state: FilesystemState = {
            now,
            retentionHours,
            rawDataPath,
            rawDataFiles: await this.findRawDataFiles(),
            outputDir,
            outputs: manifest.documents,
        };
        const ignoreFile = await this.readIgnoreFile();
        if (ignoreFile) state.ignoreFile = ignoreFile;
        return state;
    }

    private async findRawDataFiles(): Promise<RawDataFile[]> {
        const { rawDataPath, outputDir, workspaceDir } = this.options;
        const found = new Map<string, RawDataFile>();

        const configured = await this.stat(rawDataPath);
        if (configured?.isFile()) found.set(path.resolve(rawDataPath), { path: rawDataPath, modifiedAt: configured.mtime });

        const directories = new Set([path.dirname(rawDataPath), outputDir, workspaceDir].map(dir => path.resolve(dir)));
        for (const directory of directories) {
            for (const name of await this.list(directory)) {
                if (!RAW_DATA_FILE_PATTERN.test(name)) continue;
                const filePath = path.join(directory, name);
                if (found.has(filePath)) continue;
                const stats = await this.stat(filePath);
                if (stats?.isFile()) found.set(filePath, { path: filePath, modifiedAt: stats.mtime });
            }
        }
        return Array.from(found.values());
    }

    private async readIgnoreFile(): Promise<IgnoreFile | undefined> {
        const ignorePath = path.join(this.options.workspaceDir, this.options.ignoreFileName ?? '.gitignore');
        try {
            return { path: ignorePath, content: await fs.readFile(ignorePath, 'utf-8') };
        } catch {
            return undefined;
        }
    }

    private async stat(filePath: string) {
        try {
            return await fs.stat(filePath);
        } catch {
            return null;
        }
    }

    private async list(directory: string): Promise<string[]> {
        try {
            return await fs.readdir(directory);
        } catch {
            return [];
        }
    }
}
