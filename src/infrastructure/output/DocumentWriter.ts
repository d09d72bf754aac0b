import fs from 'fs/promises';
import path from 'path';
import { OutputManifestEntry } from '../../domain/entities/FilesystemState';
import { PrivacyLevel } from '../../domain/entities/ProfileRecord';
import { OutputError } from '../../domain/errors/ProfileToolError';

/** Sidecar listing every rendered document and the redaction applied to it. */
export const MANIFEST_FILE = '.profile-manifest.json';

interface OutputManifest {
    documents: OutputManifestEntry[];
}

/**
 * Writes rendered documents into the output directory and keeps the
 * manifest sidecar up to date.
 */
export class DocumentWriter {
    constructor(private readonly outputDir: string) { }

    /**
     * Writes a rendered document and records it in the manifest.
     * @throws OutputError when the file or manifest cannot be written
     */
    async writeDocument(
        bytes: Buffer,
        fileName: string,
        meta: { format: string; redactionLevel?: PrivacyLevel; renderedAt?: Date }
    ): Promise<string> {
        const target = await this.write(bytes, fileName);

        const entry: OutputManifestEntry = {
            file: fileName,
            format: meta.format,
            renderedAt: (meta.renderedAt ?? new Date()).toISOString(),
        };
        if (meta.redactionLevel) entry.redactionLevel = meta.redactionLevel;

        const manifest = await readManifest(this.outputDir);
        const documents = manifest.documents.filter(doc => doc.file !== fileName);
        documents.push(entry);
        await this.write(Buffer.from(JSON.stringify({ documents }, null, 2), 'utf-8'), MANIFEST_FILE);

        console.log(`[DocumentWriter] Wrote ${fileName} (${bytes.length} bytes, redaction: ${meta.redactionLevel ?? 'none'})`);
        return target;
    }

    /**
     * Writes a file that is not a rendered document (e.g. the compliance report).
     */
    async writeAuxiliary(content: string, fileName: string): Promise<string> {
        return this.write(Buffer.from(content, 'utf-8'), fileName);
    }

    private async write(bytes: Buffer, fileName: string): Promise<string> {
        const target = path.join(this.outputDir, fileName);
        try {
            await fs.mkdir(this.outputDir, { recursive: true });
            await fs.writeFile(target, bytes);
            return target;
        } catch (error) {
            throw new OutputError(`Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`, target);
        }
    }
}

/**
 * Reads the manifest sidecar; a missing or unreadable manifest is empty.
 */
export async function readManifest(outputDir: string): Promise<OutputManifest> {
    let content: string;
    try {
        content = await fs.readFile(path.join(outputDir, MANIFEST_FILE), 'utf-8');
    } catch {
        return { documents: [] };
    }

    try {
        const parsed: unknown = JSON.parse(content);
        return { documents: manifestEntries(parsed) };
    } catch (error) {
        console.warn(`[DocumentWriter] Ignoring malformed manifest in ${outputDir}: ${error instanceof Error ? error.message : String(error)}`);
        return { documents: [] };
    }
}

function manifestEntries(value: unknown): OutputManifestEntry[] {
    if (typeof value !== 'object' || value === null || !('documents' in value) || !Array.isArray(value.documents)) {
        return [];
    }
    const documents: unknown[] = value.documents;
    const entries: OutputManifestEntry[] = [];
    for (const item of documents) {
        if (typeof item !== 'object' || item === null) continue;
        const file = 'file' in item && typeof item.file === 'string' ? item.file : undefined;
        if (!file) continue;
        const entry: OutputManifestEntry = {
            file,
            format: 'format' in item && typeof item.format === 'string' ? item.format : 'unknown',
            renderedAt: 'renderedAt' in item && typeof item.renderedAt === 'string' ? item.renderedAt : '',
        };
        const level = 'redactionLevel' in item ? item.redactionLevel : undefined;
        if (level === 'strict' || level === 'normal' || level === 'minimal') entry.redactionLevel = level;
        entries.push(entry);
    }
    return entries;
}
