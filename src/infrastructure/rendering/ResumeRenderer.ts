import type { OutputFormat } from '../../config';
import { ProfileRecord } from '../../domain/entities/ProfileRecord';
import { renderHtml } from './HtmlRenderer';
import { renderMarkdown } from './MarkdownRenderer';

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
    markdown: 'md',
    html: 'html',
    json: 'json',
};

export function renderJson(record: ProfileRecord): string {
    return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * Pure rendering: (record, format) -> document bytes. No I/O.
 */
export class ResumeRenderer {
    render(record: ProfileRecord, format: OutputFormat): Buffer {
        switch (format) {
            case 'markdown':
                return Buffer.from(renderMarkdown(record), 'utf-8');
            case 'html':
                return Buffer.from(renderHtml(record), 'utf-8');
            case 'json':
                return Buffer.from(renderJson(record), 'utf-8');
        }
    }

    fileNameFor(format: OutputFormat, baseName = 'resume'): string {
        return `${baseName}.${FILE_EXTENSIONS[format]}`;
    }
}
