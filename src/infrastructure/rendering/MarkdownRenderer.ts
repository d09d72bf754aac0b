import { ProfileRecord } from '../../domain/entities/ProfileRecord';
import { buildResumeLayout, LayoutItem } from './ResumeLayout';

function itemLines(item: LayoutItem): string {
    const text = item.emphasize ? `**${item.text}**` : item.text;
    const head = [`- ${text}`, ...item.details].join(' | ');
    return [head, ...item.notes.map(note => `  ${note}`)].join('\n');
}

/**
 * Renders the resume as Markdown: name, headline and contact line, then one
 * `##` heading per non-empty section.
 */
export function renderMarkdown(record: ProfileRecord): string {
    const layout = buildResumeLayout(record);
    const blocks: string[] = [`# ${layout.name}`];

    if (layout.headline) blocks.push(`**${layout.headline}**`);
    if (layout.contact.length > 0) blocks.push(layout.contact.join(' | '));

    for (const section of layout.sections) {
        blocks.push(`## ${section.heading}`);
        blocks.push(...section.paragraphs);
        for (const group of section.groups) {
            blocks.push(`### ${group.heading}`);
            blocks.push(group.items.map(itemLines).join('\n'));
        }
        if (section.items.length > 0) {
            blocks.push(section.items.map(itemLines).join('\n'));
        }
    }

    return `${blocks.join('\n\n')}\n`;
}
