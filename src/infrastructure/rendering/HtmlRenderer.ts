import * as cheerio from 'cheerio';
import { ProfileRecord } from '../../domain/entities/ProfileRecord';
import { buildResumeLayout, LayoutItem } from './ResumeLayout';

const SHELL = '<!DOCTYPE html><html lang="en"><head><meta charset="utf-8"><title></title></head><body><main class="resume"></main></body></html>';

/**
 * Renders the resume as a standalone HTML page. All profile text goes
 * through `.text()` so it is escaped.
 */
export function renderHtml(record: ProfileRecord): string {
    const layout = buildResumeLayout(record);
    const $ = cheerio.load(SHELL);
    const main = $('main.resume');

    $('title').text(layout.name);

    const header = $('<header></header>');
    header.append($('<h1></h1>').text(layout.name));
    if (layout.headline) header.append($('<p class="headline"></p>').text(layout.headline));
    if (layout.contact.length > 0) header.append($('<p class="contact"></p>').text(layout.contact.join(' | ')));
    main.append(header);

    const list = (items: LayoutItem[]) => {
        const ul = $('<ul></ul>');
        for (const item of items) {
            const li = $('<li></li>');
            li.append(item.emphasize ? $('<strong></strong>').text(item.text) : $('<span></span>').text(item.text));
            if (item.details.length > 0) li.append($('<span class="details"></span>').text(` | ${item.details.join(' | ')}`));
            for (const note of item.notes) li.append($('<p class="note"></p>').text(note));
            ul.append(li);
        }
        return ul;
    };

    for (const section of layout.sections) {
        const element = $('<section></section>');
        element.append($('<h2></h2>').text(section.heading));
        for (const paragraph of section.paragraphs) element.append($('<p></p>').text(paragraph));
        for (const group of section.groups) {
            element.append($('<h3></h3>').text(group.heading));
            element.append(list(group.items));
        }
        if (section.items.length > 0) element.append(list(section.items));
        main.append(element);
    }

    return `${$.html()}\n`;
}
