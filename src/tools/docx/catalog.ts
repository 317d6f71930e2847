/**
 * IndexCatalog: the three zero-based index spaces over the live body.
 *
 * Paragraphs, tables and inline images are numbered independently, so an
 * edit to one kind never shifts the indices of another. The catalog is a
 * snapshot: structural edits must call refresh() before the next lookup.
 */

import { getAllBodyTables, getBodyParagraphs } from './dom.js';
import { indexOutOfRange } from './errors.js';
import { collectInlineShapes } from './image.js';

function pick(kind: string, list: readonly Element[], index: number): Element {
    const el = Number.isInteger(index) && index >= 0 ? list[index] : undefined;
    if (!el) throw indexOutOfRange(kind, index, list.length);
    return el;
}

export class IndexCatalog {
    private paragraphs: Element[] = [];
    private tables: Element[] = [];
    private images: Element[] = [];

    constructor(private readonly body: Element) {
        this.refresh();
    }

    refresh(): void {
        this.paragraphs = getBodyParagraphs(this.body);
        this.tables = getAllBodyTables(this.body);
        this.images = collectInlineShapes(this.body);
    }

    get paragraphCount(): number {
        return this.paragraphs.length;
    }

    allParagraphs(): readonly Element[] {
        return this.paragraphs;
    }

    allTables(): readonly Element[] {
        return this.tables;
    }

    allImages(): readonly Element[] {
        return this.images;
    }

    paragraph(index: number): Element {
        return pick('paragraph', this.paragraphs, index);
    }

    table(index: number): Element {
        return pick('table', this.tables, index);
    }

    image(index: number): Element {
        return pick('image', this.images, index);
    }

    indexOfParagraph(p: Element): number {
        return this.paragraphs.indexOf(p);
    }

    indexOfImage(inline: Element): number {
        return this.images.indexOf(inline);
    }
}
