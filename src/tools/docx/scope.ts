/**
 * EditScope: what operation handlers are allowed to touch.
 *
 * Handlers address elements through the catalog and change structure only
 * through the methods here, each of which refreshes the catalog before
 * returning. Text and property edits on returned elements need no refresh.
 */

import type { IndexCatalog } from './catalog.js';
import { detach, findDirectChild, insertAfter } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { buildInlineDrawing, nextDrawingId, type Extent } from './image.js';
import type { DocxPackage } from './package.js';
import type { StyleSheet } from './styles.js';
import { buildTableGrid, setCellText, type TableGrid } from './table.js';

export interface ImageAttachment {
    data: Buffer;
    /** Extension with leading dot, lower case. */
    ext: string;
    name: string;
    size: Extent;
}

export interface EditScope {
    readonly styles: StyleSheet;
    paragraph(index: number): Element;
    paragraphs(): readonly Element[];
    table(index: number): TableGrid;
    /** Rewrite a cell of a grid from table(); it may have held images or nested tables. */
    writeCell(cell: Element, text: string): void;
    image(index: number): Element;
    /** Insert an empty paragraph next to `index`; returns the new paragraph's index. */
    insertParagraph(index: number, position: 'before' | 'after'): number;
    removeParagraph(index: number): void;
    /** Remove the drawing holding image `index` from its run. */
    removeImage(index: number): void;
    /** Append `image` to paragraph `index` in a new run; returns the new image index. */
    attachImage(index: number, image: ImageAttachment): number;
    updateSettings(edit: (settings: Document) => boolean): boolean;
}

export class DocumentScope implements EditScope {
    constructor(
        private readonly pkg: DocxPackage,
        private readonly catalog: IndexCatalog,
    ) {}

    get styles(): StyleSheet {
        return this.pkg.styles;
    }

    paragraph(index: number): Element {
        return this.catalog.paragraph(index);
    }

    paragraphs(): readonly Element[] {
        return this.catalog.allParagraphs();
    }

    table(index: number): TableGrid {
        return buildTableGrid(this.catalog.table(index));
    }

    image(index: number): Element {
        return this.catalog.image(index);
    }

    writeCell(cell: Element, text: string): void {
        setCellText(cell, text);
        this.catalog.refresh();
    }

    insertParagraph(index: number, position: 'before' | 'after'): number {
        const ref = this.catalog.paragraph(index);
        const created = this.pkg.document.createElement('w:p');
        if (position === 'before') {
            const parent = ref.parentNode;
            if (!parent) throw new DocxError('Paragraph is detached', DocxErrorCode.INVALID_DOCX);
            parent.insertBefore(created, ref);
        } else {
            insertAfter(ref, created);
        }
        this.catalog.refresh();
        return this.catalog.indexOfParagraph(created);
    }

    removeParagraph(index: number): void {
        detach(this.catalog.paragraph(index));
        this.catalog.refresh();
    }

    removeImage(index: number): void {
        const inline = this.catalog.image(index);
        const drawing = inline.parentNode;
        if (drawing) detach(drawing);
        this.catalog.refresh();
    }

    attachImage(index: number, image: ImageAttachment): number {
        const p = this.catalog.paragraph(index);
        const doc = this.pkg.document;

        const rId = this.pkg.addImage(image.data, image.ext);
        const id = nextDrawingId(doc);
        const drawing = buildInlineDrawing(doc, {
            rId,
            id,
            name: `Picture ${id}`,
            description: image.name,
            size: image.size,
        });
        const run = doc.createElement('w:r');
        run.appendChild(drawing);
        p.appendChild(run);

        this.catalog.refresh();
        const inline = findDirectChild(drawing, 'wp:inline');
        return inline ? this.catalog.indexOfImage(inline) : -1;
    }

    updateSettings(edit: (settings: Document) => boolean): boolean {
        return this.pkg.updateSettings(edit);
    }
}
