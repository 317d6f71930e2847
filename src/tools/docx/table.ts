/**
 * Table grid resolution and cell text.
 */

import { findDirectChild, findDirectChildren, getElementChildren, readNumberAttr } from './dom.js';
import { assertInRange, indexOutOfRange } from './errors.js';
import { createRun, getParagraphRuns, getParagraphText } from './paragraph.js';

export interface TableGrid {
    rows: number;
    cols: number;
    /** `cells[r][c]` is the w:tc covering grid position (r, c). */
    cells: Element[][];
}

function gridSpanOf(tc: Element): number {
    const tcPr = findDirectChild(tc, 'w:tcPr');
    const span = readNumberAttr(tcPr ? findDirectChild(tcPr, 'w:gridSpan') : null, 'w:val');
    return span !== null && span > 1 ? Math.trunc(span) : 1;
}

function isVerticalContinuation(tc: Element): boolean {
    const tcPr = findDirectChild(tc, 'w:tcPr');
    const vMerge = tcPr ? findDirectChild(tcPr, 'w:vMerge') : null;
    if (!vMerge) return false;
    const val = vMerge.getAttribute('w:val');
    return val !== 'restart';
}

/**
 * Expand the table into a position grid.
 *
 * Horizontally merged cells (w:gridSpan) occupy each column they span;
 * vertical continuation cells (w:vMerge without "restart") resolve to the
 * cell in the same column of the row above.
 */
export function buildTableGrid(tbl: Element): TableGrid {
    const cells: Element[][] = [];
    for (const tr of findDirectChildren(tbl, 'w:tr')) {
        const above = cells[cells.length - 1];
        const row: Element[] = [];
        for (const tc of findDirectChildren(tr, 'w:tc')) {
            const span = gridSpanOf(tc);
            for (let i = 0; i < span; i++) {
                const col = row.length;
                const owner = isVerticalContinuation(tc) ? above?.[col] ?? tc : tc;
                row.push(owner);
            }
        }
        cells.push(row);
    }
    return { rows: cells.length, cols: cells[0]?.length ?? 0, cells };
}

/** Range-checked access to the cell at (row, col). */
export function getGridCell(grid: TableGrid, row: number, col: number): Element {
    assertInRange('row', row, grid.rows);
    assertInRange('column', col, grid.cols);
    const cell = grid.cells[row]?.[col];
    if (!cell) throw indexOutOfRange('column', col, grid.cells[row]?.length ?? 0);
    return cell;
}

/** Cell text: its paragraphs joined by newlines. */
export function getCellText(tc: Element): string {
    return findDirectChildren(tc, 'w:p').map(getParagraphText).join('\n');
}

/**
 * Replace the cell content with a single paragraph holding `text`.
 * Cell properties, the first paragraph's pPr and the first run's rPr survive.
 */
export function setCellText(tc: Element, text: string): void {
    const doc = tc.ownerDocument;
    const firstP = findDirectChild(tc, 'w:p');
    const pPr = firstP ? findDirectChild(firstP, 'w:pPr') : null;
    const firstRun = firstP ? getParagraphRuns(firstP)[0] : undefined;
    const rPr = firstRun ? findDirectChild(firstRun, 'w:rPr') : null;

    for (const child of getElementChildren(tc)) {
        if (child.nodeName !== 'w:tcPr') tc.removeChild(child);
    }

    const p = doc.createElement('w:p');
    if (pPr) p.appendChild(pPr);
    const r = createRun(doc, text);
    if (rPr) r.insertBefore(rPr, r.firstChild);
    p.appendChild(r);
    tc.appendChild(p);
}

/** Trimmed first-cell text for table outlines. */
export function tablePreview(grid: TableGrid, limit: number): string {
    const first = grid.cells[0]?.[0];
    if (!first) return '';
    const text = getCellText(first).trim();
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
