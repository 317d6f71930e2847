/**
 * Read accessors over an IndexCatalog.
 * Outlines, paragraph records, table grids and image listings. Nothing here
 * mutates the document.
 */

import type { IndexCatalog } from './catalog.js';
import { emuToCm, OUTLINE_TEXT_LIMIT, TABLE_PREVIEW_LIMIT } from './constants.js';
import { inlineDescription, inlineShapeType, readExtent } from './image.js';
import {
    getParagraphRuns,
    getParagraphStyleId,
    getParagraphText,
    hasEmbeddedContent,
    hasNumbering,
    isTrulyEmpty,
    readParagraphFormat,
    readRunInfo,
} from './paragraph.js';
import { headingLevelOf, type StyleSheet } from './styles.js';
import { buildTableGrid, getCellText, tablePreview } from './table.js';
import type {
    ContentSelector,
    DocumentOutline,
    ImageOutlineEntry,
    OutlineHeading,
    ParagraphRecord,
    TableData,
    TableOutlineEntry,
} from './types.js';
import { logger } from '../../utils/logger.js';

function headingLevel(p: Element, styles: StyleSheet): number | null {
    const styleId = getParagraphStyleId(p);
    return headingLevelOf(styles.paragraphStyleName(styleId), styleId);
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraphs
// ═══════════════════════════════════════════════════════════════════════

/** Heading paragraphs only; no run or format records are built. */
export function getOutline(catalog: IndexCatalog, styles: StyleSheet): DocumentOutline {
    const headings: OutlineHeading[] = [];
    catalog.allParagraphs().forEach((p, index) => {
        const level = headingLevel(p, styles);
        if (level === null) return;
        const text = getParagraphText(p).trim();
        if (!text) return;
        headings.push({ index, level, text: text.slice(0, OUTLINE_TEXT_LIMIT) });
    });
    return { total: catalog.paragraphCount, headings };
}

export function buildParagraphRecord(p: Element, index: number, styles: StyleSheet): ParagraphRecord {
    const text = getParagraphText(p);
    const styleId = getParagraphStyleId(p);
    const style = styles.paragraphStyleName(styleId);
    const level = headingLevelOf(style, styleId);
    return {
        index,
        text,
        style,
        is_heading: level !== null,
        heading_level: level,
        is_empty: text.trim() === '',
        is_truly_empty: isTrulyEmpty(p),
        has_embedded: hasEmbeddedContent(p),
        runs: getParagraphRuns(p).map(readRunInfo),
        format: readParagraphFormat(p),
        xml: {
            has_numPr: hasNumbering(p),
            style_name: style,
        },
    };
}

/**
 * Paragraph indices of the section headed by the first heading containing
 * `title`: that heading up to the next heading of the same or higher rank.
 */
function sectionIndices(catalog: IndexCatalog, styles: StyleSheet, title: string): number[] {
    const paragraphs = catalog.allParagraphs();
    let start = -1;
    let startLevel = 0;
    for (let i = 0; i < paragraphs.length; i++) {
        const p = paragraphs[i];
        if (!p) continue;
        const level = headingLevel(p, styles);
        if (level !== null && getParagraphText(p).includes(title)) {
            start = i;
            startLevel = level;
            break;
        }
    }
    if (start < 0) return [];

    let end = paragraphs.length;
    for (let i = start + 1; i < paragraphs.length; i++) {
        const p = paragraphs[i];
        if (!p) continue;
        const level = headingLevel(p, styles);
        if (level !== null && level <= startLevel) {
            end = i;
            break;
        }
    }
    return range(start, end);
}

function range(start: number, end: number): number[] {
    const out: number[] = [];
    for (let i = start; i < end; i++) out.push(i);
    return out;
}

export function resolveSelector(catalog: IndexCatalog, styles: StyleSheet, selector: ContentSelector): number[] {
    if (typeof selector === 'number') return [selector];
    if (typeof selector === 'string') return sectionIndices(catalog, styles, selector);
    if ('start' in selector) {
        return range(Math.max(selector.start, 0), Math.min(selector.end, catalog.paragraphCount));
    }
    return [...selector];
}

/** Full records for the selected paragraphs; out-of-range indices are skipped. */
export function readContent(
    catalog: IndexCatalog,
    styles: StyleSheet,
    selector: ContentSelector,
): ParagraphRecord[] {
    const paragraphs = catalog.allParagraphs();
    const records: ParagraphRecord[] = [];
    for (const index of resolveSelector(catalog, styles, selector)) {
        const p = Number.isInteger(index) && index >= 0 ? paragraphs[index] : undefined;
        if (p) records.push(buildParagraphRecord(p, index, styles));
    }
    return records;
}

// ═══════════════════════════════════════════════════════════════════════
// Tables
// ═══════════════════════════════════════════════════════════════════════

export function getTablesOutline(catalog: IndexCatalog): TableOutlineEntry[] {
    return catalog.allTables().map((tbl, table_index) => {
        const grid = buildTableGrid(tbl);
        let preview = '';
        try {
            preview = tablePreview(grid, TABLE_PREVIEW_LIMIT);
        } catch (error) {
            logger.debug(`Table ${table_index}: first cell unreadable`, error);
        }
        return { table_index, rows: grid.rows, cols: grid.cols, preview };
    });
}

export function readTable(catalog: IndexCatalog, tableIndex: number): TableData {
    const grid = buildTableGrid(catalog.table(tableIndex));
    return {
        table_index: tableIndex,
        rows: grid.rows,
        cols: grid.cols,
        data: grid.cells.map((row) => row.map(getCellText)),
    };
}

// ═══════════════════════════════════════════════════════════════════════
// Images
// ═══════════════════════════════════════════════════════════════════════

export function getImagesOutline(catalog: IndexCatalog): ImageOutlineEntry[] {
    return catalog.allImages().map((inline, image_index) => {
        const { cx, cy } = readExtent(inline);
        return {
            image_index,
            type: inlineShapeType(inline),
            width_cm: cx ? emuToCm(cx) : null,
            height_cm: cy ? emuToCm(cy) : null,
            description: inlineDescription(inline),
        };
    });
}
