/**
 * Paragraph and run primitives: text extraction, the emptiness guard,
 * and the single text-replacement routine every text-writing op shares.
 */

import {
    findDescendants,
    findDirectChild,
    getElementChildren,
    readNumberAttr,
    readOnOff,
} from './dom.js';
import { roundTo, twipsToCm } from './constants.js';
import type { ParagraphFormat, RunInfo, ParagraphAlignment } from './types.js';

/** Inline wrappers whose w:r children still belong to the paragraph. */
const RUN_CONTAINERS = new Set(['w:hyperlink', 'w:ins', 'w:smartTag']);

/** Run children that carry text. */
const TEXT_NODES = new Set(['w:t', 'w:tab', 'w:br', 'w:cr', 'w:noBreakHyphen']);

const EMBEDDED_NODES = ['w:drawing', 'w:pict', 'w:object'] as const;

// ═══════════════════════════════════════════════════════════════════════
// Runs & text
// ═══════════════════════════════════════════════════════════════════════

export function getParagraphRuns(p: Element): Element[] {
    const runs: Element[] = [];
    for (const child of getElementChildren(p)) {
        if (child.nodeName === 'w:r') {
            runs.push(child);
        } else if (RUN_CONTAINERS.has(child.nodeName)) {
            for (const inner of getElementChildren(child)) {
                if (inner.nodeName === 'w:r') runs.push(inner);
            }
        }
    }
    return runs;
}

export function getRunText(r: Element): string {
    let text = '';
    for (const child of getElementChildren(r)) {
        switch (child.nodeName) {
            case 'w:t':
                text += child.textContent ?? '';
                break;
            case 'w:tab':
                text += '\t';
                break;
            case 'w:br':
            case 'w:cr':
                text += '\n';
                break;
            case 'w:noBreakHyphen':
                text += '-';
                break;
        }
    }
    return text;
}

export function getParagraphText(p: Element): string {
    return getParagraphRuns(p).map(getRunText).join('');
}

// ═══════════════════════════════════════════════════════════════════════
// Guard
// ═══════════════════════════════════════════════════════════════════════

export function hasEmbeddedContent(p: Element): boolean {
    return EMBEDDED_NODES.some((name) => findDescendants(p, name).length > 0);
}

function hasChartContent(p: Element): boolean {
    return findDescendants(p, '*').some(
        (el) => el.nodeName.toLowerCase().includes('chart') || (el.namespaceURI ?? '').includes('chart'),
    );
}

/**
 * True when deleting `p` loses nothing: no visible text and no drawing,
 * picture, OLE object or chart anywhere inside it.
 */
export function isTrulyEmpty(p: Element): boolean {
    if (getParagraphText(p).trim() !== '') return false;
    if (hasEmbeddedContent(p)) return false;
    return !hasChartContent(p);
}

// ═══════════════════════════════════════════════════════════════════════
// Writing text
// ═══════════════════════════════════════════════════════════════════════

/** Build the run children for `text`, mapping tabs and newlines. */
function buildTextNodes(doc: Document, text: string): Element[] {
    const nodes: Element[] = [];
    for (const part of text.split(/(\t|\n)/)) {
        if (part === '') continue;
        if (part === '\t') {
            nodes.push(doc.createElement('w:tab'));
        } else if (part === '\n') {
            nodes.push(doc.createElement('w:br'));
        } else {
            const t = doc.createElement('w:t');
            t.setAttribute('xml:space', 'preserve');
            t.appendChild(doc.createTextNode(part));
            nodes.push(t);
        }
    }
    return nodes;
}

function clearRunText(r: Element): Node | null {
    const textNodes = getElementChildren(r).filter((el) => TEXT_NODES.has(el.nodeName));
    const last = textNodes[textNodes.length - 1];
    const anchor = last ? last.nextSibling : null;
    for (const node of textNodes) r.removeChild(node);
    return anchor;
}

/** Replace the text of run `r`, keeping its rPr and any non-text children. */
export function setRunText(r: Element, text: string): void {
    const anchor = clearRunText(r);
    for (const node of buildTextNodes(r.ownerDocument, text)) {
        if (anchor && anchor.parentNode === r) {
            r.insertBefore(node, anchor);
        } else {
            r.appendChild(node);
        }
    }
}

export function createRun(doc: Document, text: string): Element {
    const r = doc.createElement('w:r');
    for (const node of buildTextNodes(doc, text)) r.appendChild(node);
    return r;
}

/**
 * Replace the whole text of `p` with `text`.
 *
 * The first run receives the text and keeps its formatting; later runs are
 * emptied but stay in place with their properties and embedded content.
 * A paragraph without runs gets a new one.
 */
export function setParagraphText(p: Element, text: string): void {
    const runs = getParagraphRuns(p);
    const [first, ...rest] = runs;
    if (!first) {
        p.appendChild(createRun(p.ownerDocument, text));
        return;
    }
    setRunText(first, text);
    for (const r of rest) clearRunText(r);
}

// ═══════════════════════════════════════════════════════════════════════
// Properties
// ═══════════════════════════════════════════════════════════════════════

export function getParagraphProperties(p: Element): Element | null {
    return findDirectChild(p, 'w:pPr');
}

/** Return the paragraph's w:pPr, creating it as the first child if absent. */
export function getOrCreateParagraphProperties(p: Element): Element {
    const existing = getParagraphProperties(p);
    if (existing) return existing;
    const pPr = p.ownerDocument.createElement('w:pPr');
    p.insertBefore(pPr, p.firstChild);
    return pPr;
}

/** Return the run's w:rPr, creating it as the first child if absent. */
export function getOrCreateRunProperties(r: Element): Element {
    const existing = findDirectChild(r, 'w:rPr');
    if (existing) return existing;
    const rPr = r.ownerDocument.createElement('w:rPr');
    r.insertBefore(rPr, r.firstChild);
    return rPr;
}

export function getParagraphStyleId(p: Element): string | null {
    const pPr = getParagraphProperties(p);
    const pStyle = pPr ? findDirectChild(pPr, 'w:pStyle') : null;
    return pStyle?.getAttribute('w:val') || null;
}

export function hasNumbering(p: Element): boolean {
    const pPr = getParagraphProperties(p);
    return pPr !== null && findDirectChild(pPr, 'w:numPr') !== null;
}

export function readRunInfo(r: Element): RunInfo {
    const rPr = findDirectChild(r, 'w:rPr');
    const info: RunInfo = {
        text: getRunText(r),
        bold: readOnOff(rPr, 'w:b'),
        italic: readOnOff(rPr, 'w:i'),
    };
    const halfPoints = readNumberAttr(rPr ? findDirectChild(rPr, 'w:sz') : null, 'w:val');
    if (halfPoints !== null) info.font_size = halfPoints / 2;
    return info;
}

function readAlignment(pPr: Element | null): ParagraphAlignment | null {
    const jc = pPr ? findDirectChild(pPr, 'w:jc') : null;
    switch (jc?.getAttribute('w:val')) {
        case 'left':
        case 'start':
            return 'left';
        case 'right':
        case 'end':
            return 'right';
        case 'center':
            return 'center';
        case 'both':
            return 'justify';
        default:
            return null;
    }
}

function readLineSpacing(pPr: Element | null): number | null {
    const spacing = pPr ? findDirectChild(pPr, 'w:spacing') : null;
    const line = readNumberAttr(spacing, 'w:line');
    if (spacing === null || line === null) return null;
    const rule = spacing.getAttribute('w:lineRule');
    if (!rule || rule === 'auto') return roundTo(line / 240, 2);
    return roundTo(line / 20, 2);
}

export function readParagraphFormat(p: Element): ParagraphFormat {
    const pPr = getParagraphProperties(p);
    const format: ParagraphFormat = {
        alignment: readAlignment(pPr),
        line_spacing: readLineSpacing(pPr),
    };

    const ind = pPr ? findDirectChild(pPr, 'w:ind') : null;
    const firstLine = readNumberAttr(ind, 'w:firstLine');
    const hanging = readNumberAttr(ind, 'w:hanging');
    const left = readNumberAttr(ind, 'w:left') ?? readNumberAttr(ind, 'w:start');

    const firstLineTwips = hanging !== null && hanging !== 0 ? -hanging : firstLine;
    if (firstLineTwips) format.first_line_indent = twipsToCm(firstLineTwips);
    if (left) format.left_indent = twipsToCm(left);
    return format;
}
