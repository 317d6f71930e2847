/**
 * DOM utilities for DOCX XML manipulation.
 *
 * XML parsing, navigation and minimal element mutation on in-memory
 * nodes. No file I/O here.
 *
 * Uses @xmldom/xmldom for parsing and serialisation so that the
 * document-order of nodes is always preserved.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { DocxError, DocxErrorCode } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

export function parseXml(xmlStr: string): Document {
    return new DOMParser().parseFromString(xmlStr, 'application/xml');
}

export function serializeXml(doc: Document): string {
    return new XMLSerializer().serializeToString(doc);
}

/**
 * Parse a standalone XML fragment and import its root element into `doc`.
 * The fragment must declare every namespace prefix it uses.
 */
export function importFragment(doc: Document, fragmentXml: string): Element {
    const fragment = parseXml(fragmentXml);
    const root = fragment.documentElement;
    if (!root) {
        throw new DocxError('Malformed XML fragment', DocxErrorCode.INVALID_DOCX);
    }
    return doc.importNode(root, true);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: NodeListOf<T> | { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

export function isElement(node: Node | null): node is Element {
    return node !== null && node.nodeType === 1;
}

/** All element children of `parent`, in document order. */
export function getElementChildren(parent: Node): Element[] {
    return nodeListToArray(parent.childNodes).filter(isElement);
}

/** Find the first direct child element with the given nodeName. */
export function findDirectChild(parent: Element, nodeName: string): Element | null {
    for (const child of getElementChildren(parent)) {
        if (child.nodeName === nodeName) return child;
    }
    return null;
}

/** All direct child elements with the given nodeName. */
export function findDirectChildren(parent: Element, nodeName: string): Element[] {
    return getElementChildren(parent).filter((child) => child.nodeName === nodeName);
}

/** Descendant elements by qualified name, as a real array. */
export function findDescendants(parent: Element, nodeName: string): Element[] {
    return nodeListToArray(parent.getElementsByTagName(nodeName));
}

/**
 * Return the child `nodeName` of `parent`, creating it when absent.
 *
 * `order` is the schema sequence of the parent's children: a new element
 * is inserted before the first existing sibling that comes later in the
 * sequence, so the output stays schema-valid. Names missing from `order`
 * are appended.
 */
export function getOrCreateChild(
    parent: Element,
    nodeName: string,
    order: readonly string[] = [],
): Element {
    const existing = findDirectChild(parent, nodeName);
    if (existing) return existing;

    const created = parent.ownerDocument.createElement(nodeName);
    insertInOrder(parent, created, order);
    return created;
}

/** Insert `child` into `parent` respecting the schema sequence `order`. */
export function insertInOrder(parent: Element, child: Element, order: readonly string[]): void {
    const rank = order.indexOf(child.nodeName);
    if (rank >= 0) {
        for (const sibling of getElementChildren(parent)) {
            const siblingRank = order.indexOf(sibling.nodeName);
            if (siblingRank > rank) {
                parent.insertBefore(child, sibling);
                return;
            }
        }
    }
    parent.appendChild(child);
}

/** Insert `node` immediately after `ref` under the same parent. */
export function insertAfter(ref: Node, node: Node): void {
    const parent = ref.parentNode;
    if (!parent) throw new DocxError('Cannot insert next to a detached node', DocxErrorCode.INVALID_DOCX);
    if (ref.nextSibling) {
        parent.insertBefore(node, ref.nextSibling);
    } else {
        parent.appendChild(node);
    }
}

/** Detach `node` from its parent, if it has one. */
export function detach(node: Node): void {
    node.parentNode?.removeChild(node);
}

/**
 * Read an OOXML on/off property (w:b, w:i, …).
 * Returns null when the element is absent.
 */
export function readOnOff(parent: Element | null, nodeName: string): boolean | null {
    if (!parent) return null;
    const el = findDirectChild(parent, nodeName);
    if (!el) return null;
    const val = el.getAttribute('w:val');
    if (!val) return true;
    return !['0', 'false', 'off'].includes(val.toLowerCase());
}

/** Numeric attribute value, or null when absent or unparsable. */
export function readNumberAttr(el: Element | null, attr: string): number | null {
    if (!el) return null;
    const raw = el.getAttribute(attr);
    if (raw === null || raw === '') return null;
    const n = Number(raw);
    return Number.isFinite(n) ? n : null;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element {
    const body = doc.getElementsByTagName('w:body').item(0);
    if (!body) throw new DocxError('Invalid DOCX DOM: missing <w:body>', DocxErrorCode.INVALID_DOCX);
    return body;
}

/**
 * Return ALL direct element children of w:body **in document order**.
 * Includes w:p, w:tbl, w:sdt, w:sectPr, etc.
 */
export function getBodyChildren(body: Element): Element[] {
    return getElementChildren(body);
}

/**
 * Return the block-level children of the body with top-level structured
 * document tags (w:sdt / w:sdtContent) unwrapped, in document order.
 */
function getBodyBlocks(body: Element): Element[] {
    const blocks: Element[] = [];
    for (const child of getBodyChildren(body)) {
        if (child.nodeName === 'w:sdt') {
            const sdtContent = findDirectChild(child, 'w:sdtContent');
            if (sdtContent) blocks.push(...getElementChildren(sdtContent));
            continue;
        }
        blocks.push(child);
    }
    return blocks;
}

/** All block-level paragraphs of the body, including those wrapped in an SDT. */
export function getBodyParagraphs(body: Element): Element[] {
    return getBodyBlocks(body).filter((el) => el.nodeName === 'w:p');
}

/**
 * Return all top‑level tables that are logically in the body, including those
 * wrapped in structured document tags (w:sdt / w:sdtContent). Tables nested
 * inside other tables are not counted.
 */
export function getAllBodyTables(body: Element): Element[] {
    return getBodyBlocks(body).filter((el) => el.nodeName === 'w:tbl');
}
