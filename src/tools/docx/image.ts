/**
 * Inline shapes: discovery, size, and the w:drawing markup for new pictures.
 */

import { GRAPHIC_DATA_URIS, NAMESPACES } from './constants.js';
import { findDescendants, findDirectChild, importFragment, readNumberAttr } from './dom.js';
import type { InlineShapeType } from './types.js';

/** Inline shapes in document order: wp:inline in a w:drawing held by a w:r. */
export function collectInlineShapes(body: Element): Element[] {
    return findDescendants(body, 'wp:inline').filter((inline) => {
        const drawing = inline.parentNode;
        return drawing !== null && drawing.nodeName === 'w:drawing' && drawing.parentNode?.nodeName === 'w:r';
    });
}

export function inlineShapeType(inline: Element): InlineShapeType {
    const graphicData = findDescendants(inline, 'a:graphicData')[0];
    const uri = graphicData?.getAttribute('uri') ?? '';
    switch (uri) {
        case GRAPHIC_DATA_URIS.PICTURE: {
            const blip = findDescendants(inline, 'a:blip')[0];
            return blip?.hasAttribute('r:link') ? 'linked_picture' : 'picture';
        }
        case GRAPHIC_DATA_URIS.CHART:
            return 'chart';
        case GRAPHIC_DATA_URIS.DIAGRAM:
            return 'smart_art';
        default:
            return 'other';
    }
}

export interface Extent {
    cx: number;
    cy: number;
}

export function readExtent(inline: Element): Extent {
    const extent = findDirectChild(inline, 'wp:extent');
    return {
        cx: readNumberAttr(extent, 'cx') ?? 0,
        cy: readNumberAttr(extent, 'cy') ?? 0,
    };
}

/** Set the displayed size, keeping the picture's own transform in step. */
export function writeExtent(inline: Element, size: Extent): void {
    const doc = inline.ownerDocument;
    let extent = findDirectChild(inline, 'wp:extent');
    if (!extent) {
        extent = doc.createElement('wp:extent');
        inline.insertBefore(extent, inline.firstChild);
    }
    extent.setAttribute('cx', String(size.cx));
    extent.setAttribute('cy', String(size.cy));

    for (const spPr of findDescendants(inline, 'pic:spPr')) {
        const xfrm = findDirectChild(spPr, 'a:xfrm');
        const ext = xfrm ? findDirectChild(xfrm, 'a:ext') : null;
        if (!ext) continue;
        ext.setAttribute('cx', String(size.cx));
        ext.setAttribute('cy', String(size.cy));
    }
}

export function inlineDescription(inline: Element): string {
    const docPr = findDirectChild(inline, 'wp:docPr');
    return docPr?.getAttribute('descr') ?? '';
}

/** Next free drawing object id; wp:docPr ids must be unique per document. */
export function nextDrawingId(doc: Document): number {
    let max = 0;
    for (const docPr of findDescendants(doc.documentElement, 'wp:docPr')) {
        const id = readNumberAttr(docPr, 'id');
        if (id !== null && id > max) max = id;
    }
    return max + 1;
}

function escapeXmlAttr(s: string): string {
    return s
        .replace(/&/g, '&amp;')
        .replace(/"/g, '&quot;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

export interface DrawingSpec {
    rId: string;
    id: number;
    name: string;
    description: string;
    size: Extent;
}

/** Build an inline w:drawing referencing the embedded image `rId`. */
export function buildInlineDrawing(doc: Document, drawing: DrawingSpec): Element {
    const { cx, cy } = drawing.size;
    const name = escapeXmlAttr(drawing.name);
    const descr = escapeXmlAttr(drawing.description);
    return importFragment(
        doc,
        `<w:drawing xmlns:w="${NAMESPACES.W}">` +
            `<wp:inline distT="0" distB="0" distL="0" distR="0" xmlns:wp="${NAMESPACES.WP}">` +
            `<wp:extent cx="${cx}" cy="${cy}"/>` +
            `<wp:docPr id="${drawing.id}" name="${name}" descr="${descr}"/>` +
            `<a:graphic xmlns:a="${NAMESPACES.A}">` +
            `<a:graphicData uri="${GRAPHIC_DATA_URIS.PICTURE}">` +
            `<pic:pic xmlns:pic="${NAMESPACES.PIC}">` +
            `<pic:nvPicPr><pic:cNvPr id="0" name="${name}" descr="${descr}"/><pic:cNvPicPr/></pic:nvPicPr>` +
            `<pic:blipFill>` +
            `<a:blip r:embed="${drawing.rId}" xmlns:r="${NAMESPACES.R}"/>` +
            `<a:stretch><a:fillRect/></a:stretch>` +
            `</pic:blipFill>` +
            `<pic:spPr>` +
            `<a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm>` +
            `<a:prstGeom prst="rect"><a:avLst/></a:prstGeom>` +
            `</pic:spPr>` +
            `</pic:pic>` +
            `</a:graphicData>` +
            `</a:graphic>` +
            `</wp:inline>` +
            `</w:drawing>`,
    );
}
