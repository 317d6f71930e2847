/**
 * Entries in word/_rels/document.xml.rels and [Content_Types].xml.
 *
 * Functions take the parsed part; DocxPackage owns loading and writing it.
 */

import { findDirectChildren } from './dom.js';
import { getMimeType, NAMESPACES } from './constants.js';

export const EMPTY_RELATIONSHIPS_XML =
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<Relationships xmlns="${NAMESPACES.RELS}"></Relationships>`;

function relationshipElements(rels: Document): Element[] {
    return findDirectChildren(rels.documentElement, 'Relationship');
}

/**
 * Append a relationship and return its new id (one past the highest
 * existing `rIdN`).
 */
export function addRelationship(rels: Document, type: string, target: string): string {
    let maxId = 0;
    for (const rel of relationshipElements(rels)) {
        const match = /^rId(\d+)$/.exec(rel.getAttribute('Id') ?? '');
        if (match?.[1]) {
            maxId = Math.max(maxId, parseInt(match[1], 10));
        }
    }

    const newRId = `rId${maxId + 1}`;
    const rel = rels.createElementNS(NAMESPACES.RELS, 'Relationship');
    rel.setAttribute('Id', newRId);
    rel.setAttribute('Type', type);
    rel.setAttribute('Target', target);
    rels.documentElement.appendChild(rel);
    return newRId;
}

/** Target of the first relationship of `type`, or null. */
export function findRelationshipTarget(rels: Document, type: string): string | null {
    const rel = relationshipElements(rels).find((el) => el.getAttribute('Type') === type);
    return rel?.getAttribute('Target') ?? null;
}

/**
 * Ensure [Content_Types].xml has a Default entry for the file extension.
 */
export function ensureDefaultContentType(contentTypes: Document, ext: string): void {
    const extNoDot = ext.replace(/^\./, '').toLowerCase();
    const types = contentTypes.documentElement;
    const present = findDirectChildren(types, 'Default').some(
        (el) => (el.getAttribute('Extension') ?? '').toLowerCase() === extNoDot,
    );
    if (present) return;

    const defaultEl = contentTypes.createElementNS(NAMESPACES.CONTENT_TYPES, 'Default');
    defaultEl.setAttribute('Extension', extNoDot);
    defaultEl.setAttribute('ContentType', getMimeType(`.${extNoDot}`));
    types.appendChild(defaultEl);
}

/** Ensure an Override entry exists for `partName` (leading slash). */
export function ensureOverrideContentType(contentTypes: Document, partName: string, contentType: string): void {
    const types = contentTypes.documentElement;
    const present = findDirectChildren(types, 'Override').some((el) => el.getAttribute('PartName') === partName);
    if (present) return;

    const override = contentTypes.createElementNS(NAMESPACES.CONTENT_TYPES, 'Override');
    override.setAttribute('PartName', partName);
    override.setAttribute('ContentType', contentType);
    types.appendChild(override);
}
