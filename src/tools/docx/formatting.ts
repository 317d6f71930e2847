/**
 * Direct paragraph and run formatting.
 *
 * Every setter creates missing property elements in schema order
 * (PPR_CHILD_ORDER / RPR_CHILD_ORDER) so Word keeps opening the file.
 */

import { cmToTwips, PPR_CHILD_ORDER, RPR_CHILD_ORDER } from './constants.js';
import { detach, findDirectChildren, getOrCreateChild } from './dom.js';
import {
    getOrCreateParagraphProperties,
    getOrCreateRunProperties,
    getParagraphProperties,
} from './paragraph.js';
import type { FontSpec, IndentSpec, SpacingSpec } from './types.js';

const ALIGNMENT_VALUES: Record<string, string> = {
    left: 'left',
    center: 'center',
    right: 'right',
    justify: 'both',
};

export function setParagraphStyle(p: Element, styleId: string): void {
    const pPr = getOrCreateParagraphProperties(p);
    getOrCreateChild(pPr, 'w:pStyle', PPR_CHILD_ORDER).setAttribute('w:val', styleId);
}

/**
 * Set w:jc from a case-insensitive left/center/right/justify.
 * Any other value removes the paragraph's own alignment.
 */
export function setAlignment(p: Element, alignment: string): void {
    const value = ALIGNMENT_VALUES[alignment.toLowerCase()];
    if (value === undefined) {
        const pPr = getParagraphProperties(p);
        if (pPr) findDirectChildren(pPr, 'w:jc').forEach(detach);
        return;
    }
    const pPr = getOrCreateParagraphProperties(p);
    getOrCreateChild(pPr, 'w:jc', PPR_CHILD_ORDER).setAttribute('w:val', value);
}

/** Indents in cm. A negative first line becomes a hanging indent. */
export function setIndent(p: Element, indent: IndentSpec): void {
    if (indent.first_line === undefined && indent.left === undefined && indent.right === undefined) return;

    const pPr = getOrCreateParagraphProperties(p);
    const ind = getOrCreateChild(pPr, 'w:ind', PPR_CHILD_ORDER);

    if (indent.first_line !== undefined) {
        const twips = cmToTwips(indent.first_line);
        ind.removeAttribute('w:firstLine');
        ind.removeAttribute('w:hanging');
        if (twips < 0) {
            ind.setAttribute('w:hanging', String(-twips));
        } else {
            ind.setAttribute('w:firstLine', String(twips));
        }
    }
    if (indent.left !== undefined) {
        ind.removeAttribute('w:start');
        ind.setAttribute('w:left', String(cmToTwips(indent.left)));
    }
    if (indent.right !== undefined) {
        ind.removeAttribute('w:end');
        ind.setAttribute('w:right', String(cmToTwips(indent.right)));
    }
}

/** before/after in points, line as a multiple of single spacing. */
export function setSpacing(p: Element, spacing: SpacingSpec): void {
    if (spacing.before === undefined && spacing.after === undefined && spacing.line === undefined) return;

    const pPr = getOrCreateParagraphProperties(p);
    const el = getOrCreateChild(pPr, 'w:spacing', PPR_CHILD_ORDER);

    if (spacing.before !== undefined) {
        el.removeAttribute('w:beforeAutospacing');
        el.setAttribute('w:before', String(Math.round(spacing.before * 20)));
    }
    if (spacing.after !== undefined) {
        el.removeAttribute('w:afterAutospacing');
        el.setAttribute('w:after', String(Math.round(spacing.after * 20)));
    }
    if (spacing.line !== undefined) {
        el.setAttribute('w:line', String(Math.round(spacing.line * 240)));
        el.setAttribute('w:lineRule', 'auto');
    }
}

function setOnOff(rPr: Element, nodeName: string, on: boolean): void {
    const el = getOrCreateChild(rPr, nodeName, RPR_CHILD_ORDER);
    if (on) {
        el.removeAttribute('w:val');
    } else {
        el.setAttribute('w:val', '0');
    }
}

/** Apply `font` to each run. `name` covers Latin and East Asian text. */
export function applyFont(runs: Element[], font: FontSpec): void {
    for (const r of runs) {
        const rPr = getOrCreateRunProperties(r);
        if (font.name !== undefined) {
            const rFonts = getOrCreateChild(rPr, 'w:rFonts', RPR_CHILD_ORDER);
            rFonts.setAttribute('w:ascii', font.name);
            rFonts.setAttribute('w:hAnsi', font.name);
            rFonts.setAttribute('w:eastAsia', font.name);
        }
        if (font.size !== undefined) {
            const halfPoints = String(Math.round(font.size * 2));
            getOrCreateChild(rPr, 'w:sz', RPR_CHILD_ORDER).setAttribute('w:val', halfPoints);
            getOrCreateChild(rPr, 'w:szCs', RPR_CHILD_ORDER).setAttribute('w:val', halfPoints);
        }
        if (font.bold !== undefined) setOnOff(rPr, 'w:b', font.bold);
        if (font.italic !== undefined) setOnOff(rPr, 'w:i', font.italic);
    }
}

/** Remove every `w:<name>` child of the paragraph's pPr. Returns how many went. */
export function removeParagraphProperties(p: Element, names: readonly string[]): number {
    const pPr = getParagraphProperties(p);
    if (!pPr) return 0;
    let removed = 0;
    for (const name of names) {
        for (const el of findDirectChildren(pPr, `w:${name}`)) {
            detach(el);
            removed++;
        }
    }
    return removed;
}
