/**
 * Paragraph style lookup over word/styles.xml.
 *
 * Paragraphs reference styles by `w:styleId`; agents and outlines talk in
 * display names. StyleSheet maps between the two.
 */

import { findDirectChild, findDirectChildren } from './dom.js';

export interface StyleEntry {
    id: string;
    name: string;
    type: string;
}

/** Built-in styles whose stored name is lowercase. */
const BUILT_IN_ALIASES: Record<string, string> = {
    caption: 'Caption',
    header: 'Header',
    footer: 'Footer',
};

export function displayStyleName(rawName: string): string {
    const heading = /^heading ([1-9])$/.exec(rawName);
    if (heading) return `Heading ${heading[1]}`;
    return BUILT_IN_ALIASES[rawName] ?? rawName;
}

export class StyleSheet {
    private readonly byId = new Map<string, StyleEntry>();
    private readonly defaultParagraph: StyleEntry | null = null;

    constructor(stylesDoc: Document | null) {
        const root = stylesDoc?.documentElement;
        if (!root) return;

        for (const el of findDirectChildren(root, 'w:style')) {
            const id = el.getAttribute('w:styleId');
            if (!id) continue;
            const nameEl = findDirectChild(el, 'w:name');
            const entry: StyleEntry = {
                id,
                name: displayStyleName(nameEl?.getAttribute('w:val') ?? id),
                type: el.getAttribute('w:type') || 'paragraph',
            };
            this.byId.set(id, entry);

            const isDefault = el.getAttribute('w:default');
            if (entry.type === 'paragraph' && (isDefault === '1' || isDefault === 'true') && !this.defaultParagraph) {
                this.defaultParagraph = entry;
            }
        }
    }

    get isEmpty(): boolean {
        return this.byId.size === 0;
    }

    /**
     * Display name of the paragraph style referenced by `styleId`.
     * Missing or unknown ids resolve to the default paragraph style.
     */
    paragraphStyleName(styleId: string | null): string {
        const entry = styleId ? this.byId.get(styleId) : undefined;
        if (entry && entry.type === 'paragraph') return entry.name;
        return this.defaultParagraph?.name ?? 'Normal';
    }

    /**
     * Find a paragraph style by display name, case-insensitive name, or id.
     * Returns the style id, or null when nothing matches.
     */
    findParagraphStyle(name: string): string | null {
        const candidates = [...this.byId.values()].filter((s) => s.type === 'paragraph');

        const exact = candidates.find((s) => s.name === name);
        if (exact) return exact.id;

        const lower = name.toLowerCase();
        const loose = candidates.find((s) => s.name.toLowerCase() === lower);
        if (loose) return loose.id;

        const byId = candidates.find((s) => s.id === name);
        return byId ? byId.id : null;
    }
}

/**
 * Heading level of a paragraph: `Heading N` style names first, then a bare
 * numeric style id 1-9 (used by some localized templates).
 */
export function headingLevelOf(styleName: string, styleId: string | null): number | null {
    if (styleName.startsWith('Heading')) {
        const last = styleName.split(/\s+/).pop() ?? '';
        if (/^\d+$/.test(last) && Number(last) >= 1) return Number(last);
    }
    if (styleId && /^[1-9]$/.test(styleId)) return Number(styleId);
    return null;
}
