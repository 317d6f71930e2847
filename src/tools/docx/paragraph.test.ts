/**
 * Paragraph primitives: text extraction, the emptiness guard, text
 * replacement and format reading.
 */

import { describe, it, expect } from 'vitest';
import { findDescendants, findDirectChild, getBodyParagraphs } from './dom.js';
import {
    getParagraphRuns,
    getParagraphText,
    hasEmbeddedContent,
    isTrulyEmpty,
    readParagraphFormat,
    readRunInfo,
    setParagraphText,
} from './paragraph.js';
import { parseBody, pictureParagraph } from './test-utils/docx-fixtures.js';

function firstParagraph(xml: string): Element {
    const p = getBodyParagraphs(parseBody(xml))[0];
    if (!p) throw new Error('fixture has no paragraph');
    return p;
}

function firstRun(p: Element): Element {
    const r = getParagraphRuns(p)[0];
    if (!r) throw new Error('paragraph has no run');
    return r;
}

describe('getParagraphText', () => {
    it('joins runs, including runs inside hyperlinks', () => {
        const p = firstParagraph(
            '<w:p><w:r><w:t>Hello</w:t></w:r>' +
                '<w:hyperlink r:id="rId5"><w:r><w:t xml:space="preserve"> link</w:t></w:r></w:hyperlink>' +
                '<w:r><w:tab/><w:t>x</w:t><w:br/><w:t>y</w:t></w:r></w:p>',
        );
        expect(getParagraphRuns(p)).toHaveLength(3);
        expect(getParagraphText(p)).toBe('Hello link\tx\ny');
    });
});

describe('isTrulyEmpty', () => {
    it('accepts a paragraph with no runs', () => {
        expect(isTrulyEmpty(firstParagraph('<w:p/>'))).toBe(true);
    });

    it('accepts whitespace-only text', () => {
        expect(isTrulyEmpty(firstParagraph('<w:p><w:r><w:t xml:space="preserve">   </w:t></w:r></w:p>'))).toBe(true);
    });

    it('rejects text', () => {
        expect(isTrulyEmpty(firstParagraph('<w:p><w:r><w:t>a</w:t></w:r></w:p>'))).toBe(false);
    });

    it('rejects a picture-only paragraph', () => {
        const p = firstParagraph(pictureParagraph(3600000, 1800000));
        expect(getParagraphText(p)).toBe('');
        expect(hasEmbeddedContent(p)).toBe(true);
        expect(isTrulyEmpty(p)).toBe(false);
    });

    it('rejects VML pictures', () => {
        expect(isTrulyEmpty(firstParagraph('<w:p><w:r><w:pict/></w:r></w:p>'))).toBe(false);
    });

    it('rejects chart content outside a drawing', () => {
        const p = firstParagraph('<w:p><w:r><c:chart r:id="rId3"/></w:r></w:p>');
        expect(hasEmbeddedContent(p)).toBe(false);
        expect(isTrulyEmpty(p)).toBe(false);
    });
});

describe('setParagraphText', () => {
    it('writes into the first run and keeps its formatting and later drawings', () => {
        const p = firstParagraph(
            '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t>Old</w:t></w:r>' +
                '<w:r><w:t>tail</w:t></w:r>' +
                '<w:r><w:drawing/></w:r></w:p>',
        );
        setParagraphText(p, 'New text');

        expect(getParagraphText(p)).toBe('New text');
        expect(getParagraphRuns(p)).toHaveLength(3);
        expect(readRunInfo(firstRun(p)).bold).toBe(true);
        expect(findDescendants(p, 'w:drawing')).toHaveLength(1);
    });

    it('maps tabs and newlines to run elements', () => {
        const p = firstParagraph('<w:p><w:r><w:t>x</w:t></w:r></w:p>');
        setParagraphText(p, 'a\tb\nc');

        const run = firstRun(p);
        expect(findDescendants(run, 'w:tab')).toHaveLength(1);
        expect(findDescendants(run, 'w:br')).toHaveLength(1);
        expect(getParagraphText(p)).toBe('a\tb\nc');
    });

    it('creates a run in a paragraph that has none', () => {
        const p = firstParagraph('<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr></w:p>');
        setParagraphText(p, 'Hi');

        expect(getParagraphRuns(p)).toHaveLength(1);
        expect(getParagraphText(p)).toBe('Hi');
        expect(findDirectChild(p, 'w:pPr')).not.toBeNull();
    });
});

describe('readRunInfo', () => {
    it('reports on/off properties and font size in points', () => {
        const p = firstParagraph(
            '<w:p><w:r><w:rPr><w:b/><w:i w:val="0"/><w:sz w:val="28"/></w:rPr><w:t>t</w:t></w:r></w:p>',
        );
        expect(readRunInfo(firstRun(p))).toEqual({ text: 't', bold: true, italic: false, font_size: 14 });
    });

    it('reports null when a property is unset', () => {
        const p = firstParagraph('<w:p><w:r><w:t>t</w:t></w:r></w:p>');
        expect(readRunInfo(firstRun(p))).toEqual({ text: 't', bold: null, italic: null });
    });
});

describe('readParagraphFormat', () => {
    it('reads justified alignment, auto line spacing and a left indent', () => {
        const p = firstParagraph(
            '<w:p><w:pPr><w:spacing w:line="360" w:lineRule="auto"/>' +
                '<w:ind w:left="720" w:firstLine="0"/><w:jc w:val="both"/></w:pPr></w:p>',
        );
        expect(readParagraphFormat(p)).toEqual({ alignment: 'justify', line_spacing: 1.5, left_indent: 1.27 });
    });

    it('reads exact spacing in points and a hanging indent as negative first line', () => {
        const p = firstParagraph(
            '<w:p><w:pPr><w:spacing w:line="240" w:lineRule="exact"/><w:ind w:hanging="567"/></w:pPr></w:p>',
        );
        expect(readParagraphFormat(p)).toEqual({ alignment: null, line_spacing: 12, first_line_indent: -1 });
    });

    it('returns nulls for a bare paragraph', () => {
        expect(readParagraphFormat(firstParagraph('<w:p/>'))).toEqual({ alignment: null, line_spacing: null });
    });
});
