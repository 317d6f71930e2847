/**
 * batchUpdate: execution order, failure isolation and every operation kind.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { orderOperations, parseOperation } from './batch.js';
import { DocxEditor } from './editor.js';
import {
    buildDocx,
    entryText,
    makeTempDir,
    p,
    pictureParagraph,
    pngHeader,
    removeTempDir,
    table,
} from './test-utils/docx-fixtures.js';

function editorFor(paragraphs: string[], extra = ''): DocxEditor {
    return DocxEditor.fromBuffer(buildDocx({ body: paragraphs.join('') + extra }));
}

function texts(editor: DocxEditor): string[] {
    return editor.readContent({ start: 0, end: editor.paragraphCount }).map((r) => r.text);
}

const EIGHT = ['P0', 'P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7'].map((t) => p(t));

describe('orderOperations', () => {
    it('runs indexed operations highest first, ties and unindexed in submission order', () => {
        const ordered = orderOperations([
            { op: 'a' },
            { op: 'b', index: 1 },
            { op: 'c', index: 5 },
            { op: 'd', index: 1 },
            { op: 'e' },
        ]);
        expect(ordered.map((o) => o.op)).toEqual(['c', 'b', 'd', 'a', 'e']);
    });
});

describe('parseOperation', () => {
    it('applies defaults', () => {
        expect(parseOperation({ op: 'delete', index: 2 })).toEqual({ op: 'delete', index: 2, force: false });
        expect(parseOperation({ op: 'insert', index: 0 })).toEqual({
            op: 'insert',
            index: 0,
            position: 'after',
            text: '',
        });
        expect(parseOperation({ op: 'replace_text', index: 0, pattern: 'a' })).toEqual({
            op: 'replace_text',
            index: 0,
            pattern: 'a',
            replacement: '',
            regex: true,
        });
    });

    it('rejects unknown and malformed operations', () => {
        expect(() => parseOperation({ op: 'frobnicate' })).toThrow('Unknown operation type: frobnicate');
        expect(() => parseOperation({ index: 1 })).toThrow('Unknown operation type: (none)');
        expect(() => parseOperation({ op: 'delete' })).toThrow('Invalid delete operation: index: Required');
    });
});

describe('batchUpdate ordering and isolation', () => {
    it('keeps indices stable across deletes and inserts in one batch', () => {
        const editor = editorFor(EIGHT);
        const report = editor.batchUpdate([
            { op: 'delete', index: 5, force: true },
            { op: 'delete', index: 2, force: true },
            { op: 'insert', index: 2, position: 'before', text: 'X' },
        ]);

        expect(report).toEqual({
            success: 3,
            failed: 0,
            details: [
                { op: 'delete', index: 5, status: 'ok' },
                { op: 'delete', index: 2, status: 'ok' },
                { op: 'insert', index: 2, status: 'ok', new_index: 2 },
            ],
        });
        expect(texts(editor)).toEqual(['P0', 'P1', 'X', 'P3', 'P4', 'P6', 'P7']);
    });

    it('isolates a failing operation from the rest of the batch', () => {
        const editor = editorFor(EIGHT);
        const report = editor.batchUpdate([
            { op: 'set_text', index: 1, text: 'one' },
            { op: 'set_text', index: 50, text: 'x' },
            { op: 'set_text', index: 0, text: 'zero' },
        ]);

        expect(report.success).toBe(2);
        expect(report.failed).toBe(1);
        expect(report.details[0]).toEqual({
            op: 'set_text',
            index: 50,
            status: 'error',
            error: 'paragraph index out of range: 50 (valid range 0..7)',
        });
        expect(texts(editor).slice(0, 2)).toEqual(['zero', 'one']);
    });

    it('reports unknown and invalid operations without throwing', () => {
        const editor = editorFor(EIGHT);
        const report = editor.batchUpdate([{ op: 'frobnicate' }, { op: 'delete' }, 42]);

        expect(report).toEqual({
            success: 0,
            failed: 3,
            details: [
                { op: 'frobnicate', index: null, status: 'error', error: 'Unknown operation type: frobnicate' },
                { op: 'delete', index: null, status: 'error', error: 'Invalid delete operation: index: Required' },
                { op: 'unknown', index: null, status: 'error', error: 'Unknown operation type: (none)' },
            ],
        });
        expect(editor.paragraphCount).toBe(8);
    });
});

describe('paragraph operations', () => {
    it('refuses to delete a paragraph holding a picture unless forced', () => {
        const editor = editorFor([p('a'), '<w:p/>', pictureParagraph(3600000, 1800000), p('b')]);

        const refused = editor.batchUpdate([{ op: 'delete', index: 2 }]);
        expect(refused.details[0]?.error).toBe(
            'Paragraph 2 is not truly empty (text or embedded content); pass force to delete it',
        );
        expect(editor.paragraphCount).toBe(4);
        expect(editor.getImagesOutline()).toHaveLength(1);

        expect(editor.batchUpdate([{ op: 'delete', index: 1 }]).success).toBe(1);
        expect(editor.batchUpdate([{ op: 'delete', index: 1, force: true }]).success).toBe(1);
        expect(editor.paragraphCount).toBe(2);
        expect(editor.getImagesOutline()).toEqual([]);
    });

    it('inserts styled paragraphs and ignores unknown style names', () => {
        const editor = editorFor([p('Intro', 'Heading1'), p('Body')]);
        const report = editor.batchUpdate([
            { op: 'insert', index: 1, text: 'New', style: 'Heading 2' },
            { op: 'insert', index: 0, position: 'before', text: 'Lead', style: 'Nope' },
        ]);

        expect(report.details.map((d) => d.new_index)).toEqual([2, 0]);
        expect(texts(editor)).toEqual(['Lead', 'Intro', 'Body', 'New']);

        const [lead, , , added] = editor.readContent([0, 1, 2, 3]);
        expect(lead?.style).toBe('Normal');
        expect(added?.style).toBe('Heading 2');
        expect(added?.heading_level).toBe(2);
    });

    it('applies style, alignment, indent, spacing and font', () => {
        const editor = editorFor([p('Title', 'Heading1'), p('Body one')]);
        editor.batchUpdate([
            {
                op: 'update_style',
                index: 1,
                style: 'Body Text',
                alignment: 'CENTER',
                indent: { first_line: -1, left: 2 },
                spacing: { before: 6, after: 12, line: 1.5 },
                font: { name: 'Arial', size: 14, bold: true, italic: false },
            },
        ]);

        const [record] = editor.readContent(1);
        expect(record?.style).toBe('Body Text');
        expect(record?.format).toEqual({
            alignment: 'center',
            line_spacing: 1.5,
            first_line_indent: -1,
            left_indent: 2,
        });
        expect(record?.runs).toEqual([{ text: 'Body one', bold: true, italic: false, font_size: 14 }]);

        editor.batchUpdate([{ op: 'update_style', index: 1, alignment: 'diagonal' }]);
        expect(editor.readContent(1)[0]?.format.alignment).toBeNull();
    });

    it('replaces with regular expressions inside one paragraph', () => {
        const editor = editorFor([p('Title'), p('Body one'), p('Final')]);
        const report = editor.batchUpdate([
            { op: 'replace_text', index: 1, pattern: '(\\w+) one', replacement: '$1 two' },
            { op: 'replace_text', index: 2, pattern: 'zzz', replacement: 'y' },
        ]);

        expect(report.details).toEqual([
            { op: 'replace_text', index: 2, status: 'ok', changed: false },
            { op: 'replace_text', index: 1, status: 'ok', changed: true },
        ]);
        expect(texts(editor)).toEqual(['Title', 'Body two', 'Final']);
    });

    it('replaces literally across the document by default', () => {
        const editor = editorFor(
            ['foo a', 'b foo foo', 'plain 1', 'foo', 'plain 2', 'x.y', 'w1', 'w2', 'w3', 'w4'].map((t) => p(t)),
        );
        const first = editor.batchUpdate([{ op: 'replace_text_global', pattern: 'foo', replacement: 'bar' }]);
        expect(first.details[0]?.replaced_count).toBe(3);

        const second = editor.batchUpdate([{ op: 'replace_text_global', pattern: '.', replacement: '!' }]);
        expect(second.details[0]?.replaced_count).toBe(1);

        const third = editor.batchUpdate([
            { op: 'replace_text_global', pattern: '^plain (\\d)$', replacement: 'n$1', regex: true },
        ]);
        expect(third.details[0]?.replaced_count).toBe(2);

        expect(texts(editor)).toEqual(['bar a', 'b bar bar', 'n1', 'bar', 'n2', 'x!y', 'w1', 'w2', 'w3', 'w4']);
    });

    it('sets text and strips paragraph properties', () => {
        const list =
            '<w:p><w:pPr><w:pStyle w:val="Caption"/><w:numPr><w:ilvl w:val="0"/><w:numId w:val="1"/></w:numPr>' +
            '<w:ind w:left="720"/></w:pPr><w:r><w:t>item</w:t></w:r></w:p>';
        const editor = editorFor([p('x'), list]);
        const report = editor.batchUpdate([
            { op: 'clean_xml', index: 1, remove: ['numPr', 'ind'], style: 'Normal' },
            { op: 'set_text', index: 0, text: 'replaced' },
        ]);

        expect(report.success).toBe(2);
        const [first, second] = editor.readContent([0, 1]);
        expect(first?.text).toBe('replaced');
        expect(second?.xml).toEqual({ has_numPr: false, style_name: 'Normal' });
        expect(second?.format).toEqual({ alignment: null, line_spacing: null });
    });

    it('validates clean_xml element names', () => {
        const editor = editorFor([p('x')]);
        const report = editor.batchUpdate([{ op: 'clean_xml', index: 0, remove: ['w:numPr'] }]);
        expect(report.details[0]?.error).toBe('Invalid clean_xml operation: remove.0: element name without prefix');
    });
});

describe('table operations', () => {
    it('writes cells, rows and columns by grid position', () => {
        const editor = editorFor(
            [p('Intro')],
            table([
                ['h1', 'h2', 'h3'],
                ['r1', 'r2', 'r3'],
            ]),
        );
        const report = editor.batchUpdate([
            { op: 'update_table_row', table_index: 0, row: 0, texts: ['a', 'b', 'c', 'extra'] },
            { op: 'update_table_col', table_index: 0, col: 2, texts: ['x', 'y', 'z'] },
            { op: 'update_table_cell', table_index: 0, row: 1, col: 0, text: 'q' },
            { op: 'replace_table_cell', table_index: 0, row: 1, col: 1, pattern: 'r', replacement: 'R' },
            { op: 'update_table_cell', table_index: 0, row: 5, col: 0, text: 'z' },
        ]);

        expect(report.success).toBe(4);
        expect(report.details[3]?.changed).toBe(true);
        expect(report.details[4]).toEqual({
            op: 'update_table_cell',
            index: null,
            status: 'error',
            table_index: 0,
            row: 5,
            col: 0,
            error: 'row index out of range: 5 (valid range 0..1)',
        });
        expect(editor.readTable(0).data).toEqual([
            ['a', 'b', 'x'],
            ['q', 'R2', 'y'],
        ]);
        expect(editor.paragraphCount).toBe(1);
    });

    it('drops pictures from the image index when their cell is rewritten', () => {
        const withPicture =
            `<w:tbl><w:tr><w:tc>${pictureParagraph(3600000, 1800000, 'InCell')}</w:tc>` +
            `<w:tc>${p('b')}</w:tc></w:tr></w:tbl>`;
        const editor = editorFor([p('Intro')], withPicture);
        expect(editor.getImagesOutline()).toHaveLength(1);

        const report = editor.batchUpdate([{ op: 'update_table_cell', table_index: 0, row: 0, col: 0, text: 'text' }]);
        expect(report.success).toBe(1);
        expect(editor.getImagesOutline()).toEqual([]);
        expect(editor.readTable(0).data).toEqual([['text', 'b']]);

        const again = editor.batchUpdate([{ op: 'delete_image', image_index: 0 }]);
        expect(again.details[0]?.error).toBe('image index out of range: 0 (none present)');
    });

    it('rejects an unknown table', () => {
        const editor = editorFor([p('Intro')]);
        const report = editor.batchUpdate([{ op: 'update_table_cell', table_index: 3, row: 0, col: 0, text: 'x' }]);
        expect(report.details[0]?.error).toBe('table index out of range: 3 (none present)');
    });
});

describe('image operations', () => {
    const IMAGE_DOC = [p('Title'), p('Body'), '<w:p/>', pictureParagraph(3600000, 1800000, 'Chart')];

    it('resizes keeping the aspect ratio when one side is given', () => {
        const editor = editorFor(IMAGE_DOC);
        editor.batchUpdate([{ op: 'resize_image', image_index: 0, width: 5 }]);
        expect(editor.getImagesOutline()[0]).toMatchObject({ width_cm: 5, height_cm: 2.5 });
        expect(entryText(editor.toBuffer(), 'word/document.xml')).toContain('<a:ext cx="1800000" cy="900000"/>');

        editor.batchUpdate([{ op: 'resize_image', image_index: 0, height: 2 }]);
        expect(editor.getImagesOutline()[0]).toMatchObject({ width_cm: 4, height_cm: 2 });

        editor.batchUpdate([{ op: 'resize_image', image_index: 0, width: 3, height: 3 }]);
        expect(editor.getImagesOutline()[0]).toMatchObject({ width_cm: 3, height_cm: 3 });
    });

    it('scales 1:1 when the current size is zero', () => {
        const editor = editorFor([pictureParagraph(0, 0, 'Blank'), pictureParagraph(3600000, 0, 'Flat')]);
        const report = editor.batchUpdate([
            { op: 'resize_image', image_index: 0, width: 2 },
            { op: 'resize_image', image_index: 1, height: 1 },
        ]);

        expect(report.success).toBe(2);
        expect(editor.getImagesOutline().map((i) => [i.width_cm, i.height_cm])).toEqual([
            [2, 2],
            [1, 1],
        ]);
    });

    it('deletes an image and leaves its paragraph in place', () => {
        const editor = editorFor(IMAGE_DOC);
        const report = editor.batchUpdate([
            { op: 'delete_image', image_index: 0 },
            { op: 'delete_image', image_index: 4 },
        ]);

        expect(report.details[1]?.error).toBe('image index out of range: 4 (none present)');
        expect(editor.getImagesOutline()).toEqual([]);
        expect(editor.paragraphCount).toBe(4);
        expect(editor.isTrulyEmpty(3)).toBe(true);
    });

    describe('insert_image', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = makeTempDir();
        });

        afterEach(() => {
            removeTempDir(tmpDir);
        });

        it('appends a picture sized from the image header', () => {
            const imagePath = path.join(tmpDir, 'dot.png');
            fs.writeFileSync(imagePath, pngHeader(4, 2));

            const editor = editorFor(IMAGE_DOC);
            const report = editor.batchUpdate([{ op: 'insert_image', index: 1, path: imagePath, width: 4 }]);

            expect(report.details[0]).toEqual({ op: 'insert_image', index: 1, status: 'ok', new_image_index: 0 });
            expect(editor.getImagesOutline()).toEqual([
                { image_index: 0, type: 'picture', width_cm: 4, height_cm: 2, description: 'dot.png' },
                { image_index: 1, type: 'picture', width_cm: 10, height_cm: 5, description: 'Chart' },
            ]);

            const buf = editor.toBuffer();
            expect(entryText(buf, 'word/media/image1.png')).not.toBeNull();
            expect(entryText(buf, 'word/_rels/document.xml.rels')).toContain('Target="media/image1.png"');
            expect(entryText(buf, '[Content_Types].xml')).toContain('Extension="png"');
        });

        it('fails for a missing image file', () => {
            const missing = path.join(tmpDir, 'missing.png');
            const editor = editorFor(IMAGE_DOC);
            const report = editor.batchUpdate([{ op: 'insert_image', index: 1, path: missing }]);
            expect(report.details[0]?.error).toBe(`Image file not found: ${missing}`);
            expect(editor.getImagesOutline()).toHaveLength(1);
        });
    });
});

describe('update_fields_on_open', () => {
    it('creates the settings part once', () => {
        const editor = editorFor([p('x')]);
        const report = editor.batchUpdate([{ op: 'update_fields_on_open' }, { op: 'update_fields_on_open' }]);
        expect(report.success).toBe(2);

        const buf = editor.toBuffer();
        const settings = entryText(buf, 'word/settings.xml') ?? '';
        expect(settings.match(/<w:updateFields /g)).toHaveLength(1);
        expect(settings).toContain('<w:updateFields w:val="true"/>');
        expect(entryText(buf, 'word/_rels/document.xml.rels')).toContain('Target="settings.xml"');
        expect(entryText(buf, '[Content_Types].xml')).toContain('PartName="/word/settings.xml"');
    });

    it('fixes an existing setting in schema order and drops duplicates', () => {
        const settingsXml =
            `<w:settings xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">` +
            `<w:zoom w:percent="100"/><w:updateFields w:val="false"/><w:updateFields w:val="false"/><w:compat/>` +
            `</w:settings>`;
        const editor = DocxEditor.fromBuffer(buildDocx({ body: p('x'), settings: settingsXml }));
        editor.batchUpdate([{ op: 'update_fields_on_open' }]);

        expect(entryText(editor.toBuffer(), 'word/settings.xml')).toContain(
            '<w:zoom w:percent="100"/><w:updateFields w:val="true"/><w:compat/>',
        );
    });
});
