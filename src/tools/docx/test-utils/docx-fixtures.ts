/**
 * In-memory .docx fixtures for tests: small XML strings zipped with PizZip.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import PizZip from 'pizzip';
import { GRAPHIC_DATA_URIS, NAMESPACES } from '../constants.js';
import { getBody, parseXml } from '../dom.js';
import { generateDocxBuffer } from '../zip.js';

const ROOT_NAMESPACES =
    `xmlns:w="${NAMESPACES.W}" xmlns:wp="${NAMESPACES.WP}" xmlns:a="${NAMESPACES.A}" ` +
    `xmlns:pic="${NAMESPACES.PIC}" xmlns:r="${NAMESPACES.R}" xmlns:c="${GRAPHIC_DATA_URIS.CHART}"`;

export const STYLES_XML =
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<w:styles xmlns:w="${NAMESPACES.W}">` +
    `<w:style w:type="paragraph" w:default="1" w:styleId="Normal"><w:name w:val="Normal"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="Heading1"><w:name w:val="heading 1"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="Heading2"><w:name w:val="heading 2"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="Caption"><w:name w:val="caption"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="BodyText"><w:name w:val="Body Text"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="2"><w:name w:val="Kop 2"/></w:style>` +
    `<w:style w:type="character" w:styleId="Strong"><w:name w:val="Strong"/></w:style>` +
    `</w:styles>`;

function escapeXml(s: string): string {
    return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** `<w:p>` with an optional style id and a single run. */
export function p(text: string, styleId?: string): string {
    const pPr = styleId ? `<w:pPr><w:pStyle w:val="${styleId}"/></w:pPr>` : '';
    const run = text ? `<w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>` : '';
    return `<w:p>${pPr}${run}</w:p>`;
}

/** An inline picture drawing of the given EMU size. */
export function drawing(cx: number, cy: number, description = ''): string {
    return (
        `<w:drawing><wp:inline>` +
        `<wp:extent cx="${cx}" cy="${cy}"/>` +
        `<wp:docPr id="1" name="Picture 1" descr="${description}"/>` +
        `<a:graphic><a:graphicData uri="${GRAPHIC_DATA_URIS.PICTURE}"><pic:pic>` +
        `<pic:blipFill><a:blip r:embed="rId9"/></pic:blipFill>` +
        `<pic:spPr><a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm></pic:spPr>` +
        `</pic:pic></a:graphicData></a:graphic>` +
        `</wp:inline></w:drawing>`
    );
}

/** A paragraph holding only an inline picture. */
export function pictureParagraph(cx: number, cy: number, description = ''): string {
    return `<w:p><w:r>${drawing(cx, cy, description)}</w:r></w:p>`;
}

/** A plain table, one paragraph per cell. */
export function table(rows: string[][]): string {
    const trs = rows
        .map((row) => `<w:tr>${row.map((cell) => `<w:tc>${p(cell)}</w:tc>`).join('')}</w:tr>`)
        .join('');
    return `<w:tbl>${trs}</w:tbl>`;
}

export function documentXml(bodyXml: string): string {
    return (
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
        `<w:document ${ROOT_NAMESPACES}><w:body>${bodyXml}<w:sectPr/></w:body></w:document>`
    );
}

/** Parse body XML and return the w:body element. */
export function parseBody(bodyXml: string): Element {
    return getBody(parseXml(documentXml(bodyXml)));
}

export interface DocxFixture {
    body: string;
    styles?: string | null;
    settings?: string | null;
}

export function buildDocx({ body, styles = STYLES_XML, settings = null }: DocxFixture): Buffer {
    const zip = new PizZip();
    const overrides = [
        `<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>`,
    ];
    const rels: string[] = [];
    if (styles !== null) {
        zip.file('word/styles.xml', styles);
        rels.push(`<Relationship Id="rId1" Type="${NAMESPACES.R}/styles" Target="styles.xml"/>`);
        overrides.push(
            `<Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>`,
        );
    }
    if (settings !== null) {
        zip.file('word/settings.xml', settings);
        rels.push(`<Relationship Id="rId2" Type="${NAMESPACES.R}/settings" Target="settings.xml"/>`);
        overrides.push(
            `<Override PartName="/word/settings.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml"/>`,
        );
    }

    zip.file(
        '[Content_Types].xml',
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
            `<Types xmlns="${NAMESPACES.CONTENT_TYPES}">` +
            `<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
            `<Default Extension="xml" ContentType="application/xml"/>` +
            overrides.join('') +
            `</Types>`,
    );
    zip.file(
        '_rels/.rels',
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
            `<Relationships xmlns="${NAMESPACES.RELS}">` +
            `<Relationship Id="rId1" Type="${NAMESPACES.R}/officeDocument" Target="word/document.xml"/>` +
            `</Relationships>`,
    );
    zip.file(
        'word/_rels/document.xml.rels',
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
            `<Relationships xmlns="${NAMESPACES.RELS}">${rels.join('')}</Relationships>`,
    );
    zip.file('word/document.xml', documentXml(body));
    return generateDocxBuffer(zip);
}

/** Text of an entry in a generated archive, or null when absent. */
export function entryText(buf: Buffer, entryPath: string): string | null {
    const entry = new PizZip(buf).file(entryPath);
    return entry ? entry.asText() : null;
}

/**
 * Minimal PNG header (signature + IHDR) declaring `width` x `height`.
 * Enough for dimension sniffing; not a decodable image.
 */
export function pngHeader(width: number, height: number): Buffer {
    const buf = Buffer.alloc(33);
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
    buf.writeUInt32BE(13, 8);
    buf.write('IHDR', 12, 'ascii');
    buf.writeUInt32BE(width, 16);
    buf.writeUInt32BE(height, 20);
    buf.writeUInt8(8, 24); // bit depth
    buf.writeUInt8(2, 25); // colour type: truecolour
    return buf;
}

export function makeTempDir(prefix = 'docx-index-editor-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
    if (fs.existsSync(dir)) fs.rmSync(dir, { recursive: true, force: true });
}
