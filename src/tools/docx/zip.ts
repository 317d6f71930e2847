/**
 * Zip container I/O: file to archive, archive entry to XML and back.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';
import { parseXml, serializeXml } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { DOCX_PATHS } from './constants.js';

/**
 * Read a .docx file from disk and return a PizZip instance.
 */
export async function loadDocxZip(filePath: string): Promise<PizZip> {
    const buf = await fs.readFile(filePath);
    return openDocxZip(buf);
}

/** Open an in-memory .docx archive; throws if it is not a zip. */
export function openDocxZip(buf: Buffer): PizZip {
    try {
        return new PizZip(buf);
    } catch (error) {
        throw new DocxError(
            `Invalid DOCX: not a zip archive (${error instanceof Error ? error.message : String(error)})`,
            DocxErrorCode.INVALID_DOCX,
        );
    }
}

/**
 * Extract the raw XML string from word/document.xml inside the zip.
 * Throws if the entry is missing.
 */
export function getDocumentXml(zip: PizZip): string {
    const entry = zip.file(DOCX_PATHS.DOCUMENT_XML);
    if (!entry) {
        throw new DocxError('Invalid DOCX: missing word/document.xml', DocxErrorCode.INVALID_DOCX);
    }
    return entry.asText();
}

/** Parse an XML part of the package, or return null when it does not exist. */
export function readXmlPart(zip: PizZip, partPath: string): Document | null {
    const entry = zip.file(partPath);
    return entry ? parseXml(entry.asText()) : null;
}

/** Serialize `doc` back into the part at `partPath`. */
export function writeXmlPart(zip: PizZip, partPath: string, doc: Document): void {
    zip.file(partPath, serializeXml(doc));
}

export function generateDocxBuffer(zip: PizZip): Buffer {
    const out: unknown = zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
    if (!Buffer.isBuffer(out)) {
        throw new DocxError('Zip generation did not produce a buffer', DocxErrorCode.DOCX_SAVE_FAILED);
    }
    return out;
}
