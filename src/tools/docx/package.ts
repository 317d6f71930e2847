/**
 * DocxPackage: one opened .docx archive and its parsed XML parts.
 *
 * Parts are parsed on first access and written back into the zip only when
 * marked dirty, so untouched parts leave the archive byte-for-byte intact.
 */

import fs from 'fs/promises';
import path from 'path';
import type PizZip from 'pizzip';
import {
    DOCX_PATHS,
    NAMESPACES,
    RELATIONSHIP_TYPES,
    SETTINGS_CONTENT_TYPE,
} from './constants.js';
import { getBody, parseXml } from './dom.js';
import { DocxError, DocxErrorCode, withErrorContext } from './errors.js';
import {
    addRelationship,
    EMPTY_RELATIONSHIPS_XML,
    ensureDefaultContentType,
    ensureOverrideContentType,
    findRelationshipTarget,
} from './relationships.js';
import { StyleSheet } from './styles.js';
import { generateDocxBuffer, getDocumentXml, loadDocxZip, openDocxZip, readXmlPart, writeXmlPart } from './zip.js';

const EMPTY_SETTINGS_XML =
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<w:settings xmlns:w="${NAMESPACES.W}"></w:settings>`;

/** Zip path of a relationship target of word/document.xml. */
function resolveDocumentTarget(target: string): string {
    if (target.startsWith('/')) return target.slice(1);
    return path.posix.normalize(path.posix.join('word', target));
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

export class DocxPackage {
    readonly document: Document;
    readonly body: Element;
    readonly styles: StyleSheet;

    private readonly parts = new Map<string, Document>();
    private readonly dirty = new Set<string>();

    private constructor(
        private readonly zip: PizZip,
        readonly sourcePath: string | null,
    ) {
        this.document = parseXml(getDocumentXml(zip));
        this.body = getBody(this.document);
        this.parts.set(DOCX_PATHS.DOCUMENT_XML, this.document);
        this.styles = new StyleSheet(this.part(DOCX_PATHS.STYLES_XML));
    }

    static async load(filePath: string): Promise<DocxPackage> {
        if (!(await fileExists(filePath))) {
            throw new DocxError(`File not found: ${filePath}`, DocxErrorCode.FILE_NOT_FOUND, { path: filePath });
        }
        return withErrorContext(
            async () => new DocxPackage(await loadDocxZip(filePath), filePath),
            DocxErrorCode.DOCX_READ_FAILED,
            { path: filePath },
        );
    }

    static fromBuffer(buf: Buffer, sourcePath: string | null = null): DocxPackage {
        return new DocxPackage(openDocxZip(buf), sourcePath);
    }

    /** Parsed XML part, or null when the package has no such part. */
    part(partPath: string): Document | null {
        const cached = this.parts.get(partPath);
        if (cached) return cached;
        const doc = readXmlPart(this.zip, partPath);
        if (doc) this.parts.set(partPath, doc);
        return doc;
    }

    /** Parsed XML part, created from `initialXml` when missing. */
    private ensurePart(partPath: string, initialXml: string): Document {
        const existing = this.part(partPath);
        if (existing) return existing;
        const doc = parseXml(initialXml);
        this.parts.set(partPath, doc);
        this.markDirty(partPath);
        return doc;
    }

    markDirty(partPath: string): void {
        this.dirty.add(partPath);
    }

    hasMedia(fileName: string): boolean {
        return this.zip.file(`${DOCX_PATHS.MEDIA_FOLDER}/${fileName}`) !== null;
    }

    /**
     * Store `data` under word/media with the next free `imageN` name,
     * relate it from the main document, and register its extension.
     * Returns the relationship id.
     */
    addImage(data: Buffer, ext: string): string {
        let mediaIndex = 1;
        while (this.hasMedia(`image${mediaIndex}${ext}`)) {
            mediaIndex++;
        }
        const mediaFileName = `image${mediaIndex}${ext}`;
        this.zip.file(`${DOCX_PATHS.MEDIA_FOLDER}/${mediaFileName}`, data);

        const rels = this.ensurePart(DOCX_PATHS.DOCUMENT_RELS, EMPTY_RELATIONSHIPS_XML);
        const rId = addRelationship(rels, RELATIONSHIP_TYPES.IMAGE, `media/${mediaFileName}`);
        this.markDirty(DOCX_PATHS.DOCUMENT_RELS);

        const contentTypes = this.part(DOCX_PATHS.CONTENT_TYPES);
        if (contentTypes) {
            ensureDefaultContentType(contentTypes, ext);
            this.markDirty(DOCX_PATHS.CONTENT_TYPES);
        }
        return rId;
    }

    /**
     * Run `edit` against the document settings part, creating the part, its
     * relationship and content-type override when the package has none.
     * The part is written back when `edit` reports a change.
     */
    updateSettings(edit: (settings: Document) => boolean): boolean {
        const rels = this.ensurePart(DOCX_PATHS.DOCUMENT_RELS, EMPTY_RELATIONSHIPS_XML);
        let target = findRelationshipTarget(rels, RELATIONSHIP_TYPES.SETTINGS);
        if (!target) {
            target = 'settings.xml';
            addRelationship(rels, RELATIONSHIP_TYPES.SETTINGS, target);
            this.markDirty(DOCX_PATHS.DOCUMENT_RELS);
            const contentTypes = this.part(DOCX_PATHS.CONTENT_TYPES);
            if (contentTypes) {
                ensureOverrideContentType(contentTypes, `/${DOCX_PATHS.SETTINGS_XML}`, SETTINGS_CONTENT_TYPE);
                this.markDirty(DOCX_PATHS.CONTENT_TYPES);
            }
        }

        const partPath = resolveDocumentTarget(target);
        const settings = this.ensurePart(partPath, EMPTY_SETTINGS_XML);
        const changed = edit(settings);
        if (changed) this.markDirty(partPath);
        return changed;
    }

    toBuffer(): Buffer {
        for (const partPath of this.dirty) {
            const doc = this.parts.get(partPath);
            if (doc) writeXmlPart(this.zip, partPath, doc);
        }
        this.dirty.clear();
        return generateDocxBuffer(this.zip);
    }

    async save(outputPath: string): Promise<void> {
        await withErrorContext(
            async () => {
                await fs.writeFile(outputPath, this.toBuffer());
            },
            DocxErrorCode.DOCX_SAVE_FAILED,
            { path: outputPath },
        );
    }
}
