/**
 * DocxEditor: index-addressed reading and batch editing of one document.
 *
 * Owns the package, the index catalog and the edit scope operations run
 * against. One editor per document; instances are not meant to be shared
 * between concurrent callers.
 */

import fs from 'fs/promises';
import { batchUpdate } from './batch.js';
import { IndexCatalog } from './catalog.js';
import { DOCX_PATHS } from './constants.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { DocxPackage } from './package.js';
import { isTrulyEmpty } from './paragraph.js';
import { getImagesOutline, getOutline, getTablesOutline, readContent, readTable } from './read.js';
import { DocumentScope } from './scope.js';
import type {
    BatchReport,
    ContentSelector,
    DocumentOutline,
    ImageOutlineEntry,
    ParagraphRecord,
    TableData,
    TableOutlineEntry,
} from './types.js';
import { logger } from '../../utils/logger.js';

export interface DocxEditorOptions {
    /** Copy the previous file to `<file>.bak` before overwriting it. */
    backupOnSave?: boolean;
}

export class DocxEditor {
    private readonly catalog: IndexCatalog;
    private readonly scope: DocumentScope;

    private constructor(
        private readonly pkg: DocxPackage,
        private readonly options: DocxEditorOptions,
    ) {
        this.catalog = new IndexCatalog(pkg.body);
        this.scope = new DocumentScope(pkg, this.catalog);
    }

    static async open(filePath: string, options: DocxEditorOptions = {}): Promise<DocxEditor> {
        return new DocxEditor(await DocxPackage.load(filePath), options);
    }

    static fromBuffer(buf: Buffer, filePath: string | null = null, options: DocxEditorOptions = {}): DocxEditor {
        return new DocxEditor(DocxPackage.fromBuffer(buf, filePath), options);
    }

    get path(): string | null {
        return this.pkg.sourcePath;
    }

    get paragraphCount(): number {
        return this.catalog.paragraphCount;
    }

    // ─── Read accessors ──────────────────────────────────────────────

    getOutline(): DocumentOutline {
        return getOutline(this.catalog, this.pkg.styles);
    }

    readContent(selector: ContentSelector): ParagraphRecord[] {
        return readContent(this.catalog, this.pkg.styles, selector);
    }

    getTablesOutline(): TableOutlineEntry[] {
        return getTablesOutline(this.catalog);
    }

    readTable(tableIndex: number): TableData {
        return readTable(this.catalog, tableIndex);
    }

    getImagesOutline(): ImageOutlineEntry[] {
        return getImagesOutline(this.catalog);
    }

    isTrulyEmpty(index: number): boolean {
        return isTrulyEmpty(this.catalog.paragraph(index));
    }

    // ─── Mutation ────────────────────────────────────────────────────

    batchUpdate(operations: readonly unknown[]): BatchReport {
        const report = batchUpdate(this.scope, operations);
        if (report.success > 0) this.pkg.markDirty(DOCX_PATHS.DOCUMENT_XML);
        return report;
    }

    // ─── Persistence ─────────────────────────────────────────────────

    toBuffer(): Buffer {
        return this.pkg.toBuffer();
    }

    /** Save to `outputPath`, or over the source file when omitted. */
    async save(outputPath?: string): Promise<string> {
        const target = outputPath ?? this.pkg.sourcePath;
        if (!target) {
            throw new DocxError('No output path given and the document has no source file', DocxErrorCode.DOCX_SAVE_FAILED);
        }
        if (this.options.backupOnSave && target === this.pkg.sourcePath) {
            const backupPath = `${target}.bak`;
            await fs.copyFile(target, backupPath);
            logger.debug(`Backup written to ${backupPath}`);
        }
        await this.pkg.save(target);
        logger.info(`Saved ${target}`);
        return target;
    }
}
