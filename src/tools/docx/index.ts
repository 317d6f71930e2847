/**
 * DOCX index editor public API.
 *
 * Re-exports only the symbols that external consumers need.
 * Internal modules (dom, catalog, scope, ops) are consumed by sibling
 * files and are NOT part of the public surface.
 *
 * @module docx
 */

// ── Editor ──────────────────────────────────────────────────────────────────
export { DocxEditor } from './editor.js';
export type { DocxEditorOptions } from './editor.js';

// ── Operations ──────────────────────────────────────────────────────────────
export { DocxOpSchema } from './schemas.js';
export { orderOperations, parseOperation } from './batch.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  BatchReport,
  ContentSelector,
  DocumentOutline,
  DocxOp,
  DocxOpInput,
  ImageOutlineEntry,
  OpDetail,
  ParagraphRecord,
  TableData,
  TableOutlineEntry,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode } from './errors.js';
