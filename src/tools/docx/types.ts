/**
 * Type definitions for the DOCX index editor.
 * Single source of truth for every type used across the module.
 */

import type { z } from 'zod';
import type {
    CleanXmlOpSchema,
    DeleteImageOpSchema,
    DeleteOpSchema,
    DocxOpSchema,
    FontSchema,
    IndentSchema,
    InsertImageOpSchema,
    InsertOpSchema,
    ReplaceTableCellOpSchema,
    ReplaceTextGlobalOpSchema,
    ReplaceTextOpSchema,
    ResizeImageOpSchema,
    SetTextOpSchema,
    SpacingSchema,
    UpdateFieldsOnOpenOpSchema,
    UpdateStyleOpSchema,
    UpdateTableCellOpSchema,
    UpdateTableColOpSchema,
    UpdateTableRowOpSchema,
} from './schemas.js';

// ═══════════════════════════════════════════════════════════════════════
// Read path
// ═══════════════════════════════════════════════════════════════════════

export type ParagraphAlignment = 'left' | 'center' | 'right' | 'justify';

export interface RunInfo {
    text: string;
    bold: boolean | null;
    italic: boolean | null;
    /** Points; absent when the run inherits its size. */
    font_size?: number;
}

export interface ParagraphFormat {
    alignment: ParagraphAlignment | null;
    /** Multiple for auto spacing, points for exact / at-least. */
    line_spacing: number | null;
    /** cm, negative for a hanging indent */
    first_line_indent?: number;
    left_indent?: number;
}

export interface ParagraphRecord {
    index: number;
    text: string;
    style: string;
    is_heading: boolean;
    heading_level: number | null;
    is_empty: boolean;
    is_truly_empty: boolean;
    has_embedded: boolean;
    runs: RunInfo[];
    format: ParagraphFormat;
    xml: {
        has_numPr: boolean;
        style_name: string;
    };
}

export interface OutlineHeading {
    index: number;
    level: number;
    text: string;
}

export interface DocumentOutline {
    total: number;
    headings: OutlineHeading[];
}

/** Index, index list, half-open range, or section heading title. */
export type ContentSelector = number | readonly number[] | { start: number; end: number } | string;

export interface TableOutlineEntry {
    table_index: number;
    rows: number;
    cols: number;
    preview: string;
}

export interface TableData {
    table_index: number;
    rows: number;
    cols: number;
    data: string[][];
}

export type InlineShapeType = 'picture' | 'linked_picture' | 'chart' | 'smart_art' | 'other';

export interface ImageOutlineEntry {
    image_index: number;
    type: InlineShapeType;
    width_cm: number | null;
    height_cm: number | null;
    description: string;
}

// ═══════════════════════════════════════════════════════════════════════
// Operations
// ═══════════════════════════════════════════════════════════════════════

export type FontSpec = z.output<typeof FontSchema>;
export type IndentSpec = z.output<typeof IndentSchema>;
export type SpacingSpec = z.output<typeof SpacingSchema>;

export type DeleteOp = z.output<typeof DeleteOpSchema>;
export type InsertOp = z.output<typeof InsertOpSchema>;
export type UpdateStyleOp = z.output<typeof UpdateStyleOpSchema>;
export type ReplaceTextOp = z.output<typeof ReplaceTextOpSchema>;
export type ReplaceTextGlobalOp = z.output<typeof ReplaceTextGlobalOpSchema>;
export type CleanXmlOp = z.output<typeof CleanXmlOpSchema>;
export type SetTextOp = z.output<typeof SetTextOpSchema>;
export type UpdateTableCellOp = z.output<typeof UpdateTableCellOpSchema>;
export type ReplaceTableCellOp = z.output<typeof ReplaceTableCellOpSchema>;
export type UpdateTableRowOp = z.output<typeof UpdateTableRowOpSchema>;
export type UpdateTableColOp = z.output<typeof UpdateTableColOpSchema>;
export type DeleteImageOp = z.output<typeof DeleteImageOpSchema>;
export type ResizeImageOp = z.output<typeof ResizeImageOpSchema>;
export type InsertImageOp = z.output<typeof InsertImageOpSchema>;
export type UpdateFieldsOnOpenOp = z.output<typeof UpdateFieldsOnOpenOpSchema>;

/** Discriminated union of every operation, after defaults are applied. */
export type DocxOp = z.output<typeof DocxOpSchema>;

/** Operation as submitted by a caller, before validation. */
export type DocxOpInput = z.input<typeof DocxOpSchema>;

/** Data an op handler reports back on success. */
export interface OpOutcome {
    new_index?: number;
    changed?: boolean;
    replaced_count?: number;
    new_image_index?: number;
}

export interface OpDetail extends OpOutcome {
    op: string;
    index: number | null;
    status: 'ok' | 'error';
    error?: string;
    table_index?: number;
    row?: number;
    col?: number;
    image_index?: number;
}

export interface BatchReport {
    success: number;
    failed: number;
    details: OpDetail[];
}
