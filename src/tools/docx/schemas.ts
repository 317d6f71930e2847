/**
 * Operation schemas for batchUpdate.
 *
 * Wire field names stay snake_case (`index`, `table_index`, `image_index`)
 * because agents address operations with those keys. Defaults are applied
 * here so handlers receive fully populated records.
 */

import { z } from 'zod';

const paragraphIndex = z.number().int();
const tableIndex = z.number().int();
const cellIndex = z.number().int();
const lengthCm = z.number().finite();

export const IndentSchema = z.object({
    first_line: lengthCm.optional(),
    left: lengthCm.optional(),
    right: lengthCm.optional(),
});

export const SpacingSchema = z.object({
    before: z.number().finite().optional(),
    after: z.number().finite().optional(),
    line: z.number().finite().positive().optional(),
});

export const FontSchema = z.object({
    name: z.string().min(1).optional(),
    size: z.number().finite().positive().optional(),
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
});

// ─── Paragraph operations ───────────────────────────────────────────

export const DeleteOpSchema = z.object({
    op: z.literal('delete'),
    index: paragraphIndex,
    force: z.boolean().default(false),
});

export const InsertOpSchema = z.object({
    op: z.literal('insert'),
    index: paragraphIndex,
    position: z.enum(['before', 'after']).default('after'),
    text: z.string().default(''),
    style: z.string().optional(),
});

export const UpdateStyleOpSchema = z.object({
    op: z.literal('update_style'),
    index: paragraphIndex,
    style: z.string().optional(),
    font: FontSchema.optional(),
    alignment: z.string().optional(),
    indent: IndentSchema.optional(),
    spacing: SpacingSchema.optional(),
});

export const ReplaceTextOpSchema = z.object({
    op: z.literal('replace_text'),
    index: paragraphIndex,
    pattern: z.string(),
    replacement: z.string().default(''),
    regex: z.boolean().default(true),
});

export const ReplaceTextGlobalOpSchema = z.object({
    op: z.literal('replace_text_global'),
    pattern: z.string(),
    replacement: z.string().default(''),
    regex: z.boolean().default(false),
});

export const CleanXmlOpSchema = z.object({
    op: z.literal('clean_xml'),
    index: paragraphIndex,
    remove: z.array(z.string().regex(/^[A-Za-z][\w.-]*$/, 'element name without prefix')).default([]),
    style: z.string().optional(),
    indent: IndentSchema.optional(),
});

export const SetTextOpSchema = z.object({
    op: z.literal('set_text'),
    index: paragraphIndex,
    text: z.string().default(''),
});

// ─── Table operations ───────────────────────────────────────────────

export const UpdateTableCellOpSchema = z.object({
    op: z.literal('update_table_cell'),
    table_index: tableIndex,
    row: cellIndex,
    col: cellIndex,
    text: z.string().default(''),
});

export const ReplaceTableCellOpSchema = z.object({
    op: z.literal('replace_table_cell'),
    table_index: tableIndex,
    row: cellIndex,
    col: cellIndex,
    pattern: z.string(),
    replacement: z.string().default(''),
    regex: z.boolean().default(false),
});

export const UpdateTableRowOpSchema = z.object({
    op: z.literal('update_table_row'),
    table_index: tableIndex,
    row: cellIndex,
    texts: z.array(z.string()).default([]),
});

export const UpdateTableColOpSchema = z.object({
    op: z.literal('update_table_col'),
    table_index: tableIndex,
    col: cellIndex,
    texts: z.array(z.string()).default([]),
});

// ─── Image operations ───────────────────────────────────────────────

export const DeleteImageOpSchema = z.object({
    op: z.literal('delete_image'),
    image_index: z.number().int(),
});

export const ResizeImageOpSchema = z.object({
    op: z.literal('resize_image'),
    image_index: z.number().int(),
    width: lengthCm.positive().optional(),
    height: lengthCm.positive().optional(),
});

export const InsertImageOpSchema = z.object({
    op: z.literal('insert_image'),
    index: paragraphIndex,
    path: z.string().min(1),
    width: lengthCm.positive().optional(),
    height: lengthCm.positive().optional(),
});

// ─── Document operations ────────────────────────────────────────────

export const UpdateFieldsOnOpenOpSchema = z.object({
    op: z.literal('update_fields_on_open'),
});

export const DocxOpSchema = z.discriminatedUnion('op', [
    DeleteOpSchema,
    InsertOpSchema,
    UpdateStyleOpSchema,
    ReplaceTextOpSchema,
    ReplaceTextGlobalOpSchema,
    CleanXmlOpSchema,
    SetTextOpSchema,
    UpdateTableCellOpSchema,
    ReplaceTableCellOpSchema,
    UpdateTableRowOpSchema,
    UpdateTableColOpSchema,
    DeleteImageOpSchema,
    ResizeImageOpSchema,
    InsertImageOpSchema,
    UpdateFieldsOnOpenOpSchema,
]);

export const OPERATION_KINDS: ReadonlySet<string> = new Set(DocxOpSchema.options.map((o) => o.shape.op.value));
