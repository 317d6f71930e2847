import { configManager } from '../config-manager.js';
import { DocxEditor } from '../tools/docx/index.js';
import type { ContentSelector } from '../tools/docx/index.js';
import {
    DocxBatchUpdateArgsSchema,
    DocxImagesOutlineArgsSchema,
    DocxOutlineArgsSchema,
    DocxReadContentArgsSchema,
    DocxReadTableArgsSchema,
    DocxTablesOutlineArgsSchema,
} from '../tools/schemas.js';
import type { ServerResult } from '../types.js';

function jsonResult(value: unknown): ServerResult {
    return {
        content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    };
}

async function openEditor(filePath: string): Promise<DocxEditor> {
    const backupOnSave = await configManager.getValue('backupOnSave');
    return DocxEditor.open(filePath, { backupOnSave });
}

/**
 * Handle docx_outline command
 */
export async function handleDocxOutline(args: unknown): Promise<ServerResult> {
    const parsed = DocxOutlineArgsSchema.parse(args);
    const editor = await openEditor(parsed.path);
    return jsonResult(editor.getOutline());
}

/** Pick the selector from read_content arguments: section, then indices, then range. */
export function selectorFromArgs(args: {
    indices?: number[];
    start?: number;
    end?: number;
    section?: string;
}): ContentSelector {
    if (args.section !== undefined) return args.section;
    if (args.indices !== undefined) return args.indices;
    if (args.start !== undefined) return { start: args.start, end: args.end ?? args.start + 1 };
    throw new Error('Provide one of: indices, start/end, section');
}

/**
 * Handle docx_read_content command
 */
export async function handleDocxReadContent(args: unknown): Promise<ServerResult> {
    const parsed = DocxReadContentArgsSchema.parse(args);
    const selector = selectorFromArgs(parsed);
    const editor = await openEditor(parsed.path);
    return jsonResult(editor.readContent(selector));
}

/**
 * Handle docx_tables_outline command
 */
export async function handleDocxTablesOutline(args: unknown): Promise<ServerResult> {
    const parsed = DocxTablesOutlineArgsSchema.parse(args);
    const editor = await openEditor(parsed.path);
    return jsonResult(editor.getTablesOutline());
}

/**
 * Handle docx_read_table command
 */
export async function handleDocxReadTable(args: unknown): Promise<ServerResult> {
    const parsed = DocxReadTableArgsSchema.parse(args);
    const editor = await openEditor(parsed.path);
    return jsonResult(editor.readTable(parsed.table_index));
}

/**
 * Handle docx_images_outline command
 */
export async function handleDocxImagesOutline(args: unknown): Promise<ServerResult> {
    const parsed = DocxImagesOutlineArgsSchema.parse(args);
    const editor = await openEditor(parsed.path);
    return jsonResult(editor.getImagesOutline());
}

/**
 * Handle docx_batch_update command
 * Applies the batch, then saves to output_path or over the input.
 */
export async function handleDocxBatchUpdate(args: unknown): Promise<ServerResult> {
    const parsed = DocxBatchUpdateArgsSchema.parse(args);
    const editor = await openEditor(parsed.path);
    const report = editor.batchUpdate(parsed.operations);
    const savedTo = await editor.save(parsed.output_path);
    return jsonResult({ ...report, saved_to: savedTo });
}
