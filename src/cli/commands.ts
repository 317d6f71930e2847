/**
 * Command-line front end: argument handling and plain-text rendering.
 * Rendering functions return lines so they can be asserted directly.
 */

import fs from 'fs/promises';
import { ConfigManager, configManager } from '../config-manager.js';
import { DocxEditor } from '../tools/docx/index.js';
import type {
    DocumentOutline,
    ImageOutlineEntry,
    ParagraphRecord,
    TableData,
    TableOutlineEntry,
} from '../tools/docx/index.js';
import { errorMessage } from '../tools/docx/errors.js';

export const USAGE = 'Usage: docx-index-editor <file.docx> [outline|read [i,j,k]|tables|table [n]|images|apply <ops.json> [output.docx]]';

const RULE = '='.repeat(50);

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

export const processIO: CliIO = {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
};

// ═══════════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════════

export function renderOutline(outline: DocumentOutline): string[] {
    return [
        `Document outline (${outline.total} paragraphs)`,
        RULE,
        ...outline.headings.map((h) => {
            const indent = '  '.repeat(Math.max(h.level - 1, 0));
            return `${indent}[${String(h.index).padStart(3)}] H${h.level}: ${h.text.slice(0, 50)}`;
        }),
    ];
}

export function renderParagraphs(records: ParagraphRecord[]): string[] {
    return records.flatMap((p) => [
        `[${p.index}] ${p.style} | empty=${p.is_empty} | numPr=${p.xml.has_numPr}`,
        `  ${p.text.length > 80 ? `${p.text.slice(0, 80)}...` : p.text}`,
    ]);
}

export function renderTablesOutline(tables: TableOutlineEntry[]): string[] {
    return [
        `Tables (${tables.length})`,
        RULE,
        ...tables.map((t) => `[${t.table_index}] ${t.rows} rows x ${t.cols} cols | ${t.preview}`),
    ];
}

export function renderTable(table: TableData): string[] {
    return [
        `Table ${table.table_index} (${table.rows} rows x ${table.cols} cols)`,
        RULE,
        ...table.data.map((row, i) => `[${i}] ${row.map((cell) => cell.slice(0, 20)).join(' | ')}`),
    ];
}

export function renderImagesOutline(images: ImageOutlineEntry[]): string[] {
    const cm = (value: number | null) => (value === null ? '?' : `${value}cm`);
    return [
        `Images (${images.length})`,
        RULE,
        ...images.map((img) => `[${img.image_index}] ${img.type} | ${cm(img.width_cm)} x ${cm(img.height_cm)}`),
    ];
}

// ═══════════════════════════════════════════════════════════════════════
// Commands
// ═══════════════════════════════════════════════════════════════════════

function parseIndexList(arg: string): number[] {
    return arg.split(',').map((part) => {
        const n = Number(part.trim());
        if (part.trim() === '' || !Number.isInteger(n)) throw new Error(`Not a paragraph index: "${part}"`);
        return n;
    });
}

function parseIndex(arg: string | undefined, fallback: number): number {
    if (arg === undefined) return fallback;
    const n = Number(arg);
    if (arg.trim() === '' || !Number.isInteger(n)) throw new Error(`Not a table index: "${arg}"`);
    return n;
}

async function readOperations(opsPath: string): Promise<unknown[]> {
    const json: unknown = JSON.parse(await fs.readFile(opsPath, 'utf8'));
    if (!Array.isArray(json)) throw new Error(`${opsPath} must contain a JSON array of operations`);
    return json;
}

async function execute(editor: DocxEditor, command: string, rest: string[], io: CliIO): Promise<void> {
    let lines: string[];
    switch (command) {
        case 'outline':
            lines = renderOutline(editor.getOutline());
            break;
        case 'read':
            lines = renderParagraphs(editor.readContent(rest[0] ? parseIndexList(rest[0]) : [0, 1, 2]));
            break;
        case 'tables':
            lines = renderTablesOutline(editor.getTablesOutline());
            break;
        case 'table':
            lines = renderTable(editor.readTable(parseIndex(rest[0], 0)));
            break;
        case 'images':
            lines = renderImagesOutline(editor.getImagesOutline());
            break;
        case 'apply': {
            const opsPath = rest[0];
            if (!opsPath) throw new Error('apply needs an operations file');
            const report = editor.batchUpdate(await readOperations(opsPath));
            const savedTo = await editor.save(rest[1]);
            lines = [JSON.stringify({ ...report, saved_to: savedTo }, null, 2)];
            break;
        }
        default:
            throw new Error(`Unknown command: ${command}`);
    }
    lines.forEach((line) => io.out(line));
}

/** Run the CLI with `argv` (arguments after the script name). Returns the exit code. */
export async function runCli(argv: string[], io: CliIO = processIO, config: ConfigManager = configManager): Promise<number> {
    const [file, command = 'outline', ...rest] = argv;
    if (!file) {
        io.err(USAGE);
        return 1;
    }

    try {
        const { backupOnSave } = await config.loadConfig();
        const editor = await DocxEditor.open(file, { backupOnSave });
        await execute(editor, command, rest, io);
        return 0;
    } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        return 1;
    }
}
