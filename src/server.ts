import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolRequest,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodTypeAny } from "zod";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    DocxBatchUpdateArgsSchema,
    DocxImagesOutlineArgsSchema,
    DocxOutlineArgsSchema,
    DocxReadContentArgsSchema,
    DocxReadTableArgsSchema,
    DocxTablesOutlineArgsSchema,
} from './tools/schemas.js';
import {
    handleDocxBatchUpdate,
    handleDocxImagesOutline,
    handleDocxOutline,
    handleDocxReadContent,
    handleDocxReadTable,
    handleDocxTablesOutline,
} from './handlers/docx-handlers.js';
import { errorMessage } from './tools/docx/errors.js';
import type { ServerResult } from './types.js';
import {VERSION} from './version.js';
import { logToStderr, logger } from './utils/logger.js';

const INDEX_NOTE = `Paragraphs, tables and inline images are numbered separately from 0. Indices are positions in the current document, so re-read after structural edits.`;

const JsonObjectSchema = z.object({
    properties: z.record(z.string(), z.object({}).passthrough()).optional(),
    required: z.array(z.string()).optional(),
});

/** Tool input schema as the MCP listing expects it: always an object schema. */
function toInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
    const json = JsonObjectSchema.safeParse(zodToJsonSchema(schema));
    if (!json.success) return { type: "object" };
    return { type: "object", properties: json.data.properties, required: json.data.required };
}

export const TOOLS: Tool[] = [
    // Read tools
    {
        name: "docx_outline",
        description: `
            List the heading paragraphs of a .docx file with their paragraph index and level,
            plus the total paragraph count. Start here to find indices. ${INDEX_NOTE}`,
        inputSchema: toInputSchema(DocxOutlineArgsSchema),
        annotations: { title: "DOCX Outline", readOnlyHint: true },
    },
    {
        name: "docx_read_content",
        description: `
            Read full paragraph records (text, style, heading level, runs, alignment,
            spacing, indents, emptiness flags). Select by 'indices', by 'start'/'end'
            (end exclusive) or by 'section' heading text. ${INDEX_NOTE}`,
        inputSchema: toInputSchema(DocxReadContentArgsSchema),
        annotations: { title: "Read DOCX Paragraphs", readOnlyHint: true },
    },
    {
        name: "docx_tables_outline",
        description: `
            List tables with row and column counts and a short preview of the first cell.`,
        inputSchema: toInputSchema(DocxTablesOutlineArgsSchema),
        annotations: { title: "DOCX Tables", readOnlyHint: true },
    },
    {
        name: "docx_read_table",
        description: `
            Read the full cell grid of one table. Merged cells repeat at every position they cover.`,
        inputSchema: toInputSchema(DocxReadTableArgsSchema),
        annotations: { title: "Read DOCX Table", readOnlyHint: true },
    },
    {
        name: "docx_images_outline",
        description: `
            List inline images with their kind, size in cm and description.`,
        inputSchema: toInputSchema(DocxImagesOutlineArgsSchema),
        annotations: { title: "DOCX Images", readOnlyHint: true },
    },

    // Edit tools
    {
        name: "docx_batch_update",
        description: `
            Apply a list of edit operations and save the document.

            Operations: delete {index, force?}, insert {index, position?, text?, style?},
            update_style {index, style?, font?, alignment?, indent?, spacing?},
            replace_text {index, pattern, replacement?, regex?},
            replace_text_global {pattern, replacement?, regex?},
            clean_xml {index, remove?, style?, indent?}, set_text {index, text?},
            update_table_cell {table_index, row, col, text?},
            replace_table_cell {table_index, row, col, pattern, replacement?, regex?},
            update_table_row {table_index, row, texts?}, update_table_col {table_index, col, texts?},
            delete_image {image_index}, resize_image {image_index, width?, height?},
            insert_image {index, path, width?, height?}, update_fields_on_open {}.

            Paragraph-indexed operations run from the highest index down, so every index
            refers to the document as it was before the batch. Each operation succeeds or
            fails on its own; the result lists both. Sizes are in cm, spacing in points.
            ${INDEX_NOTE}`,
        inputSchema: toInputSchema(DocxBatchUpdateArgsSchema),
        annotations: {
            title: "Edit DOCX",
            readOnlyHint: false,
            destructiveHint: true,
            openWorldHint: false,
        },
    },
];

type ToolHandler = (args: unknown) => Promise<ServerResult>;

const HANDLERS: Record<string, ToolHandler> = {
    docx_outline: handleDocxOutline,
    docx_read_content: handleDocxReadContent,
    docx_tables_outline: handleDocxTablesOutline,
    docx_read_table: handleDocxReadTable,
    docx_images_outline: handleDocxImagesOutline,
    docx_batch_update: handleDocxBatchUpdate,
};

/**
 * Dispatch one tool call. Failures come back as error results; nothing is
 * thrown to the transport.
 */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    const handler = HANDLERS[name];
    if (!handler) {
        return {
            content: [{type: "text", text: `Error: Unknown tool: ${name}`}],
            isError: true,
        };
    }

    const startTime = Date.now();
    try {
        const result = await handler(args);
        logger.debug(`${name} completed in ${Date.now() - startTime}ms`);
        return result;
    } catch (error) {
        logger.error(`Error in ${name} handler:`, errorMessage(error));
        return {
            content: [{type: "text", text: `Error: ${errorMessage(error)}`}],
            isError: true,
        };
    }
}

export const server = new Server(
    {
        name: "docx-index-editor",
        version: VERSION,
    },
    {
        capabilities: {
            tools: {},
        },
    },
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
    logToStderr('debug', `Returning ${TOOLS.length} tools`);
    return { tools: TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
    const {name, arguments: args} = request.params;
    logger.info(`Tool call: ${name}`);
    return callTool(name, args ?? {});
});
