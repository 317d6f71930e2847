import { z } from "zod";

const DocPath = z.string().min(1).describe("Absolute path of the .docx file");

// Read tools schemas
export const DocxOutlineArgsSchema = z.object({
  path: DocPath,
});

export const DocxReadContentArgsSchema = z.object({
  path: DocPath,
  indices: z.array(z.number().int()).optional().describe("Paragraph indices to read"),
  start: z.number().int().optional().describe("First paragraph index of a range"),
  end: z.number().int().optional().describe("Range end, exclusive (defaults to start + 1)"),
  section: z.string().optional().describe("Read the section under the first heading containing this text"),
});

export const DocxTablesOutlineArgsSchema = z.object({
  path: DocPath,
});

export const DocxReadTableArgsSchema = z.object({
  path: DocPath,
  table_index: z.number().int().default(0),
});

export const DocxImagesOutlineArgsSchema = z.object({
  path: DocPath,
});

// Edit tools schemas
export const DocxBatchUpdateArgsSchema = z.object({
  path: DocPath,
  operations: z
    .array(z.record(z.string(), z.unknown()))
    .describe("Operation objects, each with an `op` field; validated one by one"),
  output_path: z.string().optional().describe("Write the result here instead of overwriting the input"),
});
