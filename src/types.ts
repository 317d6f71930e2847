import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/** What every tool handler resolves to. */
export type ServerResult = CallToolResult;
