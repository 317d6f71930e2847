/**
 * Op: insert
 *
 * Insert a new paragraph before or after the paragraph at `index`, with
 * optional text (one run) and named style. Reports the new index.
 */

import { setParagraphText } from '../paragraph.js';
import type { EditScope } from '../scope.js';
import type { InsertOp, OpOutcome } from '../types.js';
import { applyNamedStyle } from './update-style.js';

export function applyInsertParagraph(scope: EditScope, op: InsertOp): OpOutcome {
    const newIndex = scope.insertParagraph(op.index, op.position);
    const p = scope.paragraph(newIndex);
    if (op.text) setParagraphText(p, op.text);
    if (op.style) applyNamedStyle(scope, p, op.style);
    return { new_index: newIndex };
}
