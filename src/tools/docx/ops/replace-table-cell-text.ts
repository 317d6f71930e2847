/**
 * Op: replace_table_cell
 *
 * Substitute inside one cell's text. The cell is rewritten only when the
 * substitution changes something.
 */

import type { EditScope } from '../scope.js';
import { getCellText, getGridCell } from '../table.js';
import type { OpOutcome, ReplaceTableCellOp } from '../types.js';
import { substitute } from './replace-text.js';

export function applyReplaceTableCell(scope: EditScope, op: ReplaceTableCellOp): OpOutcome {
    const cell = getGridCell(scope.table(op.table_index), op.row, op.col);
    const result = substitute(getCellText(cell), op.pattern, op.replacement, op.regex);
    if (result.changed) scope.writeCell(cell, result.text);
    return { changed: result.changed };
}
