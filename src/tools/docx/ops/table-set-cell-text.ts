/**
 * Ops: update_table_cell, update_table_row, update_table_col
 *
 * Write text into table cells addressed by grid position. Each written cell
 * ends up with a single paragraph. Row and column writes cover the
 * positions that exist; surplus texts are ignored.
 */

import { assertInRange } from '../errors.js';
import type { EditScope } from '../scope.js';
import { getGridCell } from '../table.js';
import type { OpOutcome, UpdateTableCellOp, UpdateTableColOp, UpdateTableRowOp } from '../types.js';

export function applyUpdateTableCell(scope: EditScope, op: UpdateTableCellOp): OpOutcome {
    const grid = scope.table(op.table_index);
    scope.writeCell(getGridCell(grid, op.row, op.col), op.text);
    return {};
}

export function applyUpdateTableRow(scope: EditScope, op: UpdateTableRowOp): OpOutcome {
    const grid = scope.table(op.table_index);
    assertInRange('row', op.row, grid.rows);
    const cells = grid.cells[op.row] ?? [];
    op.texts.slice(0, Math.min(grid.cols, cells.length)).forEach((text, col) => {
        const cell = cells[col];
        if (cell) scope.writeCell(cell, text);
    });
    return {};
}

export function applyUpdateTableCol(scope: EditScope, op: UpdateTableColOp): OpOutcome {
    const grid = scope.table(op.table_index);
    assertInRange('column', op.col, grid.cols);
    op.texts.slice(0, grid.rows).forEach((text, row) => {
        const cell = grid.cells[row]?.[op.col];
        if (cell) scope.writeCell(cell, text);
    });
    return {};
}
