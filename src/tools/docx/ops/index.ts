/**
 * Routes each validated operation to its handler.
 */

import type { EditScope } from '../scope.js';
import type { DocxOp, OpOutcome } from '../types.js';
import { applyCleanXml } from './clean-xml.js';
import { applyDeleteImage } from './delete-image.js';
import { applyDeleteParagraph } from './delete-paragraph.js';
import { applyInsertImage } from './insert-image.js';
import { applyInsertParagraph } from './insert-paragraph.js';
import { applyReplaceTableCell } from './replace-table-cell-text.js';
import { applyReplaceText, applyReplaceTextGlobal } from './replace-text.js';
import { applyResizeImage } from './resize-image.js';
import { applySetText } from './set-text.js';
import { applyUpdateTableCell, applyUpdateTableCol, applyUpdateTableRow } from './table-set-cell-text.js';
import { applyUpdateFieldsOnOpen } from './update-fields-on-open.js';
import { applyUpdateStyle } from './update-style.js';

/** Apply a single validated operation. Errors propagate to the caller. */
export function applyOp(scope: EditScope, op: DocxOp): OpOutcome {
    switch (op.op) {
        case 'delete':
            return applyDeleteParagraph(scope, op);
        case 'insert':
            return applyInsertParagraph(scope, op);
        case 'update_style':
            return applyUpdateStyle(scope, op);
        case 'replace_text':
            return applyReplaceText(scope, op);
        case 'replace_text_global':
            return applyReplaceTextGlobal(scope, op);
        case 'clean_xml':
            return applyCleanXml(scope, op);
        case 'set_text':
            return applySetText(scope, op);
        case 'update_table_cell':
            return applyUpdateTableCell(scope, op);
        case 'replace_table_cell':
            return applyReplaceTableCell(scope, op);
        case 'update_table_row':
            return applyUpdateTableRow(scope, op);
        case 'update_table_col':
            return applyUpdateTableCol(scope, op);
        case 'delete_image':
            return applyDeleteImage(scope, op);
        case 'resize_image':
            return applyResizeImage(scope, op);
        case 'insert_image':
            return applyInsertImage(scope, op);
        case 'update_fields_on_open':
            return applyUpdateFieldsOnOpen(scope);
        default: {
            const unreachable: never = op;
            return unreachable;
        }
    }
}
