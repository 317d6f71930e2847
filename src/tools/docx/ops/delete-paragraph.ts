/**
 * Op: delete
 *
 * Remove the paragraph at `index`. Paragraphs holding text, drawings,
 * pictures, OLE objects or charts are refused unless `force` is set.
 *
 * Structural op: later paragraph indices shift down by one.
 */

import { DocxError, DocxErrorCode } from '../errors.js';
import { isTrulyEmpty } from '../paragraph.js';
import type { EditScope } from '../scope.js';
import type { DeleteOp, OpOutcome } from '../types.js';

export function applyDeleteParagraph(scope: EditScope, op: DeleteOp): OpOutcome {
    const p = scope.paragraph(op.index);
    if (!op.force && !isTrulyEmpty(p)) {
        throw new DocxError(
            `Paragraph ${op.index} is not truly empty (text or embedded content); pass force to delete it`,
            DocxErrorCode.NOT_TRULY_EMPTY,
            { index: op.index },
        );
    }
    scope.removeParagraph(op.index);
    return {};
}
