/**
 * Op: update_style
 *
 * Each present field is applied on its own, in this order: style,
 * alignment, indent, spacing, font. A later failure does not undo
 * earlier fields.
 */

import { applyFont, setAlignment, setIndent, setParagraphStyle, setSpacing } from '../formatting.js';
import { getParagraphRuns } from '../paragraph.js';
import type { EditScope } from '../scope.js';
import type { OpOutcome, UpdateStyleOp } from '../types.js';
import { logger } from '../../../utils/logger.js';

/** Set the paragraph style by name. Unknown names are ignored. */
export function applyNamedStyle(scope: EditScope, p: Element, name: string): boolean {
    const styleId = scope.styles.findParagraphStyle(name);
    if (styleId === null) {
        logger.debug(`Paragraph style "${name}" not found; ignored`);
        return false;
    }
    setParagraphStyle(p, styleId);
    return true;
}

export function applyUpdateStyle(scope: EditScope, op: UpdateStyleOp): OpOutcome {
    const p = scope.paragraph(op.index);

    if (op.style !== undefined) applyNamedStyle(scope, p, op.style);
    if (op.alignment !== undefined) setAlignment(p, op.alignment);
    if (op.indent) setIndent(p, op.indent);
    if (op.spacing) setSpacing(p, op.spacing);
    if (op.font) applyFont(getParagraphRuns(p), op.font);

    return {};
}
