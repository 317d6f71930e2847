/**
 * Op: set_text
 *
 * Replace the paragraph's text, keeping the first run's formatting.
 */

import { setParagraphText } from '../paragraph.js';
import type { EditScope } from '../scope.js';
import type { OpOutcome, SetTextOp } from '../types.js';

export function applySetText(scope: EditScope, op: SetTextOp): OpOutcome {
    setParagraphText(scope.paragraph(op.index), op.text);
    return {};
}
