/**
 * Op: clean_xml
 *
 * Strip named direct children of the paragraph's w:pPr (e.g. `numPr`,
 * `ind`), then optionally set a style and indent.
 */

import { removeParagraphProperties, setIndent } from '../formatting.js';
import type { EditScope } from '../scope.js';
import type { CleanXmlOp, OpOutcome } from '../types.js';
import { applyNamedStyle } from './update-style.js';

export function applyCleanXml(scope: EditScope, op: CleanXmlOp): OpOutcome {
    const p = scope.paragraph(op.index);
    removeParagraphProperties(p, op.remove);
    if (op.style !== undefined) applyNamedStyle(scope, p, op.style);
    if (op.indent) setIndent(p, op.indent);
    return {};
}
