/**
 * Ops: replace_text, replace_text_global
 *
 * Substitute every occurrence of `pattern` in paragraph text. Regex mode
 * uses JavaScript RegExp syntax with `$1` / `$<name>` references in the
 * replacement; literal mode matches the pattern verbatim.
 */

import { getParagraphText, setParagraphText } from '../paragraph.js';
import type { EditScope } from '../scope.js';
import type { OpOutcome, ReplaceTextGlobalOp, ReplaceTextOp } from '../types.js';

export interface Substitution {
    text: string;
    changed: boolean;
}

export function substitute(text: string, pattern: string, replacement: string, regex: boolean): Substitution {
    let next: string;
    if (regex) {
        next = text.replace(new RegExp(pattern, 'g'), replacement);
    } else {
        // An empty literal would match between every character.
        next = pattern === '' ? text : text.replaceAll(pattern, () => replacement);
    }
    return { text: next, changed: next !== text };
}

/** Substitute in one paragraph; writes only when the text changes. */
function replaceInParagraph(p: Element, pattern: string, replacement: string, regex: boolean): boolean {
    const result = substitute(getParagraphText(p), pattern, replacement, regex);
    if (result.changed) setParagraphText(p, result.text);
    return result.changed;
}

export function applyReplaceText(scope: EditScope, op: ReplaceTextOp): OpOutcome {
    const p = scope.paragraph(op.index);
    return { changed: replaceInParagraph(p, op.pattern, op.replacement, op.regex) };
}

export function applyReplaceTextGlobal(scope: EditScope, op: ReplaceTextGlobalOp): OpOutcome {
    let count = 0;
    for (const p of scope.paragraphs()) {
        if (replaceInParagraph(p, op.pattern, op.replacement, op.regex)) count++;
    }
    return { replaced_count: count };
}
