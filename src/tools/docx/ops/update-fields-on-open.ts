/**
 * Op: update_fields_on_open
 *
 * Ask Word to refresh fields (TOC, page references) when the file is next
 * opened. Idempotent: settings end with exactly one w:updateFields="true".
 */

import { SETTINGS_CHILD_ORDER } from '../constants.js';
import { detach, findDirectChildren, insertInOrder } from '../dom.js';
import type { EditScope } from '../scope.js';
import type { OpOutcome } from '../types.js';

export function ensureUpdateFields(settings: Document): boolean {
    const root = settings.documentElement;
    const [first, ...extra] = findDirectChildren(root, 'w:updateFields');
    extra.forEach(detach);
    let changed = extra.length > 0;

    if (!first) {
        const el = settings.createElement('w:updateFields');
        el.setAttribute('w:val', 'true');
        insertInOrder(root, el, SETTINGS_CHILD_ORDER);
        changed = true;
    } else if (first.getAttribute('w:val') !== 'true') {
        first.setAttribute('w:val', 'true');
        changed = true;
    }
    return changed;
}

export function applyUpdateFieldsOnOpen(scope: EditScope): OpOutcome {
    scope.updateSettings(ensureUpdateFields);
    return {};
}
