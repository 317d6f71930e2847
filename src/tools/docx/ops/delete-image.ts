/**
 * Op: delete_image
 *
 * Remove the drawing of the inline shape at `image_index`. The media part
 * and its relationship stay in the package.
 */

import type { EditScope } from '../scope.js';
import type { DeleteImageOp, OpOutcome } from '../types.js';

export function applyDeleteImage(scope: EditScope, op: DeleteImageOp): OpOutcome {
    scope.removeImage(op.image_index);
    return {};
}
