/**
 * Op: resize_image
 *
 * Set an inline shape's size in cm. With one dimension the other follows
 * the current aspect ratio, truncated to whole EMU. A shape without a
 * current size scales 1:1.
 */

import { cmToEmu } from '../constants.js';
import { readExtent, writeExtent, type Extent } from '../image.js';
import type { EditScope } from '../scope.js';
import type { OpOutcome, ResizeImageOp } from '../types.js';

/**
 * Target size for a resize from `current`, or null when neither dimension
 * is given.
 */
export function scaledExtent(current: Extent, width?: number, height?: number): Extent | null {
    if (width !== undefined && height !== undefined) {
        return { cx: cmToEmu(width), cy: cmToEmu(height) };
    }
    if (width !== undefined) {
        const cx = cmToEmu(width);
        const ratio = current.cx > 0 ? current.cy / current.cx : 1;
        return { cx, cy: Math.trunc(cx * ratio) };
    }
    if (height !== undefined) {
        const cy = cmToEmu(height);
        const ratio = current.cy > 0 ? current.cx / current.cy : 1;
        return { cx: Math.trunc(cy * ratio), cy };
    }
    return null;
}

export function applyResizeImage(scope: EditScope, op: ResizeImageOp): OpOutcome {
    const inline = scope.image(op.image_index);
    const size = scaledExtent(readExtent(inline), op.width, op.height);
    if (size) writeExtent(inline, size);
    return {};
}
