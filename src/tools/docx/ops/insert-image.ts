/**
 * Op: insert_image
 *
 * Append a picture to the paragraph at `index`, in a new run.
 *
 * Requires package access because it adds:
 *   - word/media/imageN.ext  (binary blob)
 *   - word/_rels/document.xml.rels  (relationship entry)
 *   - [Content_Types].xml  (default for the extension)
 *
 * Size is in cm. Missing dimensions come from the image header at 96 DPI;
 * with one dimension given the other follows the native aspect ratio.
 */

import fs from 'fs';
import path from 'path';
import { DEFAULT_IMAGE_HEIGHT_PX, DEFAULT_IMAGE_WIDTH_PX, pixelsToEmu } from '../constants.js';
import { DocxError, DocxErrorCode } from '../errors.js';
import { readImagePixelSize } from '../image-header.js';
import type { Extent } from '../image.js';
import type { EditScope } from '../scope.js';
import type { InsertImageOp, OpOutcome } from '../types.js';
import { scaledExtent } from './resize-image.js';
import { logger } from '../../../utils/logger.js';

/** Native size in EMU; unreadable headers fall back to 300x200 px. */
export function nativeExtent(data: Buffer): Extent {
    const size = readImagePixelSize(data);
    if (size && size.width > 0 && size.height > 0) {
        return { cx: pixelsToEmu(size.width), cy: pixelsToEmu(size.height) };
    }
    logger.debug('Image header unreadable; using the default size');
    return { cx: pixelsToEmu(DEFAULT_IMAGE_WIDTH_PX), cy: pixelsToEmu(DEFAULT_IMAGE_HEIGHT_PX) };
}

export function applyInsertImage(scope: EditScope, op: InsertImageOp): OpOutcome {
    scope.paragraph(op.index); // range check before reading the file

    if (!fs.existsSync(op.path)) {
        throw new DocxError(`Image file not found: ${op.path}`, DocxErrorCode.FILE_NOT_FOUND, { path: op.path });
    }
    const data = fs.readFileSync(op.path);
    const native = nativeExtent(data);
    const size = scaledExtent(native, op.width, op.height) ?? native;

    const newImageIndex = scope.attachImage(op.index, {
        data,
        ext: path.extname(op.path).toLowerCase() || '.png',
        name: path.basename(op.path),
        size,
    });
    return { new_image_index: newImageIndex };
}
