/**
 * Pixel size from an image file header: PNG, JPEG, GIF and BMP.
 * The format is detected from the leading bytes, not the file name.
 */

export interface PixelSize {
    width: number;
    height: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function startsWith(buf: Buffer, bytes: readonly number[]): boolean {
    return buf.length >= bytes.length && bytes.every((b, i) => buf[i] === b);
}

function readPng(buf: Buffer): PixelSize | null {
    // IHDR follows the signature: length(4) "IHDR"(4) width(4) height(4)
    if (buf.length < 24 || buf.toString('ascii', 12, 16) !== 'IHDR') return null;
    return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

function readJpeg(buf: Buffer): PixelSize | null {
    let offset = 2;
    while (offset + 9 <= buf.length) {
        if (buf[offset] !== 0xff) {
            offset++;
            continue;
        }
        const marker = buf[offset + 1] ?? 0;
        // SOF0..SOF3: length(2) precision(1) height(2) width(2)
        if (marker >= 0xc0 && marker <= 0xc3) {
            return { width: buf.readUInt16BE(offset + 7), height: buf.readUInt16BE(offset + 5) };
        }
        if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
            offset += 2;
        } else {
            offset += 2 + buf.readUInt16BE(offset + 2);
        }
    }
    return null;
}

function readGif(buf: Buffer): PixelSize | null {
    if (buf.length < 10) return null;
    return { width: buf.readUInt16LE(6), height: buf.readUInt16LE(8) };
}

function readBmp(buf: Buffer): PixelSize | null {
    if (buf.length < 26) return null;
    // top-down bitmaps store a negative height
    return { width: buf.readUInt32LE(18), height: Math.abs(buf.readInt32LE(22)) };
}

/** Pixel size of `data`, or null when the format is unknown or the header is cut short. */
export function readImagePixelSize(data: Buffer): PixelSize | null {
    if (startsWith(data, PNG_SIGNATURE)) return readPng(data);
    if (startsWith(data, [0xff, 0xd8])) return readJpeg(data);
    const sig = data.toString('ascii', 0, 6);
    if (sig === 'GIF87a' || sig === 'GIF89a') return readGif(data);
    if (startsWith(data, [0x42, 0x4d])) return readBmp(data);
    return null;
}
