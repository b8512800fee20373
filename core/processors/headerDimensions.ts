import type { Size } from "../../types/upload.types";

/**
 * Dimensions read straight from the header of formats sharp cannot decode
 * (BMP, ICO). Null when the bytes are neither.
 */
export function headerDimensions(bytes: Uint8Array): Size | null {
    return bmpDimensions(bytes) ?? icoDimensions(bytes);
}

function bmpDimensions(bytes: Uint8Array): Size | null {
    if (bytes.length < 26 || bytes[0] !== 0x42 || bytes[1] !== 0x4D) {
        return null;
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const infoSize = view.getUint32(14, true);

    // OS/2 core header stores unsigned 16-bit sizes
    const size = infoSize === 12
        ? { width: view.getUint16(18, true), height: view.getUint16(20, true) }
        : { width: Math.abs(view.getInt32(18, true)), height: Math.abs(view.getInt32(22, true)) };

    return size.width > 0 && size.height > 0 ? size : null;
}

function icoDimensions(bytes: Uint8Array): Size | null {
    // reserved 0, type 1, at least one directory entry
    if (bytes.length < 8 || bytes[0] !== 0 || bytes[1] !== 0 || bytes[2] !== 1 || bytes[3] !== 0) {
        return null;
    }
    if ((bytes[4] ?? 0) + (bytes[5] ?? 0) === 0) {
        return null;
    }

    // A zero byte means 256 pixels
    return { width: bytes[6] || 256, height: bytes[7] || 256 };
}
