import { open } from "node:fs/promises";

interface Signature {
    mime: string;
    bytes: number[];
    offset?: number;
    /** Extra structural test for signatures too short to trust on their own */
    check?: (bytes: Uint8Array) => boolean;
}

/** Sizes of the BMP info headers that follow the 14-byte file header */
const BMP_INFO_HEADER_SIZES = [12, 40, 52, 56, 108, 124];

function hasBmpInfoHeader(bytes: Uint8Array): boolean {
    if (bytes.length < 18) {
        return false;
    }
    const size = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(14, true);
    return BMP_INFO_HEADER_SIZES.includes(size);
}

/**
 * Known file signatures (magic numbers), most specific first
 */
const SIGNATURES: Signature[] = [
    // Image formats
    { mime: "image/png", bytes: [0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A] },
    { mime: "image/jpeg", bytes: [0xFF, 0xD8, 0xFF] },
    { mime: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38, 0x37, 0x61] }, // GIF87a
    { mime: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38, 0x39, 0x61] }, // GIF89a
    { mime: "image/webp", bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }, // RIFF....WEBP
    { mime: "image/bmp", bytes: [0x42, 0x4D], check: hasBmpInfoHeader },
    { mime: "image/x-icon", bytes: [0x00, 0x00, 0x01, 0x00] },
    { mime: "image/tiff", bytes: [0x49, 0x49, 0x2A, 0x00] },
    { mime: "image/tiff", bytes: [0x4D, 0x4D, 0x00, 0x2A] },

    // Document formats
    { mime: "application/pdf", bytes: [0x25, 0x50, 0x44, 0x46] }, // %PDF

    // Archive formats
    { mime: "application/zip", bytes: [0x50, 0x4B, 0x03, 0x04] },
    { mime: "application/zip", bytes: [0x50, 0x4B, 0x05, 0x06] }, // Empty ZIP
    { mime: "application/zip", bytes: [0x50, 0x4B, 0x07, 0x08] }, // Spanned ZIP
    { mime: "application/gzip", bytes: [0x1F, 0x8B, 0x08] }, // deflate is the only defined method
    { mime: "application/x-7z-compressed", bytes: [0x37, 0x7A, 0xBC, 0xAF, 0x27, 0x1C] },
    { mime: "application/vnd.rar", bytes: [0x52, 0x61, 0x72, 0x21, 0x1A, 0x07] }
];

/** Bytes needed to test every signature */
export const SIGNATURE_LENGTH = 32;

/**
 * Formats stored inside a container whose signature they share
 */
const CONTAINER_CONTENTS: Record<string, string[]> = {
    "application/zip": [
        "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
        "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "application/vnd.openxmlformats-officedocument.presentationml.presentation",
        "application/vnd.oasis.opendocument.text",
        "application/vnd.oasis.opendocument.spreadsheet"
    ]
};

function bytesMatch(bytes: Uint8Array, signature: Signature): boolean {
    const offset = signature.offset ?? 0;
    if (bytes.length < offset + signature.bytes.length) {
        return false;
    }

    return signature.bytes.every((byte, i) => bytes[offset + i] === byte)
        && (signature.check?.(bytes) ?? true);
}

/**
 * Detect the mime type from the leading bytes, or null when unknown
 */
export function detectMimeType(bytes: Uint8Array): string | null {
    const found = SIGNATURES.find((signature) => bytesMatch(bytes, signature));
    return found ? found.mime : null;
}

/**
 * Whether the content carries a signature of one of `mimeTypes` (or of a
 * container holding one). Null when none of them has a known signature.
 */
export function matchesSignatureOf(bytes: Uint8Array, mimeTypes: string[]): boolean | null {
    const expected = SIGNATURES.filter((signature) =>
        mimeTypes.some((mime) => signature.mime === mime || isContainerOf(signature.mime, mime))
    );
    if (expected.length === 0) {
        return null;
    }
    return expected.some((signature) => bytesMatch(bytes, signature));
}

/**
 * Whether a detected container mime may legitimately hold the declared format
 */
export function isContainerOf(detected: string, declared: string): boolean {
    return CONTAINER_CONTENTS[detected]?.includes(declared) ?? false;
}

/**
 * Read the first bytes of a file for signature detection
 */
export async function readSignature(path: string, length: number = SIGNATURE_LENGTH): Promise<Uint8Array> {
    const handle = await open(path, "r");
    try {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}
