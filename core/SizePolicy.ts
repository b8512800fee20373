import { UploadError } from "./ErrorHandler";

const UNITS = ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"] as const;

/** Power of 1024 for each accepted suffix */
const SUFFIX_POWER: Record<string, number> = {
    "": 0,
    B: 0,
    K: 1,
    KB: 1,
    M: 2,
    MB: 2,
    G: 3,
    GB: 3,
    T: 4,
    TB: 4
};

const SIZE_PATTERN = /^\s*(\d+(?:\.\d+)?|\.\d+)\s*([a-z]*)\s*$/i;

/**
 * Parse a shorthand size ("5M", "1.5 GB", "512k") into bytes.
 * Units are binary: each step multiplies by 1024.
 */
export function parseSize(size: string | number): number {
    if (typeof size === "number") {
        if (!Number.isFinite(size) || size < 0) {
            throw new UploadError("INVALID_OPTIONS", `Invalid size: ${size}`);
        }
        return Math.round(size);
    }

    const match = SIZE_PATTERN.exec(size);
    const unit = match?.[2]?.toUpperCase() ?? "";
    const power = SUFFIX_POWER[unit];

    if (!match || power === undefined) {
        throw new UploadError("INVALID_OPTIONS", `Invalid size: "${size}"`, { size });
    }

    return Math.round(Number(match[1]) * 1024 ** power);
}

/**
 * Format bytes with the largest unit that keeps the value under 1024.
 * Rounded to a whole number, so parseSize(formatSize(n)) is only approximately n.
 */
export function formatSize(bytes: number): string {
    let value = Math.max(0, bytes);
    let unit = 0;

    while (value >= 1024 && unit < UNITS.length - 1) {
        value /= 1024;
        unit++;
    }

    return `${Math.round(value)} ${UNITS[unit]}`;
}

export const SizePolicy = {
    parse: parseSize,
    format: formatSize
};
