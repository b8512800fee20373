import { UploadError } from "../ErrorHandler";
import type {
    CropLocation,
    CropOptions,
    FlipDirection,
    FlipOptions,
    Rect,
    ResizeOptions,
    ScaleOptions,
    Size,
    TransformDescriptor
} from "../../types/upload.types";

/**
 * ImageGeometry - pure transform math.
 *
 * Every function takes the original dimensions and returns a
 * TransformDescriptor: which window of the original to read, where to draw it
 * in the output canvas and how large that canvas is. No pixels are touched here.
 */

const DEFAULT_QUALITY = 100;

const CROP_LOCATIONS: readonly CropLocation[] = ["center", "top", "bottom", "left", "right"];
const FLIP_DIRECTIONS: readonly FlipDirection[] = ["vertical", "horizontal", "both"];

export const FLIP_SUFFIXES: Record<FlipDirection, string> = {
    vertical: "vert",
    horizontal: "hor",
    both: "both"
};

/**
 * Fit within (or stretch to) a box. With a single dimension the other follows
 * the aspect ratio. Without `expand`, a box larger than the original in either
 * dimension keeps the original size.
 */
export function resize(origWidth: number, origHeight: number, options: ResizeOptions): TransformDescriptor {
    assertOriginal(origWidth, origHeight);
    const { width: maxWidth, height: maxHeight, expand = false, aspect = true } = options;
    const quality = qualityOf(options.quality);

    assertOptionalDimension("width", maxWidth);
    assertOptionalDimension("height", maxHeight);

    if (maxWidth === undefined && maxHeight === undefined) {
        throw new UploadError("INVALID_OPTIONS", "Resize requires a width, a height or both");
    }

    let newWidth: number;
    let newHeight: number;

    if (!expand && ((maxWidth !== undefined && maxWidth > origWidth) || (maxHeight !== undefined && maxHeight > origHeight))) {
        newWidth = origWidth;
        newHeight = origHeight;
    } else if (maxWidth !== undefined && maxHeight === undefined) {
        newWidth = maxWidth;
        newHeight = (origHeight / origWidth) * maxWidth;
    } else if (maxHeight !== undefined && maxWidth === undefined) {
        newWidth = (origWidth / origHeight) * maxHeight;
        newHeight = maxHeight;
    } else if (maxWidth !== undefined && maxHeight !== undefined && aspect) {
        const widthScale = maxWidth / origWidth;
        const heightScale = maxHeight / origHeight;

        if (widthScale < heightScale) {
            newWidth = maxWidth;
            newHeight = (origHeight * maxWidth) / origWidth;
        } else if (widthScale > heightScale) {
            newWidth = (origWidth * maxHeight) / origHeight;
            newHeight = maxHeight;
        } else {
            newWidth = maxWidth;
            newHeight = maxHeight;
        }
    } else {
        newWidth = maxWidth ?? origWidth;
        newHeight = maxHeight ?? origHeight;
    }

    const output = outputSize(Math.round(newWidth), Math.round(newHeight));

    return {
        source: fullRect(origWidth, origHeight),
        destination: fullRect(output.width, output.height),
        output,
        flip: { horizontal: false, vertical: false },
        quality
    };
}

/**
 * Scale both dimensions by a fraction (0.5 halves), each rounded on its own
 */
export function scale(origWidth: number, origHeight: number, options: ScaleOptions = {}): TransformDescriptor {
    assertOriginal(origWidth, origHeight);
    const { percent = 0.5 } = options;
    const quality = qualityOf(options.quality);

    if (!Number.isFinite(percent) || percent <= 0) {
        throw new UploadError("INVALID_OPTIONS", `Scale percent must be a positive number, got ${percent}`);
    }

    const output = outputSize(Math.round(origWidth * percent), Math.round(origHeight * percent));

    return {
        source: fullRect(origWidth, origHeight),
        destination: fullRect(output.width, output.height),
        output,
        flip: { horizontal: false, vertical: false },
        quality
    };
}

/**
 * Crop to a box (default: a square of the shorter side).
 *
 * The original is first scaled to cover the box, then a box-sized window is
 * placed on the overflowing axis according to `location`: centered (offset
 * rounded up), at the start (top/left) or at the end (bottom/right). The
 * window is mapped back to original coordinates for the source rectangle.
 */
export function crop(origWidth: number, origHeight: number, options: CropOptions = {}): TransformDescriptor {
    assertOriginal(origWidth, origHeight);
    const { location = "center" } = options;
    const quality = qualityOf(options.quality);

    assertOptionalDimension("width", options.width);
    assertOptionalDimension("height", options.height);

    if (!CROP_LOCATIONS.includes(location)) {
        throw new UploadError("INVALID_OPTIONS", `Unknown crop location: ${String(location)}`);
    }

    const shorter = Math.min(origWidth, origHeight);
    const target = outputSize(
        Math.round(options.width ?? options.height ?? shorter),
        Math.round(options.height ?? options.width ?? shorter)
    );

    // Intermediate size covering the target box
    const factor = Math.max(target.width / origWidth, target.height / origHeight);
    const intermediate = {
        width: Math.max(target.width, Math.round(origWidth * factor)),
        height: Math.max(target.height, Math.round(origHeight * factor))
    };

    const offsetX = anchorOffset(intermediate.width - target.width, location);
    const offsetY = anchorOffset(intermediate.height - target.height, location);

    const source = clampRect(
        {
            x: Math.round(offsetX / factor),
            y: Math.round(offsetY / factor),
            width: Math.round(target.width / factor),
            height: Math.round(target.height / factor)
        },
        origWidth,
        origHeight
    );

    return {
        source,
        destination: fullRect(target.width, target.height),
        output: target,
        flip: { horizontal: false, vertical: false },
        quality
    };
}

/**
 * Mirror along one or both axes; the whole image is read and written
 */
export function flip(origWidth: number, origHeight: number, options: FlipOptions = {}): TransformDescriptor {
    assertOriginal(origWidth, origHeight);
    const { direction = "vertical" } = options;
    const quality = qualityOf(options.quality);

    if (!FLIP_DIRECTIONS.includes(direction)) {
        throw new UploadError("INVALID_OPTIONS", `Unknown flip direction: ${String(direction)}`);
    }

    return {
        source: fullRect(origWidth, origHeight),
        destination: fullRect(origWidth, origHeight),
        output: { width: origWidth, height: origHeight },
        flip: {
            horizontal: direction === "horizontal" || direction === "both",
            vertical: direction === "vertical" || direction === "both"
        },
        quality
    };
}

function anchorOffset(overflow: number, location: CropLocation): number {
    if (overflow <= 0) {
        return 0;
    }

    switch (location) {
        case "bottom":
        case "right":
            return overflow;
        case "top":
        case "left":
            return 0;
        default:
            return Math.ceil(overflow / 2);
    }
}

function clampRect(rect: Rect, maxWidth: number, maxHeight: number): Rect {
    const width = Math.min(Math.max(1, rect.width), maxWidth);
    const height = Math.min(Math.max(1, rect.height), maxHeight);

    return {
        x: Math.min(Math.max(0, rect.x), maxWidth - width),
        y: Math.min(Math.max(0, rect.y), maxHeight - height),
        width,
        height
    };
}

function fullRect(width: number, height: number): Rect {
    return { x: 0, y: 0, width, height };
}

function outputSize(width: number, height: number): Size {
    if (!(width > 0) || !(height > 0)) {
        throw new UploadError("INVALID_GEOMETRY", `Transform would produce a ${width}x${height} image`, { width, height });
    }
    return { width, height };
}

function assertOriginal(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new UploadError("INVALID_GEOMETRY", `Invalid original dimensions ${width}x${height}`, { width, height });
    }
}

function assertOptionalDimension(name: string, value: number | undefined): void {
    if (value !== undefined && !Number.isFinite(value)) {
        throw new UploadError("INVALID_OPTIONS", `${name} must be a finite number`);
    }
}

function qualityOf(quality: number | undefined): number {
    const value = quality ?? DEFAULT_QUALITY;
    if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new UploadError("INVALID_OPTIONS", `Quality must be between 0 and 100, got ${value}`);
    }
    return value;
}
