import type { FlipFlags, Rect } from "../../types/upload.types";

/**
 * Decoded RGBA raster, 4 bytes per pixel, rows top to bottom
 */
export interface RasterImage {
    data: Uint8Array;
    width: number;
    height: number;
}

export type Rgba = readonly [number, number, number, number];

export const TRANSPARENT: Rgba = [255, 255, 255, 0];
export const OPAQUE_BLACK: Rgba = [0, 0, 0, 255];

const CHANNELS = 4;

interface Span {
    start: number;
    weights: number[];
}

export function createCanvas(width: number, height: number, fill: Rgba): RasterImage {
    const data = new Uint8Array(width * height * CHANNELS);
    for (let i = 0; i < data.length; i += CHANNELS) {
        data[i] = fill[0];
        data[i + 1] = fill[1];
        data[i + 2] = fill[2];
        data[i + 3] = fill[3];
    }
    return { data, width, height };
}

/**
 * Draw the `source` window of `image` into the `destination` window of
 * `canvas` by area averaging: each output pixel is the coverage-weighted mean
 * of the source pixels under it. Colour is weighted by alpha so transparent
 * pixels do not bleed into their neighbours. Flips mirror the destination.
 */
export function resampleInto(
    image: RasterImage,
    canvas: RasterImage,
    source: Rect,
    destination: Rect,
    flip: FlipFlags = { horizontal: false, vertical: false }
): void {
    if (destination.width <= 0 || destination.height <= 0 || source.width <= 0 || source.height <= 0) {
        return;
    }

    const columns = buildSpans(source.x, source.width, destination.width, image.width);
    const rows = buildSpans(source.y, source.height, destination.height, image.height);

    for (let dy = 0; dy < destination.height; dy++) {
        const outY = destination.y + (flip.vertical ? destination.height - 1 - dy : dy);
        if (outY < 0 || outY >= canvas.height) {
            continue;
        }
        const row = rows[dy];
        if (!row) {
            continue;
        }

        for (let dx = 0; dx < destination.width; dx++) {
            const outX = destination.x + (flip.horizontal ? destination.width - 1 - dx : dx);
            if (outX < 0 || outX >= canvas.width) {
                continue;
            }
            const column = columns[dx];
            if (!column) {
                continue;
            }

            let weightSum = 0;
            let alphaSum = 0;
            let redSum = 0;
            let greenSum = 0;
            let blueSum = 0;

            for (let j = 0; j < row.weights.length; j++) {
                const weightY = row.weights[j] ?? 0;
                const rowOffset = (row.start + j) * image.width;

                for (let i = 0; i < column.weights.length; i++) {
                    const weight = weightY * (column.weights[i] ?? 0);
                    if (weight === 0) {
                        continue;
                    }
                    const offset = (rowOffset + column.start + i) * CHANNELS;
                    const alpha = image.data[offset + 3] ?? 0;
                    const weightedAlpha = alpha * weight;

                    weightSum += weight;
                    alphaSum += weightedAlpha;
                    redSum += (image.data[offset] ?? 0) * weightedAlpha;
                    greenSum += (image.data[offset + 1] ?? 0) * weightedAlpha;
                    blueSum += (image.data[offset + 2] ?? 0) * weightedAlpha;
                }
            }

            if (weightSum === 0) {
                continue;
            }

            const out = (outY * canvas.width + outX) * CHANNELS;
            if (alphaSum === 0) {
                canvas.data[out] = 0;
                canvas.data[out + 1] = 0;
                canvas.data[out + 2] = 0;
                canvas.data[out + 3] = 0;
                continue;
            }

            canvas.data[out] = toByte(redSum / alphaSum);
            canvas.data[out + 1] = toByte(greenSum / alphaSum);
            canvas.data[out + 2] = toByte(blueSum / alphaSum);
            canvas.data[out + 3] = toByte(alphaSum / weightSum);
        }
    }
}

/**
 * For each output index along one axis, the first source index it covers and
 * the coverage of every source index from there on
 */
function buildSpans(sourceStart: number, sourceLength: number, outputLength: number, limit: number): Span[] {
    const ratio = sourceLength / outputLength;
    const spans: Span[] = [];

    for (let d = 0; d < outputLength; d++) {
        const from = Math.max(0, sourceStart + d * ratio);
        const to = Math.min(limit, sourceStart + (d + 1) * ratio);
        const start = Math.min(Math.floor(from), limit - 1);
        const end = Math.max(start + 1, Math.ceil(to));
        const weights: number[] = [];

        for (let s = start; s < end; s++) {
            const coverage = Math.min(to, s + 1) - Math.max(from, s);
            weights.push(coverage > 0 ? coverage : 0);
        }

        // Window narrower than a pixel at the image edge
        if (weights.every((w): boolean => w === 0)) {
            weights[0] = 1;
        }

        spans.push({ start, weights });
    }

    return spans;
}

function toByte(value: number): number {
    return Math.min(255, Math.max(0, Math.round(value)));
}
