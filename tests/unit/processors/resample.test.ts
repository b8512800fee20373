/**
 * Unit tests for the area-averaging resampler
 */

import { describe, test, expect } from "vitest";
import { createCanvas, OPAQUE_BLACK, resampleInto, TRANSPARENT, type RasterImage } from "../../../core/processors/resample";

function image(width: number, height: number, pixels: number[][]): RasterImage {
    return { data: Uint8Array.from(pixels.flat()), width, height };
}

function full(width: number, height: number) {
    return { x: 0, y: 0, width, height };
}

const RED = [255, 0, 0, 255];
const GREEN = [0, 255, 0, 255];
const BLUE = [0, 0, 255, 255];
const WHITE = [255, 255, 255, 255];

describe("createCanvas", () => {
    test("fills every pixel", () => {
        expect([...createCanvas(2, 1, OPAQUE_BLACK).data]).toEqual([0, 0, 0, 255, 0, 0, 0, 255]);
        expect([...createCanvas(1, 1, TRANSPARENT).data]).toEqual([255, 255, 255, 0]);
    });
});

describe("resampleInto", () => {
    test("upscales and downscales back to the same pixels", () => {
        const source = image(2, 2, [RED, GREEN, BLUE, WHITE]);

        const large = createCanvas(4, 4, TRANSPARENT);
        resampleInto(source, large, full(2, 2), full(4, 4));
        expect([...large.data.subarray(0, 16)]).toEqual([...RED, ...RED, ...GREEN, ...GREEN]);

        const small = createCanvas(2, 2, TRANSPARENT);
        resampleInto(large, small, full(4, 4), full(2, 2));
        expect([...small.data]).toEqual([...RED, ...GREEN, ...BLUE, ...WHITE]);
    });

    test("averages the covered pixels", () => {
        const source = image(2, 1, [[0, 0, 0, 255], WHITE]);
        const canvas = createCanvas(1, 1, TRANSPARENT);

        resampleInto(source, canvas, full(2, 1), full(1, 1));

        expect([...canvas.data]).toEqual([128, 128, 128, 255]);
    });

    test("weights colour by alpha", () => {
        const source = image(2, 1, [RED, [0, 0, 255, 0]]);
        const canvas = createCanvas(1, 1, TRANSPARENT);

        resampleInto(source, canvas, full(2, 1), full(1, 1));

        expect([...canvas.data]).toEqual([255, 0, 0, 128]);
    });

    test("mirrors horizontally and vertically", () => {
        const row = image(2, 1, [RED, BLUE]);
        const mirrored = createCanvas(2, 1, TRANSPARENT);
        resampleInto(row, mirrored, full(2, 1), full(2, 1), { horizontal: true, vertical: false });
        expect([...mirrored.data]).toEqual([...BLUE, ...RED]);

        const column = image(1, 2, [RED, BLUE]);
        const upsideDown = createCanvas(1, 2, TRANSPARENT);
        resampleInto(column, upsideDown, full(1, 2), full(1, 2), { horizontal: false, vertical: true });
        expect([...upsideDown.data]).toEqual([...BLUE, ...RED]);
    });

    test("reads only the source window", () => {
        const source = image(3, 1, [RED, GREEN, BLUE]);
        const canvas = createCanvas(1, 1, TRANSPARENT);

        resampleInto(source, canvas, { x: 1, y: 0, width: 1, height: 1 }, full(1, 1));

        expect([...canvas.data]).toEqual(GREEN);
    });

    test("leaves the canvas outside the destination window untouched", () => {
        const source = image(1, 1, [RED]);
        const canvas = createCanvas(3, 1, OPAQUE_BLACK);

        resampleInto(source, canvas, full(1, 1), { x: 1, y: 0, width: 1, height: 1 });

        expect([...canvas.data]).toEqual([0, 0, 0, 255, ...RED, 0, 0, 0, 255]);
    });
});
