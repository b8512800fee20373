/**
 * Unit tests for transform geometry
 */

import { describe, test, expect } from "vitest";
import { crop, flip, resize, scale } from "../../../core/processors/ImageGeometry";
import { thrownCode } from "../helpers";

describe("resize", () => {
    test("derives the missing dimension from the aspect ratio", () => {
        const byWidth = resize(800, 400, { width: 400 });
        expect(byWidth.output).toEqual({ width: 400, height: 200 });
        expect(byWidth.source).toEqual({ x: 0, y: 0, width: 800, height: 400 });
        expect(byWidth.destination).toEqual({ x: 0, y: 0, width: 400, height: 200 });

        expect(resize(800, 400, { height: 100 }).output).toEqual({ width: 200, height: 100 });
    });

    test("fits inside a box using the smaller factor", () => {
        expect(resize(800, 400, { width: 400, height: 400 }).output).toEqual({ width: 400, height: 200 });
        expect(resize(800, 400, { width: 200, height: 50 }).output).toEqual({ width: 100, height: 50 });
        expect(resize(800, 400, { width: 400, height: 200 }).output).toEqual({ width: 400, height: 200 });
    });

    test("stretches to the box without aspect", () => {
        expect(resize(800, 400, { width: 300, height: 300, aspect: false }).output).toEqual({ width: 300, height: 300 });
    });

    test("keeps the original size for larger boxes unless expanding", () => {
        expect(resize(800, 400, { width: 1600 }).output).toEqual({ width: 800, height: 400 });
        expect(resize(800, 400, { width: 1600, expand: true }).output).toEqual({ width: 1600, height: 800 });
    });

    test("defaults quality to 100 and never flips", () => {
        const descriptor = resize(800, 400, { width: 400 });
        expect(descriptor.quality).toBe(100);
        expect(descriptor.flip).toEqual({ horizontal: false, vertical: false });
    });

    test("rejects bad options and empty results", () => {
        expect(thrownCode(() => resize(800, 400, {}))).toBe("INVALID_OPTIONS");
        expect(thrownCode(() => resize(800, 400, { width: 400, quality: 101 }))).toBe("INVALID_OPTIONS");
        expect(thrownCode(() => resize(800, 400, { width: Number.NaN }))).toBe("INVALID_OPTIONS");
        expect(thrownCode(() => resize(10, 10, { width: 0.4 }))).toBe("INVALID_GEOMETRY");
        expect(thrownCode(() => resize(0, 10, { width: 5 }))).toBe("INVALID_GEOMETRY");
    });
});

describe("scale", () => {
    test("halves by default, rounding each dimension", () => {
        expect(scale(800, 400).output).toEqual({ width: 400, height: 200 });
        expect(scale(801, 401).output).toEqual({ width: 401, height: 201 });
    });

    test("accepts other factors", () => {
        expect(scale(100, 50, { percent: 2 }).output).toEqual({ width: 200, height: 100 });
    });

    test("rejects non-positive factors", () => {
        expect(thrownCode(() => scale(100, 50, { percent: 0 }))).toBe("INVALID_OPTIONS");
        expect(thrownCode(() => scale(1, 1, { percent: 0.1 }))).toBe("INVALID_GEOMETRY");
    });
});

describe("crop", () => {
    test("cuts a centered square of the shorter side", () => {
        const descriptor = crop(800, 400);
        expect(descriptor.output).toEqual({ width: 400, height: 400 });
        expect(descriptor.source).toEqual({ x: 200, y: 0, width: 400, height: 400 });
        expect(descriptor.destination).toEqual({ x: 0, y: 0, width: 400, height: 400 });
    });

    test("rounds the centered offset up", () => {
        expect(crop(801, 400).source).toEqual({ x: 201, y: 0, width: 400, height: 400 });
    });

    test("anchors at the start or end", () => {
        expect(crop(800, 400, { location: "left" }).source.x).toBe(0);
        expect(crop(800, 400, { location: "right" }).source.x).toBe(400);
        expect(crop(400, 800, { width: 100, height: 100, location: "bottom" }).source).toEqual({ x: 0, y: 400, width: 400, height: 400 });
        expect(crop(400, 800, { width: 100, height: 100, location: "top" }).source).toEqual({ x: 0, y: 0, width: 400, height: 400 });
    });

    test("reads the whole image when the box has the same aspect", () => {
        const descriptor = crop(800, 400, { width: 200, height: 100 });
        expect(descriptor.output).toEqual({ width: 200, height: 100 });
        expect(descriptor.source).toEqual({ x: 0, y: 0, width: 800, height: 400 });
    });
});

describe("flip", () => {
    test("flips vertically by default", () => {
        const descriptor = flip(10, 20);
        expect(descriptor.flip).toEqual({ horizontal: false, vertical: true });
        expect(descriptor.output).toEqual({ width: 10, height: 20 });
        expect(descriptor.source).toEqual({ x: 0, y: 0, width: 10, height: 20 });
    });

    test("sets both flags for both", () => {
        expect(flip(10, 20, { direction: "both" }).flip).toEqual({ horizontal: true, vertical: true });
        expect(flip(10, 20, { direction: "horizontal" }).flip).toEqual({ horizontal: true, vertical: false });
    });
});
