import sharp from "sharp";
import { randomUUID } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { UploadError } from "../ErrorHandler";
import { logger as MainLogger } from "../Logger";
import { headerDimensions } from "./headerDimensions";
import { createCanvas, OPAQUE_BLACK, resampleInto, TRANSPARENT, type RasterImage } from "./resample";
import type { RasterFormat, Size, TransformDescriptor } from "../../types/upload.types";

const logger = MainLogger.child({ scope: "TransformExecutor" });

const FORMATS_BY_MIME: Record<string, RasterFormat> = {
    "image/gif": "gif",
    "image/png": "png",
    "image/x-png": "png",
    "image/jpeg": "jpeg",
    "image/jpg": "jpeg",
    "image/pjpeg": "jpeg"
};

/**
 * Map a mime type to one of the raster formats the executor can write
 */
export function formatFromMime(mimeType: string): RasterFormat {
    const format = FORMATS_BY_MIME[mimeType.toLowerCase()];
    if (!format) {
        throw new UploadError("UNSUPPORTED_FORMAT", `Cannot transform ${mimeType} images`, { mimeType });
    }
    return format;
}

/**
 * TransformExecutor - turn a TransformDescriptor into encoded bytes
 *
 * sharp only decodes and encodes; the pixels between are produced by the
 * area-averaging resampler so every transform kind shares one code path.
 */
export class TransformExecutor {
    public async apply(bytes: Buffer, format: RasterFormat, descriptor: TransformDescriptor): Promise<Buffer> {
        const image = await this.decode(bytes);
        const canvas = createCanvas(
            descriptor.output.width,
            descriptor.output.height,
            format === "jpeg" ? OPAQUE_BLACK : TRANSPARENT
        );

        resampleInto(image, canvas, descriptor.source, descriptor.destination, descriptor.flip);

        return this.encode(canvas, format, descriptor.quality);
    }

    /**
     * Write to a hidden sibling first, then rename over the target
     */
    public async write(bytes: Buffer, target: string): Promise<void> {
        const temporary = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);

        try {
            await writeFile(temporary, bytes);
            await rename(temporary, target);
            logger.debug(`Wrote ${bytes.length} bytes to ${target}`);
        } catch (error) {
            await rm(temporary, { force: true });
            throw new UploadError(
                "IO_FAILURE",
                `Failed to write ${target}: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { target },
                { cause: error }
            );
        }
    }

    /**
     * Width and height of encoded image bytes; BMP and ICO are read from
     * their headers since sharp does not decode them
     */
    public async probe(bytes: Buffer): Promise<Size> {
        try {
            const metadata = await sharp(bytes).metadata();
            if (!metadata.width || !metadata.height) {
                throw new Error("image has no dimensions");
            }
            return { width: metadata.width, height: metadata.height };
        } catch (error) {
            const fromHeader = headerDimensions(bytes);
            if (fromHeader) {
                return fromHeader;
            }
            throw new UploadError(
                "UNSUPPORTED_FORMAT",
                `Unable to read image dimensions: ${error instanceof Error ? error.message : 'Unknown error'}`,
                undefined,
                { cause: error }
            );
        }
    }

    private async decode(bytes: Buffer): Promise<RasterImage> {
        try {
            const { data, info } = await sharp(bytes)
                .ensureAlpha()
                .raw()
                .toBuffer({ resolveWithObject: true });

            return {
                data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
                width: info.width,
                height: info.height
            };
        } catch (error) {
            throw new UploadError(
                "UNSUPPORTED_FORMAT",
                `Unable to decode image: ${error instanceof Error ? error.message : 'Unknown error'}`,
                undefined,
                { cause: error }
            );
        }
    }

    private async encode(canvas: RasterImage, format: RasterFormat, quality: number): Promise<Buffer> {
        const pipeline = sharp(Buffer.from(canvas.data.buffer, canvas.data.byteOffset, canvas.data.byteLength), {
            raw: { width: canvas.width, height: canvas.height, channels: 4 }
        });

        switch (format) {
            case "gif":
                return pipeline.gif().toBuffer();
            case "png":
                return pipeline.png().toBuffer();
            case "jpeg":
                // libjpeg takes 1-100
                return pipeline.jpeg({ quality: Math.max(1, Math.round(quality)) }).toBuffer();
        }
    }
}
