/**
 * IngestionPipeline tests: real files in temporary directories, real sharp
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { DEFAULT_UPLOAD_CONFIG } from "../../../config/upload.config";
import { FileValidator } from "../../../core/FileValidator";
import { MimeRegistry } from "../../../core/MimeRegistry";
import { NameResolver, pathExists } from "../../../core/NameResolver";
import { TransformExecutor } from "../../../core/processors/TransformExecutor";
import { IngestionPipeline, type PipelineDependencies } from "../../../upload/IngestionPipeline";
import type { UploadConfiguration, UploadOutcome } from "../../../types/upload.types";
import { makeTempRoot, pixelBmp, removeTempRoot, sizeOf, solidPng, stageFormFile } from "../../fixtures/files/images";
import { rejectionCode } from "../helpers";

type Success = Extract<UploadOutcome, { success: true }>;

function succeeded(outcome: UploadOutcome): Success {
    if (!outcome.success) {
        throw new Error(`Expected success, got ${outcome.error.code}: ${outcome.error.message}`);
    }
    return outcome;
}

function failureCode(outcome: UploadOutcome): string {
    return outcome.success ? "success" : outcome.error.code;
}

describe("IngestionPipeline", () => {
    let root: string;
    let tempDir: string;
    let baseDir: string;
    let uploadDir: string;
    let png: Buffer;

    function deps(overrides: Partial<UploadConfiguration> = {}): PipelineDependencies {
        const config: UploadConfiguration = {
            ...DEFAULT_UPLOAD_CONFIG,
            tempDir,
            baseDir,
            uploadDir: "files/uploads/",
            ...overrides
        };
        const registry = MimeRegistry.withDefaults();
        return {
            config,
            registry,
            validator: new FileValidator(registry, config),
            resolver: new NameResolver(config.maxNameLength),
            executor: new TransformExecutor()
        };
    }

    async function pipelineWith(name: string, type: string, bytes: Buffer | string, field: string = "avatar"): Promise<IngestionPipeline> {
        const file = await stageFormFile(tempDir, name, type, bytes);
        return new IngestionPipeline(deps(), { [field]: file });
    }

    beforeEach(async () => {
        root = await makeTempRoot();
        tempDir = join(root, "tmp");
        baseDir = join(root, "public");
        uploadDir = join(baseDir, "files", "uploads");
        await mkdir(tempDir);
        png = await solidPng(8, 4);
    });

    afterEach(async () => {
        await removeTempRoot(root);
        vi.unstubAllGlobals();
    });

    describe("upload", () => {
        test("moves a form file into the upload directory and records it", async () => {
            const file = await stageFormFile(tempDir, "photo.png", "image/png", png);
            const pipeline = new IngestionPipeline(deps(), { avatar: file });

            const { record, transforms, transformErrors } = succeeded(await pipeline.upload("avatar"));

            expect(record).toMatchObject({
                field: "avatar",
                name: "photo.png",
                ext: "png",
                type: "image/png",
                group: "image",
                size: png.length,
                source: "form",
                path: "/files/uploads/photo.png",
                width: 8,
                height: 4,
                transforms: {}
            });
            expect(transforms).toEqual([]);
            expect(transformErrors).toEqual([]);
            expect(await readFile(join(uploadDir, "photo.png"))).toEqual(png);
            expect(await pathExists(file.tempPath)).toBe(false);
            expect(pipeline.get("avatar")?.state).toBe("recorded");
        });

        test("omits dimensions for non-images", async () => {
            const pipeline = await pipelineWith("notes.txt", "text/plain", "hello");

            const { record } = succeeded(await pipeline.upload("avatar"));

            expect(record.group).toBe("text");
            expect(record.filesize).toBe("5 B");
            expect(record.width).toBeUndefined();
            expect(record.height).toBeUndefined();
        });

        test("reads BMP dimensions from the header", async () => {
            const pipeline = await pipelineWith("pixel.bmp", "image/bmp", pixelBmp());

            const { record } = succeeded(await pipeline.upload("avatar"));

            expect(record).toMatchObject({ path: "/files/uploads/pixel.bmp", group: "image", width: 1, height: 1 });
        });

        test("accepts text that starts with a short binary marker", async () => {
            const pipeline = await pipelineWith("cars.csv", "text/csv", "BMW,Audi\n1,2\n");

            const { record } = succeeded(await pipeline.upload("avatar"));

            expect(record).toMatchObject({ path: "/files/uploads/cars.csv", group: "text" });
        });

        test("sanitises the stored name", async () => {
            const pipeline = await pipelineWith("My Photo!.PNG", "image/png", png);

            const { record } = succeeded(await pipeline.upload("avatar"));

            expect(record.path).toBe("/files/uploads/My_Photo.png");
            expect(record.name).toBe("My_Photo.png");
        });

        test("numbers colliding names and replaces them with overwrite", async () => {
            succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar"));

            const second = succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar"));
            expect(second.record.path).toBe("/files/uploads/photo_1.png");

            const third = succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar", { overwrite: true }));
            expect(third.record.path).toBe("/files/uploads/photo.png");
            expect((await readdir(uploadDir)).sort()).toEqual(["photo.png", "photo_1.png"]);
        });

        test("applies name, prepend and append options", async () => {
            const renamed = succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar", { name: "profile" }));
            expect(renamed.record.path).toBe("/files/uploads/profile.png");

            const formatted = succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar", {
                name: (name, field) => `${field}-${name}`
            }));
            expect(formatted.record.path).toBe("/files/uploads/avatar-photo.png");

            const wrapped = succeeded(await (await pipelineWith("photo.png", "image/png", png)).upload("avatar", { prepend: "u1_", append: "_orig" }));
            expect(wrapped.record.path).toBe("/files/uploads/u1_photo_orig.png");
        });

        test("stages and stores stream bodies", async () => {
            const pipeline = new IngestionPipeline(deps());
            await pipeline.addStream("file", "notes.txt", Readable.from([Buffer.from("hello world")]));

            const { record } = succeeded(await pipeline.upload("file"));

            expect(record).toMatchObject({ path: "/files/uploads/notes.txt", type: "text/plain", size: 11, source: "stream", group: "text" });
        });

        test("takes the stream name from the configured request field", async () => {
            const pipeline = new IngestionPipeline(deps({ ajaxField: "qqfile" }));
            await pipeline.addRequestStream({ qqfile: "report.txt" }, Readable.from([Buffer.from("abc")]));

            const { record } = succeeded(await pipeline.upload("qqfile"));

            expect(record.path).toBe("/files/uploads/report.txt");
            expect(await rejectionCode(pipeline.addRequestStream({}, Readable.from([Buffer.from("abc")])))).toBe("MISSING_SOURCE");
        });

        test("removes the staged body of a rejected stream", async () => {
            const pipeline = new IngestionPipeline(deps());
            const entry = await pipeline.addStream("file", "tool.exe", Readable.from([Buffer.from("MZ")]));

            expect(failureCode(await pipeline.upload("file"))).toBe("UNSUPPORTED_TYPE");
            expect(await pathExists(entry.sourceLocation)).toBe(false);
        });
    });

    describe("rejections", () => {
        test("rejects unsupported types without writing anything", async () => {
            const pipeline = await pipelineWith("tool.exe", "application/x-msdownload", "MZ");

            const outcome = await pipeline.upload("avatar");

            expect(failureCode(outcome)).toBe("UNSUPPORTED_TYPE");
            expect(pipeline.get("avatar")?.state).toBe("rejected");
            expect(pipeline.get("avatar")?.error?.code).toBe("UNSUPPORTED_TYPE");
            expect(pipeline.get("avatar")?.group).toBeUndefined();
            expect(await pathExists(uploadDir)).toBe(false);
        });

        test("reports unknown and already processed fields", async () => {
            const pipeline = await pipelineWith("notes.txt", "text/plain", "hello");

            expect(failureCode(await pipeline.upload("nope"))).toBe("MISSING_SOURCE");
            succeeded(await pipeline.upload("avatar"));
            expect(failureCode(await pipeline.upload("avatar"))).toBe("INVALID_OPTIONS");
        });

        test("rejects an empty formatted name", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            expect(failureCode(await pipeline.upload("avatar", { name: () => "" }))).toBe("INVALID_OPTIONS");
            expect(pipeline.get("avatar")?.state).toBe("rejected");
        });

        test("rejects images that cannot be decoded", async () => {
            const broken = Buffer.concat([Buffer.from([0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A]), Buffer.from("garbage")]);
            const pipeline = await pipelineWith("broken.png", "image/png", broken);

            expect(failureCode(await pipeline.upload("avatar"))).toBe("UNSUPPORTED_FORMAT");
        });
    });

    describe("transforms", () => {
        test("writes each derived image beside the original", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            const outcome = succeeded(await pipeline.upload("avatar", {
                transforms: [
                    { kind: "resize", width: 4 },
                    { kind: "crop" },
                    { kind: "flip", direction: "both" },
                    { kind: "scale" }
                ]
            }));

            expect(outcome.transforms).toEqual([
                { kind: "resize", label: "resized_4x2", path: "/files/uploads/photo_resized_4x2.png", width: 4, height: 2 },
                { kind: "crop", label: "cropped_4x4", path: "/files/uploads/photo_cropped_4x4.png", width: 4, height: 4 },
                { kind: "flip", label: "flipped_both", path: "/files/uploads/photo_flipped_both.png", width: 8, height: 4 },
                { kind: "scale", label: "scaled_4x2", path: "/files/uploads/photo_scaled_4x2.png", width: 4, height: 2 }
            ]);
            expect(outcome.record.transforms).toEqual({
                resized_4x2: "/files/uploads/photo_resized_4x2.png",
                cropped_4x4: "/files/uploads/photo_cropped_4x4.png",
                flipped_both: "/files/uploads/photo_flipped_both.png",
                scaled_4x2: "/files/uploads/photo_scaled_4x2.png"
            });
            expect(await sizeOf(await readFile(join(uploadDir, "photo_cropped_4x4.png")))).toEqual({ width: 4, height: 4 });
            expect(await readFile(join(uploadDir, "photo.png"))).toEqual(png);
            expect(pipeline.get("avatar")?.state).toBe("recorded");
        });

        test("numbers a free name when the suffix is disabled", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            const outcome = succeeded(await pipeline.upload("avatar", { transforms: [{ kind: "flip", append: false }] }));

            expect(outcome.record.transforms).toEqual({ flipped_vert: "/files/uploads/photo_1.png" });
        });

        test("records repeated transforms under distinct labels", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            const outcome = succeeded(await pipeline.upload("avatar", { transforms: [{ kind: "flip" }, { kind: "flip" }] }));

            expect(outcome.transforms.map(({ label, path }) => [label, path])).toEqual([
                ["flipped_vert", "/files/uploads/photo_flipped_vert.png"],
                ["flipped_vert_1", "/files/uploads/photo_flipped_vert_1.png"]
            ]);
            expect(outcome.record.transforms).toEqual({
                flipped_vert: "/files/uploads/photo_flipped_vert.png",
                flipped_vert_1: "/files/uploads/photo_flipped_vert_1.png"
            });
            expect((await readdir(uploadDir)).sort()).toEqual(["photo.png", "photo_flipped_vert.png", "photo_flipped_vert_1.png"]);
        });

        test("keeps an earlier transform of the same label under overwrite", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            const outcome = succeeded(await pipeline.upload("avatar", { overwrite: true, transforms: [{ kind: "flip" }, { kind: "flip" }] }));

            expect(outcome.record.transforms).toEqual({
                flipped_vert: "/files/uploads/photo_flipped_vert.png",
                flipped_vert_1: "/files/uploads/photo_flipped_vert_1.png"
            });
        });

        test("reports failed transforms without rejecting the entry", async () => {
            const pipeline = await pipelineWith("photo.png", "image/png", png);

            const outcome = succeeded(await pipeline.upload("avatar", { transforms: [{ kind: "resize" }] }));

            expect(outcome.transformErrors.map(({ kind, error }) => [kind, error.code])).toEqual([["resize", "INVALID_OPTIONS"]]);
            expect(await readdir(uploadDir)).toEqual(["photo.png"]);
        });

        test("refuses to transform non-images", async () => {
            const pipeline = await pipelineWith("notes.txt", "text/plain", "hello");

            const outcome = succeeded(await pipeline.upload("avatar", { transforms: [{ kind: "scale" }] }));

            expect(outcome.transformErrors.map(({ error }) => error.code)).toEqual(["UNSUPPORTED_FORMAT"]);
            expect(await readdir(uploadDir)).toEqual(["notes.txt"]);
        });
    });

    describe("import", () => {
        test("copies a local file and keeps the original", async () => {
            const source = join(root, "incoming", "report.pdf");
            await mkdir(join(root, "incoming"));
            await writeFile(source, "%PDF-1.4 test");

            const { record } = succeeded(await new IngestionPipeline(deps()).import(source));

            expect(record).toMatchObject({ field: source, path: "/files/uploads/report.pdf", group: "document", source: "local-import" });
            expect(await pathExists(source)).toBe(true);
        });

        test("removes the original with delete", async () => {
            const source = join(root, "report.pdf");
            await writeFile(source, "%PDF-1.4 test");

            succeeded(await new IngestionPipeline(deps()).import(source, { delete: true }));

            expect(await pathExists(source)).toBe(false);
            expect(await readFile(join(uploadDir, "report.pdf"), "utf8")).toBe("%PDF-1.4 test");
        });

        test("keeps the office format of a zip-based document", async () => {
            const source = join(root, "report.docx");
            await writeFile(source, Buffer.from([0x50, 0x4B, 0x03, 0x04, 0, 0, 0, 0]));

            const { record } = succeeded(await new IngestionPipeline(deps()).import(source));

            expect(record).toMatchObject({
                path: "/files/uploads/report.docx",
                group: "document",
                type: "application/vnd.openxmlformats-officedocument.wordprocessingml.document"
            });
        });

        test("fails for missing paths", async () => {
            expect(failureCode(await new IngestionPipeline(deps()).import(join(root, "nope.pdf")))).toBe("MISSING_SOURCE");
        });
    });

    describe("importRemote", () => {
        test("downloads, measures and records the file", async () => {
            vi.stubGlobal("fetch", vi.fn(async () => new Response(png)));

            const { record } = succeeded(await new IngestionPipeline(deps()).importRemote("https://images.test/pics/remote.png"));

            expect(record).toMatchObject({
                path: "/files/uploads/remote.png",
                source: "remote-import",
                size: png.length,
                width: 8,
                height: 4
            });
        });

        test("stops a download once it passes the size limit", async () => {
            vi.stubGlobal("fetch", vi.fn(async () => new Response("x".repeat(200))));
            const pipeline = new IngestionPipeline(deps({ maxFileSize: "100B" }));

            expect(failureCode(await pipeline.importRemote("https://files.test/big.txt"))).toBe("FILE_TOO_LARGE");
            expect(await readdir(uploadDir)).toEqual([]);
        });

        test("rejects failed downloads", async () => {
            vi.stubGlobal("fetch", vi.fn(async () => new Response("boom", { status: 500 })));

            expect(failureCode(await new IngestionPipeline(deps()).importRemote("https://files.test/a.txt"))).toBe("IO_FAILURE");
        });
    });

    describe("uploadAll", () => {
        async function batch(): Promise<IngestionPipeline> {
            return new IngestionPipeline(deps(), {
                a: await stageFormFile(tempDir, "photo.png", "image/png", png),
                b: await stageFormFile(tempDir, "other.png", "image/png", png),
                c: await stageFormFile(tempDir, "tool.exe", "application/x-msdownload", "MZ")
            });
        }

        test("rolls back every stored file when one field fails", async () => {
            const result = await (await batch()).uploadAll();

            expect(result.success).toBe(false);
            expect(result.totalFiles).toBe(3);
            expect(Object.keys(result.errors)).toEqual(["c"]);
            expect(result.errors.c?.code).toBe("UNSUPPORTED_TYPE");
            expect([...result.rolledBack].sort()).toEqual(["/files/uploads/other.png", "/files/uploads/photo.png"]);
            expect(result.records).toEqual({});
            expect(await readdir(uploadDir)).toEqual([]);
        });

        test("rolls back after parallel ingestion too", async () => {
            const result = await (await batch()).uploadAll(undefined, { concurrency: 3 });

            expect(result.success).toBe(false);
            expect(await readdir(uploadDir)).toEqual([]);
        });

        test("keeps stored files when rollback is disabled", async () => {
            const result = await (await batch()).uploadAll(undefined, { rollback: false });

            expect(result.success).toBe(false);
            expect(result.rolledBack).toEqual([]);
            expect(Object.keys(result.records)).toEqual(["a", "b"]);
            expect((await readdir(uploadDir)).sort()).toEqual(["other.png", "photo.png"]);
        });

        test("skips fields without a submitted file", async () => {
            const pipeline = await batch();

            const result = await pipeline.uploadAll(["a", "missing"]);

            expect(result.success).toBe(true);
            expect(result.totalFiles).toBe(1);
            expect(result.errors).toEqual({});
            expect(Object.keys(result.records)).toEqual(["a"]);
            expect(await readdir(uploadDir)).toEqual(["photo.png"]);
        });

        test("succeeds when every field is accepted", async () => {
            const pipeline = await batch();

            const result = await pipeline.uploadAll(["a", "b"]);

            expect(result.success).toBe(true);
            expect(result.totalFiles).toBe(2);
            expect(result.records.a?.path).toBe("/files/uploads/photo.png");
            expect(result.records.b?.path).toBe("/files/uploads/other.png");
            expect(pipeline.get("c")?.state).toBe("pending");
        });
    });
});
