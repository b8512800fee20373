import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { pathExists } from "../../../core/NameResolver";
import { LocalStorageProvider } from "../../../core/storage/LocalStorageProvider";
import { makeTempRoot, removeTempRoot } from "../../fixtures/files/images";
import { rejectionCode } from "../helpers";

describe("LocalStorageProvider", () => {
    let root: string;
    let basePath: string;
    let provider: LocalStorageProvider;

    beforeEach(async () => {
        root = await makeTempRoot();
        basePath = join(root, "store");
        provider = new LocalStorageProvider({ basePath, baseUrl: "https://cdn.test/" });
    });

    afterEach(async () => {
        await removeTempRoot(root);
    });

    test("initialize creates the base path", async () => {
        await provider.initialize();

        expect(await pathExists(basePath)).toBe(true);
        expect(provider.getName()).toBe("local");
    });

    test("stores bytes under bucket and key", async () => {
        const result = await provider.store(Buffer.from("hello"), "media", "a/b.txt");

        expect(result).toEqual({ url: "https://cdn.test/media/a/b.txt", bucket: "media", key: "a/b.txt" });
        expect(await readFile(join(basePath, "media", "a", "b.txt"), "utf8")).toBe("hello");
        expect(await provider.exists("media", "a/b.txt")).toBe(true);
    });

    test("copies a file source", async () => {
        const source = join(root, "source.txt");
        await writeFile(source, "copied");

        await provider.store(source, "media", "copy.txt");

        expect(await readFile(join(basePath, "media", "copy.txt"), "utf8")).toBe("copied");
        expect(await pathExists(source)).toBe(true);
    });

    test("keys cannot climb out of the bucket", async () => {
        const result = await provider.store(Buffer.from("x"), "media", "../../escape.txt");

        expect(result.key).toBe("escape.txt");
        expect(await pathExists(join(basePath, "media", "escape.txt"))).toBe(true);
    });

    test("a missing source fails with IO_FAILURE", async () => {
        expect(await rejectionCode(provider.store(join(root, "none.txt"), "media", "none.txt"))).toBe("IO_FAILURE");
    });

    test("deletes by key, by URL and by bucket path", async () => {
        const { url } = await provider.store(Buffer.from("1"), "media", "one.txt");
        await provider.store(Buffer.from("2"), "media", "two.txt");
        await provider.store(Buffer.from("3"), "media", "three.txt");

        expect(await provider.delete("media", url)).toBe(true);
        expect(await provider.delete("media", "two.txt")).toBe(true);
        expect(await provider.delete("media", "/media/three.txt")).toBe(true);
        expect(await provider.exists("media", "one.txt")).toBe(false);
        expect(await provider.exists("media", "three.txt")).toBe(false);
    });

    test("delete reports missing objects", async () => {
        expect(await provider.delete("media", "missing.txt")).toBe(false);
    });
});
