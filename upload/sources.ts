import { randomUUID } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rm, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { isUploadError, UploadError } from "../core/ErrorHandler";
import { logger as MainLogger } from "../core/Logger";
import type { MimeRegistry } from "../core/MimeRegistry";
import { formatSize } from "../core/SizePolicy";
import type { FormFile, FormFileTree, UploadEntry } from "../types/upload.types";

const logger = MainLogger.child({ scope: "UploadSources" });

const FALLBACK_MIME = "application/octet-stream";

export function isFormFile(value: FormFile | FormFileTree): value is FormFile {
    return typeof value.tempPath === "string" && typeof value.name === "string";
}

/**
 * Flatten nested form fields into dotted keys: { Post: { cover: file } }
 * becomes "Post.cover"
 */
export function flattenFormFiles(tree: FormFileTree, prefix: string = ""): Map<string, FormFile> {
    const files = new Map<string, FormFile>();

    for (const [key, value] of Object.entries(tree)) {
        const field = prefix ? `${prefix}.${key}` : key;
        if (isFormFile(value)) {
            files.set(field, value);
        } else {
            for (const [nested, file] of flattenFormFiles(value, field)) {
                files.set(nested, file);
            }
        }
    }

    return files;
}

function baseEntry(field: string, name: string, registry: MimeRegistry): Pick<UploadEntry, "field" | "name" | "ext" | "transforms" | "state"> {
    return {
        field,
        name,
        ext: registry.extensionOf(name),
        transforms: {},
        state: "pending"
    };
}

export function entryFromFormFile(field: string, file: FormFile, registry: MimeRegistry): UploadEntry {
    return {
        ...baseEntry(field, file.name, registry),
        type: file.type.trim().toLowerCase(),
        size: file.size,
        source: "form",
        sourceLocation: file.tempPath,
        transferError: file.error
    };
}

/**
 * Entry for a body stream already staged on disk; the type follows the name
 */
export function entryFromStream(
    field: string,
    name: string,
    staged: { path: string; size: number },
    registry: MimeRegistry
): UploadEntry {
    const entry = baseEntry(field, name, registry);
    return {
        ...entry,
        type: registry.mimeTypeForExtension(entry.ext) ?? FALLBACK_MIME,
        size: staged.size,
        source: "stream",
        sourceLocation: staged.path,
        transferError: 0
    };
}

export async function entryFromImport(path: string, registry: MimeRegistry): Promise<UploadEntry> {
    const location = resolve(path);

    try {
        const info = await stat(location);
        if (!info.isFile()) {
            throw new Error("not a regular file");
        }

        return {
            ...baseEntry(path, basename(location), registry),
            type: (await registry.mimeTypeOf(location)) ?? FALLBACK_MIME,
            size: info.size,
            source: "local-import",
            sourceLocation: location,
            transferError: 0
        };
    } catch (error) {
        throw new UploadError(
            "MISSING_SOURCE",
            `Import source ${path} is not readable: ${error instanceof Error ? error.message : 'Unknown error'}`,
            { path },
            { cause: error }
        );
    }
}

/**
 * Entry for a URL; size is unknown until the body has been downloaded
 */
export function entryFromRemote(url: string, registry: MimeRegistry): UploadEntry {
    let name: string;
    try {
        name = basename(decodeURIComponent(new URL(url).pathname));
    } catch (error) {
        throw new UploadError("INVALID_OPTIONS", `Invalid import URL: ${url}`, { url }, { cause: error });
    }

    const entry = baseEntry(url, name, registry);
    return {
        ...entry,
        type: registry.mimeTypeForExtension(entry.ext) ?? FALLBACK_MIME,
        size: 0,
        source: "remote-import",
        sourceLocation: url,
        transferError: 0
    };
}

/**
 * Write a readable body into a fresh file inside `tempDir`
 */
export async function stageStream(readable: Readable, tempDir: string): Promise<{ path: string; size: number }> {
    await mkdir(tempDir, { recursive: true });
    const path = join(tempDir, `upload-${randomUUID()}`);

    try {
        await pipeline(readable, createWriteStream(path));
        const { size } = await stat(path);
        logger.debug(`Staged ${size} bytes at ${path}`);
        return { path, size };
    } catch (error) {
        await rm(path, { force: true });
        throw new UploadError(
            "TRANSFER_INCOMPLETE",
            `Stream upload did not complete: ${error instanceof Error ? error.message : 'Unknown error'}`,
            undefined,
            { cause: error }
        );
    }
}

/**
 * Download `url` to `destination`, returning the byte count. Stops with
 * FILE_TOO_LARGE as soon as more than `maxBytes` arrive.
 */
export async function downloadRemote(url: string, destination: string, maxBytes: number = Infinity): Promise<number> {
    try {
        const response = await fetch(url);
        if (!response.ok || !response.body) {
            throw new Error(`HTTP ${response.status}`);
        }

        let received = 0;
        const limit = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                received += chunk.length;
                if (received > maxBytes) {
                    callback(new UploadError(
                        "FILE_TOO_LARGE",
                        `Download exceeds the limit of ${formatSize(maxBytes)}`,
                        { url, maxBytes }
                    ));
                    return;
                }
                callback(null, chunk);
            }
        });

        await pipeline(Readable.fromWeb(response.body), limit, createWriteStream(destination));
        const { size } = await stat(destination);
        logger.debug(`Downloaded ${size} bytes from ${url}`);
        return size;
    } catch (error) {
        if (isUploadError(error)) {
            throw error;
        }
        throw new UploadError(
            "IO_FAILURE",
            `Failed to download ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`,
            { url },
            { cause: error }
        );
    }
}
