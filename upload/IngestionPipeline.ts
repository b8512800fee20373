import { copyFile, readFile, rm } from "node:fs/promises";
import { basename, dirname, join, relative, sep } from "node:path";
import type { Readable } from "node:stream";
import * as z from "zod";
import { toUploadError, UploadError } from "../core/ErrorHandler";
import type { FileValidator } from "../core/FileValidator";
import { logger as MainLogger } from "../core/Logger";
import type { MimeRegistry } from "../core/MimeRegistry";
import type { NameResolver } from "../core/NameResolver";
import { crop, flip, FLIP_SUFFIXES, resize, scale } from "../core/processors/ImageGeometry";
import { formatFromMime, type TransformExecutor } from "../core/processors/TransformExecutor";
import { formatSize } from "../core/SizePolicy";
import { relocateFile } from "../utils/fileSystem";
import { transition } from "./EntryState";
import {
    downloadRemote,
    entryFromFormFile,
    entryFromImport,
    entryFromRemote,
    entryFromStream,
    flattenFormFiles,
    stageStream
} from "./sources";
import type {
    BatchUploadOptions,
    BatchUploadResult,
    FormFileTree,
    ImportOptions,
    NameFormatter,
    TransformDescriptor,
    TransformKind,
    TransformRequest,
    TransformResult,
    UploadConfiguration,
    UploadEntry,
    UploadOptions,
    UploadOutcome,
    UploadRecord
} from "../types/upload.types";

const logger = MainLogger.child({ scope: "IngestionPipeline" });

const transformSchema = z.object({
    kind: z.enum(["resize", "scale", "crop", "flip"])
}).passthrough();

const optionsSchema = z.object({
    name: z.union([z.string(), z.custom<NameFormatter>((value) => typeof value === "function", "name must be a string or a function")]).optional(),
    overwrite: z.boolean().optional(),
    append: z.string().optional(),
    prepend: z.string().optional(),
    delete: z.boolean().optional(),
    transforms: z.array(transformSchema).optional()
});

export interface PipelineDependencies {
    config: UploadConfiguration;
    registry: MimeRegistry;
    validator: FileValidator;
    resolver: NameResolver;
    executor: TransformExecutor;
}

type Materializer = (entry: UploadEntry, destination: string) => Promise<void>;

interface TransformFailure {
    kind: TransformKind;
    error: UploadError;
}

/**
 * IngestionPipeline - one request's worth of files.
 *
 * Entries move pending -> validated -> destination-resolved -> materialized
 * -> (transformed)* -> recorded, or end rejected. A pipeline is not shared
 * between requests; the registry, resolver and executor it holds are.
 */
export class IngestionPipeline {
    private readonly deps: PipelineDependencies;
    private readonly entries = new Map<string, UploadEntry>();

    constructor(deps: PipelineDependencies, formFiles: FormFileTree = {}) {
        this.deps = deps;

        for (const [field, file] of flattenFormFiles(formFiles)) {
            this.entries.set(field, entryFromFormFile(field, file, deps.registry));
        }
    }

    public fields(): string[] {
        return [...this.entries.keys()];
    }

    public get(field: string): UploadEntry | undefined {
        return this.entries.get(field);
    }

    /**
     * Stage a request body stream (AJAX upload) as a pending entry
     */
    public async addStream(field: string, name: string, readable: Readable): Promise<UploadEntry> {
        const staged = await stageStream(readable, this.deps.config.tempDir);
        const entry = entryFromStream(field, name, staged, this.deps.registry);
        this.entries.set(field, entry);
        logger.debug(`Added stream entry ${field} (${name}, ${staged.size} bytes)`);
        return entry;
    }

    /**
     * Stage an AJAX body whose file name arrives in the query under the
     * configured `ajaxField`; the entry is keyed by that field
     */
    public async addRequestStream(query: Record<string, string | undefined>, readable: Readable): Promise<UploadEntry> {
        const field = this.deps.config.ajaxField;
        const name = field ? query[field] : undefined;
        if (!name) {
            throw new UploadError("MISSING_SOURCE", `No file name in request field '${field}'`, { field });
        }
        return this.addStream(field, name, readable);
    }

    /**
     * Ingest a form or stream entry by field
     */
    public async upload(field: string, options: UploadOptions = {}): Promise<UploadOutcome> {
        const entry = this.entries.get(field);
        if (!entry) {
            return this.failure(field, new UploadError("MISSING_SOURCE", `No uploaded file for field ${field}`, { field }));
        }
        if (entry.source !== "form" && entry.source !== "stream") {
            return this.failure(field, new UploadError("INVALID_OPTIONS", `Field ${field} is not an upload`, { field }));
        }
        if (entry.state !== "pending") {
            return this.failure(field, new UploadError("INVALID_OPTIONS", `Field ${field} was already processed`, { field, state: entry.state }));
        }

        return this.ingest(entry, options, async (current, destination) => {
            await relocateFile(current.sourceLocation, destination);
        });
    }

    /**
     * Copy a file already on local disk into the upload directory
     */
    public async import(path: string, options: ImportOptions = {}): Promise<UploadOutcome> {
        let entry: UploadEntry;
        try {
            entry = await entryFromImport(path, this.deps.registry);
        } catch (error) {
            return this.failure(path, toUploadError(error, "MISSING_SOURCE"));
        }
        this.entries.set(entry.field, entry);

        return this.ingest(entry, options, async (current, destination) => {
            await copyFile(current.sourceLocation, destination);
            if (options.delete) {
                await rm(current.sourceLocation, { force: true });
                logger.debug(`Removed import source ${current.sourceLocation}`);
            }
        });
    }

    /**
     * Download a URL into the upload directory. Size, signature and scan
     * rules run once the bytes are local.
     */
    public async importRemote(url: string, options: UploadOptions = {}): Promise<UploadOutcome> {
        let entry: UploadEntry;
        try {
            entry = entryFromRemote(url, this.deps.registry);
        } catch (error) {
            return this.failure(url, toUploadError(error, "INVALID_OPTIONS"));
        }
        this.entries.set(entry.field, entry);

        return this.ingest(entry, options, async (current, destination) => {
            current.size = await downloadRemote(current.sourceLocation, destination, this.deps.validator.maxBytes);

            const contentError = this.deps.validator.checkSize(current.size)
                ?? await this.deps.validator.checkContent(destination, current.ext, current.type);
            if (contentError) {
                throw contentError;
            }
        });
    }

    /**
     * Ingest several fields; when any is rejected, every file the batch
     * stored is removed again unless `rollback` is false
     */
    public async uploadAll(fields?: string[], options: BatchUploadOptions = {}): Promise<BatchUploadResult> {
        const { overwrite = false, rollback = true, concurrency = 1 } = options;
        const requested = fields ?? this.fields().filter((field) => this.entries.get(field)?.state === "pending");
        // Fields without a submitted file are skipped, not failed
        const targets = requested.filter((field) => this.entries.has(field));
        if (targets.length < requested.length) {
            logger.debug(`Skipping fields without files: ${requested.filter((field) => !this.entries.has(field)).join(", ")}`);
        }
        const outcomes = new Map<string, UploadOutcome>();

        let next = 0;
        const worker = async (): Promise<void> => {
            while (next < targets.length) {
                const field = targets[next++];
                if (field === undefined) {
                    return;
                }
                try {
                    outcomes.set(field, await this.upload(field, { overwrite }));
                } catch (error) {
                    outcomes.set(field, { success: false, field, error: toUploadError(error) });
                }
            }
        };

        const workers = Math.max(1, Math.min(Math.floor(concurrency) || 1, targets.length));
        await Promise.all(Array.from({ length: workers }, () => worker()));

        const records: Record<string, UploadRecord> = {};
        const errors: Record<string, UploadError> = {};
        for (const field of targets) {
            const outcome = outcomes.get(field);
            if (outcome?.success) {
                records[field] = outcome.record;
            } else if (outcome) {
                errors[field] = outcome.error;
            }
        }

        const failed = Object.keys(errors).length > 0;
        let rolledBack: string[] = [];

        if (failed && rollback) {
            rolledBack = await this.rollback(targets);
            logger.warn(`Batch rejected (${Object.keys(errors).join(", ")}), removed ${rolledBack.length} stored file(s)`);
        }

        return {
            success: !failed,
            totalFiles: targets.length,
            records: rolledBack.length > 0 ? {} : records,
            errors,
            rolledBack
        };
    }

    private async ingest(entry: UploadEntry, options: UploadOptions, materialize: Materializer): Promise<UploadOutcome> {
        try {
            optionsSchema.parse(options);
        } catch (error) {
            return this.reject(entry, toUploadError(error, "INVALID_OPTIONS"));
        }

        const isImport = entry.source === "local-import" || entry.source === "remote-import";
        const validation = await this.deps.validator.validate(entry, { isImport });
        if (!validation.valid) {
            return this.reject(entry, validation.error);
        }
        transition(entry, "validated");

        try {
            entry.customName = this.customName(entry, options.name);

            if (entry.group === "image" && entry.source !== "remote-import") {
                const size = await this.deps.executor.probe(await readFile(entry.sourceLocation));
                entry.width = size.width;
                entry.height = size.height;
            }

            entry.path = await this.deps.resolver.resolveDestination(this.uploadDirectory(), entry.customName ?? entry.name, {
                overwrite: options.overwrite ?? false,
                append: options.append ?? "",
                prepend: options.prepend ?? "",
                fallbackExt: entry.ext
            });
        } catch (error) {
            return this.reject(entry, toUploadError(error));
        }
        transition(entry, "destination-resolved");

        try {
            await materialize(entry, entry.path);

            if (entry.group === "image" && entry.source === "remote-import") {
                const size = await this.deps.executor.probe(await readFile(entry.path));
                entry.width = size.width;
                entry.height = size.height;
            }
        } catch (error) {
            const failure = toUploadError(error);
            await rm(entry.path, { force: true });
            if (failure.code === "IO_FAILURE") {
                logger.error(`Failed to store ${entry.field}: ${failure.message}`);
            }
            return this.reject(entry, failure);
        }

        entry.uploadedAt = new Date().toISOString();
        transition(entry, "materialized");
        logger.info(`Stored ${entry.field} at ${entry.path}`);

        const { results, failures } = await this.runTransforms(entry, options);

        transition(entry, "recorded");

        return {
            success: true,
            record: this.toRecord(entry),
            transforms: results,
            transformErrors: failures
        };
    }

    private async runTransforms(
        entry: UploadEntry,
        options: UploadOptions
    ): Promise<{ results: TransformResult[]; failures: TransformFailure[] }> {
        const results: TransformResult[] = [];
        const failures: TransformFailure[] = [];
        const requests = options.transforms ?? [];

        if (requests.length === 0 || entry.path === undefined) {
            return { results, failures };
        }

        let original: Buffer | undefined;

        for (const request of requests) {
            let target: string | undefined;
            try {
                if (entry.group !== "image" || entry.width === undefined || entry.height === undefined) {
                    throw new UploadError("UNSUPPORTED_FORMAT", `${entry.name} is not an image and cannot be transformed`);
                }

                const format = formatFromMime(entry.type);
                const { descriptor, label } = describeTransform(request, entry.width, entry.height);

                const append = request.append === false ? "" : request.append ?? `_${label}`;
                const prepend = request.prepend ?? "";
                target = await this.deps.resolver.resolveDestination(dirname(entry.path), basename(entry.path), {
                    // Never overwrite the original itself or an earlier transform of the same label
                    overwrite: (options.overwrite ?? false) && (append !== "" || prepend !== "") && !(label in entry.transforms),
                    append,
                    prepend,
                    fallbackExt: entry.ext
                });

                original ??= await readFile(entry.path);
                const bytes = await this.deps.executor.apply(original, format, descriptor);
                await this.deps.executor.write(bytes, target);

                const recordedLabel = uniqueLabel(entry.transforms, label);
                entry.transforms[recordedLabel] = target;
                transition(entry, "transformed");
                results.push({
                    kind: request.kind,
                    label: recordedLabel,
                    path: this.publicPath(target),
                    width: descriptor.output.width,
                    height: descriptor.output.height
                });
                logger.debug(`Applied ${recordedLabel} to ${entry.field}`);
            } catch (error) {
                if (target !== undefined) {
                    await rm(target, { force: true });
                }
                const failure = toUploadError(error);
                logger.warn(`Transform ${request.kind} failed for ${entry.field}: [${failure.code}] ${failure.message}`);
                failures.push({ kind: request.kind, error: failure });
            }
        }

        return { results, failures };
    }

    private async rollback(fields: string[]): Promise<string[]> {
        const removed: string[] = [];

        for (const field of fields) {
            const entry = this.entries.get(field);
            if (!entry || entry.state !== "recorded" || entry.path === undefined) {
                continue;
            }

            for (const path of [entry.path, ...Object.values(entry.transforms)]) {
                try {
                    await rm(path, { force: true });
                    removed.push(this.publicPath(path));
                } catch (error) {
                    logger.error(`Rollback could not remove ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`);
                }
            }
        }

        return removed;
    }

    private customName(entry: UploadEntry, name: UploadOptions["name"]): string | undefined {
        if (name === undefined) {
            return undefined;
        }
        const value = typeof name === "function" ? name(entry.name, entry.field, entry) : name;
        if (typeof value !== "string" || value.trim() === "") {
            throw new UploadError("INVALID_OPTIONS", `Name for ${entry.field} must be a non-empty string`);
        }
        return value;
    }

    private async reject(entry: UploadEntry, error: UploadError): Promise<UploadOutcome> {
        entry.error = error;
        transition(entry, "rejected");
        logger.warn(`Rejected ${entry.field}: [${error.code}] ${error.message}`);

        // Staged stream bodies belong to the pipeline; form temp files to the request layer
        if (entry.source === "stream") {
            try {
                await rm(entry.sourceLocation, { force: true });
            } catch (cleanupError) {
                logger.error(`Failed to remove staged stream ${entry.sourceLocation}: ${cleanupError instanceof Error ? cleanupError.message : 'Unknown error'}`);
            }
        }

        return this.failure(entry.field, error);
    }

    private failure(field: string, error: UploadError): UploadOutcome {
        return { success: false, field, error };
    }

    private uploadDirectory(): string {
        return join(this.deps.config.baseDir, this.deps.config.uploadDir);
    }

    /**
     * Path relative to the base directory, with a leading slash
     */
    private publicPath(path: string): string {
        return "/" + relative(this.deps.config.baseDir, path).split(sep).join("/");
    }

    private toRecord(entry: UploadEntry): UploadRecord {
        const transforms: Record<string, string> = {};
        for (const [label, path] of Object.entries(entry.transforms)) {
            transforms[label] = this.publicPath(path);
        }

        return {
            field: entry.field,
            name: basename(entry.path ?? entry.name),
            ext: entry.ext,
            type: entry.type,
            group: entry.group ?? "",
            size: entry.size,
            filesize: formatSize(entry.size),
            source: entry.source,
            path: this.publicPath(entry.path ?? ""),
            ...(entry.width !== undefined && { width: entry.width }),
            ...(entry.height !== undefined && { height: entry.height }),
            uploadedAt: entry.uploadedAt ?? new Date().toISOString(),
            transforms
        };
    }
}

/**
 * `label`, or `label_1`, `label_2`, ... when the entry already records it
 */
function uniqueLabel(taken: Record<string, string>, label: string): string {
    let candidate = label;
    for (let no = 1; candidate in taken; no++) {
        candidate = `${label}_${no}`;
    }
    return candidate;
}

/**
 * Geometry and default label for one transform request
 */
export function describeTransform(
    request: TransformRequest,
    width: number,
    height: number
): { descriptor: TransformDescriptor; label: string } {
    switch (request.kind) {
        case "resize": {
            const descriptor = resize(width, height, request);
            return { descriptor, label: `resized_${descriptor.output.width}x${descriptor.output.height}` };
        }
        case "scale": {
            const descriptor = scale(width, height, request);
            return { descriptor, label: `scaled_${descriptor.output.width}x${descriptor.output.height}` };
        }
        case "crop": {
            const descriptor = crop(width, height, request);
            return { descriptor, label: `cropped_${descriptor.output.width}x${descriptor.output.height}` };
        }
        case "flip": {
            const descriptor = flip(width, height, request);
            return { descriptor, label: `flipped_${FLIP_SUFFIXES[request.direction ?? "vertical"]}` };
        }
    }
}
