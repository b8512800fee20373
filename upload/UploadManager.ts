import { mkdir, readFile, rm } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { getUploadConfig } from "../core/Config";
import { DirectoryLock } from "../core/DirectoryLock";
import { toUploadError, UploadError } from "../core/ErrorHandler";
import { FileValidator } from "../core/FileValidator";
import { logger as MainLogger } from "../core/Logger";
import { MimeRegistry } from "../core/MimeRegistry";
import { NameResolver, pathExists } from "../core/NameResolver";
import { TransformExecutor } from "../core/processors/TransformExecutor";
import type { MalwareScanner } from "../core/scanner/MalwareScanner";
import { LocalStorageProvider } from "../core/storage/LocalStorageProvider";
import type { StorageProvider } from "../core/storage/StorageProvider";
import { relocateFile } from "../utils/fileSystem";
import { IngestionPipeline } from "./IngestionPipeline";
import type { FormFileTree, Size, StorageResult, UploadConfiguration, UploadRecord } from "../types/upload.types";

const logger = MainLogger.child({ scope: "UploadManager" });

export interface UploadManagerOptions {
    config?: Partial<UploadConfiguration>;
    scanner?: MalwareScanner;
}

export interface TransferOptions {
    bucket: string;
    /** Object key; defaults to the record's path without the leading slash */
    key?: string;
    provider?: string;
    /** Remove the local files once stored (default true) */
    deleteLocal?: boolean;
}

export interface TransferResult {
    file: StorageResult;
    transforms: Record<string, StorageResult>;
}

/**
 * UploadManager - process-wide owner of the upload machinery
 *
 * Holds the configuration, mime registry, directory lock and storage
 * providers, and hands out one IngestionPipeline per request.
 */
export class UploadManager {
    private static instance: UploadManager;
    private storageProviders: Map<string, StorageProvider> = new Map();
    private defaultStorageProvider: string = "local";
    private globalConfig: UploadConfiguration;
    private scanner?: MalwareScanner;
    private readonly lock = new DirectoryLock();
    private readonly executor = new TransformExecutor();
    private registry: MimeRegistry;
    private resolver: NameResolver;
    private validator: FileValidator;

    constructor(options: UploadManagerOptions = {}) {
        this.globalConfig = { ...getUploadConfig(), ...options.config };
        this.scanner = options.scanner;
        this.registry = this.buildRegistry();
        this.resolver = new NameResolver(this.globalConfig.maxNameLength, this.lock);
        this.validator = new FileValidator(this.registry, this.globalConfig, this.scanner);
        this.initializeDefaultProviders();
    }

    public static getInstance(): UploadManager {
        if (!UploadManager.instance) {
            UploadManager.instance = new UploadManager();
        }
        return UploadManager.instance;
    }

    /**
     * Register a storage provider
     */
    public registerStorageProvider(name: string, provider: StorageProvider): void {
        logger.info(`Registering storage provider: ${name}`);
        this.storageProviders.set(name, provider);
    }

    /**
     * Set the default storage provider
     */
    public setDefaultStorageProvider(name: string): void {
        if (!this.storageProviders.has(name)) {
            throw new UploadError("INVALID_OPTIONS", `Storage provider '${name}' not found`);
        }
        this.defaultStorageProvider = name;
        logger.info(`Default storage provider set to: ${name}`);
    }

    /**
     * Get storage provider by name
     */
    public getStorageProvider(name?: string): StorageProvider {
        const providerName = name || this.defaultStorageProvider;
        const provider = this.storageProviders.get(providerName);
        if (!provider) {
            throw new UploadError("INVALID_OPTIONS", `Storage provider '${providerName}' not found`);
        }
        return provider;
    }

    public setScanner(scanner: MalwareScanner | undefined): void {
        this.scanner = scanner;
        this.validator = new FileValidator(this.registry, this.globalConfig, this.scanner);
    }

    public updateConfiguration(config: Partial<UploadConfiguration>): void {
        this.globalConfig = { ...this.globalConfig, ...config };
        this.registry = this.buildRegistry();
        this.resolver = new NameResolver(this.globalConfig.maxNameLength, this.lock);
        this.validator = new FileValidator(this.registry, this.globalConfig, this.scanner);
        if (config.baseDir !== undefined) {
            this.initializeDefaultProviders();
        }
        logger.info("Upload configuration updated");
    }

    public getConfiguration(): UploadConfiguration {
        return { ...this.globalConfig };
    }

    public getRegistry(): MimeRegistry {
        return this.registry;
    }

    /**
     * New pipeline for one request's form files
     */
    public createPipeline(formFiles: FormFileTree = {}): IngestionPipeline {
        return new IngestionPipeline(
            {
                config: this.getConfiguration(),
                registry: this.registry,
                validator: this.validator,
                resolver: this.resolver,
                executor: this.executor
            },
            formFiles
        );
    }

    /**
     * Make sure a directory under the base directory exists; returns its absolute path
     */
    public async checkDirectory(directory: string = this.globalConfig.uploadDir): Promise<string> {
        const absolute = this.resolvePublicPath(directory);
        try {
            await mkdir(absolute, { recursive: true });
            return absolute;
        } catch (error) {
            logger.error(`Failed to create directory ${absolute}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            throw new UploadError("IO_FAILURE", `Cannot create directory ${directory}`, { directory }, { cause: error });
        }
    }

    /**
     * Copy a recorded file and its derived files to object storage
     */
    public async transfer(record: UploadRecord, options: TransferOptions): Promise<TransferResult> {
        const { bucket, deleteLocal = true } = options;
        const provider = this.getStorageProvider(options.provider);
        const key = options.key ?? record.path.replace(/^\/+/, "");
        const localPath = this.resolvePublicPath(record.path);

        const file = await provider.store(localPath, bucket, key, { contentType: record.type });
        const transforms: Record<string, StorageResult> = {};

        for (const [label, path] of Object.entries(record.transforms)) {
            const derivedKey = join(dirname(key), basename(path)).split(sep).join("/");
            transforms[label] = await provider.store(this.resolvePublicPath(path), bucket, derivedKey, { contentType: record.type });
        }

        logger.info(`Transferred ${record.path} to ${provider.getName()}:${bucket}/${file.key}`);

        if (deleteLocal) {
            for (const path of [record.path, ...Object.values(record.transforms)]) {
                await this.deleteFile(path);
            }
        }

        return { file, transforms };
    }

    /**
     * Delete a transferred object by key or URL
     */
    public async removeTransferred(bucket: string, keyOrUrl: string, provider?: string): Promise<boolean> {
        return this.getStorageProvider(provider).delete(bucket, keyOrUrl);
    }

    /**
     * Delete a file under the base directory; false when it did not exist
     */
    public async deleteFile(path: string): Promise<boolean> {
        const absolute = this.resolvePublicPath(path);
        if (!(await pathExists(absolute))) {
            logger.warn(`File not found for deletion: ${path}`);
            return false;
        }

        try {
            await rm(absolute);
            logger.info(`File deleted: ${path}`);
            return true;
        } catch (error) {
            throw toUploadError(error);
        }
    }

    /**
     * Move a file within the base directory. Without overwrite, a file already
     * at the destination is kept under a `_moved` name. Returns the new public path.
     */
    public async moveFile(from: string, to: string, overwrite: boolean = false): Promise<string> {
        const source = this.resolvePublicPath(from);
        const destination = this.resolvePublicPath(to);

        if (!(await pathExists(source))) {
            throw new UploadError("MISSING_SOURCE", `Nothing to move at ${from}`, { path: from });
        }

        try {
            await mkdir(dirname(destination), { recursive: true });

            if (await pathExists(destination)) {
                if (overwrite) {
                    await rm(destination);
                } else {
                    const kept = await this.resolver.resolveDestination(dirname(destination), basename(destination), {
                        append: "_moved",
                        reserve: false
                    });
                    await relocateFile(destination, kept);
                    logger.info(`Kept existing ${to} as ${this.toPublicPath(kept)}`);
                }
            }

            await relocateFile(source, destination);
            logger.info(`Moved ${from} to ${to}`);
            return this.toPublicPath(destination);
        } catch (error) {
            throw toUploadError(error);
        }
    }

    /**
     * Width and height of an image under the base directory
     */
    public async dimensions(path: string): Promise<Size> {
        const absolute = this.resolvePublicPath(path);
        let bytes: Buffer;
        try {
            bytes = await readFile(absolute);
        } catch (error) {
            throw new UploadError("MISSING_SOURCE", `Cannot read ${path}`, { path }, { cause: error });
        }
        return this.executor.probe(bytes);
    }

    private buildRegistry(): MimeRegistry {
        return this.globalConfig.mimeTypes
            ? MimeRegistry.fromTable(this.globalConfig.mimeTypes)
            : MimeRegistry.withDefaults();
    }

    private initializeDefaultProviders(): void {
        this.registerStorageProvider("local", new LocalStorageProvider({ basePath: join(this.globalConfig.baseDir, "storage") }));
    }

    /**
     * Absolute path for a path relative to the base directory; refuses to leave it
     */
    private resolvePublicPath(path: string): string {
        const baseDir = resolve(this.globalConfig.baseDir);
        const absolute = resolve(baseDir, path.replace(/^\/+/, ""));
        const inside = relative(baseDir, absolute);

        if (inside.startsWith("..") || isAbsolute(inside)) {
            throw new UploadError("INVALID_OPTIONS", `Path ${path} is outside the base directory`, { path });
        }
        return absolute;
    }

    private toPublicPath(absolute: string): string {
        return "/" + relative(resolve(this.globalConfig.baseDir), absolute).split(sep).join("/");
    }
}
