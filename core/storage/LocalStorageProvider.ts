import fs from "fs";
import path from "path";
import { StorageProvider, type StoreOptions } from "./StorageProvider";
import { UploadError } from "../ErrorHandler";
import type { StorageResult } from "../../types/upload.types";
import { logger as MainLogger } from "../Logger";

const logger = MainLogger.child({ scope: "LocalStorageProvider" });

/**
 * Local File System Storage Provider
 * Buckets are directories under the base path; URLs are `${baseUrl}/${bucket}/${key}`
 */
export class LocalStorageProvider extends StorageProvider {
    private basePath: string;
    private baseUrl: string;

    constructor(config: {
        basePath?: string;
        baseUrl?: string;
    } = {}) {
        super("local");
        this.basePath = config.basePath || "./storage";
        this.baseUrl = (config.baseUrl || "").replace(/\/+$/, "");
    }

    public async initialize(): Promise<void> {
        logger.info("Initializing Local Storage Provider");

        // Ensure base directory exists
        if (!fs.existsSync(this.basePath)) {
            await fs.promises.mkdir(this.basePath, { recursive: true });
            logger.info(`Created base directory: ${this.basePath}`);
        }
    }

    public async store(source: string | Buffer, bucket: string, key: string, _options: StoreOptions = {}): Promise<StorageResult> {
        const objectKey = this.sanitizePath(key);
        const fullPath = this.objectPath(bucket, objectKey);

        logger.info(`Storing object ${bucket}/${objectKey}`);

        try {
            await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });

            if (typeof source === "string") {
                await fs.promises.copyFile(source, fullPath);
            } else {
                await fs.promises.writeFile(fullPath, source);
            }

            return {
                url: `${this.baseUrl}/${this.sanitizePath(bucket)}/${objectKey}`,
                bucket,
                key: objectKey
            };
        } catch (error) {
            logger.error(`Failed to store object ${bucket}/${objectKey}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            throw new UploadError(
                "IO_FAILURE",
                `Failed to store object: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { bucket, key: objectKey },
                { cause: error }
            );
        }
    }

    public async delete(bucket: string, keyOrUrl: string): Promise<boolean> {
        const objectKey = this.keyWithinBucket(bucket, keyOrUrl);
        const fullPath = this.objectPath(bucket, objectKey);

        try {
            if (!fs.existsSync(fullPath)) {
                logger.warn(`Object not found for deletion: ${bucket}/${objectKey}`);
                return false;
            }
            await fs.promises.unlink(fullPath);
            logger.info(`Object deleted: ${bucket}/${objectKey}`);
            return true;
        } catch (error) {
            logger.error(`Failed to delete object ${bucket}/${objectKey}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            return false;
        }
    }

    public async exists(bucket: string, key: string): Promise<boolean> {
        return fs.existsSync(this.objectPath(bucket, this.sanitizePath(key)));
    }

    /**
     * URLs handed out by this provider carry the bucket as their first segment
     */
    private keyWithinBucket(bucket: string, keyOrUrl: string): string {
        let value = keyOrUrl;
        if (this.baseUrl && value.startsWith(this.baseUrl + "/")) {
            value = value.slice(this.baseUrl.length);
        }

        const key = this.resolveObjectKey(value);
        const prefix = `${this.sanitizePath(bucket)}/`;
        const isUrl = value !== keyOrUrl || value.startsWith("/") || /^[a-z][a-z0-9+.-]*:\/\//i.test(value);

        return isUrl && key.startsWith(prefix) ? key.slice(prefix.length) : key;
    }

    private objectPath(bucket: string, key: string): string {
        return path.join(this.basePath, this.sanitizePath(bucket), key);
    }
}
