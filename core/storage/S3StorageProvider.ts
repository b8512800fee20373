import { readFile } from "node:fs/promises";
import {
    DeleteObjectCommand,
    HeadObjectCommand,
    PutObjectCommand,
    S3Client,
    type S3ClientConfig
} from "@aws-sdk/client-s3";
import { StorageProvider, type StoreOptions } from "./StorageProvider";
import { UploadError } from "../ErrorHandler";
import type { StorageResult } from "../../types/upload.types";
import { logger as MainLogger } from "../Logger";

const logger = MainLogger.child({ scope: "S3StorageProvider" });

/**
 * S3 Storage Provider
 * Objects are uploaded publicly readable and addressed by their virtual-hosted URL
 */
export class S3StorageProvider extends StorageProvider {
    private client: Pick<S3Client, "send">;

    constructor(config: { client?: Pick<S3Client, "send">; clientConfig?: S3ClientConfig } = {}) {
        super("s3");
        this.client = config.client ?? new S3Client(config.clientConfig ?? { region: process.env.AWS_REGION });
    }

    public async initialize(): Promise<void> {
        logger.info("Initializing S3 Storage Provider");
    }

    public async store(source: string | Buffer, bucket: string, key: string, options: StoreOptions = {}): Promise<StorageResult> {
        const objectKey = this.sanitizePath(key);

        try {
            const body = typeof source === "string" ? await readFile(source) : source;

            await this.client.send(new PutObjectCommand({
                Bucket: bucket,
                Key: objectKey,
                Body: body,
                ACL: "public-read",
                ...(options.contentType && { ContentType: options.contentType })
            }));

            logger.info(`Uploaded ${objectKey} to bucket ${bucket}`);

            return {
                url: this.objectUrl(bucket, objectKey),
                bucket,
                key: objectKey
            };
        } catch (error) {
            logger.error(`Failed to upload ${objectKey} to ${bucket}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            throw new UploadError(
                "IO_FAILURE",
                `Failed to upload to S3: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { bucket, key: objectKey },
                { cause: error }
            );
        }
    }

    public async delete(bucket: string, keyOrUrl: string): Promise<boolean> {
        const objectKey = this.resolveObjectKey(keyOrUrl);

        try {
            await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: objectKey }));
            logger.info(`Deleted ${objectKey} from bucket ${bucket}`);
            return true;
        } catch (error) {
            logger.error(`Failed to delete ${objectKey} from ${bucket}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            return false;
        }
    }

    public async exists(bucket: string, key: string): Promise<boolean> {
        try {
            await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: this.sanitizePath(key) }));
            return true;
        } catch (error) {
            if (error instanceof Error && error.name === "NotFound") {
                return false;
            }
            throw error;
        }
    }

    private objectUrl(bucket: string, key: string): string {
        return `https://${bucket}.s3.amazonaws.com/${key.split("/").map(encodeURIComponent).join("/")}`;
    }
}
