/**
 * Upload System
 * File ingestion, validation, naming, image transforms and storage transfer
 */

export { UploadManager } from "./UploadManager";
export type { UploadManagerOptions, TransferOptions, TransferResult } from "./UploadManager";
export { IngestionPipeline, describeTransform } from "./IngestionPipeline";
export type { PipelineDependencies } from "./IngestionPipeline";
export { canTransition, transition } from "./EntryState";
export { flattenFormFiles } from "./sources";

export { FileValidator } from "../core/FileValidator";
export { MimeRegistry } from "../core/MimeRegistry";
export { NameResolver } from "../core/NameResolver";
export { DirectoryLock } from "../core/DirectoryLock";
export { SizePolicy, parseSize, formatSize } from "../core/SizePolicy";

// Processors
export { resize, scale, crop, flip } from "../core/processors/ImageGeometry";
export { TransformExecutor, formatFromMime } from "../core/processors/TransformExecutor";

// Storage Providers
export { StorageProvider } from "../core/storage/StorageProvider";
export { LocalStorageProvider } from "../core/storage/LocalStorageProvider";
export { S3StorageProvider } from "../core/storage/S3StorageProvider";
export type { MalwareScanner } from "../core/scanner/MalwareScanner";

// Configuration
export { DEFAULT_UPLOAD_CONFIG, IMAGE_UPLOAD_CONFIG } from "../config/upload.config";

// Imports for internal use
import { UploadManager } from "./UploadManager";
import type { UploadConfiguration } from "../types/upload.types";

/**
 * Initialize the upload system: apply configuration, create the upload
 * directory and initialize the default storage provider
 */
export async function initializeUploadSystem(config?: Partial<UploadConfiguration>): Promise<UploadManager> {
    const uploadManager = UploadManager.getInstance();

    if (config) {
        uploadManager.updateConfiguration(config);
    }

    await uploadManager.checkDirectory();
    await uploadManager.getStorageProvider().initialize();
    return uploadManager;
}
