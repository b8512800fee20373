import type { StorageResult } from "../../types/upload.types";

export interface StoreOptions {
    contentType?: string;
}

/**
 * Abstract Storage Provider Interface
 * Defines the contract for object storage backends that recorded files are
 * transferred to
 */
export abstract class StorageProvider {
    protected name: string;

    constructor(name: string) {
        this.name = name;
    }

    /**
     * Get the storage provider name
     */
    public getName(): string {
        return this.name;
    }

    /**
     * Initialize the storage provider
     */
    public abstract initialize(): Promise<void>;

    /**
     * Store a local file (by path) or raw bytes under bucket/key
     */
    public abstract store(source: string | Buffer, bucket: string, key: string, options?: StoreOptions): Promise<StorageResult>;

    /**
     * Delete an object by key or by the URL `store` returned.
     * Resolves false when nothing was deleted.
     */
    public abstract delete(bucket: string, keyOrUrl: string): Promise<boolean>;

    public abstract exists(bucket: string, key: string): Promise<boolean>;

    /**
     * Object key for a key or URL: a URL is reduced to its path
     */
    protected resolveObjectKey(keyOrUrl: string): string {
        let key = keyOrUrl;

        if (/^[a-z][a-z0-9+.-]*:\/\//i.test(keyOrUrl)) {
            try {
                key = decodeURIComponent(new URL(keyOrUrl).pathname);
            } catch {
                key = keyOrUrl;
            }
        }

        return this.sanitizePath(key);
    }

    /**
     * Sanitize path to prevent directory traversal
     */
    protected sanitizePath(path: string): string {
        return path
            .split("/")
            .filter((segment) => segment !== ".." && segment !== ".")
            .join("/")
            .replace(/\/+/g, "/")
            .replace(/^\/+/, "");
    }
}
