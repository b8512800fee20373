/**
 * Upload System Type Definitions
 * Shared types for the ingestion pipeline, geometry, transforms and storage
 */

import type { UploadError } from "../core/ErrorHandler";

export type UploadErrorCode =
    | "UNSUPPORTED_TYPE"
    | "TRANSFER_INCOMPLETE"
    | "FILE_TOO_LARGE"
    | "REJECTED_BY_SCAN"
    | "INVALID_OPTIONS"
    | "INVALID_GEOMETRY"
    | "UNSUPPORTED_FORMAT"
    | "IO_FAILURE"
    | "DESTINATION_CONFLICT"
    | "MISSING_SOURCE";

/**
 * group -> extension -> accepted mime type(s)
 */
export type MimeTable = Record<string, Record<string, string | string[]>>;

export interface UploadConfiguration {
    /** Maximum file size, human readable ("5M", "2GB") */
    maxFileSize: string;

    /** Maximum length of the base file name; null disables truncation */
    maxNameLength: number | null;

    /** Directory where form and stream uploads are staged */
    tempDir: string;

    /** Base directory; public paths are reported relative to it */
    baseDir: string;

    /** Destination directory within baseDir */
    uploadDir: string;

    /** Query/field name carrying the file name of AJAX stream uploads */
    ajaxField: string;

    /** Run the malware scanner on incoming files */
    scanFile: boolean;

    /** Treat a scanner failure as a clean result */
    scanFailOpen: boolean;

    /** Compare the file's magic number with the accepted mime types */
    validateFileSignature: boolean;

    /** Accepted types; defaults to the shipped table */
    mimeTypes?: MimeTable;
}

export type SourceKind = "form" | "stream" | "local-import" | "remote-import";

export type EntryState =
    | "pending"
    | "validated"
    | "destination-resolved"
    | "materialized"
    | "transformed"
    | "recorded"
    | "rejected";

/**
 * A file staged by the request layer (multipart parser) before ingestion
 */
export interface FormFile {
    name: string;
    type: string;
    size: number;
    /** Transport error code, 0 when the transfer completed */
    error: number;
    tempPath: string;
}

export interface FormFileTree {
    [key: string]: FormFile | FormFileTree;
}

export interface UploadEntry {
    field: string;
    name: string;
    ext: string;
    type: string;
    group?: string;
    size: number;
    source: SourceKind;
    /** Where the bytes come from: temp path, import path or URL */
    sourceLocation: string;
    transferError: number;
    customName?: string;
    path?: string;
    width?: number;
    height?: number;
    uploadedAt?: string;
    transforms: Record<string, string>;
    state: EntryState;
    error?: UploadError;
}

/**
 * Public view of a recorded entry; paths are relative to the base directory
 */
export interface UploadRecord {
    field: string;
    name: string;
    ext: string;
    type: string;
    group: string;
    size: number;
    filesize: string;
    source: SourceKind;
    path: string;
    width?: number;
    height?: number;
    uploadedAt: string;
    transforms: Record<string, string>;
}

export type ValidationResult =
    | { valid: true; group: string }
    | { valid: false; error: UploadError };

export interface Size {
    width: number;
    height: number;
}

export interface Rect extends Size {
    x: number;
    y: number;
}

export interface FlipFlags {
    horizontal: boolean;
    vertical: boolean;
}

export interface TransformDescriptor {
    source: Rect;
    destination: Rect;
    output: Size;
    flip: FlipFlags;
    /** Encode quality 0-100, only JPEG honours it */
    quality: number;
}

export type CropLocation = "center" | "top" | "bottom" | "left" | "right";

export type FlipDirection = "vertical" | "horizontal" | "both";

export type RasterFormat = "gif" | "png" | "jpeg";

interface NamingOptions {
    /** Suffix for the derived file name; false disables the default suffix */
    append?: string | false;
    prepend?: string;
    quality?: number;
}

export interface ResizeOptions extends NamingOptions {
    width?: number;
    height?: number;
    expand?: boolean;
    aspect?: boolean;
}

export interface ScaleOptions extends NamingOptions {
    /** Fraction of the original size, 0.5 halves both dimensions */
    percent?: number;
}

export interface CropOptions extends NamingOptions {
    width?: number;
    height?: number;
    location?: CropLocation;
}

export interface FlipOptions extends NamingOptions {
    direction?: FlipDirection;
}

export type TransformRequest =
    | ({ kind: "resize" } & ResizeOptions)
    | ({ kind: "scale" } & ScaleOptions)
    | ({ kind: "crop" } & CropOptions)
    | ({ kind: "flip" } & FlipOptions);

export type TransformKind = TransformRequest["kind"];

export interface TransformResult {
    kind: TransformKind;
    label: string;
    path: string;
    width: number;
    height: number;
}

export type NameFormatter = (name: string, field: string, entry: UploadEntry) => string;

export interface UploadOptions {
    /** New base name, or a formatter deriving it from the original */
    name?: string | NameFormatter;
    overwrite?: boolean;
    append?: string;
    prepend?: string;
    transforms?: TransformRequest[];
}

export interface ImportOptions extends UploadOptions {
    /** Remove the imported original after copying */
    delete?: boolean;
}

export type UploadOutcome =
    | {
        success: true;
        record: UploadRecord;
        transforms: TransformResult[];
        transformErrors: Array<{ kind: TransformKind; error: UploadError }>;
    }
    | { success: false; field: string; error: UploadError };

export interface BatchUploadOptions {
    overwrite?: boolean;
    /** Delete the batch's files when any field is rejected (default true) */
    rollback?: boolean;
    /** Entries processed in parallel (default 1) */
    concurrency?: number;
}

export interface BatchUploadResult {
    success: boolean;
    totalFiles: number;
    records: Record<string, UploadRecord>;
    errors: Record<string, UploadError>;
    rolledBack: string[];
}

export interface StorageResult {
    url: string;
    bucket: string;
    key: string;
}

export type ScanVerdict = "clean" | "infected";
