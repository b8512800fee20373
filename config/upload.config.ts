import { tmpdir } from "node:os";
import mimeTypes from "./mimeTypes.json";
import type { UploadConfiguration } from "../types/upload.types";

/**
 * Default Upload Configuration
 */
export const DEFAULT_UPLOAD_CONFIG: UploadConfiguration = {
    maxFileSize: "5M",
    maxNameLength: 40,
    tempDir: tmpdir(),
    baseDir: "./public",
    uploadDir: "files/uploads/",
    ajaxField: "",
    scanFile: false,
    scanFailOpen: false,
    validateFileSignature: true
};

/**
 * Image-only uploads: only the image group of the shipped table is accepted
 */
export const IMAGE_UPLOAD_CONFIG: Partial<UploadConfiguration> = {
    maxFileSize: "10M",
    mimeTypes: { image: mimeTypes.image },
    uploadDir: "files/images/"
};
