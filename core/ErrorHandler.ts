import * as z from "zod";
import { logger } from "./Logger";
import { getErrorMessage } from "../utils/errorMessages";
import type { UploadErrorCode } from "../types/upload.types";

/**
 * Typed failure carried by rejected entries and failed transforms
 */
export class UploadError extends Error {
    public readonly code: UploadErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: UploadErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "UploadError";
        this.code = code;
        this.details = details;
    }

    public toJSON(): { code: UploadErrorCode; message: string; details?: Record<string, unknown> } {
        return {
            code: this.code,
            message: this.message,
            ...(this.details && { details: this.details })
        };
    }
}

export function isUploadError(err: unknown): err is UploadError {
    return err instanceof UploadError;
}

/**
 * Create an UploadError whose message is the catalogue's user-facing text
 */
export function createUserFriendlyError(code: UploadErrorCode, customMessage?: string, details?: Record<string, unknown>): UploadError {
    const errorInfo = getErrorMessage(code);

    return new UploadError(code, customMessage || errorInfo.userMessage, {
        category: errorInfo.category,
        suggestion: errorInfo.suggestion,
        userFriendly: true,
        ...details
    });
}

/**
 * Normalise anything thrown inside the pipeline into an UploadError
 */
export function toUploadError(err: unknown, fallback: UploadErrorCode = "IO_FAILURE"): UploadError {
    if (err instanceof UploadError) {
        return err;
    }

    if (err instanceof z.ZodError) {
        const validationErrors = err.issues.map((issue) => ({
            field: issue.path.join("."),
            message: issue.message
        }));
        const primary = validationErrors[0];
        const message = primary
            ? `${primary.field ? primary.field + ": " : ""}${primary.message}`
            : "Validation failed";
        return new UploadError("INVALID_OPTIONS", message, { validationErrors }, { cause: err });
    }

    if (err instanceof Error) {
        const errno = "code" in err && typeof err.code === "string" ? err.code : undefined;
        return new UploadError(fallback, err.message, errno ? { errno } : undefined, { cause: err });
    }

    logger.error({ scope: "ErrorHandler", err }, "Non-error value thrown in upload pipeline");
    return new UploadError(fallback, typeof err === "string" ? err : "Unknown error");
}
