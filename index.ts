import { logger } from "./core/Logger";
import { config, getUploadConfig } from "./core/Config";
import { UploadError, createUserFriendlyError, isUploadError, toUploadError } from "./core/ErrorHandler";
import { validateEnv } from "./core/validateEnv";
import { getErrorMessage } from "./utils/errorMessages";

export * from "./upload";

export {
    logger,
    config,
    getUploadConfig,
    validateEnv,
    UploadError,
    isUploadError,
    toUploadError,
    createUserFriendlyError,
    getErrorMessage
};

export type * from "./types/upload.types";
