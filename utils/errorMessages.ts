/**
 * User-friendly error message mappings for the upload pipeline
 * Maps pipeline error codes to clear, actionable messages
 */

import type { UploadErrorCode } from "../types/upload.types";

export interface ErrorMessage {
    userMessage: string;
    suggestion?: string;
    category: 'validation' | 'transform' | 'storage' | 'system' | 'network';
}

export const ERROR_MESSAGES: Record<UploadErrorCode, ErrorMessage> = {
    // Validation Errors
    'UNSUPPORTED_TYPE': {
        userMessage: 'This type of file is not accepted',
        suggestion: 'Check that the file extension matches its contents and is one of the allowed types',
        category: 'validation'
    },
    'TRANSFER_INCOMPLETE': {
        userMessage: 'The file did not finish uploading',
        suggestion: 'Please upload the file again',
        category: 'validation'
    },
    'FILE_TOO_LARGE': {
        userMessage: 'The file is larger than the allowed maximum',
        suggestion: 'Reduce the file size or upload a smaller file',
        category: 'validation'
    },
    'REJECTED_BY_SCAN': {
        userMessage: 'The file was rejected by the malware scanner',
        suggestion: 'Scan the file locally and upload a clean copy',
        category: 'validation'
    },
    'MISSING_SOURCE': {
        userMessage: 'No file was found to process',
        suggestion: 'Make sure the file field or path is correct',
        category: 'validation'
    },

    // Transform Errors
    'INVALID_OPTIONS': {
        userMessage: 'The requested operation has invalid options',
        suggestion: 'Check the width, height, percent and quality values',
        category: 'transform'
    },
    'INVALID_GEOMETRY': {
        userMessage: 'The requested image size is not possible',
        suggestion: 'Use dimensions that produce an image at least one pixel wide and high',
        category: 'transform'
    },
    'UNSUPPORTED_FORMAT': {
        userMessage: 'This image format cannot be transformed',
        suggestion: 'Only GIF, PNG and JPEG images can be resized, cropped, scaled or flipped',
        category: 'transform'
    },

    // Storage Errors
    'IO_FAILURE': {
        userMessage: 'The file could not be saved',
        suggestion: 'Please try again in a few moments',
        category: 'storage'
    },
    'DESTINATION_CONFLICT': {
        userMessage: 'Could not find a free file name in the destination',
        suggestion: 'Rename the file or clean up the destination directory',
        category: 'storage'
    }
};

/**
 * Get a user-friendly error message by code
 */
export function getErrorMessage(code: string): ErrorMessage {
    if (isUploadErrorCode(code)) {
        return ERROR_MESSAGES[code];
    }
    return {
        userMessage: 'An unexpected error occurred',
        suggestion: 'Please try again or contact support if the problem persists',
        category: 'system'
    };
}

export function isUploadErrorCode(code: string): code is UploadErrorCode {
    return Object.prototype.hasOwnProperty.call(ERROR_MESSAGES, code);
}
