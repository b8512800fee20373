import { isUploadError } from "../../core/ErrorHandler";

/**
 * Error code thrown by `fn`, or undefined when it does not throw
 */
export function thrownCode(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return isUploadError(error) ? error.code : "not-an-upload-error";
    }
    return undefined;
}

/**
 * Error code `promise` rejects with, or undefined when it resolves
 */
export async function rejectionCode(promise: Promise<unknown>): Promise<string | undefined> {
    try {
        await promise;
    } catch (error) {
        return isUploadError(error) ? error.code : "not-an-upload-error";
    }
    return undefined;
}
