import { copyFile, rename, rm } from "node:fs/promises";
import { isErrno } from "../core/NameResolver";

/**
 * Rename, falling back to copy and delete when the paths are on different devices
 */
export async function relocateFile(from: string, to: string): Promise<void> {
    try {
        await rename(from, to);
    } catch (error) {
        if (!isErrno(error, "EXDEV")) {
            throw error;
        }
        await copyFile(from, to);
        await rm(from, { force: true });
    }
}
