import { access, mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { DirectoryLock } from "./DirectoryLock";
import { UploadError } from "./ErrorHandler";
import { logger as MainLogger } from "./Logger";

const logger = MainLogger.child({ scope: "NameResolver" });

/** Upper bound on collision probes before giving up */
export const MAX_PROBE_ATTEMPTS = 10000;

const ILLEGAL_CHARACTERS = /[^-_.a-zA-Z0-9/\s]/g;

export interface ResolveOptions {
    overwrite?: boolean;
    append?: string;
    prepend?: string;
    /** Extension used when the name carries none */
    fallbackExt?: string;
    /** Create an empty placeholder so concurrent resolutions see the name as taken */
    reserve?: boolean;
}

/**
 * NameResolver - safe file names and collision-free destinations
 */
export class NameResolver {
    private readonly maxNameLength: number | null;
    private readonly lock: DirectoryLock;

    constructor(maxNameLength: number | null = 40, lock: DirectoryLock = new DirectoryLock()) {
        this.maxNameLength = maxNameLength;
        this.lock = lock;
    }

    /**
     * Build a safe file name: prepend + sanitized base + append + "." + ext.
     * The extension is taken from the raw name, lower-cased.
     */
    public formatName(
        rawName: string,
        append: string = "",
        prepend: string = "",
        truncate: boolean = true,
        fallbackExt: string = ""
    ): string {
        const lastDot = rawName.lastIndexOf(".");
        const hasExtension = lastDot >= 0 && !rawName.slice(lastDot).includes("/");
        const ext = hasExtension ? rawName.slice(lastDot + 1).toLowerCase() : fallbackExt.replace(/^\.+/, "").toLowerCase();

        let base = sanitize(hasExtension ? rawName.slice(0, lastDot) : rawName);

        if (truncate && this.maxNameLength !== null && base.length > this.maxNameLength) {
            base = base.slice(0, this.maxNameLength);
        }

        const name = `${sanitize(prepend)}${base}${sanitize(append)}${ext ? "." + ext : ""}`;
        return name.replace(/^\/+|\/+$/g, "");
    }

    /**
     * Pick the final path for `candidateName` inside `directory`.
     *
     * Without overwrite, an existing file makes the resolver probe
     * name_1.ext, name_2.ext, ... (after any append) until a free name is found.
     * With overwrite, an existing file at the first candidate is removed.
     */
    public async resolveDestination(directory: string, candidateName: string, options: ResolveOptions = {}): Promise<string> {
        const { overwrite = false, append = "", prepend = "", fallbackExt = "", reserve = true } = options;

        return this.lock.withLock(directory, async () => {
            const firstName = this.formatName(candidateName, append, prepend, true, fallbackExt);
            const firstPath = join(directory, firstName);
            await mkdir(dirname(firstPath), { recursive: true });

            if (overwrite) {
                if (await pathExists(firstPath)) {
                    await rm(firstPath, { force: true });
                    logger.debug(`Removed existing file for overwrite: ${firstPath}`);
                }
                if (reserve) {
                    await reservePath(firstPath);
                }
                return firstPath;
            }

            if (await this.tryClaim(firstPath, reserve)) {
                return firstPath;
            }

            for (let no = 1; no <= MAX_PROBE_ATTEMPTS; no++) {
                const probePath = join(directory, this.formatName(candidateName, `${append}_${no}`, prepend, true, fallbackExt));
                if (await this.tryClaim(probePath, reserve)) {
                    logger.debug(`Resolved collision for ${firstName} to ${probePath}`);
                    return probePath;
                }
            }

            throw new UploadError(
                "DESTINATION_CONFLICT",
                `No free file name for ${firstName} after ${MAX_PROBE_ATTEMPTS} attempts`,
                { directory, name: firstName }
            );
        });
    }

    private async tryClaim(path: string, reserve: boolean): Promise<boolean> {
        if (await pathExists(path)) {
            return false;
        }
        if (!reserve) {
            return true;
        }
        try {
            await reservePath(path);
            return true;
        } catch (error) {
            // Created by someone outside this process since the probe
            if (isErrno(error, "EEXIST")) {
                return false;
            }
            throw error;
        }
    }
}

function sanitize(value: string): string {
    return value
        .replace(ILLEGAL_CHARACTERS, "")
        .replace(/\s+/g, "_")
        .replace(/\.{2,}/g, ".")
        .replace(/\/{2,}/g, "/");
}

async function reservePath(path: string): Promise<void> {
    await writeFile(path, "", { flag: "wx" });
}

export async function pathExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

export function isErrno(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}
