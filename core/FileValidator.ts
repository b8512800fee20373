import { realpath, stat } from "node:fs/promises";
import { relative, isAbsolute } from "node:path";
import { UploadError } from "./ErrorHandler";
import { detectMimeType, isContainerOf, matchesSignatureOf, readSignature } from "./FileSignature";
import { logger as MainLogger } from "./Logger";
import { formatSize, parseSize } from "./SizePolicy";
import type { MimeRegistry } from "./MimeRegistry";
import type { MalwareScanner } from "./scanner/MalwareScanner";
import type { UploadConfiguration, UploadEntry, ValidationResult } from "../types/upload.types";

const logger = MainLogger.child({ scope: "FileValidator" });

export type ValidatorConfig = Pick<
    UploadConfiguration,
    "maxFileSize" | "tempDir" | "scanFile" | "scanFailOpen" | "validateFileSignature"
>;

export interface ValidateOptions {
    isImport?: boolean;
}

/**
 * File Validator - decides whether an entry may be stored.
 *
 * Rules run in order and the first failure wins: type, transfer, size,
 * signature, scan. Remote imports have no local bytes yet, so their signature
 * and scan checks run later through `checkContent`.
 */
export class FileValidator {
    private readonly registry: MimeRegistry;
    private readonly config: ValidatorConfig;
    private readonly scanner?: MalwareScanner;
    public readonly maxBytes: number;

    constructor(registry: MimeRegistry, config: ValidatorConfig, scanner?: MalwareScanner) {
        this.registry = registry;
        this.config = config;
        this.scanner = scanner;
        this.maxBytes = parseSize(config.maxFileSize);
    }

    public async validate(entry: UploadEntry, options: ValidateOptions = {}): Promise<ValidationResult> {
        const isImport = options.isImport ?? (entry.source === "local-import" || entry.source === "remote-import");

        logger.trace(`Validating ${entry.field}: ${entry.name} (${entry.size} bytes, ${entry.type})`);

        try {
            const group = this.registry.lookup(entry.ext, entry.type);
            if (group === null) {
                return this.reject(entry, new UploadError(
                    "UNSUPPORTED_TYPE",
                    `File type ${entry.type || "unknown"} with extension .${entry.ext} is not accepted`,
                    { ext: entry.ext, type: entry.type }
                ));
            }

            if (!isImport) {
                const transferError = await this.checkTransfer(entry);
                if (transferError) {
                    return this.reject(entry, transferError);
                }
            }

            const sizeError = this.checkSize(entry.size);
            if (sizeError) {
                return this.reject(entry, sizeError);
            }

            if (entry.source !== "remote-import") {
                const contentError = await this.checkContent(entry.sourceLocation, entry.ext, entry.type);
                if (contentError) {
                    return this.reject(entry, contentError);
                }
            }

            entry.group = group;
            logger.trace(`Validation passed for ${entry.field} (group ${group})`);
            return { valid: true, group };
        } catch (error) {
            const failure = new UploadError(
                "IO_FAILURE",
                `Validation of ${entry.name} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
                undefined,
                { cause: error }
            );
            logger.error(failure.message);
            return { valid: false, error: failure };
        }
    }

    public checkSize(size: number): UploadError | null {
        if (size <= this.maxBytes) {
            return null;
        }
        return new UploadError(
            "FILE_TOO_LARGE",
            `File size ${formatSize(size)} exceeds the maximum of ${formatSize(this.maxBytes)}`,
            { size, maxFileSize: this.maxBytes }
        );
    }

    /**
     * Signature and scan rules for bytes already on local disk
     */
    public async checkContent(path: string, ext: string, declaredType: string): Promise<UploadError | null> {
        if (this.config.validateFileSignature) {
            const mismatch = await this.checkSignature(path, ext, declaredType);
            if (mismatch) {
                return mismatch;
            }
        }

        if (this.config.scanFile) {
            return this.scan(path);
        }

        return null;
    }

    private async checkTransfer(entry: UploadEntry): Promise<UploadError | null> {
        if (entry.size <= 0 || entry.transferError !== 0) {
            return new UploadError(
                "TRANSFER_INCOMPLETE",
                `Transfer of ${entry.name} did not complete`,
                { size: entry.size, transferError: entry.transferError }
            );
        }

        if (entry.source !== "form") {
            return null;
        }

        try {
            const info = await stat(entry.sourceLocation);
            if (!info.isFile()) {
                throw new Error("not a regular file");
            }
            const tempDir = await realpath(this.config.tempDir);
            const staged = await realpath(entry.sourceLocation);
            const inside = relative(tempDir, staged);
            if (!inside || inside.startsWith("..") || isAbsolute(inside)) {
                throw new Error("outside of the temp directory");
            }
            return null;
        } catch (error) {
            return new UploadError(
                "TRANSFER_INCOMPLETE",
                `Staged file for ${entry.name} is not usable: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { tempPath: entry.sourceLocation },
                { cause: error }
            );
        }
    }

    /**
     * The content must carry a signature of the extension's accepted types
     * when any is known; otherwise it must not be recognisable as another type.
     */
    private async checkSignature(path: string, ext: string, declaredType: string): Promise<UploadError | null> {
        const bytes = await readSignature(path);
        const accepted = this.registry.acceptedMimeTypes(ext);
        const detected = detectMimeType(bytes);

        const matches = matchesSignatureOf(bytes, accepted);
        if (matches === true) {
            return null;
        }
        if (matches === null && (detected === null || accepted.includes(detected) || isContainerOf(detected, declaredType.toLowerCase()))) {
            return null;
        }

        return new UploadError(
            "UNSUPPORTED_TYPE",
            `File content is ${detected ?? "unrecognised"}, which does not match extension .${ext}`,
            { detected, ext, declaredType }
        );
    }

    private async scan(path: string): Promise<UploadError | null> {
        if (!this.scanner) {
            if (this.config.scanFailOpen) {
                logger.warn(`Scanning enabled without a scanner, accepting ${path}`);
                return null;
            }
            return new UploadError("REJECTED_BY_SCAN", "File could not be scanned", { reason: "no scanner configured" });
        }

        try {
            const verdict = await this.scanner.scan(path);
            if (verdict === "clean") {
                return null;
            }
            return new UploadError("REJECTED_BY_SCAN", "File was flagged by the malware scanner", { verdict });
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'Unknown error';
            if (this.config.scanFailOpen) {
                logger.warn(`Scanner failed on ${path}, accepting: ${reason}`);
                return null;
            }
            return new UploadError("REJECTED_BY_SCAN", "File could not be scanned", { reason }, { cause: error });
        }
    }

    private reject(entry: UploadEntry, error: UploadError): ValidationResult {
        logger.warn(`Rejected ${entry.field} (${entry.name}): [${error.code}] ${error.message}`);
        return { valid: false, error };
    }
}
