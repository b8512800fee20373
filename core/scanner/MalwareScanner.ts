import type { ScanVerdict } from "../../types/upload.types";

/**
 * Contract for an antivirus or content scanner.
 *
 * Implementations resolve with a verdict for the file at `path` and reject
 * when the scan itself could not run.
 */
export interface MalwareScanner {
    scan(path: string): Promise<ScanVerdict>;
}
