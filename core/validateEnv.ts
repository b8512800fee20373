import { z } from "zod";

const booleanFlag = z
    .string()
    .regex(/^(true|false|1|0)$/i, "must be true, false, 1 or 0")
    .optional();

const envSchema = z.object({
    // Upload limits
    UPLOAD_MAX_FILE_SIZE: z
        .string()
        .regex(/^\s*(\d+(\.\d+)?|\.\d+)\s*(b|k|kb|m|mb|g|gb|t|tb)?\s*$/i, "UPLOAD_MAX_FILE_SIZE must be a size such as 5M or 2GB")
        .optional(),
    UPLOAD_MAX_NAME_LENGTH: z
        .string()
        .regex(/^\d+$/, "UPLOAD_MAX_NAME_LENGTH must be numeric")
        .optional(),

    // Directories
    UPLOAD_TEMP_DIR: z.string().min(1).optional(),
    UPLOAD_BASE_DIR: z.string().min(1).optional(),
    UPLOAD_DIR: z.string().optional(),
    UPLOAD_AJAX_FIELD: z.string().optional(),

    // Scanning
    UPLOAD_SCAN_ENABLED: booleanFlag,
    UPLOAD_SCAN_FAIL_OPEN: booleanFlag,
    UPLOAD_VALIDATE_SIGNATURE: booleanFlag,

    // Operational
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    LOG_PRETTY: booleanFlag,
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
});

export type UploadEnv = z.infer<typeof envSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): UploadEnv {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const messages = result.error.issues.map(
            (issue) =>
                `  - ${issue.path.length ? issue.path.join(".") + ": " : ""}${issue.message}`,
        );
        throw new Error(
            `Environment validation failed:\n${messages.join("\n")}`,
        );
    }
    return result.data;
}
