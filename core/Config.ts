/**
 * Configuration module for the upload pipeline
 * Reads environment variables into an UploadConfiguration
 */

import { DEFAULT_UPLOAD_CONFIG } from "../config/upload.config";
import { validateEnv } from "./validateEnv";
import type { UploadConfiguration } from "../types/upload.types";

export interface AppConfig {
    upload: UploadConfiguration;
    nodeEnv: string;
    logLevel: string;
}

/**
 * Configuration singleton class
 */
class ConfigManager {
    private static instance: ConfigManager;
    private config: AppConfig;

    private constructor() {
        this.config = this.loadConfig();
    }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    /**
     * Load configuration from environment variables
     */
    private loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
        const parsed = validateEnv(env);
        const defaults = DEFAULT_UPLOAD_CONFIG;

        return {
            upload: {
                maxFileSize: parsed.UPLOAD_MAX_FILE_SIZE?.trim() || defaults.maxFileSize,
                maxNameLength: this.parseNameLength(parsed.UPLOAD_MAX_NAME_LENGTH, defaults.maxNameLength),
                tempDir: parsed.UPLOAD_TEMP_DIR || defaults.tempDir,
                baseDir: parsed.UPLOAD_BASE_DIR || defaults.baseDir,
                uploadDir: parsed.UPLOAD_DIR ?? defaults.uploadDir,
                ajaxField: parsed.UPLOAD_AJAX_FIELD ?? defaults.ajaxField,
                scanFile: this.parseBoolean(parsed.UPLOAD_SCAN_ENABLED, defaults.scanFile),
                scanFailOpen: this.parseBoolean(parsed.UPLOAD_SCAN_FAIL_OPEN, defaults.scanFailOpen),
                validateFileSignature: this.parseBoolean(parsed.UPLOAD_VALIDATE_SIGNATURE, defaults.validateFileSignature)
            },
            nodeEnv: parsed.NODE_ENV || 'development',
            logLevel: parsed.LOG_LEVEL || 'info'
        };
    }

    private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
        if (!value) return defaultValue;
        return value.toLowerCase() === 'true' || value === '1';
    }

    /** 0 disables truncation */
    private parseNameLength(value: string | undefined, defaultValue: number | null): number | null {
        if (!value) return defaultValue;
        const parsed = parseInt(value, 10);
        if (isNaN(parsed)) return defaultValue;
        return parsed > 0 ? parsed : null;
    }

    /**
     * Get the current configuration
     */
    public getConfig(): AppConfig {
        return { ...this.config, upload: { ...this.config.upload } };
    }

    /**
     * Get the upload configuration
     */
    public getUploadConfig(): UploadConfiguration {
        return { ...this.config.upload };
    }

    /**
     * Reload configuration from environment variables
     */
    public reloadConfig(env: NodeJS.ProcessEnv = process.env): void {
        this.config = this.loadConfig(env);
    }
}

/**
 * Global configuration instance
 */
export const config = ConfigManager.getInstance();

export const getUploadConfig = () => config.getUploadConfig();

export default config;
