import fs from 'fs';
import path from 'path';
import {
    DEFAULT_DATA_FILE_NAME,
    DEFAULT_MAX_TASK_LENGTH,
    DEFAULT_MAX_TITLE_LENGTH,
    NOTIFICATION_PREVIEW_LIMIT,
} from './constants';

/**
 * Configuration validation errors
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Application configuration interface
 */
export interface AppConfig {
    /** JSON snapshot file holding every list */
    dataFile: string;
    /** File encoding for reading/writing the snapshot */
    fileEncoding: BufferEncoding;
    /** Maximum list title length */
    maxTitleLength: number;
    /** Maximum task text length */
    maxTaskLength: number;
    /** Whether desktop notifications are shown (off = log only) */
    notificationsEnabled: boolean;
    /** Number of tasks listed in a reminder notification */
    notificationPreviewLimit: number;
}

/**
 * Load a single environment variable
 */
function getEnvVar(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

/**
 * Load and validate a numeric environment variable
 */
function getNumericEnvVar(key: string, defaultValue: number, min?: number, max?: number): number {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }

    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new ConfigurationError(
            `Invalid value for ${key}: "${value}" is not a valid number`
        );
    }

    if (min !== undefined && parsed < min) {
        throw new ConfigurationError(
            `Invalid value for ${key}: ${parsed} is less than minimum ${min}`
        );
    }

    if (max !== undefined && parsed > max) {
        throw new ConfigurationError(
            `Invalid value for ${key}: ${parsed} is greater than maximum ${max}`
        );
    }

    return parsed;
}

/**
 * Load an on/off switch
 */
function getSwitchEnvVar(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }

    switch (value.toLowerCase()) {
        case 'on':
        case 'true':
        case '1':
            return true;
        case 'off':
        case 'false':
        case '0':
            return false;
        default:
            throw new ConfigurationError(
                `Invalid value for ${key}: "${value}" (expected on or off)`
            );
    }
}

/**
 * Validate the directory holding the data file exists and is writable
 */
function validateDataFileDir(dataFile: string): void {
    const dir = path.dirname(dataFile);

    if (!fs.existsSync(dir)) {
        try {
            fs.mkdirSync(dir, { recursive: true });
        } catch (error) {
            throw new ConfigurationError(
                `Failed to create data directory "${dir}": ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    const stats = fs.statSync(dir);
    if (!stats.isDirectory()) {
        throw new ConfigurationError(
            `Data directory "${dir}" exists but is not a directory`
        );
    }

    try {
        fs.accessSync(dir, fs.constants.R_OK | fs.constants.W_OK);
    } catch {
        throw new ConfigurationError(
            `Data directory "${dir}" is not readable/writable`
        );
    }
}

/**
 * Validate file encoding is supported
 */
function validateFileEncoding(encoding: string): BufferEncoding {
    const validEncodings: BufferEncoding[] = [
        'utf-8', 'utf8', 'ascii', 'utf16le', 'ucs2', 'ucs-2', 'latin1',
    ];

    const match = validEncodings.find((candidate) => candidate === encoding);
    if (!match) {
        throw new ConfigurationError(
            `Invalid FILE_ENCODING "${encoding}". Valid options: ${validEncodings.join(', ')}`
        );
    }

    return match;
}

/**
 * Load and validate all configuration from environment variables
 */
function loadConfig(): AppConfig {
    const dataFileRaw = getEnvVar('TODO_DATA_FILE', path.join(process.cwd(), DEFAULT_DATA_FILE_NAME));
    const fileEncodingRaw = getEnvVar('FILE_ENCODING', 'utf-8');
    const maxTitleLength = getNumericEnvVar('MAX_TITLE_LENGTH', DEFAULT_MAX_TITLE_LENGTH, 1, 1000);
    const maxTaskLength = getNumericEnvVar('MAX_TASK_LENGTH', DEFAULT_MAX_TASK_LENGTH, 1, 10000);
    const notificationPreviewLimit = getNumericEnvVar(
        'NOTIFICATION_PREVIEW_LIMIT',
        NOTIFICATION_PREVIEW_LIMIT,
        1,
        50
    );
    const notificationsEnabled = getSwitchEnvVar('TODO_NOTIFICATIONS', true);

    const dataFile = path.resolve(dataFileRaw);
    validateDataFileDir(dataFile);

    return {
        dataFile,
        fileEncoding: validateFileEncoding(fileEncodingRaw),
        maxTitleLength,
        maxTaskLength,
        notificationsEnabled,
        notificationPreviewLimit,
    };
}

// Loaded once on first access
let _config: AppConfig | null = null;

/**
 * Get the application configuration
 */
export function getConfig(): AppConfig {
    if (!_config) {
        _config = loadConfig();
    }
    return _config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
    _config = null;
}

/**
 * Validate configuration without loading it into the singleton
 * Useful for checking configuration before the daemon starts
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    try {
        loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            errors.push(error.message);
        } else {
            errors.push(`Unknown configuration error: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}
