import pino from 'pino';

/**
 * Log levels configuration
 * - fatal: System is unusable
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages
 * - debug: Debug-level messages
 * - trace: Trace-level messages
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Environment-based log level configuration
 */
const getLogLevel = (): LogLevel => {
    const envLevel = process.env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
        return envLevel;
    }

    // Default levels based on environment
    switch (process.env.NODE_ENV) {
        case 'production':
            return 'info';
        case 'test':
            return 'error';
        default:
            return 'debug';
    }
};

/**
 * Pretty printing runs in a worker thread, so it stays off under test runners
 */
const shouldUsePrettyPrint = (): boolean => {
    const env = process.env.NODE_ENV;
    return env !== 'production' && env !== 'test' && process.env.LOG_FORMAT !== 'json';
};

/**
 * Base pino configuration
 */
const baseConfig: pino.LoggerOptions = {
    level: getLogLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
        pid: process.pid,
        env: process.env.NODE_ENV || 'development',
    },
    formatters: {
        level: (label) => ({ level: label }),
    },
};

const createLogger = (): pino.Logger => {
    if (shouldUsePrettyPrint()) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino(baseConfig);
};

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export const createChildLogger = (bindings: pino.Bindings): pino.Logger => {
    return logger.child(bindings);
};

/**
 * Structured error logging helper
 */
export interface ErrorContext {
    operation?: string;
    title?: string;
    jobId?: string;
    filePath?: string;
    [key: string]: unknown;
}

export const logError = (
    error: unknown,
    context: ErrorContext = {},
    log: pino.Logger = logger
): void => {
    const errorInfo = error instanceof Error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
        }
        : { message: String(error) };

    log.error({
        ...context,
        error: errorInfo,
    }, errorInfo.message);
};

/**
 * Module-specific loggers for different parts of the application
 */
export const storeLogger = createChildLogger({ component: 'store' });
export const schedulerLogger = createChildLogger({ component: 'scheduler' });
export const notifyLogger = createChildLogger({ component: 'notify' });
export const serviceLogger = createChildLogger({ component: 'service' });

export default logger;
