/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Messages below the configured threshold (LOG_LEVEL) are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_WEIGHT;
}

export class Logger {
    private readonly threshold: LogLevel;

    constructor(threshold?: LogLevel) {
        const fromEnv = (process.env.LOG_LEVEL ?? '').toLowerCase();
        this.threshold = threshold ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
    }

    /**
     * Log debug message with context
     */
    debug(message: string, meta?: LogMeta): void {
        if (this.enabled('debug')) {
            console.debug(this.formatLog('DEBUG', message, meta));
        }
    }

    /**
     * Log info message with context
     */
    info(message: string, meta?: LogMeta): void {
        if (this.enabled('info')) {
            console.info(this.formatLog('INFO', message, meta));
        }
    }

    /**
     * Log warning message with context
     */
    warn(message: string, meta?: LogMeta): void {
        if (this.enabled('warn')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    /**
     * Log failure message with context
     */
    error(message: string, meta?: LogMeta): void {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: LogMeta = {}): void {
        const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
        this.debug(`[TIME] ${label}`, { ...meta, durationMs });
    }

    enabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.threshold];
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return safeStringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        const metaStr = meta ? ` ${safeStringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

function safeStringify(meta: LogMeta): string {
    return JSON.stringify(meta, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}

/**
 * Global logger instance
 * Used when no logger is handed to a Database explicitly
 */
export const logger = new Logger();
