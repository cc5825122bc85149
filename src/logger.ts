import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { getEnvVarOptional } from './config.js';

const logLevel = getEnvVarOptional('LOG_LEVEL', 'info');
const logDir = path.resolve(process.cwd(), getEnvVarOptional('LOG_DIR', 'logs'));

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

export const logger = winston.createLogger({
    level: logLevel,
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            format: combine(
                colorize(),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
        // 10MB per file, keep 5 files
        new DailyRotateFile({
            filename: path.join(logDir, 'ingest-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: logLevel,
        }),
        new DailyRotateFile({
            filename: path.join(logDir, 'error-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: 'error',
        }),
    ],
});

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Throttles repeated messages that share a key.
 * The first `burstLimit` messages pass; after that one line per `minIntervalMs`,
 * annotated with how many times it repeated.
 */
export class RateLimitedLogger {
    private lastLogTime: Map<string, number> = new Map();
    private logCounts: Map<string, number> = new Map();
    private readonly minIntervalMs: number;
    private readonly burstLimit: number;
    private readonly now: () => number;

    constructor(minIntervalMs: number = 60000, burstLimit: number = 5, now: () => number = Date.now) {
        this.minIntervalMs = minIntervalMs;
        this.burstLimit = burstLimit;
        this.now = now;
    }

    /**
     * Log a message with rate limiting per key. Returns whether the line was emitted.
     */
    log(key: string, level: LogLevel, message: string, meta?: Record<string, unknown>): boolean {
        const now = this.now();
        const lastTime = this.lastLogTime.get(key) ?? 0;
        const count = (this.logCounts.get(key) ?? 0) + 1;

        this.logCounts.set(key, count);

        const shouldLog =
            count <= this.burstLimit ||
            (now - lastTime) >= this.minIntervalMs;

        if (!shouldLog) {
            return false;
        }

        if (count > this.burstLimit) {
            message = `${message} (repeated ${count} times)`;
            this.logCounts.set(key, 0);
        }
        this.lastLogTime.set(key, now);
        logger.log(level, message, meta);
        return true;
    }

    /**
     * Forget the throttle state for a key, e.g. once the condition clears.
     */
    reset(key: string): void {
        this.lastLogTime.delete(key);
        this.logCounts.delete(key);
    }

    info(key: string, message: string, meta?: Record<string, unknown>): boolean {
        return this.log(key, 'info', message, meta);
    }

    warn(key: string, message: string, meta?: Record<string, unknown>): boolean {
        return this.log(key, 'warn', message, meta);
    }

    error(key: string, message: string, meta?: Record<string, unknown>): boolean {
        return this.log(key, 'error', message, meta);
    }

    debug(key: string, message: string, meta?: Record<string, unknown>): boolean {
        return this.log(key, 'debug', message, meta);
    }
}

/**
 * Shared throttled logger for per-location failures (3 line burst, then every 30 min)
 */
export const rateLimitedLogger = new RateLimitedLogger(30 * 60 * 1000, 3);
