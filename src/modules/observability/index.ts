import winston from 'winston';
import 'winston-daily-rotate-file';
import type { ErrorKind, LookupOutcome } from '../../types';

export interface LoggerOptions {
    level?: string;
    /** When set, JSON logs are also written to a daily-rotated file in this directory. */
    dir?: string;
    silent?: boolean;
}

/**
 * Console output goes to stderr so that stdout only carries lookup results.
 */
export const createLogger = (options: LoggerOptions = {}): winston.Logger => {
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        }),
    ];

    if (options.dir) {
        transports.push(new winston.transports.DailyRotateFile({
            dirname: options.dir,
            filename: 'numscope-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
        }));
    }

    return winston.createLogger({
        level: options.level ?? 'warn',
        silent: options.silent ?? false,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
        ),
        transports,
    });
};

export type MetricsSummary = {
    total: number;
    ok: number;
    failed: number;
    by_kind: Partial<Record<ErrorKind, number>>;
    avg_latency_ms: number;
};

export class Metrics {
    private stats = {
        total: 0,
        ok: 0,
        failed: 0,
        total_latency: 0,
    };
    private byKind: Partial<Record<ErrorKind, number>> = {};

    record(outcome: LookupOutcome, latencyMs: number): void {
        this.stats.total++;
        this.stats.total_latency += latencyMs;
        if (outcome.status === 'OK') {
            this.stats.ok++;
            return;
        }
        this.stats.failed++;
        this.byKind[outcome.kind] = (this.byKind[outcome.kind] ?? 0) + 1;
    }

    getSummary(): MetricsSummary {
        return {
            total: this.stats.total,
            ok: this.stats.ok,
            failed: this.stats.failed,
            by_kind: { ...this.byKind },
            avg_latency_ms: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0,
        };
    }
}
