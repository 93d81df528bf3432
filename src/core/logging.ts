/**
 * @module core/logging
 * @description Structured logging for search progress
 *
 * Search routines never print on their own: they report each narrowed bracket
 * and the final result to a {@link SearchLogger}. Console output, in-memory
 * capture for tests, and fan-out to several sinks are provided here.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Label of the run that produced the entry */
    label: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Per-iteration bracket entry
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    iteration: number;
    lowerBound: number;
    upperBound: number;
    width: number;
}

/**
 * Final result entry
 */
export interface ResultLogEntry extends BaseLogEntry {
    logType: 'result';
    point: number;
    value: number;
    lowerBound: number;
    upperBound: number;
    width: number;
    iterations: number;
    evaluations: number;
    converged: boolean;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | ResultLogEntry;

type GeneratedFields = 'logType' | 'schemaVersion' | 'label' | 'timestamp';

export type IterationLogInput = Omit<IterationLogEntry, GeneratedFields>;
export type ResultLogInput = Omit<ResultLogEntry, GeneratedFields>;

/**
 * Logger interface
 */
export interface SearchLogger {
    /** Log one narrowed bracket */
    logIteration(entry: IterationLogInput): void;
    /** Log the final estimate */
    logResult(entry: ResultLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Run label stamped on every entry */
    label?: string;
    /** Schema version */
    schemaVersion?: string;
    /** Console level (console logger only) */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';
const DEFAULT_LABEL = 'golden-section';

// ==================== Console Logger ====================

/**
 * Console Logger: print progress to stdout.
 *
 * Iteration lines are emitted only at `debug` and read `lower upper width`.
 */
export class ConsoleLogger implements SearchLogger {
    private level: LogLevel;
    private label: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.label = DEFAULT_LABEL;
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.label = levelOrConfig.label ?? DEFAULT_LABEL;
        }
    }

    logIteration(entry: IterationLogInput): void {
        if (this.level === 'debug') {
            console.log(`${entry.lowerBound} ${entry.upperBound} ${entry.width}`);
        }
    }

    logResult(entry: ResultLogInput): void {
        if (this.level === 'debug' || this.level === 'info') {
            console.log(
                `[RESULT] ${this.label}: x=${entry.point}, value=${entry.value}, ` +
                `iterations=${entry.iterations}, evaluations=${entry.evaluations}, ` +
                `converged=${entry.converged}`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: store entries in memory.
 * Useful for tests and for tracing convergence after the fact.
 */
export class MemoryLogger implements SearchLogger {
    private config: { label: string; schemaVersion: string };
    public iterations: IterationLogEntry[] = [];
    public results: ResultLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.config = {
            label: config.label ?? DEFAULT_LABEL,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            label: this.config.label,
            timestamp: Date.now(),
        };
    }

    logIteration(entry: IterationLogInput): void {
        this.iterations.push({
            ...this.createBaseEntry(),
            logType: 'iteration',
            ...entry,
        });
    }

    logResult(entry: ResultLogInput): void {
        this.results.push({
            ...this.createBaseEntry(),
            logType: 'result',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.results];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.results = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Null Logger ====================

/**
 * Null Logger: discard everything
 */
export class NullLogger implements SearchLogger {
    logIteration(_entry: IterationLogInput): void { /* discard */ }
    logResult(_entry: ResultLogInput): void { /* discard */ }
    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: write to multiple loggers simultaneously
 */
export class MultiLogger implements SearchLogger {
    private loggers: SearchLogger[];

    constructor(loggers: SearchLogger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: IterationLogInput): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logResult(entry: ResultLogInput): void {
        for (const logger of this.loggers) {
            logger.logResult(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory' | 'null',
    config: LoggerConfig = {}
): SearchLogger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
        case 'null':
            return new NullLogger();
    }
}
