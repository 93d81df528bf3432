/**
 * @module core
 * @description Shared foundations for the numeric and task layers
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Search progress loggers (console, memory, multi, null)
 * - `random`: Random sources (seeded Mulberry32, Math.random)
 */

// ==================== Errors ====================

export type { ErrorCode } from './errors';

export {
    ErrorCodes,
    GoldsecError,
    ValidationError,
    InvalidBracketError,
    InvalidToleranceError,
    InvalidConfigError,
    isGoldsecError,
    hasErrorCode,
    wrapError,
} from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    ResultLogEntry,
    LogEntry,
    IterationLogInput,
    ResultLogInput,
    SearchLogger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    NullLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Random ====================

export type { RandomSource } from './random';

export {
    SeededRandom,
    createRng,
    mathRandomSource,
    uniform,
} from './random';
