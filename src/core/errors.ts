/**
 * @module core/errors
 * @description Unified error types and error codes for the search library
 *
 * Every precondition violation raised by the numeric layer or the task layer
 * carries one of the codes below, so callers can branch on `code` instead of
 * matching message text.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for goldsec
 */
export const ErrorCodes = {
    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Bracket is empty, reversed, or not finite */
    INVALID_BRACKET: 'INVALID_BRACKET',
    /** Tolerance is not positive, not finite, or below floating-point resolution */
    INVALID_TOLERANCE: 'INVALID_TOLERANCE',
    /** Configuration or command-line input failed validation */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Runtime Errors
    /** Internal library error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for goldsec
 */
export class GoldsecError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'GoldsecError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, GoldsecError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Validation error (invalid option or argument)
 */
export class ValidationError extends GoldsecError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Bracket error: `lowerBound` must be finite and strictly below a finite `upperBound`
 */
export class InvalidBracketError extends GoldsecError {
    readonly lowerBound: number;
    readonly upperBound: number;

    constructor(lowerBound: number, upperBound: number, message?: string) {
        super(
            ErrorCodes.INVALID_BRACKET,
            message ?? `Invalid bracket [${lowerBound}, ${upperBound}]: lower bound must be less than upper bound`,
            { lowerBound, upperBound }
        );
        this.name = 'InvalidBracketError';
        this.lowerBound = lowerBound;
        this.upperBound = upperBound;
    }
}

/**
 * Tolerance error: `xtol` must be finite, positive and resolvable at the bracket's scale
 */
export class InvalidToleranceError extends GoldsecError {
    readonly tolerance: number;

    constructor(tolerance: number, message?: string) {
        super(
            ErrorCodes.INVALID_TOLERANCE,
            message ?? `Invalid tolerance ${tolerance}: must be a finite positive number`,
            { tolerance }
        );
        this.name = 'InvalidToleranceError';
        this.tolerance = tolerance;
    }
}

/**
 * Configuration error (bad config field or command-line argument)
 */
export class InvalidConfigError extends GoldsecError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = [message]) {
        super(ErrorCodes.INVALID_CONFIG, message, errors);
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a GoldsecError
 */
export function isGoldsecError(error: unknown): error is GoldsecError {
    return error instanceof GoldsecError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isGoldsecError(error) && error.code === code;
}

/**
 * Wrap any error into a GoldsecError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): GoldsecError {
    if (isGoldsecError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new GoldsecError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new GoldsecError(defaultCode, String(error));
}
