/**
 * Core Errors Module Tests
 */

import { describe, it, expect } from 'vitest';
import {
    ErrorCodes,
    GoldsecError,
    ValidationError,
    InvalidBracketError,
    InvalidToleranceError,
    InvalidConfigError,
    isGoldsecError,
    hasErrorCode,
    wrapError,
} from '../src/core';

describe('GoldsecError', () => {
    it('should carry code, message and details', () => {
        const error = new GoldsecError(ErrorCodes.INTERNAL_ERROR, 'boom', { where: 'test' });
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('GoldsecError');
        expect(error.code).toBe('INTERNAL_ERROR');
        expect(error.message).toBe('boom');
        expect(error.details).toEqual({ where: 'test' });
        expect(typeof error.timestamp).toBe('number');
    });

    it('should serialize to JSON', () => {
        const error = new ValidationError('bad option', { option: 'x' });
        const json = error.toJSON();
        expect(json).toEqual({
            name: 'ValidationError',
            code: 'VALIDATION_ERROR',
            message: 'bad option',
            details: { option: 'x' },
            timestamp: error.timestamp,
        });
    });
});

describe('Error subclasses', () => {
    it('InvalidBracketError should record both bounds', () => {
        const error = new InvalidBracketError(5, 1);
        expect(error).toBeInstanceOf(GoldsecError);
        expect(error.name).toBe('InvalidBracketError');
        expect(error.code).toBe(ErrorCodes.INVALID_BRACKET);
        expect(error.lowerBound).toBe(5);
        expect(error.upperBound).toBe(1);
        expect(error.message).toBe('Invalid bracket [5, 1]: lower bound must be less than upper bound');
        expect(error.details).toEqual({ lowerBound: 5, upperBound: 1 });
    });

    it('InvalidToleranceError should record the tolerance', () => {
        const error = new InvalidToleranceError(-1);
        expect(error.code).toBe(ErrorCodes.INVALID_TOLERANCE);
        expect(error.tolerance).toBe(-1);
        expect(error.message).toBe('Invalid tolerance -1: must be a finite positive number');
    });

    it('InvalidConfigError should default its error list to the message', () => {
        const single = new InvalidConfigError('Unknown argument: --x');
        expect(single.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(single.errors).toEqual(['Unknown argument: --x']);

        const multi = new InvalidConfigError('Invalid configuration', ['a', 'b']);
        expect(multi.errors).toEqual(['a', 'b']);
        expect(multi.details).toEqual(['a', 'b']);
    });
});

describe('Error utilities', () => {
    it('isGoldsecError should distinguish library errors', () => {
        expect(isGoldsecError(new InvalidToleranceError(0))).toBe(true);
        expect(isGoldsecError(new Error('plain'))).toBe(false);
        expect(isGoldsecError('string')).toBe(false);
    });

    it('hasErrorCode should match on code', () => {
        const error = new InvalidBracketError(1, 1);
        expect(hasErrorCode(error, ErrorCodes.INVALID_BRACKET)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.INVALID_TOLERANCE)).toBe(false);
        expect(hasErrorCode(new Error('x'), ErrorCodes.INVALID_BRACKET)).toBe(false);
    });

    it('wrapError should pass library errors through', () => {
        const error = new ValidationError('x');
        expect(wrapError(error)).toBe(error);
    });

    it('wrapError should wrap plain errors with the default code', () => {
        const wrapped = wrapError(new TypeError('bad type'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('bad type');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });
    });

    it('wrapError should stringify non-errors and honor a custom code', () => {
        const wrapped = wrapError(42, ErrorCodes.VALIDATION_ERROR);
        expect(wrapped.code).toBe(ErrorCodes.VALIDATION_ERROR);
        expect(wrapped.message).toBe('42');
    });
});
