/**
 * Objective Module Tests
 * Tests for UnimodalProblem, its builder, and objective normalization
 */

import { describe, it, expect } from 'vitest';
import {
    UnimodalProblem,
    UnimodalProblemBuilder,
    RANDOM_OFFSET_RANGE,
    RANDOM_SCALE_RANGE,
    toScalarFunction,
} from '../src/models/numeric/objective';
import { createRng, ErrorCodes, ValidationError } from '../src/core';
import { createMockRNG } from './test-utils';

// ==================== UnimodalProblem ====================

describe('UnimodalProblem', () => {
    it('should evaluate scale * |1 / (x - offset)|', () => {
        const problem = new UnimodalProblem(5, 2);
        expect(problem.evaluate(7)).toBe(1);
        expect(problem.evaluate(4)).toBe(2);
        expect(problem.evaluate(3)).toBe(1);
    });

    it('should keep the sign of a negative scale', () => {
        const problem = new UnimodalProblem(5, -3);
        expect(problem.evaluate(6)).toBe(-3);
        expect(problem.evaluate(4)).toBe(-3);
    });

    it('should return Infinity at the pole', () => {
        expect(new UnimodalProblem(5, 2).evaluate(5)).toBe(Infinity);
        expect(new UnimodalProblem(5, -2).evaluate(5)).toBe(-Infinity);
    });

    it('should return NaN at the pole when scale is zero', () => {
        expect(new UnimodalProblem(5, 0).evaluate(5)).toBeNaN();
    });

    it('should be frozen', () => {
        const problem = new UnimodalProblem(1, 1);
        expect(Object.isFrozen(problem)).toBe(true);
        expect(Reflect.set(problem, 'offset', 2)).toBe(false);
        expect(problem.offset).toBe(1);
    });

    it('should serialize to its parameters', () => {
        expect(new UnimodalProblem(-3.5, 4).toJSON()).toEqual({ offset: -3.5, scale: 4 });
        expect(JSON.stringify(new UnimodalProblem(1, 2))).toBe('{"offset":1,"scale":2}');
    });
});

// ==================== UnimodalProblemBuilder ====================

describe('UnimodalProblemBuilder', () => {
    it('should default to offset 0 and scale 0', () => {
        const problem = new UnimodalProblemBuilder().build();
        expect(problem.offset).toBe(0);
        expect(problem.scale).toBe(0);
        expect(problem.evaluate(2)).toBe(0);
    });

    it('should set values fluently', () => {
        const problem = new UnimodalProblemBuilder().withOffset(5).withScale(2).build();
        expect(problem.toJSON()).toEqual({ offset: 5, scale: 2 });
    });

    it('should reject non-finite values', () => {
        const builder = new UnimodalProblemBuilder();
        expect(() => builder.withOffset(Number.NaN)).toThrow(ValidationError);
        expect(() => builder.withScale(Infinity)).toThrow(ValidationError);

        try {
            builder.withOffset(-Infinity);
            expect.unreachable('withOffset should throw');
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.code).toBe(ErrorCodes.VALIDATION_ERROR);
                expect(error.message).toBe('offset must be a finite number, got -Infinity');
            }
        }
    });

    it('randomize should return the builder for chaining', () => {
        const builder = new UnimodalProblemBuilder();
        expect(builder.randomize(createRng(1))).toBe(builder);
    });

    it('randomize should map draws onto the offset and scale ranges', () => {
        const problem = new UnimodalProblemBuilder().randomize(createMockRNG([0.5, 0.75])).build();
        expect(problem.offset).toBe(0);
        expect(problem.scale).toBe(5);

        const low = new UnimodalProblemBuilder().randomize(createMockRNG([0, 0])).build();
        expect(low.offset).toBe(RANDOM_OFFSET_RANGE[0]);
        expect(low.scale).toBe(RANDOM_SCALE_RANGE[0]);
    });

    it('randomize should stay within [-50, 50) and [-10, 10)', () => {
        const rng = createRng(2024);
        const builder = new UnimodalProblemBuilder();
        for (let i = 0; i < 200; i++) {
            const problem = builder.randomize(rng).build();
            expect(problem.offset).toBeGreaterThanOrEqual(-50);
            expect(problem.offset).toBeLessThan(50);
            expect(problem.scale).toBeGreaterThanOrEqual(-10);
            expect(problem.scale).toBeLessThan(10);
        }
    });

    it('randomize should be reproducible with the same seed', () => {
        const a = new UnimodalProblemBuilder().randomize(createRng(3)).build();
        const b = new UnimodalProblemBuilder().randomize(createRng(3)).build();
        expect(a.toJSON()).toEqual(b.toJSON());
    });

    it('randomize should fall back to Math.random', () => {
        const problem = new UnimodalProblemBuilder().randomize().build();
        expect(problem.offset).toBeGreaterThanOrEqual(-50);
        expect(problem.offset).toBeLessThan(50);
    });

    it('should stay reusable after build', () => {
        const builder = new UnimodalProblemBuilder().withOffset(1).withScale(1);
        const first = builder.build();
        const second = builder.withOffset(9).build();

        expect(first.offset).toBe(1);
        expect(second.offset).toBe(9);
        expect(second.scale).toBe(1);
    });
});

// ==================== toScalarFunction ====================

describe('toScalarFunction', () => {
    it('should pass plain functions through', () => {
        const fn = (x: number) => x * 2;
        expect(toScalarFunction(fn)).toBe(fn);
    });

    it('should wrap objectives', () => {
        const f = toScalarFunction(new UnimodalProblem(0, 4));
        expect(f(2)).toBe(2);
        expect(f(-4)).toBe(1);
    });
});
