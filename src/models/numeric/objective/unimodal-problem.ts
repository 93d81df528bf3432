/**
 * @module objective/unimodal-problem
 * @description Reference objective `scale * |1 / (x - offset)|` and its builder
 *
 * The shape has a pole at `x = offset` rather than a smooth minimum. Evaluating
 * exactly at the pole yields `Infinity` (or `NaN` when `scale` is 0) per
 * IEEE-754; nothing is thrown.
 */

import { ValidationError } from '../../../core/errors';
import { mathRandomSource, uniform, type RandomSource } from '../../../core/random';
import type { ScalarFunction, UnivariateObjective, ObjectiveLike, UnimodalProblemParams } from './types';

// ==================== Constants ====================

/** Range `randomize` draws offsets from */
export const RANDOM_OFFSET_RANGE: readonly [number, number] = [-50, 50];

/** Range `randomize` draws scale factors from */
export const RANDOM_SCALE_RANGE: readonly [number, number] = [-10, 10];

// ==================== Problem ====================

/**
 * Immutable objective parameterized by offset and scale
 */
export class UnimodalProblem implements UnivariateObjective {
    readonly offset: number;
    readonly scale: number;

    constructor(offset: number, scale: number) {
        this.offset = offset;
        this.scale = scale;
        Object.freeze(this);
    }

    evaluate(x: number): number {
        return this.scale * Math.abs(1 / (x - this.offset));
    }

    toJSON(): UnimodalProblemParams {
        return { offset: this.offset, scale: this.scale };
    }
}

// ==================== Builder ====================

/**
 * Fluent builder for {@link UnimodalProblem}.
 *
 * Starts at `offset = 0`, `scale = 0`, which is degenerate; set values or call
 * `randomize()` before building. The builder can be reused after `build()`.
 *
 * ```typescript
 * const problem = new UnimodalProblemBuilder().randomize(createRng(7)).build();
 * ```
 */
export class UnimodalProblemBuilder {
    private offset = 0;
    private scale = 0;

    /**
     * Draw offset from [-50, 50) and scale from [-10, 10)
     */
    randomize(rng: RandomSource = mathRandomSource): this {
        this.offset = uniform(rng, RANDOM_OFFSET_RANGE[0], RANDOM_OFFSET_RANGE[1]);
        this.scale = uniform(rng, RANDOM_SCALE_RANGE[0], RANDOM_SCALE_RANGE[1]);
        return this;
    }

    withOffset(offset: number): this {
        this.offset = requireFinite('offset', offset);
        return this;
    }

    withScale(scale: number): this {
        this.scale = requireFinite('scale', scale);
        return this;
    }

    build(): UnimodalProblem {
        return new UnimodalProblem(this.offset, this.scale);
    }
}

// ==================== Utility Functions ====================

/**
 * Normalize an objective or plain function to a callable
 */
export function toScalarFunction(objective: ObjectiveLike): ScalarFunction {
    if (typeof objective === 'function') {
        return objective;
    }
    return (x) => objective.evaluate(x);
}

function requireFinite(name: string, value: number): number {
    if (!Number.isFinite(value)) {
        throw new ValidationError(`${name} must be a finite number, got ${value}`, { [name]: value });
    }
    return value;
}
