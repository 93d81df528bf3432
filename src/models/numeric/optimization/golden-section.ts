/**
 * @module optimization/golden-section
 * @description Golden-section search for the minimum of a unimodal function.
 *
 * A derivative-free bracketing method. Two interior probes split the bracket in
 * the golden ratio; comparing their values discards the outer segment that
 * cannot contain the minimum. Because of the ratio, the surviving probe sits
 * exactly where the next iteration needs one, so every iteration costs a single
 * new evaluation and shrinks the bracket by 1/φ ≈ 0.618.
 *
 * The objective must be unimodal on the bracket; this is not checked.
 *
 * Reference: J. Kiefer, "Sequential minimax search for a maximum",
 * Proceedings of the American Mathematical Society, Vol. 4, pp. 502-506, 1953.
 */

import { InvalidBracketError, InvalidToleranceError, ValidationError } from '../../../core/errors';
import { toScalarFunction } from '../objective/unimodal-problem';
import type { ObjectiveLike } from '../objective/types';
import type {
    Bracket,
    BracketRecord,
    GoldenSectionOptions,
    GoldenSectionResult,
    ScalarMinimizeConfig,
} from './types';

// ==================== Constants ====================

/** φ = (1 + √5) / 2 */
export const GOLDEN_RATIO = (1 + Math.sqrt(5)) / 2;

/** ρ = 2 - φ = 1/φ², fraction of the bracket between a bound and its nearer probe */
export const GOLDEN_SECTION_FRACTION = 2 - GOLDEN_RATIO;

/** Width ratio between consecutive brackets */
export const GOLDEN_SHRINK_FACTOR = 1 - GOLDEN_SECTION_FRACTION;

/** Tolerances below this multiple of the bracket magnitude cannot be reached */
const MIN_RELATIVE_TOLERANCE = 4 * Number.EPSILON;

/** Smallest normal double */
const MIN_ABSOLUTE_TOLERANCE = 2.2250738585072014e-308;

/**
 * Default configuration for `minimizeScalar`
 */
export function defaultScalarMinimizeConfig(): ScalarMinimizeConfig {
    return {
        xtol: 1e-6,
        maxIterations: Infinity,
    };
}

// ==================== Validation ====================

function validateBracket(lowerBound: number, upperBound: number): void {
    if (!Number.isFinite(lowerBound) || !Number.isFinite(upperBound)) {
        throw new InvalidBracketError(
            lowerBound,
            upperBound,
            `Invalid bracket [${lowerBound}, ${upperBound}]: bounds must be finite`
        );
    }
    if (!(lowerBound < upperBound)) {
        throw new InvalidBracketError(lowerBound, upperBound);
    }
    if (!Number.isFinite(upperBound - lowerBound)) {
        throw new InvalidBracketError(
            lowerBound,
            upperBound,
            `Invalid bracket [${lowerBound}, ${upperBound}]: width overflows`
        );
    }
}

/**
 * Smallest tolerance the search accepts for a bracket
 */
export function minimumTolerance(lowerBound: number, upperBound: number): number {
    const magnitude = Math.max(Math.abs(lowerBound), Math.abs(upperBound));
    return Math.max(MIN_RELATIVE_TOLERANCE * magnitude, MIN_ABSOLUTE_TOLERANCE);
}

function validateTolerance(xtol: number, lowerBound: number, upperBound: number): void {
    if (!Number.isFinite(xtol) || !(xtol > 0)) {
        throw new InvalidToleranceError(xtol);
    }
    const floor = minimumTolerance(lowerBound, upperBound);
    if (xtol < floor) {
        throw new InvalidToleranceError(
            xtol,
            `Invalid tolerance ${xtol}: below the resolvable width ${floor} for bracket [${lowerBound}, ${upperBound}]`
        );
    }
}

function resolveMaxIterations(maxIterations: number | undefined): number {
    if (maxIterations === undefined || maxIterations === Infinity) {
        return Infinity;
    }
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
        throw new ValidationError(
            `maxIterations must be a non-negative integer or Infinity, got ${maxIterations}`,
            { maxIterations }
        );
    }
    return maxIterations;
}

// ==================== Golden-Section Search ====================

/**
 * Golden-section search.
 *
 * Narrows `[lowerBound, upperBound]` until its width is at most `xtol`, then
 * evaluates the objective once more at the midpoint of the final bracket.
 * Equal probe values shrink the bracket from below.
 *
 * Infinite or NaN objective values are not trapped: they take part in the
 * `<` comparison like any other value.
 *
 * @param objective Objective or plain function to minimize
 * @param lowerBound Lower end of the initial bracket
 * @param upperBound Upper end of the initial bracket
 * @param xtol Stopping width, finite and positive
 * @param options Iteration cap and progress observers
 * @throws InvalidBracketError unless both bounds are finite and `lowerBound < upperBound`
 * @throws InvalidToleranceError unless `xtol` is finite, positive and resolvable at the bracket's scale
 */
export function goldenSectionSearch(
    objective: ObjectiveLike,
    lowerBound: number,
    upperBound: number,
    xtol: number,
    options: GoldenSectionOptions = {}
): GoldenSectionResult {
    validateBracket(lowerBound, upperBound);
    validateTolerance(xtol, lowerBound, upperBound);
    const maxIterations = resolveMaxIterations(options.maxIterations);
    const { logger, onIteration } = options;
    const f = toScalarFunction(objective);

    let lowerProbe = lowerBound + GOLDEN_SECTION_FRACTION * (upperBound - lowerBound);
    let lowerValue = f(lowerProbe);

    let upperProbe = upperBound - GOLDEN_SECTION_FRACTION * (upperBound - lowerBound);
    let upperValue = f(upperProbe);

    let evaluations = 2;
    let iterations = 0;

    while (Math.abs(upperBound - lowerBound) > xtol && iterations < maxIterations) {
        if (lowerValue < upperValue) {
            // Minimum lies in [lowerBound, upperProbe]
            upperBound = upperProbe;
            upperProbe = lowerProbe;
            upperValue = lowerValue;

            lowerProbe = lowerBound + GOLDEN_SECTION_FRACTION * (upperBound - lowerBound);
            lowerValue = f(lowerProbe);
        } else {
            // Minimum lies in [lowerProbe, upperBound]
            lowerBound = lowerProbe;
            lowerProbe = upperProbe;
            lowerValue = upperValue;

            upperProbe = upperBound - GOLDEN_SECTION_FRACTION * (upperBound - lowerBound);
            upperValue = f(upperProbe);
        }
        evaluations++;
        iterations++;

        const record: BracketRecord = {
            iteration: iterations,
            lowerBound,
            upperBound,
            width: Math.abs(upperBound - lowerBound),
        };
        logger?.logIteration(record);
        onIteration?.(record);
    }

    const width = Math.abs(upperBound - lowerBound);
    const point = (upperBound + lowerBound) / 2;
    const value = f(point);
    evaluations++;

    const result: GoldenSectionResult = {
        point,
        value,
        lowerBound,
        upperBound,
        width,
        iterations,
        evaluations,
        converged: width <= xtol,
    };
    logger?.logResult(result);

    return result;
}

/**
 * Golden-section search with an object-style bracket and configuration.
 * Unset fields fall back to {@link defaultScalarMinimizeConfig}.
 */
export function minimizeScalar(
    objective: ObjectiveLike,
    bracket: Bracket,
    config?: Partial<ScalarMinimizeConfig>
): GoldenSectionResult {
    const defaults = defaultScalarMinimizeConfig();
    return goldenSectionSearch(objective, bracket.lower, bracket.upper, config?.xtol ?? defaults.xtol, {
        maxIterations: config?.maxIterations ?? defaults.maxIterations,
        logger: config?.logger,
        onIteration: config?.onIteration,
    });
}

/**
 * Iterations needed to narrow a bracket of `width` down to `xtol`,
 * in exact arithmetic.
 */
export function goldenSectionIterationBound(width: number, xtol: number): number {
    if (!Number.isFinite(xtol) || !(xtol > 0)) {
        throw new InvalidToleranceError(xtol);
    }
    if (width <= xtol) {
        return 0;
    }
    return Math.ceil(Math.log(xtol / width) / Math.log(GOLDEN_SHRINK_FACTOR));
}
