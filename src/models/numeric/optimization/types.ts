/**
 * @module optimization/types
 * @description Type definitions for bracketing search
 */

import type { SearchLogger } from '../../../core/logging';

/**
 * Interval known to contain the minimizer
 */
export interface Bracket {
    lower: number;
    upper: number;
}

/**
 * Bracket after one narrowing step
 */
export interface BracketRecord {
    /** 1-based iteration number */
    iteration: number;
    lowerBound: number;
    upperBound: number;
    /** |upperBound - lowerBound| */
    width: number;
}

/**
 * Observer invoked after every iteration
 */
export type IterationCallback = (record: BracketRecord) => void;

/**
 * Golden-section search options
 */
export interface GoldenSectionOptions {
    /** Iteration cap (default: unlimited) */
    maxIterations?: number;
    /** Receives every bracket and the final result */
    logger?: SearchLogger;
    /** Receives every bracket */
    onIteration?: IterationCallback;
}

/**
 * Golden-section search result
 */
export interface GoldenSectionResult {
    /** Midpoint of the final bracket */
    point: number;
    /** Objective value at `point` */
    value: number;
    /** Final bracket */
    lowerBound: number;
    upperBound: number;
    width: number;
    /** Narrowing steps performed */
    iterations: number;
    /** Objective evaluations, including the two initial probes and the final midpoint */
    evaluations: number;
    /** Whether the final width is within tolerance */
    converged: boolean;
}

/**
 * Object-argument configuration for `minimizeScalar`
 */
export interface ScalarMinimizeConfig {
    /** Bracket width tolerance */
    xtol: number;
    /** Iteration cap */
    maxIterations: number;
    logger?: SearchLogger;
    onIteration?: IterationCallback;
}
