/**
 * @module objective/types
 * @description Type definitions for scalar objective functions
 */

/**
 * Plain scalar function of one real variable
 */
export type ScalarFunction = (x: number) => number;

/**
 * Objective that can be evaluated at a point
 */
export interface UnivariateObjective {
    evaluate(x: number): number;
}

/**
 * Anything a search accepts as its objective
 */
export type ObjectiveLike = UnivariateObjective | ScalarFunction;

/**
 * Serialized form of a {@link UnimodalProblem}
 */
export interface UnimodalProblemParams {
    offset: number;
    scale: number;
}
