/**
 * @module tasks
 * @description Runnable tasks built on the numeric layer
 *
 * - Random-problem: locate the pole of a randomized `scale * |1/(x - offset)|`
 */

export * as randomProblem from './random-problem';
