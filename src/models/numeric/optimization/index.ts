/**
 * @module optimization
 * @description Univariate optimization algorithms
 *
 * Provides:
 * - Golden-section search: derivative-free bracketing minimization
 */

export * from './types';
export * from './golden-section';
