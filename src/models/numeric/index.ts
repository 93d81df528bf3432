/**
 * @module src/models/numeric
 * @description Numerical Methods
 *
 * Contains:
 * - Objective: scalar objective functions and the unimodal reference problem
 * - Optimization: golden-section search
 */

import * as objective from './objective';
import * as optimization from './optimization';

// Re-export as namespaces
export { objective, optimization };

// Direct exports for common functions
export * from './objective';
export * from './optimization';
