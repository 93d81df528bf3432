/**
 * @packageDocumentation
 * @module goldsec
 *
 * goldsec: golden-section search for unimodal functions of one variable.
 *
 * ## Modules
 * - `core` - Errors, progress logging, random sources
 * - `numeric` - Objective functions and golden-section search
 * - `tasks` - Runnable random-problem task
 *
 * ## Usage Example
 * ```typescript
 * import { goldenSectionSearch, UnimodalProblemBuilder } from 'goldsec';
 *
 * // A negative scale turns the pole at 5 into the minimum
 * const problem = new UnimodalProblemBuilder().withOffset(5).withScale(-2).build();
 * const { point, value } = goldenSectionSearch(problem, -200, 200, 2.0);
 *
 * // Plain functions work too
 * const parabola = goldenSectionSearch((x) => (x - 3) ** 2, 0, 10, 1e-6);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as numeric from './src/models/numeric';
export * as tasks from './src/tasks';

// ==================== Direct Exports ====================

export {
    goldenSectionSearch,
    minimizeScalar,
    goldenSectionIterationBound,
    GOLDEN_RATIO,
    GOLDEN_SECTION_FRACTION,
    UnimodalProblem,
    UnimodalProblemBuilder,
} from './src/models/numeric';

export type {
    ObjectiveLike,
    UnivariateObjective,
    GoldenSectionOptions,
    GoldenSectionResult,
    BracketRecord,
} from './src/models/numeric';

export {
    GoldsecError,
    InvalidBracketError,
    InvalidToleranceError,
    MemoryLogger,
    ConsoleLogger,
    createRng,
} from './src/core';

// ==================== Version ====================
export const VERSION = '1.0.0';
