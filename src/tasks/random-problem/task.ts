/**
 * @module tasks/random-problem/task
 * @description Locate the pole of a randomly generated unimodal problem
 *
 * Draws a problem with a random offset and scale, runs golden-section search
 * over the configured bracket, and reports how close the estimate landed to
 * the true offset.
 */

import { InvalidConfigError, isGoldsecError } from '../../core/errors';
import { ConsoleLogger, type SearchLogger } from '../../core/logging';
import { createRng, mathRandomSource } from '../../core/random';
import { UnimodalProblemBuilder, type UnimodalProblem } from '../../models/numeric/objective/unimodal-problem';
import { goldenSectionSearch } from '../../models/numeric/optimization/golden-section';
import type { GoldenSectionResult } from '../../models/numeric/optimization/types';
import {
    DEFAULT_RANDOM_PROBLEM_CONFIG,
    parseRandomProblemArgs,
    validateRandomProblemConfig,
    type RandomProblemConfig,
} from './config';

// ==================== Types ====================

export interface RandomProblemReport {
    config: RandomProblemConfig;
    problem: UnimodalProblem;
    result: GoldenSectionResult;
    /** |estimate - true offset| */
    offsetError: number;
}

/**
 * Output sinks for the command-line runner
 */
export interface CliIO {
    log(line: string): void;
    error(line: string): void;
}

// ==================== Task ====================

/**
 * Run the random-problem task.
 *
 * Without an explicit logger, `verbose` prints each bracket to the console.
 *
 * @throws InvalidConfigError if the configuration fails validation
 */
export function runRandomProblem(
    config: RandomProblemConfig = DEFAULT_RANDOM_PROBLEM_CONFIG,
    logger?: SearchLogger
): RandomProblemReport {
    const validation = validateRandomProblemConfig(config);
    if (!validation.valid) {
        throw new InvalidConfigError(
            `Invalid configuration: ${validation.errors.join('; ')}`,
            validation.errors
        );
    }

    const rng = config.seed === undefined ? mathRandomSource : createRng(config.seed);
    const problem = new UnimodalProblemBuilder().randomize(rng).build();

    const result = goldenSectionSearch(problem, config.lowerBound, config.upperBound, config.tolerance, {
        logger: logger ?? (config.verbose ? new ConsoleLogger('debug') : undefined),
    });

    return {
        config,
        problem,
        result,
        offsetError: Math.abs(result.point - problem.offset),
    };
}

export function formatRandomProblemReport(report: RandomProblemReport): string {
    return `Random offset: ${report.problem.offset} Offset estimate: ${report.result.point} ` +
        `minimum value: ${report.result.value}`;
}

// ==================== Command Line ====================

export const RANDOM_PROBLEM_HELP = `
Golden Section Search Example

Usage:
  npx tsx src/tasks/random-problem/cli.ts [options]

Options:
  -h, --help          Show this help message
  -t, --tolerance N   Bracket width to reach before finishing (default: ${DEFAULT_RANDOM_PROBLEM_CONFIG.tolerance})
  -s, --seed N        Seed for the random problem (default: unseeded)
  --lower N           Initial bracket lower bound (default: ${DEFAULT_RANDOM_PROBLEM_CONFIG.lowerBound})
  --upper N           Initial bracket upper bound (default: ${DEFAULT_RANDOM_PROBLEM_CONFIG.upperBound})
  -v, --verbose       Print every narrowed bracket

Examples:
  npx tsx src/tasks/random-problem/cli.ts --tolerance 0.5
  npx tsx src/tasks/random-problem/cli.ts -t 0.01 --seed 42 --verbose
`;

const defaultIO: CliIO = {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
};

/**
 * Parse arguments, run the task and print the report.
 *
 * @returns Process exit code
 */
export function runRandomProblemCli(argv: readonly string[], io: CliIO = defaultIO): number {
    try {
        const { config, help } = parseRandomProblemArgs(argv);
        if (help) {
            io.log(RANDOM_PROBLEM_HELP);
            return 0;
        }

        io.log(formatRandomProblemReport(runRandomProblem(config)));
        return 0;
    } catch (error) {
        if (!isGoldsecError(error)) {
            throw error;
        }
        io.error(`[FAILED] ${error.message}`);
        return 1;
    }
}
