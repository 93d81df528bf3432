/**
 * @module tasks/random-problem/config
 * @description Random-problem task configuration and argument parsing
 */

import { InvalidConfigError } from '../../core/errors';

// ==================== Types ====================

/**
 * Random-problem task configuration
 */
export interface RandomProblemConfig {
    /** Bracket width tolerance */
    tolerance: number;
    /** Initial bracket lower bound */
    lowerBound: number;
    /** Initial bracket upper bound */
    upperBound: number;
    /** Seed for the problem generator; unset draws from Math.random */
    seed?: number;
    /** Print every narrowed bracket */
    verbose: boolean;
}

/**
 * Result of parsing command-line arguments
 */
export interface ParsedRandomProblemArgs {
    config: RandomProblemConfig;
    help: boolean;
}

export interface ConfigValidationResult {
    valid: boolean;
    errors: string[];
}

// ==================== Defaults ====================

export const DEFAULT_RANDOM_PROBLEM_CONFIG: RandomProblemConfig = {
    tolerance: 2.0,
    lowerBound: -200,
    upperBound: 200,
    verbose: false,
};

// ==================== Factory Functions ====================

/**
 * Create configuration with overrides
 */
export function createRandomProblemConfig(overrides: Partial<RandomProblemConfig> = {}): RandomProblemConfig {
    return {
        ...DEFAULT_RANDOM_PROBLEM_CONFIG,
        ...overrides,
    };
}

// ==================== Validation ====================

export function validateRandomProblemConfig(config: RandomProblemConfig): ConfigValidationResult {
    const errors: string[] = [];

    if (!Number.isFinite(config.tolerance) || config.tolerance <= 0) {
        errors.push('tolerance must be a finite positive number');
    }
    if (!Number.isFinite(config.lowerBound) || !Number.isFinite(config.upperBound)) {
        errors.push('bounds must be finite numbers');
    } else if (config.lowerBound >= config.upperBound) {
        errors.push('lowerBound must be less than upperBound');
    }
    if (config.seed !== undefined && !Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

// ==================== Argument Parsing ====================

type NumericFlag = 'tolerance' | 'seed' | 'lower' | 'upper';

const FLAG_ALIASES: Record<string, NumericFlag | 'verbose' | 'help'> = {
    '--tolerance': 'tolerance',
    '-t': 'tolerance',
    '--seed': 'seed',
    '-s': 'seed',
    '--lower': 'lower',
    '--upper': 'upper',
    '--verbose': 'verbose',
    '-v': 'verbose',
    '--help': 'help',
    '-h': 'help',
};

function parseNumber(flag: string, raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') {
        throw new InvalidConfigError(`Missing value for ${flag}`);
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new InvalidConfigError(`Invalid value for ${flag}: ${raw}`);
    }
    return value;
}

/**
 * Parse `--tolerance 0.5`, `--tolerance=0.5`, `-t 0.5`, `--seed`, `--lower`,
 * `--upper`, `--verbose` and `--help`.
 *
 * @throws InvalidConfigError on unknown flags, bad numbers, or an invalid resulting config
 */
export function parseRandomProblemArgs(argv: readonly string[]): ParsedRandomProblemArgs {
    const overrides: Partial<RandomProblemConfig> = {};
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? '';
        const eq = arg.indexOf('=');
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        const name = FLAG_ALIASES[flag];

        if (name === undefined) {
            throw new InvalidConfigError(`Unknown argument: ${arg}`);
        }

        if (name === 'help' || name === 'verbose') {
            if (eq >= 0) {
                throw new InvalidConfigError(`${flag} takes no value`);
            }
            if (name === 'help') {
                help = true;
            } else {
                overrides.verbose = true;
            }
            continue;
        }

        const raw = eq >= 0 ? arg.slice(eq + 1) : argv[++i];
        const value = parseNumber(flag, raw);
        switch (name) {
            case 'tolerance':
                overrides.tolerance = value;
                break;
            case 'seed':
                overrides.seed = value;
                break;
            case 'lower':
                overrides.lowerBound = value;
                break;
            case 'upper':
                overrides.upperBound = value;
                break;
        }
    }

    const config = createRandomProblemConfig(overrides);
    if (!help) {
        const validation = validateRandomProblemConfig(config);
        if (!validation.valid) {
            throw new InvalidConfigError(
                `Invalid configuration: ${validation.errors.join('; ')}`,
                validation.errors
            );
        }
    }

    return { config, help };
}
