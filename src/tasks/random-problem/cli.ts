#!/usr/bin/env npx tsx
/**
 * @module tasks/random-problem/cli
 * @description Command-line interface for the random-problem task
 *
 * Usage:
 *   npx tsx src/tasks/random-problem/cli.ts
 *   npx tsx src/tasks/random-problem/cli.ts --tolerance 0.5 --seed 7
 *   npm run task:random
 */

import { runRandomProblemCli } from './task';

process.exitCode = runRandomProblemCli(process.argv.slice(2));
