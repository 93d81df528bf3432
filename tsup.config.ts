import { defineConfig } from 'tsup'

/**
 * tsup configuration for the goldsec library
 *
 * - index: library entry (core, numeric, tasks)
 * - cli: random-problem command-line runner
 */
export default defineConfig({
    name: 'goldsec',

    entry: {
        index: 'index.ts',
        cli: 'src/tasks/random-problem/cli.ts',
    },

    format: ['cjs', 'esm'],
    dts: {
        entry: { index: 'index.ts' },
    },

    splitting: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',
    platform: 'node',
})
