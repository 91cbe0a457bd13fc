import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (namespace + most used names)
    index: 'src/index.ts',

    // =========================================================================
    // Feature entry points
    // =========================================================================
    seq: 'src/seq-entry.ts',
    option: 'src/option-entry.ts',
    functional: 'src/functional-entry.ts',
    immutable: 'src/immutable-entry.ts',

    // =========================================================================
    // Errors and results
    // =========================================================================
    result: 'src/result.ts',
    errors: 'src/errors-entry.ts',
    'tagged-error': 'src/tagged-error-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
