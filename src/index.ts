/**
 * Puzzle Toolkit
 *
 * Graph search, input readers, vector math and number helpers for
 * solving coding puzzles.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// Search exports
export * from './search/index.js';

// Measure exports
export * from './measure/index.js';

// Math and combinatorics exports
export * from './math/number.js';
export * from './combinatorics/combinatorics.js';

// Graph structure exports
export * from './graphs/disjoint-set.js';

// Grid exports
export * from './grid/grid-map.js';

// I/O exports
export * from './io/reader.js';
export * from './io/path-formatter.js';
