/**
 * Search module exports
 */

export * from './frontier.js';
export * from './state-key.js';
export * from './search-node.js';
export * from './preconditions.js';
export * from './basic.js';
export * from './dijkstra.js';
export * from './astar.js';
export * from './path-finder.js';
export * from './median.js';
