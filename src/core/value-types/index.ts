export * from './rules.js';
export * from './subsets.js';
