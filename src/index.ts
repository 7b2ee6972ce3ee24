/**
 * declarg: declarative command-line parser trees.
 * Main library exports barrel file.
 */

// Model
export * from './core/model/index.js';

// Actions
export * from './core/actions/index.js';

// Value types
export * from './core/value-types/index.js';

// Compiler and assembler
export * from './core/compiler/index.js';
export * from './core/assembler/index.js';

// Signature deduction
export * from './core/deduction/index.js';

// Documentation
export * from './core/docs/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
