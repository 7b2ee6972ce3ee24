export * from './argument.js';
export * from './parallel.js';
export * from './parser.js';
export * from './namespace.js';
