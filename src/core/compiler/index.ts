export { compile } from './compiler.js';
export { runParse, splitTokens, type RunOptions } from './driver.js';
export * from './types.js';
