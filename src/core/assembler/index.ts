export { assemble, buildSkeleton } from './assemble.js';
