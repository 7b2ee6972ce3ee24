export type { IFieldFormatter } from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter, toJson } from './json.js';
