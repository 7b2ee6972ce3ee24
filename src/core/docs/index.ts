export { extract, getExtractor, isDialect } from './extract.js';
export { GoogleExtractor } from './dialects/google.js';
export { NumpyExtractor } from './dialects/numpy.js';
export { RstExtractor } from './dialects/rst.js';
export { JsdocExtractor } from './dialects/jsdoc.js';
export type { DocumentationExtractor } from './types.js';
export { measureIndent } from './types.js';
