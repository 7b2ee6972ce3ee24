/**
 * Entry point of the documentation parser.
 */
import { ConstructionError, ErrorCodes } from '../../utils/errors.js';
import { GoogleExtractor } from './dialects/google.js';
import { JsdocExtractor } from './dialects/jsdoc.js';
import { NumpyExtractor } from './dialects/numpy.js';
import { RstExtractor } from './dialects/rst.js';
import type { DocstringDialect, DocumentationExtractor } from './types.js';

const EXTRACTORS: Record<DocstringDialect, DocumentationExtractor> = {
  google: new GoogleExtractor(),
  numpy: new NumpyExtractor(),
  rst: new RstExtractor(),
  jsdoc: new JsdocExtractor(),
};

export function isDialect(name: string): name is DocstringDialect {
  return Object.hasOwn(EXTRACTORS, name);
}

/**
 * @throws ConstructionError for a dialect name that is not supported
 */
export function getExtractor(dialect: string): DocumentationExtractor {
  if (!isDialect(dialect)) {
    throw new ConstructionError(
      ErrorCodes.UNKNOWN_DIALECT,
      `Unknown documentation dialect '${dialect}'. Supported: ${Object.keys(EXTRACTORS).join(', ')}`,
      { dialect }
    );
  }
  return EXTRACTORS[dialect];
}

/**
 * Map parameter names to their help text in a documentation block.
 */
export function extract(text: string, dialect: string = 'google'): Map<string, string> {
  return getExtractor(dialect).extract(text);
}
