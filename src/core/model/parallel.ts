import type { Parser } from './parser.js';

export interface ParallelOptions {
  /** No branch needs to be selected */
  optional?: boolean;
  help?: string;
}

/**
 * Sibling parsers sharing one position in the token stream. The first token
 * of the position names the branch; at most one branch is parsed.
 */
export class ParallelSet {
  readonly node = 'parallel';
  readonly branches: ReadonlyMap<string, Parser>;
  readonly optional: boolean;
  readonly help: string;

  constructor(branches: Record<string, Parser>, options: ParallelOptions = {}) {
    this.branches = new Map(Object.entries(branches));
    this.optional = options.optional ?? false;
    this.help = options.help ?? '';
  }
}

/**
 * Declare mutually exclusive sub-commands. The namespace attribute under the
 * set's own key holds the selected branch name, or null.
 */
export function parallel(branches: Record<string, Parser>, options: ParallelOptions = {}): ParallelSet {
  return new ParallelSet(branches, options);
}
