/**
 * Flattens a parser tree into rows for listing.
 */
import type { Arity } from '../core/model/argument.js';
import { joinPath } from '../core/model/namespace.js';
import type { Parser } from '../core/model/parser.js';

export type RowKind = 'value' | 'flag' | 'action' | 'group' | 'parallel';

export interface FieldRow {
  /** Dotted namespace path */
  path: string;
  kind: RowKind;
  placement?: 'option' | 'positional';
  type?: string;
  nargs?: Arity;
  default: unknown;
  required: boolean;
  choices: readonly unknown[] | null;
  help: string;
}

export function describeTree(parser: Parser, prefix = ''): FieldRow[] {
  const rows: FieldRow[] = [];

  for (const [name, child] of parser.children) {
    const path = joinPath(prefix, name);

    if (child.node === 'argument') {
      rows.push({ path, ...child.describe() });
    } else if (child.node === 'parser') {
      if (child.translucent) {
        rows.push(...describeTree(child, prefix));
        continue;
      }
      rows.push({ path, kind: 'group', default: null, required: !child.optional, choices: null, help: child.help });
      rows.push(...describeTree(child, path));
    } else {
      rows.push({
        path,
        kind: 'parallel',
        default: null,
        required: !child.optional,
        choices: [...child.branches.keys()],
        help: child.help,
      });
      for (const [branchName, branch] of child.branches) {
        const branchPath = joinPath(prefix, branchName);
        rows.push({ path: branchPath, kind: 'group', default: null, required: false, choices: null, help: branch.help });
        rows.push(...describeTree(branch, branchPath));
      }
    }
  }
  return rows;
}
