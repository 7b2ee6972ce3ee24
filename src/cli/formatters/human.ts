/**
 * Aligned, colored field table for terminals.
 */
import chalk from 'chalk';
import type { CallableSignature } from '../../core/deduction/types.js';
import type { FieldRow } from '../describe.js';
import type { IFieldFormatter } from './types.js';

export class HumanFormatter implements IFieldFormatter {
  format(signature: CallableSignature, rows: FieldRow[]): string {
    const lines = [`${chalk.bold(signature.name)} ${chalk.dim(`(${signature.kind})`)}`];
    if (signature.summary) lines.push(`  ${signature.summary}`);
    lines.push('');

    if (rows.length === 0) {
      lines.push(`  ${chalk.dim('No fields')}`);
      return lines.join('\n');
    }

    const pathWidth = Math.max(...rows.map((row) => row.path.length));
    const labels = rows.map(label);
    const labelWidth = Math.max(...labels.map((text) => text.length));

    rows.forEach((row, index) => {
      const line = `  ${chalk.cyan(row.path.padEnd(pathWidth))}  ${labels[index].padEnd(labelWidth)}  ${details(row)}`;
      lines.push(line.trimEnd());
    });
    return lines.join('\n');
  }
}

function label(row: FieldRow): string {
  switch (row.kind) {
    case 'group':
      return 'group';
    case 'parallel':
      return 'one of';
    case 'flag':
    case 'action':
      return row.kind;
    default: {
      const arity = row.nargs === undefined || row.nargs === 1 ? '' : ` ${row.nargs}`;
      return `${row.placement ?? 'option'} ${row.type ?? 'str'}${arity}`;
    }
  }
}

function details(row: FieldRow): string {
  const parts: string[] = [];
  if (row.required) parts.push(chalk.yellow('required'));
  if (row.default !== null && row.default !== undefined) parts.push(`default: ${formatValue(row.default)}`);
  if (row.choices) parts.push(`choices: ${row.choices.map(formatValue).join(', ')}`);
  if (row.help) parts.push(chalk.dim(row.help));
  return parts.join('  ');
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'bigint') return `${value}n`;
  return Array.isArray(value) ? `[${value.map(formatValue).join(', ')}]` : String(value);
}
