/**
 * Documentation extraction: parameter name → help text.
 */
import type { DocstringDialect } from '../config/schema.js';

export type { DocstringDialect };

export interface DocumentationExtractor {
  readonly dialect: DocstringDialect;
  /** Never throws; entries it cannot read are left out. */
  extract(text: string): Map<string, string>;
}

/** Leading whitespace characters of a line. */
export function measureIndent(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Collects the lines of each entry and joins them with single spaces.
 */
export class EntryCollector {
  private readonly entries = new Map<string, string[]>();
  private current: string[] | undefined;

  open(name: string, text: string): void {
    this.current = [];
    this.entries.set(name, this.current);
    this.append(text);
  }

  append(text: string): void {
    const trimmed = text.trim();
    if (this.current && trimmed) this.current.push(trimmed);
  }

  close(): void {
    this.current = undefined;
  }

  get isOpen(): boolean {
    return this.current !== undefined;
  }

  result(): Map<string, string> {
    const help = new Map<string, string>();
    for (const [name, lines] of this.entries) {
      help.set(name, lines.join(' '));
    }
    return help;
  }
}
