import { EntryCollector, measureIndent, type DocumentationExtractor } from '../types.js';

const HEADERS = new Set(['Args:', 'Arguments:', 'Parameters:']);
// name: text | name (type): text
const ENTRY_PATTERN = /^([A-Za-z_$][\w$]*)\s*(?:\([^)]*\))?\s*:(.*)$/;

/**
 * Google style:
 *
 *   Args:
 *       threshold (float): cut-off value,
 *           between 0 and 1
 */
export class GoogleExtractor implements DocumentationExtractor {
  readonly dialect = 'google';

  extract(text: string): Map<string, string> {
    const entries = new EntryCollector();
    let headerIndent: number | undefined;
    let entryIndent: number | undefined;

    for (const line of text.split('\n')) {
      const trimmed = line.trim();

      if (headerIndent === undefined) {
        if (HEADERS.has(trimmed)) {
          headerIndent = measureIndent(line);
          entryIndent = undefined;
        }
        continue;
      }

      const indent = measureIndent(line);
      if (!trimmed || indent <= headerIndent) {
        entries.close();
        headerIndent = undefined;
        if (HEADERS.has(trimmed)) headerIndent = indent;
        continue;
      }

      entryIndent ??= indent;
      if (indent === entryIndent) {
        const match = ENTRY_PATTERN.exec(trimmed);
        if (match) {
          entries.open(match[1], match[2]);
        } else {
          entries.close();
        }
      } else if (indent > entryIndent) {
        entries.append(trimmed);
      } else {
        entries.close();
      }
    }
    return entries.result();
  }
}
