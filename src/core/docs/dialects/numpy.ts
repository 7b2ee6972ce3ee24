import { EntryCollector, measureIndent, type DocumentationExtractor } from '../types.js';

const UNDERLINE_PATTERN = /^-{3,}$/;
// name | name : type
const ENTRY_PATTERN = /^([A-Za-z_$][\w$]*)(?:\s*:.*)?$/;

/**
 * NumPy style: a `Parameters` header underlined with dashes, names at the
 * header's indent and descriptions below them.
 */
export class NumpyExtractor implements DocumentationExtractor {
  readonly dialect = 'numpy';

  extract(text: string): Map<string, string> {
    const entries = new EntryCollector();
    const lines = text.split('\n');
    let headerIndent: number | undefined;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const trimmed = line.trim();

      if (headerIndent === undefined) {
        const next = lines[i + 1];
        if (trimmed === 'Parameters' && next !== undefined && UNDERLINE_PATTERN.test(next.trim())) {
          headerIndent = measureIndent(line);
          i++;
        }
        continue;
      }

      const indent = measureIndent(line);
      if (!trimmed || indent < headerIndent) {
        entries.close();
        headerIndent = undefined;
        continue;
      }

      if (indent === headerIndent) {
        const match = ENTRY_PATTERN.exec(trimmed);
        if (match) {
          entries.open(match[1], '');
        } else {
          entries.close();
        }
      } else {
        entries.append(trimmed);
      }
    }
    return entries.result();
  }
}
