import { EntryCollector, type DocumentationExtractor } from '../types.js';

// :param name: text | :param type name: text
const PARAM_PATTERN = /^:param\s+(?:\S+\s+)?([A-Za-z_$][\w$]*)\s*:(.*)$/;

/**
 * reStructuredText field lists. Any other field ends the current entry.
 */
export class RstExtractor implements DocumentationExtractor {
  readonly dialect = 'rst';

  extract(text: string): Map<string, string> {
    const entries = new EntryCollector();

    for (const line of text.split('\n')) {
      const trimmed = line.trim();
      const match = PARAM_PATTERN.exec(trimmed);

      if (match) {
        entries.open(match[1], match[2]);
      } else if (!trimmed || trimmed.startsWith(':')) {
        entries.close();
      } else {
        entries.append(trimmed);
      }
    }
    return entries.result();
  }
}
