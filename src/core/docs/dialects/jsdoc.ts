import { EntryCollector, type DocumentationExtractor } from '../types.js';

// @param name text | @param {type} name - text | @param [name=default] text
const PARAM_PATTERN = /^@param\s+(?:\{[^}]*\}\s*)?\[?([A-Za-z_$][\w$.]*)(?:=[^\]]*)?\]?\s*(?:-\s*)?(.*)$/;
const DECORATION_PATTERN = /^\s*(?:\/\*\*|\*\/|\*(?!\/))?/;

/**
 * JSDoc `@param` tags. Accepts the raw comment or its text without the
 * comment decoration. `options.name` documents the member `name`.
 */
export class JsdocExtractor implements DocumentationExtractor {
  readonly dialect = 'jsdoc';

  extract(text: string): Map<string, string> {
    const entries = new EntryCollector();

    for (const line of text.split('\n')) {
      const trimmed = line.replace(DECORATION_PATTERN, '').replace(/\*\/\s*$/, '').trim();
      const match = PARAM_PATTERN.exec(trimmed);

      if (match) {
        const name = match[1].split('.').pop() ?? match[1];
        entries.open(name, match[2]);
      } else if (!trimmed || trimmed.startsWith('@')) {
        entries.close();
      } else {
        entries.append(trimmed);
      }
    }
    return entries.result();
  }
}
