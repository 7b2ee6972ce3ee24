import type { CallableSignature } from '../../core/deduction/types.js';
import type { FieldRow } from '../describe.js';
import type { IFieldFormatter } from './types.js';

/**
 * JSON.stringify that writes bigints as strings.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item), 2);
}

export class JsonFormatter implements IFieldFormatter {
  format(signature: CallableSignature, rows: FieldRow[]): string {
    return toJson({
      name: signature.name,
      kind: signature.kind,
      summary: signature.summary ?? null,
      fields: rows,
    });
  }
}
