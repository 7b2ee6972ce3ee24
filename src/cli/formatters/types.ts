import type { CallableSignature } from '../../core/deduction/types.js';
import type { FieldRow } from '../describe.js';

/**
 * Renders the fields deduced for a target.
 */
export interface IFieldFormatter {
  format(signature: CallableSignature, rows: FieldRow[]): string;
}
