/**
 * Built-in type rules: functions turning one raw token into a value.
 *
 * Rules are plain named functions so that `oneOf` and error messages can
 * refer to them by name.
 */
import { TypeCoercionError } from '../../utils/errors.js';

/** Coercion applied to a single raw command-line token. */
export type TypeRule<T = unknown> = (raw: string) => T;

const INTEGER = /^[+-]?\d+$/;

export function str(raw: string): string {
  return raw;
}

export function int(raw: string): number {
  if (!INTEGER.test(raw.trim())) {
    throw new TypeCoercionError(`invalid int value: '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}

export function float(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new TypeCoercionError(`invalid float value: '${raw}'`);
  }
  return value;
}

export function bigInt(raw: string): bigint {
  if (!INTEGER.test(raw.trim())) {
    throw new TypeCoercionError(`invalid bigint value: '${raw}'`);
  }
  return BigInt(raw.trim());
}

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

export function bool(raw: string): boolean {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new TypeCoercionError(`invalid bool value: '${raw}'`);
}

/**
 * Integer that is zero or more. Negative indices are ambiguous on a
 * command line, so selectors reject them.
 */
export function positiveInt(raw: string): number {
  const value = int(raw);
  if (value < 0) {
    throw new TypeCoercionError('Indices need to be positive integers');
  }
  return value;
}

/**
 * Build a rule that tries each rule in order and returns the first success.
 * Rules of different value types need the union spelled out:
 * `oneOf<number | string>(int, str)`.
 */
export function oneOf<T>(...rules: Array<TypeRule<T>>): TypeRule<T> {
  const names = rules.map((rule) => rule.name || 'anonymous').join(', ');

  function oneOfTypes(raw: string): T {
    const failures: string[] = [];
    for (const rule of rules) {
      try {
        return rule(raw);
      } catch (error) {
        failures.push(`${rule.name || 'anonymous'}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    throw new TypeCoercionError(
      `Argument ${raw} does not match any of allowed types: ${names}.\n` +
        `Following errors have been raised:${failures.map((f) => `\n\t${f}`).join('')}`,
      { failures }
    );
  }

  return oneOfTypes;
}

/**
 * Check that a list has exactly `n` items.
 */
export function nTuple<T>(n: number): (items: readonly T[]) => T[] {
  return function nTuple(items: readonly T[]): T[] {
    if (items.length !== n) {
      throw new TypeCoercionError(
        `${n}-tuple requires exactly ${n} items (${items.length} received).`
      );
    }
    return [...items];
  };
}

/**
 * Delimiter separated values: `dsv(int)('1,2,3')` gives `[1, 2, 3]`.
 */
export function dsv<T>(rule: TypeRule<T>, delimiter = ','): TypeRule<T[]> {
  return function dsvValues(raw: string): T[] {
    return raw.split(delimiter).map((part) => rule(part));
  };
}
