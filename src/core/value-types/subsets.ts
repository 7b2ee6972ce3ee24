/**
 * Subset selectors: type rules whose value picks items out of a list later,
 * typically inside a produce hook once the list is known.
 *
 *   --columns 0,2      → indices
 *   --rows 10:-1       → slice (start:stop[:step], negatives count from the end)
 *   --rows 10-20       → range (start-stop, no negatives)
 */
import { TypeCoercionError } from '../../utils/errors.js';
import { int, positiveInt } from './rules.js';

export interface Subset {
  get<T>(items: readonly T[]): T[];
}

/**
 * A set of item positions. Each position is used once, in list order.
 */
export class Indices implements Subset {
  constructor(readonly positions: ReadonlySet<number>) {}

  get<T>(items: readonly T[]): T[] {
    return items.filter((_, i) => this.positions.has(i));
  }
}

/**
 * List slice with the usual start/stop/step semantics; `null` bounds mean
 * "from the edge".
 */
export class Slice implements Subset {
  constructor(
    readonly start: number | null,
    readonly stop: number | null,
    readonly step: number | null = null
  ) {
    if (step === 0) {
      throw new TypeCoercionError('slice step cannot be zero');
    }
  }

  get<T>(items: readonly T[]): T[] {
    const length = items.length;
    const step = this.step ?? 1;
    const picked: T[] = [];

    if (step > 0) {
      const from = clamp(this.start, length, 0, 0, length);
      const to = clamp(this.stop, length, length, 0, length);
      for (let i = from; i < to; i += step) picked.push(items[i]);
    } else {
      const from = clamp(this.start, length, length - 1, -1, length - 1);
      const to = clamp(this.stop, length, -1, -1, length - 1);
      for (let i = from; i > to; i += step) picked.push(items[i]);
    }
    return picked;
  }
}

/**
 * Simplified slice with '-' as separator: start and stop only.
 */
export class Range extends Slice {
  constructor(start: number, stop: number) {
    super(start, stop);
  }
}

function clamp(
  bound: number | null,
  length: number,
  fallback: number,
  low: number,
  high: number
): number {
  if (bound === null) return fallback;
  const absolute = bound < 0 ? bound + length : bound;
  return Math.min(Math.max(absolute, low), high);
}

function requireSeparator(raw: string, separator: string, name: string): void {
  if (!raw.includes(separator)) {
    throw new TypeCoercionError(
      `Given string ${raw} does not look like a ${name} (no ${separator}, which is required)`
    );
  }
}

export function indices(raw: string): Indices {
  return new Indices(new Set(raw.split(',').map((part) => positiveInt(part))));
}

export function slice(raw: string): Slice {
  requireSeparator(raw, ':', 'Slice');
  const parts = raw.split(':');
  if (parts.length > 3) {
    throw new TypeCoercionError(`3-tuple requires at most 3 items (${parts.length} received).`);
  }
  const [start, stop, step] = parts.map((part) => (part === '' ? null : int(part)));
  return new Slice(start, stop, step ?? null);
}

export function range(raw: string): Range {
  requireSeparator(raw, '-', 'Range');
  const parts = raw.split('-');
  // '1-3-5' or '1--3' are ambiguous, possibly typos
  if (parts.length !== 2 || parts.some((part) => part === '')) {
    throw new TypeCoercionError(`2-tuple requires exactly 2 items (${parts.length} received).`);
  }
  return new Range(positiveInt(parts[0]), positiveInt(parts[1]));
}
