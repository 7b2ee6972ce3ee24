/**
 * Declarative description of one expected value: a named option
 * (`--name`) or a positional.
 */
import { ConstructionError, ErrorCodes } from '../../utils/errors.js';
import type { TypeRule } from '../value-types/rules.js';
import type { Namespace } from './namespace.js';

/**
 * How many tokens a field takes: exactly one, zero or one, zero or more,
 * one or more, or a fixed count.
 */
export type Arity = 1 | '?' | '*' | '+' | number;

export type ArgumentKind = 'value' | 'flag' | 'action';

export type ActionCallback = (namespace: Namespace) => unknown;

export interface ActionSpec {
  callback: ActionCallback;
  /** Stop parsing once the callback has run */
  exitImmediately: boolean;
}

export interface ArgumentOptions<T = unknown> {
  /** Overrides the child key as the field name */
  name?: string;
  /** Coercion applied to each raw token */
  type?: TypeRule<T>;
  nargs?: Arity;
  default?: unknown;
  /** Allowed values, compared against the coerced value */
  choices?: readonly unknown[];
  help?: string;
  /** true (default) for an option `--name`, false for a positional */
  optional?: boolean;
  /** Options only: the option itself must be given */
  required?: boolean;
  /** One-letter alias, options only */
  short?: string;
  /** Sibling whose value count this field's value count must match */
  asManyAs?: Argument | string;
  /** Value-less toggle: true when given, false otherwise */
  flag?: boolean;
  /** Terminal action; set through `action()` */
  action?: ActionSpec;
}

/**
 * Summary of a field for listings (`declarg inspect`).
 */
export interface ArgumentDescription {
  kind: ArgumentKind;
  placement: 'option' | 'positional';
  type: string;
  nargs: Arity;
  default: unknown;
  required: boolean;
  choices: readonly unknown[] | null;
  help: string;
}

export class Argument<T = unknown> {
  readonly node = 'argument';
  readonly name: string | undefined;
  readonly type: TypeRule<T> | undefined;
  readonly nargs: Arity;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly choices: readonly unknown[] | undefined;
  readonly help: string;
  readonly optional: boolean;
  readonly mandatory: boolean;
  readonly short: string | undefined;
  readonly asManyAs: Argument | string | undefined;
  readonly kind: ArgumentKind;
  readonly action: ActionSpec | undefined;

  constructor(options: ArgumentOptions<T> = {}) {
    this.name = options.name;
    this.type = options.type;
    this.nargs = options.nargs ?? 1;
    this.hasDefault = options.default !== undefined;
    this.defaultValue = options.default;
    this.choices = options.choices;
    this.help = options.help ?? '';
    this.optional = options.optional ?? true;
    this.mandatory = options.required ?? false;
    this.short = options.short;
    this.asManyAs = options.asManyAs;
    this.action = options.action;
    this.kind = options.action ? 'action' : options.flag ? 'flag' : 'value';

    this.check(options);
  }

  private check(options: ArgumentOptions<T>): void {
    const label = this.name ? `"${this.name}"` : 'an argument';
    const fail = (message: string): never => {
      throw new ConstructionError(ErrorCodes.INVALID_ARGUMENT, message, { name: this.name });
    };

    if (this.short !== undefined) {
      if (!this.optional) {
        fail(`Keyword argument \`short=${this.short}\` is useless for the positional argument ${label}.`);
      }
      if (this.short.length !== 1) {
        fail(`Short name of ${label} must be a single character, got '${this.short}'.`);
      }
    }
    if (typeof this.nargs === 'number' && (!Number.isInteger(this.nargs) || this.nargs < 1)) {
      fail(`nargs of ${label} must be a positive integer, '?', '*' or '+', got ${this.nargs}.`);
    }
    if (this.kind !== 'value') {
      if (!this.optional) {
        fail(`${label} is a ${this.kind} and cannot be positional.`);
      }
      if (options.type || options.choices || options.nargs !== undefined || this.asManyAs) {
        fail(`${label} is a ${this.kind} and takes no value: type, choices, nargs and asManyAs do not apply.`);
      }
    }
    if (this.mandatory && !this.optional) {
      fail(`required applies to options only; the positional ${label} is required when it has no default.`);
    }
  }

  /** Takes a list of values rather than a single one */
  get variadic(): boolean {
    return this.nargs === '*' || this.nargs === '+' || (typeof this.nargs === 'number' && this.nargs > 1);
  }

  /** A positional with no default that needs at least one token */
  get required(): boolean {
    if (this.optional) return this.mandatory;
    return !this.hasDefault && this.nargs !== '?' && this.nargs !== '*';
  }

  describe(): ArgumentDescription {
    return {
      kind: this.kind,
      placement: this.optional ? 'option' : 'positional',
      type: this.kind === 'value' ? this.type?.name || 'str' : this.kind,
      nargs: this.nargs,
      default: this.hasDefault ? this.defaultValue : null,
      required: this.required,
      choices: this.choices ?? null,
      help: this.help,
    };
  }
}
