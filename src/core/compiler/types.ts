/**
 * Shapes produced by the tree compiler and consumed by the parse driver and
 * the result assembler.
 */
import type { Command, OutputConfiguration } from 'commander';
import type { Argument } from '../model/argument.js';
import type { Namespace } from '../model/namespace.js';
import type { Parser } from '../model/parser.js';

export interface CompiledField {
  name: string;
  argument: Argument;
  /** Dotted path of the value in the namespace tree */
  path: string;
  /** Key of the value in the flat result: `<level path>#<name>` */
  destination: string;
  placement: 'option' | 'positional';
  /** commander attribute name (options) */
  attribute?: string;
  /** Index into commander's processed arguments (positionals) */
  position?: number;
  /** Resolved `asManyAs` sibling */
  partner?: CompiledField;
}

export interface SequentialSlot {
  mode: 'sequential';
  name: string;
  level: CompiledLevel;
  optional: boolean;
}

export interface ParallelSlot {
  mode: 'parallel';
  name: string;
  branches: ReadonlyMap<string, CompiledLevel>;
  optional: boolean;
  destination: string;
}

export type CompiledSlot = SequentialSlot | ParallelSlot;

export interface CompiledLevel {
  /** Dotted path of the level ('' for the root) */
  path: string;
  parser: Parser;
  command: Command;
  fields: CompiledField[];
  /** Translucent parsers lifted into this level, innermost first */
  lifted: Parser[];
  slots: CompiledSlot[];
  /** Keyword token → index of the slot it opens */
  keywords: ReadonlyMap<string, number>;
  positionalCount: number;
  variadicPositional: boolean;
  /** Values of non-terminal actions triggered during the parse */
  actionResults: Map<string, unknown>;
}

export interface CompiledParser {
  root: CompiledLevel;
  /** Flat destination → dotted namespace path */
  pathIndex: ReadonlyMap<string, string>;
  /** All levels, pre-order */
  levels: CompiledLevel[];
}

export interface CompileOptions {
  /** Let unknown options and excess positionals through to produce hooks */
  allowUnknown?: boolean;
  /** Let excess positionals through; defaults to `allowUnknown` */
  allowExcess?: boolean;
  output?: OutputConfiguration;
}

/**
 * Values read back from commander, keyed by destination.
 */
export interface FlatResult {
  values: Map<string, unknown>;
  /** Paths of the levels whose tokens were parsed */
  traversed: Set<string>;
  /** Tokens a level did not consume, by level path */
  unknown: Map<string, string[]>;
}

export type ParseOutcome =
  | { kind: 'success'; namespace: Namespace; unknown: string[] }
  | { kind: 'usage-error'; message: string; code: string; exitCode: number }
  | { kind: 'action-taken'; action: string; result: unknown; exitCode: number };

/** commander error codes raised by the engine's own checks */
export const UsageCodes = {
  MISSING_COMMAND: 'declarg.missingCommand',
  COMMAND_ORDER: 'declarg.commandOrder',
  DUPLICATE_COMMAND: 'declarg.duplicateCommand',
  EXCLUSIVE_COMMANDS: 'declarg.exclusiveCommands',
  ARITY: 'declarg.arity',
  AS_MANY_AS: 'declarg.asManyAs',
  INVALID_INPUT: 'declarg.invalidInput',
  UNRECOGNIZED: 'declarg.unrecognizedArguments',
} as const;
