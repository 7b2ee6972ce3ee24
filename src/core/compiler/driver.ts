/**
 * Parse driver: splits the token list between compiled levels, runs commander
 * on each level parent-first and turns the outcome into a ParseOutcome.
 */
import { CommanderError } from 'commander';
import { ActionSignal } from '../actions/action.js';
import { assemble } from '../assembler/assemble.js';
import type { Parser } from '../model/parser.js';
import { compile } from './compiler.js';
import {
  UsageCodes,
  type CompiledLevel,
  type CompiledParser,
  type FlatResult,
  type ParseOutcome,
} from './types.js';

export interface RunOptions {
  allowUnknown: boolean;
}

/** commander codes meaning help or version was printed */
const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

interface Segment {
  keyword: string;
  slot: number;
  tokens: string[];
}

interface Split {
  own: string[];
  segments: Segment[];
  problem?: { message: string; code: string };
}

export function runParse(parser: Parser, tokens: readonly string[], options: RunOptions): ParseOutcome {
  // Excess positionals always reach produce hooks; strict parsing rejects
  // whatever the hooks leave behind
  const compiled = compile(parser, {
    allowUnknown: options.allowUnknown,
    allowExcess: true,
    output: parser.output,
  });
  const flat: FlatResult = { values: new Map(), traversed: new Set(), unknown: new Map() };

  try {
    parseLevel(compiled.root, [...tokens], flat);
    const namespace = assemble(flat, compiled);
    if (!options.allowUnknown) rejectLeftovers(compiled, flat);
    return { kind: 'success', namespace, unknown: [...flat.unknown.values()].flat() };
  } catch (error) {
    return toOutcome(error);
  }
}

function rejectLeftovers(compiled: CompiledParser, flat: FlatResult): void {
  for (const level of compiled.levels) {
    const leftover = flat.unknown.get(level.path) ?? [];
    if (leftover.length === 0) continue;
    level.command.error(`error: unrecognized arguments: ${leftover.join(' ')}`, {
      code: UsageCodes.UNRECOGNIZED,
      exitCode: 1,
    });
  }
}

function toOutcome(error: unknown): ParseOutcome {
  if (error instanceof ActionSignal) {
    return { kind: 'action-taken', action: error.action, result: error.result, exitCode: error.exitCode };
  }
  if (error instanceof CommanderError) {
    if (HELP_CODES.has(error.code)) {
      return { kind: 'action-taken', action: 'help', result: null, exitCode: error.exitCode };
    }
    return { kind: 'usage-error', message: error.message, code: error.code, exitCode: error.exitCode };
  }
  throw error;
}

/**
 * Cut the level's tokens at its keywords. Tokens after `--` are never
 * treated as keywords.
 */
export function splitTokens(level: CompiledLevel, tokens: readonly string[]): Split {
  const split: Split = { own: [], segments: [] };
  let current: string[] = split.own;
  let literal = false;

  const report = (message: string, code: string): void => {
    split.problem ??= { message, code };
  };

  for (const token of tokens) {
    const slot = literal ? undefined : level.keywords.get(token);
    if (token === '--') literal = true;
    if (slot === undefined) {
      current.push(token);
      continue;
    }

    const previous = split.segments.at(-1);
    if (split.segments.some((segment) => segment.keyword === token)) {
      report(`error: command '${token}' given more than once`, UsageCodes.DUPLICATE_COMMAND);
    } else if (split.segments.some((segment) => segment.slot === slot)) {
      const other = split.segments.find((segment) => segment.slot === slot)?.keyword ?? '';
      report(`error: commands '${other}' and '${token}' cannot be used together`, UsageCodes.EXCLUSIVE_COMMANDS);
    } else if (previous && previous.slot > slot) {
      report(`error: command '${token}' must come before '${previous.keyword}'`, UsageCodes.COMMAND_ORDER);
    }

    const segment: Segment = { keyword: token, slot, tokens: [] };
    split.segments.push(segment);
    current = segment.tokens;
  }
  return split;
}

function parseLevel(level: CompiledLevel, tokens: string[], flat: FlatResult): void {
  const split = splitTokens(level, tokens);
  const { command } = level;

  command.parse(split.own, { from: 'user' });
  if (split.problem) {
    command.error(split.problem.message, { code: split.problem.code, exitCode: 1 });
  }

  flat.traversed.add(level.path);
  recordValues(level, flat);

  for (const segment of split.segments) {
    const slot = level.slots[segment.slot];
    if (!slot) continue;
    if (slot.mode === 'sequential') {
      parseLevel(slot.level, segment.tokens, flat);
      continue;
    }
    const branch = slot.branches.get(segment.keyword);
    if (!branch) continue;
    flat.values.set(slot.destination, segment.keyword);
    parseLevel(branch, segment.tokens, flat);
  }

  // after the children, so that help asked of a child wins
  level.slots.forEach((slot, index) => {
    if (slot.optional || split.segments.some((segment) => segment.slot === index)) return;
    const message = slot.mode === 'sequential'
      ? `error: missing required command '${slot.name}'`
      : `error: missing required command, one of: ${[...slot.branches.keys()].join(', ')}`;
    command.error(message, { code: UsageCodes.MISSING_COMMAND, exitCode: 1 });
  });
}

function recordValues(level: CompiledLevel, flat: FlatResult): void {
  const { command } = level;
  const options: Record<string, unknown> = command.opts();

  for (const field of level.fields) {
    const { argument } = field;
    let value: unknown;

    if (argument.kind === 'action') {
      value = level.actionResults.get(field.destination) ?? null;
    } else if (field.placement === 'option') {
      value = field.attribute === undefined ? undefined : options[field.attribute];
      if (argument.kind === 'flag') {
        value = value === true;
      } else if (argument.nargs === '*' && value === true) {
        // bare `--name` of a zero-or-more option
        value = [];
      }
    } else {
      value = field.position === undefined ? undefined : command.processedArgs[field.position];
    }
    flat.values.set(field.destination, value ?? null);
  }

  const leftover = command.args.slice(level.positionalCount);
  flat.unknown.set(level.path, level.variadicPositional ? [] : leftover);
}
