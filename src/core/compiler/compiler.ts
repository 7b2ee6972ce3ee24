/**
 * Tree compiler: walks a parser tree depth-first in declaration order and
 * builds one commander Command per level.
 *
 * Fields become commander options or arguments; nested parsers and parallel
 * branches become compiled levels the driver runs on their own token
 * segments. Child commands are linked to their parent for help rendering
 * only: a level's command has no registered sub-commands, so commander never
 * dispatches a token on its own. `pathIndex` maps each flat destination back
 * to its dotted namespace path.
 */
import {
  Argument as CommanderArgument,
  Command,
  InvalidArgumentError,
  Option,
} from 'commander';
import { ConstructionError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { attachAction } from '../actions/action.js';
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import type { Argument } from '../model/argument.js';
import { createNamespace, joinPath, type Namespace } from '../model/namespace.js';
import type { Parser, ParserChild } from '../model/parser.js';
import { str } from '../value-types/rules.js';
import type {
  CompiledField,
  CompiledLevel,
  CompiledParser,
  CompiledSlot,
  CompileOptions,
} from './types.js';

const log = logger.child('compiler');

/** Taken by commander's built-in help option */
const RESERVED_NAMES = new Set(['help']);
const RESERVED_SHORTS = new Set(['h']);

interface CompileContext {
  options: CompileOptions;
  pathIndex: Map<string, string>;
  levels: CompiledLevel[];
  /** Keyword → path of the level that owns it, across the whole tree */
  keywords: Map<string, string>;
  ancestors: Set<Parser>;
}

interface Member {
  name: string;
  child: ParserChild;
}

export function compile(parser: Parser, options: CompileOptions = {}): CompiledParser {
  const context: CompileContext = {
    options,
    pathIndex: new Map(),
    levels: [],
    keywords: new Map(),
    ancestors: new Set(),
  };
  const root = compileLevel(
    parser,
    '',
    parser.name ?? 'program',
    parser.config ?? getDefaultConfig(),
    context
  );
  return { root, pathIndex: context.pathIndex, levels: context.levels };
}

function compileLevel(
  parser: Parser,
  path: string,
  name: string,
  inherited: Config,
  context: CompileContext
): CompiledLevel {
  if (context.ancestors.has(parser)) {
    throw new ConstructionError(
      ErrorCodes.CYCLIC_TREE,
      `Parser '${path || name}' contains itself`,
      { path }
    );
  }
  context.ancestors.add(parser);

  const config = parser.config ?? inherited;
  const output = parser.output ?? context.options.output;
  const subcommands: Command[] = [];
  const command = createCommand(parser, name, config, subcommands, context.options);
  if (output) command.configureOutput(output);

  const lifted: Parser[] = [];
  const members = collectMembers(parser, path, lifted, context);

  const level: CompiledLevel = {
    path,
    parser,
    command,
    fields: [],
    lifted,
    slots: [],
    keywords: new Map(),
    positionalCount: 0,
    variadicPositional: false,
    actionResults: new Map(),
  };
  context.levels.push(level);

  const keywords = new Map<string, number>();
  for (const member of members) {
    const { child } = member;
    if (child.node === 'argument') {
      level.fields.push(registerField(level, member.name, child, context));
    } else if (child.node === 'parser') {
      claimKeyword(member.name, path, context);
      keywords.set(member.name, level.slots.length);
      const childLevel = compileLevel(child, joinPath(path, member.name), member.name, config, context);
      adoptCommand(command, childLevel.command, subcommands);
      level.slots.push({
        mode: 'sequential',
        name: member.name,
        level: childLevel,
        optional: child.optional,
      });
    } else {
      const destination = `${path}#${member.name}`;
      context.pathIndex.set(destination, joinPath(path, member.name));
      const branches = new Map<string, CompiledLevel>();
      for (const [branchName, branch] of child.branches) {
        claimKeyword(branchName, path, context);
        keywords.set(branchName, level.slots.length);
        const branchLevel = compileLevel(branch, joinPath(path, branchName), branchName, config, context);
        adoptCommand(command, branchLevel.command, subcommands);
        branches.set(branchName, branchLevel);
      }
      level.slots.push({
        mode: 'parallel',
        name: member.name,
        branches,
        optional: child.optional,
        destination,
      });
    }
  }
  level.keywords = keywords;
  if (subcommands.length > 0) command.usage(usageWithCommands(command));

  resolvePartners(level);
  context.ancestors.delete(parser);

  log.debug(`compiled level '${path || name}'`, {
    fields: level.fields.map((f) => f.name),
    slots: level.slots.map((s: CompiledSlot) => s.name),
  });
  return level;
}

function createCommand(
  parser: Parser,
  name: string,
  config: Config,
  subcommands: readonly Command[],
  options: CompileOptions
): Command {
  const allowUnknown = options.allowUnknown ?? false;
  const command = new Command(name)
    .exitOverride()
    .helpCommand(false)
    .allowUnknownOption(allowUnknown)
    .allowExcessArguments(options.allowExcess ?? allowUnknown)
    .showHelpAfterError(config.help.show_help_after_error)
    .configureHelp({
      sortOptions: config.help.sort_options,
      sortSubcommands: config.help.sort_subcommands,
      showGlobalOptions: config.help.show_global_options,
      visibleCommands: () => config.help.sort_subcommands
        ? [...subcommands].sort((a, b) => a.name().localeCompare(b.name()))
        : [...subcommands],
      ...(config.help.width !== undefined ? { helpWidth: config.help.width } : {}),
    })
    // Without an action handler commander would treat the level as a
    // dispatcher and refuse to run it without a sub-command
    .action(() => undefined);

  if (parser.description) command.description(parser.description);
  if (parser.help) command.summary(parser.help);
  if (parser.epilog) command.addHelpText('after', `\n${parser.epilog}`);
  return command;
}

/**
 * Link a child level's command to its parent without registering it, so the
 * child's usage line carries the parent's name.
 */
function adoptCommand(parent: Command, child: Command, subcommands: Command[]): void {
  child.parent = parent;
  subcommands.push(child);
}

/** commander's own usage line, plus the `[command]` marker */
function usageWithCommands(command: Command): string {
  const operands = command.registeredArguments.map((argument) => {
    const name = argument.variadic ? `${argument.name()}...` : argument.name();
    return argument.required ? `<${name}>` : `[${name}]`;
  });
  return ['[options]', '[command]', ...operands].join(' ');
}

/**
 * Flatten translucent children into the level and check name uniqueness.
 */
function collectMembers(
  parser: Parser,
  path: string,
  lifted: Parser[],
  context: CompileContext
): Member[] {
  const members: Member[] = [];
  const seen = new Set<string>();

  const add = (name: string, child: ParserChild): void => {
    if (seen.has(name)) {
      throw new ConstructionError(
        ErrorCodes.DUPLICATE_NAME,
        `Name '${name}' is used twice in '${path || parser.name || 'program'}'`,
        { name, path }
      );
    }
    seen.add(name);
    members.push({ name, child });
  };

  const visit = (current: Parser): void => {
    for (const [name, child] of current.children) {
      if (child.node === 'parser' && child.translucent) {
        if (context.ancestors.has(child)) {
          throw new ConstructionError(ErrorCodes.CYCLIC_TREE, `Parser '${name}' contains itself`, { path });
        }
        visit(child);
        lifted.push(child);
        continue;
      }
      add(name, child);
      if (child.node === 'parallel') {
        for (const branchName of child.branches.keys()) add(branchName, child);
      }
    }
  };
  visit(parser);

  // Branch names were only added to reserve them
  return members.filter((member) =>
    member.child.node !== 'parallel' || !member.child.branches.has(member.name)
  );
}

function claimKeyword(keyword: string, path: string, context: CompileContext): void {
  const owner = context.keywords.get(keyword);
  if (owner !== undefined) {
    throw new ConstructionError(
      ErrorCodes.DUPLICATE_KEYWORD,
      `Command name '${keyword}' is used at both '${owner || '<root>'}' and '${path || '<root>'}'`,
      { keyword }
    );
  }
  context.keywords.set(keyword, path);
}

function registerField(
  level: CompiledLevel,
  name: string,
  argument: Argument,
  context: CompileContext
): CompiledField {
  if (RESERVED_NAMES.has(name)) {
    throw new ConstructionError(ErrorCodes.RESERVED_NAME, `'${name}' cannot be used as a name of argument`, { name });
  }
  if (argument.short !== undefined && RESERVED_SHORTS.has(argument.short)) {
    throw new ConstructionError(ErrorCodes.RESERVED_NAME, `'-${argument.short}' is reserved for help`, { name });
  }

  const field: CompiledField = {
    name,
    argument,
    path: joinPath(level.path, name),
    destination: `${level.path}#${name}`,
    placement: argument.optional ? 'option' : 'positional',
  };
  context.pathIndex.set(field.destination, field.path);

  if (argument.optional) {
    registerOption(level, field);
  } else {
    registerPositional(level, field);
  }
  return field;
}

function registerOption(level: CompiledLevel, field: CompiledField): void {
  const { argument, name } = field;
  const names = argument.short ? `-${argument.short}, --${name}` : `--${name}`;
  const flags = argument.kind === 'value' ? `${names} ${valuePlaceholder(argument, name)}` : names;

  const option = new Option(flags, argument.help);
  if (argument.kind === 'value') {
    option.argParser(createValueParser(argument));
    if (argument.hasDefault) option.default(argument.defaultValue);
    if (argument.choices) option.argChoices = argument.choices.map(String);
  }
  if (argument.mandatory) option.makeOptionMandatory();

  // dry-run and dryRun would share commander's attribute
  const attribute = option.attributeName();
  const clash = level.fields.find((other) => other.attribute === attribute);
  if (clash) {
    throw new ConstructionError(
      ErrorCodes.DUPLICATE_NAME,
      `Options '${clash.name}' and '${name}' are both stored as '${attribute}'`,
      { name, path: level.path }
    );
  }
  const shortClash = argument.short === undefined
    ? undefined
    : level.fields.find((other) => other.placement === 'option' && other.argument.short === argument.short);
  if (shortClash) {
    throw new ConstructionError(
      ErrorCodes.DUPLICATE_NAME,
      `Options '${shortClash.name}' and '${name}' both use '-${argument.short}'`,
      { name, path: level.path }
    );
  }

  try {
    level.command.addOption(option);
  } catch (error) {
    // commander refuses flags already taken, e.g. a repeated short flag
    if (error instanceof Error && error.message.includes('conflicting flag')) {
      throw new ConstructionError(ErrorCodes.DUPLICATE_NAME, error.message, { name, path: level.path });
    }
    throw error;
  }
  field.attribute = attribute;

  if (argument.kind === 'action') {
    attachAction(
      level.command,
      option,
      field,
      () => snapshotOptions(level),
      (result) => level.actionResults.set(field.destination, result)
    );
  }
}

function registerPositional(level: CompiledLevel, field: CompiledField): void {
  const { argument, name } = field;
  if (level.variadicPositional) {
    throw new ConstructionError(
      ErrorCodes.VARIADIC_NOT_LAST,
      `Positional '${name}' follows a variadic positional; only the last positional may take several values`,
      { name, path: level.path }
    );
  }

  const token = argument.variadic ? `${name}...` : name;
  const positional = new CommanderArgument(argument.required ? `<${token}>` : `[${token}]`, argument.help);
  positional.argParser(createValueParser(argument));
  if (argument.hasDefault) positional.default(argument.defaultValue);
  if (argument.choices) positional.argChoices = argument.choices.map(String);

  level.command.addArgument(positional);
  field.position = level.positionalCount;
  level.positionalCount += 1;
  level.variadicPositional = argument.variadic;
}

function valuePlaceholder(argument: Argument, name: string): string {
  switch (argument.nargs) {
    case 1:
      return `<${name}>`;
    case '?':
      return `[${name}]`;
    case '*':
      return `[${name}...]`;
    default:
      return `<${name}...>`;
  }
}

/**
 * Coercion handed to commander. Rule failures become InvalidArgumentError so
 * commander reports them as bad input; variadic values accumulate, starting
 * over from the default.
 */
function createValueParser(argument: Argument): (raw: string, previous: unknown) => unknown {
  const rule = argument.type ?? str;

  const coerce = (raw: string): unknown => {
    let value: unknown;
    try {
      value = rule(raw);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
    if (argument.choices && !argument.choices.includes(value)) {
      throw new InvalidArgumentError(`Allowed choices are ${argument.choices.map(String).join(', ')}.`);
    }
    return value;
  };

  if (!argument.variadic && argument.nargs !== '*') {
    return (raw) => coerce(raw);
  }
  return (raw, previous) =>
    previous === argument.defaultValue || !Array.isArray(previous)
      ? [coerce(raw)]
      : [...previous, coerce(raw)];
}

/**
 * Options of a level parsed so far, as handed to terminal actions.
 */
function snapshotOptions(level: CompiledLevel): Namespace {
  const values: Record<string, unknown> = level.command.opts();
  const namespace = createNamespace();
  for (const field of level.fields) {
    if (field.placement === 'positional' || field.attribute === undefined) {
      namespace[field.name] = null;
      continue;
    }
    const value = values[field.attribute];
    namespace[field.name] = field.argument.kind === 'flag' ? value === true : value ?? null;
  }
  return namespace;
}

/**
 * Link `asManyAs` fields to their siblings; unknown targets and cycles are
 * construction errors.
 */
function resolvePartners(level: CompiledLevel): void {
  const byName = new Map(level.fields.map((field) => [field.name, field]));

  for (const field of level.fields) {
    const target = field.argument.asManyAs;
    if (target === undefined) continue;

    const partner = typeof target === 'string'
      ? byName.get(target)
      : level.fields.find((candidate) => candidate.argument === target);
    if (!partner || partner === field) {
      throw new ConstructionError(
        ErrorCodes.UNKNOWN_AS_MANY_AS,
        `'${field.name}' must be as many as an unknown sibling${typeof target === 'string' ? ` '${target}'` : ''}`,
        { name: field.name, path: level.path }
      );
    }
    field.partner = partner;
  }

  for (const field of level.fields) {
    const visited = new Set<CompiledField>([field]);
    let current = field.partner;
    while (current) {
      if (visited.has(current)) {
        throw new ConstructionError(
          ErrorCodes.CYCLIC_AS_MANY_AS,
          `asManyAs references form a cycle through '${field.name}'`,
          { name: field.name, path: level.path }
        );
      }
      visited.add(current);
      current = current.partner;
    }
  }
}
