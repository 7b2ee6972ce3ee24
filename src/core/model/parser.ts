/**
 * Declarative group of fields, nested parsers and parallel sets.
 *
 * Example:
 *
 *   const greetings = new Parser({
 *     description: 'Greets people',
 *     children: {
 *       name: new Argument({ optional: false, help: 'Whom to greet' }),
 *       count: new Argument({ type: int, default: 1, short: 'c' }),
 *     },
 *     produce: (ns) => ({ ...ns, greeting: `Hello ${ns.name}!` }),
 *   });
 *
 *   const ns = greetings.parseArgs(['joe', '-c', '2']);
 *
 * Parsers are read-only templates: every parse compiles fresh commander
 * objects, so one parser may be parsed repeatedly or placed under several
 * parents.
 */
import type { OutputConfiguration } from 'commander';
import { ActionExit, ConstructionError, ErrorCodes, UsageError } from '../../utils/errors.js';
import { mergeConfig, getDefaultConfig } from '../config/loader.js';
import type { Config, ConfigInput } from '../config/schema.js';
import { compile } from '../compiler/compiler.js';
import { runParse } from '../compiler/driver.js';
import type { CompiledParser, CompileOptions, ParseOutcome } from '../compiler/types.js';
import type { Argument } from './argument.js';
import type { Namespace } from './namespace.js';
import type { ParallelSet } from './parallel.js';

export type ParserChild = Argument | Parser | ParallelSet;

/** Ordered: declaration order is the order positional tokens are expected in. */
export type ParserChildren = Record<string, ParserChild>;

/**
 * Post-parse transformation of a level's namespace. `unknown` holds the
 * tokens the level did not consume; remove the ones the hook uses.
 */
export type ProduceHook = (namespace: Namespace, unknown: string[]) => Namespace;

export interface ParserOptions {
  /** Program name of a root parser; children are named by their key */
  name?: string;
  description?: string;
  epilog?: string;
  /** One-line summary shown on the parent's help */
  help?: string;
  children?: ParserChildren;
  /** As a child: the parser may be left out of the command line */
  optional?: boolean;
  /** As a child: fields are lifted into the parent, without a keyword */
  translucent?: boolean;
  produce?: ProduceHook;
  config?: ConfigInput;
  /** Where commander writes help and errors for this parser's subtree */
  output?: OutputConfiguration;
}

export class Parser {
  readonly node = 'parser';
  readonly children: ReadonlyMap<string, ParserChild>;
  readonly optional: boolean;
  readonly translucent: boolean;
  /** Own configuration; children without one use their parent's */
  readonly config: Config | undefined;
  readonly output: OutputConfiguration | undefined;

  constructor(protected readonly options: ParserOptions = {}) {
    this.children = bindChildren(options.children ?? {});
    this.optional = options.optional ?? false;
    this.translucent = options.translucent ?? false;
    this.config = options.config ? mergeConfig(options.config) : undefined;
    this.output = options.output;
  }

  get name(): string | undefined {
    return this.options.name;
  }

  /**
   * Longer description, shown when help is narrowed down to this parser.
   */
  get description(): string {
    return this.options.description ?? '';
  }

  /** Text appended after the help message */
  get epilog(): string {
    return this.options.epilog ?? '';
  }

  /**
   * Short summary shown on the parent's help screen.
   */
  get help(): string {
    if (this.options.help !== undefined) return this.options.help;
    const names = [...this.children.keys()];
    return names.length > 0 ? `Accepts: ${names.join(', ')}` : '';
  }

  /**
   * Post-process the assembled namespace. Override in a subclass, or pass
   * `produce` in the options.
   */
  produce(namespace: Namespace, unknown: string[]): Namespace {
    return this.options.produce ? this.options.produce(namespace, unknown) : namespace;
  }

  compile(options: CompileOptions = {}): CompiledParser {
    return compile(this, options);
  }

  /**
   * Parse tokens into a tagged outcome. Never exits the process. Tokens that
   * neither a level nor a produce hook consumed are a usage error.
   */
  parse(tokens: readonly string[]): ParseOutcome {
    return runParse(this, tokens, { allowUnknown: false });
  }

  /**
   * Like `parse`, but unknown options and excess positionals are handed to
   * produce hooks and returned in the outcome instead of failing.
   */
  parseKnownArgs(tokens: readonly string[]): ParseOutcome {
    return runParse(this, tokens, { allowUnknown: true });
  }

  /**
   * Parse tokens (default: the process arguments) and return the namespace.
   *
   * Usage errors, help and terminal actions exit the process with their
   * status, unless `exit_on_error` is off: then they throw UsageError or
   * ActionExit.
   */
  parseArgs(tokens: readonly string[] = process.argv.slice(2)): Namespace {
    const outcome = this.parse(tokens);
    const exitOnError = (this.config ?? getDefaultConfig()).exit_on_error;

    switch (outcome.kind) {
      case 'success':
        return outcome.namespace;
      case 'usage-error':
        if (exitOnError) process.exit(outcome.exitCode);
        throw new UsageError(outcome.message, outcome.exitCode, { code: outcome.code });
      case 'action-taken':
        if (exitOnError) process.exit(outcome.exitCode);
        throw new ActionExit(outcome.action, outcome.result, outcome.exitCode);
    }
  }
}

function bindChildren(children: ParserChildren): Map<string, ParserChild> {
  const bound = new Map<string, ParserChild>();
  for (const [key, child] of Object.entries(children)) {
    const name = child.node === 'argument' && child.name ? child.name : key;
    if (bound.has(name)) {
      throw new ConstructionError(
        ErrorCodes.DUPLICATE_NAME,
        `Duplicate child name '${name}'`,
        { name }
      );
    }
    bound.set(name, child);
  }
  return bound;
}
