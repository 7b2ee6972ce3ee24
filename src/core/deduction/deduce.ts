/**
 * Signature deduction: synthesizes fields from a callable's parameters and
 * documentation, merged with explicitly declared children.
 */
import { ConstructionError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { extract } from '../docs/extract.js';
import { Argument } from '../model/argument.js';
import { Parser, type ParserChild, type ParserChildren, type ParserOptions } from '../model/parser.js';
import { bool } from '../value-types/rules.js';
import {
  deduceFromAnnotation,
  deduceFromDefault,
  type DeducedType,
  type TypeRegistry,
} from './type-deduction.js';
import type { CallableSignature, ParameterSignature } from './types.js';

const log = logger.child('deduction');

export interface DeduceOptions extends Omit<ParserOptions, 'children'> {
  /** Declared children; a child named like a parameter replaces its deduced field */
  children?: ParserChildren;
  /** Documentation dialect; defaults to the configured one */
  dialect?: string;
  /** Annotation names mapped to the rules that parse them */
  types?: TypeRegistry;
}

export function deduce(signature: CallableSignature, options: DeduceOptions = {}): Parser {
  return new Parser(deduceParserOptions(signature, options));
}

/**
 * Parser options for a signature: deduced children, and the documentation
 * summary as description unless one is given.
 */
export function deduceParserOptions(signature: CallableSignature, options: DeduceOptions = {}): ParserOptions {
  const { dialect, types, children, ...parserOptions } = options;
  return {
    ...parserOptions,
    name: parserOptions.name ?? signature.name,
    description: parserOptions.description ?? signature.summary,
    children: deduceChildren(signature, { children, dialect, types, config: options.config }),
  };
}

export function deduceChildren(
  signature: CallableSignature,
  options: Pick<DeduceOptions, 'children' | 'dialect' | 'types' | 'config'> = {}
): ParserChildren {
  const explicit = options.children ?? {};
  const dialect = options.dialect ?? options.config?.docstring_dialect;
  const help = extract(signature.documentation, dialect);
  const deduced: Record<string, ParserChild> = {};

  const add = (parameter: ParameterSignature, positional: boolean, member: boolean): void => {
    if (parameter.name === 'help') {
      throw new ConstructionError(ErrorCodes.RESERVED_NAME, '"help" cannot be used as a name of argument', {
        parameter: parameter.name,
      });
    }
    const declared = Object.hasOwn(explicit, parameter.name) ? explicit[parameter.name] : undefined;
    deduced[parameter.name] = declared ?? synthesize(parameter, {
      positional,
      member,
      help: help.get(parameter.name) ?? '',
      types: options.types ?? {},
    });
  };

  for (const parameter of signature.parameters) {
    if (parameter.rest || parameter.ignored) {
      log.debug(`${signature.name}: parameter '${parameter.name}' is not exposed`);
      continue;
    }
    if (parameter.members) {
      for (const member of parameter.members) add(member, false, true);
      continue;
    }
    add(parameter, !parameter.optional, false);
  }

  for (const [name, child] of Object.entries(explicit)) {
    if (!Object.hasOwn(deduced, name)) deduced[name] = child;
  }
  return deduced;
}

interface SynthesisContext {
  positional: boolean;
  member: boolean;
  help: string;
  types: TypeRegistry;
}

function synthesize(parameter: ParameterSignature, context: SynthesisContext): Argument {
  const { name } = parameter;
  if (context.member && parameter.type === undefined && !parameter.hasDefault) {
    throw new ConstructionError(
      ErrorCodes.UNTYPED_KEYWORD_PARAMETER,
      `Option '${name}' has neither a type annotation nor a default`,
      { parameter: name }
    );
  }

  let shape: DeducedType = parameter.type !== undefined
    ? deduceFromAnnotation(parameter.type, context.types)
    : deduceFromDefault(parameter.default);
  if (shape.kind === 'untyped' && parameter.type !== undefined) {
    log.debug(`parameter '${name}': '${parameter.type}' has no rule; accepting strings`);
    // the default may still tell more than the annotation
    shape = deduceFromDefault(parameter.default);
  }

  const defaultValue = parameter.hasDefault ? parameter.default ?? null : undefined;
  const base = { help: context.help, optional: !context.positional };
  // destructured members without default or question token must be given
  const required = context.member && !parameter.optional ? { required: true } : {};

  if (shape.kind === 'boolean') {
    const flag = !context.positional && (defaultValue === false || (defaultValue === undefined && parameter.optional));
    return flag
      ? new Argument({ ...base, flag: true })
      : new Argument({ ...base, ...required, type: bool, default: defaultValue });
  }
  if (shape.kind === 'value') {
    return new Argument({ ...base, ...required, type: shape.rule, choices: shape.choices, default: defaultValue });
  }
  return new Argument({ ...base, ...required, default: defaultValue });
}

/**
 * Namespace attribute a parameter's value is found under.
 */
export function attributeOf(name: string, children: ParserChildren | undefined): string {
  const child = children && Object.hasOwn(children, name) ? children[name] : undefined;
  return child?.node === 'argument' && child.name ? child.name : name;
}
