/**
 * Parsers deduced from a class constructor or a plain function.
 *
 *   class Detector {
 *     static help = 'Finds outliers';
 *     constructor(text: string, threshold = 0.05, database = null) {}
 *   }
 *
 *   const parser = new ConstructorParser(Detector);
 *   const detector = parser.construct(parser.parseArgs());
 *
 * Static `Argument`, `Parser` and parallel-set properties of a class are
 * taken as explicit children, as are the `children` option's entries (which
 * win). A child named like a parameter replaces the deduced field.
 */
import { ParallelSet } from '../model/parallel.js';
import { Argument } from '../model/argument.js';
import type { Namespace } from '../model/namespace.js';
import { Parser, type ParserChild, type ParserChildren } from '../model/parser.js';
import { attributeOf, deduceParserOptions, type DeduceOptions } from './deduce.js';
import { RuntimeIntrospector, staticString } from './runtime-introspector.js';
import type { Callable, CallableSignature, ParameterSignature, SignatureIntrospector } from './types.js';

export interface CallableParserOptions extends DeduceOptions {
  /** Use this signature instead of introspecting the target */
  signature?: CallableSignature;
  introspector?: SignatureIntrospector<Callable>;
}

const defaultIntrospector = new RuntimeIntrospector();

/**
 * Deduction shared by both parser kinds.
 */
abstract class CallableParser extends Parser {
  readonly signature: CallableSignature;
  private readonly declared: ParserChildren;

  protected constructor(target: Callable, options: CallableParserOptions) {
    const { signature: given, introspector, ...rest } = options;
    const signature = given ?? (introspector ?? defaultIntrospector).introspect(target);
    const declared = { ...staticChildren(target), ...rest.children };
    super(deduceParserOptions(signature, {
      ...rest,
      description: rest.description ?? staticString(target, 'help'),
      children: declared,
    }));
    this.signature = signature;
    this.declared = declared;
  }

  /**
   * Call arguments in parameter order. Destructured parameters receive an
   * object; null values of optional parameters become undefined so that
   * their defaults apply.
   */
  protected callArguments(namespace: Namespace): unknown[] {
    const values = this.signature.parameters.map((parameter) => {
      if (parameter.rest || parameter.ignored) return undefined;
      if (parameter.members) {
        const object: Record<string, unknown> = {};
        for (const member of parameter.members) {
          const value = this.valueOf(namespace, member);
          if (value !== undefined) object[member.name] = value;
        }
        return object;
      }
      return this.valueOf(namespace, parameter);
    });

    // trailing unexposed parameters get nothing
    let end = values.length;
    while (end > 0 && values[end - 1] === undefined) {
      const parameter = this.signature.parameters[end - 1];
      if (!parameter || !(parameter.rest || parameter.ignored)) break;
      end--;
    }
    return values.slice(0, end);
  }

  private valueOf(namespace: Namespace, parameter: ParameterSignature): unknown {
    const value = namespace[attributeOf(parameter.name, this.declared)];
    return value === null && parameter.optional ? undefined : value;
  }
}

export class ConstructorParser<T = unknown> extends CallableParser {
  readonly target: new (...args: never[]) => T;

  constructor(target: new (...args: never[]) => T, options: CallableParserOptions = {}) {
    super(target, options);
    this.target = target;
  }

  /**
   * Instantiate the target from a parsed namespace.
   */
  construct(namespace: Namespace): T {
    const instance: T = Reflect.construct(this.target, this.callArguments(namespace));
    return instance;
  }
}

export class FunctionParser<R = unknown> extends CallableParser {
  readonly target: (...args: never[]) => R;

  constructor(target: (...args: never[]) => R, options: CallableParserOptions = {}) {
    super(target, options);
    this.target = target;
  }

  /**
   * Call the target with a parsed namespace.
   */
  invoke(namespace: Namespace): R {
    const result: R = Reflect.apply(this.target, undefined, this.callArguments(namespace));
    return result;
  }
}

function isChild(value: unknown): value is ParserChild {
  return value instanceof Argument || value instanceof Parser || value instanceof ParallelSet;
}

function staticChildren(target: Callable): ParserChildren {
  const children: ParserChildren = {};
  for (const key of Object.keys(target)) {
    const value: unknown = Reflect.get(target, key);
    if (isChild(value)) children[key] = value;
  }
  return children;
}
