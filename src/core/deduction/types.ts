/**
 * Signatures read from classes and functions, before fields are deduced
 * from them.
 */

export interface ParameterSignature {
  name: string;
  /** Annotation as written, e.g. `number` or `'png' | 'gif'` */
  type?: string;
  hasDefault: boolean;
  /** Literal default value; null when the default is not a literal */
  default?: unknown;
  /** Has a default or a question token */
  optional: boolean;
  /** `...rest` parameter */
  rest: boolean;
  /** Not exposed as a field (array binding patterns); receives undefined */
  ignored?: boolean;
  /** Binding elements of a destructured options parameter */
  members?: ParameterSignature[];
}

export interface CallableSignature {
  name: string;
  kind: 'class' | 'function';
  parameters: ParameterSignature[];
  /** Documentation text without comment decoration */
  documentation: string;
  /** First paragraph of the documentation */
  summary?: string;
}

export interface SignatureIntrospector<T> {
  introspect(target: T): CallableSignature;
}

/** Anything a runtime introspector can read: a class or a plain function */
export type Callable = ((...args: never[]) => unknown) | (abstract new (...args: never[]) => unknown);
