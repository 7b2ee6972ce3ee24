/**
 * Maps a parameter's annotation (or its default's runtime type) to a field
 * shape.
 */
import { bigInt, float, str, type TypeRule } from '../value-types/rules.js';

export type DeducedType =
  | { kind: 'value'; rule: TypeRule; choices?: readonly unknown[] }
  | { kind: 'boolean' }
  | { kind: 'untyped' };

export type TypeRegistry = Readonly<Record<string, TypeRule>>;

const PRIMITIVES: Readonly<Record<string, TypeRule>> = {
  string: str,
  number: float,
  bigint: bigInt,
};

const STRING_LITERAL = /^(['"`])(.*)\1$/;
const NUMBER_LITERAL = /^-?\d+(?:\.\d+)?$/;

/**
 * Split a union at its top level; members inside brackets, generics or
 * string literals stay whole.
 */
export function splitUnion(annotation: string): string[] {
  const members: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let current = '';

  for (const char of annotation) {
    if (quote) {
      if (char === quote) quote = undefined;
    } else if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if ('([{<'.includes(char)) {
      depth++;
    } else if (')]}>'.includes(char)) {
      depth--;
    } else if (char === '|' && depth === 0) {
      members.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }
  members.push(current.trim());
  return members.filter((member) => member.length > 0);
}

function unwrapParens(text: string): string {
  let current = text.trim();
  while (current.startsWith('(') && current.endsWith(')')) {
    current = current.slice(1, -1).trim();
  }
  return current;
}

export function deduceFromAnnotation(annotation: string, types: TypeRegistry = {}): DeducedType {
  const members = splitUnion(unwrapParens(annotation))
    .map(unwrapParens)
    .filter((member) => member !== 'null' && member !== 'undefined');
  if (members.length === 0) return { kind: 'untyped' };

  const strings = members.map((member) => STRING_LITERAL.exec(member)?.[2]);
  if (strings.every((value): value is string => value !== undefined)) {
    return { kind: 'value', rule: str, choices: strings };
  }
  if (members.every((member) => NUMBER_LITERAL.test(member))) {
    return { kind: 'value', rule: float, choices: members.map(Number) };
  }
  if (members.every((member) => member === 'true' || member === 'false' || member === 'boolean')) {
    return { kind: 'boolean' };
  }

  if (members.length === 1) {
    const [member] = members;
    if (Object.hasOwn(types, member)) return { kind: 'value', rule: types[member] };
    if (Object.hasOwn(PRIMITIVES, member)) return { kind: 'value', rule: PRIMITIVES[member] };
  }
  return { kind: 'untyped' };
}

export function deduceFromDefault(value: unknown): DeducedType {
  switch (typeof value) {
    case 'string':
      return { kind: 'value', rule: str };
    case 'number':
      return { kind: 'value', rule: float };
    case 'bigint':
      return { kind: 'value', rule: bigInt };
    case 'boolean':
      return { kind: 'boolean' };
    default:
      return { kind: 'untyped' };
  }
}
