/**
 * ts-morph readers shared by the runtime and source introspectors.
 */
import {
  Node,
  SyntaxKind,
  type BindingElement,
  type Expression,
  type JSDocableNode,
  type ParameterDeclaration,
  type TypeNode,
} from 'ts-morph';
import { logger } from '../../utils/logger.js';
import type { ParameterSignature } from './types.js';

const log = logger.child('deduction');

const NOT_LITERAL = Symbol('not-literal');

/**
 * Literal value of an expression, or NOT_LITERAL.
 */
function readLiteral(expression: Expression): unknown {
  if (Node.isStringLiteral(expression) || Node.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.getLiteralValue();
  }
  if (Node.isNumericLiteral(expression)) return expression.getLiteralValue();
  if (Node.isBigIntLiteral(expression)) return BigInt(expression.getText().slice(0, -1));
  if (Node.isTrueLiteral(expression)) return true;
  if (Node.isFalseLiteral(expression)) return false;
  if (Node.isNullLiteral(expression)) return null;
  if (Node.isPrefixUnaryExpression(expression) && expression.getOperatorToken() === SyntaxKind.MinusToken) {
    const operand = readLiteral(expression.getOperand());
    if (typeof operand === 'number') return -operand;
    if (typeof operand === 'bigint') return -operand;
    return NOT_LITERAL;
  }
  if (Node.isArrayLiteralExpression(expression)) {
    const items = expression.getElements().map(readLiteral);
    return items.includes(NOT_LITERAL) ? NOT_LITERAL : items;
  }
  if (Node.isParenthesizedExpression(expression) || Node.isAsExpression(expression)) {
    return readLiteral(expression.getExpression());
  }
  return NOT_LITERAL;
}

function readDefault(initializer: Expression | undefined): Pick<ParameterSignature, 'hasDefault' | 'default'> {
  if (!initializer) return { hasDefault: false };
  const value = readLiteral(initializer);
  if (value === NOT_LITERAL) {
    log.debug(`default '${initializer.getText()}' is not a literal; using null`);
    return { hasDefault: true, default: null };
  }
  return { hasDefault: true, default: value };
}

export function readParameters(parameters: ParameterDeclaration[]): ParameterSignature[] {
  return parameters
    .filter((parameter) => parameter.getName() !== 'this')
    .map((parameter, index) => readParameter(parameter, index));
}

function readParameter(parameter: ParameterDeclaration, index: number): ParameterSignature {
  const nameNode = parameter.getNameNode();
  const typeNode = parameter.getTypeNode();
  const initializer = parameter.getInitializer();
  const rest = parameter.isRestParameter();

  const signature: ParameterSignature = {
    name: parameter.getName(),
    type: typeNode?.getText(),
    ...readDefault(initializer),
    optional: parameter.hasQuestionToken() || initializer !== undefined || rest,
    rest,
  };

  if (Node.isObjectBindingPattern(nameNode)) {
    signature.name = `options${index > 0 ? index : ''}`;
    signature.members = nameNode
      .getElements()
      .filter((element) => !element.getDotDotDotToken())
      .map((element) => readMember(element, parameter, typeNode));
  } else if (Node.isArrayBindingPattern(nameNode)) {
    log.debug(`parameter ${index} is an array binding pattern; not exposed`);
    signature.name = `arg${index}`;
    signature.ignored = true;
  }
  return signature;
}

/**
 * A destructured member takes its type from the parameter's type literal,
 * or from the declared property of the parameter's type.
 */
function readMember(
  element: BindingElement,
  parameter: ParameterDeclaration,
  typeNode: TypeNode | undefined
): ParameterSignature {
  const name = element.getPropertyNameNode()?.getText() ?? element.getName();
  const initializer = element.getInitializer();

  let type: string | undefined;
  let question = false;

  const declaration = Node.isTypeLiteral(typeNode)
    ? typeNode.getProperty(name)
    : typeNode
      ? parameter.getType().getProperty(name)?.getDeclarations()[0]
      : undefined;
  if (declaration && Node.isPropertySignature(declaration)) {
    type = declaration.getTypeNode()?.getText();
    question = declaration.hasQuestionToken();
  }

  return {
    name,
    type,
    ...readDefault(initializer),
    optional: question || initializer !== undefined,
    rest: false,
  };
}

/**
 * Documentation of a JSDoc-able node, with the comment decoration removed
 * and the indentation inside the comment kept.
 */
export function readDocumentation(node: JSDocableNode): string {
  const docs = node.getJsDocs();
  const last = docs[docs.length - 1];
  return last ? stripCommentDecoration(last.getText()) : '';
}

export function stripCommentDecoration(comment: string): string {
  const lines = comment
    .replace(/^\s*\/\*\*?/, '')
    .replace(/\*\/\s*$/, '')
    .split('\n')
    .map((line) => line.replace(/^\s*\* ?/, '').trimEnd());
  while (lines.length > 0 && !lines[0].trim()) lines.shift();
  while (lines.length > 0 && !lines[lines.length - 1].trim()) lines.pop();
  return lines.join('\n');
}

// `Args:`, `Parameters`, `:param x:`, `@param x`
const SECTION_START = /^(?:[A-Z][A-Za-z ]*:|Parameters|[:@].*)$/;

/** First paragraph, joined into one line; a section or tag ends it */
export function summarize(documentation: string): string | undefined {
  const lines: string[] = [];
  for (const line of documentation.trim().split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || SECTION_START.test(trimmed)) break;
    lines.push(trimmed);
  }
  return lines.join(' ') || undefined;
}
