export { deduce, deduceChildren, deduceParserOptions, type DeduceOptions } from './deduce.js';
export { ConstructorParser, FunctionParser, type CallableParserOptions } from './callable-parser.js';
export { RuntimeIntrospector } from './runtime-introspector.js';
export { SourceIntrospector, parseTarget, type SourceIntrospectorOptions, type SourceTarget } from './source-introspector.js';
export { deduceFromAnnotation, deduceFromDefault, splitUnion, type DeducedType, type TypeRegistry } from './type-deduction.js';
export { stripCommentDecoration, summarize } from './ast.js';
export type { CallableSignature, ParameterSignature, SignatureIntrospector, Callable } from './types.js';
