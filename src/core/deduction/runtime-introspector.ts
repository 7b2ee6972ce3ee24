/**
 * Reads the signature of a live class or function from its source text.
 *
 * Annotations do not survive compilation, so field types come from literal
 * defaults. Names are those of the emitted code: a build step that renames
 * parameters (a bundler resolving a shadowed name, a minifier) renames the
 * deduced options too. Documentation is taken from a static `documentation` string:
 *
 *   class Converter {
 *     static documentation = `
 *       Args:
 *         scale: percent of the original size
 *     `;
 *     constructor(input: string, scale = 100) {}
 *   }
 */
import { Node, Project, type ParameterDeclaration } from 'ts-morph';
import { ConstructionError, ErrorCodes } from '../../utils/errors.js';
import { readParameters, summarize } from './ast.js';
import type { Callable, CallableSignature, ParameterSignature, SignatureIntrospector } from './types.js';

export class RuntimeIntrospector implements SignatureIntrospector<Callable> {
  private readonly project = new Project({
    useInMemoryFileSystem: true,
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: true,
    compilerOptions: { allowJs: true },
  });
  private fileCount = 0;

  introspect(target: Callable): CallableSignature {
    const text = Function.prototype.toString.call(target);
    const documentation = staticString(target, 'documentation') ?? '';

    return {
      name: target.name || 'anonymous',
      kind: /^class\b/.test(text) ? 'class' : 'function',
      parameters: this.readTarget(target, text),
      documentation,
      summary: summarize(documentation),
    };
  }

  private readTarget(target: Callable, text: string): ParameterSignature[] {
    // object-literal methods print as `name(a) {}`
    const parameters = this.readSource(text) ?? this.readSource(`function ${text}`);
    if (parameters === 'inherited') {
      const parent: unknown = Object.getPrototypeOf(target);
      return isCallable(parent) && parent !== Function.prototype
        ? this.readTarget(parent, Function.prototype.toString.call(parent))
        : [];
    }
    if (!parameters) {
      throw new ConstructionError(
        ErrorCodes.UNSUPPORTED_DECLARATION,
        `Cannot read the parameters of '${target.name || 'anonymous'}'`,
        { source: text.slice(0, 80) }
      );
    }
    return parameters;
  }

  /**
   * Parameters of the class or function in `text`; 'inherited' for a class
   * without its own constructor.
   */
  private readSource(text: string): ParameterSignature[] | 'inherited' | undefined {
    this.fileCount += 1;
    const sourceFile = this.project.createSourceFile(`target-${this.fileCount}.js`, `const target = (${text});`);

    try {
      let expression = sourceFile.getVariableStatements()[0]?.getDeclarations()[0]?.getInitializer();
      while (Node.isParenthesizedExpression(expression)) {
        expression = expression.getExpression();
      }

      let nodes: ParameterDeclaration[];
      if (Node.isClassExpression(expression)) {
        const constructor = expression.getConstructors()[0];
        if (!constructor) return 'inherited';
        nodes = constructor.getParameters();
      } else if (Node.isArrowFunction(expression) || Node.isFunctionExpression(expression)) {
        nodes = expression.getParameters();
      } else {
        return undefined;
      }
      return readParameters(nodes);
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }
}

function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

export function staticString(target: Callable, key: string): string | undefined {
  const value: unknown = Reflect.get(target, key);
  return typeof value === 'string' ? value : undefined;
}
