/**
 * Reads a class constructor or function signature from TypeScript source,
 * annotations and JSDoc included.
 *
 * Targets are written `path/to/file.ts#ExportName`.
 */
import * as path from 'node:path';
import {
  Node,
  Project,
  type ClassDeclaration,
  type ClassExpression,
  type SourceFile,
} from 'ts-morph';
import { ConstructionError, ErrorCodes, SystemError } from '../../utils/errors.js';
import { fileExistsSync, readFileSync } from '../../utils/file-system.js';
import { readDocumentation, readParameters, summarize } from './ast.js';
import type { CallableSignature, ParameterSignature, SignatureIntrospector } from './types.js';

export interface SourceIntrospectorOptions {
  /** Base directory of relative target paths */
  projectRoot?: string;
}

export interface SourceTarget {
  filePath: string;
  exportName: string;
}

/**
 * Split `path/to/file.ts#Export`; null when the target is not in that form.
 */
export function parseTarget(target: string): SourceTarget | null {
  const match = target.match(/^(.+\.(?:ts|tsx|mts|cts|js|jsx|mjs|cjs))#([A-Za-z_$][\w$]*)$/);
  if (!match) return null;
  return { filePath: match[1], exportName: match[2] };
}

export class SourceIntrospector implements SignatureIntrospector<string> {
  constructor(private readonly options: SourceIntrospectorOptions = {}) {}

  introspect(target: string): CallableSignature {
    const parsed = parseTarget(target);
    if (!parsed) {
      throw new ConstructionError(
        ErrorCodes.INVALID_TARGET,
        `Invalid target '${target}'. Expected: path/to/file.ts#ExportName`,
        { target }
      );
    }
    return this.introspectFile(parsed.filePath, parsed.exportName);
  }

  introspectFile(filePath: string, exportName: string): CallableSignature {
    const fullPath = path.resolve(this.options.projectRoot ?? process.cwd(), filePath);
    if (!fileExistsSync(fullPath)) {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${fullPath}`, { path: fullPath });
    }
    return this.introspectText(readFileSync(fullPath), exportName, fullPath);
  }

  /**
   * Introspect in-memory source text.
   */
  introspectText(text: string, exportName: string, fileName = 'source.ts'): CallableSignature {
    const project = new Project({
      useInMemoryFileSystem: true,
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
    const sourceFile = project.createSourceFile(path.basename(fileName), text, { overwrite: true });

    const declaration = findExport(sourceFile, exportName);
    if (!declaration) {
      throw new ConstructionError(
        ErrorCodes.EXPORT_NOT_FOUND,
        `Export '${exportName}' not found in ${fileName}`,
        { exportName, fileName }
      );
    }
    return readDeclaration(declaration, exportName);
  }
}

function findExport(sourceFile: SourceFile, exportName: string): Node | undefined {
  for (const cls of sourceFile.getClasses()) {
    if (cls.isExported() && cls.getName() === exportName) return cls;
  }
  for (const fn of sourceFile.getFunctions()) {
    if (fn.isExported() && fn.getName() === exportName) return fn;
  }
  for (const statement of sourceFile.getVariableStatements()) {
    if (!statement.isExported()) continue;
    for (const declaration of statement.getDeclarations()) {
      if (declaration.getName() === exportName) return declaration;
    }
  }
  // export { Local as Exported }
  for (const exportDeclaration of sourceFile.getExportDeclarations()) {
    for (const specifier of exportDeclaration.getNamedExports()) {
      const exported = specifier.getAliasNode()?.getText() ?? specifier.getName();
      if (exported !== exportName) continue;
      const local = specifier.getLocalTargetDeclarations()[0];
      if (local) return local;
    }
  }
  return undefined;
}

function readDeclaration(node: Node, exportName: string): CallableSignature {
  if (Node.isClassDeclaration(node)) return readClass(node, exportName);
  if (Node.isFunctionDeclaration(node)) {
    return signature(exportName, 'function', readParameters(node.getParameters()), readDocumentation(node));
  }
  if (Node.isVariableDeclaration(node)) {
    const initializer = node.getInitializer();
    const statement = node.getVariableStatement();
    const documentation = statement ? readDocumentation(statement) : '';
    if (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer)) {
      return signature(exportName, 'function', readParameters(initializer.getParameters()), documentation);
    }
    if (Node.isClassExpression(initializer)) return readClass(initializer, exportName);
  }
  throw new ConstructionError(
    ErrorCodes.UNSUPPORTED_DECLARATION,
    `Export '${exportName}' is neither a class nor a function`,
    { exportName, kind: node.getKindName() }
  );
}

/**
 * Constructor parameters, walking up to the nearest base class that declares
 * a constructor. The constructor's JSDoc wins over the class's.
 */
function readClass(node: ClassDeclaration | ClassExpression, exportName: string): CallableSignature {
  let current: ClassDeclaration | ClassExpression | undefined = node;
  while (current) {
    const constructor = current.getConstructors()[0];
    if (constructor) {
      const documentation = readDocumentation(constructor) || readDocumentation(node);
      return signature(exportName, 'class', readParameters(constructor.getParameters()), documentation, node);
    }
    current = current.getBaseClass();
  }
  return signature(exportName, 'class', [], readDocumentation(node), node);
}

function signature(
  name: string,
  kind: CallableSignature['kind'],
  parameters: ParameterSignature[],
  documentation: string,
  owner?: ClassDeclaration | ClassExpression
): CallableSignature {
  const ownDescription = owner ? summarize(readDocumentation(owner)) : undefined;
  return {
    name,
    kind,
    parameters,
    documentation,
    summary: ownDescription ?? summarize(documentation),
  };
}
