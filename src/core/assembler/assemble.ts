/**
 * Result assembler: turns the flat values read back from commander into the
 * namespace tree, then validates and post-processes it level by level.
 */
import { InputError } from '../../utils/errors.js';
import { UsageCodes, type CompiledField, type CompiledLevel, type CompiledParser, type FlatResult } from '../compiler/types.js';
import { assignPath, createNamespace, isNamespace, lookup, type Namespace } from '../model/namespace.js';

export function assemble(flat: FlatResult, compiled: CompiledParser): Namespace {
  let root = buildSkeleton(compiled.root);

  for (const [destination, value] of flat.values) {
    const path = compiled.pathIndex.get(destination);
    if (path !== undefined) assignPath(root, path, value);
  }

  // Pre-order reversed: every level comes after its descendants
  const levels = compiled.levels.filter((level) => flat.traversed.has(level.path)).reverse();
  for (const level of levels) {
    const namespace = level.path ? lookup(root, level.path) : root;
    if (!isNamespace(namespace)) continue;

    validateLevel(level, namespace);
    const produced = produceLevel(level, namespace, flat.unknown.get(level.path) ?? []);
    if (level.path) {
      assignPath(root, level.path, produced);
    } else {
      root = produced;
    }
  }
  return root;
}

/**
 * Namespace with every field null and every group present, parsed or not.
 */
export function buildSkeleton(level: CompiledLevel): Namespace {
  const namespace = createNamespace();
  for (const field of level.fields) {
    namespace[field.name] = null;
  }
  for (const slot of level.slots) {
    if (slot.mode === 'sequential') {
      namespace[slot.name] = buildSkeleton(slot.level);
      continue;
    }
    namespace[slot.name] = null;
    for (const [branchName, branch] of slot.branches) {
      namespace[branchName] = buildSkeleton(branch);
    }
  }
  return namespace;
}

function validateLevel(level: CompiledLevel, namespace: Namespace): void {
  for (const field of level.fields) {
    const value = namespace[field.name];
    const { argument } = field;

    if (typeof argument.nargs === 'number' && argument.nargs > 1 && Array.isArray(value)
      && value !== argument.defaultValue && value.length !== argument.nargs) {
      level.command.error(
        `error: ${describeField(field)} expects ${argument.nargs} values (got ${value.length})`,
        { code: UsageCodes.ARITY, exitCode: 1 }
      );
    }

    const { partner } = field;
    if (!partner) continue;
    const counterpart = namespace[partner.name];
    // empty or absent values are not counted
    if (Array.isArray(value) && Array.isArray(counterpart) && value.length > 0 && counterpart.length > 0
      && value.length !== counterpart.length) {
      level.command.error(
        `error: ${field.name} for ${value.length} ${partner.name} provided, expected for ${counterpart.length}`,
        { code: UsageCodes.AS_MANY_AS, exitCode: 1 }
      );
    }
  }
}

function describeField(field: CompiledField): string {
  return field.placement === 'option' ? `option '--${field.name}'` : `argument '${field.name}'`;
}

/**
 * Lifted translucent hooks first, innermost first, then the level's own.
 */
function produceLevel(level: CompiledLevel, namespace: Namespace, unknown: string[]): Namespace {
  let current = namespace;
  try {
    for (const parser of level.lifted) {
      current = parser.produce(current, unknown);
    }
    return level.parser.produce(current, unknown);
  } catch (error) {
    if (error instanceof InputError) {
      level.command.error(`error: ${error.message}`, { code: UsageCodes.INVALID_INPUT, exitCode: 1 });
    }
    throw error;
  }
}
