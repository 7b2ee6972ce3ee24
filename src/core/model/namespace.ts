/**
 * Tree-shaped parse result. One attribute per field, one nested namespace
 * per child parser.
 */
export interface Namespace {
  [attribute: string]: unknown;
}

export function createNamespace(): Namespace {
  return {};
}

export function isNamespace(value: unknown): value is Namespace {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a dotted path such as `output.format`. Missing segments give undefined.
 */
export function lookup(namespace: Namespace, path: string): unknown {
  let current: unknown = namespace;
  for (const segment of path.split('.')) {
    if (!isNamespace(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Write a dotted path. Intermediate namespaces must already exist; returns
 * false when one does not.
 */
export function assignPath(namespace: Namespace, path: string, value: unknown): boolean {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) return false;

  let current: Namespace = namespace;
  for (const segment of segments) {
    const next = current[segment];
    if (!isNamespace(next)) return false;
    current = next;
  }
  current[last] = value;
  return true;
}

export function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}
