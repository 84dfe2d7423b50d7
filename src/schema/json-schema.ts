/**
 * Helpers for plain JSON documents: record checks and local `$ref`
 * resolution for JSON Schema and OpenAPI documents.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Decode one JSON pointer segment (RFC 6901).
 */
function decodePointerSegment(segment: string): string {
  return decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Look up a local fragment ref (#/a/b) inside a document.
 */
export function resolvePointer(document: unknown, ref: string): unknown {
  if (!ref.startsWith('#')) {
    throw new Error(`Only local refs are supported: ${ref}`);
  }

  const path = ref.slice(1);
  if (path === '' || path === '/') {
    return document;
  }

  let current: unknown = document;
  for (const raw of path.replace(/^\//, '').split('/')) {
    const segment = decodePointerSegment(raw);
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      current = undefined;
    }
    if (current === undefined) {
      throw new Error(`Unresolvable ref: ${ref}`);
    }
  }
  return current;
}

/**
 * Inline every local $ref of a document.
 *
 * Refs already being expanded on the current path are left in place, so
 * recursive schemas terminate with a single `$ref` at the point of recursion.
 * Sibling keywords next to a `$ref` are merged over the target.
 */
export function dereferenceLocalRefs(document: unknown): unknown {
  function walk(node: unknown, expanding: Set<string>): unknown {
    if (Array.isArray(node)) {
      return node.map((item) => walk(item, expanding));
    }
    if (!isRecord(node)) {
      return node;
    }

    const record = node;
    const ref = record['$ref'];
    if (typeof ref === 'string' && ref.startsWith('#')) {
      if (expanding.has(ref)) {
        return { ...record };
      }
      const target = walk(resolvePointer(document, ref), new Set([...expanding, ref]));
      const { $ref: _ignored, ...siblings } = record;
      const merged = walk(siblings, expanding);
      if (isRecord(target) && isRecord(merged)) {
        return { ...target, ...merged };
      }
      return target;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
      result[key] = walk(value, expanding);
    }
    return result;
  }

  return walk(document, new Set());
}
