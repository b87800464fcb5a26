import type { Document, DocumentNode } from "../types/document.js";
import type { ResolvedValue } from "../types/value.js";
import { valuesEqual } from "../types/value.js";
import { formatSelector } from "../stylesheet/selector.js";

function mapsEqual(a: ReadonlyMap<string, ResolvedValue>, b: ReadonlyMap<string, ResolvedValue>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !valuesEqual(value, other)) return false;
  }
  return true;
}

function arraysEqual<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>, eq: (x: T, y: T) => boolean): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, i) => {
    const other = b[i];
    return other !== undefined && eq(item, other);
  });
}

export function nodesEqual(a: DocumentNode, b: DocumentNode): boolean {
  return (
    a.widget === b.widget &&
    arraysEqual(a.classes, b.classes, (x, y) => x === y) &&
    mapsEqual(a.properties, b.properties) &&
    arraysEqual(a.children, b.children, nodesEqual)
  );
}

/**
 * Structural equality of two documents. Source positions are ignored, so an
 * edit that only moves text around compares equal.
 */
export function documentsEqual(a: Document, b: Document): boolean {
  return (
    arraysEqual(a.imports, b.imports, (x, y) => x === y) &&
    mapsEqual(a.variables, b.variables) &&
    arraysEqual(
      a.styles,
      b.styles,
      (x, y) =>
        x.origin === y.origin &&
        formatSelector(x.selector) === formatSelector(y.selector) &&
        mapsEqual(x.properties, y.properties),
    ) &&
    arraysEqual(a.roots, b.roots, nodesEqual)
  );
}
