import { WILDCARD, type Selector, type SelectorPart } from "../types/ast.js";

/** One step of a node's ancestry: its widget and classes. */
export interface PathEntry {
  widget: string;
  classes: readonly string[];
}

export function partMatches(entry: PathEntry, part: SelectorPart): boolean {
  if (part.widget !== WILDCARD && part.widget !== entry.widget) return false;
  if (!part.whitelist.every((c) => entry.classes.includes(c))) return false;
  return !part.blacklist.some((c) => entry.classes.includes(c));
}

/**
 * A selector of n parts matches when it lines up with the last n entries of
 * the path (root first), i.e. a chain of direct parent/child steps ending at
 * the node being styled.
 */
export function selectorMatches(path: ReadonlyArray<PathEntry>, selector: Selector): boolean {
  const parts = selector.hierarchy;
  if (parts.length === 0 || parts.length > path.length) return false;

  const offset = path.length - parts.length;
  return parts.every((part, depth) => {
    const entry = path[offset + depth];
    return entry !== undefined && partMatches(entry, part);
  });
}

export function formatSelector(selector: Selector): string {
  return selector.hierarchy
    .map((part) => {
      const plus = part.whitelist.map((c) => ` +${c}`).join("");
      const minus = part.blacklist.map((c) => ` !${c}`).join("");
      return `${part.widget}${plus}${minus}`;
    })
    .join(" > ");
}
