import type { ResolvedStyleRule } from "../types/document.js";
import type { ResolvedValue } from "../types/value.js";
import { selectorMatches, type PathEntry } from "./selector.js";

/**
 * Computes a node's effective properties. Matching rules are merged in list
 * order, so a later rule overwrites an earlier one; the node's explicit
 * properties are laid over the result and always win.
 */
export function cascade(
  path: ReadonlyArray<PathEntry>,
  rules: ReadonlyArray<ResolvedStyleRule>,
  explicit: ReadonlyMap<string, ResolvedValue>,
): Map<string, ResolvedValue> {
  const effective = new Map<string, ResolvedValue>();

  for (const rule of rules) {
    if (!selectorMatches(path, rule.selector)) continue;
    for (const [name, value] of rule.properties) {
      effective.set(name, value);
    }
  }

  for (const [name, value] of explicit) {
    effective.set(name, value);
  }

  return effective;
}
