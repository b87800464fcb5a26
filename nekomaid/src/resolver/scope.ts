import type { VariableBinding } from "../types/ast.js";
import type { ResolvedValue, Value, VariableRef } from "../types/value.js";
import { dictValue, listValue } from "../types/value.js";
import { ResolutionError } from "../types/errors.js";

interface Entry {
  value: ResolvedValue;
  /** Source offset of the declaration; -1 for values visible to the whole frame. */
  offset: number;
}

/**
 * One block's variable frame. A binding is resolved when it is declared and
 * is only visible to references written after it, so `var size = $size;`
 * reads the enclosing frame's `size`.
 */
export class Scope {
  private readonly entries = new Map<string, Entry>();

  private constructor(private readonly parent: Scope | undefined) {}

  static root(values: ReadonlyMap<string, ResolvedValue> = new Map()): Scope {
    return new Scope(undefined).withValues(values);
  }

  /** A frame of already resolved values, visible to everything inside it. */
  withValues(values: ReadonlyMap<string, ResolvedValue>): Scope {
    const scope = new Scope(this);
    for (const [name, value] of values) {
      scope.entries.set(name, { value, offset: -1 });
    }
    return scope;
  }

  child(bindings: ReadonlyArray<VariableBinding>): Scope {
    const scope = new Scope(this);
    for (const binding of bindings) {
      const value = scope.resolveValue(binding.value);
      scope.entries.set(binding.name, { value, offset: binding.span.offset });
    }
    return scope;
  }

  lookup(ref: VariableRef): ResolvedValue {
    let scope: Scope | undefined = this;
    while (scope !== undefined) {
      const entry = scope.entries.get(ref.name);
      if (entry !== undefined && entry.offset < ref.span.offset) {
        return entry.value;
      }
      scope = scope.parent;
    }
    throw new ResolutionError(
      "unresolved-variable",
      ref.name,
      `Variable '$${ref.name}' is not defined in any enclosing scope`,
      ref.span,
    );
  }

  resolveValue(value: Value): ResolvedValue {
    switch (value.kind) {
      case "variable":
        return this.lookup(value);
      case "list":
        return listValue(value.items.map((item) => this.resolveValue(item)));
      case "dict":
        return dictValue(
          [...value.entries].map(([key, item]): [string, ResolvedValue] => [key, this.resolveValue(item)]),
        );
      default:
        return { ...value };
    }
  }

  /** Values declared directly in this frame. */
  ownValues(): Map<string, ResolvedValue> {
    return new Map([...this.entries].map(([name, entry]): [string, ResolvedValue] => [name, entry.value]));
  }
}
