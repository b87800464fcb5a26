/**
 * Recursively freezes plain objects, arrays and maps. `Object.freeze` does not
 * reach a map's entries, so a frozen map also gets `set`, `delete` and
 * `clear` overrides that throw, the way writes to a frozen object do in
 * strict mode.
 */
export function deepFreeze<T>(value: T): T {
  freezeValue(value);
  return value;
}

function freezeValue(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;

  if (value instanceof Map) {
    for (const entry of value.values()) {
      freezeValue(entry);
    }
    for (const method of ["set", "delete", "clear"]) {
      Reflect.defineProperty(value, method, { value: rejectMapWrite(method) });
    }
    Object.freeze(value);
    return;
  }

  Object.freeze(value);
  for (const key of Object.keys(value)) {
    freezeValue(Reflect.get(value, key));
  }
}

function rejectMapWrite(method: string): () => never {
  return () => {
    throw new TypeError(`Cannot call ${method} on a frozen map`);
  };
}
