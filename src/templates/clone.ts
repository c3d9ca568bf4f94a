/**
 * Structural deep copy used when storing default values
 *
 * Arrays, plain objects, Maps, Sets, Dates, RegExps, URLs, boxed primitives
 * and typed arrays are copied recursively. Class instances keep their prototype and have their
 * own property descriptors copied. Functions and primitives are returned as-is.
 * Shared and circular references are preserved in the copy.
 */
export function cloneValue(value: unknown): unknown {
  return cloneInner(value, new Map<object, unknown>());
}

function cloneInner(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  return seen.has(value) ? seen.get(value) : createCopy(value, seen);
}

function createCopy(value: object, seen: Map<object, unknown>): unknown {
  if (value instanceof Date) {
    const copy = new Date(value.getTime());
    seen.set(value, copy);
    return copy;
  }

  if (value instanceof RegExp) {
    const copy = new RegExp(value.source, value.flags);
    seen.set(value, copy);
    return copy;
  }

  // Built-ins holding their state in internal slots
  if (value instanceof URL) {
    const copy = new URL(value.href);
    seen.set(value, copy);
    return copy;
  }

  if (value instanceof String || value instanceof Number || value instanceof Boolean) {
    const copy: unknown = Object(value.valueOf());
    seen.set(value, copy);
    return copy;
  }

  if (ArrayBuffer.isView(value)) {
    const copy = structuredClone(value);
    seen.set(value, copy);
    return copy;
  }

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) {
      copy.push(cloneInner(item, seen));
    }
    return copy;
  }

  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, item] of value) {
      copy.set(cloneInner(key, seen), cloneInner(item, seen));
    }
    return copy;
  }

  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const item of value) {
      copy.add(cloneInner(item, seen));
    }
    return copy;
  }

  const copy: object = Object.create(Object.getPrototypeOf(value));
  seen.set(value, copy);
  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Reflect.getOwnPropertyDescriptor(value, key);
    if (descriptor === undefined) {
      continue;
    }
    if ("value" in descriptor) {
      descriptor.value = cloneInner(descriptor.value, seen);
    }
    Reflect.defineProperty(copy, key, descriptor);
  }
  return copy;
}
