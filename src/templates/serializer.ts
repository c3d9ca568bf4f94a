import { describeType } from "./errors.js";

/**
 * Strategy converting a value into the text substituted for a placeholder
 *
 * Throwing is the failure signal; the template wraps anything thrown in a
 * TemplateSerializationError naming the key.
 */
export type Serializer = (value: unknown) => string;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Default serialization policy
 *
 * - strings pass through unchanged
 * - Date, bigint, boxed primitives and URL use their canonical text
 * - booleans and numbers use their literal form
 * - byte arrays decode as UTF-8, falling back to base64
 * - arrays, plain objects, Maps, Sets and objects with `toJSON` become JSON
 *
 * Anything else throws a TypeError.
 */
export const defaultSerializer: Serializer = (value) => {
  if (typeof value === "string") {
    return value;
  }

  const scalar = serializeScalar(value);
  if (scalar !== undefined) {
    return scalar;
  }

  if (value instanceof Uint8Array) {
    return serializeBytes(value);
  }

  if (isStructured(value)) {
    return toJson(value);
  }

  throw new TypeError(`Object of type ${describeType(value)} is not serializable`);
};

function serializeScalar(value: unknown): string | undefined {
  switch (typeof value) {
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    default:
      break;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof String || value instanceof Number || value instanceof Boolean) {
    return String(value.valueOf());
  }
  if (value instanceof URL) {
    return value.href;
  }
  return undefined;
}

function serializeBytes(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    // Not valid UTF-8
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasToJson(value: object): boolean {
  return typeof Reflect.get(value, "toJSON") === "function";
}

function isStructured(value: unknown): boolean {
  if (value === null) {
    return true;
  }
  if (typeof value !== "object") {
    return false;
  }
  return (
    Array.isArray(value) ||
    value instanceof Map ||
    value instanceof Set ||
    isPlainObject(value) ||
    hasToJson(value)
  );
}

/**
 * JSON encoding that also accepts Maps and Sets at any depth
 *
 * Values nested inside a structure follow the same rules as the top level;
 * a nested class instance without `toJSON` throws.
 */
function toJson(value: unknown): string {
  const json: string | undefined = JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item === "function" || typeof item === "symbol") {
      throw new TypeError(`Object of type ${describeType(item)} is not JSON serializable`);
    }
    if (typeof item === "bigint") {
      return item.toString();
    }
    if (typeof item !== "object" || item === null || Array.isArray(item) || isPlainObject(item)) {
      return item;
    }
    if (item instanceof Map) {
      return mapToObject(item);
    }
    if (item instanceof Set) {
      return [...item];
    }
    if (item instanceof String || item instanceof Number || item instanceof Boolean) {
      return item.valueOf();
    }
    throw new TypeError(`Object of type ${describeType(item)} is not JSON serializable`);
  });

  // toJSON may return undefined, which JSON.stringify drops
  if (json === undefined) {
    throw new TypeError(`Object of type ${describeType(value)} encodes to nothing`);
  }
  return json;
}

function mapToObject(map: Map<unknown, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = Object.create(null);
  for (const [key, item] of map) {
    if (typeof key !== "string" && typeof key !== "number" && typeof key !== "boolean") {
      throw new TypeError(`Map keys must be string, number or boolean, not ${describeType(key)}`);
    }
    result[String(key)] = item;
  }
  return result;
}
