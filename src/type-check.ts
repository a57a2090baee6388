const PRIMITIVES = new Map<Function, string>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [Symbol, "symbol"],
  [BigInt, "bigint"],
]);

/**
 * Whether `value` fits a field whose emitted design type is `expected`.
 * Interfaces and unions come out as Object, so those accept any value.
 * Primitive beans are injectable too: a `number` field takes a registered
 * `8080`, not only object references.
 */
export function isAssignable(value: unknown, expected?: Function): boolean {
  if (value === null || value === undefined) return false;
  if (expected === undefined || expected === Object) return true;
  const primitive = PRIMITIVES.get(expected);
  if (primitive) return typeof value === primitive || value instanceof expected;
  if (expected === Function) return typeof value === "function";
  if (expected === Array) return Array.isArray(value);
  return value instanceof expected;
}

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "function") return value.name || "anonymous function";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto && typeof proto === "object" && typeof proto.constructor === "function" && proto.constructor.name) {
    return proto.constructor.name;
  }
  return "Object";
}

export const expectedName = (expected?: Function): string => expected?.name || "unknown";
