import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { InvalidArgumentError } from "./errors.js";

function isPlainObject(v: object): v is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/**
 * Default element identity. Strings are JSON-quoted, so they never collide
 * with the bare forms of other primitives (`Infinity`, `NaN`, `1n`, `undefined`).
 * Arrays and plain objects are keyed structurally with binary key order; a
 * Date by its time value. Anything else (symbols, functions, Map, Set, class
 * instances) has no structural identity here and needs an explicit key function.
 */
export function elementKey(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return String(value);
    case "boolean":
      return String(value);
    case "bigint":
      return `${value}n`;
    case "undefined":
      return "undefined";
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return "[" + value.map((v) => elementKey(v)).join(",") + "]";
      if (value instanceof Date) return `Date(${value.getTime()})`;
      if (isPlainObject(value)) {
        const record = value;
        const keys = Object.keys(record).sort((a, b) => stringCompareBinary(a, b));
        return "{" + keys.map((k) => JSON.stringify(k) + ":" + elementKey(record[k])).join(",") + "}";
      }
      throw new InvalidArgumentError(
        `no default key for ${value.constructor?.name ?? "object"} elements; pass rowKey/columnKey`,
      );
    default:
      throw new InvalidArgumentError(`no default key for ${typeof value} elements; pass rowKey/columnKey`);
  }
}
