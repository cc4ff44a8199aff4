import { Type, type SchemaOptions } from "@sinclair/typebox";

/**
 * String enum as a flat `{ type: "string", enum: [...] }` schema. Tool
 * callers handle this better than the `anyOf` of literals `Type.Union` emits.
 */
export function stringEnum<const T extends readonly string[]>(values: T, options: SchemaOptions = {}) {
  return Type.Unsafe<T[number]>({ type: "string", enum: [...values], ...options });
}
