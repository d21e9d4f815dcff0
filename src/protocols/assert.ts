import { type, type ArkErrors } from "arktype";
import { ProtocolError } from "../shared/errors.js";

/** Asserts a value matches the schema and returns the validated value. Throws ProtocolError otherwise. */
export function assertSchema<T>(
  schema: (value: unknown) => T,
  value: unknown,
  context: string
): Exclude<T, ArkErrors> {
  const out = schema(value);
  if (out instanceof type.errors) {
    throw new ProtocolError(`Invalid ${context}: ${out.summary}`);
  }
  return out as Exclude<T, ArkErrors>;
}

/** Like assertSchema but returns undefined instead of throwing. */
export function checkSchema<T>(
  schema: (value: unknown) => T,
  value: unknown
): Exclude<T, ArkErrors> | undefined {
  const out = schema(value);
  if (out instanceof type.errors) return undefined;
  return out as Exclude<T, ArkErrors>;
}
