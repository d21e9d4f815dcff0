import { isRecord } from "../helpers.js";

const NUMERIC = new Set(["y", "n", "q", "i", "u", "x", "t", "d", "h"]);

/**
 * Whether a JSON value fits a D-Bus type signature, as far as JSON can tell.
 * Struct and other container signatures the JSON mapping cannot check are accepted.
 */
export function matchesSignature(signature: string, value: unknown): boolean {
  if (signature === "s" || signature === "o" || signature === "g") return typeof value === "string";
  if (signature === "b") return typeof value === "boolean";
  if (NUMERIC.has(signature)) return typeof value === "number";
  if (signature === "v") return isRecord(value) && typeof value.t === "string" && "v" in value;
  if (signature.startsWith("a{")) return isRecord(value);
  if (signature.startsWith("a")) {
    const element = signature.slice(1);
    return Array.isArray(value) && value.every((item) => matchesSignature(element, item));
  }
  return true;
}
