/**
 * Messages exchanged on an internal-bus channel. Each data frame carries one
 * JSON object; requests carry an optional `id` that is echoed in the answer.
 */

import { type } from "arktype";

export const BusCallSchema = type({
  call: ["string", "string", "string", "unknown[]"],
  "id?": "string",
});

export const BusWatchSchema = type({
  watch: {
    path: "string",
    "interface?": "string",
  },
  "id?": "string",
});

export const BusUnwatchSchema = type({
  unwatch: {
    path: "string",
    "interface?": "string",
  },
  "id?": "string",
});

export const BusMatchRuleSchema = type({
  "path?": "string",
  "interface?": "string",
  "member?": "string",
});

export const BusAddMatchSchema = type({
  "add-match": BusMatchRuleSchema,
  "id?": "string",
});

export const BusRemoveMatchSchema = type({
  "remove-match": BusMatchRuleSchema,
  "id?": "string",
});

/** A variant value as it appears in property maps: signature plus value. */
export const VariantSchema = type({
  t: "string",
  v: "unknown",
});

export type BusMatchRule = typeof BusMatchRuleSchema.infer;
export type Variant = typeof VariantSchema.infer;

/** Outbound messages. */
export type BusWireMessage =
  | { reply: unknown[]; id?: string }
  | { error: [string, [string]]; id?: string }
  | { meta: Record<string, unknown> }
  | { notify: Record<string, Record<string, Record<string, unknown>>> }
  | { signal: [string, string, string, unknown[]] };
