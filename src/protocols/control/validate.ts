import { isRecord } from "../../bridge/helpers.js";
import { ProtocolError } from "../../shared/errors.js";
import { assertSchema } from "../assert.js";
import { ControlEnvelopeSchema, type ControlMessage } from "./types.js";

/** Decode a control frame payload into a message with at least a string `command`. */
export function parseControl(payload: Buffer): ControlMessage {
  let data: unknown;
  try {
    data = JSON.parse(payload.toString("utf8")) as unknown;
  } catch {
    throw new ProtocolError(`Control frame is not valid JSON: ${payload.toString("utf8").slice(0, 80)}`);
  }
  if (!isRecord(data)) {
    throw new ProtocolError("Control frame is not a JSON object");
  }
  const envelope = assertSchema(ControlEnvelopeSchema, data, "control message");
  return { ...data, ...envelope };
}
