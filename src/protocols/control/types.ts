import { type } from "arktype";

/** A decoded control message. Fields beyond `command` and `channel` depend on the command. */
export interface ControlMessage {
  command: string;
  channel?: string;
  [key: string]: unknown;
}

export const ControlEnvelopeSchema = type({
  command: "string",
  "channel?": "string",
});

export const InitSchema = type({
  command: "'init'",
  version: "number",
  "host?": "string",
  "superuser?": type({ id: "string" }).or("boolean"),
});

export const OpenSchema = type({
  command: "'open'",
  channel: "string > 0",
  payload: "string > 0",
  "host?": "string",
  "superuser?": "boolean | 'require' | 'try'",
  "group?": "string",
});

export const ChannelCommandSchema = type({
  command: "string",
  channel: "string > 0",
});

export const CloseSchema = type({
  command: "'close'",
  "channel?": "string",
  "problem?": "string",
  "message?": "string",
});

export const KillSchema = type({
  command: "'kill'",
  "host?": "string",
  "group?": "string",
});

export const AuthorizeSchema = type({
  command: "'authorize'",
  cookie: "string",
  response: "string",
});

/** `init` sent by a superuser peer; `problem` means it refused to start. */
export const PeerInitSchema = type({
  command: "'init'",
  "version?": "number",
  "problem?": "string",
  "message?": "string",
});

/** Authentication request sent by a superuser peer before its `init`. */
export const PeerAuthorizeSchema = type({
  command: "'authorize'",
  cookie: "string",
  "challenge?": "string",
  "prompt?": "string",
  "message?": "string",
  "default?": "string",
  "echo?": "boolean",
  "error?": "string",
});

export type InitMessage = typeof InitSchema.infer;
export type OpenMessage = typeof OpenSchema.infer;
export type KillMessage = typeof KillSchema.infer;
export type PeerAuthorizeMessage = typeof PeerAuthorizeSchema.infer;
