import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "text" | "json" | "plain";
export type Logger = pino.Logger;

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

/** Masks authentication material (prompt answers, passwords) before it reaches stderr. */
export function redactSecrets(input: string): string {
  return input
    .replace(/"(response|password)"\s*:\s*"(?:[^"\\]|\\.)*"/gi, (_match, name: string) => `"${name}":"[REDACTED]"`)
    .replace(/\b([A-Z_]*PASSWORD)\s*=\s*([^\s"]+)/g, (_match, name: string) => `${name}=[REDACTED]`);
}

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

/** Renders one pino output line; `undefined` drops it. */
export type LineRenderer = (line: string) => string | undefined;

/** Splits pino output into lines and writes each rendered line, redacted, to `out`. */
export function redactedLineStream(render: LineRenderer, out: NodeJS.WritableStream = process.stderr): Writable {
  let pending = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      pending += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = pending.split("\n");
      pending = lines.pop() ?? "";
      for (const line of lines) {
        const text = line.trim() ? render(line) : undefined;
        if (text !== undefined) out.write(`${redactSecrets(text)}\n`);
      }
      cb();
    },
  });
}

/** The `msg` of a pino JSON line. Lines that are not JSON pass through. */
export function messageOf(line: string): string | undefined {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return line;
  }
  if (typeof record !== "object" || record === null || !("msg" in record)) return undefined;
  return typeof record.msg === "string" ? record.msg : undefined;
}

const asIs: LineRenderer = (line) => line;

let rootLogger: Logger | null = null;

/** Builds the process logger. stdout carries the protocol, so every format writes to stderr. */
export function initLogger(level = "info", format: LogFormat = "text"): Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: "muxbridge" }, redactedLineStream(messageOf));
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: redactedLineStream(asIs) });
    rootLogger = pino({ level: logLevel, name: "muxbridge" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "muxbridge" }, redactedLineStream(asIs));
  }
  return rootLogger;
}

export function getLogger(): Logger {
  return rootLogger ?? initLogger("info", "plain");
}

/** A logger that drops everything; used where a component runs without a session logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
