import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from "../shared/logging.js";
import { getEnv } from "../shared/env.js";

/** Version from the package.json next to the installed sources (src/ or dist/). */
export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(fileURLToPath(new URL("../../package.json", import.meta.url)), "utf8");
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // fall through to the default
  }
  return "0.1.0";
}

export interface LogOptions {
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

/** Resolve log level and format: CLI flags, then the environment, then the config file. */
export function resolveLogOptions(
  opts: LogOptions,
  configuredLevel?: string
): { level: LogLevel; format: LogFormat } {
  const requested = opts.verbose ? "debug" : (opts.logLevel ?? getEnv("LOG_LEVEL") ?? configuredLevel ?? "info");
  const format = opts.logFormat ?? "text";
  if (!isLogLevel(requested)) {
    throw new Error(`Invalid log level "${requested}"`);
  }
  if (!isLogFormat(format)) {
    throw new Error(`Invalid log format "${format}"`);
  }
  return { level: requested, format };
}
