import { configGet, configSet, getDataDir, isConfigKey } from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { isLogLevel } from "../../shared/logging.js";

export async function runConfigGet(key: string, opts: { dataDir?: string }): Promise<void> {
  if (!isConfigKey(key)) exit(EXIT.INVALID_ARGS, `Unknown config key "${key}"`);
  const value = await configGet(getDataDir(opts.dataDir), key);
  process.stdout.write((value ?? "") + "\n");
}

export async function runConfigSet(key: string, value: string, opts: { dataDir?: string }): Promise<void> {
  if (!isConfigKey(key)) exit(EXIT.INVALID_ARGS, `Unknown config key "${key}"`);
  if (key === "log.level" && !isLogLevel(value)) {
    exit(EXIT.INVALID_ARGS, `Invalid log level "${value}"`);
  }
  await configSet(getDataDir(opts.dataDir), key, value);
}
