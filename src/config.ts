import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import { isRecord } from "./bridge/helpers.js";
import { checkSchema } from "./protocols/assert.js";
import { getEnv } from "./shared/env.js";
import { getLogger } from "./shared/logging.js";

const CONFIG_FILENAME = "muxbridge.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom);
  const fromEnv = getEnv("DATA_DIR");
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(homedir(), ".muxbridge");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export type ConfigKey = "log.level";

const CONFIG_KEYS: readonly ConfigKey[] = ["log.level"];

export function isConfigKey(s: string): s is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(s);
}

export const SuperuserBridgeSchema = type({
  label: "string > 0",
  spawn: "string[] > 0",
  "environ?": "string[]",
  "privileged?": "boolean",
});

/** One way of starting a privileged peer bridge. */
export interface SuperuserBridgeConfig {
  label: string;
  spawn: string[];
  /** `KEY=VALUE` entries merged over the child environment. */
  environ: string[];
  privileged: boolean;
}

/** Full config shape as stored on disk. */
export type FullConfig = Record<string, unknown>;

export const DEFAULT_SUPERUSER_BRIDGE: SuperuserBridgeConfig = {
  label: "sudo",
  spawn: ["sudo", "-n", "muxbridge", "--privileged"],
  environ: [],
  privileged: true,
};

const DEFAULT_CONFIG: FullConfig = {
  "log.level": "info",
  superuser: { bridges: [DEFAULT_SUPERUSER_BRIDGE] },
  hosts: [],
};

export async function readFullConfig(dataDir: string): Promise<FullConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return {};
  }
  try {
    const data: unknown = JSON.parse(raw);
    return isRecord(data) ? data : {};
  } catch (err) {
    getLogger().warn({ err, configPath }, "Ignoring unreadable config file");
    return {};
  }
}

export async function writeFullConfig(dataDir: string, cfg: FullConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  const configPath = getConfigPath(dataDir);
  await writeFile(configPath, JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

/** Ensure a config file exists with sensible defaults. Called on first CLI entry. */
export async function ensureDefaultConfig(dataDir: string): Promise<void> {
  const configPath = getConfigPath(dataDir);
  try {
    await readFile(configPath, "utf8");
    return; // already exists
  } catch {
    try {
      await writeFullConfig(dataDir, DEFAULT_CONFIG);
    } catch (error) {
      // Read-only homes still run, on in-memory defaults.
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code === "EPERM" || code === "EACCES" || code === "EROFS") return;
      throw error;
    }
  }
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readFullConfig(dataDir);
  const raw = cfg[key];
  return typeof raw === "string" ? raw : undefined;
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readFullConfig(dataDir);
  cfg[key] = value;
  await writeFullConfig(dataDir, cfg);
}

/** Validate bridge entries; invalid ones are skipped with a warning. */
export function parseSuperuserBridges(entries: readonly unknown[]): SuperuserBridgeConfig[] {
  const bridges: SuperuserBridgeConfig[] = [];
  entries.forEach((entry, index) => {
    const parsed = checkSchema(SuperuserBridgeSchema, entry);
    if (!parsed) {
      getLogger().warn({ index }, "Skipping invalid superuser bridge entry");
      return;
    }
    bridges.push({
      label: parsed.label,
      spawn: parsed.spawn,
      environ: parsed.environ ?? [],
      privileged: parsed.privileged ?? false,
    });
  });
  return bridges;
}

/** Configured superuser bridges; the default sudo bridge when the config names none. */
export async function listSuperuserBridges(dataDir: string): Promise<SuperuserBridgeConfig[]> {
  const cfg = await readFullConfig(dataDir);
  const entries = isRecord(cfg.superuser) ? cfg.superuser.bridges : undefined;
  if (!Array.isArray(entries)) return [DEFAULT_SUPERUSER_BRIDGE];
  return parseSuperuserBridges(entries);
}

/** Extra host names treated as local in `open`. */
export async function listHosts(dataDir: string): Promise<string[]> {
  const cfg = await readFullConfig(dataDir);
  if (!Array.isArray(cfg.hosts)) return [];
  return cfg.hosts.filter((h): h is string => typeof h === "string" && h.length > 0);
}
