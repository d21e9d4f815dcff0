import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  configGet,
  configSet,
  DEFAULT_SUPERUSER_BRIDGE,
  ensureDefaultConfig,
  getConfigPath,
  getDataDir,
  isConfigKey,
  listHosts,
  listSuperuserBridges,
  parseSuperuserBridges,
} from "../../src/config.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "muxbridge-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env.MUXBRIDGE_DATA_DIR;
  });

  function writeConfig(value: unknown): void {
    writeFileSync(getConfigPath(dir), JSON.stringify(value));
  }

  it("resolves the data directory from the flag, then the environment", () => {
    process.env.MUXBRIDGE_DATA_DIR = "/tmp/from-env";
    expect(getDataDir("relative/dir")).toBe(resolve("relative/dir"));
    expect(getDataDir()).toBe("/tmp/from-env");
  });

  it("writes defaults on first run and keeps an existing file", async () => {
    await ensureDefaultConfig(dir);
    const written: unknown = JSON.parse(readFileSync(getConfigPath(dir), "utf8"));
    expect(written).toEqual({
      "log.level": "info",
      superuser: { bridges: [DEFAULT_SUPERUSER_BRIDGE] },
      hosts: [],
    });

    writeConfig({ "log.level": "debug" });
    await ensureDefaultConfig(dir);
    expect(await configGet(dir, "log.level")).toBe("debug");
  });

  it("falls back to the sudo bridge when none are configured", async () => {
    expect(await listSuperuserBridges(dir)).toEqual([DEFAULT_SUPERUSER_BRIDGE]);
    expect(DEFAULT_SUPERUSER_BRIDGE.spawn).toEqual(["sudo", "-n", "muxbridge", "--privileged"]);
  });

  it("reads bridges and fills in defaults", async () => {
    writeConfig({
      superuser: {
        bridges: [{ label: "pkexec", spawn: ["pkexec", "muxbridge", "--privileged"], environ: ["A=1"], privileged: true }],
      },
    });
    expect(await listSuperuserBridges(dir)).toEqual([
      { label: "pkexec", spawn: ["pkexec", "muxbridge", "--privileged"], environ: ["A=1"], privileged: true },
    ]);
  });

  it("skips invalid bridge entries", () => {
    expect(
      parseSuperuserBridges([{ label: "ok", spawn: ["x"] }, { label: "", spawn: ["x"] }, { label: "empty", spawn: [] }, 5])
    ).toEqual([{ label: "ok", spawn: ["x"], environ: [], privileged: false }]);
  });

  it("lists extra hosts", async () => {
    writeConfig({ hosts: ["alias", 3, ""] });
    expect(await listHosts(dir)).toEqual(["alias"]);
  });

  it("treats an unparsable file as empty", async () => {
    writeFileSync(getConfigPath(dir), "{not json");
    expect(await configGet(dir, "log.level")).toBeUndefined();
  });

  it("sets and gets scalar keys", async () => {
    await configSet(dir, "log.level", "warn");
    expect(await configGet(dir, "log.level")).toBe("warn");
    expect(isConfigKey("log.level")).toBe(true);
    expect(isConfigKey("server.url")).toBe(false);
  });
});
