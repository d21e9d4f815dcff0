import { Command } from "commander";
import { getPackageJsonVersion } from "./utils.js";
import { runBridge, type BridgeCommandOptions } from "./commands/bridge.js";
import { runBridges } from "./commands/bridges.js";
import { runConfigGet, runConfigSet } from "./commands/config.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("muxbridge")
    .description("Multiplexing protocol bridge on stdin/stdout")
    .version(getPackageJsonVersion())
    .option("--privileged", "Run as the privileged peer of another bridge")
    .option("--data-dir <path>", "Data directory (default ~/.muxbridge)")
    .option("--hostname <name>", "Host name announced in init")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug or trace")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action((opts: BridgeCommandOptions) => runBridge(opts));

  program
    .command("bridges")
    .description("List configured superuser bridges")
    .option("--data-dir <path>", "Data directory")
    .action((opts: { dataDir?: string }) => runBridges(opts));

  const config = program.command("config").description("Read or change configuration");

  config
    .command("get <key>")
    .description("Print a config value")
    .option("--data-dir <path>", "Data directory")
    .action((key: string, opts: { dataDir?: string }) => runConfigGet(key, opts));

  config
    .command("set <key> <value>")
    .description("Set a config value")
    .option("--data-dir <path>", "Data directory")
    .action((key: string, value: string, opts: { dataDir?: string }) => runConfigSet(key, value, opts));

  return program;
}
