import chalk from "chalk";
import { getDataDir, listSuperuserBridges, type SuperuserBridgeConfig } from "../../config.js";

export function formatBridge(bridge: SuperuserBridgeConfig): string {
  const tag = bridge.privileged ? chalk.green("privileged") : chalk.dim("unprivileged");
  return `${chalk.bold(bridge.label)}  ${bridge.spawn.join(" ")}  (${tag})`;
}

/** Print the configured superuser bridges, one per line. */
export async function runBridges(opts: { dataDir?: string }): Promise<void> {
  const bridges = await listSuperuserBridges(getDataDir(opts.dataDir));
  if (bridges.length === 0) {
    process.stdout.write("No superuser bridges configured\n");
    return;
  }
  for (const bridge of bridges) {
    process.stdout.write(formatBridge(bridge) + "\n");
  }
}
