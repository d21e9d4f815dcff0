import { configGet, ensureDefaultConfig, getDataDir } from "../../config.js";
import { createStdioSession, runStdioBridge } from "../../bridge/stdio.js";
import { initLogger } from "../../shared/logging.js";
import { EXIT, exit } from "../../shared/errors.js";
import { resolveLogOptions } from "../utils.js";

export interface BridgeCommandOptions {
  privileged?: boolean;
  dataDir?: string;
  hostname?: string;
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

export async function runBridge(opts: BridgeCommandOptions): Promise<void> {
  const dataDir = getDataDir(opts.dataDir);
  // Privileged peers never write config.
  if (!opts.privileged) await ensureDefaultConfig(dataDir);
  const { level, format } = resolveLogOptions(opts, await configGet(dataDir, "log.level"));
  const logger = initLogger(level, format);

  const session = await createStdioSession({
    privileged: opts.privileged ?? false,
    dataDir,
    ...(opts.hostname !== undefined && { hostname: opts.hostname }),
    logger,
  });

  const terminate = () => {
    session.shutdown();
    exit(EXIT.SUCCESS);
  };
  process.once("SIGINT", terminate);
  process.once("SIGTERM", terminate);

  logger.debug({ privileged: opts.privileged ?? false }, "Bridge starting on stdio");
  const code = await runStdioBridge(session);
  exit(code);
}
