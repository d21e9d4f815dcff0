/**
 * Stdio mode: stdin/stdout carry the framed protocol, stderr carries logs only.
 */

import { getDataDir, listHosts, listSuperuserBridges } from "../config.js";
import { EXIT, ProtocolError } from "../shared/errors.js";
import type { Logger } from "../shared/logging.js";
import { BridgeSession } from "./session.js";

export interface StdioBridgeOptions {
  privileged?: boolean;
  dataDir?: string;
  hostname?: string;
  logger: Logger;
}

/** Create the session for this process's stdio. Config is only consulted when not privileged. */
export async function createStdioSession(options: StdioBridgeOptions): Promise<BridgeSession> {
  const dataDir = getDataDir(options.dataDir);
  const privileged = options.privileged ?? false;
  const [superuserBridges, hosts] = privileged
    ? [[], []]
    : await Promise.all([listSuperuserBridges(dataDir), listHosts(dataDir)]);

  return new BridgeSession({
    input: process.stdin,
    output: process.stdout,
    privileged,
    ...(options.hostname !== undefined && { hostname: options.hostname }),
    hosts,
    superuserBridges,
    logger: options.logger,
  });
}

/** Run until stdin closes. Resolves with the process exit code. */
export async function runStdioBridge(session: BridgeSession): Promise<number> {
  try {
    await session.run();
    return EXIT.SUCCESS;
  } catch (err) {
    return err instanceof ProtocolError ? EXIT.PROTOCOL_ERROR : EXIT.GENERIC_ERROR;
  }
}
