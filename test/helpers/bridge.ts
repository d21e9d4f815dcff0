import type { SuperuserBridgeConfig } from "../../src/config.js";
import { BridgeSession, type BridgeSessionOptions } from "../../src/bridge/session.js";
import { silentLogger } from "../../src/shared/logging.js";
import { MockTransport } from "./mock-transport.js";
import { PseudoPeer } from "./pseudo-peer.js";

export const TEST_PASSWORD = "test-secret";

export const PSEUDO_BRIDGES: SuperuserBridgeConfig[] = [
  { label: "pseudo", spawn: ["pseudo-bridge"], environ: [], privileged: true },
  { label: "pseudo-pw", spawn: ["pseudo-bridge"], environ: [`PSEUDO_PASSWORD=${TEST_PASSWORD}`], privileged: true },
];

export interface TestBridge {
  session: BridgeSession;
  transport: MockTransport;
  /** Settles when the session ends; rejects with the error that ended it. */
  running: Promise<void>;
  peers: PseudoPeer[];
}

/** Start a session on a mock transport, with the pseudo superuser bridges configured. */
export function startBridge(options: Partial<BridgeSessionOptions> = {}): TestBridge {
  const transport = new MockTransport();
  const peers: PseudoPeer[] = [];
  const session = new BridgeSession({
    input: transport.toBridge,
    output: transport.fromBridge,
    hostname: "testhost",
    loginMessagesFd: null,
    superuserBridges: PSEUDO_BRIDGES,
    spawnPeer: (config) => {
      const peer = new PseudoPeer(config);
      peers.push(peer);
      return peer;
    },
    logger: silentLogger(),
    ...options,
  });
  const running = session.run();
  // Tests that expect a failure assert on `running` themselves.
  running.catch(() => undefined);
  return { session, transport, running, peers };
}
