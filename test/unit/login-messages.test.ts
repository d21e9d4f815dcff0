import { mkdtempSync, openSync, readSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LoginMessages } from "../../src/bridge/login-messages.js";
import { silentLogger } from "../../src/shared/logging.js";
import { startBridge } from "../helpers/bridge.js";

const MESSAGES = JSON.stringify({ "last-login": { host: "workstation", time: 1700000000 }, "fail-count": 2 });

describe("LoginMessages", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "muxbridge-login-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env.MUXBRIDGE_LOGIN_MESSAGES_FD;
  });

  function openMessages(content: string): number {
    const file = join(dir, "messages");
    writeFileSync(file, content);
    return openSync(file, "r");
  }

  it("returns the content repeatedly until dismissed", () => {
    const messages = new LoginMessages(openMessages(MESSAGES), silentLogger());
    expect(messages.get()).toBe(MESSAGES);
    expect(messages.get()).toBe(MESSAGES);
    messages.dismiss();
    expect(messages.get()).toBe("{}");
    messages.dismiss();
    expect(messages.get()).toBe("{}");
  });

  it("reads from the start whatever the descriptor position", () => {
    const fd = openMessages(MESSAGES);
    readSync(fd, Buffer.alloc(5));
    expect(new LoginMessages(fd, silentLogger()).get()).toBe(MESSAGES);
  });

  it("returns {} without content", () => {
    expect(new LoginMessages(null, silentLogger()).get()).toBe("{}");
    expect(new LoginMessages(openMessages(""), silentLogger()).get()).toBe("{}");
  });

  it("takes the descriptor from the environment and clears the variable", () => {
    process.env.MUXBRIDGE_LOGIN_MESSAGES_FD = String(openMessages(MESSAGES));
    const messages = LoginMessages.fromEnvironment(silentLogger());
    expect(messages.get()).toBe(MESSAGES);
    expect(process.env.MUXBRIDGE_LOGIN_MESSAGES_FD).toBeUndefined();
    messages.dismiss();
  });

  it("ignores a descriptor that is not a number", () => {
    process.env.MUXBRIDGE_LOGIN_MESSAGES_FD = "abc";
    expect(LoginMessages.fromEnvironment(silentLogger()).get()).toBe("{}");
  });

  it("is served on the internal bus", async () => {
    const { transport: t, running } = startBridge({ loginMessagesFd: openMessages(MESSAGES) });
    await t.init();
    await t.openBus("bus");
    expect(await t.call("bus", "1", "/LoginMessages", "cockpit.LoginMessages", "Get")).toEqual({
      reply: [[MESSAGES]],
      id: "1",
    });
    expect(await t.call("bus", "2", "/LoginMessages", "cockpit.LoginMessages", "Dismiss")).toEqual({
      reply: [[]],
      id: "2",
    });
    expect(await t.call("bus", "3", "/LoginMessages", "cockpit.LoginMessages", "Get")).toEqual({
      reply: [["{}"]],
      id: "3",
    });
    t.end();
    await running;
  });
});
