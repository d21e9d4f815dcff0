import { Channel } from "./base.js";

/** Sends every byte back; answers done with done and close. */
export class EchoChannel extends Channel {
  static readonly payload = "echo";

  protected onStart(): void {
    this.ready();
  }

  protected override onData(data: Buffer): void {
    this.sendData(data);
  }

  protected override onDone(): void {
    this.sendDone();
    this.close();
  }
}
