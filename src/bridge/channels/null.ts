import { Channel } from "./base.js";

/** Accepts and discards data; stays open until the front end closes it. */
export class NullChannel extends Channel {
  static readonly payload = "null";

  protected onStart(): void {
    this.ready();
  }

  protected override onData(): void {}
}
