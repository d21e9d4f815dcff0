/**
 * Per-channel outbound gate. While frozen, everything the channel sends is
 * queued; thaw releases the queue in order and then passes through again.
 * Each channel owns its own gate, so one frozen channel never holds back
 * another.
 */
export class FlowControlGate<T> {
  private frozen = false;
  private readonly queue: T[] = [];

  constructor(private readonly sink: (item: T) => void) {}

  send(item: T): void {
    if (this.frozen) {
      this.queue.push(item);
      return;
    }
    this.sink(item);
  }

  freeze(): void {
    this.frozen = true;
  }

  thaw(): void {
    this.frozen = false;
    // The sink may freeze the gate again; stop releasing if it does.
    while (!this.frozen && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next !== undefined) this.sink(next);
    }
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get queued(): number {
    return this.queue.length;
  }
}
