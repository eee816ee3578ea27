/** Producer side of a {@link RendezvousChannel}. */
export interface Sender<T> {
  /**
   * Hands `value` to the consumer. Resolves `true` once it was taken,
   * `false` if the receiver was closed first.
   */
  send(value: T): Promise<boolean>;
  /** Gives up this sender; the channel ends once every sender is released. */
  release(): void;
}

interface PendingSend<T> {
  value: T;
  settle: (delivered: boolean) => void;
}

/**
 * Zero-capacity channel: a send does not complete until the consumer has
 * received the value, so a producer can never run ahead by more than the one
 * value in flight.
 */
export class RendezvousChannel<T> {
  private readonly pendingSends: PendingSend<T>[] = [];
  private readonly waitingReceivers: ((value: T | undefined) => void)[] = [];
  private liveSenders = 0;
  private closed = false;

  public get isClosed(): boolean {
    return this.closed;
  }

  public createSender(): Sender<T> {
    this.liveSenders += 1;
    let released = false;
    return {
      send: (value) => this.send(value),
      release: () => {
        if (released) return;
        released = true;
        this.liveSenders -= 1;
        this.wakeIfFinished();
      },
    };
  }

  /** Next value, or `undefined` once every sender is released or the receiver closed. */
  public receive(): Promise<T | undefined> {
    const pending = this.pendingSends.shift();
    if (pending) {
      pending.settle(true);
      return Promise.resolve(pending.value);
    }
    if (this.closed || this.liveSenders === 0) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waitingReceivers.push(resolve);
    });
  }

  /** Rejects every pending and future send; pending receives end. */
  public closeReceiver(): void {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.pendingSends.splice(0)) {
      pending.settle(false);
    }
    for (const resolve of this.waitingReceivers.splice(0)) {
      resolve(undefined);
    }
  }

  private send(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve(true);
    }
    return new Promise((settle) => {
      this.pendingSends.push({ value, settle });
    });
  }

  private wakeIfFinished(): void {
    if (this.liveSenders > 0 || this.pendingSends.length > 0) return;
    for (const resolve of this.waitingReceivers.splice(0)) {
      resolve(undefined);
    }
  }
}
