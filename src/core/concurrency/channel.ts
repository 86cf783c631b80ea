// src/core/concurrency/channel.ts
// Zero-capacity (rendezvous) channel: a send completes only when a
// receiver takes the value.

let nextChannelId = 0;

/**
 * Reset channel ids (for testing).
 */
export function resetChannelIds(): void {
  nextChannelId = 0;
}

export type ReceiveResult<T> =
  | { tag: "value"; value: T }
  | { tag: "closed"; cancelled: boolean };

export class ChannelClosedError extends Error {
  constructor(readonly channelId: string) {
    super(`channel ${channelId} is closed`);
    this.name = "ChannelClosedError";
  }
}

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

export class RendezvousChannel<T> {
  readonly id = `chan-${nextChannelId++}`;
  private readonly sendQueue: PendingSend<T>[] = [];
  private readonly recvQueue: Array<(result: ReceiveResult<T>) => void> = [];
  private closed = false;
  private cancelled = false;

  /** Closed by the producer or cancelled by the consumer. */
  get isClosedForSend(): boolean {
    return this.closed || this.cancelled;
  }

  get isClosedForReceive(): boolean {
    return this.cancelled || (this.closed && this.sendQueue.length === 0);
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Resolves once a receiver has taken the value; rejects with
   * {@link ChannelClosedError} if the channel is or becomes unusable first.
   */
  send(value: T): Promise<void> {
    if (this.isClosedForSend) return Promise.reject(new ChannelClosedError(this.id));
    const receiver = this.recvQueue.shift();
    if (receiver) {
      receiver({ tag: "value", value });
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.sendQueue.push({ value, resolve, reject });
    });
  }

  /** The next value, or a closed marker once nothing more can arrive. */
  receiveCatching(): Promise<ReceiveResult<T>> {
    if (!this.cancelled) {
      const sender = this.sendQueue.shift();
      if (sender) {
        sender.resolve();
        return Promise.resolve({ tag: "value", value: sender.value });
      }
    }
    if (this.closed || this.cancelled) {
      return Promise.resolve({ tag: "closed", cancelled: this.cancelled });
    }
    return new Promise((resolve) => {
      this.recvQueue.push(resolve);
    });
  }

  /** Producer side: no more sends. Waiting receivers see the channel closed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.recvQueue.splice(0)) receiver({ tag: "closed", cancelled: this.cancelled });
  }

  /** Consumer side: pending and future sends fail, receivers see it closed. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    for (const sender of this.sendQueue.splice(0)) sender.reject(new ChannelClosedError(this.id));
    for (const receiver of this.recvQueue.splice(0)) receiver({ tag: "closed", cancelled: true });
  }
}
