/**
 * Bounded single-consumer channel.
 *
 * The producer awaits send() while the channel is full. When the consumer goes
 * away (receiver.close()), every pending and future send resolves false so the
 * producer can stop instead of blocking forever.
 */

export const DEFAULT_CHANNEL_CAPACITY = 100;

export type TryRecvResult<T> = { kind: 'value'; value: T } | { kind: 'empty' } | { kind: 'closed' };

export interface ChannelSender<T> {
  /**
   * Enqueue a value, waiting for space if needed.
   * Resolves false if the receiver has been closed or the channel was closed for sending.
   */
  send(value: T): Promise<boolean>;
  /** Signal that no more values will be sent. Buffered values stay readable. */
  close(): void;
  readonly isClosed: boolean;
}

export interface ChannelReceiver<T> extends AsyncIterable<T> {
  /** Take the next value without waiting. */
  tryRecv(): TryRecvResult<T>;
  /** Wait for the next value; undefined once the channel is closed and drained. */
  recv(): Promise<T | undefined>;
  /** Drop the consumer. Buffered values are discarded and senders are released. */
  close(): void;
  readonly isClosed: boolean;
}

class BoundedChannel<T> {
  private buffer: T[] = [];
  private head = 0;
  private sendClosed = false;
  private receiveClosed = false;
  private waitingSenders: Array<() => void> = [];
  private waitingReceiver: (() => void) | null = null;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length - this.head;
  }

  /** No further values can be received. */
  get isDrained(): boolean {
    return this.receiveClosed || (this.sendClosed && this.size === 0);
  }

  /** No further values can be sent. */
  get isSendClosed(): boolean {
    return this.receiveClosed || this.sendClosed;
  }

  async send(value: T): Promise<boolean> {
    for (;;) {
      if (this.receiveClosed || this.sendClosed) {
        return false;
      }
      if (this.size < this.capacity) {
        this.buffer.push(value);
        this.wakeReceiver();
        return true;
      }
      await new Promise<void>((resolve) => {
        this.waitingSenders.push(resolve);
      });
    }
  }

  tryRecv(): TryRecvResult<T> {
    if (this.receiveClosed) {
      return { kind: 'closed' };
    }
    if (this.size > 0) {
      const value = this.buffer[this.head];
      this.head++;
      this.compact();
      this.wakeOneSender();
      return { kind: 'value', value };
    }
    return this.sendClosed ? { kind: 'closed' } : { kind: 'empty' };
  }

  async recv(): Promise<T | undefined> {
    const result = await this.next();
    return result.kind === 'value' ? result.value : undefined;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.next();
      if (result.kind === 'closed') {
        return;
      }
      yield result.value;
    }
  }

  closeSender(): void {
    if (this.sendClosed) return;
    this.sendClosed = true;
    this.wakeReceiver();
  }

  closeReceiver(): void {
    if (this.receiveClosed) return;
    this.receiveClosed = true;
    this.buffer = [];
    this.head = 0;
    const senders = this.waitingSenders;
    this.waitingSenders = [];
    for (const wake of senders) {
      wake();
    }
    this.wakeReceiver();
  }

  private async next(): Promise<{ kind: 'value'; value: T } | { kind: 'closed' }> {
    for (;;) {
      const result = this.tryRecv();
      if (result.kind !== 'empty') {
        return result;
      }
      await new Promise<void>((resolve) => {
        this.waitingReceiver = resolve;
      });
    }
  }

  private wakeReceiver(): void {
    const wake = this.waitingReceiver;
    this.waitingReceiver = null;
    wake?.();
  }

  private wakeOneSender(): void {
    const wake = this.waitingSenders.shift();
    wake?.();
  }

  // Drop consumed slots once they dominate the array
  private compact(): void {
    if (this.head >= 64 && this.head * 2 >= this.buffer.length) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }
}

/**
 * Create a bounded channel and return its two ends.
 */
export function createChannel<T>(capacity: number = DEFAULT_CHANNEL_CAPACITY): {
  sender: ChannelSender<T>;
  receiver: ChannelReceiver<T>;
} {
  const channel = new BoundedChannel<T>(capacity);

  const sender: ChannelSender<T> = {
    send: (value) => channel.send(value),
    close: () => channel.closeSender(),
    get isClosed() {
      return channel.isSendClosed;
    },
  };

  const receiver: ChannelReceiver<T> = {
    tryRecv: () => channel.tryRecv(),
    recv: () => channel.recv(),
    close: () => channel.closeReceiver(),
    get isClosed() {
      return channel.isDrained;
    },
    [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
  };

  return { sender, receiver };
}
