import { ChannelClosedError } from './types';

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * Unbuffered handoff between one producer and one consumer.
 *
 * `send` resolves only once a receiver has taken the value, so a slow consumer
 * holds the producer back. Closing rejects pending sends with
 * `ChannelClosedError`; receivers see the end of iteration, or the error passed
 * to `close`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private closed = false;
  private failure: Error | null = null;
  private closeListeners: Array<() => void> = [];

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value, done: false });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return this.failure
        ? Promise.reject(this.failure)
        : Promise.resolve({ value: undefined, done: true });
    }

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  close(error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error ?? null;

    for (const receiver of this.receivers.splice(0)) {
      if (error) {
        receiver.reject(error);
      } else {
        receiver.resolve({ value: undefined, done: true });
      }
    }

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }

    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }

  /**
   * Register a callback run once when the channel closes, from either side
   */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      // Leaving a for-await loop early closes the channel
      return: async (): Promise<IteratorResult<T>> => {
        this.close();
        return { value: undefined, done: true };
      }
    };
  }
}
