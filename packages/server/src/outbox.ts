import { BoardError, ERROR_CODES, toBoardError } from "./errors";
import type { BroadcastEvent } from "./types";

export type OutboxOptions = {
  send: (event: BroadcastEvent) => Promise<void>;
  sendTimeoutMs: number;
  maxQueuedEvents: number;
  // Called at most once; the outbox is closed by then.
  onFailure: (error: BoardError) => void;
};

function withTimeout(promise: Promise<void>, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new BoardError(ERROR_CODES.TRANSPORT_FAILURE, `Send timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      () => {
        clearTimeout(timer);
        resolve();
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

// FIFO of events for one client, drained one send at a time.
export class Outbox {
  private queue: BroadcastEvent[] = [];
  private running = false;
  private pending: Promise<void> = Promise.resolve();
  private closed = false;
  private options: OutboxOptions;

  constructor(options: OutboxOptions) {
    this.options = options;
  }

  get busy(): boolean {
    return this.running;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get queued(): number {
    return this.queue.length;
  }

  enqueue(event: BroadcastEvent): boolean {
    if (this.closed) {
      return false;
    }

    if (this.queue.length >= this.options.maxQueuedEvents) {
      const error = new BoardError(
        ERROR_CODES.TRANSPORT_FAILURE,
        `Outbound queue exceeded ${this.options.maxQueuedEvents} events`,
      );
      // Deferred so the broadcast that overflowed finishes its fan-out first.
      this.closed = true;
      this.queue = [];
      queueMicrotask(() => this.options.onFailure(error));
      return false;
    }

    this.queue.push(event);
    if (!this.running) {
      this.running = true;
      this.pending = this.drain();
    }
    return true;
  }

  async idle(): Promise<void> {
    while (this.running) {
      await this.pending;
    }
  }

  close(): void {
    this.closed = true;
    this.queue = [];
  }

  private async drain(): Promise<void> {
    try {
      for (;;) {
        const event = this.queue.shift();
        if (event === undefined || this.closed) {
          return;
        }
        await withTimeout(
          Promise.resolve().then(() => this.options.send(event)),
          this.options.sendTimeoutMs,
        );
      }
    } catch (error) {
      this.fail(toBoardError(error, ERROR_CODES.TRANSPORT_FAILURE));
    } finally {
      this.running = false;
    }
  }

  private fail(error: BoardError): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue = [];
    this.options.onFailure(error);
  }
}
