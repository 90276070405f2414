/**
 * Promise-based FIFO mailbox with an optional capacity bound.
 *
 * Items handed to a waiting taker skip the buffer. When the buffer is full,
 * `put` callers wait in arrival order until a `take` frees a slot or their
 * timeout elapses. A capacity of 0 means unbounded.
 */
export class MailboxFullError extends Error {
  constructor(public readonly capacity: number) {
    super(`mailbox full (capacity ${capacity})`);
    this.name = 'MailboxFullError';
  }
}

export class MailboxClosedError extends Error {
  constructor() {
    super('mailbox closed');
    this.name = 'MailboxClosedError';
  }
}

export type MailboxOptions<T> = {
  capacity?: number;
  /** Invoked once for every item the mailbox accepts. */
  onAccepted?: (item: T) => void;
};

type PendingTake<T> = {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout | null;
};

type PendingPut<T> = {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

export class Mailbox<T extends object> {
  public readonly capacity: number;
  private readonly items: T[] = [];
  private readonly takers: PendingTake<T>[] = [];
  private readonly putters: PendingPut<T>[] = [];
  private readonly onAccepted?: (item: T) => void;
  private closed = false;

  constructor(options: MailboxOptions<T> = {}) {
    this.capacity = Math.max(0, Math.floor(options.capacity ?? 0));
    this.onAccepted = options.onAccepted;
  }

  public get size(): number {
    return this.items.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Non-blocking insert. Returns false when full or closed.
   */
  public offer(item: T): boolean {
    if (!this.hasRoom()) {
      return false;
    }
    this.accept(item);
    return true;
  }

  /**
   * Inserts an item, waiting up to `timeoutMs` for room.
   * Rejects with MailboxFullError when no room frees up in time.
   */
  public async put(item: T, timeoutMs = 0): Promise<void> {
    if (this.closed) {
      throw new MailboxClosedError();
    }
    if (this.hasRoom()) {
      this.accept(item);
      return;
    }
    if (timeoutMs <= 0) {
      throw new MailboxFullError(this.capacity);
    }
    await new Promise<void>((resolve, reject) => {
      const pending: PendingPut<T> = {
        item,
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.putters.indexOf(pending);
          if (index >= 0) {
            this.putters.splice(index, 1);
          }
          reject(new MailboxFullError(this.capacity));
        }, timeoutMs),
      };
      this.putters.push(pending);
    });
  }

  /**
   * Resolves with the next item, or null once `timeoutMs` elapses or the
   * mailbox is closed and drained. Without a timeout it waits indefinitely.
   */
  public take(timeoutMs?: number): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      this.admitWaitingPutter();
      return Promise.resolve(item);
    }
    if (this.closed || (timeoutMs !== undefined && timeoutMs <= 0)) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      const pending: PendingTake<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          const index = this.takers.indexOf(pending);
          if (index >= 0) {
            this.takers.splice(index, 1);
          }
          resolve(null);
        }, timeoutMs);
      }
      this.takers.push(pending);
    });
  }

  /**
   * Stops accepting items. Waiting takers resolve with null and waiting
   * putters reject; buffered items can still be taken.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      if (taker.timer) {
        clearTimeout(taker.timer);
      }
      taker.resolve(null);
    }
    for (const putter of this.putters.splice(0)) {
      clearTimeout(putter.timer);
      putter.reject(new MailboxClosedError());
    }
  }

  private hasRoom(): boolean {
    if (this.closed || this.putters.length > 0) {
      return false;
    }
    return this.capacity === 0 || this.takers.length > 0 || this.items.length < this.capacity;
  }

  private accept(item: T): void {
    this.onAccepted?.(item);
    const taker = this.takers.shift();
    if (taker) {
      if (taker.timer) {
        clearTimeout(taker.timer);
      }
      taker.resolve(item);
      return;
    }
    this.items.push(item);
  }

  private admitWaitingPutter(): void {
    if (this.capacity !== 0 && this.items.length >= this.capacity) {
      return;
    }
    const putter = this.putters.shift();
    if (!putter) {
      return;
    }
    clearTimeout(putter.timer);
    this.accept(putter.item);
    putter.resolve();
  }
}
