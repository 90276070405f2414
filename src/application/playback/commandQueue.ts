import type { Command } from '@/domain/playback/commands';
import type { CommandQueueStats } from '@/domain/playback/types';
import { Mailbox, MailboxFullError } from '@/shared/async/mailbox';

export class CommandQueueFullError extends Error {
  public readonly code = 'command-queue-full';

  constructor(
    public readonly commandType: string,
    public readonly capacity: number,
  ) {
    super(`command queue full (capacity ${capacity}); ${commandType} rejected`);
    this.name = 'CommandQueueFullError';
  }
}

export type CommandQueueOptions = {
  /** 0 means unbounded. */
  capacity?: number;
};

/**
 * Ordered mailbox of commands with lifecycle counters.
 * `pending` is derived, so it cannot drift from the other three.
 */
export class CommandQueue {
  private readonly mailbox: Mailbox<Command>;
  private totalEnqueued = 0;
  private processed = 0;
  private errors = 0;

  constructor(options: CommandQueueOptions = {}) {
    this.mailbox = new Mailbox<Command>({
      capacity: options.capacity ?? 0,
      onAccepted: () => {
        this.totalEnqueued += 1;
      },
    });
  }

  public get capacity(): number {
    return this.mailbox.capacity;
  }

  public get size(): number {
    return this.mailbox.size;
  }

  /**
   * Enqueues a command, waiting up to `timeoutMs` for room.
   * Rejects with CommandQueueFullError instead of dropping.
   */
  public async put(command: Command, timeoutMs = 0): Promise<void> {
    try {
      await this.mailbox.put(command, timeoutMs);
    } catch (error) {
      if (error instanceof MailboxFullError) {
        throw new CommandQueueFullError(command.type, error.capacity);
      }
      throw error;
    }
  }

  /** Non-blocking enqueue; false when the queue is full or closed. */
  public offer(command: Command): boolean {
    return this.mailbox.offer(command);
  }

  /** Next command, or null after `timeoutMs`. */
  public get(timeoutMs?: number): Promise<Command | null> {
    return this.mailbox.take(timeoutMs);
  }

  public markProcessed(): void {
    this.processed += 1;
  }

  public markError(): void {
    this.errors += 1;
  }

  public getStats(): CommandQueueStats {
    return {
      totalEnqueued: this.totalEnqueued,
      pending: this.pending(),
      processed: this.processed,
      errors: this.errors,
    };
  }

  /**
   * Zeroes the lifecycle counters; commands still in flight stay pending.
   */
  public resetStats(): void {
    this.totalEnqueued = this.pending();
    this.processed = 0;
    this.errors = 0;
  }

  public close(): void {
    this.mailbox.close();
  }

  private pending(): number {
    return Math.max(0, this.totalEnqueued - this.processed - this.errors);
  }
}
