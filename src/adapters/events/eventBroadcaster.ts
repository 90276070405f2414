import { createLogger } from '@/shared/logging/logger';
import { Mailbox } from '@/shared/async/mailbox';
import type { PlaybackEvent } from '@/domain/playback/notifications';

export interface EventSubscription {
  readonly id: number;
  readonly closed: boolean;
  /** Events dropped because this subscriber's mailbox was full. */
  readonly dropped: number;
  /** Next event, or null when `timeoutMs` passes quietly or the subscription closes. */
  next(timeoutMs: number): Promise<PlaybackEvent | null>;
  close(): void;
}

export type BroadcasterStats = {
  subscribers: number;
  published: number;
  dropped: number;
};

class MailboxSubscription implements EventSubscription {
  public dropped = 0;
  private readonly mailbox: Mailbox<PlaybackEvent>;

  constructor(
    public readonly id: number,
    capacity: number,
    private readonly onClose: (id: number) => void,
  ) {
    this.mailbox = new Mailbox<PlaybackEvent>({ capacity });
  }

  public get closed(): boolean {
    return this.mailbox.isClosed;
  }

  public deliver(event: PlaybackEvent): boolean {
    if (this.mailbox.offer(event)) {
      return true;
    }
    this.dropped += 1;
    return false;
  }

  public next(timeoutMs: number): Promise<PlaybackEvent | null> {
    return this.mailbox.take(timeoutMs);
  }

  public close(): void {
    if (this.mailbox.isClosed) {
      return;
    }
    this.mailbox.close();
    this.onClose(this.id);
  }
}

/**
 * Fans playback events out to live subscribers. Each subscriber owns a
 * bounded mailbox; when it is full the event is dropped for that
 * subscriber only, so publishing never waits.
 */
export class EventBroadcaster {
  private readonly log = createLogger('Events', 'Broadcaster');
  private readonly subscribers = new Map<number, MailboxSubscription>();
  private nextId = 1;
  private published = 0;
  private dropped = 0;

  constructor(private readonly mailboxSize = 64) {}

  public subscribe(initial?: PlaybackEvent): EventSubscription {
    const subscription = new MailboxSubscription(this.nextId, this.mailboxSize, (id) => {
      this.subscribers.delete(id);
      this.log.debug('subscriber left', { id, subscribers: this.subscribers.size });
    });
    this.nextId += 1;
    if (initial) {
      subscription.deliver(initial);
    }
    this.subscribers.set(subscription.id, subscription);
    this.log.debug('subscriber joined', { id: subscription.id, subscribers: this.subscribers.size });
    return subscription;
  }

  public publish(event: PlaybackEvent): void {
    this.published += 1;
    for (const subscription of this.subscribers.values()) {
      if (!subscription.deliver(event)) {
        this.dropped += 1;
        this.log.debug('event dropped for slow subscriber', {
          id: subscription.id,
          type: event.type,
          dropped: subscription.dropped,
        });
      }
    }
  }

  public getStats(): BroadcasterStats {
    return {
      subscribers: this.subscribers.size,
      published: this.published,
      dropped: this.dropped,
    };
  }

  /** Closes every subscription; waiting readers receive null. */
  public close(): void {
    for (const subscription of [...this.subscribers.values()]) {
      subscription.close();
    }
  }
}
