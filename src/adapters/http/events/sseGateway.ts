import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { PlaybackEvent } from '@/domain/playback/notifications';
import type { EventBroadcaster, EventSubscription } from '@/adapters/events/eventBroadcaster';

export type SseGatewayOptions = {
  broadcaster: EventBroadcaster;
  /** Event written first on every new stream. */
  snapshot: () => PlaybackEvent;
  keepaliveMs: number;
};

const SSE_PATH = '/events';

export function formatSseEvent(event: PlaybackEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

/**
 * Server-sent events stream of playback notifications.
 */
export class SseGateway {
  private readonly log = createLogger('Http', 'Sse');
  private readonly streams = new Map<EventSubscription, { pump: Promise<void>; res: ServerResponse }>();

  constructor(private readonly options: SseGatewayOptions) {}

  public matches(pathname: string): boolean {
    return pathname === SSE_PATH;
  }

  public get connectionCount(): number {
    return this.streams.size;
  }

  public handle(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders?.();

    const subscription = this.options.broadcaster.subscribe(this.options.snapshot());
    const cleanup = () => {
      subscription.close();
    };
    req.on('close', cleanup);
    req.on('error', cleanup);

    const pump = this.pump(subscription, res).finally(() => {
      this.streams.delete(subscription);
      req.off('close', cleanup);
      req.off('error', cleanup);
      if (!res.writableEnded) {
        res.end();
      }
    });
    this.streams.set(subscription, { pump, res });
    this.log.debug('sse client connected', { id: subscription.id });
  }

  /** Ends every open stream; streams stuck behind a full socket are destroyed. */
  public async close(): Promise<void> {
    const pending = [...this.streams.entries()];
    for (const [subscription, { res }] of pending) {
      subscription.close();
      if (res.writableNeedDrain) {
        res.destroy();
      }
    }
    await Promise.all(pending.map(([, { pump }]) => pump));
  }

  private async pump(subscription: EventSubscription, res: ServerResponse): Promise<void> {
    try {
      while (!subscription.closed && !res.writableEnded && !res.destroyed) {
        const event = await subscription.next(this.options.keepaliveMs);
        if (res.writableEnded || res.destroyed) {
          break;
        }
        let flushed = true;
        if (event) {
          flushed = res.write(formatSseEvent(event));
        } else if (!subscription.closed) {
          flushed = res.write(': keep-alive\n\n');
        }
        // Events queue up in the mailbox, not the socket, until the client catches up.
        if (!flushed) {
          await waitForDrain(res);
        }
      }
    } catch (error) {
      this.log.warn('sse stream failed', { id: subscription.id, message: errorMessage(error) });
      subscription.close();
    }
    this.log.debug('sse client disconnected', { id: subscription.id, dropped: subscription.dropped });
  }
}

function waitForDrain(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      res.off('error', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
    res.on('error', done);
  });
}
