import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, WebSocket } from 'ws';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { PlaybackEvent } from '@/domain/playback/notifications';
import type { EventBroadcaster, EventSubscription } from '@/adapters/events/eventBroadcaster';

export type WsGatewayOptions = {
  broadcaster: EventBroadcaster;
  snapshot: () => PlaybackEvent;
  keepaliveMs: number;
};

const WS_PATH = '/ws';

/**
 * WebSocket stream of playback notifications; each frame is
 * `{"event": type, "data": payload}`. Quiet periods send a ping.
 */
export class WsGateway {
  private readonly log = createLogger('Http', 'Ws');
  private readonly wsServer = new WebSocketServer({ noServer: true });
  private readonly sessions = new Map<EventSubscription, Promise<void>>();

  constructor(private readonly options: WsGatewayOptions) {
    this.wsServer.on('connection', (socket) => {
      this.attach(socket);
    });
  }

  public handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const path = (request.url ?? '').split('?')[0];
    if (path !== WS_PATH) {
      return false;
    }
    this.wsServer.handleUpgrade(request, socket, head, (ws) => {
      this.wsServer.emit('connection', ws, request);
    });
    return true;
  }

  public async close(): Promise<void> {
    const pending = [...this.sessions.entries()];
    for (const [subscription] of pending) {
      subscription.close();
    }
    // A frame stuck behind a slow client would hold its session open.
    for (const client of this.wsServer.clients) {
      if (client.bufferedAmount > 0) {
        client.terminate();
      }
    }
    await Promise.all(pending.map(([, session]) => session));
    for (const client of this.wsServer.clients) {
      client.terminate();
    }
    this.wsServer.close();
  }

  /** Streams events to an accepted socket until either side closes. */
  public attach(socket: WebSocket): void {
    const subscription = this.options.broadcaster.subscribe(this.options.snapshot());
    this.log.debug('ws client connected', { id: subscription.id });

    socket.on('close', () => {
      subscription.close();
    });
    socket.on('error', (error) => {
      this.log.warn('ws client error', { id: subscription.id, message: errorMessage(error) });
      subscription.close();
    });

    const session = this.pump(subscription, socket).finally(() => {
      this.sessions.delete(subscription);
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1001, 'server-shutdown');
      }
    });
    this.sessions.set(subscription, session);
  }

  private async pump(subscription: EventSubscription, socket: WebSocket): Promise<void> {
    try {
      while (!subscription.closed && socket.readyState === WebSocket.OPEN) {
        const event = await subscription.next(this.options.keepaliveMs);
        if (socket.readyState !== WebSocket.OPEN) {
          break;
        }
        if (event) {
          // Next event is taken only once this frame has left the socket buffer.
          await sendFrame(socket, JSON.stringify({ event: event.type, data: event.data }));
        } else if (!subscription.closed) {
          socket.ping();
        }
      }
    } catch (error) {
      this.log.warn('ws stream failed', { id: subscription.id, message: errorMessage(error) });
      subscription.close();
    }
    this.log.debug('ws client disconnected', { id: subscription.id, dropped: subscription.dropped });
  }
}

function sendFrame(socket: WebSocket, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(data, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
