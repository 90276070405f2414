import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { HttpServerConfig } from '@/config/http';
import type { JukeboxApiHandler } from '@/adapters/http/api/jukeboxApiHandler';
import type { SseGateway } from '@/adapters/http/events/sseGateway';
import type { WsGateway } from '@/adapters/http/events/wsGateway';
import { sendJson } from '@/adapters/http/utils/json';

/**
 * Hosts the public HTTP gateway: JSON API, SSE stream and WebSocket stream.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private server?: http.Server;

  constructor(
    private readonly config: HttpServerConfig,
    private readonly handlers: {
      api: JukeboxApiHandler;
      sse: SseGateway;
      ws: WsGateway;
    },
  ) {}

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        this.log.error('http request failed', { message: errorMessage(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'http-internal-error' });
        } else {
          res.end();
        }
      });
    });

    server.on('upgrade', (req, socket, head) => {
      this.handleUpgrade(req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      server
        .listen(this.config.port, this.config.host, () => {
          this.log.info('http gateway listening', {
            port: this.config.port,
            host: this.config.host,
          });
          resolve();
        })
        .on('error', reject);
    });
    this.server = server;
  }

  public async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    await this.handlers.sse.close();
    await this.handlers.ws.close();
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  public async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = this.normalizePath(req.url ?? '/');

    if (this.handlers.api.matches(pathname)) {
      await this.handlers.api.handle(req, res);
      return;
    }

    if (this.handlers.sse.matches(pathname) && req.method === 'GET') {
      this.handlers.sse.handle(req, res);
      return;
    }

    if (pathname === '/ws') {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end('Upgrade Required');
      return;
    }

    sendJson(res, 404, { error: 'not-found' });
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.handlers.ws.handleUpgrade(req, socket, head)) {
      return;
    }
    socket.destroy();
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Cache-Control', 'no-cache');
  }

  private normalizePath(url: string): string {
    const [path] = url.split('?');
    try {
      return decodeURIComponent(path || '/');
    } catch {
      return path || '/';
    }
  }
}
