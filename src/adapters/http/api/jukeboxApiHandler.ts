import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { createTrack, type Track } from '@/domain/playback/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import type { PlaybackFacade } from '@/application/playback/playbackFacade';
import { CommandQueueFullError } from '@/application/playback/commandQueue';
import { isRecord, readJsonBody, sendJson } from '@/adapters/http/utils/json';

type RouteHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void> | void;

type Route = {
  method: 'GET' | 'POST' | 'PUT';
  pattern: RegExp;
  handler: RouteHandler;
};

export type JukeboxApiOptions = {
  facade: PlaybackFacade;
  catalog: CatalogPort;
  /** Extra counters merged into GET /api/stats. */
  extraStats?: () => Record<string, unknown>;
  maxBodyBytes?: number;
};

class RequestValidationError extends Error {
  constructor(public readonly code: string) {
    super(code);
    this.name = 'RequestValidationError';
  }
}

const API_PREFIX = '/api';

/**
 * JSON API over the playback facade. Reads answer 200 with a snapshot;
 * writes enqueue a command and answer 202 without waiting for it to run.
 */
export class JukeboxApiHandler {
  private readonly log = createLogger('Http', 'Api');
  private readonly routes: Route[];

  constructor(private readonly options: JukeboxApiOptions) {
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return this.normalizeApiPath(pathname) !== null;
  }

  public async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = this.normalizeApiPath(req.url ?? '/');
    if (!pathname) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const method = (req.method ?? 'GET').toUpperCase();
    const candidates = this.routes.filter((route) => route.pattern.test(pathname));
    if (candidates.length === 0) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const route = candidates.find((candidate) => candidate.method === method);
    if (!route) {
      sendJson(res, 405, { error: 'method-not-allowed' });
      return;
    }

    try {
      await route.handler(req, res);
    } catch (error) {
      this.handleError(res, error, method, pathname);
    }
  }

  private handleError(res: ServerResponse, error: unknown, method: string, pathname: string): void {
    if (res.writableEnded) {
      return;
    }
    if (error instanceof RequestValidationError) {
      sendJson(res, 400, { error: error.code });
      return;
    }
    if (error instanceof CommandQueueFullError) {
      this.log.warn('command rejected; queue full', { method, pathname, capacity: error.capacity });
      sendJson(res, 503, { error: error.code });
      return;
    }
    this.log.error('api request failed', { method, pathname, message: errorMessage(error) });
    sendJson(res, 500, { error: 'api-error' });
  }

  private normalizeApiPath(url: string): string | null {
    const raw = (url.split('?')[0] ?? '').trim() || '/';
    if (raw !== API_PREFIX && !raw.startsWith(`${API_PREFIX}/`)) {
      return null;
    }
    const trimmed = raw.slice(API_PREFIX.length).replace(/\/+$/, '');
    return trimmed || '/';
  }

  private buildRoutes(): Route[] {
    const { facade } = this.options;
    return [
      { method: 'GET', pattern: /^\/state$/, handler: (_req, res) => this.handleState(res) },
      {
        method: 'GET',
        pattern: /^\/queue$/,
        handler: (_req, res) => sendJson(res, 200, { tracks: facade.getQueue() }),
      },
      {
        method: 'GET',
        pattern: /^\/playing$/,
        handler: (_req, res) => sendJson(res, 200, { track: facade.getPlaying() }),
      },
      { method: 'GET', pattern: /^\/stats$/, handler: (_req, res) => this.handleStats(res) },
      {
        method: 'GET',
        pattern: /^\/albums$/,
        handler: async (_req, res) => sendJson(res, 200, { albums: await this.options.catalog.listAlbums() }),
      },
      { method: 'POST', pattern: /^\/play$/, handler: (_req, res) => this.accept(res, facade.enqueuePlay()) },
      { method: 'POST', pattern: /^\/pause$/, handler: (_req, res) => this.accept(res, facade.enqueuePause()) },
      { method: 'POST', pattern: /^\/stop$/, handler: (_req, res) => this.accept(res, facade.enqueueStop()) },
      { method: 'POST', pattern: /^\/next$/, handler: (_req, res) => this.accept(res, facade.enqueueNext()) },
      { method: 'POST', pattern: /^\/prev$/, handler: (_req, res) => this.accept(res, facade.enqueuePrev()) },
      {
        method: 'POST',
        pattern: /^\/volume\/up$/,
        handler: (_req, res) => this.accept(res, facade.enqueueVolumeUp()),
      },
      {
        method: 'POST',
        pattern: /^\/volume\/down$/,
        handler: (_req, res) => this.accept(res, facade.enqueueVolumeDown()),
      },
      { method: 'POST', pattern: /^\/volume$/, handler: (req, res) => this.handleSetVolume(req, res) },
      {
        method: 'POST',
        pattern: /^\/repeat\/toggle$/,
        handler: (_req, res) => this.accept(res, facade.enqueueToggleRepeat()),
      },
      {
        method: 'POST',
        pattern: /^\/shuffle\/toggle$/,
        handler: (_req, res) => this.accept(res, facade.enqueueToggleShuffle()),
      },
      {
        method: 'POST',
        pattern: /^\/queue\/clear$/,
        handler: (_req, res) => this.accept(res, facade.enqueueClearQueue()),
      },
      { method: 'PUT', pattern: /^\/queue$/, handler: (req, res) => this.handleReplaceQueue(req, res) },
      { method: 'POST', pattern: /^\/queue\/songs$/, handler: (req, res) => this.handleAddSongs(req, res) },
      { method: 'POST', pattern: /^\/queue\/album$/, handler: (req, res) => this.handleAddAlbum(req, res) },
      {
        method: 'POST',
        pattern: /^\/queue\/playlist$/,
        handler: (req, res) => this.handleAddPlaylist(req, res),
      },
      { method: 'POST', pattern: /^\/zone$/, handler: (req, res) => this.handleSwitchZone(req, res) },
    ];
  }

  private handleState(res: ServerResponse): void {
    sendJson(res, 200, this.options.facade.getState());
  }

  private handleStats(res: ServerResponse): void {
    sendJson(res, 200, {
      ...this.options.facade.getStats(),
      ...(this.options.extraStats?.() ?? {}),
    });
  }

  private async accept(res: ServerResponse, enqueued: Promise<void>): Promise<void> {
    await enqueued;
    sendJson(res, 202, { status: 'queued' });
  }

  private async handleSetVolume(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const volume = body.volume;
    if (typeof volume !== 'number' || !Number.isFinite(volume)) {
      throw new RequestValidationError('invalid-volume');
    }
    await this.accept(res, this.options.facade.enqueueSetVolume(volume));
  }

  private async handleReplaceQueue(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const tracks = parseTracks(body.tracks);
    await this.accept(res, this.options.facade.replaceQueue(tracks));
  }

  private async handleAddSongs(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const { facade } = this.options;
    if (body.songKeys !== undefined) {
      const keys = parseStringList(body.songKeys, 'invalid-song-keys');
      await this.accept(res, facade.enqueueAddSongKeys(keys));
      return;
    }
    const tracks = parseTracks(body.tracks);
    if (tracks.length === 0) {
      throw new RequestValidationError('invalid-tracks');
    }
    await this.accept(res, facade.enqueueAddSongs(tracks));
  }

  private async handleAddAlbum(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const albumId = readId(body.albumId);
    if (!albumId) {
      throw new RequestValidationError('invalid-album-id');
    }
    await this.accept(res, this.options.facade.enqueueAddAlbum(albumId));
  }

  private async handleAddPlaylist(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const name = typeof body.name === 'string' && body.name.trim() ? body.name.trim() : 'playlist';
    const tracks = parseTracks(body.tracks);
    if (tracks.length === 0) {
      throw new RequestValidationError('invalid-tracks');
    }
    await this.accept(res, this.options.facade.enqueueAddPlaylist(name, tracks));
  }

  private async handleSwitchZone(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) return;
    const host = typeof body.host === 'string' ? body.host.trim() : '';
    if (!host) {
      throw new RequestValidationError('invalid-host');
    }
    await this.accept(res, this.options.facade.enqueueSwitchZone(host));
  }

  /**
   * Null when the body helper already answered, or the body is not an object.
   */
  private async readBody(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<Record<string, unknown> | null> {
    const body = await readJsonBody(req, res, this.options.maxBodyBytes);
    if (res.writableEnded) {
      return null;
    }
    if (!isRecord(body)) {
      throw new RequestValidationError('invalid-body');
    }
    return body;
  }
}

export function parseTracks(value: unknown): Track[] {
  if (!Array.isArray(value)) {
    throw new RequestValidationError('invalid-tracks');
  }
  return value.map((entry) => {
    if (!isRecord(entry) || typeof entry.uri !== 'string' || !entry.uri.trim()) {
      throw new RequestValidationError('invalid-track');
    }
    return createTrack({
      title: optionalString(entry.title),
      artist: optionalString(entry.artist),
      album: optionalString(entry.album),
      duration: optionalString(entry.duration),
      uri: entry.uri.trim(),
      albumArtUri: optionalString(entry.albumArt) ?? null,
    });
  });
}

function parseStringList(value: unknown, code: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new RequestValidationError(code);
  }
  return value.map((entry) => {
    const id = readId(entry);
    if (!id) {
      throw new RequestValidationError(code);
    }
    return id;
  });
}

function readId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
