import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { encodeMediaPath } from '@/shared/utils/net';
import { createTrack, type Track } from '@/domain/playback/types';
import type { AlbumSummary, CatalogPort } from '@/ports/CatalogPort';
import type { StoragePort } from '@/ports/StoragePort';

type RawRecord = Record<string, unknown>;

interface CatalogSong {
  title: string;
  artist?: string;
  duration?: string;
  mediaPath: string;
  key?: string;
}

interface CatalogAlbum {
  id: string;
  title: string;
  artist: string;
  key?: string;
  songs: CatalogSong[];
}

export type JsonCatalogOptions = {
  storage: StoragePort;
  catalogPath: string;
  media: { host: string; port: number; path: string };
};

/**
 * Read-only catalog loaded from a JSON export of the music library.
 *
 * File shape: `{ albums: { [id]: { title, artist, key?, tracks: { [n]: { song,
 * artist?, length?, path, key? } } } } }` where `path` is a string or a list
 * whose first entry is used.
 */
export class JsonCatalog implements CatalogPort {
  private readonly log = createLogger('Catalog');
  private albums = new Map<string, CatalogAlbum>();
  private songIndex = new Map<string, { albumId: string; song: CatalogSong }>();
  private albumArt = new Map<string, string>();

  constructor(private readonly options: JsonCatalogOptions) {}

  public get albumCount(): number {
    return this.albums.size;
  }

  public async load(): Promise<void> {
    const raw = await this.options.storage.readJson(this.options.catalogPath, null);
    const albums = parseCatalog(raw);
    if (raw === null) {
      this.log.warn('catalog missing or unreadable; starting empty', { path: this.options.catalogPath });
    }

    const songIndex = new Map<string, { albumId: string; song: CatalogSong }>();
    const albumArt = new Map<string, string>();
    for (const album of albums.values()) {
      for (const song of album.songs) {
        if (song.key) {
          songIndex.set(song.key, { albumId: album.id, song });
        }
      }
      if (album.key && !albumArt.has(album.key)) {
        const artFile = path.join(this.options.media.path, 'album-art', `${album.key}.png`);
        if (await this.options.storage.exists(artFile)) {
          albumArt.set(album.key, `${this.mediaBaseUrl()}/album-art/${encodeURIComponent(album.key)}.png`);
        }
      }
    }

    this.albums = albums;
    this.songIndex = songIndex;
    this.albumArt = albumArt;
    this.log.info('catalog loaded', { albums: albums.size, songs: songIndex.size });
  }

  public async getAlbumTracks(albumId: string): Promise<Track[] | null> {
    const album = this.albums.get(albumId);
    if (!album) {
      return null;
    }
    return album.songs.map((song) => this.buildTrack(album, song));
  }

  public async getSongByKey(songKey: string): Promise<Track | null> {
    const entry = this.songIndex.get(songKey);
    const album = entry ? this.albums.get(entry.albumId) : undefined;
    if (!entry || !album) {
      return null;
    }
    return this.buildTrack(album, entry.song);
  }

  public async listAlbums(): Promise<AlbumSummary[]> {
    return [...this.albums.values()].map((album) => ({
      id: album.id,
      title: album.title,
      artist: album.artist,
      trackCount: album.songs.length,
    }));
  }

  private buildTrack(album: CatalogAlbum, song: CatalogSong): Track {
    return createTrack({
      title: song.title,
      artist: song.artist ?? album.artist,
      album: album.title,
      albumArtist: album.artist,
      duration: song.duration,
      uri: `${this.mediaBaseUrl()}${encodeMediaPath(song.mediaPath)}`,
      albumArtUri: album.key ? this.albumArt.get(album.key) ?? null : null,
      albumKey: album.key,
      songKey: song.key,
    });
  }

  private mediaBaseUrl(): string {
    return `http://${this.options.media.host}:${this.options.media.port}`;
  }
}

function parseCatalog(raw: unknown): Map<string, CatalogAlbum> {
  const albums = new Map<string, CatalogAlbum>();
  if (!isRecord(raw) || !isRecord(raw.albums)) {
    return albums;
  }
  for (const [id, value] of Object.entries(raw.albums)) {
    if (!isRecord(value)) {
      continue;
    }
    albums.set(id, {
      id,
      title: readString(value.title) ?? 'Unknown',
      artist: readString(value.artist) ?? 'Unknown',
      key: readString(value.key),
      songs: parseSongs(value.tracks),
    });
  }
  return albums;
}

function parseSongs(raw: unknown): CatalogSong[] {
  if (!isRecord(raw)) {
    return [];
  }
  const songs: CatalogSong[] = [];
  const entries = Object.entries(raw).sort(([left], [right]) => compareTrackNumbers(left, right));
  for (const [, value] of entries) {
    if (!isRecord(value)) {
      continue;
    }
    const mediaPath = readMediaPath(value.path);
    if (!mediaPath) {
      continue;
    }
    songs.push({
      title: readString(value.song) ?? 'Unknown',
      artist: readString(value.artist),
      duration: readString(value.length),
      mediaPath,
      key: readString(value.key),
    });
  }
  return songs;
}

function compareTrackNumbers(left: string, right: string): number {
  const a = Number(left);
  const b = Number(right);
  if (Number.isFinite(a) && Number.isFinite(b)) {
    return a - b;
  }
  return left.localeCompare(right);
}

function readMediaPath(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return readString(value[0]);
  }
  return readString(value);
}

function readString(value: unknown): string | undefined {
  if (typeof value === 'number') {
    return String(value);
  }
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
