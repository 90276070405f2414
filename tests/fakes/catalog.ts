import type { Track } from '../../src/domain/playback/types';
import type { AlbumSummary, CatalogPort } from '../../src/ports/CatalogPort';

export class FakeCatalog implements CatalogPort {
  public readonly albums = new Map<string, Track[]>();
  public readonly songs = new Map<string, Track>();
  public failure: Error | null = null;

  public async getAlbumTracks(albumId: string): Promise<Track[] | null> {
    if (this.failure) {
      throw this.failure;
    }
    return this.albums.get(albumId) ?? null;
  }

  public async getSongByKey(songKey: string): Promise<Track | null> {
    if (this.failure) {
      throw this.failure;
    }
    return this.songs.get(songKey) ?? null;
  }

  public async listAlbums(): Promise<AlbumSummary[]> {
    return [...this.albums.entries()].map(([id, tracks]) => ({
      id,
      title: tracks[0]?.album ?? '',
      artist: tracks[0]?.artist ?? '',
      trackCount: tracks.length,
    }));
  }
}
