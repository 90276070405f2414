import type { Track } from '@/domain/playback/types';

export interface AlbumSummary {
  id: string;
  title: string;
  artist: string;
  trackCount: number;
}

/**
 * Read-only view of the media catalog.
 */
export interface CatalogPort {
  /** Tracks of an album in catalog order, or null when the id is unknown. */
  getAlbumTracks(albumId: string): Promise<Track[] | null>;
  getSongByKey(songKey: string): Promise<Track | null>;
  listAlbums(): Promise<AlbumSummary[]>;
}
