/**
 * Intended transport phase as tracked by the playback controller.
 */
export enum TransportState {
  Stopped = 'STOPPED',
  Playing = 'PLAYING',
  Paused = 'PAUSED',
}

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;

/**
 * Immutable playable unit. Build it with `createTrack`.
 */
export interface Track {
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly albumArtist?: string;
  /** Display length as stored in the catalog, e.g. `3:42`. */
  readonly duration: string;
  readonly uri: string;
  readonly albumArtUri: string | null;
  readonly albumKey?: string;
  readonly songKey?: string;
}

export type TrackInit = {
  title?: string;
  artist?: string;
  album?: string;
  albumArtist?: string;
  duration?: string;
  uri: string;
  albumArtUri?: string | null;
  albumKey?: string;
  songKey?: string;
};

export function createTrack(init: TrackInit): Track {
  const track: Track = {
    title: init.title ?? 'Unknown',
    artist: init.artist ?? 'Unknown',
    album: init.album ?? 'Unknown',
    duration: init.duration ?? '0:00',
    uri: init.uri,
    albumArtUri: init.albumArtUri ?? null,
    ...(init.albumArtist !== undefined ? { albumArtist: init.albumArtist } : {}),
    ...(init.albumKey !== undefined ? { albumKey: init.albumKey } : {}),
    ...(init.songKey !== undefined ? { songKey: init.songKey } : {}),
  };
  return Object.freeze(track);
}

export function clampVolume(volume: number): number {
  return Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, Math.round(volume)));
}

export interface CommandQueueStats {
  readonly totalEnqueued: number;
  readonly pending: number;
  readonly processed: number;
  readonly errors: number;
}

export interface ControllerStats {
  readonly commandsProcessed: number;
  readonly errors: number;
  readonly songsPlayed: number;
  readonly autoPlays: number;
  readonly queue: CommandQueueStats;
}

/**
 * Point-in-time copy of controller state for readers outside the dispatch loop.
 */
export interface PlaybackSnapshot {
  readonly state: TransportState;
  readonly repeat: boolean;
  readonly shuffle: boolean;
  readonly volume: number;
  readonly queueDepth: number;
  readonly nowPlaying: Track | null;
  readonly device: string;
  readonly trackGeneration: number;
}
