import type { PlaybackSnapshot, Track, TransportState } from '@/domain/playback/types';

export interface TrackNotification {
  title: string;
  artist: string;
  album: string;
  duration: string;
  albumArt: string;
  position: string;
}

export interface QueueNotification {
  queueDepth: number;
}

export interface StateNotification {
  state: TransportState;
  repeat: boolean;
  shuffle: boolean;
}

export interface VolumeNotification {
  volume: number;
}

export interface SnapshotNotification extends StateNotification {
  volume: number;
  queueDepth: number;
  track: TrackNotification;
}

// Tracks always start from the top; the device is never asked for a position.
const START_POSITION = '0:00:00';

export function toTrackNotification(track: Track | null): TrackNotification {
  return {
    title: track?.title ?? '',
    artist: track?.artist ?? '',
    album: track?.album ?? '',
    duration: track?.duration ?? '',
    albumArt: track?.albumArtUri ?? '',
    position: START_POSITION,
  };
}

export function toSnapshotNotification(snapshot: PlaybackSnapshot): SnapshotNotification {
  return {
    state: snapshot.state,
    repeat: snapshot.repeat,
    shuffle: snapshot.shuffle,
    volume: snapshot.volume,
    queueDepth: snapshot.queueDepth,
    track: toTrackNotification(snapshot.nowPlaying),
  };
}

export type PlaybackEvent =
  | { type: 'track'; data: TrackNotification }
  | { type: 'queue'; data: QueueNotification }
  | { type: 'state'; data: StateNotification }
  | { type: 'volume'; data: VolumeNotification }
  | { type: 'snapshot'; data: SnapshotNotification };
