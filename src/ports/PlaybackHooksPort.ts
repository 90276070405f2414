import type {
  QueueNotification,
  StateNotification,
  TrackNotification,
  VolumeNotification,
} from '@/domain/playback/notifications';

/**
 * Observer slots fired synchronously on the dispatch loop after each
 * committed mutation. Implementations must not block.
 */
export interface PlaybackHooks {
  trackChanged(payload: TrackNotification): void;
  queueChanged(payload: QueueNotification): void;
  stateChanged(payload: StateNotification): void;
  volumeChanged(payload: VolumeNotification): void;
}

export type PlaybackHookName = keyof PlaybackHooks;
