import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type {
  PlaybackEvent,
  QueueNotification,
  StateNotification,
  TrackNotification,
  VolumeNotification,
} from '@/domain/playback/notifications';
import type { PlaybackHooks } from '@/ports/PlaybackHooksPort';
import type { EventBroadcaster } from '@/adapters/events/eventBroadcaster';

/**
 * Fills the controller's hook slots by publishing to the broadcaster.
 */
export class BroadcastNotifier implements PlaybackHooks {
  private readonly log = createLogger('Events', 'Notifier');

  constructor(private readonly broadcaster: EventBroadcaster) {}

  public trackChanged(payload: TrackNotification): void {
    this.emit({ type: 'track', data: payload }, { title: payload.title });
  }

  public queueChanged(payload: QueueNotification): void {
    this.emit({ type: 'queue', data: payload }, { queueDepth: payload.queueDepth });
  }

  public stateChanged(payload: StateNotification): void {
    this.emit({ type: 'state', data: payload }, { state: payload.state });
  }

  public volumeChanged(payload: VolumeNotification): void {
    this.emit({ type: 'volume', data: payload }, { volume: payload.volume });
  }

  private emit(event: PlaybackEvent, context?: Record<string, unknown>): void {
    try {
      this.broadcaster.publish(event);
      this.log.spam(`${event.type} broadcast`, context);
    } catch (error) {
      this.log.warn(`${event.type} broadcast failed`, { ...context, message: errorMessage(error) });
    }
  }
}
