import { createLogger } from '@/shared/logging/logger';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { CommandType, createCommand } from '@/domain/playback/commands';
import { TransportState, type PlaybackSnapshot } from '@/domain/playback/types';
import { ObservedTransportState, type DeviceDriverPort } from '@/ports/DeviceDriverPort';
import type { CommandQueue } from '@/application/playback/commandQueue';

/**
 * What the monitor needs from the controller: a state copy and the bound driver.
 */
export interface MonitoredPlayback {
  getSnapshot(): PlaybackSnapshot;
  currentDevice(): DeviceDriverPort;
}

export type PollOutcome =
  | 'intent-not-playing'
  | 'correction-pending'
  | 'poll-failed'
  | 'state-unknown'
  | 'steady'
  | 'idle-queue'
  | 'foreign-playback'
  | 'track-ended'
  | 'enqueue-failed';

export type ReconciliationMonitorOptions = {
  playback: MonitoredPlayback;
  queue: CommandQueue;
  pollIntervalMs?: number;
  errorBackoffMs?: number;
  enqueueTimeoutMs?: number;
};

/**
 * Polls the renderer and feeds corrective `_TRACK_ENDED` commands back into
 * the command queue. It never touches controller state directly.
 */
export class ReconciliationMonitor {
  private readonly log = createLogger('Playback', 'Monitor');
  private readonly playback: MonitoredPlayback;
  private readonly queue: CommandQueue;
  private readonly pollIntervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly enqueueTimeoutMs: number;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private tick: Promise<void> | null = null;
  private correctionPending = false;
  private wasPlaying = false;
  private observedGeneration = -1;

  constructor(options: ReconciliationMonitorOptions) {
    this.playback = options.playback;
    this.queue = options.queue;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.errorBackoffMs = options.errorBackoffMs ?? 5000;
    this.enqueueTimeoutMs = options.enqueueTimeoutMs ?? 0;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(this.pollIntervalMs);
    this.log.info('reconciliation monitor started', { pollIntervalMs: this.pollIntervalMs });
  }

  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.tick) {
      await this.tick;
    }
    this.log.info('reconciliation monitor stopped');
  }

  /**
   * One observation of the renderer. Safe to call directly when the loop is stopped.
   */
  public async pollOnce(): Promise<PollOutcome> {
    const snapshot = this.playback.getSnapshot();
    if (snapshot.trackGeneration !== this.observedGeneration) {
      this.observedGeneration = snapshot.trackGeneration;
      this.wasPlaying = false;
    }
    if (snapshot.state !== TransportState.Playing) {
      this.wasPlaying = false;
      return 'intent-not-playing';
    }
    if (this.correctionPending) {
      return 'correction-pending';
    }

    const driver = this.playback.currentDevice();
    let observed: ObservedTransportState;
    try {
      observed = await driver.getTransportState();
    } catch (error) {
      this.log.debug('transport poll failed', { device: driver.target, message: errorMessage(error) });
      return 'poll-failed';
    }
    this.log.spam('transport polled', { observed, intent: snapshot.state });
    if (observed === ObservedTransportState.Unknown) {
      return 'state-unknown';
    }

    const devicePlaying =
      observed === ObservedTransportState.Playing || observed === ObservedTransportState.Transitioning;
    const wasPlaying = this.wasPlaying;
    this.wasPlaying = devicePlaying;
    const idleWithQueue = snapshot.queueDepth > 0 && snapshot.nowPlaying === null;

    // Stamped so the signal goes stale once a track starts ahead of it.
    if (idleWithQueue && !devicePlaying) {
      return this.signalTrackEnded('idle-queue', snapshot.trackGeneration);
    }
    if (idleWithQueue) {
      this.log.info('renderer busy with a foreign source; reclaiming', { device: driver.target });
      await bestEffort(() => driver.stop(), {
        fallback: undefined,
        onError: 'debug',
        log: this.log,
        label: 'foreign playback stop failed',
      });
      return this.signalTrackEnded('foreign-playback', snapshot.trackGeneration);
    }
    if (wasPlaying && !devicePlaying) {
      return this.signalTrackEnded('track-ended', snapshot.trackGeneration);
    }
    return 'steady';
  }

  private async signalTrackEnded(
    reason: 'idle-queue' | 'foreign-playback' | 'track-ended',
    generation: number,
  ): Promise<PollOutcome> {
    this.correctionPending = true;
    const command = createCommand(CommandType.TrackEnded, { generation }, () => {
      this.correctionPending = false;
    });
    try {
      await this.queue.put(command, this.enqueueTimeoutMs);
    } catch (error) {
      this.correctionPending = false;
      this.log.warn('track end signal not queued', { reason, message: errorMessage(error) });
      return 'enqueue-failed';
    }
    this.log.debug('track end signalled', { reason, generation });
    return reason;
  }

  private schedule(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick = this.runTick();
    }, delayMs);
  }

  /**
   * Device errors keep the regular interval; only a crash of the poll itself backs off.
   */
  private async runTick(): Promise<void> {
    let delayMs = this.pollIntervalMs;
    try {
      await this.pollOnce();
    } catch (error) {
      this.log.warn('monitor poll crashed', { message: errorMessage(error) });
      delayMs = this.errorBackoffMs;
    }
    this.tick = null;
    this.schedule(delayMs);
  }
}
