import { createLogger } from '@/shared/logging/logger';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import {
  CommandType,
  isInternalCommand,
  type AddSongPayload,
  type Command,
  type CommandPayloads,
  type CommandResult,
} from '@/domain/playback/commands';
import {
  TransportState,
  clampVolume,
  type ControllerStats,
  type PlaybackSnapshot,
  type Track,
} from '@/domain/playback/types';
import { toTrackNotification } from '@/domain/playback/notifications';
import type { DeviceDriverFactory, DeviceDriverPort } from '@/ports/DeviceDriverPort';
import type { CatalogPort } from '@/ports/CatalogPort';
import type { PlaybackHookName, PlaybackHooks } from '@/ports/PlaybackHooksPort';
import type { CommandQueue } from '@/application/playback/commandQueue';

type CommittedView = {
  snapshot: PlaybackSnapshot;
  queue: readonly Track[];
};

type CommandHandlers = {
  [K in CommandType]: (payload: Readonly<CommandPayloads[K]>) => Promise<void>;
};

function runHandler<K extends CommandType>(
  handlers: CommandHandlers,
  type: K,
  payload: Readonly<CommandPayloads[K]>,
): Promise<void> {
  return handlers[type](payload);
}

export type PlaybackControllerOptions = {
  driver: DeviceDriverPort;
  /** Builds drivers for SWITCH_ZONE; without it zone switches fail. */
  driverFactory?: DeviceDriverFactory;
  catalog: CatalogPort;
  queue: CommandQueue;
  dequeueTimeoutMs?: number;
  volumeStep?: number;
  initialVolume?: number;
};

/**
 * Single writer of playback state.
 *
 * A dispatch loop takes commands off the queue and runs each one to
 * completion, device calls included, before taking the next. Nothing else
 * mutates the queue, the transport intent or the bound device driver.
 * Observers are told about committed changes through four synchronous hooks.
 */
export class PlaybackController {
  private readonly log = createLogger('Playback', 'Controller');
  private readonly queue: CommandQueue;
  private readonly catalog: CatalogPort;
  private readonly driverFactory?: DeviceDriverFactory;
  private readonly dequeueTimeoutMs: number;
  private readonly volumeStep: number;
  private readonly hooks: Partial<PlaybackHooks> = {};
  private driver: DeviceDriverPort;

  private tracks: Track[] = [];
  private nowPlaying: Track | null = null;
  private transportState = TransportState.Stopped;
  private repeat = false;
  private shuffle = false;
  private volume: number;
  private trackGeneration = 0;

  private readonly counters = {
    commandsProcessed: 0,
    errors: 0,
    songsPlayed: 0,
    autoPlays: 0,
  };

  private committed: CommittedView;
  private running = false;
  private loop: Promise<void> | null = null;

  private readonly handlers: CommandHandlers = {
    [CommandType.Play]: () => this.handlePlay(),
    [CommandType.Pause]: () => this.handlePause(),
    [CommandType.Stop]: () => this.handleStop(),
    [CommandType.Next]: () => this.handleNext(),
    [CommandType.Prev]: () => this.handlePrev(),
    [CommandType.AddSong]: (payload) => this.handleAddSong(payload),
    [CommandType.AddSongs]: (payload) => this.handleAddSongs(payload.tracks, payload.replace === true),
    [CommandType.AddAlbum]: (payload) => this.handleAddAlbum(payload.albumId),
    [CommandType.AddPlaylist]: (payload) => this.appendTracks(payload.tracks, `playlist ${payload.name}`),
    [CommandType.ClearQueue]: () => this.handleClearQueue(),
    [CommandType.SetVolume]: (payload) => this.handleSetVolume(payload.volume),
    [CommandType.VolumeUp]: () => this.stepVolume(1),
    [CommandType.VolumeDown]: () => this.stepVolume(-1),
    [CommandType.ToggleRepeat]: () => this.handleToggleRepeat(),
    [CommandType.ToggleShuffle]: () => this.handleToggleShuffle(),
    [CommandType.SwitchZone]: (payload) => this.handleSwitchZone(payload.host),
    [CommandType.TrackEnded]: (payload) => this.handleTrackEnded(payload.generation),
    [CommandType.UpdateState]: (payload) => this.handleUpdateState(payload.state),
  };

  constructor(options: PlaybackControllerOptions) {
    this.driver = options.driver;
    this.driverFactory = options.driverFactory;
    this.catalog = options.catalog;
    this.queue = options.queue;
    this.dequeueTimeoutMs = options.dequeueTimeoutMs ?? 100;
    this.volumeStep = options.volumeStep ?? 1;
    this.volume = clampVolume(options.initialVolume ?? 50);
    this.committed = this.captureView();
  }

  public get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Fills hook slots. A slot registered twice keeps the latest observer.
   */
  public registerHooks(observer: Partial<PlaybackHooks>): void {
    if (observer.trackChanged) {
      this.hooks.trackChanged = (payload) => observer.trackChanged?.(payload);
    }
    if (observer.queueChanged) {
      this.hooks.queueChanged = (payload) => observer.queueChanged?.(payload);
    }
    if (observer.stateChanged) {
      this.hooks.stateChanged = (payload) => observer.stateChanged?.(payload);
    }
    if (observer.volumeChanged) {
      this.hooks.volumeChanged = (payload) => observer.volumeChanged?.(payload);
    }
  }

  public start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.loop = this.runLoop();
    this.log.info('playback controller started', { device: this.driver.target });
  }

  /**
   * Lets the loop finish its current command and exit at the next dequeue timeout.
   */
  public async stop(): Promise<void> {
    this.running = false;
    const loop = this.loop;
    if (!loop) {
      return;
    }
    await loop;
    this.loop = null;
    this.log.info('playback controller stopped', this.statsContext());
  }

  /**
   * Drains queued commands on the caller's turn. Refuses while the loop runs.
   */
  public async processPending(): Promise<number> {
    if (this.loop) {
      throw new Error('processPending is unavailable while the dispatch loop runs');
    }
    let processed = 0;
    for (;;) {
      const command = await this.queue.get(0);
      if (!command) {
        return processed;
      }
      await this.execute(command);
      processed += 1;
    }
  }

  /**
   * State as of the last finished command; a command still awaiting the
   * device is never visible here.
   */
  public getSnapshot(): PlaybackSnapshot {
    return this.committed.snapshot;
  }

  public getQueue(): readonly Track[] {
    return this.committed.queue;
  }

  public getStats(): ControllerStats {
    return Object.freeze({
      ...this.counters,
      queue: this.queue.getStats(),
    });
  }

  /** Driver currently bound; the monitor polls through it. */
  public currentDevice(): DeviceDriverPort {
    return this.driver;
  }

  private async runLoop(): Promise<void> {
    await this.syncVolumeFromDevice();
    this.publish();
    while (this.running) {
      const command = await this.queue.get(this.dequeueTimeoutMs);
      if (!command) {
        continue;
      }
      await this.execute(command);
    }
  }

  private async execute(command: Command): Promise<void> {
    if (isInternalCommand(command.type)) {
      this.log.spam('dispatching internal command', { type: command.type });
    } else {
      this.log.debug('dispatching command', { type: command.type });
    }
    let result: CommandResult = { ok: true };
    try {
      await runHandler(this.handlers, command.type, command.payload);
      this.counters.commandsProcessed += 1;
      this.queue.markProcessed();
    } catch (error) {
      const message = errorMessage(error);
      this.counters.errors += 1;
      this.queue.markError();
      this.log.error('command failed', { type: command.type, message });
      result = { ok: false, error: message };
    }
    this.publish();
    this.complete(command, result);
  }

  private publish(): void {
    this.committed = this.captureView();
  }

  private captureView(): CommittedView {
    return {
      snapshot: Object.freeze({
        state: this.transportState,
        repeat: this.repeat,
        shuffle: this.shuffle,
        volume: this.volume,
        queueDepth: this.tracks.length,
        nowPlaying: this.nowPlaying,
        device: this.driver.target,
        trackGeneration: this.trackGeneration,
      }),
      queue: Object.freeze([...this.tracks]),
    };
  }

  private complete(command: Command, result: CommandResult): void {
    if (!command.callback) {
      return;
    }
    try {
      command.callback(result);
    } catch (error) {
      this.log.warn('command callback failed', { type: command.type, message: errorMessage(error) });
    }
  }

  private async handlePlay(): Promise<void> {
    if (await this.deviceCall('play', () => this.driver.play())) {
      this.setTransport(TransportState.Playing);
    }
  }

  private async handlePause(): Promise<void> {
    if (await this.deviceCall('pause', () => this.driver.pause())) {
      this.setTransport(TransportState.Paused);
    }
  }

  private async handleStop(): Promise<void> {
    if (await this.deviceCall('stop', () => this.driver.stop())) {
      this.setTransport(TransportState.Stopped);
    }
  }

  /**
   * Advances to the next playable track. Unplayable tracks are skipped, at
   * most once per track queued when the advance began.
   */
  private async handleNext(): Promise<void> {
    if (this.tracks.length === 0) {
      this.nowPlaying = null;
      this.emitTrack();
      return;
    }

    const attempts = this.tracks.length;
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      const track = this.tracks.shift();
      if (!track) {
        break;
      }
      if (this.repeat) {
        this.tracks.push(track);
      }
      await bestEffort(() => this.driver.stop(), {
        fallback: undefined,
        onError: 'debug',
        log: this.log,
        label: 'pre-advance stop failed',
      });
      if (await this.deviceCall('playUri', () => this.driver.playUri(track.uri, track))) {
        this.startedTrack(track);
        this.counters.songsPlayed += 1;
        this.emitQueue();
        return;
      }
      this.log.warn('skipping unplayable track', { title: track.title, uri: track.uri });
    }

    this.log.warn('no playable track left; stopping', { attempts });
    this.nowPlaying = null;
    this.trackGeneration += 1;
    this.transportState = TransportState.Stopped;
    this.emitTrack();
    this.emitQueue();
    this.emitState();
  }

  private async handlePrev(): Promise<void> {
    const track = this.nowPlaying;
    if (!track) {
      this.log.debug('prev ignored; nothing has played');
      return;
    }
    if (await this.deviceCall('playUri', () => this.driver.playUri(track.uri, track))) {
      this.startedTrack(track);
    }
  }

  private async handleAddSong(payload: Readonly<AddSongPayload>): Promise<void> {
    if ('track' in payload) {
      await this.appendTracks([payload.track], 'song');
      return;
    }
    const keys = 'songKeys' in payload ? payload.songKeys : [payload.songKey];
    const tracks: Track[] = [];
    for (const songKey of keys) {
      const track = await this.catalog.getSongByKey(songKey);
      if (track) {
        tracks.push(track);
      } else {
        this.log.warn('unknown song key skipped', { songKey });
      }
    }
    if (tracks.length === 0) {
      this.log.warn('no known song keys; queue unchanged', { requested: keys.length });
      return;
    }
    await this.appendTracks(tracks, 'song');
  }

  private async handleAddSongs(tracks: readonly Track[], replace: boolean): Promise<void> {
    if (replace) {
      this.tracks = [];
      if (tracks.length === 0) {
        this.emitQueue();
        return;
      }
    }
    await this.appendTracks(tracks, replace ? 'replacement' : 'songs');
  }

  private async handleAddAlbum(albumId: string): Promise<void> {
    const tracks = await this.catalog.getAlbumTracks(albumId);
    if (!tracks || tracks.length === 0) {
      this.log.warn('unknown or empty album; queue unchanged', { albumId });
      return;
    }
    await this.appendTracks(tracks, `album ${albumId}`);
  }

  private async appendTracks(tracks: readonly Track[], source: string): Promise<void> {
    if (tracks.length === 0) {
      this.log.debug('nothing to add', { source });
      return;
    }
    const idle = this.tracks.length === 0 && this.nowPlaying === null;
    this.tracks.push(...tracks);
    this.log.info('tracks queued', { source, added: tracks.length, queueDepth: this.tracks.length });
    this.emitQueue();
    if (idle) {
      await this.handleNext();
    }
  }

  private async handleClearQueue(): Promise<void> {
    this.tracks = [];
    this.emitQueue();
  }

  private async handleSetVolume(volume: number): Promise<void> {
    if (!Number.isFinite(volume)) {
      this.log.warn('invalid volume ignored', { volume: String(volume) });
      return;
    }
    await this.applyVolume(volume);
  }

  private async stepVolume(direction: 1 | -1): Promise<void> {
    const current = await bestEffort(() => this.driver.getVolume(), {
      fallback: this.volume,
      onError: 'debug',
      log: this.log,
      label: 'device volume read failed',
    });
    const base = Number.isFinite(current) ? current : this.volume;
    await this.applyVolume(base + direction * this.volumeStep);
  }

  private async applyVolume(target: number): Promise<void> {
    const volume = clampVolume(target);
    if (await this.deviceCall('setVolume', () => this.driver.setVolume(volume))) {
      this.volume = volume;
      this.emitVolume();
    }
  }

  private async handleToggleRepeat(): Promise<void> {
    this.repeat = !this.repeat;
    this.emitState();
  }

  private async handleToggleShuffle(): Promise<void> {
    this.shuffle = !this.shuffle;
    this.emitState();
  }

  private async handleSwitchZone(host: string): Promise<void> {
    const target = host.trim();
    if (!target) {
      this.log.warn('zone switch ignored; empty host');
      return;
    }
    if (target === this.driver.target) {
      this.log.debug('zone switch ignored; already bound', { host: target });
      return;
    }
    if (!this.driverFactory) {
      throw new Error('zone switching is not configured');
    }
    const previous = this.driver.target;
    try {
      this.driver = this.driverFactory(target);
    } catch (error) {
      this.log.error('zone switch failed', { host: target, message: errorMessage(error) });
      return;
    }
    this.trackGeneration += 1;
    this.log.info('switched zone', { from: previous, to: target });
  }

  private async handleTrackEnded(generation: number | undefined): Promise<void> {
    if (generation !== undefined && generation !== this.trackGeneration) {
      this.log.debug('stale track end ignored', { generation, current: this.trackGeneration });
      return;
    }
    if (this.transportState !== TransportState.Playing) {
      this.log.debug('track end ignored; not playing', { state: this.transportState });
      return;
    }
    if (this.tracks.length > 0) {
      this.counters.autoPlays += 1;
      await this.handleNext();
      return;
    }
    this.log.info('queue finished');
    this.nowPlaying = null;
    this.trackGeneration += 1;
    this.transportState = TransportState.Stopped;
    this.emitState();
    this.emitTrack();
  }

  private async handleUpdateState(state: TransportState): Promise<void> {
    this.setTransport(state);
  }

  private startedTrack(track: Track): void {
    const stateChanged = this.transportState !== TransportState.Playing;
    this.nowPlaying = track;
    this.trackGeneration += 1;
    this.transportState = TransportState.Playing;
    this.log.info('now playing', { title: track.title, artist: track.artist });
    this.emitTrack();
    if (stateChanged) {
      this.emitState();
    }
  }

  private setTransport(state: TransportState): void {
    this.transportState = state;
    this.emitState();
  }

  private async syncVolumeFromDevice(): Promise<void> {
    const volume = await bestEffort(() => this.driver.getVolume(), {
      fallback: null,
      onError: 'debug',
      log: this.log,
      label: 'initial volume read failed',
    });
    if (volume !== null && Number.isFinite(volume)) {
      this.volume = clampVolume(volume);
    }
  }

  private async deviceCall(action: string, call: () => Promise<void>): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      this.log.warn('device call failed', {
        action,
        device: this.driver.target,
        message: errorMessage(error),
      });
      return false;
    }
  }

  private emitTrack(): void {
    const payload = toTrackNotification(this.nowPlaying);
    this.invokeHook('trackChanged', (hooks) => hooks.trackChanged?.(payload));
  }

  private emitQueue(): void {
    const payload = { queueDepth: this.tracks.length };
    this.invokeHook('queueChanged', (hooks) => hooks.queueChanged?.(payload));
  }

  private emitState(): void {
    const payload = { state: this.transportState, repeat: this.repeat, shuffle: this.shuffle };
    this.invokeHook('stateChanged', (hooks) => hooks.stateChanged?.(payload));
  }

  private emitVolume(): void {
    const payload = { volume: this.volume };
    this.invokeHook('volumeChanged', (hooks) => hooks.volumeChanged?.(payload));
  }

  private invokeHook(name: PlaybackHookName, invoke: (hooks: Partial<PlaybackHooks>) => void): void {
    try {
      invoke(this.hooks);
    } catch (error) {
      this.log.warn('playback hook failed', { hook: name, message: errorMessage(error) });
    }
  }

  private statsContext(): Record<string, unknown> {
    return { ...this.counters };
  }
}
