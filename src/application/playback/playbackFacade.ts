import {
  CommandType,
  createCommand,
  type Command,
  type CommandCallback,
} from '@/domain/playback/commands';
import type {
  ControllerStats,
  PlaybackSnapshot,
  Track,
  TransportState,
} from '@/domain/playback/types';
import type { CommandQueue } from '@/application/playback/commandQueue';

/**
 * Read side of the controller exposed to request handlers.
 */
export interface PlaybackReader {
  getSnapshot(): PlaybackSnapshot;
  getQueue(): readonly Track[];
  getStats(): ControllerStats;
}

export type PlaybackFacadeOptions = {
  enqueueTimeoutMs?: number;
  /** Source of randomness for shuffled batches; defaults to Math.random. */
  random?: () => number;
};

/**
 * Fisher-Yates shuffle returning a new array.
 */
export function shuffleTracks(tracks: readonly Track[], random: () => number = Math.random): Track[] {
  const shuffled = [...tracks];
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const current = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = current;
  }
  return shuffled;
}

/**
 * Snapshot reads plus one enqueue method per command. Every write goes
 * through the command queue; nothing here touches controller state.
 */
export class PlaybackFacade {
  private readonly enqueueTimeoutMs: number;
  private readonly random: () => number;

  constructor(
    private readonly reader: PlaybackReader,
    private readonly queue: CommandQueue,
    options: PlaybackFacadeOptions = {},
  ) {
    this.enqueueTimeoutMs = options.enqueueTimeoutMs ?? 0;
    this.random = options.random ?? Math.random;
  }

  public getState(): PlaybackSnapshot {
    return this.reader.getSnapshot();
  }

  public getQueue(): readonly Track[] {
    return this.reader.getQueue();
  }

  public getPlaying(): Track | null {
    return this.reader.getSnapshot().nowPlaying;
  }

  public getStats(): ControllerStats {
    return this.reader.getStats();
  }

  public enqueuePlay(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.Play, {}, callback));
  }

  public enqueuePause(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.Pause, {}, callback));
  }

  public enqueueStop(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.Stop, {}, callback));
  }

  public enqueueNext(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.Next, {}, callback));
  }

  public enqueuePrev(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.Prev, {}, callback));
  }

  public enqueueAddSong(track: Track, callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.AddSong, { track }, callback));
  }

  /** Resolves every key in one command; unknown keys are skipped. */
  public enqueueAddSongKeys(songKeys: readonly string[], callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.AddSong, { songKeys: [...songKeys] }, callback));
  }

  public enqueueAddSongs(tracks: readonly Track[], callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.AddSongs, { tracks: this.arrange(tracks) }, callback));
  }

  public enqueueAddAlbum(albumId: string, callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.AddAlbum, { albumId }, callback));
  }

  public enqueueAddPlaylist(
    name: string,
    tracks: readonly Track[],
    callback?: CommandCallback,
  ): Promise<void> {
    return this.submit(
      createCommand(CommandType.AddPlaylist, { name, tracks: this.arrange(tracks) }, callback),
    );
  }

  public enqueueClearQueue(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.ClearQueue, {}, callback));
  }

  public enqueueSetVolume(volume: number, callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.SetVolume, { volume }, callback));
  }

  public enqueueVolumeUp(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.VolumeUp, {}, callback));
  }

  public enqueueVolumeDown(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.VolumeDown, {}, callback));
  }

  public enqueueToggleRepeat(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.ToggleRepeat, {}, callback));
  }

  public enqueueToggleShuffle(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.ToggleShuffle, {}, callback));
  }

  public enqueueSwitchZone(host: string, callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.SwitchZone, { host }, callback));
  }

  public enqueueTrackEnded(callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.TrackEnded, {}, callback));
  }

  public enqueueUpdateState(state: TransportState, callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.UpdateState, { state }, callback));
  }

  /**
   * Replaces the upcoming queue with `tracks` as one ADD_SONGS command that
   * clears first. The playing track is left alone.
   */
  public replaceQueue(tracks: readonly Track[], callback?: CommandCallback): Promise<void> {
    return this.submit(createCommand(CommandType.AddSongs, { tracks: [...tracks], replace: true }, callback));
  }

  private arrange(tracks: readonly Track[]): Track[] {
    return this.reader.getSnapshot().shuffle ? shuffleTracks(tracks, this.random) : [...tracks];
  }

  private submit(command: Command): Promise<void> {
    return this.queue.put(command, this.enqueueTimeoutMs);
  }
}
