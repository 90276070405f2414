import type { Track, TransportState } from '@/domain/playback/types';

/**
 * Closed set of instructions understood by the playback controller.
 * Underscore-prefixed values are internal and only produced by the
 * reconciliation monitor or the runtime.
 */
export enum CommandType {
  Play = 'play',
  Pause = 'pause',
  Stop = 'stop',
  Next = 'next',
  Prev = 'prev',
  AddSong = 'add_song',
  AddSongs = 'add_songs',
  AddAlbum = 'add_album',
  AddPlaylist = 'add_playlist',
  ClearQueue = 'clear_queue',
  SetVolume = 'set_volume',
  VolumeUp = 'volume_up',
  VolumeDown = 'volume_down',
  ToggleRepeat = 'toggle_repeat',
  ToggleShuffle = 'toggle_shuffle',
  SwitchZone = 'switch_zone',
  TrackEnded = '_track_ended',
  UpdateState = '_update_state',
}

type EmptyPayload = Record<string, never>;

export type AddSongPayload = { track: Track } | { songKey: string } | { songKeys: readonly string[] };

export interface CommandPayloads {
  [CommandType.Play]: EmptyPayload;
  [CommandType.Pause]: EmptyPayload;
  [CommandType.Stop]: EmptyPayload;
  [CommandType.Next]: EmptyPayload;
  [CommandType.Prev]: EmptyPayload;
  [CommandType.AddSong]: AddSongPayload;
  /** `replace` empties the upcoming queue before appending, in the same step. */
  [CommandType.AddSongs]: { tracks: readonly Track[]; replace?: boolean };
  [CommandType.AddAlbum]: { albumId: string };
  [CommandType.AddPlaylist]: { name: string; tracks: readonly Track[] };
  [CommandType.ClearQueue]: EmptyPayload;
  [CommandType.SetVolume]: { volume: number };
  [CommandType.VolumeUp]: EmptyPayload;
  [CommandType.VolumeDown]: EmptyPayload;
  [CommandType.ToggleRepeat]: EmptyPayload;
  [CommandType.ToggleShuffle]: EmptyPayload;
  [CommandType.SwitchZone]: { host: string };
  /** `generation` ties the signal to the track that was playing when it was observed. */
  [CommandType.TrackEnded]: { generation?: number };
  [CommandType.UpdateState]: { state: TransportState };
}

export type CommandResult = { ok: true } | { ok: false; error: string };

export type CommandCallback = (result: CommandResult) => void;

export interface CommandEnvelope<K extends CommandType> {
  readonly type: K;
  readonly payload: Readonly<CommandPayloads[K]>;
  readonly callback?: CommandCallback;
  readonly createdAt: number;
}

export type Command = { [K in CommandType]: CommandEnvelope<K> }[CommandType];

export function createCommand<K extends CommandType>(
  type: K,
  payload: CommandPayloads[K],
  callback?: CommandCallback,
): CommandEnvelope<K> {
  return Object.freeze({
    type,
    payload: Object.freeze({ ...payload }),
    callback,
    createdAt: Date.now(),
  });
}

export function isInternalCommand(type: CommandType): boolean {
  return type.startsWith('_');
}
