import type { Track } from '@/domain/playback/types';

/**
 * Transport state as reported by the renderer itself.
 */
export enum ObservedTransportState {
  Playing = 'PLAYING',
  Paused = 'PAUSED',
  Stopped = 'STOPPED',
  Transitioning = 'TRANSITIONING',
  Unknown = 'UNKNOWN',
}

/**
 * Control surface of a networked playback device. Every call may reject;
 * callers decide whether a failure is fatal for the operation.
 */
export interface DeviceDriverPort {
  /** Address the driver talks to, e.g. the renderer's IP. */
  readonly target: string;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  playUri(uri: string, track?: Track): Promise<void>;
  getTransportState(): Promise<ObservedTransportState>;
  getVolume(): Promise<number>;
  setVolume(volume: number): Promise<void>;
  clearQueue(): Promise<void>;
}

export type DeviceDriverFactory = (host: string) => DeviceDriverPort;
