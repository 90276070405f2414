import type { Track } from '../../src/domain/playback/types';
import { ObservedTransportState, type DeviceDriverPort } from '../../src/ports/DeviceDriverPort';

/**
 * In-memory renderer. Records every stateful call in `calls`.
 */
export class FakeDeviceDriver implements DeviceDriverPort {
  public readonly calls: string[] = [];
  public readonly failingActions = new Set<string>();
  public readonly failingUris = new Set<string>();
  public transportState = ObservedTransportState.Stopped;
  public volume = 50;
  public currentUri: string | null = null;
  public pollCount = 0;
  public pollError: Error | null = null;
  private playUriGate: Promise<void> | null = null;

  constructor(public readonly target = 'fake-renderer') {}

  public async play(): Promise<void> {
    this.record('play');
    this.transportState = ObservedTransportState.Playing;
  }

  public async pause(): Promise<void> {
    this.record('pause');
    this.transportState = ObservedTransportState.Paused;
  }

  public async stop(): Promise<void> {
    this.record('stop');
    this.transportState = ObservedTransportState.Stopped;
  }

  /**
   * Holds every later `playUri` until the returned release is called.
   */
  public holdPlayUri(): () => void {
    let release: () => void = () => undefined;
    this.playUriGate = new Promise<void>((resolve) => {
      release = () => {
        this.playUriGate = null;
        resolve();
      };
    });
    return release;
  }

  public async playUri(uri: string, _track?: Track): Promise<void> {
    this.record('playUri', uri);
    if (this.playUriGate) {
      await this.playUriGate;
    }
    if (this.failingUris.has(uri)) {
      throw new Error(`cannot play ${uri}`);
    }
    this.currentUri = uri;
    this.transportState = ObservedTransportState.Playing;
  }

  public async getTransportState(): Promise<ObservedTransportState> {
    this.pollCount += 1;
    if (this.pollError) {
      throw this.pollError;
    }
    return this.transportState;
  }

  public async getVolume(): Promise<number> {
    if (this.failingActions.has('getVolume')) {
      throw new Error('getVolume failed');
    }
    return this.volume;
  }

  public async setVolume(volume: number): Promise<void> {
    this.record('setVolume', String(volume));
    this.volume = volume;
  }

  public async clearQueue(): Promise<void> {
    this.record('clearQueue');
  }

  private record(action: string, detail?: string): void {
    this.calls.push(detail === undefined ? action : `${action}:${detail}`);
    if (this.failingActions.has(action)) {
      throw new Error(`${action} failed`);
    }
  }
}
