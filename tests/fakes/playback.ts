import { CommandQueue } from '../../src/application/playback/commandQueue';
import { PlaybackController } from '../../src/application/playback/playbackController';
import type { Command, CommandCallback, CommandResult } from '../../src/domain/playback/commands';
import { createTrack, type Track } from '../../src/domain/playback/types';
import type { PlaybackHooks } from '../../src/ports/PlaybackHooksPort';
import { FakeCatalog } from './catalog';
import { FakeDeviceDriver } from './deviceDriver';

export type HookEvent = {
  hook: keyof PlaybackHooks;
  payload: unknown;
};

export function makeTrack(id: string): Track {
  return createTrack({
    title: id,
    artist: 'Test Artist',
    album: 'Test Album',
    duration: '3:00',
    uri: `http://media.test/${id}.mp3`,
  });
}

export function createPlaybackHarness(options: { capacity?: number } = {}) {
  const driver = new FakeDeviceDriver();
  const catalog = new FakeCatalog();
  const queue = new CommandQueue({ capacity: options.capacity ?? 0 });
  const switchedDrivers: FakeDeviceDriver[] = [];
  const controller = new PlaybackController({
    driver,
    driverFactory: (host) => {
      const next = new FakeDeviceDriver(host);
      switchedDrivers.push(next);
      return next;
    },
    catalog,
    queue,
    dequeueTimeoutMs: 5,
  });
  const events: HookEvent[] = [];
  controller.registerHooks({
    trackChanged: (payload) => events.push({ hook: 'trackChanged', payload }),
    queueChanged: (payload) => events.push({ hook: 'queueChanged', payload }),
    stateChanged: (payload) => events.push({ hook: 'stateChanged', payload }),
    volumeChanged: (payload) => events.push({ hook: 'volumeChanged', payload }),
  });

  const send = async (...commands: Command[]): Promise<void> => {
    for (const command of commands) {
      await queue.put(command);
    }
    await controller.processPending();
  };

  return { driver, catalog, queue, controller, events, switchedDrivers, send };
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Callback plus a promise settled with the result it receives.
 */
export function completion(): { callback: CommandCallback; done: Promise<CommandResult> } {
  let settle: CommandCallback = () => undefined;
  const done = new Promise<CommandResult>((resolve) => {
    settle = resolve;
  });
  return { callback: (result) => settle(result), done };
}
