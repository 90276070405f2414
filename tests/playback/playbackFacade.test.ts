import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { PlaybackFacade, shuffleTracks } from '../../src/application/playback/playbackFacade';
import { CommandQueueFullError } from '../../src/application/playback/commandQueue';
import { CommandType, createCommand } from '../../src/domain/playback/commands';
import { TransportState } from '../../src/domain/playback/types';
import { createPlaybackHarness, makeTrack } from '../fakes/playback';

const titles = (tracks: readonly { title: string }[]) => tracks.map((track) => track.title);

test('shuffle is a permutation driven by the random source', () => {
  const tracks = [makeTrack('a'), makeTrack('b'), makeTrack('c')];

  const shuffled = shuffleTracks(tracks, () => 0);

  assert.deepEqual(titles(shuffled), ['b', 'c', 'a']);
  assert.deepEqual(titles(tracks), ['a', 'b', 'c']);
  assert.deepEqual(titles(shuffleTracks(tracks, () => 0.99)), ['a', 'b', 'c']);
});

test('facade writes only through the command queue', async () => {
  const { controller, queue } = createPlaybackHarness();
  const facade = new PlaybackFacade(controller, queue);

  await facade.enqueueSetVolume(20);
  await facade.enqueueToggleRepeat();

  assert.equal(facade.getState().volume, 50);
  assert.equal(facade.getState().repeat, false);
  assert.equal(queue.size, 2);

  await controller.processPending();
  assert.equal(facade.getState().volume, 20);
  assert.equal(facade.getState().repeat, true);
  assert.equal(facade.getStats().commandsProcessed, 2);
});

test('facade reads reflect the dispatched queue', async () => {
  const { controller, queue } = createPlaybackHarness();
  const facade = new PlaybackFacade(controller, queue);
  const x = makeTrack('x');

  await facade.enqueueAddSongs([x, makeTrack('a')]);
  await controller.processPending();

  assert.equal(facade.getPlaying(), x);
  assert.deepEqual(titles(facade.getQueue()), ['a']);
  assert.equal(facade.getState().state, TransportState.Playing);
});

test('batches are shuffled when shuffle mode is on', async () => {
  const { controller, queue, send } = createPlaybackHarness();
  const facade = new PlaybackFacade(controller, queue, { random: () => 0 });
  await send(createCommand(CommandType.ToggleShuffle, {}));

  await facade.enqueueAddPlaylist('mix', [makeTrack('a'), makeTrack('b'), makeTrack('c')]);
  await controller.processPending();

  assert.equal(facade.getPlaying()?.title, 'b');
  assert.deepEqual(titles(facade.getQueue()), ['c', 'a']);
});

test('replace queue clears then appends without shuffling', async () => {
  const { controller, queue, send } = createPlaybackHarness();
  const facade = new PlaybackFacade(controller, queue, { random: () => 0 });
  const x = makeTrack('x');
  await send(
    createCommand(CommandType.ToggleShuffle, {}),
    createCommand(CommandType.AddSongs, { tracks: [x, makeTrack('old')] }),
  );

  await facade.replaceQueue([makeTrack('n1'), makeTrack('n2'), makeTrack('n3')]);
  assert.equal(queue.size, 1);
  await controller.processPending();

  assert.equal(facade.getPlaying(), x);
  assert.deepEqual(titles(facade.getQueue()), ['n1', 'n2', 'n3']);
});

test('replace queue is one command carrying the replace flag', async () => {
  const { controller, queue } = createPlaybackHarness();
  const facade = new PlaybackFacade(controller, queue);

  await facade.replaceQueue([makeTrack('n1')]);

  const command = await queue.get(0);
  assert.equal(command?.type, CommandType.AddSongs);
  assert.deepEqual(command?.payload, { tracks: [makeTrack('n1')], replace: true });
  assert.equal(queue.size, 0);
});

test('a refused replacement leaves the queue as it was', async () => {
  const { controller, queue, send } = createPlaybackHarness({ capacity: 1 });
  const facade = new PlaybackFacade(controller, queue);
  await send(createCommand(CommandType.AddSongs, { tracks: [makeTrack('a'), makeTrack('b'), makeTrack('c')] }));
  await facade.enqueueToggleRepeat();

  await assert.rejects(facade.replaceQueue([makeTrack('x')]), CommandQueueFullError);
  await controller.processPending();

  assert.equal(facade.getPlaying()?.title, 'a');
  assert.deepEqual(titles(facade.getQueue()), ['b', 'c']);
});

test('facade surfaces a full queue to the caller', async () => {
  const { controller, queue } = createPlaybackHarness({ capacity: 1 });
  const facade = new PlaybackFacade(controller, queue);
  await facade.enqueuePlay();

  await assert.rejects(facade.enqueueNext(), CommandQueueFullError);
  assert.equal(queue.size, 1);
});
