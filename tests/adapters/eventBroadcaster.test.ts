import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import { test } from '../testHarness';
import { EventBroadcaster } from '../../src/adapters/events/eventBroadcaster';
import { BroadcastNotifier } from '../../src/adapters/events/broadcastNotifier';
import { SseGateway, formatSseEvent } from '../../src/adapters/http/events/sseGateway';
import type { PlaybackEvent } from '../../src/domain/playback/notifications';
import { TransportState } from '../../src/domain/playback/types';
import { CommandType, createCommand } from '../../src/domain/playback/commands';
import { FakeResponse } from '../fakes/http';
import { createPlaybackHarness, delay, makeTrack } from '../fakes/playback';

const volumeEvent = (volume: number): PlaybackEvent => ({ type: 'volume', data: { volume } });

test('subscribers get the initial event before live ones', async () => {
  const broadcaster = new EventBroadcaster(4);
  const subscription = broadcaster.subscribe(volumeEvent(1));
  broadcaster.publish(volumeEvent(2));

  assert.deepEqual(await subscription.next(10), volumeEvent(1));
  assert.deepEqual(await subscription.next(10), volumeEvent(2));
  assert.equal(await subscription.next(5), null);
});

test('a full mailbox drops events for that subscriber only', async () => {
  const broadcaster = new EventBroadcaster(2);
  const slow = broadcaster.subscribe();
  const fast = broadcaster.subscribe();

  broadcaster.publish(volumeEvent(1));
  assert.deepEqual(await fast.next(10), volumeEvent(1));
  broadcaster.publish(volumeEvent(2));
  assert.deepEqual(await fast.next(10), volumeEvent(2));
  broadcaster.publish(volumeEvent(3));

  assert.equal(slow.dropped, 1);
  assert.equal(fast.dropped, 0);
  assert.deepEqual(await slow.next(10), volumeEvent(1));
  assert.deepEqual(await slow.next(10), volumeEvent(2));
  assert.equal(await slow.next(5), null);
  assert.deepEqual(await fast.next(10), volumeEvent(3));
  assert.deepEqual(broadcaster.getStats(), { subscribers: 2, published: 3, dropped: 1 });
});

test('closing the broadcaster releases waiting readers', async () => {
  const broadcaster = new EventBroadcaster();
  const subscription = broadcaster.subscribe();
  const waiting = subscription.next(1000);

  broadcaster.close();

  assert.equal(await waiting, null);
  assert.equal(subscription.closed, true);
  assert.equal(broadcaster.getStats().subscribers, 0);
});

test('notifier turns controller hooks into broadcast events', async () => {
  const broadcaster = new EventBroadcaster();
  const subscription = broadcaster.subscribe();
  const { controller, send } = createPlaybackHarness();
  controller.registerHooks(new BroadcastNotifier(broadcaster));

  await send(createCommand(CommandType.AddSong, { track: makeTrack('x') }));

  const types: string[] = [];
  for (let event = await subscription.next(5); event; event = await subscription.next(5)) {
    types.push(event.type);
  }
  assert.deepEqual(types, ['queue', 'track', 'state', 'queue']);
});

test('sse events are framed with name and json data', () => {
  assert.equal(
    formatSseEvent({ type: 'state', data: { state: TransportState.Paused, repeat: true, shuffle: false } }),
    'event: state\ndata: {"state":"PAUSED","repeat":true,"shuffle":false}\n\n',
  );
});

test('sse stream sends the snapshot first and then live events', async () => {
  const broadcaster = new EventBroadcaster();
  const gateway = new SseGateway({
    broadcaster,
    snapshot: () => volumeEvent(42),
    keepaliveMs: 1000,
  });
  const req = new EventEmitter();
  const res = new FakeResponse();

  gateway.handle(req as unknown as IncomingMessage, res.asServerResponse());
  await delay(5);
  broadcaster.publish(volumeEvent(43));
  await delay(5);

  assert.equal(res.statusCode, 200);
  assert.equal(res.headers?.['Content-Type'], 'text/event-stream');
  assert.equal(
    res.body,
    'event: volume\ndata: {"volume":42}\n\nevent: volume\ndata: {"volume":43}\n\n',
  );
  assert.equal(gateway.connectionCount, 1);

  req.emit('close');
  await gateway.close();
  assert.equal(gateway.connectionCount, 0);
  assert.equal(res.writableEnded, true);
  assert.equal(broadcaster.getStats().subscribers, 0);
});

test('quiet sse streams get keep-alive comments', async () => {
  const broadcaster = new EventBroadcaster();
  const gateway = new SseGateway({ broadcaster, snapshot: () => volumeEvent(1), keepaliveMs: 5 });
  const res = new FakeResponse();

  gateway.handle(new EventEmitter() as unknown as IncomingMessage, res.asServerResponse());
  await delay(30);
  await gateway.close();

  assert.ok(res.body.startsWith('event: volume\ndata: {"volume":1}\n\n: keep-alive\n\n'));
  assert.equal(res.writableEnded, true);
});

test('a blocked sse client waits for drain while its mailbox overflows', async () => {
  const broadcaster = new EventBroadcaster(2);
  const gateway = new SseGateway({ broadcaster, snapshot: () => volumeEvent(0), keepaliveMs: 1000 });
  const res = new FakeResponse();
  res.blocked = true;

  gateway.handle(new EventEmitter() as unknown as IncomingMessage, res.asServerResponse());
  await delay(5);
  for (let volume = 1; volume <= 50; volume += 1) {
    broadcaster.publish(volumeEvent(volume));
  }
  await delay(5);

  assert.equal(res.writes, 1);
  assert.deepEqual(broadcaster.getStats(), { subscribers: 1, published: 50, dropped: 48 });

  res.blocked = false;
  res.drain();
  await delay(5);

  assert.equal(res.writes, 3);
  assert.equal(
    res.body,
    'event: volume\ndata: {"volume":0}\n\nevent: volume\ndata: {"volume":1}\n\nevent: volume\ndata: {"volume":2}\n\n',
  );
  await gateway.close();
});

test('closing the gateway destroys streams stuck behind a full socket', async () => {
  const broadcaster = new EventBroadcaster();
  const gateway = new SseGateway({ broadcaster, snapshot: () => volumeEvent(0), keepaliveMs: 1000 });
  const res = new FakeResponse();
  res.blocked = true;

  gateway.handle(new EventEmitter() as unknown as IncomingMessage, res.asServerResponse());
  await delay(5);
  await gateway.close();

  assert.equal(res.destroyed, true);
  assert.equal(gateway.connectionCount, 0);
  assert.equal(broadcaster.getStats().subscribers, 0);
});
