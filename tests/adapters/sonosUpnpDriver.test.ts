import assert from 'node:assert/strict';
import { test } from '../testHarness';
import {
  SonosSoapError,
  SonosUpnpDriver,
  escapeXml,
  parseTransportState,
  type FetchLike,
} from '../../src/adapters/device/sonos/sonosUpnpDriver';
import { createTrack } from '../../src/domain/playback/types';
import { ObservedTransportState } from '../../src/ports/DeviceDriverPort';

type SoapCall = { url: string; action: string | null; body: string };

function recordingFetch(reply: (call: SoapCall) => Response = () => new Response('<ok/>')) {
  const calls: SoapCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const call = {
      url,
      action: new Headers(init.headers).get('SOAPAction'),
      body: typeof init.body === 'string' ? init.body : '',
    };
    calls.push(call);
    return reply(call);
  };
  return { calls, fetchImpl };
}

test('playUri sets the transport uri and then plays', async () => {
  const { calls, fetchImpl } = recordingFetch();
  const driver = new SonosUpnpDriver({ host: '192.0.2.10', fetch: fetchImpl });
  const track = createTrack({ title: 'Rock & Roll', uri: 'http://media.test/a.mp3?x=1&y=2' });

  await driver.playUri(track.uri, track);

  assert.deepEqual(
    calls.map((call) => call.action),
    [
      '"urn:schemas-upnp-org:service:AVTransport:1#SetAVTransportURI"',
      '"urn:schemas-upnp-org:service:AVTransport:1#Play"',
    ],
  );
  assert.equal(calls[0]?.url, 'http://192.0.2.10:1400/MediaRenderer/AVTransport/Control');
  assert.ok(calls[0]?.body.includes('<CurrentURI>http://media.test/a.mp3?x=1&amp;y=2</CurrentURI>'));
  assert.ok(calls[0]?.body.includes('&lt;dc:title&gt;Rock &amp;amp; Roll&lt;/dc:title&gt;'));
  assert.ok(calls[1]?.body.includes('<InstanceID>0</InstanceID><Speed>1</Speed>'));
});

test('volume goes through rendering control', async () => {
  const { calls, fetchImpl } = recordingFetch(
    () => new Response('<s:Body><u:GetVolumeResponse><CurrentVolume>37</CurrentVolume></u:GetVolumeResponse></s:Body>'),
  );
  const driver = new SonosUpnpDriver({ host: '192.0.2.10', port: 1443, fetch: fetchImpl });

  assert.equal(await driver.getVolume(), 37);
  await driver.setVolume(41.6);

  assert.equal(calls[1]?.url, 'http://192.0.2.10:1443/MediaRenderer/RenderingControl/Control');
  assert.ok(calls[1]?.body.includes('<Channel>Master</Channel><DesiredVolume>42</DesiredVolume>'));
});

test('transport state is read from GetTransportInfo', async () => {
  const { fetchImpl } = recordingFetch(
    () => new Response('<CurrentTransportState>PAUSED_PLAYBACK</CurrentTransportState>'),
  );
  const driver = new SonosUpnpDriver({ host: '192.0.2.10', fetch: fetchImpl });

  assert.equal(await driver.getTransportState(), ObservedTransportState.Paused);
});

test('transport states map onto the observed set', () => {
  assert.equal(parseTransportState('PLAYING'), ObservedTransportState.Playing);
  assert.equal(parseTransportState('NO_MEDIA_PRESENT'), ObservedTransportState.Stopped);
  assert.equal(parseTransportState('TRANSITIONING'), ObservedTransportState.Transitioning);
  assert.equal(parseTransportState('WEIRD'), ObservedTransportState.Unknown);
  assert.equal(parseTransportState(null), ObservedTransportState.Unknown);
});

test('soap faults surface the upnp error code', async () => {
  const { fetchImpl } = recordingFetch(
    () => new Response('<s:Fault><UPnPError><errorCode>701</errorCode></UPnPError></s:Fault>', { status: 500 }),
  );
  const driver = new SonosUpnpDriver({ host: '192.0.2.10', fetch: fetchImpl });

  await assert.rejects(driver.play(), (error: unknown) => {
    assert.ok(error instanceof SonosSoapError);
    assert.equal(error.action, 'Play');
    assert.equal(error.status, 500);
    assert.equal(error.upnpErrorCode, '701');
    return true;
  });
});

test('slow devices time out', async () => {
  const fetchImpl: FetchLike = (_url, init) =>
    new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => {
        const error = new Error('aborted');
        error.name = 'AbortError';
        reject(error);
      });
    });
  const driver = new SonosUpnpDriver({ host: '192.0.2.10', commandTimeoutMs: 10, fetch: fetchImpl });

  await assert.rejects(driver.stop(), { message: 'Stop timed out after 10ms' });
});

test('xml escaping covers markup characters', () => {
  assert.equal(escapeXml(`<a href="x">'&'</a>`), '&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
});
