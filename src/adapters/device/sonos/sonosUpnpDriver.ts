import { createLogger } from '@/shared/logging/logger';
import { safeReadText } from '@/shared/bestEffort';
import type { Track } from '@/domain/playback/types';
import {
  ObservedTransportState,
  type DeviceDriverFactory,
  type DeviceDriverPort,
} from '@/ports/DeviceDriverPort';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type SonosUpnpDriverOptions = {
  host: string;
  port?: number;
  commandTimeoutMs?: number;
  fetch?: FetchLike;
};

type UpnpService = 'AVTransport' | 'RenderingControl';

const SERVICE_PATHS: Record<UpnpService, string> = {
  AVTransport: '/MediaRenderer/AVTransport/Control',
  RenderingControl: '/MediaRenderer/RenderingControl/Control',
};

export class SonosSoapError extends Error {
  constructor(
    public readonly action: string,
    public readonly status: number,
    public readonly upnpErrorCode: string | null,
    detail: string,
  ) {
    super(`${action} failed (HTTP ${status}${upnpErrorCode ? `, UPnP ${upnpErrorCode}` : ''}): ${detail}`);
    this.name = 'SonosSoapError';
  }
}

/**
 * Drives a Sonos player over its UPnP SOAP control endpoints.
 * Failed requests reject; the caller decides how to degrade.
 */
export class SonosUpnpDriver implements DeviceDriverPort {
  public readonly target: string;
  private readonly log = createLogger('Device', 'Sonos');
  private readonly port: number;
  private readonly commandTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: SonosUpnpDriverOptions) {
    this.target = options.host;
    this.port = options.port ?? 1400;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 2500;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  public async play(): Promise<void> {
    await this.invokeAction('AVTransport', 'Play', '<Speed>1</Speed>');
  }

  public async pause(): Promise<void> {
    await this.invokeAction('AVTransport', 'Pause', '');
  }

  public async stop(): Promise<void> {
    await this.invokeAction('AVTransport', 'Stop', '');
  }

  public async playUri(uri: string, track?: Track): Promise<void> {
    const metadata = track ? buildDidl(uri, track) : '';
    await this.invokeAction(
      'AVTransport',
      'SetAVTransportURI',
      `<CurrentURI>${escapeXml(uri)}</CurrentURI><CurrentURIMetaData>${escapeXml(metadata)}</CurrentURIMetaData>`,
    );
    await this.play();
  }

  public async getTransportState(): Promise<ObservedTransportState> {
    const body = await this.invokeAction('AVTransport', 'GetTransportInfo', '');
    return parseTransportState(extractTag(body, 'CurrentTransportState'));
  }

  public async getVolume(): Promise<number> {
    const body = await this.invokeAction('RenderingControl', 'GetVolume', '<Channel>Master</Channel>');
    const volume = Number(extractTag(body, 'CurrentVolume'));
    if (!Number.isFinite(volume)) {
      throw new Error('GetVolume returned no volume');
    }
    return volume;
  }

  public async setVolume(volume: number): Promise<void> {
    await this.invokeAction(
      'RenderingControl',
      'SetVolume',
      `<Channel>Master</Channel><DesiredVolume>${Math.round(volume)}</DesiredVolume>`,
    );
  }

  public async clearQueue(): Promise<void> {
    await this.invokeAction('AVTransport', 'RemoveAllTracksFromQueue', '');
  }

  private async invokeAction(service: UpnpService, action: string, args: string): Promise<string> {
    const url = `http://${this.target}:${this.port}${SERVICE_PATHS[service]}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.commandTimeoutMs);
    timeout.unref();
    try {
      this.log.spam('sonos soap request', { action, service, host: this.target });
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset="utf-8"',
          SOAPAction: `"urn:schemas-upnp-org:service:${service}:1#${action}"`,
        },
        body: buildEnvelope(service, action, args),
        signal: controller.signal,
      });
      const text = await safeReadText(response, '', {
        onError: 'debug',
        log: this.log,
        label: 'sonos response read failed',
        context: { action, status: response.status },
      });
      if (!response.ok) {
        const code = extractTag(text, 'errorCode');
        throw new SonosSoapError(action, response.status, code, text.slice(0, 200));
      }
      return text;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`${action} timed out after ${this.commandTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createSonosDriverFactory(
  options: Omit<SonosUpnpDriverOptions, 'host'> = {},
): DeviceDriverFactory {
  return (host) => new SonosUpnpDriver({ ...options, host });
}

export function parseTransportState(raw: string | null): ObservedTransportState {
  switch ((raw ?? '').trim().toUpperCase()) {
    case 'PLAYING':
      return ObservedTransportState.Playing;
    case 'PAUSED_PLAYBACK':
    case 'PAUSED':
      return ObservedTransportState.Paused;
    case 'STOPPED':
    case 'NO_MEDIA_PRESENT':
      return ObservedTransportState.Stopped;
    case 'TRANSITIONING':
      return ObservedTransportState.Transitioning;
    default:
      return ObservedTransportState.Unknown;
  }
}

function buildEnvelope(service: UpnpService, action: string, args: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">
  <s:Body>
    <u:${action} xmlns:u="urn:schemas-upnp-org:service:${service}:1">
      <InstanceID>0</InstanceID>${args}
    </u:${action}>
  </s:Body>
</s:Envelope>`;
}

function buildDidl(uri: string, track: Track): string {
  const art = track.albumArtUri ? `<upnp:albumArtURI>${escapeXml(track.albumArtUri)}</upnp:albumArtURI>` : '';
  return (
    '<DIDL-Lite xmlns:dc="http://purl.org/dc/elements/1.1/" ' +
    'xmlns:upnp="urn:schemas-upnp-org:metadata-1-0/upnp/" ' +
    'xmlns="urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/">' +
    '<item id="0" parentID="0" restricted="1">' +
    `<dc:title>${escapeXml(track.title)}</dc:title>` +
    `<dc:creator>${escapeXml(track.artist)}</dc:creator>` +
    `<upnp:album>${escapeXml(track.album)}</upnp:album>` +
    art +
    '<upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
    `<res protocolInfo="http-get:*:${resolveMimeType(uri)}:*">${escapeXml(uri)}</res>` +
    '</item></DIDL-Lite>'
  );
}

function resolveMimeType(uri: string): string {
  const ext = uri.split('?')[0]?.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'flac':
      return 'audio/flac';
    case 'm4a':
    case 'mp4':
      return 'audio/mp4';
    case 'wav':
      return 'audio/wav';
    case 'ogg':
      return 'audio/ogg';
    default:
      return 'audio/mpeg';
  }
}

function extractTag(xml: string, tag: string): string | null {
  const match = xml.match(new RegExp(`<(?:\\w+:)?${tag}>([^<]*)</(?:\\w+:)?${tag}>`));
  return match?.[1] ?? null;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
