import type { LogLevel } from '@/types/logLevel';

export interface DeviceConfig {
  /** Renderer the controller binds to at startup. */
  host: string;
  port: number;
  commandTimeoutMs: number;
}

export interface MediaConfig {
  /** Host renderers use to fetch audio; empty means the first LAN IPv4 address. */
  host: string;
  port: number;
  /** Local root of the media tree, used to probe for album art. */
  path: string;
}

export interface CatalogConfig {
  path: string;
}

export interface ControllerConfig {
  /** 0 disables the bound. */
  commandQueueCapacity: number;
  enqueueTimeoutMs: number;
  dequeueTimeoutMs: number;
  stopTimeoutMs: number;
  volumeStep: number;
}

export interface MonitorConfig {
  pollIntervalMs: number;
  errorBackoffMs: number;
}

export interface EventsConfig {
  mailboxSize: number;
  keepaliveMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  json: boolean;
}

export interface JukeboxConfig {
  device: DeviceConfig;
  media: MediaConfig;
  catalog: CatalogConfig;
  controller: ControllerConfig;
  monitor: MonitorConfig;
  events: EventsConfig;
  logging: LoggingConfig;
  updatedAt: string;
}
