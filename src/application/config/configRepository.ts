import type { StoragePort } from '@/ports/StoragePort';
import { createLogger } from '@/shared/logging/logger';
import { resolveDataDir } from '@/shared/utils/file';
import { isLogLevel } from '@/types/logLevel';
import type { JukeboxConfig } from '@/domain/config/types';

type RawRecord = Record<string, unknown>;

/**
 * Configuration store backed by a JSON file on disk.
 * Whatever is on disk is normalised against the defaults on every load.
 */
export class ConfigRepository {
  private readonly log = createLogger('Config');
  private readonly configPath: string;
  private config: JukeboxConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    configPath?: string,
  ) {
    this.configPath = configPath ?? resolveDataDir('config.json');
  }

  public async load(): Promise<JukeboxConfig> {
    const fallback = defaultConfig();
    const raw = await this.storage.readJson(this.configPath, fallback, { writeIfMissing: true });
    const normalized = normalizeConfig(raw);
    this.config = normalized;
    if (serializeConfig(normalized) !== serializeConfig(raw)) {
      this.log.info('configuration normalised; rewriting file', { path: this.configPath });
      await this.save();
    }
    return normalized;
  }

  public get(): JukeboxConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(
    mutator: (config: JukeboxConfig) => void | Promise<void>,
  ): Promise<JukeboxConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    const next = normalizeConfig(current);
    if (serializeConfig(next) !== before) {
      next.updatedAt = new Date().toISOString();
    }
    this.config = next;
    await this.save();
    return next;
  }
}

export function createConfigRepository(storage: StoragePort, configPath?: string): ConfigRepository {
  return new ConfigRepository(storage, configPath);
}

function serializeConfig(config: unknown): string {
  return JSON.stringify(config, (key, value: unknown) => (key === 'updatedAt' ? undefined : value));
}

export function defaultConfig(): JukeboxConfig {
  return {
    device: {
      host: '',
      port: 1400,
      commandTimeoutMs: 2500,
    },
    media: {
      host: '',
      port: 8000,
      path: resolveDataDir('media'),
    },
    catalog: {
      path: resolveDataDir('catalog.json'),
    },
    controller: {
      commandQueueCapacity: 256,
      enqueueTimeoutMs: 250,
      dequeueTimeoutMs: 100,
      stopTimeoutMs: 5000,
      volumeStep: 1,
    },
    monitor: {
      pollIntervalMs: 500,
      errorBackoffMs: 5000,
    },
    events: {
      mailboxSize: 64,
      keepaliveMs: 15000,
    },
    logging: {
      level: 'info',
      json: false,
    },
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Fills missing sections from the defaults and clamps numeric settings.
 */
export function normalizeConfig(raw: unknown): JukeboxConfig {
  const defaults = defaultConfig();
  const source: RawRecord = isRecord(raw) ? raw : {};
  const device = section(source, 'device');
  const media = section(source, 'media');
  const catalog = section(source, 'catalog');
  const controller = section(source, 'controller');
  const monitor = section(source, 'monitor');
  const events = section(source, 'events');
  const logging = section(source, 'logging');

  return {
    device: {
      host: readString(device.host, defaults.device.host),
      port: readInt(device.port, defaults.device.port, 1, 65535),
      commandTimeoutMs: readInt(device.commandTimeoutMs, defaults.device.commandTimeoutMs, 100, 60000),
    },
    media: {
      host: readString(media.host, defaults.media.host),
      port: readInt(media.port, defaults.media.port, 1, 65535),
      path: readString(media.path, defaults.media.path),
    },
    catalog: {
      path: readString(catalog.path, defaults.catalog.path),
    },
    controller: {
      commandQueueCapacity: readInt(
        controller.commandQueueCapacity,
        defaults.controller.commandQueueCapacity,
        0,
        100000,
      ),
      enqueueTimeoutMs: readInt(controller.enqueueTimeoutMs, defaults.controller.enqueueTimeoutMs, 0, 60000),
      dequeueTimeoutMs: readInt(controller.dequeueTimeoutMs, defaults.controller.dequeueTimeoutMs, 10, 5000),
      stopTimeoutMs: readInt(controller.stopTimeoutMs, defaults.controller.stopTimeoutMs, 100, 60000),
      volumeStep: readInt(controller.volumeStep, defaults.controller.volumeStep, 1, 100),
    },
    monitor: {
      pollIntervalMs: readInt(monitor.pollIntervalMs, defaults.monitor.pollIntervalMs, 50, 60000),
      errorBackoffMs: readInt(monitor.errorBackoffMs, defaults.monitor.errorBackoffMs, 50, 300000),
    },
    events: {
      mailboxSize: readInt(events.mailboxSize, defaults.events.mailboxSize, 1, 10000),
      keepaliveMs: readInt(events.keepaliveMs, defaults.events.keepaliveMs, 1000, 300000),
    },
    logging: {
      level: isLogLevel(logging.level) ? logging.level : defaults.logging.level,
      json: typeof logging.json === 'boolean' ? logging.json : defaults.logging.json,
    },
    updatedAt: readString(source.updatedAt, defaults.updatedAt),
  };
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: RawRecord, key: string): RawRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value.trim() : fallback;
}

function readInt(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.round(value)));
}
