import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from '../testHarness';
import { ConfigRepository, defaultConfig, normalizeConfig } from '../../src/application/config/configRepository';
import { StorageAdapter } from '../../src/adapters/storage/StorageAdapter';
import { createRuntimePorts } from '../../src/runtime/ports';

async function withConfigPath(fn: (configPath: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jukebox-config-'));
  try {
    await fn(path.join(dir, 'config.json'));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function readConfigFile(configPath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(configPath, 'utf8'));
}

test('config is written with defaults when missing', async () => {
  await withConfigPath(async (configPath) => {
    const repo = new ConfigRepository(new StorageAdapter(), configPath);
    assert.throws(() => repo.get(), /configuration not loaded/);

    const config = await repo.load();

    assert.equal(config.device.port, 1400);
    assert.equal(config.controller.commandQueueCapacity, 256);
    assert.equal(config.monitor.pollIntervalMs, 500);
    assert.equal(normalizeConfig(await readConfigFile(configPath)).events.mailboxSize, 64);
    assert.equal(repo.get(), config);
  });
});

test('config values are clamped and rewritten', async () => {
  await withConfigPath(async (configPath) => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        device: { host: ' 192.0.2.4 ' },
        controller: { volumeStep: 500, dequeueTimeoutMs: 'fast' },
        logging: { level: 'loud', json: true },
      }),
    );
    const repo = new ConfigRepository(new StorageAdapter(), configPath);

    const config = await repo.load();

    assert.equal(config.device.host, '192.0.2.4');
    assert.equal(config.controller.volumeStep, 100);
    assert.equal(config.controller.dequeueTimeoutMs, 100);
    assert.equal(config.logging.level, 'info');
    assert.equal(config.logging.json, true);
    const onDisk = normalizeConfig(await readConfigFile(configPath));
    assert.equal(onDisk.controller.volumeStep, 100);
    assert.equal(onDisk.device.host, '192.0.2.4');
  });
});

test('corrupt config falls back to defaults', async () => {
  await withConfigPath(async (configPath) => {
    await fs.writeFile(configPath, '{bad-json');
    const repo = new ConfigRepository(new StorageAdapter(), configPath);

    const config = await repo.load();

    assert.deepEqual({ ...config, updatedAt: '' }, { ...defaultConfig(), updatedAt: '' });
  });
});

test('config updates persist across loads', async () => {
  await withConfigPath(async (configPath) => {
    const repo = new ConfigRepository(new StorageAdapter(), configPath);
    await repo.load();

    const updated = await repo.update((config) => {
      config.device.host = '192.0.2.9';
      config.events.mailboxSize = 0;
    });

    assert.equal(updated.device.host, '192.0.2.9');
    assert.equal(updated.events.mailboxSize, 1);
    const reloaded = await new ConfigRepository(new StorageAdapter(), configPath).load();
    assert.equal(reloaded.device.host, '192.0.2.9');
    assert.equal(reloaded.events.mailboxSize, 1);
  });
});

test('runtime config port reads and updates through the repository', async () => {
  await withConfigPath(async (configPath) => {
    const { config } = createRuntimePorts({ configPath });

    await config.load();
    assert.equal(config.getConfig().monitor.errorBackoffMs, 5000);

    await config.updateConfig((draft) => {
      draft.monitor.pollIntervalMs = 250;
    });
    assert.equal(config.getConfig().monitor.pollIntervalMs, 250);
    assert.equal(normalizeConfig(await readConfigFile(configPath)).monitor.pollIntervalMs, 250);
  });
});
