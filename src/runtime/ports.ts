import type { StoragePort } from '@/ports/StoragePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { ConfigRepository } from '@/application/config/configRepository';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
};

export function createRuntimePorts(options: { configPath?: string } = {}): RuntimePorts {
  const storage = new StorageAdapter();
  const configRepository = new ConfigRepository(storage, options.configPath);
  return {
    storage,
    config: new ConfigAdapter(configRepository),
  };
}
