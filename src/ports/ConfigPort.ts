import type { JukeboxConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<JukeboxConfig>;
  getConfig(): JukeboxConfig;
  updateConfig(
    mutator: (config: JukeboxConfig) => void | Promise<void>,
  ): Promise<JukeboxConfig>;
}

export type { JukeboxConfig };
