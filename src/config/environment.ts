import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  httpPort: number;
  httpHost: string;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  httpPort: 8001,
  httpHost: '0.0.0.0',
};

/**
 * Returns the static environment configuration (ENV overrides are not supported).
 */
export function loadEnvironment(): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT };
}
