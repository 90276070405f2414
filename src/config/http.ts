import type { EnvironmentConfig } from '@/config/environment';

/**
 * Runtime options for the HTTP gateway.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
  /** Largest accepted JSON request body. */
  maxBodyBytes: number;
}

export const MAX_JSON_BODY_BYTES = 1024 * 1024;

/**
 * Creates the HTTP gateway configuration from environment settings.
 */
export function buildHttpServerConfig(env: EnvironmentConfig): HttpServerConfig {
  return {
    port: env.httpPort,
    host: env.httpHost,
    maxBodyBytes: MAX_JSON_BODY_BYTES,
  };
}
