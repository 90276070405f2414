import { networkInterfaces } from 'node:os';

export function defaultLocalIp(): string {
  const nets = networkInterfaces();
  for (const name of Object.keys(nets)) {
    for (const net of nets[name] || []) {
      if (!net || net.internal) {
        continue;
      }
      if (net.family === 'IPv4' && net.address) {
        return net.address;
      }
    }
  }
  return '';
}

/**
 * Picks the host renderers should use to reach the media server.
 */
export function resolveMediaHost(configured?: string): string {
  const trimmed = configured?.trim();
  if (trimmed && trimmed !== '0.0.0.0') {
    return trimmed;
  }
  return defaultLocalIp() || '127.0.0.1';
}

/**
 * Encodes each segment of a media path while keeping the separators.
 */
export function encodeMediaPath(mediaPath: string): string {
  const normalized = mediaPath.startsWith('/') ? mediaPath : `/${mediaPath}`;
  return normalized
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}
