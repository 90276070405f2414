import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage, safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensures that the given directory path exists on disk.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Resolves an absolute path under the `data` directory of the working directory.
 */
export function resolveDataDir(...segments: string[]): string {
  return path.resolve(process.cwd(), 'data', ...segments);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Reads a JSON file and returns its parsed value; missing or corrupt files yield undefined.
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
  }
  return parsed;
}

/**
 * Serializes an object to JSON and writes it to disk (pretty printed).
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
