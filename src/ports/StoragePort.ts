export type StorageReadOptions = {
  writeIfMissing?: boolean;
};

export interface StoragePort {
  /** Parsed file contents, or the fallback when the file is missing or corrupt. */
  readJson(path: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
}
