export interface StorageEntry {
  /** Full key, `/`-separated, relative to the backend root. */
  key: string;
  /** Last path segment of `key`. */
  name: string;
  modifiedMs: number;
}

/**
 * Flat key/prefix storage: a shared directory, or a bucket where `/` only
 * groups keys. Missing prefixes list as empty rather than failing.
 */
export interface StorageBackend {
  readonly location: string;
  put(key: string, data: string | Buffer): Promise<void>;
  get(key: string): Promise<Buffer>;
  /** Objects directly under `prefix`. */
  list(prefix: string): Promise<StorageEntry[]>;
  /** Names of the sub-prefixes directly under `prefix`. */
  listPrefixes(prefix: string): Promise<string[]>;
  remove(key: string): Promise<void>;
  /** Drops an emptied prefix; `false` while something is still under it. */
  removePrefixIfEmpty(prefix: string): Promise<boolean>;
}
