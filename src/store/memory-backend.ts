import type { StorageBackend, StorageEntry } from "./backend.js";

interface StoredObject {
  data: Buffer;
  modifiedMs: number;
}

/**
 * Bucket-style backend held in process memory. Prefixes exist only while
 * some key lives under them, as in object storage.
 */
export class MemoryBackend implements StorageBackend {
  readonly location: string;
  private readonly objects = new Map<string, StoredObject>();

  constructor(location = "memory://", private readonly clock: () => number = Date.now) {
    this.location = location;
  }

  async put(key: string, data: string | Buffer): Promise<void> {
    this.objects.set(key, { data: Buffer.from(data), modifiedMs: this.clock() });
  }

  async get(key: string): Promise<Buffer> {
    const obj = this.objects.get(key);
    if (!obj) throw new Error(`no such key: ${key}`);
    return Buffer.from(obj.data);
  }

  async list(prefix: string): Promise<StorageEntry[]> {
    const base = prefix ? `${prefix}/` : "";
    const out: StorageEntry[] = [];
    for (const [key, obj] of this.objects) {
      if (!key.startsWith(base)) continue;
      const rest = key.slice(base.length);
      if (!rest || rest.includes("/")) continue;
      out.push({ key, name: rest, modifiedMs: obj.modifiedMs });
    }
    return out;
  }

  async listPrefixes(prefix: string): Promise<string[]> {
    const base = prefix ? `${prefix}/` : "";
    const found = new Set<string>();
    for (const key of this.objects.keys()) {
      if (!key.startsWith(base)) continue;
      const rest = key.slice(base.length);
      const slash = rest.indexOf("/");
      if (slash > 0) found.add(rest.slice(0, slash));
    }
    return [...found];
  }

  async remove(key: string): Promise<void> {
    if (!this.objects.delete(key)) throw new Error(`no such key: ${key}`);
  }

  async removePrefixIfEmpty(prefix: string): Promise<boolean> {
    const base = `${prefix}/`;
    for (const key of this.objects.keys()) if (key.startsWith(base)) return false;
    return true;
  }

  /** Overrides the modification time of `key`. */
  touch(key: string, modifiedMs: number): void {
    const obj = this.objects.get(key);
    if (obj) obj.modifiedMs = modifiedMs;
  }

  get size(): number {
    return this.objects.size;
  }
}
