import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { StorageBackend, StorageEntry } from "./backend.js";
import { joinKey } from "./layout.js";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Shared-directory backend. Writes land in a temp file and are renamed into place. */
export class FileSystemBackend implements StorageBackend {
  readonly location: string;

  constructor(root: string) {
    this.location = path.resolve(root);
  }

  private resolve(key: string): string {
    const full = path.resolve(this.location, ...key.split("/").filter(Boolean));
    if (full !== this.location && !full.startsWith(this.location + path.sep)) {
      throw new Error(`key escapes storage root: ${key}`);
    }
    return full;
  }

  async put(key: string, data: string | Buffer): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = `${target}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await fs.writeFile(temp, data);
      await fs.rename(temp, target);
    } catch (e) {
      await fs.rm(temp, { force: true });
      throw e;
    }
  }

  async get(key: string): Promise<Buffer> {
    return fs.readFile(this.resolve(key));
  }

  async list(prefix: string): Promise<StorageEntry[]> {
    const dir = this.resolve(prefix);
    let names: string[];
    try {
      const dirents = await fs.readdir(dir, { withFileTypes: true });
      names = dirents.filter((d) => d.isFile()).map((d) => d.name);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }
    const out: StorageEntry[] = [];
    for (const name of names) {
      try {
        const st = await fs.stat(path.join(dir, name));
        out.push({ key: joinKey(prefix, name), name, modifiedMs: st.mtimeMs });
      } catch (e) {
        // removed between readdir and stat
        if (!isNotFound(e)) throw e;
      }
    }
    return out;
  }

  async listPrefixes(prefix: string): Promise<string[]> {
    try {
      const dirents = await fs.readdir(this.resolve(prefix), { withFileTypes: true });
      return dirents.filter((d) => d.isDirectory()).map((d) => d.name);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }
  }

  async remove(key: string): Promise<void> {
    await fs.unlink(this.resolve(key));
  }

  async removePrefixIfEmpty(prefix: string): Promise<boolean> {
    const dir = this.resolve(prefix);
    try {
      if ((await fs.readdir(dir)).length > 0) return false;
      await fs.rmdir(dir);
      return true;
    } catch (e) {
      if (isNotFound(e)) return true;
      throw e;
    }
  }
}
