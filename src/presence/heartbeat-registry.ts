import { decodeHeartbeat, encodeHeartbeat, type HeartbeatRecord } from "../codec/message.js";
import { StorageWriteError, describeError } from "../errors.js";
import type { StorageBackend } from "../store/backend.js";
import { heartbeatKey, isHeartbeatFile, USERS_PREFIX } from "../store/layout.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { OnlineUser } from "./types.js";

export const DEFAULT_PRESENCE_TTL_S = 300;

/**
 * TTL-approximate presence for the pull transport. A user is online while
 * their heartbeat record is younger than the TTL; there is no leave signal.
 */
export class HeartbeatRegistry {
  private readonly log: Logger;

  constructor(
    private readonly backend: StorageBackend,
    private readonly ttlS = DEFAULT_PRESENCE_TTL_S,
    private readonly clock: () => number = Date.now,
    log?: Logger,
  ) {
    this.log = log ?? createLogger("heartbeat");
  }

  /** Same as `heartbeat`; repeated calls are idempotent upserts. */
  async register(userId: string, displayName: string): Promise<HeartbeatRecord> {
    return this.heartbeat(userId, displayName);
  }

  async heartbeat(userId: string, displayName: string): Promise<HeartbeatRecord> {
    const rec: HeartbeatRecord = {
      userId,
      displayName,
      lastActive: new Date(this.clock()).toISOString(),
      status: "online",
      ttlS: this.ttlS,
    };
    const key = heartbeatKey(userId);
    try {
      await this.backend.put(key, encodeHeartbeat(rec));
    } catch (e) {
      throw new StorageWriteError(key, e);
    }
    return rec;
  }

  /** The record is left to age out. */
  deregister(userId: string): void {
    this.log.debug(`${userId} left; heartbeat expires after ${this.ttlS}s`);
  }

  async listOnline(nowMs = this.clock(), ttlS = this.ttlS): Promise<OnlineUser[]> {
    const online: OnlineUser[] = [];
    for (const rec of await this.readAll()) {
      const age = nowMs - Date.parse(rec.lastActive);
      if (age < ttlS * 1000) online.push({ userId: rec.userId, displayName: rec.displayName });
    }
    return online.sort((a, b) => a.userId.localeCompare(b.userId));
  }

  async readAll(): Promise<HeartbeatRecord[]> {
    const entries = await this.backend.list(USERS_PREFIX);
    const out: HeartbeatRecord[] = [];
    for (const entry of entries) {
      if (!isHeartbeatFile(entry.name)) continue;
      let data: Buffer;
      try {
        data = await this.backend.get(entry.key);
      } catch (e) {
        this.log.warn(`failed to read ${entry.key}: ${describeError(e)}`);
        continue;
      }
      const rec = decodeHeartbeat(data);
      if (rec.ok) out.push(rec.value);
      else this.log.warn(`skipping ${entry.key}: ${rec.error.message}`);
    }
    return out;
  }
}
