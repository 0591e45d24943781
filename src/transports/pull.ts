import type { ChatMessage, FileRef } from "../codec/message.js";
import { StorageWriteError, describeError } from "../errors.js";
import { HeartbeatService, DEFAULT_HEARTBEAT_INTERVAL_MS } from "../heartbeat/service.js";
import { DEFAULT_PRESENCE_TTL_S, HeartbeatRegistry } from "../presence/heartbeat-registry.js";
import type { OnlineUser } from "../presence/types.js";
import { AttachmentStore } from "../store/attachments.js";
import type { StorageBackend } from "../store/backend.js";
import { ShareChannelStore } from "../store/channel-store.js";
import { isSafeId } from "../store/layout.js";
import { DEFAULT_CACHE_LIMIT, DedupCache } from "../sync/dedup-cache.js";
import { createLogger } from "../utils/logger.js";
import { PeriodicTask } from "../utils/periodic.js";
import { BaseTransport } from "./base.js";

export const DEFAULT_POLL_INTERVAL_MS = 3000;
export const DEFAULT_STOP_TIMEOUT_MS = 1000;

export interface PullTransportOptions {
  backend: StorageBackend;
  userId: string;
  username: string;
  pollIntervalMs?: number;
  heartbeatIntervalMs?: number;
  presenceTtlS?: number;
  cacheLimit?: number;
  stopTimeoutMs?: number;
  clock?: () => number;
}

function sameUsers(a: readonly OnlineUser[], b: readonly OnlineUser[]): boolean {
  return a.length === b.length && a.every((u, i) => u.userId === b[i].userId && u.displayName === b[i].displayName);
}

/**
 * Chat over a shared directory or bucket. One loop polls for new messages,
 * another refreshes this user's heartbeat; only the poll loop touches the
 * dedup cache, and results reach the UI through `events`.
 */
export class PullTransport extends BaseTransport {
  readonly name = "share";
  readonly store: ShareChannelStore;
  readonly presence: HeartbeatRegistry;
  readonly attachments: AttachmentStore;
  private readonly cache: DedupCache;
  private readonly heartbeat: HeartbeatService;
  private readonly sync: PeriodicTask;
  private readonly stopTimeoutMs: number;
  private online: OnlineUser[] = [];

  constructor(opts: PullTransportOptions) {
    super(opts.userId, opts.username, createLogger("sync"));
    if (!isSafeId(opts.userId)) throw new Error(`Invalid user ID '${opts.userId}'`);
    const clock = opts.clock ?? Date.now;
    this.store = new ShareChannelStore(opts.backend, clock);
    this.presence = new HeartbeatRegistry(opts.backend, opts.presenceTtlS ?? DEFAULT_PRESENCE_TTL_S, clock);
    this.attachments = new AttachmentStore(opts.backend, clock);
    this.cache = new DedupCache(opts.cacheLimit ?? DEFAULT_CACHE_LIMIT);
    this.heartbeat = new HeartbeatService(this.presence, opts.userId, opts.username, opts.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS);
    this.sync = new PeriodicTask(
      "sync",
      opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      async () => {
        await this.pollOnce();
      },
      this.log,
    );
    this.stopTimeoutMs = opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  async start(): Promise<void> {
    if (this.running) return;
    if (!(await this.store.checkAccess())) {
      throw new StorageWriteError(this.store.backend.location, new Error("storage is not writable"));
    }
    await this.heartbeat.triggerNow();
    this.events.reopen();
    this.running = true;
    this.heartbeat.start({ delayFirst: true });
    this.sync.start();
    this.deliver({ kind: "system", text: `Connected to ${this.store.backend.location}` });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await Promise.all([this.sync.stop(this.stopTimeoutMs), this.heartbeat.stop(this.stopTimeoutMs)]);
    this.deliver({ kind: "system", text: "Disconnected" });
    this.events.close();
  }

  async sendPublic(body: string): Promise<void> {
    await this.store.sendPublic(this.userId, this.username, body);
  }

  async sendPrivate(targetId: string, body: string): Promise<void> {
    if (!isSafeId(targetId)) throw new Error(`Invalid user ID '${targetId}'`);
    await this.store.sendPrivate(this.userId, this.username, targetId, body);
  }

  /** Uploads `localPath` and posts it publicly, or privately when `targetId` is given. */
  async sendFile(localPath: string, targetId?: string): Promise<FileRef> {
    const ref = await this.attachments.upload(localPath, this.userId, this.username);
    const body = `[file] ${ref.originalName}`;
    if (targetId) await this.store.sendPrivate(this.userId, this.username, targetId, body, ref);
    else await this.store.sendPublic(this.userId, this.username, body, ref);
    return ref;
  }

  /** Copies a received attachment into `destDir`; returns the written path. */
  downloadFile(ref: FileRef, destDir: string): Promise<string> {
    return this.attachments.download(ref, destDir);
  }

  /** One sync pass: deliver unseen messages in timestamp order, then any presence change. */
  async pollOnce(): Promise<ChatMessage[]> {
    const fresh = this.cache.filterNew(await this.store.listNew(this.userId, this.cache));
    for (const message of fresh) this.deliver({ kind: "message", message });

    try {
      const online = await this.presence.listOnline();
      if (!sameUsers(online, this.online)) {
        this.online = online;
        this.deliver({ kind: "presence", users: online });
      }
    } catch (e) {
      this.log.warn(`failed to list online users: ${describeError(e)}`);
    }
    return fresh;
  }

  get onlineUsers(): readonly OnlineUser[] {
    return this.online;
  }
}
