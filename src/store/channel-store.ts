import { randomUUID } from "node:crypto";
import { decodeMessage, encodeMessage, type ChatMessage, type FileRef, type MessageKind } from "../codec/message.js";
import { StorageReadError, StorageWriteError, describeError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { StorageBackend } from "./backend.js";
import {
  PRIVATE_PREFIX,
  PUBLIC_PREFIX,
  USERS_PREFIX,
  isHeartbeatFile,
  isMessageFile,
  joinKey,
  messageFileName,
  messageId,
  pairIncludes,
  privateChannelPrefix,
} from "./layout.js";

function visibleTo(msg: ChatMessage, userId: string): boolean {
  return msg.kind.type === "public" || msg.senderId === userId || msg.kind.targetId === userId;
}

export interface OutgoingMessage {
  kind: MessageKind;
  senderId: string;
  senderName: string;
  body: string;
  attachment?: FileRef;
}

/** What `listNew` consults to skip entries; `reject` is told about entries it will never return. */
export interface SeenFilter {
  has(id: string): boolean;
  reject?(id: string): void;
}

export interface StorageInfo {
  publicMessages: number;
  privateMessages: number;
  heartbeats: number;
  totalFiles: number;
}

/**
 * Append-only message store over shared storage. Each message is one
 * object, never rewritten, under `public/` or `private/<pair>/`.
 */
export class ShareChannelStore {
  private lastStampMs = 0;
  private readonly log: Logger;

  constructor(
    readonly backend: StorageBackend,
    private readonly clock: () => number = Date.now,
    log?: Logger,
  ) {
    this.log = log ?? createLogger("share");
  }

  /** Write time for the next message, strictly increasing for this writer. */
  private nextStampMs(): number {
    this.lastStampMs = Math.max(this.clock(), this.lastStampMs + 1);
    return this.lastStampMs;
  }

  async checkAccess(): Promise<boolean> {
    const key = `test_${randomUUID().replace(/-/g, "").slice(0, 8)}.tmp`;
    try {
      await this.backend.put(key, "test");
      await this.backend.remove(key);
      return true;
    } catch (e) {
      this.log.error(`access check failed for ${this.backend.location}: ${describeError(e)}`);
      return false;
    }
  }

  async send(out: OutgoingMessage): Promise<ChatMessage> {
    const stampMs = this.nextStampMs();
    const name = messageFileName(stampMs, out.senderId);
    const prefix = out.kind.type === "public" ? PUBLIC_PREFIX : privateChannelPrefix(out.senderId, out.kind.targetId);
    const msg: ChatMessage = {
      id: messageId(name),
      kind: out.kind,
      senderId: out.senderId,
      senderName: out.senderName,
      body: out.body,
      timestamp: new Date(stampMs).toISOString(),
    };
    if (out.attachment) msg.attachment = out.attachment;

    const key = joinKey(prefix, name);
    try {
      await this.backend.put(key, encodeMessage(msg));
    } catch (e) {
      throw new StorageWriteError(key, e);
    }
    this.log.debug(`wrote ${key}`);
    return msg;
  }

  sendPublic(senderId: string, senderName: string, body: string, attachment?: FileRef): Promise<ChatMessage> {
    return this.send({ kind: { type: "public" }, senderId, senderName, body, attachment });
  }

  sendPrivate(senderId: string, senderName: string, targetId: string, body: string, attachment?: FileRef): Promise<ChatMessage> {
    return this.send({ kind: { type: "private", targetId }, senderId, senderName, body, attachment });
  }

  /**
   * Messages visible to `consumerId` (public plus every private channel it
   * belongs to) that `seen` does not know yet, in no particular order.
   * Unreadable prefixes and undecodable entries are logged and skipped.
   */
  async listNew(consumerId: string, seen: SeenFilter): Promise<ChatMessage[]> {
    const prefixes = [PUBLIC_PREFIX];
    try {
      for (const pair of await this.backend.listPrefixes(PRIVATE_PREFIX)) {
        if (pairIncludes(pair, consumerId)) prefixes.push(joinKey(PRIVATE_PREFIX, pair));
      }
    } catch (e) {
      this.log.warn(new StorageReadError(PRIVATE_PREFIX, e).message);
    }

    const out: ChatMessage[] = [];
    for (const prefix of prefixes) {
      try {
        out.push(...(await this.scan(prefix, consumerId, seen)));
      } catch (e) {
        this.log.warn(new StorageReadError(prefix, e).message);
      }
    }
    return out;
  }

  private async scan(prefix: string, consumerId: string, seen: SeenFilter): Promise<ChatMessage[]> {
    const out: ChatMessage[] = [];
    for (const entry of await this.backend.list(prefix)) {
      if (!isMessageFile(entry.name)) continue;
      const id = messageId(entry.name);
      if (seen.has(id)) continue;
      let data: Buffer;
      try {
        data = await this.backend.get(entry.key);
      } catch (e) {
        // possibly swept since listing; retried next poll
        this.log.debug(`failed to read ${entry.key}: ${describeError(e)}`);
        continue;
      }
      const decoded = decodeMessage(data, id);
      if (!decoded.ok) {
        this.log.warn(`skipping ${entry.key}: ${decoded.error.message}`);
        seen.reject?.(id);
      } else if (!visibleTo(decoded.value, consumerId)) {
        // pair names are ambiguous when ids contain "_"
        seen.reject?.(id);
      } else {
        out.push(decoded.value);
      }
    }
    return out;
  }

  async storageInfo(): Promise<StorageInfo> {
    const count = async (prefix: string, match: (name: string) => boolean) =>
      (await this.backend.list(prefix)).filter((e) => match(e.name)).length;

    const publicMessages = await count(PUBLIC_PREFIX, isMessageFile);
    let privateMessages = 0;
    for (const pair of await this.backend.listPrefixes(PRIVATE_PREFIX)) {
      privateMessages += await count(joinKey(PRIVATE_PREFIX, pair), isMessageFile);
    }
    const heartbeats = await count(USERS_PREFIX, isHeartbeatFile);
    return { publicMessages, privateMessages, heartbeats, totalFiles: publicMessages + privateMessages + heartbeats };
  }
}
