import WebSocket from "ws";
import { decodeServerFrame, encodeClientFrame, type ClientFrame, type ServerFrame } from "../codec/frames.js";
import type { RawData } from "../codec/json.js";
import type { ChatMessage } from "../codec/message.js";
import { DuplicateIdentityError, NotJoinedError } from "../errors.js";
import { messageFileName, messageId } from "../store/layout.js";
import { createLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/helpers.js";
import { BaseTransport } from "./base.js";
import { sendText, type SocketLike } from "./socket.js";

export interface PushTransportOptions {
  url: string;
  userId: string;
  username: string;
  /** Accept self-signed server certificates on wss:// URLs. */
  insecure?: boolean;
  joinTimeoutMs?: number;
  connect?: (url: string) => SocketLike;
}

type JoinWaiter = { resolve: () => void; reject: (e: Error) => void };

/** WebSocket client: joins on connect, then relays server frames as events. */
export class PushTransport extends BaseTransport {
  readonly name = "push";
  private socket: SocketLike | null = null;
  private joined = false;
  private joinWaiter: JoinWaiter | null = null;
  private closed: Promise<void> | null = null;
  private readonly names = new Map<string, string>();

  constructor(private readonly opts: PushTransportOptions) {
    super(opts.userId, opts.username, createLogger("push"));
  }

  private openSocket(): SocketLike {
    if (this.opts.connect) return this.opts.connect(this.opts.url);
    return new WebSocket(this.opts.url, { rejectUnauthorized: !this.opts.insecure });
  }

  async start(): Promise<void> {
    if (this.running) return;
    const socket = this.openSocket();
    this.socket = socket;
    this.events.reopen();
    this.closed = new Promise<void>((resolve) => {
      socket.on("close", () => {
        this.onClosed(new Error("connection closed"));
        resolve();
      });
    });
    socket.on("error", (e) => {
      this.log.warn(`socket error: ${e.message}`);
      this.joinWaiter?.reject(e);
      this.joinWaiter = null;
    });
    socket.on("message", (data) => this.onFrame(data));

    const joined = new Promise<void>((resolve, reject) => {
      this.joinWaiter = { resolve, reject };
    });
    socket.on("open", () => {
      sendText(socket, encodeClientFrame({ type: "join", userId: this.userId, username: this.username })).catch((e: Error) => {
        this.joinWaiter?.reject(e);
        this.joinWaiter = null;
      });
    });

    const timeoutMs = this.opts.joinTimeoutMs ?? 10_000;
    const settled = await withTimeout(joined, timeoutMs);
    try {
      if (!settled) throw new Error(`no answer to join within ${timeoutMs}ms`);
      await joined;
    } catch (e) {
      this.joinWaiter = null;
      socket.close();
      throw e;
    }
    this.running = true;
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    socket.close();
    if (this.closed) await withTimeout(this.closed, 1000);
    this.onClosed(null);
  }

  async sendPublic(body: string): Promise<void> {
    await this.sendFrame({ type: "chat", userId: this.userId, username: this.username, message: body });
  }

  async sendPrivate(targetId: string, body: string): Promise<void> {
    await this.sendFrame({ type: "private_chat", userId: this.userId, username: this.username, targetUserId: targetId, message: body });
  }

  async ping(): Promise<void> {
    await this.sendFrame({ type: "ping" });
  }

  private async sendFrame(frame: ClientFrame): Promise<void> {
    if (!this.socket || !this.joined) throw new NotJoinedError();
    await sendText(this.socket, encodeClientFrame(frame));
  }

  private onClosed(reason: Error | null): void {
    if (!this.socket) return;
    this.socket = null;
    this.joinWaiter?.reject(reason ?? new Error("connection closed"));
    this.joinWaiter = null;
    const wasJoined = this.joined;
    this.joined = false;
    this.running = false;
    if (wasJoined) this.deliver({ kind: "system", text: "Disconnected" });
    this.events.close();
  }

  private toMessage(frame: Extract<ServerFrame, { type: "chat" | "private_chat" }>): ChatMessage {
    const stampMs = Date.parse(frame.timestamp);
    return {
      id: messageId(messageFileName(Number.isNaN(stampMs) ? Date.now() : stampMs, frame.userId)),
      kind: frame.type === "chat" ? { type: "public" } : { type: "private", targetId: frame.targetUserId },
      senderId: frame.userId,
      senderName: frame.username || frame.userId,
      body: frame.message,
      timestamp: frame.timestamp,
    };
  }

  private presence(ids: string[]): void {
    this.deliver({ kind: "presence", users: ids.map((userId) => ({ userId, displayName: this.names.get(userId) ?? userId })) });
  }

  private onFrame(data: RawData): void {
    const decoded = decodeServerFrame(data);
    if (!decoded.ok) {
      this.log.warn(`ignoring frame: ${decoded.error.message}`);
      return;
    }
    const frame = decoded.value;
    switch (frame.type) {
      case "join_success":
        this.joined = true;
        this.deliver({ kind: "system", text: frame.message });
        this.joinWaiter?.resolve();
        this.joinWaiter = null;
        return;
      case "error":
        if (!this.joined && this.joinWaiter) {
          const e = frame.code === "duplicate_identity" ? new DuplicateIdentityError(this.userId) : new Error(frame.message);
          this.joinWaiter.reject(e);
          this.joinWaiter = null;
          return;
        }
        this.deliver({ kind: "error", code: frame.code ?? null, text: frame.message });
        return;
      case "chat":
      case "private_chat":
        if (frame.username) this.names.set(frame.userId, frame.username);
        this.deliver({ kind: "message", message: this.toMessage(frame) });
        return;
      case "user_joined":
        this.names.set(frame.userId, frame.username);
        this.deliver({ kind: "system", text: `${frame.username || frame.userId} joined` });
        this.presence(frame.onlineUsers);
        return;
      case "user_left":
        this.deliver({ kind: "system", text: `${this.names.get(frame.userId) ?? frame.userId} left` });
        this.names.delete(frame.userId);
        this.presence(frame.onlineUsers);
        return;
      case "pong":
        this.log.debug("pong");
        return;
    }
  }
}
