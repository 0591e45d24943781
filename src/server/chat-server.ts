import fs from "node:fs";
import https from "node:https";
import { WebSocketServer } from "ws";
import { decodeClientFrame, encodeServerFrame, type ClientFrame, type ServerFrame } from "../codec/frames.js";
import type { RawData } from "../codec/json.js";
import { NotJoinedError, TargetOfflineError, describeError, type ChatError } from "../errors.js";
import { ConnectionRegistry } from "../presence/connection-registry.js";
import { sendText, type SocketLike } from "../transports/socket.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface TlsFiles {
  cert: string;
  key: string;
}

export interface ChatServerOptions {
  host: string;
  port: number;
  tls?: TlsFiles;
  clock?: () => number;
}

type SessionState = "joining" | "joined" | "closed";

/** One per socket: `joining` until a join succeeds, `closed` once the socket goes away. */
interface Session {
  socket: SocketLike;
  state: SessionState;
  userId: string | null;
  username: string;
}

/**
 * Push transport server. All connection bookkeeping happens in event-loop
 * callbacks, and `register` runs before any await, so two joins racing for
 * one ID cannot both succeed.
 */
export class ChatServer {
  readonly registry = new ConnectionRegistry<SocketLike>();
  private readonly sessions = new Set<Session>();
  private readonly log: Logger;
  private readonly clock: () => number;
  private wss: WebSocketServer | null = null;
  private httpsServer: https.Server | null = null;

  constructor(private readonly opts: ChatServerOptions) {
    this.log = createLogger("server");
    this.clock = opts.clock ?? Date.now;
  }

  get protocol(): "ws" | "wss" {
    return this.opts.tls ? "wss" : "ws";
  }

  async listen(): Promise<{ url: string; port: number }> {
    const wss = await new Promise<WebSocketServer>((resolve, reject) => {
      const tls = this.opts.tls;
      if (tls) {
        const httpsServer = https.createServer({ cert: fs.readFileSync(tls.cert), key: fs.readFileSync(tls.key) });
        this.httpsServer = httpsServer;
        const server = new WebSocketServer({ server: httpsServer });
        httpsServer.once("error", reject);
        httpsServer.listen(this.opts.port, this.opts.host, () => resolve(server));
      } else {
        const server = new WebSocketServer({ host: this.opts.host, port: this.opts.port });
        server.once("error", reject);
        server.once("listening", () => resolve(server));
      }
    });
    this.wss = wss;
    wss.on("connection", (socket) => this.handleConnection(socket));

    const address = (this.httpsServer ?? wss).address();
    const port = typeof address === "object" && address ? address.port : this.opts.port;
    const url = `${this.protocol}://${this.opts.host}:${port}`;
    this.log.info(`listening on ${url}`);
    return { url, port };
  }

  async close(): Promise<void> {
    for (const session of this.sessions) session.socket.close();
    const wss = this.wss;
    this.wss = null;
    if (wss) await new Promise<void>((resolve, reject) => wss.close((e) => (e ? reject(e) : resolve())));
    const httpsServer = this.httpsServer;
    this.httpsServer = null;
    if (httpsServer) await new Promise<void>((resolve, reject) => httpsServer.close((e) => (e ? reject(e) : resolve())));
    this.log.info("stopped");
  }

  handleConnection(socket: SocketLike): void {
    const session: Session = { socket, state: "joining", userId: null, username: "" };
    this.sessions.add(session);
    socket.on("message", (data) => {
      this.handleFrame(session, data).catch((e: unknown) => {
        this.log.error(`failed to handle frame: ${describeError(e)}`);
      });
    });
    socket.on("close", () => this.disconnect(session));
    socket.on("error", (e) => {
      this.log.warn(`socket error${session.userId ? ` (${session.userId})` : ""}: ${e.message}`);
      this.disconnect(session);
    });
  }

  private async handleFrame(session: Session, data: RawData): Promise<void> {
    if (session.state === "closed") return;
    const decoded = decodeClientFrame(data);
    if (!decoded.ok) return this.reply(session, this.errorFrame(decoded.error));
    const frame = decoded.value;
    switch (frame.type) {
      case "join":
        return this.join(session, frame);
      case "chat":
        return this.chat(session, frame);
      case "private_chat":
        return this.privateChat(session, frame);
      case "ping":
        return this.reply(session, { type: "pong" });
    }
  }

  private async join(session: Session, frame: Extract<ClientFrame, { type: "join" }>): Promise<void> {
    if (session.state === "joined") {
      return this.reply(session, { type: "error", message: `Already joined as '${session.userId}'` });
    }
    if (!frame.userId || !frame.username) {
      return this.reply(session, { type: "error", message: "User ID and username are required" });
    }
    const registered = this.registry.register(frame.userId, frame.username, session.socket);
    if (!registered.ok) {
      this.log.info(`rejected duplicate join for ${frame.userId}`);
      return this.reply(session, this.errorFrame(registered.error));
    }
    session.state = "joined";
    session.userId = frame.userId;
    session.username = frame.username;
    this.log.info(`${frame.username} (${frame.userId}) joined`);

    await this.broadcast({
      type: "user_joined",
      userId: frame.userId,
      username: frame.username,
      onlineUsers: this.registry.onlineIds(),
      timestamp: this.now(),
    });
    await this.reply(session, { type: "join_success", message: "Joined the chat room" });
  }

  private async chat(session: Session, frame: Extract<ClientFrame, { type: "chat" }>): Promise<void> {
    if (session.state !== "joined" || !session.userId) return this.reply(session, this.errorFrame(new NotJoinedError()));
    await this.broadcast({
      type: "chat",
      userId: session.userId,
      username: session.username,
      message: frame.message,
      timestamp: this.now(),
    });
  }

  private async privateChat(session: Session, frame: Extract<ClientFrame, { type: "private_chat" }>): Promise<void> {
    if (session.state !== "joined" || !session.userId) return this.reply(session, this.errorFrame(new NotJoinedError()));
    if (!frame.targetUserId) return this.reply(session, { type: "error", message: "Target user ID is required" });
    const target = this.registry.get(frame.targetUserId);
    if (!target) return this.reply(session, this.errorFrame(new TargetOfflineError(frame.targetUserId)));

    const out: ServerFrame = {
      type: "private_chat",
      userId: session.userId,
      username: session.username,
      targetUserId: frame.targetUserId,
      message: frame.message,
      timestamp: this.now(),
    };
    const recipients = target === session.socket ? [target] : [target, session.socket];
    await this.fanOut(recipients, out);
  }

  private disconnect(session: Session): void {
    if (session.state === "closed") return;
    const wasJoined = session.state === "joined";
    session.state = "closed";
    this.sessions.delete(session);
    if (!wasJoined || !session.userId) return;
    if (!this.registry.deregister(session.userId, session.socket)) return;
    this.log.info(`${session.username} (${session.userId}) left`);
    this.broadcast({
      type: "user_left",
      userId: session.userId,
      onlineUsers: this.registry.onlineIds(),
      timestamp: this.now(),
    }).catch((e: unknown) => this.log.error(`failed to announce leave: ${describeError(e)}`));
  }

  private errorFrame(e: ChatError): ServerFrame {
    return { type: "error", message: e.message, code: e.code };
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }

  private async reply(session: Session, frame: ServerFrame): Promise<void> {
    try {
      await sendText(session.socket, encodeServerFrame(frame));
    } catch (e) {
      this.log.warn(`failed to reply${session.userId ? ` to ${session.userId}` : ""}: ${describeError(e)}`);
    }
  }

  private broadcast(frame: ServerFrame): Promise<void> {
    return this.fanOut(this.registry.connections(), frame);
  }

  /** Sends to every socket; one failed send neither delays nor fails the others. */
  private async fanOut(sockets: SocketLike[], frame: ServerFrame): Promise<void> {
    if (!sockets.length) return;
    const data = encodeServerFrame(frame);
    const results = await Promise.allSettled(sockets.map((s) => sendText(s, data)));
    const failed = results.filter((r) => r.status === "rejected").length;
    if (failed) this.log.warn(`${frame.type}: ${failed}/${sockets.length} sends failed`);
  }
}
