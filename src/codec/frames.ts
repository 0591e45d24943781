import { MalformedEnvelopeError } from "../errors.js";
import { err, ok, type Json, type Result } from "../types.js";
import { parseObject, readString, readStringArray, type RawData } from "./json.js";

export type ClientFrame =
  | { type: "join"; userId: string; username: string }
  | { type: "chat"; userId: string; username: string; message: string }
  | { type: "private_chat"; userId: string; username: string; targetUserId: string; message: string }
  | { type: "ping" };

export type ServerFrame =
  | { type: "join_success"; message: string }
  /** `code` is an optional machine-readable hint; older peers ignore it. */
  | { type: "error"; message: string; code?: string }
  | { type: "chat"; userId: string; username: string; message: string; timestamp: string }
  | { type: "private_chat"; userId: string; username: string; targetUserId: string; message: string; timestamp: string }
  | { type: "user_joined"; userId: string; username: string; onlineUsers: string[]; timestamp: string }
  | { type: "user_left"; userId: string; onlineUsers: string[]; timestamp: string }
  | { type: "pong" };

function assertNever(x: never): never {
  throw new Error(`Unhandled frame: ${JSON.stringify(x)}`);
}

export function encodeClientFrame(frame: ClientFrame): string {
  let out: { [k: string]: Json };
  switch (frame.type) {
    case "join":
      out = { type: "join", user_id: frame.userId, username: frame.username };
      break;
    case "chat":
      out = { type: "chat", user_id: frame.userId, username: frame.username, message: frame.message };
      break;
    case "private_chat":
      out = {
        type: "private_chat",
        user_id: frame.userId,
        username: frame.username,
        target_user_id: frame.targetUserId,
        message: frame.message,
      };
      break;
    case "ping":
      out = { type: "ping" };
      break;
    default:
      return assertNever(frame);
  }
  return JSON.stringify(out);
}

/** String fields default to "" so the server can answer a missing field with its own error. */
export function decodeClientFrame(data: RawData): Result<ClientFrame, MalformedEnvelopeError> {
  const parsed = parseObject(data);
  if (!parsed.ok) return parsed;
  const obj = parsed.value;
  const type = readString(obj, "type");
  const userId = readString(obj, "user_id") ?? "";
  const username = readString(obj, "username") ?? "";
  const message = readString(obj, "message") ?? "";
  switch (type) {
    case undefined:
      return err(new MalformedEnvelopeError("missing type"));
    case "join":
      return ok<ClientFrame>({ type, userId, username });
    case "chat":
      return ok<ClientFrame>({ type, userId, username, message });
    case "private_chat":
      return ok<ClientFrame>({ type, userId, username, targetUserId: readString(obj, "target_user_id") ?? "", message });
    case "ping":
      return ok<ClientFrame>({ type });
    default:
      return err(new MalformedEnvelopeError(`unknown message type '${type}'`));
  }
}

export function encodeServerFrame(frame: ServerFrame): string {
  let out: { [k: string]: Json };
  switch (frame.type) {
    case "join_success":
      out = { type: "join_success", message: frame.message };
      break;
    case "error":
      out = { type: "error", message: frame.message };
      if (frame.code) out.code = frame.code;
      break;
    case "chat":
      out = { type: "chat", user_id: frame.userId, username: frame.username, message: frame.message, timestamp: frame.timestamp };
      break;
    case "private_chat":
      out = {
        type: "private_chat",
        user_id: frame.userId,
        username: frame.username,
        target_user_id: frame.targetUserId,
        message: frame.message,
        timestamp: frame.timestamp,
      };
      break;
    case "user_joined":
      out = {
        type: "user_joined",
        user_id: frame.userId,
        username: frame.username,
        online_users: frame.onlineUsers,
        timestamp: frame.timestamp,
      };
      break;
    case "user_left":
      out = { type: "user_left", user_id: frame.userId, online_users: frame.onlineUsers, timestamp: frame.timestamp };
      break;
    case "pong":
      out = { type: "pong" };
      break;
    default:
      return assertNever(frame);
  }
  return JSON.stringify(out);
}

export function decodeServerFrame(data: RawData): Result<ServerFrame, MalformedEnvelopeError> {
  const parsed = parseObject(data);
  if (!parsed.ok) return parsed;
  const obj = parsed.value;
  const type = readString(obj, "type");
  const userId = readString(obj, "user_id") ?? "";
  const username = readString(obj, "username") ?? "";
  const message = readString(obj, "message") ?? "";
  const timestamp = readString(obj, "timestamp") ?? "";
  switch (type) {
    case undefined:
      return err(new MalformedEnvelopeError("missing type"));
    case "join_success":
      return ok<ServerFrame>({ type, message });
    case "error": {
      const code = readString(obj, "code");
      return ok<ServerFrame>(code ? { type, message, code } : { type, message });
    }
    case "chat":
      return ok<ServerFrame>({ type, userId, username, message, timestamp });
    case "private_chat":
      return ok<ServerFrame>({ type, userId, username, targetUserId: readString(obj, "target_user_id") ?? "", message, timestamp });
    case "user_joined":
      return ok<ServerFrame>({ type, userId, username, onlineUsers: readStringArray(obj, "online_users"), timestamp });
    case "user_left":
      return ok<ServerFrame>({ type, userId, onlineUsers: readStringArray(obj, "online_users"), timestamp });
    case "pong":
      return ok<ServerFrame>({ type });
    default:
      return err(new MalformedEnvelopeError(`unknown message type '${type}'`));
  }
}
