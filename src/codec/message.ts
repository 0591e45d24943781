import { MalformedEnvelopeError } from "../errors.js";
import { err, isRecord, ok, type Json, type Result } from "../types.js";
import { parseObject, readNumber, readString, type RawData } from "./json.js";

export type FileType = "image" | "file";

export interface FileRef {
  filename: string;
  originalName: string;
  fileType: FileType;
  fileSize: number;
  fileHash: string;
  mimeType: string;
  uploadTime: string;
  uploaderId: string;
  uploaderName: string;
  relativePath: string;
}

export type MessageKind = { type: "public" } | { type: "private"; targetId: string };

export interface ChatMessage {
  /** Key stem, `msg_<stamp>_<sender>`; unique and sortable by time. */
  id: string;
  kind: MessageKind;
  senderId: string;
  senderName: string;
  body: string;
  /** ISO 8601 */
  timestamp: string;
  attachment?: FileRef;
}

export interface HeartbeatRecord {
  userId: string;
  displayName: string;
  /** ISO 8601 */
  lastActive: string;
  status: string;
  ttlS?: number;
}

function encodeFileRef(f: FileRef): { [k: string]: Json } {
  return {
    filename: f.filename,
    original_name: f.originalName,
    file_type: f.fileType,
    file_size: f.fileSize,
    file_hash: f.fileHash,
    mime_type: f.mimeType,
    upload_time: f.uploadTime,
    uploader_id: f.uploaderId,
    uploader_name: f.uploaderName,
    relative_path: f.relativePath,
  };
}

function decodeFileRef(raw: unknown): FileRef | undefined {
  if (!isRecord(raw)) return undefined;
  const filename = readString(raw, "filename");
  const relativePath = readString(raw, "relative_path");
  if (!filename || !relativePath) return undefined;
  return {
    filename,
    originalName: readString(raw, "original_name") ?? filename,
    fileType: readString(raw, "file_type") === "image" ? "image" : "file",
    fileSize: readNumber(raw, "file_size") ?? 0,
    fileHash: readString(raw, "file_hash") ?? "",
    mimeType: readString(raw, "mime_type") ?? "application/octet-stream",
    uploadTime: readString(raw, "upload_time") ?? "",
    uploaderId: readString(raw, "uploader_id") ?? "",
    uploaderName: readString(raw, "uploader_name") ?? "",
    relativePath,
  };
}

export function encodeMessage(msg: ChatMessage): string {
  const body: { [k: string]: Json } =
    msg.kind.type === "public"
      ? { type: "public", user_id: msg.senderId, username: msg.senderName }
      : { type: "private", sender_id: msg.senderId, sender_name: msg.senderName, target_id: msg.kind.targetId };
  body.message = msg.body;
  body.timestamp = msg.timestamp;
  body.message_type = msg.attachment ? "file" : "text";
  if (msg.attachment) body.file_info = encodeFileRef(msg.attachment);
  return JSON.stringify(body);
}

/**
 * Unknown fields are ignored. `type` is required; both the public field
 * names (`user_id`, `username`) and the private ones (`sender_id`,
 * `sender_name`) are accepted for either kind.
 */
export function decodeMessage(data: RawData, id: string): Result<ChatMessage, MalformedEnvelopeError> {
  const parsed = parseObject(data);
  if (!parsed.ok) return parsed;
  const obj = parsed.value;

  const type = readString(obj, "type");
  if (!type) return err(new MalformedEnvelopeError("missing type"));

  let kind: MessageKind;
  if (type === "public") {
    kind = { type: "public" };
  } else if (type === "private") {
    const targetId = readString(obj, "target_id");
    if (!targetId) return err(new MalformedEnvelopeError("private message without target_id"));
    kind = { type: "private", targetId };
  } else {
    return err(new MalformedEnvelopeError(`unknown message type '${type}'`));
  }

  const senderId = readString(obj, "user_id", "sender_id");
  if (!senderId) return err(new MalformedEnvelopeError("missing sender id"));
  const timestamp = readString(obj, "timestamp");
  if (!timestamp) return err(new MalformedEnvelopeError("missing timestamp"));

  const msg: ChatMessage = {
    id,
    kind,
    senderId,
    senderName: readString(obj, "username", "sender_name") ?? senderId,
    body: readString(obj, "message") ?? "",
    timestamp,
  };
  const attachment = decodeFileRef(obj.file_info);
  if (attachment) msg.attachment = attachment;
  return ok(msg);
}

export function encodeHeartbeat(rec: HeartbeatRecord): string {
  const body: { [k: string]: Json } = {
    user_id: rec.userId,
    username: rec.displayName,
    last_active: rec.lastActive,
    status: rec.status,
  };
  if (rec.ttlS !== undefined) body.ttl = rec.ttlS;
  return JSON.stringify(body, null, 2);
}

export function decodeHeartbeat(data: RawData): Result<HeartbeatRecord, MalformedEnvelopeError> {
  const parsed = parseObject(data);
  if (!parsed.ok) return parsed;
  const obj = parsed.value;
  const userId = readString(obj, "user_id");
  if (!userId) return err(new MalformedEnvelopeError("heartbeat without user_id"));
  const lastActive = readString(obj, "last_active");
  if (!lastActive || Number.isNaN(Date.parse(lastActive))) {
    return err(new MalformedEnvelopeError("heartbeat without a valid last_active"));
  }
  const rec: HeartbeatRecord = {
    userId,
    displayName: readString(obj, "username") ?? userId,
    lastActive,
    status: readString(obj, "status") ?? "online",
  };
  const ttl = readNumber(obj, "ttl");
  if (ttl !== undefined) rec.ttlS = ttl;
  return ok(rec);
}
