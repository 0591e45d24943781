import { describe, expect, test } from "vitest";
import {
  decodeClientFrame,
  decodeServerFrame,
  encodeClientFrame,
  encodeServerFrame,
} from "../src/codec/frames.js";
import {
  decodeHeartbeat,
  decodeMessage,
  encodeHeartbeat,
  encodeMessage,
  type ChatMessage,
  type FileRef,
} from "../src/codec/message.js";

const ts = "2026-03-01T10:00:00.000Z";

describe("message codec", () => {
  test("public messages use user_id/username", () => {
    const msg: ChatMessage = {
      id: "msg_20260301_100000_000_alice",
      kind: { type: "public" },
      senderId: "alice",
      senderName: "Alice",
      body: "hi",
      timestamp: ts,
    };
    expect(JSON.parse(encodeMessage(msg))).toEqual({
      type: "public",
      user_id: "alice",
      username: "Alice",
      message: "hi",
      timestamp: ts,
      message_type: "text",
    });
  });

  test("private messages use sender_id/sender_name/target_id", () => {
    const raw = JSON.stringify({ type: "private", sender_id: "alice", sender_name: "Alice", target_id: "bob", message: "psst", timestamp: ts });
    const decoded = decodeMessage(raw, "m1");
    expect(decoded.ok && decoded.value).toEqual({
      id: "m1",
      kind: { type: "private", targetId: "bob" },
      senderId: "alice",
      senderName: "Alice",
      body: "psst",
      timestamp: ts,
    });
  });

  test("ignores unknown fields and defaults the display name to the sender id", () => {
    const decoded = decodeMessage(JSON.stringify({ type: "public", user_id: "carol", timestamp: ts, message: "x", extra: 1 }), "m2");
    expect(decoded.ok && decoded.value.senderName).toBe("carol");
  });

  test("carries attachments as file_info", () => {
    const attachment: FileRef = {
      filename: "20260301_100000_alice_0123abcd.png",
      originalName: "cat.png",
      fileType: "image",
      fileSize: 4,
      fileHash: "0123abcd0123abcd0123abcd0123abcd",
      mimeType: "image/png",
      uploadTime: ts,
      uploaderId: "alice",
      uploaderName: "Alice",
      relativePath: "images/20260301_100000_alice_0123abcd.png",
    };
    const msg: ChatMessage = { id: "m3", kind: { type: "public" }, senderId: "alice", senderName: "Alice", body: "[file] cat.png", timestamp: ts, attachment };
    const wire = JSON.parse(encodeMessage(msg));
    expect(wire.message_type).toBe("file");
    expect(wire.file_info.relative_path).toBe("images/20260301_100000_alice_0123abcd.png");
    const decoded = decodeMessage(encodeMessage(msg), "m3");
    expect(decoded.ok && decoded.value.attachment).toEqual(attachment);
  });

  test.each([
    ["not json", "Malformed message: invalid JSON"],
    ["[1,2]", "Malformed message: expected a JSON object"],
    [JSON.stringify({ user_id: "a", timestamp: ts }), "Malformed message: missing type"],
    [JSON.stringify({ type: "shout", user_id: "a", timestamp: ts }), "Malformed message: unknown message type 'shout'"],
    [JSON.stringify({ type: "private", sender_id: "a", timestamp: ts }), "Malformed message: private message without target_id"],
    [JSON.stringify({ type: "public", timestamp: ts }), "Malformed message: missing sender id"],
    [JSON.stringify({ type: "public", user_id: "a" }), "Malformed message: missing timestamp"],
  ])("rejects %s", (raw, message) => {
    const decoded = decodeMessage(raw, "bad");
    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.code).toBe("malformed_envelope");
      expect(decoded.error.message).toBe(message);
    }
  });
});

describe("heartbeat codec", () => {
  test("writes the shared-folder field names", () => {
    const text = encodeHeartbeat({ userId: "bob", displayName: "Bob", lastActive: ts, status: "online", ttlS: 300 });
    expect(JSON.parse(text)).toEqual({ user_id: "bob", username: "Bob", last_active: ts, status: "online", ttl: 300 });
    const decoded = decodeHeartbeat(text);
    expect(decoded.ok && decoded.value).toEqual({ userId: "bob", displayName: "Bob", lastActive: ts, status: "online", ttlS: 300 });
  });

  test("requires a parseable last_active", () => {
    const decoded = decodeHeartbeat(JSON.stringify({ user_id: "bob", last_active: "yesterday" }));
    expect(decoded.ok).toBe(false);
  });
});

describe("frames", () => {
  test("client frames use snake_case on the wire", () => {
    expect(JSON.parse(encodeClientFrame({ type: "private_chat", userId: "a", username: "A", targetUserId: "b", message: "hey" }))).toEqual({
      type: "private_chat",
      user_id: "a",
      username: "A",
      target_user_id: "b",
      message: "hey",
    });
  });

  test("missing join fields decode as empty strings", () => {
    const decoded = decodeClientFrame(JSON.stringify({ type: "join" }));
    expect(decoded.ok && decoded.value).toEqual({ type: "join", userId: "", username: "" });
  });

  test("rejects unknown client frames", () => {
    const decoded = decodeClientFrame(Buffer.from(JSON.stringify({ type: "dance" })));
    expect(!decoded.ok && decoded.error.message).toBe("Malformed message: unknown message type 'dance'");
  });

  test("error frames only carry code when set", () => {
    expect(encodeServerFrame({ type: "error", message: "nope" })).toBe('{"type":"error","message":"nope"}');
    const decoded = decodeServerFrame(encodeServerFrame({ type: "error", message: "taken", code: "duplicate_identity" }));
    expect(decoded.ok && decoded.value).toEqual({ type: "error", message: "taken", code: "duplicate_identity" });
  });

  test("user_joined carries the online list", () => {
    const decoded = decodeServerFrame(
      JSON.stringify({ type: "user_joined", user_id: "b", username: "B", online_users: ["a", "b", 3], timestamp: ts }),
    );
    expect(decoded.ok && decoded.value).toEqual({ type: "user_joined", userId: "b", username: "B", onlineUsers: ["a", "b"], timestamp: ts });
  });
});
