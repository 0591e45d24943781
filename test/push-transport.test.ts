import { describe, expect, test } from "vitest";
import { PushTransport } from "../src/transports/push.js";
import { FakeSocket, flush } from "./fake-socket.js";

const ts = "2026-03-01T10:00:00.000Z";

function setup(joinTimeoutMs?: number): { socket: FakeSocket; transport: PushTransport } {
  const socket = new FakeSocket();
  const transport = new PushTransport({
    url: "ws://chat.test:8765",
    userId: "alice",
    username: "Alice",
    joinTimeoutMs,
    connect: () => socket,
  });
  return { socket, transport };
}

async function joined(): Promise<{ socket: FakeSocket; transport: PushTransport }> {
  const ctx = setup();
  const started = ctx.transport.start();
  ctx.socket.emit("open");
  await flush();
  ctx.socket.receive({ type: "user_joined", user_id: "alice", username: "Alice", online_users: ["bob", "alice"], timestamp: ts });
  ctx.socket.receive({ type: "join_success", message: "Joined the chat room" });
  await started;
  return ctx;
}

describe("PushTransport", () => {
  test("joins on connect and reports presence", async () => {
    const { socket, transport } = await joined();
    expect(socket.frames()).toEqual([{ type: "join", user_id: "alice", username: "Alice" }]);
    expect(transport.isRunning).toBe(true);
    expect(transport.events.drain()).toEqual([
      { kind: "system", text: "Alice joined" },
      {
        kind: "presence",
        users: [
          { userId: "bob", displayName: "bob" },
          { userId: "alice", displayName: "Alice" },
        ],
      },
      { kind: "system", text: "Joined the chat room" },
    ]);
  });

  test("sends public and private chat", async () => {
    const { socket, transport } = await joined();
    await transport.sendPublic("hi");
    await transport.sendPrivate("bob", "psst");
    expect(socket.frames().slice(1)).toEqual([
      { type: "chat", user_id: "alice", username: "Alice", message: "hi" },
      { type: "private_chat", user_id: "alice", username: "Alice", target_user_id: "bob", message: "psst" },
    ]);
  });

  test("turns chat frames into messages", async () => {
    const { socket, transport } = await joined();
    transport.events.drain();
    socket.receive({ type: "chat", user_id: "bob", username: "Bob", message: "yo", timestamp: ts });
    socket.receive({ type: "private_chat", user_id: "bob", username: "Bob", target_user_id: "alice", message: "psst", timestamp: ts });
    expect(transport.events.drain()).toEqual([
      {
        kind: "message",
        message: { id: "msg_20260301_100000_000_bob", kind: { type: "public" }, senderId: "bob", senderName: "Bob", body: "yo", timestamp: ts },
      },
      {
        kind: "message",
        message: {
          id: "msg_20260301_100000_000_bob",
          kind: { type: "private", targetId: "alice" },
          senderId: "bob",
          senderName: "Bob",
          body: "psst",
          timestamp: ts,
        },
      },
    ]);
  });

  test("surfaces server errors after joining", async () => {
    const { socket, transport } = await joined();
    transport.events.drain();
    socket.receive({ type: "error", message: "User 'zed' is not online", code: "target_offline" });
    socket.receive({ type: "user_left", user_id: "bob", online_users: ["alice"], timestamp: ts });
    expect(transport.events.drain()).toEqual([
      { kind: "error", code: "target_offline", text: "User 'zed' is not online" },
      { kind: "system", text: "bob left" },
      { kind: "presence", users: [{ userId: "alice", displayName: "Alice" }] },
    ]);
  });

  test("a taken id fails the join", async () => {
    const { socket, transport } = setup();
    const started = transport.start();
    socket.emit("open");
    await flush();
    socket.receive({ type: "error", message: "User ID 'alice' is already in use, choose another ID", code: "duplicate_identity" });
    await expect(started).rejects.toThrow("User ID 'alice' is already in use, choose another ID");
    expect(socket.readyState).toBe(3);
    expect(transport.isRunning).toBe(false);
  });

  test("gives up when the server never answers", async () => {
    const { transport } = setup(20);
    await expect(transport.start()).rejects.toThrow("no answer to join within 20ms");
  });

  test("refuses to send before joining", async () => {
    const { transport } = setup();
    await expect(transport.sendPublic("hi")).rejects.toThrow("Join the chat room first");
  });

  test("stop closes the connection and the event stream", async () => {
    const { socket, transport } = await joined();
    await transport.stop();
    expect(socket.readyState).toBe(3);
    expect(transport.isRunning).toBe(false);
    expect(transport.events.drain().at(-1)).toEqual({ kind: "system", text: "Disconnected" });
    expect(await transport.events.pop()).toBeUndefined();
  });
});
