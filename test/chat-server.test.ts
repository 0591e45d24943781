import { describe, expect, test } from "vitest";
import { ChatServer } from "../src/server/chat-server.js";
import { FakeSocket, flush } from "./fake-socket.js";

const t0 = Date.UTC(2026, 2, 1, 10, 0, 0);
const ts = new Date(t0).toISOString();

function makeServer(): ChatServer {
  return new ChatServer({ host: "localhost", port: 0, clock: () => t0 });
}

async function join(server: ChatServer, userId: string, username = userId.toUpperCase()): Promise<FakeSocket> {
  const socket = new FakeSocket();
  server.handleConnection(socket);
  socket.receive({ type: "join", user_id: userId, username });
  await flush();
  return socket;
}

describe("ChatServer", () => {
  test("announces a join, then confirms it", async () => {
    const server = makeServer();
    const alice = await join(server, "alice", "Alice");
    expect(alice.frames()).toEqual([
      { type: "user_joined", user_id: "alice", username: "Alice", online_users: ["alice"], timestamp: ts },
      { type: "join_success", message: "Joined the chat room" },
    ]);

    const bob = await join(server, "bob", "Bob");
    expect(alice.lastFrame()).toEqual({ type: "user_joined", user_id: "bob", username: "Bob", online_users: ["alice", "bob"], timestamp: ts });
    expect(bob.frames()).toHaveLength(2);
  });

  test("refuses a second session with the same id", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    const impostor = await join(server, "alice", "Impostor");
    expect(impostor.frames()).toEqual([
      { type: "error", message: "User ID 'alice' is already in use, choose another ID", code: "duplicate_identity" },
    ]);
    expect(alice.frames()).toHaveLength(2);
    expect(server.registry.size).toBe(1);
  });

  test("requires both id and username", async () => {
    const server = makeServer();
    const socket = await join(server, "alice", "");
    expect(socket.lastFrame()).toEqual({ type: "error", message: "User ID and username are required" });
    expect(server.registry.size).toBe(0);
  });

  test("rejects a second join on a joined session", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    alice.receive({ type: "join", user_id: "alice2", username: "A2" });
    await flush();
    expect(alice.lastFrame()).toEqual({ type: "error", message: "Already joined as 'alice'" });
    expect(server.registry.onlineIds()).toEqual(["alice"]);
  });

  test("chat before join is refused", async () => {
    const server = makeServer();
    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.receive({ type: "chat", user_id: "alice", username: "Alice", message: "hi" });
    await flush();
    expect(socket.frames()).toEqual([{ type: "error", message: "Join the chat room first", code: "not_joined" }]);
  });

  test("answers malformed frames with an error", async () => {
    const server = makeServer();
    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.receive("{oops");
    await flush();
    expect(socket.lastFrame()).toEqual({ type: "error", message: "Malformed message: invalid JSON", code: "malformed_envelope" });
  });

  test("answers ping with pong", async () => {
    const server = makeServer();
    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.receive({ type: "ping" });
    await flush();
    expect(socket.frames()).toEqual([{ type: "pong" }]);
  });

  test("public chat reaches everyone under the session's own name", async () => {
    const server = makeServer();
    const alice = await join(server, "alice", "Alice");
    const bob = await join(server, "bob", "Bob");
    alice.receive({ type: "chat", user_id: "alice", username: "Someone Else", message: "hi all" });
    await flush();
    const expected = { type: "chat", user_id: "alice", username: "Alice", message: "hi all", timestamp: ts };
    expect(alice.lastFrame()).toEqual(expected);
    expect(bob.lastFrame()).toEqual(expected);
  });

  test("private chat reaches only sender and target", async () => {
    const server = makeServer();
    const alice = await join(server, "alice", "Alice");
    const bob = await join(server, "bob", "Bob");
    const carol = await join(server, "carol", "Carol");
    const carolBefore = carol.sent.length;

    alice.receive({ type: "private_chat", user_id: "alice", username: "Alice", target_user_id: "bob", message: "psst" });
    await flush();
    const expected = { type: "private_chat", user_id: "alice", username: "Alice", target_user_id: "bob", message: "psst", timestamp: ts };
    expect(bob.lastFrame()).toEqual(expected);
    expect(alice.lastFrame()).toEqual(expected);
    expect(carol.sent.length).toBe(carolBefore);
  });

  test("private chat to an offline user fails and sends nothing", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    const bob = await join(server, "bob");
    const bobBefore = bob.sent.length;
    alice.receive({ type: "private_chat", user_id: "alice", username: "ALICE", target_user_id: "zed", message: "hello?" });
    await flush();
    expect(alice.lastFrame()).toEqual({ type: "error", message: "User 'zed' is not online", code: "target_offline" });
    expect(bob.sent.length).toBe(bobBefore);
  });

  test("a private message to oneself arrives once", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    const before = alice.sent.length;
    alice.receive({ type: "private_chat", user_id: "alice", username: "ALICE", target_user_id: "alice", message: "note" });
    await flush();
    expect(alice.sent.length).toBe(before + 1);
  });

  test("a leave is announced and frees the id", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    const bob = await join(server, "bob");
    bob.close();
    await flush();
    expect(alice.lastFrame()).toEqual({ type: "user_left", user_id: "bob", online_users: ["alice"], timestamp: ts });
    expect(server.registry.has("bob")).toBe(false);

    const bobAgain = await join(server, "bob");
    expect(bobAgain.lastFrame()).toEqual({ type: "join_success", message: "Joined the chat room" });
  });

  test("one broken connection does not hold up the others", async () => {
    const server = makeServer();
    const alice = await join(server, "alice");
    const bob = await join(server, "bob");
    const carol = await join(server, "carol");
    carol.failSends = true;
    alice.receive({ type: "chat", user_id: "alice", username: "ALICE", message: "still here" });
    await flush();
    expect(bob.lastFrame()).toMatchObject({ type: "chat", message: "still here" });
    expect(alice.lastFrame()).toMatchObject({ type: "chat", message: "still here" });
  });
});
