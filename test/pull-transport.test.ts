import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { MemoryBackend } from "../src/store/memory-backend.js";
import { PullTransport } from "../src/transports/pull.js";

const t0 = Date.UTC(2026, 2, 1, 10, 0, 0);
const clock = () => t0;

function client(backend: MemoryBackend, userId: string, username = userId.toUpperCase()): PullTransport {
  return new PullTransport({ backend, userId, username, pollIntervalMs: 60_000, heartbeatIntervalMs: 60_000, clock });
}

describe("PullTransport", () => {
  test("delivers each visible message once, in order", async () => {
    const backend = new MemoryBackend("memory://share", clock);
    const alice = client(backend, "alice", "Alice");
    const bob = client(backend, "bob", "Bob");
    const carol = client(backend, "carol", "Carol");

    await alice.sendPublic("hi");
    await alice.sendPrivate("bob", "secret");

    expect((await bob.pollOnce()).map((m) => m.body)).toEqual(["hi", "secret"]);
    expect(await bob.pollOnce()).toEqual([]);
    expect((await carol.pollOnce()).map((m) => m.body)).toEqual(["hi"]);

    const events = bob.events.drain();
    expect(events.map((e) => e.kind)).toEqual(["message", "message"]);
  });

  test("alice and bob: bob sees the public and the private message in order", async () => {
    let now = t0;
    const backend = new MemoryBackend("memory://share", () => now);
    const opts = { backend, pollIntervalMs: 60_000, heartbeatIntervalMs: 60_000, clock: () => now };
    const alice = new PullTransport({ ...opts, userId: "alice", username: "Alice" });
    const bob = new PullTransport({ ...opts, userId: "bob", username: "Bob" });
    await alice.presence.heartbeat("alice", "Alice");
    await bob.presence.heartbeat("bob", "Bob");

    now = t0 + 1000;
    await alice.sendPublic("hi");
    now = t0 + 2000;
    await alice.sendPrivate("bob", "secret");
    now = t0 + 3000;

    const received = await bob.pollOnce();
    expect(received.map((m) => m.body)).toEqual(["hi", "secret"]);
    expect(received[1].kind).toEqual({ type: "private", targetId: "bob" });
    expect(bob.events.drain().at(-1)).toEqual({
      kind: "presence",
      users: [
        { userId: "alice", displayName: "Alice" },
        { userId: "bob", displayName: "Bob" },
      ],
    });
  });

  test("reports presence only when it changes", async () => {
    const backend = new MemoryBackend("memory://share", clock);
    const alice = client(backend, "alice", "Alice");
    const bob = client(backend, "bob", "Bob");
    await alice.presence.heartbeat("alice", "Alice");

    await bob.pollOnce();
    await bob.pollOnce();
    expect(bob.events.drain()).toEqual([{ kind: "presence", users: [{ userId: "alice", displayName: "Alice" }] }]);
    expect(bob.onlineUsers).toEqual([{ userId: "alice", displayName: "Alice" }]);
  });

  test("start announces the share and stop ends the event stream", async () => {
    const backend = new MemoryBackend("memory://share", clock);
    const alice = client(backend, "alice", "Alice");
    await alice.start();
    expect(alice.isRunning).toBe(true);
    expect(await alice.presence.listOnline()).toEqual([{ userId: "alice", displayName: "Alice" }]);
    await alice.stop();
    expect(alice.isRunning).toBe(false);

    const system = alice.events.drain().filter((e) => e.kind === "system");
    expect(system).toEqual([
      { kind: "system", text: "Connected to memory://share" },
      { kind: "system", text: "Disconnected" },
    ]);
    expect(await alice.events.pop()).toBeUndefined();
    expect(await alice.presence.listOnline()).toEqual([{ userId: "alice", displayName: "Alice" }]);
    expect((await backend.list("")).filter((e) => e.name.endsWith(".tmp"))).toEqual([]);
  });

  test("refuses to start on storage it cannot write", async () => {
    const backend = new MemoryBackend("memory://broken", clock);
    backend.put = async () => {
      throw new Error("read-only");
    };
    const alice = client(backend, "alice");
    await expect(alice.start()).rejects.toThrow("Failed to write memory://broken: storage is not writable");
    expect(alice.isRunning).toBe(false);
  });

  test("rejects ids that cannot be stored", () => {
    const backend = new MemoryBackend();
    expect(() => client(backend, "../alice")).toThrow("Invalid user ID '../alice'");
  });

  test("shares files with the message that mentions them", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relaychat-pull-"));
    const local = path.join(dir, "notes.txt");
    fs.writeFileSync(local, "hello");

    const backend = new MemoryBackend("memory://share", clock);
    const alice = client(backend, "alice", "Alice");
    const bob = client(backend, "bob", "Bob");
    const ref = await alice.sendFile(local, "bob");
    expect(ref.relativePath).toBe("files/20260301_100000_alice_5d41402a.txt");

    const [msg] = await bob.pollOnce();
    expect(msg.body).toBe("[file] notes.txt");
    expect(msg.kind).toEqual({ type: "private", targetId: "bob" });
    expect(msg.attachment?.relativePath).toBe(ref.relativePath);

    const downloads = path.join(dir, "downloads");
    const saved = await bob.downloadFile(ref, downloads);
    expect(saved).toBe(path.join(downloads, "notes.txt"));
    expect(fs.readFileSync(saved, "utf8")).toBe("hello");
  });
});
