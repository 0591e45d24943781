import { describe, expect, test } from "vitest";
import type { ChatMessage } from "../src/codec/message.js";
import { formatStamp } from "../src/store/layout.js";
import { DedupCache } from "../src/sync/dedup-cache.js";

const base = Date.UTC(2026, 2, 1, 10, 0, 0, 0);

function msg(offsetMs: number, sender = "alice"): ChatMessage {
  const stamp = base + offsetMs;
  return {
    id: `msg_${formatStamp(stamp)}_${sender}`,
    kind: { type: "public" },
    senderId: sender,
    senderName: sender,
    body: `at ${offsetMs}`,
    timestamp: new Date(stamp).toISOString(),
  };
}

describe("DedupCache", () => {
  test("returns unseen messages oldest first", () => {
    const cache = new DedupCache();
    const out = cache.filterNew([msg(30), msg(10), msg(20, "bob")]);
    expect(out.map((m) => m.body)).toEqual(["at 10", "at 20", "at 30"]);
  });

  test("never hands out the same id twice", () => {
    const cache = new DedupCache();
    const a = msg(1);
    expect(cache.filterNew([a, a])).toHaveLength(1);
    expect(cache.filterNew([a])).toEqual([]);
    expect(cache.has(a.id)).toBe(true);
  });

  test("evicts the older half past the limit and still treats it as seen", () => {
    const cache = new DedupCache(10);
    const batch = Array.from({ length: 11 }, (_, i) => msg(i * 1000));
    expect(cache.filterNew(batch)).toHaveLength(11);
    expect(cache.size).toBe(6);
    for (const m of batch) expect(cache.has(m.id)).toBe(true);
    expect(cache.filterNew(batch)).toEqual([]);
    expect(cache.filterNew([msg(20_000)])).toHaveLength(1);
  });

  test("orders by instant rather than by timestamp text", () => {
    const cache = new DedupCache();
    const later = { ...msg(1, "carol"), body: "later", timestamp: "2026-03-01T10:00:00.500Z" };
    const earlier = { ...msg(2, "bob"), body: "earlier", timestamp: "2026-03-01T10:00:00Z" };
    const earliest = { ...msg(3, "dave"), body: "earliest", timestamp: "2026-03-01T11:00:00+02:00" };
    const out = cache.filterNew([later, earlier, earliest]);
    expect(out.map((m) => m.body)).toEqual(["earliest", "earlier", "later"]);
  });

  test("unparseable timestamps fall back to text order", () => {
    const cache = new DedupCache();
    const b = { ...msg(1), body: "b", timestamp: "yesterday" };
    const a = { ...msg(2), body: "a", timestamp: "sometime" };
    expect(cache.filterNew([b, a]).map((m) => m.body)).toEqual(["a", "b"]);
  });

  test("a late write stamped below the eviction watermark is never delivered", () => {
    const cache = new DedupCache(10);
    cache.filterNew(Array.from({ length: 11 }, (_, i) => msg(i * 1000)));
    // the five oldest (0..4000ms) were evicted into the watermark
    const lagging = msg(2500, "bob");
    const current = msg(4500, "bob");
    expect(cache.has(lagging.id)).toBe(true);
    expect(cache.filterNew([lagging, current]).map((m) => m.body)).toEqual(["at 4500"]);
  });

  test("rejected ids are skipped afterwards", () => {
    const cache = new DedupCache();
    cache.reject("msg_20260301_100000_000_broken");
    expect(cache.has("msg_20260301_100000_000_broken")).toBe(true);
    expect(cache.size).toBe(1);
  });
});
