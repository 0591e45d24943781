import type { ChatMessage } from "../codec/message.js";

export const DEFAULT_CACHE_LIMIT = 100;

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** By instant; unparseable or equal instants fall back to the raw string, then the id. */
function byTimestamp(a: ChatMessage, b: ChatMessage): number {
  const ta = Date.parse(a.timestamp);
  const tb = Date.parse(b.timestamp);
  if (!Number.isNaN(ta) && !Number.isNaN(tb) && ta !== tb) return ta - tb;
  return compareStrings(a.timestamp, b.timestamp) || compareStrings(a.id, b.id);
}

/**
 * Per-consumer record of delivered message IDs.
 *
 * IDs embed their write time, so they sort chronologically. When the cache
 * grows past `limit` the older half is evicted and replaced by a watermark:
 * any ID at or below it still counts as seen.
 */
export class DedupCache {
  private readonly seen = new Set<string>();
  private watermark: string | null = null;

  constructor(private readonly limit = DEFAULT_CACHE_LIMIT) {}

  has(id: string): boolean {
    return this.seen.has(id) || (this.watermark !== null && id <= this.watermark);
  }

  markSeen(id: string): void {
    if (this.has(id)) return;
    this.seen.add(id);
    this.trim();
  }

  /** Marks an entry that could not be decoded so it is not retried on every poll. */
  reject(id: string): void {
    this.markSeen(id);
  }

  /** Unseen messages, oldest first; each is marked seen. */
  filterNew(candidates: readonly ChatMessage[]): ChatMessage[] {
    const fresh: ChatMessage[] = [];
    const batch = new Set<string>();
    for (const msg of candidates) {
      if (this.has(msg.id) || batch.has(msg.id)) continue;
      batch.add(msg.id);
      fresh.push(msg);
    }
    fresh.sort(byTimestamp);
    for (const msg of fresh) this.seen.add(msg.id);
    this.trim();
    return fresh;
  }

  get size(): number {
    return this.seen.size;
  }

  private trim(): void {
    if (this.seen.size <= this.limit) return;
    const ordered = [...this.seen].sort();
    const evicted = ordered.slice(0, Math.floor(ordered.length / 2));
    for (const id of evicted) this.seen.delete(id);
    const last = evicted[evicted.length - 1];
    if (last !== undefined && (this.watermark === null || last > this.watermark)) this.watermark = last;
  }
}
