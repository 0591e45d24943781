export const PUBLIC_PREFIX = "public";
export const PRIVATE_PREFIX = "private";
export const USERS_PREFIX = "users";
export const FILES_PREFIX = "files";
export const IMAGES_PREFIX = "images";
export const LOGS_PREFIX = "logs";

const MESSAGE_KEY = /^msg_(\d{8})_(\d{6})_(\d{3})_(.+)\.json$/;
const HEARTBEAT_SUFFIX = "_heartbeat.json";

/** Order-independent key of a two-party channel. */
export function pairKey(a: string, b: string): string {
  return [a, b].sort().join("_");
}

export function joinKey(...parts: string[]): string {
  return parts.filter(Boolean).join("/");
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC; lexicographic order is time order. */
export function formatStamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `_${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}` +
    `_${pad(d.getUTCMilliseconds(), 3)}`
  );
}

export function messageFileName(stampMs: number, senderId: string): string {
  return `msg_${formatStamp(stampMs)}_${senderId}.json`;
}

export function publicMessageKey(stampMs: number, senderId: string): string {
  return joinKey(PUBLIC_PREFIX, messageFileName(stampMs, senderId));
}

export function privateChannelPrefix(a: string, b: string): string {
  return joinKey(PRIVATE_PREFIX, pairKey(a, b));
}

export function privateMessageKey(stampMs: number, senderId: string, targetId: string): string {
  return joinKey(privateChannelPrefix(senderId, targetId), messageFileName(stampMs, senderId));
}

export function heartbeatKey(userId: string): string {
  return joinKey(USERS_PREFIX, `${userId}${HEARTBEAT_SUFFIX}`);
}

export function isMessageFile(name: string): boolean {
  return MESSAGE_KEY.test(name);
}

export function isHeartbeatFile(name: string): boolean {
  return name.endsWith(HEARTBEAT_SUFFIX);
}

/** Stem of a message file name, used as the message id. */
export function messageId(name: string): string {
  return name.endsWith(".json") ? name.slice(0, -".json".length) : name;
}

export interface ParsedMessageName {
  stampMs: number;
  senderId: string;
}

export function parseMessageFileName(name: string): ParsedMessageName | null {
  const m = MESSAGE_KEY.exec(name);
  if (!m) return null;
  const [, ymd, hms, milli, senderId] = m;
  const stampMs = Date.UTC(
    Number(ymd.slice(0, 4)),
    Number(ymd.slice(4, 6)) - 1,
    Number(ymd.slice(6, 8)),
    Number(hms.slice(0, 2)),
    Number(hms.slice(2, 4)),
    Number(hms.slice(4, 6)),
    Number(milli),
  );
  return Number.isNaN(stampMs) ? null : { stampMs, senderId };
}

/** True when the private channel directory `pair` belongs to `userId`. */
export function pairIncludes(pair: string, userId: string): boolean {
  return pair.startsWith(`${userId}_`) || pair.endsWith(`_${userId}`);
}

/** IDs become path segments, so separators and dot-names are refused. */
export function isSafeId(id: string): boolean {
  return id.length > 0 && id !== "." && id !== ".." && !/[\\/\0]/.test(id);
}
