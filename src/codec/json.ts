import { MalformedEnvelopeError } from "../errors.js";
import { err, isRecord, ok, type Result } from "../types.js";

export type RawData = string | Buffer | ArrayBuffer | Buffer[];

export function rawToString(data: RawData): string {
  if (typeof data === "string") return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function parseObject(data: RawData): Result<Record<string, unknown>, MalformedEnvelopeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawToString(data).trim());
  } catch (e) {
    return err(new MalformedEnvelopeError("invalid JSON", { cause: e }));
  }
  if (!isRecord(parsed)) return err(new MalformedEnvelopeError("expected a JSON object"));
  return ok(parsed);
}

/** First string value among `keys`, so old and new field names both decode. */
export function readString(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

export function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function readStringArray(obj: Record<string, unknown>, key: string): string[] {
  const v = obj[key];
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}
