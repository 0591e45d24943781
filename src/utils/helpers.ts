import fs from "node:fs";
import path from "node:path";
import os from "node:os";

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getDataPath(): string {
  return ensureDir(path.join(os.homedir(), ".relaychat"));
}

export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Races `task` against a timer; resolves `false` if the timer wins. */
export async function withTimeout(task: Promise<unknown>, ms: number): Promise<boolean> {
  const timer = new AbortController();
  const expired = sleep(ms, timer.signal).then(() => false);
  try {
    return await Promise.race([task.then(() => true, () => true), expired]);
  } finally {
    timer.abort();
  }
}
