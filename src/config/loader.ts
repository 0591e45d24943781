import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG, type Config } from "./schema.js";
import { expandHome, getDataPath } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";
import { describeError } from "../errors.js";
import { isRecord } from "../types.js";

const log = createLogger("config");

export function getConfigPath(): string {
  const override = process.env.RELAYCHAT_CONFIG;
  if (override) return path.resolve(expandHome(override));
  return path.join(getDataPath(), "config.json");
}

/**
 * Overlays `patch` onto `target` in place. Only keys the target already has
 * are taken, and a value replaces the default only when its JSON type matches.
 */
function mergeInto(target: Record<string, unknown>, patch: unknown): void {
  if (!isRecord(patch)) return;
  for (const [k, current] of Object.entries(target)) {
    if (!(k in patch)) continue;
    const v = patch[k];
    if (isRecord(current)) {
      mergeInto(current, v);
    } else if (current === null ? v === null || typeof v === "string" : typeof v === typeof current) {
      target[k] = v;
    } else {
      log.warn(`ignoring config key '${k}': expected ${current === null ? "string" : typeof current}`);
    }
  }
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? getConfigPath();
  if (!fs.existsSync(p)) return structuredClone(DEFAULT_CONFIG);

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
    const config = structuredClone(DEFAULT_CONFIG);
    mergeInto(config, parsed);
    return config;
  } catch (e) {
    log.warn(`failed to load config from ${p}: ${describeError(e)}`);
    return structuredClone(DEFAULT_CONFIG);
  }
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(config, null, 2), "utf8");
}
