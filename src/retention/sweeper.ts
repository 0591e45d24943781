import { decodeHeartbeat } from "../codec/message.js";
import { SweepEntryError, StorageReadError, describeError } from "../errors.js";
import type { StorageBackend, StorageEntry } from "../store/backend.js";
import {
  LOGS_PREFIX,
  PRIVATE_PREFIX,
  PUBLIC_PREFIX,
  USERS_PREFIX,
  isHeartbeatFile,
  joinKey,
  parseMessageFileName,
} from "../store/layout.js";
import { isRecord } from "../types.js";
import { createLogger, type Logger } from "../utils/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const STATS_KEY = joinKey(LOGS_PREFIX, "cleanup_stats.json");
const STATS_KEEP = 30;

export interface SweepReport {
  cutoff: string;
  publicDeleted: number;
  privateDeleted: number;
  heartbeatsDeleted: number;
  channelsRemoved: number;
  failures: number;
  total: number;
}

export interface SweepStats {
  cleanup_time: string;
  deleted_files: number;
  days_kept: number;
  share_path: string;
}

/** `msg_*.json`, including names whose stamp does not parse; those age by mtime. */
function looksLikeMessage(name: string): boolean {
  return name.startsWith("msg_") && name.endsWith(".json");
}

/**
 * Deletes messages and heartbeats older than a cutoff. Message age is the
 * time embedded in the key, heartbeat age is `last_active`; either falls
 * back to modification time. Other files are left alone; failures are
 * counted and skipped.
 */
export class RetentionSweeper {
  private readonly log: Logger;

  constructor(
    private readonly backend: StorageBackend,
    private readonly clock: () => number = Date.now,
    log?: Logger,
  ) {
    this.log = log ?? createLogger("retention");
  }

  async sweep(cutoffMs: number): Promise<SweepReport> {
    const report: SweepReport = {
      cutoff: new Date(cutoffMs).toISOString(),
      publicDeleted: 0,
      privateDeleted: 0,
      heartbeatsDeleted: 0,
      channelsRemoved: 0,
      failures: 0,
      total: 0,
    };

    report.publicDeleted = await this.sweepMessages(PUBLIC_PREFIX, cutoffMs, report);

    let pairs: string[] = [];
    try {
      pairs = await this.backend.listPrefixes(PRIVATE_PREFIX);
    } catch (e) {
      report.failures++;
      this.log.error(new StorageReadError(PRIVATE_PREFIX, e).message);
    }
    for (const pair of pairs) {
      const prefix = joinKey(PRIVATE_PREFIX, pair);
      report.privateDeleted += await this.sweepMessages(prefix, cutoffMs, report);
      try {
        if (await this.backend.removePrefixIfEmpty(prefix)) {
          report.channelsRemoved++;
          this.log.debug(`removed empty channel ${prefix}`);
        }
      } catch (e) {
        report.failures++;
        this.log.error(new SweepEntryError(prefix, e).message);
      }
    }

    report.heartbeatsDeleted = await this.sweepHeartbeats(cutoffMs, report);
    report.total = report.publicDeleted + report.privateDeleted + report.heartbeatsDeleted;
    this.log.info(
      `sweep before ${report.cutoff}: public=${report.publicDeleted} private=${report.privateDeleted} ` +
        `heartbeats=${report.heartbeatsDeleted} failures=${report.failures}`,
    );
    return report;
  }

  /** Sweeps everything older than `daysToKeep` days and appends to the stats log. */
  async run(daysToKeep: number): Promise<SweepReport> {
    const report = await this.sweep(this.clock() - daysToKeep * DAY_MS);
    await this.recordStats(report, daysToKeep);
    return report;
  }

  async readStats(): Promise<SweepStats[]> {
    let raw: unknown;
    try {
      raw = JSON.parse((await this.backend.get(STATS_KEY)).toString("utf8"));
    } catch (e) {
      this.log.debug(`no sweep stats at ${STATS_KEY}: ${describeError(e)}`);
      return [];
    }
    if (!Array.isArray(raw)) return [];
    return raw.filter(isRecord).map((r) => ({
      cleanup_time: String(r.cleanup_time ?? ""),
      deleted_files: Number(r.deleted_files ?? 0),
      days_kept: Number(r.days_kept ?? 0),
      share_path: String(r.share_path ?? ""),
    }));
  }

  private async recordStats(report: SweepReport, daysKept: number): Promise<void> {
    const stats = await this.readStats();
    stats.push({
      cleanup_time: new Date(this.clock()).toISOString(),
      deleted_files: report.total,
      days_kept: daysKept,
      share_path: this.backend.location,
    });
    try {
      await this.backend.put(STATS_KEY, JSON.stringify(stats.slice(-STATS_KEEP), null, 2));
    } catch (e) {
      this.log.error(`failed to record sweep stats: ${describeError(e)}`);
    }
  }

  private async listOrReport(prefix: string, report: SweepReport): Promise<StorageEntry[]> {
    try {
      return await this.backend.list(prefix);
    } catch (e) {
      report.failures++;
      this.log.error(new StorageReadError(prefix, e).message);
      return [];
    }
  }

  private async removeOrReport(key: string, report: SweepReport): Promise<boolean> {
    try {
      await this.backend.remove(key);
      this.log.debug(`deleted ${key}`);
      return true;
    } catch (e) {
      report.failures++;
      this.log.error(new SweepEntryError(key, e).message);
      return false;
    }
  }

  private async sweepMessages(prefix: string, cutoffMs: number, report: SweepReport): Promise<number> {
    let deleted = 0;
    for (const entry of await this.listOrReport(prefix, report)) {
      if (!looksLikeMessage(entry.name)) continue;
      const ageMs = parseMessageFileName(entry.name)?.stampMs ?? entry.modifiedMs;
      if (ageMs >= cutoffMs) continue;
      if (await this.removeOrReport(entry.key, report)) deleted++;
    }
    return deleted;
  }

  private async heartbeatTime(entry: StorageEntry): Promise<number> {
    try {
      const rec = decodeHeartbeat(await this.backend.get(entry.key));
      if (rec.ok) return Date.parse(rec.value.lastActive);
    } catch (e) {
      this.log.debug(`unreadable heartbeat ${entry.key}: ${describeError(e)}`);
    }
    return entry.modifiedMs;
  }

  private async sweepHeartbeats(cutoffMs: number, report: SweepReport): Promise<number> {
    let deleted = 0;
    for (const entry of await this.listOrReport(USERS_PREFIX, report)) {
      if (!isHeartbeatFile(entry.name)) continue;
      if ((await this.heartbeatTime(entry)) >= cutoffMs) continue;
      if (await this.removeOrReport(entry.key, report)) deleted++;
    }
    return deleted;
  }
}
