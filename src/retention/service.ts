import parser from "cron-parser";
import { describeError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { RetentionSweeper, SweepReport } from "./sweeper.js";
import type { RetentionSchedule, RetentionState, RetentionStatus } from "./types.js";

export const DEFAULT_RETENTION_CRON = "0 2 * * *";
export const DEFAULT_DAYS_TO_KEEP = 1;

export function computeNextRun(schedule: RetentionSchedule, now: number): number | null {
  if (schedule.kind === "every") return schedule.everyMs > 0 ? now + schedule.everyMs : null;
  try {
    const it = parser.parseExpression(schedule.expr, { currentDate: new Date(now), tz: schedule.tz });
    return it.next().toDate().getTime();
  } catch {
    return null;
  }
}

export function validateSchedule(schedule: RetentionSchedule): void {
  if (schedule.kind === "every") {
    if (!(schedule.everyMs > 0)) throw new Error("interval must be positive");
    return;
  }
  if (schedule.tz) {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone: schedule.tz });
    } catch {
      throw new Error(`unknown timezone '${schedule.tz}'`);
    }
  }
  try {
    parser.parseExpression(schedule.expr, { tz: schedule.tz });
  } catch (e) {
    throw new Error(`invalid cron expression '${schedule.expr}': ${describeError(e)}`);
  }
}

export interface RetentionServiceOptions {
  daysToKeep?: number;
  schedule?: RetentionSchedule;
  clock?: () => number;
}

/** Runs the sweeper on a schedule, one sweep at a time. */
export class RetentionService {
  readonly daysToKeep: number;
  readonly schedule: RetentionSchedule;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly state: RetentionState = {
    nextRunAtMs: null,
    lastRunAtMs: null,
    lastStatus: null,
    lastError: null,
    lastReport: null,
  };
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<SweepReport | null> | null = null;

  constructor(private readonly sweeper: RetentionSweeper, opts: RetentionServiceOptions = {}) {
    this.daysToKeep = opts.daysToKeep ?? DEFAULT_DAYS_TO_KEEP;
    this.schedule = opts.schedule ?? { kind: "cron", expr: DEFAULT_RETENTION_CRON };
    this.clock = opts.clock ?? Date.now;
    this.log = createLogger("retention");
    validateSchedule(this.schedule);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.state.nextRunAtMs = computeNextRun(this.schedule, this.clock());
    this.armTimer();
    if (this.state.nextRunAtMs) this.log.info(`next sweep at ${new Date(this.state.nextRunAtMs).toISOString()}`);
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.state.nextRunAtMs = null;
  }

  /** Sweeps now; joins the sweep already underway if there is one. */
  runNow(): Promise<SweepReport | null> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  status(): RetentionStatus {
    return { enabled: this.running, daysToKeep: this.daysToKeep, schedule: this.schedule, state: { ...this.state } };
  }

  private armTimer(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    const next = this.state.nextRunAtMs;
    if (!this.running || !next) return;
    this.timer = setTimeout(() => void this.onTimer(), Math.max(0, next - this.clock()));
  }

  private async onTimer(): Promise<void> {
    this.timer = null;
    await this.runNow();
    if (!this.running) return;
    this.state.nextRunAtMs = computeNextRun(this.schedule, this.clock());
    this.armTimer();
  }

  private async execute(): Promise<SweepReport | null> {
    const start = this.clock();
    this.state.lastRunAtMs = start;
    try {
      const report = await this.sweeper.run(this.daysToKeep);
      this.state.lastStatus = "ok";
      this.state.lastError = null;
      this.state.lastReport = report;
      return report;
    } catch (e) {
      this.state.lastStatus = "error";
      this.state.lastError = describeError(e);
      this.log.error(`sweep failed: ${this.state.lastError}`);
      return null;
    }
  }
}
