import type { SweepReport } from "./sweeper.js";

export type RetentionSchedule =
  | { kind: "every"; everyMs: number; expr?: never; tz?: never }
  | { kind: "cron"; expr: string; tz?: string; everyMs?: never };

export interface RetentionState {
  nextRunAtMs: number | null;
  lastRunAtMs: number | null;
  lastStatus: "ok" | "error" | null;
  lastError: string | null;
  lastReport: SweepReport | null;
}

export interface RetentionStatus {
  enabled: boolean;
  daysToKeep: number;
  schedule: RetentionSchedule;
  state: RetentionState;
}
