import type { HeartbeatRecord } from "../codec/message.js";
import type { HeartbeatRegistry } from "../presence/heartbeat-registry.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { PeriodicTask } from "../utils/periodic.js";

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;

/** Keeps one user's heartbeat record fresh while the client is connected. */
export class HeartbeatService {
  private readonly task: PeriodicTask;
  private readonly log: Logger;
  private last: HeartbeatRecord | null = null;

  constructor(
    private readonly registry: HeartbeatRegistry,
    private readonly userId: string,
    private readonly displayName: string,
    intervalMs = DEFAULT_HEARTBEAT_INTERVAL_MS,
    log?: Logger,
  ) {
    this.log = log ?? createLogger("heartbeat");
    this.task = new PeriodicTask("heartbeat", intervalMs, async () => {
      await this.tick();
    }, this.log);
  }

  /** With `delayFirst` the loop waits one interval, for callers that already called `triggerNow`. */
  start(opts: { delayFirst?: boolean } = {}): void {
    this.task.start(opts);
  }

  stop(timeoutMs?: number): Promise<boolean> {
    this.registry.deregister(this.userId);
    return this.task.stop(timeoutMs);
  }

  get isRunning(): boolean {
    return this.task.isRunning;
  }

  get lastRecord(): HeartbeatRecord | null {
    return this.last;
  }

  /** Writes a heartbeat immediately; a storage failure reaches the caller. */
  async triggerNow(): Promise<HeartbeatRecord> {
    return this.tick();
  }

  private async tick(): Promise<HeartbeatRecord> {
    this.last = await this.registry.heartbeat(this.userId, this.displayName);
    this.log.debug(`heartbeat ${this.userId} at ${this.last.lastActive}`);
    return this.last;
  }
}
