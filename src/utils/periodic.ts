import { describeError } from "../errors.js";
import type { Logger } from "./logger.js";
import { sleep, withTimeout } from "./helpers.js";

/**
 * Runs `tick` now (or after one interval with `delayFirst`) and then every
 * `intervalMs` until stopped. A failing tick
 * is logged and the loop carries on. Stopping aborts the pending sleep, so
 * the loop ends within the current tick.
 */
export class PeriodicTask {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly tick: (signal: AbortSignal) => Promise<void>,
    private readonly log: Logger,
  ) {}

  get isRunning(): boolean {
    return this.controller !== null;
  }

  start(opts: { delayFirst?: boolean } = {}): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal, opts.delayFirst ?? false);
  }

  /** Resolves `false` if the loop did not finish within `timeoutMs`. */
  async stop(timeoutMs = 1000): Promise<boolean> {
    const { controller, loop } = this;
    this.controller = null;
    this.loop = null;
    if (!controller || !loop) return true;
    controller.abort();
    const finished = await withTimeout(loop, timeoutMs);
    if (!finished) this.log.warn(`${this.name} loop did not stop within ${timeoutMs}ms`);
    return finished;
  }

  private async run(signal: AbortSignal, delayFirst: boolean): Promise<void> {
    if (delayFirst) await sleep(this.intervalMs, signal);
    while (!signal.aborted) {
      try {
        await this.tick(signal);
      } catch (e) {
        this.log.warn(`${this.name} failed: ${describeError(e)}`);
      }
      await sleep(this.intervalMs, signal);
    }
  }
}
