import { AsyncQueue } from "../bus/async-queue.js";
import { describeEvent, type ClientEvent } from "../bus/events.js";
import type { Logger } from "../utils/logger.js";

/**
 * What a UI collaborator talks to, whichever transport carries the chat.
 * Everything the transport observes arrives through `events`.
 */
export abstract class BaseTransport {
  protected running = false;
  readonly events = new AsyncQueue<ClientEvent>();

  constructor(
    readonly userId: string,
    readonly username: string,
    protected readonly log: Logger,
  ) {}

  abstract readonly name: string;
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract sendPublic(body: string): Promise<void>;
  abstract sendPrivate(targetId: string, body: string): Promise<void>;

  protected deliver(ev: ClientEvent): void {
    this.log.debug(describeEvent(ev));
    this.events.push(ev);
  }

  get isRunning(): boolean {
    return this.running;
  }
}
