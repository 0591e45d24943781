/** Single-consumer FIFO; `pop` waits for the next item, or `undefined` once closed and empty. */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(v: T | undefined) => void> = [];
  private closed = false;

  push(v: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter(v);
    else this.items.push(v);
  }

  async pop(): Promise<T | undefined> {
    if (this.items.length) return this.items.shift();
    if (this.closed) return undefined;
    return new Promise<T | undefined>((resolve) => this.waiters.push(resolve));
  }

  /** Takes everything buffered right now without waiting. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  reopen(): void {
    this.closed = false;
  }

  size(): number {
    return this.items.length;
  }
}
