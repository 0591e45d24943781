import { DuplicateIdentityError } from "../errors.js";
import { err, ok, type Result } from "../types.js";
import type { OnlineUser } from "./types.js";

interface Entry<C> {
  conn: C;
  username: string;
}

/**
 * Exact presence for the push transport: a user ID maps to at most one live
 * connection. Callers broadcast the join/leave notifications.
 */
export class ConnectionRegistry<C> {
  private readonly byUser = new Map<string, Entry<C>>();

  register(userId: string, username: string, conn: C): Result<OnlineUser, DuplicateIdentityError> {
    if (this.byUser.has(userId)) return err(new DuplicateIdentityError(userId));
    this.byUser.set(userId, { conn, username });
    return ok({ userId, displayName: username });
  }

  /** Removes `userId`; with `conn` given, only if that connection still owns the ID. */
  deregister(userId: string, conn?: C): boolean {
    const entry = this.byUser.get(userId);
    if (!entry) return false;
    if (conn !== undefined && entry.conn !== conn) return false;
    return this.byUser.delete(userId);
  }

  get(userId: string): C | undefined {
    return this.byUser.get(userId)?.conn;
  }

  has(userId: string): boolean {
    return this.byUser.has(userId);
  }

  listOnline(): OnlineUser[] {
    return [...this.byUser].map(([userId, e]) => ({ userId, displayName: e.username }));
  }

  onlineIds(): string[] {
    return [...this.byUser.keys()];
  }

  connections(): C[] {
    return [...this.byUser.values()].map((e) => e.conn);
  }

  get size(): number {
    return this.byUser.size;
  }
}
