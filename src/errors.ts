export type ChatErrorCode =
  | "duplicate_identity"
  | "target_offline"
  | "not_joined"
  | "malformed_envelope"
  | "storage_write"
  | "storage_read"
  | "sweep_entry"
  | "attachment_rejected";

/**
 * Base for every error the core reports. `message` is short and meant to be
 * shown as-is by whatever UI sits on top.
 */
export abstract class ChatError extends Error {
  abstract readonly code: ChatErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateIdentityError extends ChatError {
  readonly code = "duplicate_identity";
  constructor(readonly userId: string) {
    super(`User ID '${userId}' is already in use, choose another ID`);
  }
}

export class TargetOfflineError extends ChatError {
  readonly code = "target_offline";
  constructor(readonly targetId: string) {
    super(`User '${targetId}' is not online`);
  }
}

export class NotJoinedError extends ChatError {
  readonly code = "not_joined";
  constructor() {
    super("Join the chat room first");
  }
}

export class MalformedEnvelopeError extends ChatError {
  readonly code = "malformed_envelope";
  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(`Malformed message: ${reason}`, options);
  }
}

export class StorageWriteError extends ChatError {
  readonly code = "storage_write";
  constructor(readonly key: string, cause: unknown) {
    super(`Failed to write ${key}: ${describeError(cause)}`, { cause });
  }
}

export class StorageReadError extends ChatError {
  readonly code = "storage_read";
  constructor(readonly key: string, cause: unknown) {
    super(`Failed to read ${key}: ${describeError(cause)}`, { cause });
  }
}

export class SweepEntryError extends ChatError {
  readonly code = "sweep_entry";
  constructor(readonly key: string, cause: unknown) {
    super(`Failed to delete ${key}: ${describeError(cause)}`, { cause });
  }
}

export class AttachmentRejectedError extends ChatError {
  readonly code = "attachment_rejected";
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
