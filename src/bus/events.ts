import type { ChatMessage } from "../codec/message.js";
import type { OnlineUser } from "../presence/types.js";

/** What a transport hands to the UI layer, in delivery order. */
export type ClientEvent =
  | { kind: "message"; message: ChatMessage }
  | { kind: "presence"; users: OnlineUser[] }
  | { kind: "system"; text: string }
  | { kind: "error"; code: string | null; text: string };

export function describeEvent(ev: ClientEvent): string {
  switch (ev.kind) {
    case "message": {
      const m = ev.message;
      const where = m.kind.type === "private" ? ` -> ${m.kind.targetId}` : "";
      const file = m.attachment ? ` [file: ${m.attachment.originalName}]` : "";
      return `${m.senderName}${where}: ${m.body}${file}`;
    }
    case "presence":
      return `online: ${ev.users.map((u) => u.displayName).join(", ") || "(nobody)"}`;
    case "system":
      return ev.text;
    case "error":
      return `error: ${ev.text}`;
  }
}
