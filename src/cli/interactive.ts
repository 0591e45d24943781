import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import chalk from "chalk";
import type { ClientEvent } from "../bus/events.js";
import type { FileRef } from "../codec/message.js";
import { describeError } from "../errors.js";
import type { BaseTransport } from "../transports/base.js";

export type InputCommand =
  | { kind: "public"; body: string }
  | { kind: "private"; targetId: string; body: string }
  | { kind: "file"; path: string; targetId?: string }
  | { kind: "get"; index?: number }
  | { kind: "users" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "empty" }
  | { kind: "invalid"; usage: string };

const QUIT = new Set(["exit", "quit", "/exit", "/quit", ":q"]);

export const HELP_TEXT = [
  "<text>                 send to everyone",
  "/msg <user> <text>     send privately",
  "/file <path> [user]    share a file",
  "/get [n]               download received file n (default: latest)",
  "/users                 list online users",
  "exit                   leave",
].join("\n");

export function parseInput(line: string): InputCommand {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  if (QUIT.has(text.toLowerCase())) return { kind: "quit" };
  if (!text.startsWith("/")) return { kind: "public", body: text };

  const [cmd, ...rest] = text.split(/\s+/);
  switch (cmd.toLowerCase()) {
    case "/msg": {
      const [targetId, ...words] = rest;
      if (!targetId || !words.length) return { kind: "invalid", usage: "/msg <user> <text>" };
      const body = text.slice(text.indexOf(targetId, cmd.length) + targetId.length).trim();
      return { kind: "private", targetId, body };
    }
    case "/file": {
      const [filePath, targetId] = rest;
      if (!filePath) return { kind: "invalid", usage: "/file <path> [user]" };
      return targetId ? { kind: "file", path: filePath, targetId } : { kind: "file", path: filePath };
    }
    case "/get": {
      const [raw] = rest;
      if (!raw) return { kind: "get" };
      const index = Number(raw);
      if (!Number.isInteger(index) || index < 1) return { kind: "invalid", usage: "/get [n]" };
      return { kind: "get", index };
    }
    case "/users":
      return { kind: "users" };
    case "/help":
      return { kind: "help" };
    default:
      return { kind: "invalid", usage: HELP_TEXT };
  }
}

export function formatEvent(ev: ClientEvent): string {
  switch (ev.kind) {
    case "message": {
      const m = ev.message;
      const time = chalk.gray(m.timestamp.slice(11, 19));
      const who = m.kind.type === "private" ? chalk.magenta(`${m.senderName} -> ${m.kind.targetId}`) : chalk.cyan(m.senderName);
      const file = m.attachment ? chalk.gray(` [${m.attachment.fileType}: ${m.attachment.relativePath}]`) : "";
      return `${time} ${who}: ${m.body}${file}`;
    }
    case "presence":
      return chalk.gray(`online: ${ev.users.map((u) => `${u.displayName} (${u.userId})`).join(", ") || "(nobody)"}`);
    case "system":
      return chalk.yellow(ev.text);
    case "error":
      return chalk.red(ev.text);
  }
}

/** Attachments received this session, numbered from 1 in arrival order. */
export class AttachmentInbox {
  private readonly refs: FileRef[] = [];

  add(ref: FileRef): number {
    this.refs.push(ref);
    return this.refs.length;
  }

  /** The `index`-th attachment, or the latest when `index` is omitted. */
  pick(index?: number): FileRef | undefined {
    return this.refs[(index ?? this.refs.length) - 1];
  }

  get size(): number {
    return this.refs.length;
  }
}

export interface InteractiveHooks {
  /** Uploads and posts a file; transports without attachments leave this out. */
  sendFile?: (path: string, targetId?: string) => Promise<void>;
  /** Fetches a received attachment and returns where it was written. */
  download?: (ref: FileRef) => Promise<string>;
  /** Called for `/users`; the latest presence event is printed when absent. */
  listUsers?: () => string;
}

export interface TerminalIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Reads commands from the terminal and prints transport events until the
 * user quits or the transport closes its event stream.
 */
export async function runInteractive(
  transport: BaseTransport,
  hooks: InteractiveHooks = {},
  io: TerminalIo = { input: stdin, output: stdout },
): Promise<void> {
  let lastPresence = "(no presence yet)";
  const inbox = new AttachmentInbox();
  // aborts the pending prompt once the transport closes its event stream
  const ended = new AbortController();
  const pump = (async () => {
    for (let ev = await transport.events.pop(); ev; ev = await transport.events.pop()) {
      if (ev.kind === "presence") lastPresence = formatEvent(ev);
      console.log(formatEvent(ev));
      if (ev.kind === "message" && ev.message.attachment && hooks.download) {
        console.log(chalk.gray(`  /get ${inbox.add(ev.message.attachment)} to download`));
      }
    }
  })().finally(() => ended.abort());

  console.log(chalk.gray(`Connected as ${transport.username} (${transport.userId}). Type /help for commands.`));
  const rl = readline.createInterface({ input: io.input, output: io.output });
  try {
    while (transport.isRunning) {
      let line: string;
      try {
        line = await rl.question("", { signal: ended.signal });
      } catch (e) {
        if (ended.signal.aborted) return;
        throw e;
      }
      const cmd = parseInput(line);
      try {
        switch (cmd.kind) {
          case "quit":
            return;
          case "empty":
            break;
          case "help":
            console.log(HELP_TEXT);
            break;
          case "invalid":
            console.log(chalk.yellow(`usage: ${cmd.usage}`));
            break;
          case "users":
            console.log(hooks.listUsers ? hooks.listUsers() : lastPresence);
            break;
          case "public":
            await transport.sendPublic(cmd.body);
            break;
          case "private":
            await transport.sendPrivate(cmd.targetId, cmd.body);
            break;
          case "file":
            if (!hooks.sendFile) console.log(chalk.yellow(`${transport.name} does not carry files`));
            else await hooks.sendFile(cmd.path, cmd.targetId);
            break;
          case "get": {
            const ref = inbox.pick(cmd.index);
            if (!hooks.download) console.log(chalk.yellow(`${transport.name} does not carry files`));
            else if (!ref) console.log(chalk.yellow(inbox.size ? `no file #${cmd.index}` : "no files received yet"));
            else console.log(chalk.gray(`saved ${ref.originalName} to ${await hooks.download(ref)}`));
            break;
          }
        }
      } catch (e) {
        console.log(chalk.red(describeError(e)));
      }
    }
  } finally {
    rl.close();
    await transport.stop();
    transport.events.close();
    await pump;
  }
}
