import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import prompts from "prompts";
import chalk from "chalk";
import { loadConfig, saveConfig, getConfigPath } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { describeError } from "../errors.js";
import { isSafeId } from "../store/layout.js";
import { FileSystemBackend } from "../store/fs-backend.js";
import { ShareChannelStore } from "../store/channel-store.js";
import { ChatServer } from "../server/chat-server.js";
import { PushTransport } from "../transports/push.js";
import { PullTransport } from "../transports/pull.js";
import { RetentionSweeper, type SweepReport } from "../retention/sweeper.js";
import { RetentionService } from "../retention/service.js";
import type { RetentionSchedule } from "../retention/types.js";
import { expandHome } from "../utils/helpers.js";
import { runInteractive } from "./interactive.js";

interface ServerOpts {
  host?: string;
  port?: string;
  ssl?: boolean;
  cert?: string;
  key?: string;
}

interface ConnectOpts {
  url?: string;
  user?: string;
  name?: string;
  insecure?: boolean;
}

interface ShareOpts {
  root?: string;
  user?: string;
  name?: string;
}

interface RootOpts {
  root?: string;
}

interface SweepOpts extends RootOpts {
  days?: string;
}

interface RetentionOpts extends SweepOpts {
  cron?: string;
  every?: string;
  tz?: string;
}

function fail(message: string): void {
  console.log(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
}

export function parsePort(raw: string): number | null {
  const port = Number(raw);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : null;
}

export function parseDays(raw: string): number | null {
  const days = Number(raw);
  return Number.isFinite(days) && days >= 0 ? days : null;
}

function resolveRoot(config: Config, opts: RootOpts): string | null {
  const root = opts.root ?? config.share.root;
  if (!root) {
    fail("no share root; pass --root or set share.root in the config");
    return null;
  }
  return path.resolve(expandHome(root));
}

function resolveIdentity(config: Config, opts: { user?: string; name?: string }): { userId: string; username: string } | null {
  const userId = opts.user ?? config.client.userId;
  const username = opts.name ?? (config.client.username || userId);
  if (!userId) {
    fail("no user ID; pass --user or run relaychat onboard");
    return null;
  }
  if (!isSafeId(userId)) {
    fail(`invalid user ID '${userId}'`);
    return null;
  }
  return { userId, username };
}

function untilSignal(): Promise<void> {
  return new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

function printReport(report: SweepReport): void {
  console.log(`Deleted before ${report.cutoff}:`);
  console.log(`  public messages   ${report.publicDeleted}`);
  console.log(`  private messages  ${report.privateDeleted}`);
  console.log(`  heartbeats        ${report.heartbeatsDeleted}`);
  console.log(`  empty channels    ${report.channelsRemoved}`);
  const summary = `Total: ${report.total} file(s), ${report.failures} failure(s)`;
  console.log(report.failures ? chalk.yellow(summary) : chalk.green(summary));
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("relaychat")
    .description("relaychat - group and private chat over WebSocket or a shared folder")
    .version("0.1.0", "-v, --version", "show version");

  program.command("onboard").description("Create or update the relaychat configuration").action(async () => {
    const configPath = getConfigPath();
    const config = loadConfig();
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      saveConfig(config);
      console.log(`Config written to ${configPath}`);
      console.log("Terminal is non-interactive; edit the file to set your user ID and share root.");
      return;
    }

    console.log(chalk.cyan("\nrelaychat setup\n"));
    const res = await prompts([
      {
        type: "text",
        name: "userId",
        message: "User ID",
        initial: config.client.userId,
        validate: (v: string) => (isSafeId(v.trim()) ? true : "User ID cannot be empty or contain / or \\"),
      },
      { type: "text", name: "username", message: "Display name", initial: config.client.username },
      { type: "text", name: "url", message: "Chat server URL", initial: config.client.url },
      { type: "text", name: "root", message: "Shared folder (leave empty to skip)", initial: config.share.root },
    ]);
    const userId = String(res.userId ?? "").trim();
    if (!userId) {
      console.log(chalk.yellow("Setup cancelled."));
      return;
    }
    config.client.userId = userId;
    config.client.username = String(res.username ?? "").trim() || userId;
    config.client.url = String(res.url ?? "").trim() || config.client.url;
    config.share.root = String(res.root ?? "").trim();
    saveConfig(config);
    console.log(chalk.green(`\nSaved ${configPath}`));
    console.log(chalk.yellow("Run relaychat server, then relaychat connect"));
    if (config.share.root) console.log(chalk.yellow("or chat over the shared folder: relaychat share"));
  });

  program
    .command("server")
    .description("Run the WebSocket chat server")
    .option("--host <host>", "Address to bind")
    .option("-p, --port <port>", "Port to listen on")
    .option("--ssl", "Serve wss:// (needs --cert and --key)")
    .option("--cert <file>", "TLS certificate (PEM)")
    .option("--key <file>", "TLS private key (PEM)")
    .action(async (opts: ServerOpts) => {
      const config = loadConfig();
      const host = opts.host ?? config.server.host;
      const port = parsePort(opts.port ?? String(config.server.port));
      if (port === null) return fail(`invalid port '${opts.port}'`);

      const ssl = opts.ssl ?? config.server.ssl.enabled;
      const cert = opts.cert ?? config.server.ssl.cert;
      const key = opts.key ?? config.server.ssl.key;
      if (ssl) {
        if (!cert || !key) return fail("--ssl needs both --cert and --key");
        for (const file of [cert, key]) {
          if (!fs.existsSync(expandHome(file))) return fail(`file not found: ${file}`);
        }
      }

      const server = new ChatServer({
        host,
        port,
        tls: ssl ? { cert: expandHome(cert), key: expandHome(key) } : undefined,
      });
      try {
        const { url } = await server.listen();
        console.log(chalk.green(`Chat server on ${url}`));
        console.log(chalk.gray("Press Ctrl+C to stop."));
      } catch (e) {
        return fail(`could not start server: ${describeError(e)}`);
      }
      await untilSignal();
      await server.close();
    });

  program
    .command("connect")
    .description("Join a chat server interactively")
    .option("--url <url>", "Server URL (ws:// or wss://)")
    .option("-u, --user <id>", "User ID")
    .option("-n, --name <name>", "Display name")
    .option("-k, --insecure", "Accept self-signed certificates")
    .action(async (opts: ConnectOpts) => {
      const config = loadConfig();
      const identity = resolveIdentity(config, opts);
      if (!identity) return;
      const transport = new PushTransport({
        url: opts.url ?? config.client.url,
        ...identity,
        insecure: opts.insecure ?? config.client.insecure,
      });
      try {
        await transport.start();
      } catch (e) {
        return fail(describeError(e));
      }
      await runInteractive(transport);
    });

  program
    .command("share")
    .description("Chat over a shared folder interactively")
    .option("-r, --root <dir>", "Shared folder")
    .option("-u, --user <id>", "User ID")
    .option("-n, --name <name>", "Display name")
    .action(async (opts: ShareOpts) => {
      const config = loadConfig();
      const root = resolveRoot(config, opts);
      const identity = resolveIdentity(config, opts);
      if (!root || !identity) return;
      const transport = new PullTransport({
        backend: new FileSystemBackend(root),
        ...identity,
        pollIntervalMs: config.share.pollIntervalMs,
        heartbeatIntervalMs: config.share.heartbeatIntervalMs,
        presenceTtlS: config.share.presenceTtlS,
        cacheLimit: config.share.cacheLimit,
        stopTimeoutMs: config.share.stopTimeoutMs,
      });
      try {
        await transport.start();
      } catch (e) {
        return fail(describeError(e));
      }
      const downloadDir = expandHome(config.share.downloadDir);
      await runInteractive(transport, {
        sendFile: async (filePath, targetId) => {
          const ref = await transport.sendFile(expandHome(filePath), targetId);
          console.log(chalk.gray(`shared ${ref.originalName} as ${ref.relativePath}`));
        },
        download: (ref) => transport.downloadFile(ref, downloadDir),
        listUsers: () =>
          transport.onlineUsers.map((u) => `${u.displayName} (${u.userId})`).join(", ") || "(nobody)",
      });
    });

  program
    .command("sweep")
    .description("Delete messages and heartbeats older than N days")
    .option("-r, --root <dir>", "Shared folder")
    .option("-d, --days <n>", "Days to keep")
    .action(async (opts: SweepOpts) => {
      const config = loadConfig();
      const root = resolveRoot(config, opts);
      if (!root) return;
      const days = parseDays(opts.days ?? String(config.retention.daysToKeep));
      if (days === null) return fail(`invalid --days '${opts.days}'`);
      const report = await new RetentionSweeper(new FileSystemBackend(root)).run(days);
      printReport(report);
      if (report.failures) process.exitCode = 1;
    });

  program
    .command("retention")
    .description("Run scheduled sweeps until stopped")
    .option("-r, --root <dir>", "Shared folder")
    .option("-d, --days <n>", "Days to keep")
    .option("-c, --cron <expr>", "Cron expression")
    .option("-e, --every <seconds>", "Fixed interval instead of cron")
    .option("--tz <tz>", "Time zone for --cron")
    .option("--now", "Also sweep once at startup")
    .action(async (opts: RetentionOpts & { now?: boolean }) => {
      const config = loadConfig();
      const root = resolveRoot(config, opts);
      if (!root) return;
      const days = parseDays(opts.days ?? String(config.retention.daysToKeep));
      if (days === null) return fail(`invalid --days '${opts.days}'`);
      if (opts.tz && opts.every) return fail("--tz can only be used with --cron");

      const tz = opts.tz ?? config.retention.tz ?? undefined;
      const schedule: RetentionSchedule = opts.every
        ? { kind: "every", everyMs: Number(opts.every) * 1000 }
        : { kind: "cron", expr: opts.cron ?? config.retention.schedule, tz };

      let service: RetentionService;
      try {
        service = new RetentionService(new RetentionSweeper(new FileSystemBackend(root)), { daysToKeep: days, schedule });
      } catch (e) {
        return fail(describeError(e));
      }
      if (opts.now) {
        const report = await service.runNow();
        if (report) printReport(report);
      }
      service.start();
      const next = service.status().state.nextRunAtMs;
      console.log(chalk.green(`Keeping ${days} day(s) in ${root}`));
      if (next) console.log(chalk.gray(`Next sweep: ${new Date(next).toISOString()}. Press Ctrl+C to stop.`));
      await untilSignal();
      service.stop();
    });

  program
    .command("stats")
    .description("Show shared folder contents and recent sweeps")
    .option("-r, --root <dir>", "Shared folder")
    .action(async (opts: RootOpts) => {
      const config = loadConfig();
      const root = resolveRoot(config, opts);
      if (!root) return;
      const backend = new FileSystemBackend(root);
      const info = await new ShareChannelStore(backend).storageInfo();
      console.log(`Share: ${root}`);
      console.log(`  public messages   ${info.publicMessages}`);
      console.log(`  private messages  ${info.privateMessages}`);
      console.log(`  heartbeats        ${info.heartbeats}`);
      console.log(`  total             ${info.totalFiles}`);
      const sweeps = (await new RetentionSweeper(backend).readStats()).slice(-5);
      if (!sweeps.length) return console.log("No sweeps recorded.");
      console.log("Recent sweeps:");
      for (const s of sweeps) console.log(`  ${s.cleanup_time}  deleted ${s.deleted_files}, kept ${s.days_kept} day(s)`);
    });

  program
    .command("probe")
    .description("Check that the shared folder is readable and writable")
    .option("-r, --root <dir>", "Shared folder")
    .action(async (opts: RootOpts) => {
      const config = loadConfig();
      const root = resolveRoot(config, opts);
      if (!root) return;
      if (await new ShareChannelStore(new FileSystemBackend(root)).checkAccess()) {
        console.log(chalk.green(`${root} is readable and writable`));
      } else {
        fail(`cannot write to ${root}`);
      }
    });

  program.command("status").description("Show relaychat configuration").action(() => {
    const configPath = getConfigPath();
    const config = loadConfig();
    console.log("relaychat Status\n");
    console.log(`Config: ${configPath} ${fs.existsSync(configPath) ? "yes" : "no"}`);
    console.log(`User: ${config.client.userId || "not set"}${config.client.username ? ` (${config.client.username})` : ""}`);
    const scheme = config.server.ssl.enabled ? "wss" : "ws";
    console.log(`Server: ${scheme}://${config.server.host}:${config.server.port}`);
    console.log(`Client URL: ${config.client.url}`);
    const root = config.share.root;
    console.log(`Share: ${root ? `${root} ${fs.existsSync(expandHome(root)) ? "yes" : "no"}` : "not set"}`);
    const tz = config.retention.tz ? ` ${config.retention.tz}` : "";
    console.log(`Retention: keep ${config.retention.daysToKeep} day(s), ${config.retention.schedule}${tz}`);
  });

  return program;
}

