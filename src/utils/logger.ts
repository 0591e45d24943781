import chalk, { type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const scopeColors: Record<string, ChalkInstance> = {
  server: chalk.cyan,
  registry: chalk.magenta,
  share: chalk.green,
  sync: chalk.blue,
  heartbeat: chalk.yellow,
  retention: chalk.red,
  push: chalk.cyan,
  config: chalk.gray,
};

function isLogLevel(v: string): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent";
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").toLowerCase();
  return isLogLevel(v) ? v : "info";
}

let threshold: LogLevel = parseLogLevel(process.env.RELAYCHAT_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(scope: string): Logger {
  const color = scopeColors[scope] ?? chalk.white;
  const tag = `[${color(scope)}]`;
  const emit = (level: Exclude<LogLevel, "silent">, msg: string) => {
    if (ORDER[level] < ORDER[threshold]) return;
    const time = chalk.gray(new Date().toISOString());
    if (level === "error") console.error(`${time} ${tag} ${chalk.red("ERROR")} ${msg}`);
    else if (level === "warn") console.warn(`${time} ${tag} ${chalk.yellow("WARN")} ${msg}`);
    else if (level === "debug") console.log(`${time} ${tag} ${chalk.gray(msg)}`);
    else console.log(`${time} ${tag} ${msg}`);
  };
  return {
    debug: (msg) => emit("debug", msg),
    info: (msg) => emit("info", msg),
    warn: (msg) => emit("warn", msg),
    error: (msg) => emit("error", msg),
  };
}
