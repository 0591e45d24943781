import path from "node:path";

export type Config = {
  server: {
    host: string;
    port: number;
    ssl: { enabled: boolean; cert: string; key: string };
  };
  client: {
    url: string;
    userId: string;
    username: string;
    /** Accept self-signed certificates on wss:// URLs. */
    insecure: boolean;
  };
  share: {
    root: string;
    pollIntervalMs: number;
    heartbeatIntervalMs: number;
    presenceTtlS: number;
    cacheLimit: number;
    stopTimeoutMs: number;
    downloadDir: string;
  };
  retention: {
    daysToKeep: number;
    schedule: string;
    tz: string | null;
  };
};

export const DEFAULT_CONFIG: Config = {
  server: {
    host: "localhost",
    port: 8765,
    ssl: { enabled: false, cert: "", key: "" },
  },
  client: { url: "ws://localhost:8765", userId: "", username: "", insecure: false },
  share: {
    root: "",
    pollIntervalMs: 3000,
    heartbeatIntervalMs: 30_000,
    presenceTtlS: 300,
    cacheLimit: 100,
    stopTimeoutMs: 1000,
    downloadDir: path.join("~", ".relaychat", "downloads"),
  },
  retention: { daysToKeep: 1, schedule: "0 2 * * *", tz: null },
};
