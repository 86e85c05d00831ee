export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

const LOG_LEVELS = new Set(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export interface ServerConfig {
  port: number;
  host: string;
  apiKey: string | null;
  logLevel: string;
  /** Roots that job paths must live under. null disables the check. */
  allowedPaths: string[] | null;
  /** Executable that builds and tests run against. */
  buildTool: string;
  /** Terminal jobs kept in memory before the oldest are evicted. */
  maxRetainedJobs: number;
  reclaimIntervalMs: number;
  /** Lines buffered between the process drain and the registry. */
  logQueueCapacity: number;
  logPollIntervalMs: number;
  /** Terminate the external process when its job is cancelled. */
  killOnCancel: boolean;
}

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and exit on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    issues.push({ level: "error", message: `PORT must be an integer between 0 and 65535` });
  }

  const positive: Array<[string, number]> = [
    ["MAX_RETAINED_JOBS", config.maxRetainedJobs],
    ["RECLAIM_INTERVAL_MS", config.reclaimIntervalMs],
    ["LOG_QUEUE_CAPACITY", config.logQueueCapacity],
    ["LOG_POLL_INTERVAL_MS", config.logPollIntervalMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      issues.push({ level: "error", message: `${name} must be a positive integer` });
    }
  }

  if (!LOG_LEVELS.has(config.logLevel)) {
    issues.push({ level: "error", message: `LOG_LEVEL "${config.logLevel}" is not a valid level` });
  }

  if (!config.apiKey) {
    issues.push({
      level: "warn",
      message: "BUILDRELAY_API_KEY is not set, authentication is disabled",
    });
  }

  if (!config.allowedPaths) {
    issues.push({
      level: "warn",
      message: "ALLOWED_PATHS is not set, jobs may reference any path on this host",
    });
  }

  return issues;
}

function parseList(raw: string | undefined): string[] | null {
  if (raw === undefined) return null;
  const entries = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return entries.length > 0 ? entries : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT ?? "9090", 10),
    host: env.HOST ?? "127.0.0.1",
    apiKey: env.BUILDRELAY_API_KEY || null,
    logLevel: (env.LOG_LEVEL ?? "info").toLowerCase(),
    allowedPaths: parseList(env.ALLOWED_PATHS),
    buildTool: env.BUILD_TOOL ?? "xcodebuild",
    maxRetainedJobs: parseInt(env.MAX_RETAINED_JOBS ?? "100", 10),
    reclaimIntervalMs: parseInt(env.RECLAIM_INTERVAL_MS ?? "60000", 10),
    logQueueCapacity: parseInt(env.LOG_QUEUE_CAPACITY ?? "100", 10),
    logPollIntervalMs: parseInt(env.LOG_POLL_INTERVAL_MS ?? "100", 10),
    killOnCancel: env.KILL_ON_CANCEL === "true" || env.KILL_ON_CANCEL === "1",
  };
}
