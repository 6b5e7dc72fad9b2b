import {
  DEFAULT_API_URL,
  DEFAULT_KEYCHAIN_ACCOUNT,
  DEFAULT_KEYCHAIN_SERVICE,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_MAX_ATTEMPTS,
  LOG_LEVELS,
  MAX_PER_PAGE,
  TOKEN_PLACEHOLDER
} from "./constants.js";

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EnvConfig {
  /** Undefined when HETZNER_API_TOKEN is unset or still the placeholder. */
  apiToken?: string;
  apiBaseUrl: string;
  perPage: number;
  poll: {
    intervalMs: number;
    maxAttempts: number;
  };
  keychain: {
    service: string;
    account: string;
  };
  logLevel: LogLevel;
  logFile?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsePositiveInt = (raw: string | undefined, name: string, fallback: number) => {
    const n = Number(raw ?? String(fallback));
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`${name} must be a positive number`);
    }
    return Math.floor(n);
  };

  const tokenRaw = (source.HETZNER_API_TOKEN ?? "").trim();
  const apiToken = tokenRaw && tokenRaw !== TOKEN_PLACEHOLDER ? tokenRaw : undefined;

  const apiBaseUrl = (source.HETZNER_API_URL ?? DEFAULT_API_URL).trim().replace(/\/+$/, "");
  if (!/^https?:\/\/[^/]+/.test(apiBaseUrl)) {
    throw new Error("HETZNER_API_URL must be an http(s) URL");
  }

  const perPage = parsePositiveInt(source.HCLOUD_PER_PAGE, "HCLOUD_PER_PAGE", MAX_PER_PAGE);
  if (perPage > MAX_PER_PAGE) {
    throw new Error(`HCLOUD_PER_PAGE must be at most ${MAX_PER_PAGE}`);
  }

  const keychainService = (source.KEYCHAIN_SERVICE ?? "").trim() || DEFAULT_KEYCHAIN_SERVICE;
  const keychainAccount = (source.KEYCHAIN_ACCOUNT ?? "").trim() || DEFAULT_KEYCHAIN_ACCOUNT;

  const logLevelRaw = (source.LOG_LEVEL ?? "warn").trim().toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  const logFile = (source.LOG_FILE ?? "").trim() || undefined;

  return {
    apiToken,
    apiBaseUrl,
    perPage,
    poll: {
      intervalMs: parsePositiveInt(source.SNAPSHOT_POLL_INTERVAL_MS, "SNAPSHOT_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS),
      maxAttempts: parsePositiveInt(source.SNAPSHOT_POLL_MAX_ATTEMPTS, "SNAPSHOT_POLL_MAX_ATTEMPTS", DEFAULT_POLL_MAX_ATTEMPTS)
    },
    keychain: {
      service: keychainService,
      account: keychainAccount
    },
    logLevel: logLevelRaw,
    logFile
  };
}
