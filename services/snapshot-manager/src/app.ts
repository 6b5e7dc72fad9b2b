import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { HetznerClient, type FetchLike } from "./api/hetznerClient.js";
import type { EnvConfig } from "./config/env.js";
import { missingTokenMessage, resolveApiToken } from "./credentials/credentialProvider.js";
import { MenuController } from "./menu/menuController.js";
import type { Logger } from "./telemetry/logger.js";
import type { SecretStore, Terminal } from "./types/interfaces.js";

export const USAGE = [
  "Usage: hcloud-snapshots [--version] [--help]",
  "",
  "Interactive manager for Hetzner Cloud server snapshots.",
  "",
  "Environment:",
  "  HETZNER_API_TOKEN           API token (not needed when stored in the macOS Keychain)",
  "  HETZNER_API_URL             API base URL (default https://api.hetzner.cloud/v1)",
  "  SNAPSHOT_POLL_INTERVAL_MS   delay between action status checks (default 5000)",
  "  SNAPSHOT_POLL_MAX_ATTEMPTS  status checks before giving up (default 720)",
  "  LOG_LEVEL, LOG_FILE         pino log level and optional log file"
].join("\n");

export type CliCommand = { kind: "run" } | { kind: "version" } | { kind: "help" } | { kind: "invalid"; arg: string };

export function parseCliArgs(args: string[]): CliCommand {
  const [first] = args;
  if (first === undefined) return { kind: "run" };
  if (first === "--version" || first === "-v") return { kind: "version" };
  if (first === "--help" || first === "-h") return { kind: "help" };
  return { kind: "invalid", arg: first };
}

export function readPackageVersion(): string {
  // Works from both src/ and dist/: package.json sits one level up.
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
}

export interface RunAppOptions {
  env: EnvConfig;
  terminal: Terminal;
  secretStore: SecretStore;
  logger: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  /** Where the fatal missing-token message goes. */
  writeError?: (line: string) => void;
}

export async function runApp(options: RunAppOptions): Promise<number> {
  const { env, logger, secretStore } = options;
  const credential = await resolveApiToken({ envToken: env.apiToken, store: secretStore, logger });
  if (!credential) {
    (options.writeError ?? ((line: string) => console.error(line)))(missingTokenMessage(secretStore));
    return 1;
  }
  logger.info({ source: credential.source }, "starting menu");

  const createApi = (token: string) =>
    new HetznerClient({ token, baseUrl: env.apiBaseUrl, perPage: env.perPage, fetch: options.fetch, logger });

  const controller = new MenuController({
    api: createApi(credential.token),
    createApi,
    secretStore,
    terminal: options.terminal,
    logger,
    poll: { intervalMs: env.poll.intervalMs, maxAttempts: env.poll.maxAttempts, sleep: options.sleep },
    now: options.now
  });
  return controller.run();
}
