import { spawn } from "node:child_process";
import type { Logger } from "../telemetry/logger.js";
import type { SecretStore } from "../types/interfaces.js";

export interface KeychainOptions {
  service: string;
  account: string;
  logger: Logger;
}

/**
 * macOS login Keychain, driven through the `security` CLI.
 *
 * Lookups are best-effort: a missing item or a denied prompt resolves to null
 * and the caller falls back to the environment.
 */
export class KeychainSecretStore implements SecretStore {
  readonly available = true;
  readonly label = "macOS Keychain";
  private readonly log: Logger;

  constructor(private readonly options: KeychainOptions) {
    this.log = options.logger.child({ component: "keychain" });
  }

  async get(): Promise<string | null> {
    try {
      const { stdout } = await runCmd("security", [
        "find-generic-password",
        "-s",
        this.options.service,
        "-a",
        this.options.account,
        "-w"
      ]);
      const token = stdout.trim();
      return token || null;
    } catch (err) {
      this.log.warn({ err, service: this.options.service }, "API token not found in Keychain or access denied");
      return null;
    }
  }

  async set(token: string): Promise<void> {
    const value = token.trim();
    if (!value) {
      throw new Error("API token must not be empty");
    }
    // -U updates the existing item instead of failing on a duplicate.
    await runCmd("security", [
      "add-generic-password",
      "-U",
      "-s",
      this.options.service,
      "-a",
      this.options.account,
      "-w",
      value
    ]);
  }
}

export class UnavailableSecretStore implements SecretStore {
  readonly available = false;
  readonly label = "Keychain (macOS only)";

  constructor(private readonly platform: string) {}

  async get(): Promise<string | null> {
    return null;
  }

  async set(_token: string): Promise<void> {
    throw new Error(`Storing the API token is only available on macOS (current platform: ${this.platform})`);
  }
}

export function createSecretStore(platform: string, options: KeychainOptions): SecretStore {
  return platform === "darwin" ? new KeychainSecretStore(options) : new UnavailableSecretStore(platform);
}

async function runCmd(cmd: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (d) => (stdout += String(d)));
    proc.stderr.on("data", (d) => (stderr += String(d)));
    proc.on("error", reject);
    proc.on("close", (code) => {
      if (code === 0) return resolve({ stdout, stderr });
      // Never echo args: they may contain the token.
      reject(new Error(`${cmd} ${args[0] ?? ""} exited with code ${code}: ${stderr.trim()}`));
    });
  });
}
