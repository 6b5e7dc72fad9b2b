import { TOKEN_PLACEHOLDER } from "../config/constants.js";
import type { Logger } from "../telemetry/logger.js";
import type { SecretStore } from "../types/interfaces.js";

export type TokenSource = "secret-store" | "env";

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

/** The secret store wins over the environment when it holds a token. */
export async function resolveApiToken(input: {
  envToken?: string;
  store: SecretStore;
  logger: Logger;
}): Promise<ResolvedToken | null> {
  if (input.store.available) {
    const stored = normalizeToken(await input.store.get());
    if (stored) {
      input.logger.debug({ source: "secret-store" }, "API token resolved");
      return { token: stored, source: "secret-store" };
    }
  }
  const fromEnv = normalizeToken(input.envToken);
  if (fromEnv) {
    input.logger.debug({ source: "env" }, "API token resolved");
    return { token: fromEnv, source: "env" };
  }
  return null;
}

export function missingTokenMessage(store: SecretStore): string {
  if (store.available) {
    return (
      `Error: API token not found in the ${store.label} or HETZNER_API_TOKEN. ` +
      "Set HETZNER_API_TOKEN, then use menu option 0 to store it."
    );
  }
  return "Error: API token is not set. Please set the HETZNER_API_TOKEN environment variable.";
}

function normalizeToken(raw: string | null | undefined): string | null {
  const token = (raw ?? "").trim();
  return token && token !== TOKEN_PLACEHOLDER ? token : null;
}
