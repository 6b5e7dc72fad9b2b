export const DEFAULT_API_URL = "https://api.hetzner.cloud/v1";

// Hetzner caps per_page at 50.
export const MAX_PER_PAGE = 50;
export const MAX_PAGES = 200;

// One hour of polling at the default interval.
export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_POLL_MAX_ATTEMPTS = 720;

export const DEFAULT_KEYCHAIN_SERVICE = "HetznerAPIKey";
export const DEFAULT_KEYCHAIN_ACCOUNT = "hcloud-snapshots";

export const TOKEN_PLACEHOLDER = "your_api_token_here";

export const MAX_DESCRIPTION_LENGTH = 255;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
