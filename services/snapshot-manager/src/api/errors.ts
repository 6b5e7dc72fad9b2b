export class HetznerError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;

  constructor(code: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HetznerError";
    this.code = code;
    this.statusCode = options?.statusCode;
  }
}

export class AuthError extends HetznerError {
  constructor(message: string, options?: { code?: string; statusCode?: number }) {
    super(options?.code ?? "unauthorized", message, { statusCode: options?.statusCode });
    this.name = "AuthError";
  }
}

export class NotFoundError extends HetznerError {
  constructor(message: string, options?: { statusCode?: number }) {
    super("not_found", message, { statusCode: options?.statusCode ?? 404 });
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends HetznerError {
  /** When the provider's rate limit window resets, if it told us. */
  public readonly resetAt: Date | null;

  constructor(message: string, options?: { resetAt?: Date | null }) {
    super("rate_limit_exceeded", message, { statusCode: 429 });
    this.name = "RateLimitError";
    this.resetAt = options?.resetAt ?? null;
  }
}

export class NetworkError extends HetznerError {
  constructor(message: string, cause?: unknown) {
    super("network_error", message, { cause });
    this.name = "NetworkError";
  }
}

export class ApiError extends HetznerError {
  constructor(statusCode: number, code: string, message: string) {
    super(code, message, { statusCode });
    this.name = "ApiError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
