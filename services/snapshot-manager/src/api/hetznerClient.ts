import type { z } from "zod";
import { MAX_DESCRIPTION_LENGTH, MAX_PAGES, MAX_PER_PAGE } from "../config/constants.js";
import type { Logger } from "../telemetry/logger.js";
import type { Action, CreatedSnapshot, Server, ServerRef, Snapshot } from "../types/hetzner.js";
import type { SnapshotApi } from "../types/interfaces.js";
import { ApiError, AuthError, errorMessage, NetworkError, NotFoundError, RateLimitError, type HetznerError } from "./errors.js";
import {
  actionResponseSchema,
  createImageResponseSchema,
  errorEnvelopeSchema,
  imageListSchema,
  nextPage,
  serverListSchema,
  serverResponseSchema,
  toAction,
  toServer,
  toSnapshot
} from "./schemas.js";
import { byName, matchSnapshot, newestFirst } from "./snapshotFilter.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface HttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<Response>;

export interface HetznerClientOptions {
  token: string;
  baseUrl: string;
  perPage?: number;
  fetch?: FetchLike;
  logger: Logger;
}

export class HetznerClient implements SnapshotApi {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly perPage: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(options: HetznerClientOptions) {
    const token = options.token.trim();
    if (!token) {
      throw new AuthError("Hetzner API token is missing");
    }
    this.token = token;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.perPage = Math.min(Math.max(1, Math.floor(options.perPage ?? MAX_PER_PAGE)), MAX_PER_PAGE);
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.log = options.logger.child({ component: "api" });
  }

  async listServers(): Promise<Server[]> {
    const servers: Server[] = [];
    let page: number | null = 1;
    for (let fetched = 0; page !== null && fetched < MAX_PAGES; fetched += 1) {
      const body: z.infer<typeof serverListSchema> = await this.request(
        "GET",
        `/servers?page=${page}&per_page=${this.perPage}`,
        serverListSchema
      );
      servers.push(...body.servers.map(toServer));
      page = nextPage(body.meta, page);
    }
    return servers.sort(byName);
  }

  async getServer(serverId: number): Promise<Server> {
    assertId(serverId, "serverId");
    const body = await this.request("GET", `/servers/${serverId}`, serverResponseSchema);
    return toServer(body.server);
  }

  async listSnapshots(server: ServerRef): Promise<Snapshot[]> {
    assertId(server.id, "serverId");
    const all: Snapshot[] = [];
    let page: number | null = 1;
    for (let fetched = 0; page !== null && fetched < MAX_PAGES; fetched += 1) {
      const body: z.infer<typeof imageListSchema> = await this.request(
        "GET",
        `/images?type=snapshot&page=${page}&per_page=${this.perPage}`,
        imageListSchema
      );
      all.push(...body.images.map(toSnapshot));
      page = nextPage(body.meta, page);
    }

    const matched = all.filter((snapshot) => {
      const match = matchSnapshot(snapshot, server);
      this.log.trace({ snapshotId: snapshot.id, serverId: server.id, match }, "snapshot association");
      return match !== null;
    });
    this.log.debug({ serverId: server.id, total: all.length, matched: matched.length }, "snapshots filtered");
    return matched.sort(newestFirst);
  }

  async createSnapshot(serverId: number, description: string): Promise<CreatedSnapshot> {
    assertId(serverId, "serverId");
    const trimmed = description.trim();
    if (!trimmed) {
      throw new RangeError("description must not be empty");
    }
    if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
      throw new RangeError(`description must be at most ${MAX_DESCRIPTION_LENGTH} characters`);
    }
    const body = await this.request("POST", `/servers/${serverId}/actions/create_image`, createImageResponseSchema, {
      description: trimmed,
      type: "snapshot"
    });
    return { action: toAction(body.action), snapshot: body.image ? toSnapshot(body.image) : null };
  }

  async deleteSnapshot(snapshotId: number): Promise<void> {
    assertId(snapshotId, "snapshotId");
    await this.send("DELETE", `/images/${snapshotId}`);
  }

  async getAction(actionId: number): Promise<Action> {
    assertId(actionId, "actionId");
    const body = await this.request("GET", `/actions/${actionId}`, actionResponseSchema);
    return toAction(body.action);
  }

  private async request<T>(method: HttpMethod, pathName: string, schema: z.ZodType<T>, body?: unknown): Promise<T> {
    const res = await this.send(method, pathName, body);
    if (res.body === null) {
      throw new ApiError(res.status, "empty_response", `Empty response from Hetzner API (${method} ${pathName})`);
    }
    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      this.log.warn({ method, path: pathName, issues: parsed.error.issues.slice(0, 5) }, "unexpected response shape");
      throw new ApiError(res.status, "invalid_response", `Unexpected response from Hetzner API (${method} ${pathName})`);
    }
    return parsed.data;
  }

  /** Performs one HTTP request. The body is the parsed JSON, or null for 204. */
  private async send(method: HttpMethod, pathName: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const headers: Record<string, string> = {
      accept: "application/json",
      authorization: `Bearer ${this.token}`
    };
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }
    this.log.debug({ method, path: pathName, headers }, "request");

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${pathName}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body)
      });
    } catch (err) {
      throw new NetworkError(`Could not reach Hetzner API (${method} ${pathName}): ${errorMessage(err)}`, err);
    }

    if (res.status === 204) {
      return { status: res.status, body: null };
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new NetworkError(`Failed to read Hetzner API response (${method} ${pathName}): ${errorMessage(err)}`, err);
    }
    this.log.debug({ method, path: pathName, status: res.status, bytes: text.length }, "response");

    if (!text.trim()) {
      if (!res.ok) {
        throw toHetznerError(res, null);
      }
      throw new ApiError(res.status, "empty_response", "Empty response from Hetzner API. Please check your API token.");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      if (!res.ok) {
        throw toHetznerError(res, null);
      }
      throw new ApiError(res.status, "invalid_json", `Invalid JSON response from Hetzner API (status ${res.status})`);
    }

    const envelope = errorEnvelopeSchema.safeParse(parsed);
    if (!res.ok || envelope.success) {
      throw toHetznerError(res, envelope.success ? envelope.data.error : null);
    }
    return { status: res.status, body: parsed };
  }
}

function assertId(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer`);
  }
}

const AUTH_CODES = new Set(["unauthorized", "forbidden", "token_readonly"]);

function toHetznerError(res: Pick<Response, "status" | "statusText" | "headers">, error: { code: string; message: string } | null): HetznerError {
  const status = res.status;
  const code = error?.code ?? "";
  const message = error?.message || `HTTP ${status}${res.statusText ? ` ${res.statusText}` : ""}`;

  if (status === 401 || status === 403 || AUTH_CODES.has(code)) {
    return new AuthError(`Authentication failed: ${message}`, { code: code || "unauthorized", statusCode: status });
  }
  if (status === 404 || code === "not_found") {
    return new NotFoundError(`Not found: ${message}`, { statusCode: status });
  }
  if (status === 429 || code === "rate_limit_exceeded") {
    return new RateLimitError(`Rate limit exceeded: ${message}`, { resetAt: parseReset(res.headers.get("ratelimit-reset")) });
  }
  return new ApiError(status, code || "http_error", `Hetzner API error: ${message}`);
}

function parseReset(raw: string | null): Date | null {
  if (!raw) return null;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) return null;
  return new Date(seconds * 1000);
}
