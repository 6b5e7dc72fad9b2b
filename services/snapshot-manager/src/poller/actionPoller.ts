import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../telemetry/logger.js";
import type { Action, ActionStatus } from "../types/hetzner.js";
import type { SnapshotApi } from "../types/interfaces.js";

export interface ActionPollerOptions {
  intervalMs: number;
  maxAttempts: number;
  logger: Logger;
  /** Abortable sleep; rejects when the signal fires. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PollProgress {
  attempt: number;
  status: ActionStatus;
  progress: number;
}

export type PollOutcome =
  | { status: "succeeded"; action: Action; polls: number }
  | { status: "failed"; action: Action; polls: number }
  | { status: "timedOut"; action: Action; polls: number }
  | { status: "cancelled"; action: Action | null; polls: number };

export class ActionPoller {
  private readonly intervalMs: number;
  private readonly maxAttempts: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(
    private readonly api: Pick<SnapshotApi, "getAction">,
    options: ActionPollerOptions
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts <= 0) {
      throw new RangeError("maxAttempts must be a positive integer");
    }
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new RangeError("intervalMs must be a non-negative number");
    }
    this.intervalMs = options.intervalMs;
    this.maxAttempts = options.maxAttempts;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.log = options.logger.child({ component: "poller" });
  }

  async waitFor(
    actionId: number,
    opts?: { onProgress?: (progress: PollProgress) => void; signal?: AbortSignal }
  ): Promise<PollOutcome> {
    const signal = opts?.signal;
    let last: Action | null = null;
    let progress = 0;

    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) {
        return this.cancelled(actionId, last, attempt - 1);
      }

      const action = await this.api.getAction(actionId);
      last = action;
      // Progress only moves forward, even if the provider reports a lower value.
      progress = action.status === "success" ? 100 : Math.max(progress, clampPercent(action.progress));
      opts?.onProgress?.({ attempt, status: action.status, progress });
      this.log.debug({ actionId, attempt, status: action.status, progress }, "action polled");

      if (action.status === "success") {
        return { status: "succeeded", action, polls: attempt };
      }
      if (action.status === "error") {
        return { status: "failed", action, polls: attempt };
      }
      if (attempt === this.maxAttempts) {
        this.log.warn({ actionId, attempts: attempt }, "action did not finish within the polling budget");
        return { status: "timedOut", action, polls: attempt };
      }

      try {
        await this.sleep(this.intervalMs, signal);
      } catch (err) {
        if (signal?.aborted) {
          return this.cancelled(actionId, last, attempt);
        }
        throw err;
      }
    }
  }

  private cancelled(actionId: number, action: Action | null, polls: number): PollOutcome {
    this.log.info({ actionId, polls }, "stopped waiting for action");
    return { status: "cancelled", action, polls };
  }
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}
