import { describe, expect, it } from "vitest";
import { ActionPoller, type PollProgress } from "../actionPoller.js";
import { NetworkError } from "../../api/errors.js";
import { silentLogger } from "../../telemetry/logger.js";
import type { Action, ActionStatus } from "../../types/hetzner.js";

function action(status: ActionStatus, progress: number): Action {
  return {
    id: 7,
    command: "create_image",
    kind: "create_snapshot",
    status,
    progress,
    error: status === "error" ? { code: "image_error", message: "disk busy" } : null,
    startedAt: null,
    finishedAt: null
  };
}

/** getAction double that plays back a script; the last entry repeats. */
class ScriptedActions {
  calls = 0;
  constructor(private readonly script: Array<Action | Error>) {}

  async getAction(actionId: number): Promise<Action> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls += 1;
    if (step instanceof Error) throw step;
    return { ...step, id: actionId };
  }
}

function recordingSleep() {
  const sleeps: number[] = [];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };
  return { sleeps, sleep };
}

describe("ActionPoller", () => {
  it("returns success after exactly three polls with non-decreasing progress", async () => {
    const api = new ScriptedActions([action("running", 10), action("running", 60), action("success", 100)]);
    const { sleeps, sleep } = recordingSleep();
    const poller = new ActionPoller(api, { intervalMs: 5000, maxAttempts: 10, sleep, logger: silentLogger() });
    const reports: PollProgress[] = [];

    const outcome = await poller.waitFor(7, { onProgress: (p) => reports.push(p) });

    expect(outcome.status).toBe("succeeded");
    expect(outcome.polls).toBe(3);
    expect(api.calls).toBe(3);
    expect(sleeps).toEqual([5000, 5000]);
    expect(reports).toEqual([
      { attempt: 1, status: "running", progress: 10 },
      { attempt: 2, status: "running", progress: 60 },
      { attempt: 3, status: "success", progress: 100 }
    ]);
  });

  it("never reports progress going backwards", async () => {
    const api = new ScriptedActions([action("running", 50), action("running", 20), action("running", 70), action("success", 90)]);
    const { sleep } = recordingSleep();
    const poller = new ActionPoller(api, { intervalMs: 1, maxAttempts: 10, sleep, logger: silentLogger() });
    const progress: number[] = [];

    await poller.waitFor(7, { onProgress: (p) => progress.push(p.progress) });

    expect(progress).toEqual([50, 50, 70, 100]);
  });

  it("times out after exactly maxAttempts polls", async () => {
    const api = new ScriptedActions([action("running", 5)]);
    const { sleeps, sleep } = recordingSleep();
    const poller = new ActionPoller(api, { intervalMs: 250, maxAttempts: 4, sleep, logger: silentLogger() });

    const outcome = await poller.waitFor(7);

    expect(outcome).toMatchObject({ status: "timedOut", polls: 4 });
    expect(outcome.action?.status).toBe("running");
    expect(api.calls).toBe(4);
    // No sleep after the final poll.
    expect(sleeps).toEqual([250, 250, 250]);
  });

  it("distinguishes a failed action from a timeout", async () => {
    const api = new ScriptedActions([action("running", 30), action("error", 30)]);
    const { sleep } = recordingSleep();
    const poller = new ActionPoller(api, { intervalMs: 1, maxAttempts: 5, sleep, logger: silentLogger() });

    const outcome = await poller.waitFor(7);

    expect(outcome.status).toBe("failed");
    expect(outcome.polls).toBe(2);
    expect(outcome.action?.error).toEqual({ code: "image_error", message: "disk busy" });
  });

  it("stops waiting when the signal fires during a sleep", async () => {
    const api = new ScriptedActions([action("running", 10)]);
    const controller = new AbortController();
    const poller = new ActionPoller(api, {
      intervalMs: 60_000,
      maxAttempts: 10,
      logger: silentLogger()
    });

    const outcome = await poller.waitFor(7, {
      signal: controller.signal,
      onProgress: () => controller.abort()
    });

    expect(outcome).toMatchObject({ status: "cancelled", polls: 1 });
    expect(outcome.action?.progress).toBe(10);
    expect(api.calls).toBe(1);
  });

  it("does not poll at all when already cancelled", async () => {
    const api = new ScriptedActions([action("running", 10)]);
    const controller = new AbortController();
    controller.abort();
    const poller = new ActionPoller(api, { intervalMs: 1, maxAttempts: 3, logger: silentLogger() });

    const outcome = await poller.waitFor(7, { signal: controller.signal });

    expect(outcome).toEqual({ status: "cancelled", action: null, polls: 0 });
    expect(api.calls).toBe(0);
  });

  it("propagates request failures", async () => {
    const api = new ScriptedActions([action("running", 10), new NetworkError("connection reset")]);
    const { sleep } = recordingSleep();
    const poller = new ActionPoller(api, { intervalMs: 1, maxAttempts: 5, sleep, logger: silentLogger() });

    await expect(poller.waitFor(7)).rejects.toBeInstanceOf(NetworkError);
    expect(api.calls).toBe(2);
  });

  it("rejects an empty attempt budget", () => {
    expect(() => new ActionPoller(new ScriptedActions([]), { intervalMs: 1, maxAttempts: 0, logger: silentLogger() })).toThrow(
      "maxAttempts must be a positive integer"
    );
  });
});
