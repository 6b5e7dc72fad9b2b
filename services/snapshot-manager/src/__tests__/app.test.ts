import { describe, expect, it } from "vitest";
import { parseCliArgs, readPackageVersion, runApp } from "../app.js";
import { loadEnv } from "../config/env.js";
import { silentLogger } from "../telemetry/logger.js";
import type { SecretStore } from "../types/interfaces.js";
import { buildFakeHetznerApi, createFakeState, FAKE_BASE_URL, FAKE_TOKEN, injectFetch, type FakeHetznerState } from "./fakeHetznerApi.js";
import { ScriptedTerminal } from "./scriptedTerminal.js";

class MemorySecretStore implements SecretStore {
  readonly label = "test keychain";
  constructor(
    readonly available: boolean,
    private token: string | null = null
  ) {}

  async get(): Promise<string | null> {
    return this.token;
  }

  async set(token: string): Promise<void> {
    this.token = token;
  }
}

function start(options: { answers: Array<string | null>; state?: Partial<FakeHetznerState>; token?: string; store?: SecretStore }) {
  const state = createFakeState(options.state);
  const terminal = new ScriptedTerminal(options.answers);
  const errors: string[] = [];
  const env = loadEnv({ HETZNER_API_TOKEN: options.token ?? FAKE_TOKEN, HETZNER_API_URL: FAKE_BASE_URL });
  const run = runApp({
    env,
    terminal,
    secretStore: options.store ?? new MemorySecretStore(false),
    logger: silentLogger(),
    fetch: injectFetch(buildFakeHetznerApi(state)),
    sleep: async () => {},
    now: () => new Date(2024, 5, 1, 12, 0, 0),
    writeError: (line) => errors.push(line)
  });
  return { state, terminal, errors, run };
}

describe("parseCliArgs", () => {
  it("recognises the supported flags", () => {
    expect(parseCliArgs([])).toEqual({ kind: "run" });
    expect(parseCliArgs(["--version"])).toEqual({ kind: "version" });
    expect(parseCliArgs(["-v"])).toEqual({ kind: "version" });
    expect(parseCliArgs(["-h"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["--token"])).toEqual({ kind: "invalid", arg: "--token" });
  });

  it("reads the package version", () => {
    expect(readPackageVersion()).toBe("0.1.0");
  });
});

describe("runApp", () => {
  it("exits with code 1 before any prompt when no token is configured", async () => {
    const { run, errors, terminal, state } = start({ answers: [], token: "" });

    await expect(run).resolves.toBe(1);
    expect(errors).toEqual(["Error: API token is not set. Please set the HETZNER_API_TOKEN environment variable."]);
    expect(terminal.prompts).toEqual([]);
    expect(state.requests).toEqual([]);
  });

  it("uses a stored token over the environment", async () => {
    const { run, state } = start({
      answers: ["q"],
      token: "env-token",
      store: new MemorySecretStore(true, FAKE_TOKEN)
    });

    await expect(run).resolves.toBe(0);
    expect(state.requests.map((r) => r.authorization)).toEqual([`Bearer ${FAKE_TOKEN}`]);
  });

  it("renders an empty project", async () => {
    const { run, terminal } = start({ answers: ["q"] });

    await expect(run).resolves.toBe(0);
    expect(terminal.lines("warn")).toEqual(["No servers found in this project."]);
  });

  it("creates a snapshot and lists it on the refreshed server screen", async () => {
    const { run, terminal, state } = start({
      answers: ["1", "1", "q"],
      state: {
        servers: [{ id: 1, name: "web-01", status: "running" }],
        actionScript: [
          { status: "running", progress: 0 },
          { status: "running", progress: 40 },
          { status: "success", progress: 100 }
        ]
      }
    });

    await expect(run).resolves.toBe(0);

    expect(state.images.map((image) => image.description)).toEqual(["Snapshot created on 2024-06-01 12:00:00"]);
    expect(state.requests.filter((r) => r.url === "/v1/actions/9001")).toHaveLength(3);
    expect(terminal.lines("info").filter((line) => line.startsWith("Creating snapshot... "))).toEqual([
      "Creating snapshot... 0%",
      "Creating snapshot... 40%",
      "Creating snapshot... 100%"
    ]);
    expect(terminal.lines("success")).toEqual(["Found 1 server(s).", "Snapshot created successfully!", "Found 1 snapshot(s)."]);
    expect(terminal.lines("print")[1]).toMatch(/│ 1 │ 9000 │ Snapshot created on 2024-06-01 12:00:00 │ 2024-06-01 at 12:00:00 │/);
  });

  it("ends the session when the API rejects the token and there is no store", async () => {
    const { run, terminal } = start({ answers: [], token: "wrong-token" });

    await expect(run).resolves.toBe(1);
    expect(terminal.lines("error")).toEqual([
      "Authentication failed: unable to authenticate",
      "A valid API token is required. Set HETZNER_API_TOKEN and start again."
    ]);
  });
});
