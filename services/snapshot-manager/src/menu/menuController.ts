import { AuthError, errorMessage, NotFoundError, RateLimitError, HetznerError } from "../api/errors.js";
import { ActionPoller, type PollOutcome } from "../poller/actionPoller.js";
import type { Logger } from "../telemetry/logger.js";
import type { Server, Snapshot } from "../types/hetzner.js";
import type { SecretStore, SnapshotApi, Terminal } from "../types/interfaces.js";
import {
  mainMenuOptions,
  SERVER_MENU_OPTIONS,
  serverTable,
  snapshotDescription,
  snapshotOptions,
  snapshotTable
} from "./render.js";
import { MenuStateMachine, type MenuEvent, type MenuState } from "./stateMachine.js";

export interface MenuControllerOptions {
  api: SnapshotApi;
  /** Builds a client for a freshly entered token. */
  createApi: (token: string) => SnapshotApi;
  secretStore: SecretStore;
  terminal: Terminal;
  logger: Logger;
  poll: {
    intervalMs: number;
    maxAttempts: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  };
  now?: () => Date;
}

const REFRESH: MenuEvent = { type: "refresh" };
const BACK: MenuEvent = { type: "back" };
const QUIT: MenuEvent = { type: "quit" };

type StoreResult = "stored" | "skipped" | "cancelled";

export class MenuController {
  private api: SnapshotApi;
  private poller: ActionPoller;
  private exitCode = 0;
  private readonly terminal: Terminal;
  private readonly secretStore: SecretStore;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: MenuControllerOptions) {
    this.api = options.api;
    this.terminal = options.terminal;
    this.secretStore = options.secretStore;
    this.log = options.logger.child({ component: "menu" });
    this.now = options.now ?? (() => new Date());
    this.poller = this.buildPoller(this.api);
  }

  /** Runs the menu until the user quits. Resolves to the process exit code. */
  async run(): Promise<number> {
    let state: MenuState = MenuStateMachine.initial;
    while (!MenuStateMachine.isTerminal(state)) {
      const event = state.screen === "main" ? await this.mainMenu() : await this.serverMenu(state.server);
      this.log.debug({ from: state.screen, event: event.type }, "menu transition");
      state = MenuStateMachine.transition(state, event);
    }
    return this.exitCode;
  }

  private async mainMenu(): Promise<MenuEvent> {
    this.terminal.heading("Hetzner Cloud snapshots");
    this.terminal.info("Fetching available servers...");
    let servers: Server[] = [];
    try {
      servers = await this.api.listServers();
      if (servers.length === 0) {
        this.terminal.warn("No servers found in this project.");
      } else {
        this.terminal.success(`Found ${servers.length} server(s).`);
        this.terminal.print(serverTable(servers));
      }
    } catch (err) {
      const event = await this.handleError(err, "main");
      if (event) return event;
    }

    const choice = await this.terminal.choose(
      "Enter the number of the server you want to manage",
      mainMenuOptions(servers, this.secretStore.label)
    );
    if (choice === null || choice === "q") return this.quit();
    if (choice === "r") return REFRESH;
    if (choice === "0") {
      return (await this.storeToken()) === "cancelled" ? this.quit() : REFRESH;
    }
    const server = servers[Number(choice) - 1];
    if (!server) {
      this.terminal.error("Invalid choice. Please try again.");
      return REFRESH;
    }
    return { type: "select-server", server };
  }

  private async serverMenu(server: Server): Promise<MenuEvent> {
    this.terminal.heading(`Snapshots for server: ${server.name} (ID: ${server.id})`);
    let snapshots: Snapshot[] = [];
    try {
      // Re-read the server so a selection that went stale is caught here.
      const current = await this.api.getServer(server.id);
      snapshots = await this.api.listSnapshots(current);
      if (snapshots.length === 0) {
        this.terminal.warn("No snapshots found for this server.");
        this.terminal.info("You can create a new snapshot using option 1 in the menu below.");
      } else {
        this.terminal.success(`Found ${snapshots.length} snapshot(s).`);
        this.terminal.print(snapshotTable(snapshots));
      }
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.terminal.error(`Server ${server.name} (ID: ${server.id}) no longer exists.`);
        return BACK;
      }
      const event = await this.handleError(err, "server");
      if (event) return event;
    }

    const choice = await this.terminal.choose("What would you like to do?", SERVER_MENU_OPTIONS);
    switch (choice) {
      case null:
      case "q":
        return this.quit();
      case "3":
        return BACK;
      case "1":
      case "2": {
        const event = await this.guard(choice === "1" ? () => this.createSnapshot(server) : () => this.deleteSnapshot(snapshots));
        if (event) return event;
        return (await this.terminal.pause("Press Enter to continue")) ? REFRESH : this.quit();
      }
      default:
        this.terminal.error("Invalid choice. Please try again.");
        return REFRESH;
    }
  }

  private async createSnapshot(server: Server): Promise<MenuEvent | null> {
    this.terminal.info(`Creating snapshot for server: ${server.name}`);
    const { action } = await this.api.createSnapshot(server.id, snapshotDescription(this.now()));
    this.terminal.info("Waiting for snapshot to complete...");

    const controller = new AbortController();
    const unsubscribe = this.terminal.onInterrupt(() => controller.abort());
    let shown = -1;
    let outcome: PollOutcome;
    try {
      outcome = await this.poller.waitFor(action.id, {
        signal: controller.signal,
        onProgress: ({ progress }) => {
          const percent = Math.floor(progress);
          if (percent !== shown) {
            shown = percent;
            this.terminal.info(`Creating snapshot... ${percent}%`);
          }
        }
      });
    } finally {
      unsubscribe();
    }

    switch (outcome.status) {
      case "succeeded":
        this.terminal.success("Snapshot created successfully!");
        break;
      case "failed": {
        const detail = outcome.action.error;
        this.terminal.error(detail ? `Snapshot creation failed: ${detail.code}: ${detail.message}` : "Snapshot creation failed.");
        break;
      }
      case "timedOut":
        this.terminal.warn(
          `Snapshot creation did not finish after ${outcome.polls} status checks. It may still complete in Hetzner Cloud.`
        );
        break;
      case "cancelled":
        this.terminal.warn("Stopped waiting for the snapshot. The action keeps running in Hetzner Cloud.");
        break;
    }
    return null;
  }

  /** Resolves to QUIT when a prompt was cancelled. */
  private async deleteSnapshot(snapshots: Snapshot[]): Promise<MenuEvent | null> {
    if (snapshots.length === 0) {
      this.terminal.warn("No snapshots available to delete.");
      return null;
    }
    const choice = await this.terminal.choose("Enter the number of the snapshot you want to delete", snapshotOptions(snapshots));
    if (choice === null) return this.quit();
    const snapshot = snapshots[Number(choice) - 1];
    if (!snapshot) {
      this.terminal.error("Invalid choice. Please try again.");
      return null;
    }
    const confirmed = await this.terminal.confirm(`Are you sure you want to delete snapshot ${snapshot.id}?`);
    if (confirmed === null) return this.quit();
    if (!confirmed) {
      this.terminal.info("Deletion cancelled.");
      return null;
    }
    this.terminal.info(`Deleting snapshot with ID: ${snapshot.id}`);
    await this.api.deleteSnapshot(snapshot.id);
    this.terminal.success("Snapshot deleted successfully.");
    return null;
  }

  private async storeToken(): Promise<StoreResult> {
    const store = this.secretStore;
    if (!store.available) {
      this.terminal.error("This feature is only available on macOS.");
      return "skipped";
    }
    const entered = await this.terminal.secret("Enter your Hetzner API token");
    if (entered === null) return "cancelled";
    const token = entered.trim();
    if (!token) {
      this.terminal.warn("No token entered; nothing stored.");
      return "skipped";
    }
    this.replaceApi(token);
    try {
      await store.set(token);
      this.terminal.success(`API token stored in ${store.label}.`);
    } catch (err) {
      this.log.warn({ err }, "failed to store API token");
      this.terminal.error(`Failed to store API token in ${store.label}: ${errorMessage(err)}. Using it for this session only.`);
    }
    return "stored";
  }

  private async guard(fn: () => Promise<MenuEvent | null>): Promise<MenuEvent | null> {
    try {
      return await fn();
    } catch (err) {
      return this.handleError(err, "server");
    }
  }

  /**
   * Renders an error caught at the menu boundary. Resolves to the event to
   * apply instead of continuing, or null to carry on with the current screen.
   */
  private async handleError(err: unknown, screen: "main" | "server"): Promise<MenuEvent | null> {
    if (err instanceof AuthError) {
      this.terminal.error(err.message);
      if (this.secretStore.available) {
        const result = await this.storeToken();
        if (result === "cancelled") return this.quit();
        if (result === "stored") return screen === "server" ? BACK : REFRESH;
      }
      this.terminal.error("A valid API token is required. Set HETZNER_API_TOKEN and start again.");
      this.exitCode = 1;
      return QUIT;
    }
    if (err instanceof RateLimitError) {
      const reset = err.resetAt ? ` (limit resets at ${err.resetAt.toISOString()})` : "";
      this.terminal.warn(`${err.message}${reset}`);
      this.terminal.info("Try the same menu action again shortly.");
      return null;
    }
    if (err instanceof HetznerError) {
      this.terminal.error(err.message);
      return null;
    }
    this.log.error({ err }, "unexpected error in menu");
    this.terminal.error(`Unexpected error: ${errorMessage(err)}`);
    return null;
  }

  private quit(): MenuEvent {
    this.terminal.info("Exiting.");
    return QUIT;
  }

  private replaceApi(token: string): void {
    this.api = this.options.createApi(token);
    this.poller = this.buildPoller(this.api);
  }

  private buildPoller(api: SnapshotApi): ActionPoller {
    return new ActionPoller(api, {
      intervalMs: this.options.poll.intervalMs,
      maxAttempts: this.options.poll.maxAttempts,
      sleep: this.options.poll.sleep,
      logger: this.options.logger
    });
  }
}
