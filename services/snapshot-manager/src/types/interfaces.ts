import type { Action, CreatedSnapshot, Server, ServerRef, Snapshot } from "./hetzner.js";

export interface SnapshotApi {
  listServers(): Promise<Server[]>;
  getServer(serverId: number): Promise<Server>;
  listSnapshots(server: ServerRef): Promise<Snapshot[]>;
  createSnapshot(serverId: number, description: string): Promise<CreatedSnapshot>;
  deleteSnapshot(snapshotId: number): Promise<void>;
  getAction(actionId: number): Promise<Action>;
}

export interface SecretStore {
  /** False on platforms without a supported secret store; get/set are then no-ops that fail. */
  readonly available: boolean;
  readonly label: string;
  get(): Promise<string | null>;
  set(token: string): Promise<void>;
}

export interface MenuOption {
  value: string;
  label: string;
}

export interface Terminal {
  heading(title: string): void;
  print(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Resolves to the chosen option value, or null when the prompt was cancelled. */
  choose(message: string, options: MenuOption[]): Promise<string | null>;
  secret(message: string): Promise<string | null>;
  /** Null when the prompt was cancelled. */
  confirm(message: string): Promise<boolean | null>;
  /** Resolves to false when the prompt was cancelled. */
  pause(message: string): Promise<boolean>;
  /** Subscribes to a user interrupt (Ctrl+C) and returns the unsubscribe function. */
  onInterrupt(handler: () => void): () => void;
}
