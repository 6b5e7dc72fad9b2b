export interface Server {
  id: number;
  name: string;
  status: string;
}

export type ServerRef = Pick<Server, "id" | "name">;

export interface Snapshot {
  id: number;
  description: string;
  createdAt: string;
  status: string;
  boundTo: number | null;
  createdFrom: { id: number; name: string } | null;
  /** Server this snapshot is associated with: `boundTo`, else `createdFrom.id`. */
  serverId: number | null;
  sizeGb: number | null;
}

export type ActionStatus = "running" | "success" | "error";

export type ActionKind = "create_snapshot" | "delete_snapshot" | "other";

export interface Action {
  id: number;
  command: string;
  kind: ActionKind;
  status: ActionStatus;
  progress: number;
  error: { code: string; message: string } | null;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface CreatedSnapshot {
  action: Action;
  snapshot: Snapshot | null;
}
