import type { ServerRef, Snapshot } from "../types/hetzner.js";

export type SnapshotMatch = "bound" | "created-from" | "description";

/**
 * Decides whether a snapshot belongs to a server.
 *
 * Hetzner only links a snapshot to its server through `bound_to` (while the
 * server exists) and `created_from`. Snapshots taken by older tooling carry the
 * server in their description instead, so the description is checked last for
 * the server id or (case-insensitive) name.
 */
export function matchSnapshot(snapshot: Snapshot, server: ServerRef): SnapshotMatch | null {
  if (snapshot.boundTo === server.id) return "bound";
  if (snapshot.createdFrom?.id === server.id) return "created-from";
  const description = snapshot.description.toLowerCase();
  const name = server.name.toLowerCase();
  if (description.includes(String(server.id)) || (name.length > 0 && description.includes(name))) {
    return "description";
  }
  return null;
}

export function newestFirst(a: Snapshot, b: Snapshot): number {
  if (a.createdAt === b.createdAt) return b.id - a.id;
  return a.createdAt < b.createdAt ? 1 : -1;
}

export function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}
