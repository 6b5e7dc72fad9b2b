import Table from "cli-table3";
import type { Server, Snapshot } from "../types/hetzner.js";
import type { MenuOption } from "../types/interfaces.js";

const PLAIN_STYLE = { "padding-left": 1, "padding-right": 1, head: [], border: [], compact: false };

export function serverTable(servers: Server[]): string {
  const table = new Table({ head: ["#", "Name", "Status", "ID"], style: PLAIN_STYLE });
  servers.forEach((server, i) => {
    table.push([String(i + 1), server.name, server.status, String(server.id)]);
  });
  return table.toString();
}

export function snapshotTable(snapshots: Snapshot[]): string {
  const table = new Table({
    head: ["#", "ID", "Description", "Created", "Bound to", "Size (GB)"],
    style: PLAIN_STYLE
  });
  snapshots.forEach((snapshot, i) => {
    table.push([
      String(i + 1),
      String(snapshot.id),
      snapshot.description || "N/A",
      formatCreated(snapshot.createdAt),
      snapshot.boundTo === null ? "Not bound" : String(snapshot.boundTo),
      snapshot.sizeGb === null ? "N/A" : snapshot.sizeGb.toFixed(2)
    ]);
  });
  return table.toString();
}

/** `2023-01-02T03:04:05+00:00` becomes `2023-01-02 at 03:04:05`. */
export function formatCreated(iso: string): string {
  const [date, rest] = iso.split("T");
  if (!rest) return iso;
  const time = rest.replace(/(?:Z|[+-]\d{2}:?\d{2})$/, "").replace(/\.\d+$/, "");
  return `${date} at ${time}`;
}

export function snapshotDescription(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `Snapshot created on ${date} ${time}`;
}

export function mainMenuOptions(servers: Server[], storeLabel: string): MenuOption[] {
  return [
    ...servers.map((server, i) => ({ value: String(i + 1), label: server.name })),
    { value: "0", label: `Store API token in ${storeLabel}` },
    { value: "r", label: "Refresh" },
    { value: "q", label: "Quit" }
  ];
}

export const SERVER_MENU_OPTIONS: MenuOption[] = [
  { value: "1", label: "Create a new snapshot" },
  { value: "2", label: "Delete a snapshot" },
  { value: "3", label: "Return to main menu" },
  { value: "q", label: "Quit" }
];

export function snapshotOptions(snapshots: Snapshot[]): MenuOption[] {
  return snapshots.map((snapshot, i) => ({
    value: String(i + 1),
    label: `${snapshot.id} ${snapshot.description || ""}`.trim()
  }));
}
