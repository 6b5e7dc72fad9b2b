import { z } from "zod";
import type { Action, ActionKind, Server, Snapshot } from "../types/hetzner.js";

const id = z.number().int().positive();

export const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string()
  })
});

const paginationSchema = z
  .object({
    pagination: z
      .object({
        page: z.number().int(),
        next_page: z.number().int().nullable().optional(),
        last_page: z.number().int().nullable().optional()
      })
      .optional()
  })
  .optional();

export const serverSchema = z.object({
  id,
  name: z.string(),
  status: z.string()
});

export const imageSchema = z.object({
  id,
  type: z.string(),
  status: z.string(),
  description: z.string().nullable().optional(),
  created: z.string(),
  bound_to: id.nullable().optional(),
  created_from: z.object({ id, name: z.string() }).nullable().optional(),
  image_size: z.number().nullable().optional()
});

export const actionSchema = z.object({
  id,
  command: z.string(),
  status: z.enum(["running", "success", "error"]),
  progress: z.number(),
  started: z.string().nullable().optional(),
  finished: z.string().nullable().optional(),
  error: z.object({ code: z.string(), message: z.string() }).nullable().optional()
});

export const serverListSchema = z.object({ servers: z.array(serverSchema), meta: paginationSchema });
export const serverResponseSchema = z.object({ server: serverSchema });
export const imageListSchema = z.object({ images: z.array(imageSchema), meta: paginationSchema });
export const actionResponseSchema = z.object({ action: actionSchema });
export const createImageResponseSchema = z.object({ action: actionSchema, image: imageSchema.nullable().optional() });

export type PaginationMeta = z.infer<typeof paginationSchema>;
type ApiServer = z.infer<typeof serverSchema>;
type ApiImage = z.infer<typeof imageSchema>;
type ApiAction = z.infer<typeof actionSchema>;

export function toServer(raw: ApiServer): Server {
  return { id: raw.id, name: raw.name, status: raw.status };
}

export function toSnapshot(raw: ApiImage): Snapshot {
  const boundTo = raw.bound_to ?? null;
  const createdFrom = raw.created_from ?? null;
  return {
    id: raw.id,
    description: raw.description ?? "",
    createdAt: raw.created,
    status: raw.status,
    boundTo,
    createdFrom,
    serverId: boundTo ?? createdFrom?.id ?? null,
    sizeGb: raw.image_size ?? null
  };
}

const ACTION_KINDS: Record<string, ActionKind> = {
  create_image: "create_snapshot",
  delete_image: "delete_snapshot"
};

export function toAction(raw: ApiAction): Action {
  return {
    id: raw.id,
    command: raw.command,
    kind: ACTION_KINDS[raw.command] ?? "other",
    status: raw.status,
    progress: raw.progress,
    error: raw.error ?? null,
    startedAt: raw.started ?? null,
    finishedAt: raw.finished ?? null
  };
}

/** Next page to fetch, or null when the listing is complete. */
export function nextPage(meta: PaginationMeta, current: number): number | null {
  const pagination = meta?.pagination;
  if (!pagination) return null;
  if (typeof pagination.next_page === "number") {
    return pagination.next_page > current ? pagination.next_page : null;
  }
  if (typeof pagination.last_page === "number" && current < pagination.last_page) {
    return current + 1;
  }
  return null;
}
