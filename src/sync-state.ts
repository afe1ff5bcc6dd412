import { z } from "zod";
import { outlineDocumentSchema, type OutlineDocument } from "./outline.js";
import type { ChangeOperation } from "./types.js";

const changeDataSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("course"), name: z.string(), courseOutline: z.string() }),
  z.object({ kind: z.literal("topic"), name: z.string() }),
  z.object({ kind: z.literal("subtopic"), name: z.string(), topicId: z.string() }),
]);

export const changeOperationSchema = z.object({
  operation: z.enum(["CREATE", "UPDATE", "DELETE"]),
  entityType: z.enum(["COURSE", "TOPIC", "SUBTOPIC"]),
  entityId: z.string(),
  data: changeDataSchema,
}) satisfies z.ZodType<ChangeOperation>;

export const pendingChangeSchema = z.object({
  change: changeOperationSchema,
  attempts: z.number().int().nonnegative(),
  reason: z.string(),
});

export const syncStateSchema = z.object({
  courseId: z.string(),
  outline: outlineDocumentSchema,
  contentHash: z.string(),
  syncedAt: z.string(),
  pending: z.array(pendingChangeSchema).default([]),
});

export type PendingChange = z.infer<typeof pendingChangeSchema>;

export interface SyncState {
  courseId: string;
  outline: OutlineDocument;
  contentHash: string;
  syncedAt: string; // ISO
  /** Failed operations carried over for replay on the next cycle. */
  pending: PendingChange[];
}

/** Durable record of the last successful sync per course. */
export interface SyncStateStore {
  get(courseId: string): Promise<SyncState | null>;
  save(state: SyncState): Promise<void>;
}

export function parseSyncState(raw: unknown): SyncState {
  return syncStateSchema.parse(raw);
}
