import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { toOutlineDocument } from "../src/outline.js";
import { FileSyncStateStore } from "../src/store.js";
import type { SyncState } from "../src/sync-state.js";
import { buildOutline } from "./support.js";

function tempFile(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), "course-sync-")), "state", "sync-state.json");
}

const state: SyncState = {
  courseId: "C1",
  outline: toOutlineDocument(buildOutline([["T1", "Algebra", [["S1", "Linear Eq."]]]])),
  contentHash: "abc",
  syncedAt: "2026-03-01T10:00:00.000Z",
  pending: [
    {
      change: { operation: "UPDATE", entityType: "TOPIC", entityId: "T1", data: { kind: "topic", name: "Algebra" } },
      attempts: 1,
      reason: "not-found",
    },
  ],
};

describe("FileSyncStateStore", () => {
  test("returns null for a course never synced", async () => {
    expect(await new FileSyncStateStore(tempFile()).get("C1")).toBeNull();
  });

  test("round-trips state per course", async () => {
    const file = tempFile();
    const store = new FileSyncStateStore(file);

    await store.save(state);
    await store.save({ ...state, courseId: "C2", pending: [] });

    expect(await new FileSyncStateStore(file).get("C1")).toEqual(state);
    expect((await store.get("C2"))?.pending).toEqual([]);
  });

  test("older files without a pending list read as empty", async () => {
    const file = tempFile();
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const { pending: _pending, ...legacy } = state;
    fs.writeFileSync(file, JSON.stringify({ C1: legacy }));

    expect((await new FileSyncStateStore(file).get("C1"))?.pending).toEqual([]);
  });
});
