import { describe, expect, test, vi } from "vitest";
import { ShapeMismatchError, TransientStoreError } from "../src/errors.js";
import { InMemoryCourseRepository } from "../src/memory-repository.js";
import { toOutlineDocument } from "../src/outline.js";
import type { FailedChange } from "../src/processor.js";
import type { PendingChange, SyncState, SyncStateStore } from "../src/sync-state.js";
import {
  carryForward,
  defaultSyncOptions,
  mergeReplays,
  runSyncOnce,
  syncCourse,
  type SyncDependencies,
} from "../src/sync.js";
import type { ChangeOperation, SyncTarget } from "../src/types.js";
import { buildOutline, buildPayload, summarize } from "./support.js";

class MemoryStateStore implements SyncStateStore {
  readonly states = new Map<string, SyncState>();

  async get(courseId: string): Promise<SyncState | null> {
    return this.states.get(courseId) ?? null;
  }

  async save(state: SyncState): Promise<void> {
    this.states.set(state.courseId, state);
  }
}

const target: SyncTarget = {
  courseId: "C1",
  courseKey: "course-v1:Example+MATH101+2026",
  name: "Mathematics",
  examinationLevel: "JCE",
  academicClass: "Form 1",
};

function setup(payloads: unknown[]) {
  const repository = new InMemoryCourseRepository();
  const states = new MemoryStateStore();
  const fetchPayload = vi.fn(async () => payloads.shift());
  const notifyFailures = vi.fn(async (_target: SyncTarget, _failed: FailedChange[]) => {});
  const deps: SyncDependencies = { repository, states, fetchPayload, notifyFailures };
  return { repository, states, deps, notifyFailures };
}

const renameTopic = (id: string, name: string): ChangeOperation => ({
  operation: "UPDATE",
  entityType: "TOPIC",
  entityId: id,
  data: { kind: "topic", name },
});

const createTopic = (id: string, name: string): ChangeOperation => ({
  operation: "CREATE",
  entityType: "TOPIC",
  entityId: id,
  data: { kind: "topic", name },
});

/** Stored state for C1 with operations waiting to be replayed. */
function stateWithPending(topics: Parameters<typeof buildOutline>[0], pending: ChangeOperation[]): SyncState {
  return {
    courseId: "C1",
    outline: toOutlineDocument(buildOutline(topics)),
    contentHash: "stale",
    syncedAt: "2026-01-01T00:00:00.000Z",
    pending: pending.map((change) => ({ change, attempts: 1, reason: "not-found" })),
  };
}

describe("syncCourse", () => {
  test("first sync creates the course tree and records state", async () => {
    const { repository, states, deps } = setup([buildPayload([["T1", "Algebra", [["S1", "Linear Eq."]]]])]);

    const result = await syncCourse(target, deps);

    expect(result).toEqual({ courseId: "C1", status: "synced", changeCount: 2, failed: [] });
    expect(await repository.getCourse("C1")).toEqual({ id: "C1", name: "Mathematics", courseOutline: "" });
    expect(await repository.getSubTopic("S1")).toEqual({ id: "S1", name: "Linear Eq.", topicId: "T1" });
    expect(states.states.get("C1")?.pending).toEqual([]);
    expect(states.states.get("C1")?.outline).toEqual(
      toOutlineDocument(buildOutline([["T1", "Algebra", [["S1", "Linear Eq."]]]]))
    );
  });

  test("an identical payload is reported unchanged", async () => {
    const payload = buildPayload([["T1", "Algebra"]]);
    const { deps } = setup([payload, payload]);

    await syncCourse(target, deps);
    expect(await syncCourse(target, deps)).toEqual({ courseId: "C1", status: "unchanged", changeCount: 0, failed: [] });
  });

  test("a changed payload applies only the difference", async () => {
    const { repository, deps } = setup([buildPayload([["T1", "Algebra"]]), buildPayload([["T1", "Algebra II"]])]);

    await syncCourse(target, deps);
    const result = await syncCourse(target, deps);

    expect(result.status).toBe("synced");
    expect(result.changeCount).toBe(1);
    expect((await repository.getTopic("T1")).name).toBe("Algebra II");
  });

  test("failed operations are alerted, carried forward and dropped after the last attempt", async () => {
    const second = buildPayload([["T1", "Algebra II"]]);
    const { repository, states, deps, notifyFailures } = setup([buildPayload([["T1", "Algebra"]]), second, second]);
    const options = { ...defaultSyncOptions, maxReplayAttempts: 2 };

    await syncCourse(target, deps, options);
    await repository.deleteTopic("T1");

    const partial = await syncCourse(target, deps, options);
    expect(partial.status).toBe("partial");
    expect(partial.failed.map((f) => f.reason)).toEqual(["not-found"]);
    expect(notifyFailures).toHaveBeenCalledWith(target, partial.failed);
    expect(states.states.get("C1")?.pending).toEqual([
      { change: renameTopic("T1", "Algebra II"), attempts: 1, reason: "not-found" },
    ]);

    // Same content but a pending replay, so the cycle still runs
    const replay = await syncCourse(target, deps, options);
    expect(replay.status).toBe("partial");
    expect(replay.changeCount).toBe(1);
    expect(states.states.get("C1")?.pending).toEqual([]);
  });

  test("strict mode keeps the previous state when it rolls back", async () => {
    const { repository, states, deps } = setup([
      buildPayload([["T1", "Algebra"]]),
      buildPayload([["T1", "Algebra II"], ["T2", "Geometry"]]),
    ]);
    const options = { ...defaultSyncOptions, mode: "strict" as const };

    await syncCourse(target, deps, options);
    const before = states.states.get("C1");
    await repository.deleteTopic("T1");

    const result = await syncCourse(target, deps, options);

    expect(result.status).toBe("rolled_back");
    expect(result.failed.map((f) => f.reason)).toEqual(["rolled-back", "not-found"]);
    expect(states.states.get("C1")).toBe(before);
    expect(await repository.listTopics("C1")).toEqual([]);
  });

  test("a mismatched replay payload is a hard failure", async () => {
    const payload = buildPayload([["T1", "Algebra"]]);
    const { states, deps } = setup([payload]);
    const bad: PendingChange = {
      change: { operation: "UPDATE", entityType: "COURSE", entityId: "C1", data: { kind: "topic", name: "Algebra" } },
      attempts: 1,
      reason: "not-found",
    };
    await states.save({
      courseId: "C1",
      outline: toOutlineDocument(buildOutline([["T1", "Algebra"]])),
      contentHash: "stale",
      syncedAt: "2026-01-01T00:00:00.000Z",
      pending: [bad],
    });

    await expect(syncCourse(target, deps)).rejects.toBeInstanceOf(ShapeMismatchError);
  });

  test("a replayed topic create runs before a new subtopic under it", async () => {
    const { repository, states, deps } = setup([buildPayload([["T1", "Algebra", [["S1", "Linear Eq."]]]])]);
    await states.save(stateWithPending([["T1", "Algebra"]], [createTopic("T1", "Algebra")]));

    const result = await syncCourse(target, deps);

    expect(result).toEqual({ courseId: "C1", status: "synced", changeCount: 2, failed: [] });
    expect(await repository.getSubTopic("S1")).toEqual({ id: "S1", name: "Linear Eq.", topicId: "T1" });
    expect(states.states.get("C1")?.pending).toEqual([]);
  });

  test("a pending create picks up a later rename of the same topic", async () => {
    const { repository, states, deps } = setup([buildPayload([["T1", "Algebra II"]])]);
    await states.save(stateWithPending([["T1", "Algebra"]], [createTopic("T1", "Algebra")]));

    const result = await syncCourse(target, deps);

    expect(result).toEqual({ courseId: "C1", status: "synced", changeCount: 1, failed: [] });
    expect((await repository.getTopic("T1")).name).toBe("Algebra II");
    expect(states.states.get("C1")?.pending).toEqual([]);
  });

  test("brief contention on the course row is retried", async () => {
    const { repository, deps } = setup([buildPayload([["T1", "Algebra"]])]);
    const getOrCreate = vi
      .spyOn(repository, "getOrCreateCourse")
      .mockRejectedValueOnce(new TransientStoreError("database is locked"));

    const result = await syncCourse(target, deps, { ...defaultSyncOptions, retry: { attempts: 2, baseDelayMs: 0 } });

    expect(result.status).toBe("synced");
    expect(getOrCreate).toHaveBeenCalledTimes(2);
    expect((await repository.getTopic("T1")).name).toBe("Algebra");
  });

  test("without state it can diff against rows already in the store", async () => {
    const { repository, deps } = setup([buildPayload([["T1", "Algebra"], ["T2", "Geometry"]])]);
    await repository.getOrCreateCourse("C1", { name: "Mathematics", courseOutline: "" });
    await repository.getOrCreateTopic("T1", {
      name: "Algebra",
      courseId: "C1",
      examinationLevel: "JCE",
      academicClass: "Form 1",
    });

    const result = await syncCourse(target, deps, { ...defaultSyncOptions, baselineFromStore: true });

    expect(result.changeCount).toBe(1);
    expect((await repository.listTopics("C1")).map((t) => t.id)).toEqual(["T1", "T2"]);
  });
});

describe("runSyncOnce", () => {
  test("one failing course does not stop the others", async () => {
    const repository = new InMemoryCourseRepository();
    const deps: SyncDependencies = {
      repository,
      states: new MemoryStateStore(),
      fetchPayload: async (t) => {
        if (t.courseId === "C2") throw new Error("502 Bad Gateway");
        return buildPayload([["T1", "Algebra"]]);
      },
    };

    const results = await runSyncOnce([target, { ...target, courseId: "C2", courseKey: "other" }], deps);

    expect(results.map((r) => [r.courseId, r.status])).toEqual([
      ["C1", "synced"],
      ["C2", "error"],
    ]);
    expect(results[1]?.error).toBe("502 Bad Gateway");
  });

  test("courses synced in parallel on one store keep each other's rows", async () => {
    const repository = new InMemoryCourseRepository();
    const payloads: Record<string, unknown> = {
      C1: buildPayload([["T1", "Algebra", [["S1", "Linear Eq."]]]]),
      C2: buildPayload([["T2", "Mechanics", [["S2", "Forces"]]]], "Physics"),
    };
    const deps: SyncDependencies = {
      repository,
      states: new MemoryStateStore(),
      fetchPayload: async (t) => payloads[t.courseId],
    };
    const targets = [target, { ...target, courseId: "C2", courseKey: "course-v1:Example+PHY101+2026", name: "Physics" }];

    const first = await runSyncOnce(targets, deps);
    expect(first.map((r) => r.status)).toEqual(["synced", "synced"]);

    const rows = () => ({
      courses: repository.dump().courses.map((c) => c.id).sort(),
      topics: repository.dump().topics.map((t) => `${t.courseId}/${t.id}`).sort(),
      subTopics: repository.dump().subTopics.map((st) => `${st.topicId}/${st.id}`).sort(),
    });
    expect(rows()).toEqual({ courses: ["C1", "C2"], topics: ["C1/T1", "C2/T2"], subTopics: ["T1/S1", "T2/S2"] });

    const second = await runSyncOnce(targets, deps);
    expect(second.map((r) => r.status)).toEqual(["unchanged", "unchanged"]);
    expect(rows()).toEqual({ courses: ["C1", "C2"], topics: ["C1/T1", "C2/T2"], subTopics: ["T1/S1", "T2/S2"] });
  });

  test("a course already syncing is skipped by an overlapping run", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const deps: SyncDependencies = {
      repository: new InMemoryCourseRepository(),
      states: new MemoryStateStore(),
      fetchPayload: async () => {
        await gate;
        return buildPayload([["T1", "Algebra"]]);
      },
    };

    const first = runSyncOnce([target], deps);
    const overlapping = await runSyncOnce([target], deps);
    release();

    expect(overlapping).toEqual([{ courseId: "C1", status: "skipped", changeCount: 0, failed: [] }]);
    expect((await first).map((r) => r.status)).toEqual(["synced"]);
  });

  test("shape mismatches surface as an error result", async () => {
    const states = new MemoryStateStore();
    await states.save({
      courseId: "C1",
      outline: toOutlineDocument(buildOutline([])),
      contentHash: "stale",
      syncedAt: "2026-01-01T00:00:00.000Z",
      pending: [
        {
          change: { operation: "CREATE", entityType: "TOPIC", entityId: "T1", data: { kind: "course", name: "x", courseOutline: "" } },
          attempts: 1,
          reason: "not-found",
        },
      ],
    });
    const deps: SyncDependencies = {
      repository: new InMemoryCourseRepository(),
      states,
      fetchPayload: async () => buildPayload([]),
    };

    const [result] = await runSyncOnce([target], deps);

    expect(result?.status).toBe("error");
    expect(result?.error).toBe("Expected topic change data but got course data when creating a topic");
  });
});

describe("replay bookkeeping", () => {
  test("fresh operations replace pending ones for the same entity", () => {
    const fresh = [renameTopic("T1", "Algebra III")];
    const pending: PendingChange[] = [
      { change: renameTopic("T1", "Algebra II"), attempts: 1, reason: "not-found" },
      { change: renameTopic("T2", "Geometry"), attempts: 2, reason: "abandoned" },
    ];

    expect(summarize(mergeReplays(fresh, pending))).toEqual(["UPDATE TOPIC T1", "UPDATE TOPIC T2"]);
    expect(mergeReplays(fresh, pending)[0]).toBe(fresh[0]);
  });

  test("merged operations keep children deleted before their parent", () => {
    const fresh: ChangeOperation[] = [
      { operation: "DELETE", entityType: "TOPIC", entityId: "T1", data: { kind: "topic", name: "Algebra" } },
    ];
    const pending: PendingChange[] = [
      {
        change: {
          operation: "DELETE",
          entityType: "SUBTOPIC",
          entityId: "S1",
          data: { kind: "subtopic", name: "Linear Eq.", topicId: "T1" },
        },
        attempts: 1,
        reason: "abandoned",
      },
      { change: createTopic("T2", "Geometry"), attempts: 1, reason: "abandoned" },
    ];

    expect(summarize(mergeReplays(fresh, pending))).toEqual(["CREATE TOPIC T2", "DELETE SUBTOPIC S1", "DELETE TOPIC T1"]);
  });

  test("a create that never applied cancels out against a delete", () => {
    const fresh: ChangeOperation[] = [
      { operation: "DELETE", entityType: "TOPIC", entityId: "T1", data: { kind: "topic", name: "Algebra" } },
    ];

    expect(mergeReplays(fresh, [{ change: createTopic("T1", "Algebra"), attempts: 1, reason: "not-found" }])).toEqual([]);
  });

  test("attempts accumulate across cycles", () => {
    const failed: FailedChange[] = [
      { change: renameTopic("T1", "Algebra"), reason: "not-found", message: "Topic T1 does not exist" },
      { change: renameTopic("T2", "Geometry"), reason: "abandoned", message: "locked" },
    ];
    const pending: PendingChange[] = [{ change: renameTopic("T2", "Geometry"), attempts: 2, reason: "abandoned" }];

    expect(carryForward(failed, pending, 3)).toEqual([
      { change: renameTopic("T1", "Algebra"), attempts: 1, reason: "not-found" },
    ]);
  });
});
