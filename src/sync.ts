import pLimit from "p-limit";
import { diffOutlines, orderChanges } from "./diff.js";
import { fromOutlineDocument, outlineHash, toOutlineDocument } from "./outline.js";
import { ChangeProcessor, type FailedChange } from "./processor.js";
import { loadOutlineFromRepository, type CourseRepository } from "./repository.js";
import { RetryingCourseRepository } from "./retrying-repository.js";
import type { PendingChange, SyncStateStore } from "./sync-state.js";
import { transformToCourseOutline } from "./transformer.js";
import type { ChangeOperation, CourseOutline, SyncMode, SyncTarget } from "./types.js";
import { changeKey, describeChange, errorMessage, noRetry, type RetryOptions } from "./utils.js";

export interface SyncDependencies {
  repository: CourseRepository;
  states: SyncStateStore;
  fetchPayload(target: SyncTarget): Promise<unknown>;
  notifyFailures?(target: SyncTarget, failed: FailedChange[]): Promise<void>;
}

export interface SyncOptions {
  mode: SyncMode;
  retry: RetryOptions;
  concurrency: number;
  maxReplayAttempts: number;
  /** Without stored state, diff against what the store already holds. */
  baselineFromStore: boolean;
}

export const defaultSyncOptions: SyncOptions = {
  mode: "best_effort",
  retry: noRetry,
  concurrency: 3,
  maxReplayAttempts: 5,
  baselineFromStore: false,
};

export type CourseSyncStatus = "unchanged" | "synced" | "partial" | "rolled_back" | "skipped" | "error";

export interface CourseSyncResult {
  courseId: string;
  status: CourseSyncStatus;
  changeCount: number;
  failed: FailedChange[];
  error?: string;
}

// One cycle per course at a time within this process
const running = new Set<string>();

async function loadPrevious(
  target: SyncTarget,
  deps: SyncDependencies,
  store: CourseRepository,
  options: SyncOptions
): Promise<{ previous: CourseOutline | null; pending: PendingChange[]; contentHash: string | null }> {
  const state = await deps.states.get(target.courseId);
  if (state) {
    return { previous: fromOutlineDocument(state.outline), pending: state.pending, contentHash: state.contentHash };
  }
  if (options.baselineFromStore) {
    const stored = await store.listTopics(target.courseId);
    if (stored.length > 0) {
      console.log(`[SYNC] No sync state for ${target.courseId}, using stored rows as baseline`);
      return { previous: await loadOutlineFromRepository(store, target.courseId), pending: [], contentHash: null };
    }
  }
  return { previous: null, pending: [], contentHash: null };
}

/**
 * Combine this cycle's operations with replays of earlier failures.
 *
 * A fresh operation on the same entity supersedes the replay, except that a
 * CREATE that never applied stays a CREATE (carrying the fresh payload when
 * the fresh operation is an UPDATE) and cancels out against a fresh DELETE.
 * The result is put back in diff order so parents still come first.
 */
export function mergeReplays(fresh: readonly ChangeOperation[], pending: readonly PendingChange[]): ChangeOperation[] {
  const replays = new Map(pending.map((p): [string, ChangeOperation] => [changeKey(p.change), p.change]));
  const merged: ChangeOperation[] = [];

  for (const change of fresh) {
    const replay = replays.get(changeKey(change));
    replays.delete(changeKey(change));
    if (!replay || replay.operation !== "CREATE") {
      merged.push(change);
    } else if (change.operation === "UPDATE") {
      merged.push({ ...change, operation: "CREATE" });
    } else if (change.operation === "DELETE") {
      console.log(`[SYNC] ${describeChange(replay)} never applied, dropping it with ${describeChange(change)}`);
    } else {
      merged.push(change);
    }
  }

  return orderChanges([...merged, ...replays.values()]);
}

export function carryForward(
  failed: readonly FailedChange[],
  pending: readonly PendingChange[],
  maxReplayAttempts: number
): PendingChange[] {
  const previousAttempts = new Map(pending.map((p): [string, number] => [changeKey(p.change), p.attempts]));
  const next: PendingChange[] = [];
  for (const { change, reason } of failed) {
    const attempts = (previousAttempts.get(changeKey(change)) ?? 0) + 1;
    if (attempts >= maxReplayAttempts) {
      console.error(`[SYNC] Giving up on ${describeChange(change)} after ${attempts} attempt(s) (${reason})`);
      continue;
    }
    next.push({ change, attempts, reason });
  }
  return next;
}

export async function syncCourse(
  target: SyncTarget,
  deps: SyncDependencies,
  options: SyncOptions = defaultSyncOptions
): Promise<CourseSyncResult> {
  const payload = await deps.fetchPayload(target);
  const current = transformToCourseOutline(payload, target.courseId, target.name);
  const contentHash = outlineHash(current);
  // Calls made here sit outside the processor, which retries its own
  const store = new RetryingCourseRepository(deps.repository, options.retry);
  const { previous, pending, contentHash: previousHash } = await loadPrevious(target, deps, store, options);

  if (previousHash === contentHash && pending.length === 0) {
    console.log(`[SYNC] ${target.courseId} unchanged`);
    return { courseId: target.courseId, status: "unchanged", changeCount: 0, failed: [] };
  }

  const { record: course, created } = await store.getOrCreateCourse(target.courseId, {
    name: current.title,
    courseOutline: current.courseOutline,
  });
  if (created) console.log(`[SYNC] Created course row ${target.courseId}`);

  const changes = mergeReplays(diffOutlines(previous, current), pending);
  const processor = new ChangeProcessor(
    deps.repository,
    { course, examinationLevel: target.examinationLevel, academicClass: target.academicClass },
    { mode: options.mode, retry: options.retry }
  );
  const report = await processor.run(changes);

  if (report.rolledBack) {
    // Keep the previous snapshot so the same diff is produced next cycle
    console.error(`[SYNC] ${target.courseId} rolled back, ${report.failed.length} operation(s) not applied`);
  } else {
    await deps.states.save({
      courseId: target.courseId,
      outline: toOutlineDocument(current),
      contentHash,
      syncedAt: new Date().toISOString(),
      pending: carryForward(report.failed, pending, options.maxReplayAttempts),
    });
  }

  if (report.failed.length > 0 && deps.notifyFailures) {
    try {
      await deps.notifyFailures(target, report.failed);
    } catch (err) {
      console.error(`[SYNC] Failure alert for ${target.courseId} not sent:`, errorMessage(err));
    }
  }

  const status: CourseSyncStatus = report.rolledBack ? "rolled_back" : report.failed.length > 0 ? "partial" : "synced";
  console.log(
    `[SYNC] ${target.courseId} ${status}: ${report.applied.length}/${changes.length} applied, ${report.failed.length} failed`
  );
  return { courseId: target.courseId, status, changeCount: changes.length, failed: report.failed };
}

/** Syncs every target; a failing course never stops the others. */
export async function runSyncOnce(
  targets: readonly SyncTarget[],
  deps: SyncDependencies,
  options: SyncOptions = defaultSyncOptions
): Promise<CourseSyncResult[]> {
  const limiter = pLimit(options.concurrency);

  return Promise.all(
    targets.map((target) =>
      limiter(async (): Promise<CourseSyncResult> => {
        if (running.has(target.courseId)) {
          console.warn(`[SYNC] ${target.courseId} already syncing, skipped`);
          return { courseId: target.courseId, status: "skipped", changeCount: 0, failed: [] };
        }
        running.add(target.courseId);
        try {
          return await syncCourse(target, deps, options);
        } catch (err) {
          console.error(`[SYNC] ${target.courseId} failed:`, errorMessage(err));
          return { courseId: target.courseId, status: "error", changeCount: 0, failed: [], error: errorMessage(err) };
        } finally {
          running.delete(target.courseId);
        }
      })
    )
  );
}
