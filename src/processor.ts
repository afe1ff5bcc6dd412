import { NotFoundError, ShapeMismatchError, TransientStoreError } from "./errors.js";
import type { CourseRecord, CourseRepository } from "./repository.js";
import { RetryingCourseRepository } from "./retrying-repository.js";
import type {
  ChangeData,
  ChangeOperation,
  CourseChangeData,
  SubTopicChangeData,
  SyncMode,
  TopicChangeData,
} from "./types.js";
import { describeChange, noRetry, type RetryOptions } from "./utils.js";

/** What new topics are attached to. */
export interface CourseContext {
  course: CourseRecord;
  examinationLevel: string;
  academicClass: string;
}

export interface ChangeProcessorOptions {
  mode?: SyncMode;
  retry?: RetryOptions;
}

export type FailureReason = "unsupported" | "not-found" | "no-strategy" | "abandoned" | "rolled-back";

export interface FailedChange {
  change: ChangeOperation;
  reason: FailureReason;
  message: string;
}

export interface ProcessReport {
  applied: ChangeOperation[];
  failed: FailedChange[];
  /** Strict mode discarded every write of the batch. */
  rolledBack: boolean;
  /** Contention stopped the batch before every operation was attempted. */
  abandoned: boolean;
}

/** Resolves true when applied, false when the entity kind is not handled. */
type ChangeStrategy = (change: ChangeOperation, repo: CourseRepository, ctx: CourseContext) => Promise<boolean>;

function courseData(data: ChangeData, operation: string): CourseChangeData {
  if (data.kind !== "course") throw new ShapeMismatchError("course", data.kind, operation);
  return data;
}

function topicData(data: ChangeData, operation: string): TopicChangeData {
  if (data.kind !== "topic") throw new ShapeMismatchError("topic", data.kind, operation);
  return data;
}

function subTopicData(data: ChangeData, operation: string): SubTopicChangeData {
  if (data.kind !== "subtopic") throw new ShapeMismatchError("subtopic", data.kind, operation);
  return data;
}

const createStrategy: ChangeStrategy = async (change, repo, ctx) => {
  const { entityId: id } = change;
  switch (change.entityType) {
    case "TOPIC": {
      const data = topicData(change.data, "creating a topic");
      const { created } = await repo.getOrCreateTopic(id, {
        name: data.name,
        courseId: ctx.course.id,
        examinationLevel: ctx.examinationLevel,
        academicClass: ctx.academicClass,
      });
      console.debug(`[PROCESSOR] Topic ${id} ${created ? "created" : "already present"}`);
      return true;
    }
    case "SUBTOPIC": {
      const data = subTopicData(change.data, "creating a subtopic");
      const topic = await repo.getTopic(data.topicId);
      const { created } = await repo.getOrCreateSubTopic(id, { name: data.name, topicId: topic.id });
      console.debug(`[PROCESSOR] Subtopic ${id} ${created ? "created" : "already present"}`);
      return true;
    }
    default:
      console.error(`[PROCESSOR] Unsupported entity type for CREATE: ${change.entityType}`);
      return false;
  }
};

const updateStrategy: ChangeStrategy = async (change, repo) => {
  const { entityId: id } = change;
  switch (change.entityType) {
    case "COURSE": {
      const data = courseData(change.data, "updating a course");
      const course = await repo.getCourse(id);
      await repo.saveCourse({ ...course, name: data.name, courseOutline: data.courseOutline });
      return true;
    }
    case "TOPIC": {
      const data = topicData(change.data, "updating a topic");
      const topic = await repo.getTopic(id);
      await repo.saveTopic({ ...topic, name: data.name });
      return true;
    }
    case "SUBTOPIC": {
      const data = subTopicData(change.data, "updating a subtopic");
      const subTopic = await repo.getSubTopic(id);
      if (subTopic.topicId !== data.topicId) {
        // Re-parented: the new topic has to exist
        await repo.getTopic(data.topicId);
      }
      await repo.saveSubTopic({ ...subTopic, name: data.name, topicId: data.topicId });
      return true;
    }
    default:
      console.error(`[PROCESSOR] Unsupported entity type for UPDATE: ${String(change.entityType)}`);
      return false;
  }
};

const deleteStrategy: ChangeStrategy = async (change, repo) => {
  const { entityId: id } = change;
  switch (change.entityType) {
    case "COURSE":
      await repo.deleteCourse(id);
      return true;
    case "TOPIC":
      await repo.deleteTopic(id);
      return true;
    case "SUBTOPIC":
      await repo.deleteSubTopic(id);
      return true;
    default:
      console.error(`[PROCESSOR] Unsupported entity type for DELETE: ${String(change.entityType)}`);
      return false;
  }
};

function resolveStrategy(operation: string): ChangeStrategy | undefined {
  switch (operation) {
    case "CREATE":
      return createStrategy;
    case "UPDATE":
      return updateStrategy;
    case "DELETE":
      return deleteStrategy;
    default:
      return undefined;
  }
}

class BatchAbortedError extends Error {
  constructor(readonly failure: FailedChange) {
    super(`Batch aborted at ${describeChange(failure.change)}: ${failure.message}`);
    this.name = "BatchAbortedError";
  }
}

/**
 * Applies diff output to the repository, one operation at a time and in
 * order, inside a single repository transaction.
 *
 * In best_effort mode a failed operation is reported and the batch goes on;
 * whatever succeeded is committed. In strict mode the first failure rolls
 * back the batch and every operation is reported as failed. A
 * ShapeMismatchError is never absorbed: it rolls back and rethrows.
 */
export class ChangeProcessor {
  private readonly mode: SyncMode;
  private readonly retry: RetryOptions;

  constructor(
    private readonly repository: CourseRepository,
    private readonly context: CourseContext,
    options: ChangeProcessorOptions = {}
  ) {
    this.mode = options.mode ?? "best_effort";
    this.retry = options.retry ?? noRetry;
  }

  /** Returns the operations that did not apply, in their original order. */
  async process(changes: readonly ChangeOperation[]): Promise<ChangeOperation[]> {
    const report = await this.run(changes);
    return report.failed.map((f) => f.change);
  }

  async run(changes: readonly ChangeOperation[]): Promise<ProcessReport> {
    const store = new RetryingCourseRepository(this.repository, this.retry);
    try {
      return await store.transaction((tx) => this.applyAll(changes, tx));
    } catch (err) {
      if (!(err instanceof BatchAbortedError)) throw err;
      const { failure } = err;
      console.error(
        `[PROCESSOR] ${describeChange(failure.change)} failed (${failure.reason}), rolled back ${changes.length} operation(s)`
      );
      return {
        applied: [],
        failed: changes.map(
          (change): FailedChange =>
            change === failure.change
              ? failure
              : { change, reason: "rolled-back", message: "Batch rolled back after a failed operation" }
        ),
        rolledBack: true,
        abandoned: false,
      };
    }
  }

  private async applyAll(changes: readonly ChangeOperation[], tx: CourseRepository): Promise<ProcessReport> {
    const applied: ChangeOperation[] = [];
    const failed: FailedChange[] = [];

    for (const [i, change] of changes.entries()) {
      console.info(`[PROCESSOR] Processing ${describeChange(change)}`);
      const failure = await this.applyOne(change, tx);
      if (!failure) {
        applied.push(change);
        continue;
      }
      if (this.mode === "strict") throw new BatchAbortedError(failure);

      if (failure.reason === "abandoned") {
        const rest = changes.slice(i + 1).map(
          (c): FailedChange => ({ change: c, reason: "abandoned", message: "Not attempted after storage contention" })
        );
        console.warn(`[PROCESSOR] Storage contention, ${rest.length + 1} operation(s) left for replay`);
        failed.push(failure, ...rest);
        return { applied, failed, rolledBack: false, abandoned: true };
      }
      failed.push(failure);
    }

    return { applied, failed, rolledBack: false, abandoned: false };
  }

  private async applyOne(change: ChangeOperation, tx: CourseRepository): Promise<FailedChange | null> {
    const strategy = resolveStrategy(change.operation);
    if (!strategy) {
      console.error(`[PROCESSOR] No strategy for operation type ${change.operation}`);
      return { change, reason: "no-strategy", message: `No strategy for operation type ${change.operation}` };
    }

    try {
      if (await strategy(change, tx, this.context)) return null;
      return { change, reason: "unsupported", message: `${change.operation} is not supported for ${change.entityType}` };
    } catch (err) {
      if (err instanceof NotFoundError) {
        console.error(`[PROCESSOR] ${describeChange(change)} failed: ${err.message}`);
        return { change, reason: "not-found", message: err.message };
      }
      if (err instanceof TransientStoreError) {
        return { change, reason: "abandoned", message: err.message };
      }
      throw err;
    }
  }
}
