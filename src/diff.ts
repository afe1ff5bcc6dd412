import { findSubTopic, findTopic } from "./outline.js";
import type { ChangeOperation, CourseOutline, EntityType } from "./types.js";
import { describeChange } from "./utils.js";

interface DiffContext {
  previous: CourseOutline | null;
  current: CourseOutline;
}

interface StageChanges {
  creates: ChangeOperation[];
  updates: ChangeOperation[];
  deletes: ChangeOperation[];
}

type DiffStage = (ctx: DiffContext) => StageChanges;

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((id) => !b.has(id));
}

function intersection(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((id) => b.has(id));
}

const emptySet: ReadonlySet<string> = new Set();

export function diffCourse({ previous, current }: DiffContext): StageChanges {
  const changes: StageChanges = { creates: [], updates: [], deletes: [] };
  // The course row exists before the first sync, so there is nothing to create
  if (!previous) return changes;

  if (previous.title !== current.title || previous.courseOutline !== current.courseOutline) {
    changes.updates.push({
      operation: "UPDATE",
      entityType: "COURSE",
      entityId: current.courseId,
      data: { kind: "course", name: current.title, courseOutline: current.courseOutline },
    });
  }
  return changes;
}

export function diffTopics({ previous, current }: DiffContext): StageChanges {
  const prevIds = previous?.structure.topicIds ?? emptySet;
  const currIds = current.structure.topicIds;
  const nameIn = (outline: CourseOutline, id: string) => findTopic(outline, id)?.name ?? "";

  const creates = difference(currIds, prevIds).map(
    (id): ChangeOperation => ({
      operation: "CREATE",
      entityType: "TOPIC",
      entityId: id,
      data: { kind: "topic", name: nameIn(current, id) },
    })
  );

  if (!previous) return { creates, updates: [], deletes: [] };

  const deletes = difference(prevIds, currIds).map(
    (id): ChangeOperation => ({
      operation: "DELETE",
      entityType: "TOPIC",
      entityId: id,
      data: { kind: "topic", name: nameIn(previous, id) },
    })
  );

  const updates: ChangeOperation[] = [];
  for (const id of intersection(currIds, prevIds)) {
    const name = nameIn(current, id);
    if (nameIn(previous, id) !== name) {
      updates.push({ operation: "UPDATE", entityType: "TOPIC", entityId: id, data: { kind: "topic", name } });
    }
  }

  return { creates, updates, deletes };
}

export function diffSubTopics({ previous, current }: DiffContext): StageChanges {
  const prevIds = previous?.structure.subTopicIds ?? emptySet;
  const currIds = current.structure.subTopicIds;

  // Parent ids come from the structure mapping; no check that the topic exists
  const dataIn = (outline: CourseOutline, id: string) => {
    const sub = findSubTopic(outline, id);
    return {
      kind: "subtopic" as const,
      name: sub?.name ?? "",
      topicId: outline.structure.subTopicParents.get(id) ?? sub?.topicId ?? "",
    };
  };

  const creates = difference(currIds, prevIds).map(
    (id): ChangeOperation => ({ operation: "CREATE", entityType: "SUBTOPIC", entityId: id, data: dataIn(current, id) })
  );

  if (!previous) return { creates, updates: [], deletes: [] };

  const deletes = difference(prevIds, currIds).map(
    (id): ChangeOperation => ({ operation: "DELETE", entityType: "SUBTOPIC", entityId: id, data: dataIn(previous, id) })
  );

  const updates: ChangeOperation[] = [];
  for (const id of intersection(currIds, prevIds)) {
    const before = dataIn(previous, id);
    const after = dataIn(current, id);
    if (before.name !== after.name || before.topicId !== after.topicId) {
      updates.push({ operation: "UPDATE", entityType: "SUBTOPIC", entityId: id, data: after });
    }
  }

  return { creates, updates, deletes };
}

// Parents before children. Creates and updates run in this order, deletes in
// reverse so subtopics are gone before the topic that owns them.
const stages: readonly DiffStage[] = [diffCourse, diffTopics, diffSubTopics];

const stageIndex: Record<EntityType, number> = { COURSE: 0, TOPIC: 1, SUBTOPIC: 2 };

function orderRank(change: ChangeOperation): number {
  const stage = stageIndex[change.entityType];
  if (change.operation === "DELETE") return 2 * stages.length + (stages.length - 1 - stage);
  return 2 * stage + (change.operation === "CREATE" ? 0 : 1);
}

/**
 * Stable sort into the order diffOutlines emits: creates then updates stage
 * by stage, then deletes with the last stage first.
 */
export function orderChanges(changes: readonly ChangeOperation[]): ChangeOperation[] {
  return [...changes].sort((a, b) => orderRank(a) - orderRank(b));
}

/**
 * Compare two outline versions and produce the operations that turn the
 * stored copy of `previous` into `current`. `previous` is null on the first
 * sync of a course, in which case every topic and subtopic is created.
 */
export function diffOutlines(previous: CourseOutline | null, current: CourseOutline): ChangeOperation[] {
  console.info(`[DIFF] Comparing outline for course ${current.courseId} (previous: ${previous ? "yes" : "none"})`);
  console.debug(
    `[DIFF] Topics ${previous?.structure.topicIds.size ?? 0} -> ${current.structure.topicIds.size}, ` +
      `subtopics ${previous?.structure.subTopicIds.size ?? 0} -> ${current.structure.subTopicIds.size}`
  );

  const ctx: DiffContext = { previous, current };
  const results = stages.map((stage) => stage(ctx));

  const changes = [
    ...results.flatMap((r) => [...r.creates, ...r.updates]),
    ...[...results].reverse().flatMap((r) => r.deletes),
  ];

  console.info(`[DIFF] ${changes.length} change operation(s) for course ${current.courseId}`);
  changes.forEach((change, i) => console.debug(`[DIFF] ${i + 1}. ${describeChange(change)}`));
  return changes;
}
