import type { CollectionReference, DocumentData, DocumentReference, Firestore } from "firebase-admin/firestore";
import type { z } from "zod";
import { NotFoundError, TransientStoreError, type StoredEntity } from "./errors.js";
import {
  courseRecordSchema,
  subTopicRecordSchema,
  topicRecordSchema,
  type CourseRecord,
  type CourseRepository,
  type GetOrCreateResult,
  type SubTopicRecord,
  type TopicRecord,
} from "./repository.js";
import { errorMessage } from "./utils.js";

export interface FirestoreCollectionNames {
  courses: string;
  topics: string;
  subTopics: string;
}

// gRPC DEADLINE_EXCEEDED, RESOURCE_EXHAUSTED, ABORTED, UNAVAILABLE
const TRANSIENT_CODES = new Set([4, 8, 10, 14]);
// Firestore rejects batches above this many writes
const MAX_BATCH_WRITES = 500;

export function isTransientFirestoreError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "number" &&
    TRANSIENT_CODES.has(err.code)
  );
}

async function guard<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (isTransientFirestoreError(err)) {
      throw new TransientStoreError(`Firestore unavailable: ${errorMessage(err)}`, { cause: err });
    }
    throw err;
  }
}

interface StagedWrite {
  ref: DocumentReference;
  data: DocumentData | null;
}

/** One collection seen through the writes staged so far in a session. */
class StagedCollection<T extends { id: string }> {
  private readonly staged = new Map<string, T | null>();

  constructor(
    private readonly ref: CollectionReference,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly entity: StoredEntity
  ) {}

  async find(id: string): Promise<T | undefined> {
    if (this.staged.has(id)) return this.staged.get(id) ?? undefined;
    const snap = await guard(() => this.ref.doc(id).get());
    return snap.exists ? this.schema.parse({ ...snap.data(), id }) : undefined;
  }

  async get(id: string): Promise<T> {
    const record = await this.find(id);
    if (!record) throw new NotFoundError(this.entity, id);
    return record;
  }

  async getOrCreate(id: string, build: () => T): Promise<GetOrCreateResult<T>> {
    const existing = await this.find(id);
    if (existing) return { record: existing, created: false };
    const record = build();
    this.staged.set(id, record);
    return { record, created: true };
  }

  async save(record: T): Promise<void> {
    await this.get(record.id);
    this.staged.set(record.id, record);
  }

  async remove(id: string): Promise<void> {
    await this.get(id);
    this.staged.set(id, null);
  }

  async where(field: keyof T & string, value: string): Promise<T[]> {
    const snap = await guard(() => this.ref.where(field, "==", value).get());
    const rows = new Map<string, T>();
    for (const doc of snap.docs) {
      if (!this.staged.has(doc.id)) rows.set(doc.id, this.schema.parse({ ...doc.data(), id: doc.id }));
    }
    for (const [id, record] of this.staged) {
      if (record && record[field] === value) rows.set(id, record);
    }
    return [...rows.values()];
  }

  writes(): StagedWrite[] {
    return [...this.staged].map(([id, record]) => ({ ref: this.ref.doc(id), data: record ? { ...record } : null }));
  }
}

/**
 * Unit of work over Firestore. Reads go to Firestore unless the session has
 * already written the document; writes are held until commit().
 */
class FirestoreSession implements CourseRepository {
  private readonly courses: StagedCollection<CourseRecord>;
  private readonly topics: StagedCollection<TopicRecord>;
  private readonly subTopics: StagedCollection<SubTopicRecord>;

  constructor(
    private readonly db: Firestore,
    names: FirestoreCollectionNames
  ) {
    this.courses = new StagedCollection(db.collection(names.courses), courseRecordSchema, "Course");
    this.topics = new StagedCollection(db.collection(names.topics), topicRecordSchema, "Topic");
    this.subTopics = new StagedCollection(db.collection(names.subTopics), subTopicRecordSchema, "SubTopic");
  }

  getCourse(id: string): Promise<CourseRecord> {
    return this.courses.get(id);
  }

  getOrCreateCourse(id: string, defaults: Omit<CourseRecord, "id">): Promise<GetOrCreateResult<CourseRecord>> {
    return this.courses.getOrCreate(id, () => ({ id, ...defaults }));
  }

  saveCourse(course: CourseRecord): Promise<void> {
    return this.courses.save(course);
  }

  async deleteCourse(id: string): Promise<void> {
    await this.courses.remove(id);
    for (const topic of await this.topics.where("courseId", id)) await this.deleteTopic(topic.id);
  }

  getTopic(id: string): Promise<TopicRecord> {
    return this.topics.get(id);
  }

  getOrCreateTopic(id: string, defaults: Omit<TopicRecord, "id">): Promise<GetOrCreateResult<TopicRecord>> {
    return this.topics.getOrCreate(id, () => ({ id, ...defaults }));
  }

  saveTopic(topic: TopicRecord): Promise<void> {
    return this.topics.save(topic);
  }

  async deleteTopic(id: string): Promise<void> {
    await this.topics.remove(id);
    for (const sub of await this.subTopics.where("topicId", id)) await this.subTopics.remove(sub.id);
  }

  listTopics(courseId: string): Promise<TopicRecord[]> {
    return this.topics.where("courseId", courseId);
  }

  getSubTopic(id: string): Promise<SubTopicRecord> {
    return this.subTopics.get(id);
  }

  getOrCreateSubTopic(id: string, defaults: Omit<SubTopicRecord, "id">): Promise<GetOrCreateResult<SubTopicRecord>> {
    return this.subTopics.getOrCreate(id, () => ({ id, ...defaults }));
  }

  saveSubTopic(subTopic: SubTopicRecord): Promise<void> {
    return this.subTopics.save(subTopic);
  }

  deleteSubTopic(id: string): Promise<void> {
    return this.subTopics.remove(id);
  }

  listSubTopics(topicId: string): Promise<SubTopicRecord[]> {
    return this.subTopics.where("topicId", topicId);
  }

  // Nested transactions join this session
  transaction<T>(work: (tx: CourseRepository) => Promise<T>): Promise<T> {
    return work(this);
  }

  /** Atomic up to MAX_BATCH_WRITES writes; larger sessions commit in chunks. */
  async commit(): Promise<void> {
    const writes = [...this.courses.writes(), ...this.topics.writes(), ...this.subTopics.writes()];
    for (let start = 0; start < writes.length; start += MAX_BATCH_WRITES) {
      const batch = this.db.batch();
      for (const { ref, data } of writes.slice(start, start + MAX_BATCH_WRITES)) {
        if (data) batch.set(ref, data);
        else batch.delete(ref);
      }
      await guard(() => batch.commit());
    }
    if (writes.length > 0) console.debug(`[STORE] Committed ${writes.length} Firestore write(s)`);
  }
}

export class FirestoreCourseRepository implements CourseRepository {
  constructor(
    private readonly db: Firestore,
    private readonly names: FirestoreCollectionNames
  ) {}

  private async once<T>(work: (session: FirestoreSession) => Promise<T>): Promise<T> {
    const session = new FirestoreSession(this.db, this.names);
    const result = await work(session);
    await session.commit();
    return result;
  }

  getCourse(id: string): Promise<CourseRecord> {
    return this.once((s) => s.getCourse(id));
  }

  getOrCreateCourse(id: string, defaults: Omit<CourseRecord, "id">): Promise<GetOrCreateResult<CourseRecord>> {
    return this.once((s) => s.getOrCreateCourse(id, defaults));
  }

  saveCourse(course: CourseRecord): Promise<void> {
    return this.once((s) => s.saveCourse(course));
  }

  deleteCourse(id: string): Promise<void> {
    return this.once((s) => s.deleteCourse(id));
  }

  getTopic(id: string): Promise<TopicRecord> {
    return this.once((s) => s.getTopic(id));
  }

  getOrCreateTopic(id: string, defaults: Omit<TopicRecord, "id">): Promise<GetOrCreateResult<TopicRecord>> {
    return this.once((s) => s.getOrCreateTopic(id, defaults));
  }

  saveTopic(topic: TopicRecord): Promise<void> {
    return this.once((s) => s.saveTopic(topic));
  }

  deleteTopic(id: string): Promise<void> {
    return this.once((s) => s.deleteTopic(id));
  }

  listTopics(courseId: string): Promise<TopicRecord[]> {
    return this.once((s) => s.listTopics(courseId));
  }

  getSubTopic(id: string): Promise<SubTopicRecord> {
    return this.once((s) => s.getSubTopic(id));
  }

  getOrCreateSubTopic(id: string, defaults: Omit<SubTopicRecord, "id">): Promise<GetOrCreateResult<SubTopicRecord>> {
    return this.once((s) => s.getOrCreateSubTopic(id, defaults));
  }

  saveSubTopic(subTopic: SubTopicRecord): Promise<void> {
    return this.once((s) => s.saveSubTopic(subTopic));
  }

  deleteSubTopic(id: string): Promise<void> {
    return this.once((s) => s.deleteSubTopic(id));
  }

  listSubTopics(topicId: string): Promise<SubTopicRecord[]> {
    return this.once((s) => s.listSubTopics(topicId));
  }

  transaction<T>(work: (tx: CourseRepository) => Promise<T>): Promise<T> {
    return this.once((s) => work(s));
  }
}
