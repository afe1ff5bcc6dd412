import pLimit from "p-limit";
import { z } from "zod";
import { NotFoundError, type StoredEntity } from "./errors.js";
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

export const repositoryDumpSchema = z.object({
  courses: z.array(courseRecordSchema).default([]),
  topics: z.array(topicRecordSchema).default([]),
  subTopics: z.array(subTopicRecordSchema).default([]),
});

export type RepositoryDump = z.infer<typeof repositoryDumpSchema>;

class RecordTable<T extends { id: string }> {
  private readonly rows: Map<string, T>;

  constructor(
    private readonly entity: StoredEntity,
    rows: Iterable<T> = []
  ) {
    this.rows = new Map([...rows].map((r): [string, T] => [r.id, { ...r }]));
  }

  get(id: string): T {
    const row = this.rows.get(id);
    if (!row) throw new NotFoundError(this.entity, id);
    return { ...row };
  }

  getOrCreate(id: string, defaults: Omit<T, "id">, build: (id: string, defaults: Omit<T, "id">) => T): GetOrCreateResult<T> {
    const existing = this.rows.get(id);
    if (existing) return { record: { ...existing }, created: false };
    const record = build(id, defaults);
    this.rows.set(id, record);
    return { record: { ...record }, created: true };
  }

  save(record: T): void {
    if (!this.rows.has(record.id)) throw new NotFoundError(this.entity, record.id);
    this.rows.set(record.id, { ...record });
  }

  delete(id: string): void {
    if (!this.rows.delete(id)) throw new NotFoundError(this.entity, id);
  }

  filter(predicate: (row: T) => boolean): T[] {
    return [...this.rows.values()].filter(predicate).map((r) => ({ ...r }));
  }

  all(): T[] {
    return this.filter(() => true);
  }
}

/**
 * Map-backed repository. Transactions run against a copy that replaces the
 * live tables only when the work resolves. Writes and transactions on the
 * live tables run one at a time, so a transaction never adopts a copy taken
 * before another write committed.
 */
export class InMemoryCourseRepository implements CourseRepository {
  private courses: RecordTable<CourseRecord>;
  private topics: RecordTable<TopicRecord>;
  private subTopics: RecordTable<SubTopicRecord>;
  private readonly writes = pLimit(1);

  constructor(seed: Partial<RepositoryDump> = {}) {
    this.courses = new RecordTable("Course", seed.courses);
    this.topics = new RecordTable("Topic", seed.topics);
    this.subTopics = new RecordTable("SubTopic", seed.subTopics);
  }

  /** Called after every committed write. */
  protected onCommit(): void {}

  dump(): RepositoryDump {
    return { courses: this.courses.all(), topics: this.topics.all(), subTopics: this.subTopics.all() };
  }

  async getCourse(id: string): Promise<CourseRecord> {
    return this.courses.get(id);
  }

  async getOrCreateCourse(id: string, defaults: Omit<CourseRecord, "id">): Promise<GetOrCreateResult<CourseRecord>> {
    return this.exclusive(async () => {
      const result = this.courses.getOrCreate(id, defaults, (key, d) => ({ id: key, ...d }));
      if (result.created) this.onCommit();
      return result;
    });
  }

  async saveCourse(course: CourseRecord): Promise<void> {
    return this.exclusive(async () => {
      this.courses.save(course);
      this.onCommit();
    });
  }

  async deleteCourse(id: string): Promise<void> {
    return this.exclusive(async () => {
      this.courses.delete(id);
      for (const topic of this.topics.filter((t) => t.courseId === id)) this.removeTopic(topic.id);
      this.onCommit();
    });
  }

  async getTopic(id: string): Promise<TopicRecord> {
    return this.topics.get(id);
  }

  async getOrCreateTopic(id: string, defaults: Omit<TopicRecord, "id">): Promise<GetOrCreateResult<TopicRecord>> {
    return this.exclusive(async () => {
      const result = this.topics.getOrCreate(id, defaults, (key, d) => ({ id: key, ...d }));
      if (result.created) this.onCommit();
      return result;
    });
  }

  async saveTopic(topic: TopicRecord): Promise<void> {
    return this.exclusive(async () => {
      this.topics.save(topic);
      this.onCommit();
    });
  }

  async deleteTopic(id: string): Promise<void> {
    return this.exclusive(async () => {
      this.removeTopic(id);
      this.onCommit();
    });
  }

  async listTopics(courseId: string): Promise<TopicRecord[]> {
    return this.topics.filter((t) => t.courseId === courseId);
  }

  async getSubTopic(id: string): Promise<SubTopicRecord> {
    return this.subTopics.get(id);
  }

  async getOrCreateSubTopic(
    id: string,
    defaults: Omit<SubTopicRecord, "id">
  ): Promise<GetOrCreateResult<SubTopicRecord>> {
    return this.exclusive(async () => {
      const result = this.subTopics.getOrCreate(id, defaults, (key, d) => ({ id: key, ...d }));
      if (result.created) this.onCommit();
      return result;
    });
  }

  async saveSubTopic(subTopic: SubTopicRecord): Promise<void> {
    return this.exclusive(async () => {
      this.subTopics.save(subTopic);
      this.onCommit();
    });
  }

  async deleteSubTopic(id: string): Promise<void> {
    return this.exclusive(async () => {
      this.subTopics.delete(id);
      this.onCommit();
    });
  }

  async listSubTopics(topicId: string): Promise<SubTopicRecord[]> {
    return this.subTopics.filter((s) => s.topicId === topicId);
  }

  /** Copy that a transaction writes to before it is adopted. */
  protected fork(): InMemoryCourseRepository {
    return new InMemoryCourseRepository(this.dump());
  }

  // Work inside a transaction must write through `tx`; a write to the live
  // repository from there waits for the transaction and never settles.
  async transaction<T>(work: (tx: CourseRepository) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const draft = this.fork();
      const result = await work(draft);
      this.courses = draft.courses;
      this.topics = draft.topics;
      this.subTopics = draft.subTopics;
      this.onCommit();
      return result;
    });
  }

  private exclusive<T>(write: () => Promise<T>): Promise<T> {
    return this.writes(write);
  }

  private removeTopic(id: string): void {
    this.topics.delete(id);
    for (const sub of this.subTopics.filter((s) => s.topicId === id)) this.subTopics.delete(sub.id);
  }
}
