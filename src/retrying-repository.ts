import type {
  CourseRecord,
  CourseRepository,
  GetOrCreateResult,
  SubTopicRecord,
  TopicRecord,
} from "./repository.js";
import { retryTransient, type RetryOptions } from "./utils.js";

/** Retries every storage call that fails with TransientStoreError. */
export class RetryingCourseRepository implements CourseRepository {
  constructor(
    private readonly inner: CourseRepository,
    private readonly options: RetryOptions
  ) {}

  private call<T>(label: string, op: () => Promise<T>): Promise<T> {
    return retryTransient(op, this.options, label);
  }

  getCourse(id: string): Promise<CourseRecord> {
    return this.call(`getCourse(${id})`, () => this.inner.getCourse(id));
  }

  getOrCreateCourse(id: string, defaults: Omit<CourseRecord, "id">): Promise<GetOrCreateResult<CourseRecord>> {
    return this.call(`getOrCreateCourse(${id})`, () => this.inner.getOrCreateCourse(id, defaults));
  }

  saveCourse(course: CourseRecord): Promise<void> {
    return this.call(`saveCourse(${course.id})`, () => this.inner.saveCourse(course));
  }

  deleteCourse(id: string): Promise<void> {
    return this.call(`deleteCourse(${id})`, () => this.inner.deleteCourse(id));
  }

  getTopic(id: string): Promise<TopicRecord> {
    return this.call(`getTopic(${id})`, () => this.inner.getTopic(id));
  }

  getOrCreateTopic(id: string, defaults: Omit<TopicRecord, "id">): Promise<GetOrCreateResult<TopicRecord>> {
    return this.call(`getOrCreateTopic(${id})`, () => this.inner.getOrCreateTopic(id, defaults));
  }

  saveTopic(topic: TopicRecord): Promise<void> {
    return this.call(`saveTopic(${topic.id})`, () => this.inner.saveTopic(topic));
  }

  deleteTopic(id: string): Promise<void> {
    return this.call(`deleteTopic(${id})`, () => this.inner.deleteTopic(id));
  }

  listTopics(courseId: string): Promise<TopicRecord[]> {
    return this.call(`listTopics(${courseId})`, () => this.inner.listTopics(courseId));
  }

  getSubTopic(id: string): Promise<SubTopicRecord> {
    return this.call(`getSubTopic(${id})`, () => this.inner.getSubTopic(id));
  }

  getOrCreateSubTopic(id: string, defaults: Omit<SubTopicRecord, "id">): Promise<GetOrCreateResult<SubTopicRecord>> {
    return this.call(`getOrCreateSubTopic(${id})`, () => this.inner.getOrCreateSubTopic(id, defaults));
  }

  saveSubTopic(subTopic: SubTopicRecord): Promise<void> {
    return this.call(`saveSubTopic(${subTopic.id})`, () => this.inner.saveSubTopic(subTopic));
  }

  deleteSubTopic(id: string): Promise<void> {
    return this.call(`deleteSubTopic(${id})`, () => this.inner.deleteSubTopic(id));
  }

  listSubTopics(topicId: string): Promise<SubTopicRecord[]> {
    return this.call(`listSubTopics(${topicId})`, () => this.inner.listSubTopics(topicId));
  }

  // The transaction as a whole is not retried; only the calls made inside it
  transaction<T>(work: (tx: CourseRepository) => Promise<T>): Promise<T> {
    return this.inner.transaction((tx) => work(new RetryingCourseRepository(tx, this.options)));
  }
}
