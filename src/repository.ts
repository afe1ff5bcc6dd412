import { z } from "zod";
import { createCourseOutline } from "./outline.js";
import type { CourseOutline } from "./types.js";

export const courseRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  courseOutline: z.string().default(""),
});

export const topicRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  courseId: z.string(),
  examinationLevel: z.string(),
  academicClass: z.string(),
});

export const subTopicRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  topicId: z.string(),
});

export type CourseRecord = z.infer<typeof courseRecordSchema>;
export type TopicRecord = z.infer<typeof topicRecordSchema>;
export type SubTopicRecord = z.infer<typeof subTopicRecordSchema>;

export interface GetOrCreateResult<T> {
  record: T;
  created: boolean;
}

/**
 * Storage the change processor writes to. Lookups, saves and deletes of an
 * unknown id reject with NotFoundError; contention rejects with
 * TransientStoreError.
 */
export interface CourseRepository {
  getCourse(id: string): Promise<CourseRecord>;
  getOrCreateCourse(id: string, defaults: Omit<CourseRecord, "id">): Promise<GetOrCreateResult<CourseRecord>>;
  saveCourse(course: CourseRecord): Promise<void>;
  deleteCourse(id: string): Promise<void>;

  getTopic(id: string): Promise<TopicRecord>;
  getOrCreateTopic(id: string, defaults: Omit<TopicRecord, "id">): Promise<GetOrCreateResult<TopicRecord>>;
  saveTopic(topic: TopicRecord): Promise<void>;
  /** Also removes the topic's subtopics. */
  deleteTopic(id: string): Promise<void>;
  listTopics(courseId: string): Promise<TopicRecord[]>;

  getSubTopic(id: string): Promise<SubTopicRecord>;
  getOrCreateSubTopic(id: string, defaults: Omit<SubTopicRecord, "id">): Promise<GetOrCreateResult<SubTopicRecord>>;
  saveSubTopic(subTopic: SubTopicRecord): Promise<void>;
  deleteSubTopic(id: string): Promise<void>;
  listSubTopics(topicId: string): Promise<SubTopicRecord[]>;

  /**
   * Runs `work` against a transactional view. Writes become visible when
   * `work` resolves and are discarded when it rejects.
   */
  transaction<T>(work: (tx: CourseRepository) => Promise<T>): Promise<T>;
}

/** Rebuilds the outline currently held in the store for one course. */
export async function loadOutlineFromRepository(repo: CourseRepository, courseId: string): Promise<CourseOutline> {
  const course = await repo.getCourse(courseId);
  const topics = await repo.listTopics(courseId);
  const withChildren = await Promise.all(
    topics.map(async (topic) => ({
      id: topic.id,
      name: topic.name,
      subTopics: (await repo.listSubTopics(topic.id)).map((s) => ({ id: s.id, name: s.name, topicId: topic.id })),
    }))
  );
  return createCourseOutline({
    courseId: course.id,
    title: course.name,
    courseOutline: course.courseOutline,
    topics: withChildren,
  });
}
