import { z } from "zod";
import { InvalidStructureError } from "./errors.js";
import type { CourseOutline, CourseStructure, SubTopic, Topic } from "./types.js";
import { sha256 } from "./utils.js";

export function createCourseStructure(
  topicIds: Iterable<string>,
  subTopicIds: Iterable<string>,
  subTopicParents: Iterable<readonly [string, string]>
): CourseStructure {
  const topics = new Set(topicIds);
  const subTopics = new Set(subTopicIds);
  const parents = new Map(subTopicParents);

  const violations: string[] = [];
  for (const [subTopicId, topicId] of parents) {
    if (!subTopics.has(subTopicId)) violations.push(`subtopic ${subTopicId} is mapped but not listed`);
    if (!topics.has(topicId)) violations.push(`subtopic ${subTopicId} points at unknown topic ${topicId}`);
  }
  if (violations.length > 0) throw new InvalidStructureError(violations);

  return Object.freeze({ topicIds: topics, subTopicIds: subTopics, subTopicParents: parents });
}

export interface OutlineInput {
  courseId: string;
  title: string;
  courseOutline?: string;
  topics: readonly Topic[];
}

/** Builds a frozen snapshot whose structure is derived from the topic list. */
export function createCourseOutline(input: OutlineInput): CourseOutline {
  const topics = input.topics.map((topic) =>
    Object.freeze({
      id: topic.id,
      name: topic.name,
      subTopics: Object.freeze(
        topic.subTopics.map((sub): SubTopic => Object.freeze({ id: sub.id, name: sub.name, topicId: topic.id }))
      ),
    })
  );

  const structure = createCourseStructure(
    topics.map((t) => t.id),
    topics.flatMap((t) => t.subTopics.map((s) => s.id)),
    topics.flatMap((t) => t.subTopics.map((s): [string, string] => [s.id, t.id]))
  );

  return Object.freeze({
    courseId: input.courseId,
    title: input.title,
    courseOutline: input.courseOutline ?? "",
    structure,
    topics: Object.freeze(topics),
  });
}

export function findTopic(outline: CourseOutline, topicId: string): Topic | undefined {
  return outline.topics.find((t) => t.id === topicId);
}

export function findSubTopic(outline: CourseOutline, subTopicId: string): SubTopic | undefined {
  for (const topic of outline.topics) {
    const sub = topic.subTopics.find((s) => s.id === subTopicId);
    if (sub) return sub;
  }
  return undefined;
}

export const outlineDocumentSchema = z.object({
  courseId: z.string(),
  title: z.string(),
  courseOutline: z.string().default(""),
  topics: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      subTopics: z.array(z.object({ id: z.string(), name: z.string() })).default([]),
    })
  ),
});

export type OutlineDocument = z.infer<typeof outlineDocumentSchema>;

export function toOutlineDocument(outline: CourseOutline): OutlineDocument {
  return {
    courseId: outline.courseId,
    title: outline.title,
    courseOutline: outline.courseOutline,
    topics: outline.topics.map((t) => ({
      id: t.id,
      name: t.name,
      subTopics: t.subTopics.map((s) => ({ id: s.id, name: s.name })),
    })),
  };
}

export function fromOutlineDocument(doc: unknown): CourseOutline {
  const parsed = outlineDocumentSchema.parse(doc);
  return createCourseOutline({
    courseId: parsed.courseId,
    title: parsed.title,
    courseOutline: parsed.courseOutline,
    topics: parsed.topics.map((t) => ({
      id: t.id,
      name: t.name,
      subTopics: t.subTopics.map((s) => ({ ...s, topicId: t.id })),
    })),
  });
}

/** Stable across insertion order of topics and subtopics. */
export function outlineHash(outline: CourseOutline): string {
  const byId = <T extends { id: string }>(a: T, b: T) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
  const canonical = {
    courseId: outline.courseId,
    title: outline.title,
    courseOutline: outline.courseOutline,
    topics: [...outline.topics].sort(byId).map((t) => ({
      id: t.id,
      name: t.name,
      subTopics: [...t.subTopics].sort(byId).map((s) => [s.id, s.name]),
    })),
  };
  return sha256(JSON.stringify(canonical));
}
