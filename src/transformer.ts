import { z } from "zod";
import { createCourseOutline, createCourseStructure } from "./outline.js";
import type { CourseOutline, CourseStructure, SubTopic, Topic } from "./types.js";

// Shapes of the external course-blocks payload. Every level falls back to an
// empty value so malformed nesting degrades to empty collections.
const childInfoSchema = z
  .object({ children: z.array(z.unknown()).catch([]) })
  .catch({ children: [] });

const blockSchema = z.object({
  id: z.string().min(1),
  display_name: z.string().catch(""),
  has_children: z.boolean().catch(false),
  child_info: childInfoSchema.optional(),
});

const payloadSchema = z
  .object({
    course_structure: z
      .object({
        display_name: z.string().optional().catch(undefined),
        course_outline: z.string().optional().catch(undefined),
        child_info: childInfoSchema.optional(),
      })
      .catch({}),
  })
  .catch({ course_structure: {} });

interface TransformResult {
  structure: CourseStructure;
  topics: Topic[];
}

function transformAll(payload: unknown): TransformResult {
  const { course_structure: root } = payloadSchema.parse(payload ?? {});
  const topicIds = new Set<string>();
  const subTopicIds = new Set<string>();
  const parents: [string, string][] = [];
  const topics: Topic[] = [];

  for (const rawTopic of root.child_info?.children ?? []) {
    const topicBlock = blockSchema.safeParse(rawTopic);
    if (!topicBlock.success) continue;
    const topicId = topicBlock.data.id;
    if (topicIds.has(topicId)) {
      console.warn(`[TRANSFORM] Duplicate topic ${topicId} ignored`);
      continue;
    }

    const subTopics: SubTopic[] = [];
    if (topicBlock.data.has_children) {
      for (const rawSub of topicBlock.data.child_info?.children ?? []) {
        const subBlock = blockSchema.safeParse(rawSub);
        if (!subBlock.success) continue;
        if (subTopicIds.has(subBlock.data.id)) {
          console.warn(`[TRANSFORM] Duplicate subtopic ${subBlock.data.id} ignored`);
          continue;
        }
        subTopicIds.add(subBlock.data.id);
        parents.push([subBlock.data.id, topicId]);
        subTopics.push({ id: subBlock.data.id, name: subBlock.data.display_name, topicId });
      }
    }

    topicIds.add(topicId);
    topics.push({ id: topicId, name: topicBlock.data.display_name, subTopics });
  }

  return { structure: createCourseStructure(topicIds, subTopicIds, parents), topics };
}

export function transformStructure(payload: unknown): CourseStructure {
  return transformAll(payload).structure;
}

export function transformTopics(payload: unknown): Topic[] {
  return transformAll(payload).topics;
}

/**
 * Single-pass transformation into a complete outline. The course is named by
 * `title`; the payload's display name is used only when `title` is empty.
 */
export function transformToCourseOutline(payload: unknown, courseId: string, title: string): CourseOutline {
  const { topics } = transformAll(payload);
  const { course_structure: root } = payloadSchema.parse(payload ?? {});
  return createCourseOutline({
    courseId,
    title: title || (root.display_name ?? ""),
    courseOutline: root.course_outline ?? "",
    topics,
  });
}
