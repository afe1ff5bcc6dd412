import { createCourseOutline } from "../src/outline.js";
import type { CourseOutline } from "../src/types.js";

type TopicSpec = [id: string, name: string, subTopics?: [id: string, name: string][]];

export function buildOutline(topics: TopicSpec[], course: { title?: string; courseOutline?: string } = {}): CourseOutline {
  return createCourseOutline({
    courseId: "C1",
    title: course.title ?? "Mathematics",
    courseOutline: course.courseOutline ?? "",
    topics: topics.map(([id, name, subs = []]) => ({
      id,
      name,
      subTopics: subs.map(([subId, subName]) => ({ id: subId, name: subName, topicId: id })),
    })),
  });
}

/** Course-blocks payload in the shape the external source returns. */
export function buildPayload(topics: TopicSpec[], displayName = "Mathematics"): unknown {
  return {
    course_structure: {
      display_name: displayName,
      child_info: {
        children: topics.map(([id, name, subs = []]) => ({
          id,
          display_name: name,
          has_children: subs.length > 0,
          child_info: { children: subs.map(([subId, subName]) => ({ id: subId, display_name: subName })) },
        })),
      },
    },
  };
}

export function summarize(changes: readonly { operation: string; entityType: string; entityId: string }[]): string[] {
  return changes.map((c) => `${c.operation} ${c.entityType} ${c.entityId}`);
}
