export type OperationType = "CREATE" | "UPDATE" | "DELETE";
export type EntityType = "COURSE" | "TOPIC" | "SUBTOPIC";

export interface SubTopic {
  readonly id: string; // block id from the external outline
  readonly name: string;
  readonly topicId: string;
}

export interface Topic {
  readonly id: string;
  readonly name: string;
  readonly subTopics: readonly SubTopic[];
}

export interface CourseStructure {
  readonly topicIds: ReadonlySet<string>;
  readonly subTopicIds: ReadonlySet<string>;
  readonly subTopicParents: ReadonlyMap<string, string>; // subtopic id -> topic id
}

export interface CourseOutline {
  readonly courseId: string;
  readonly title: string;
  readonly courseOutline: string;
  readonly structure: CourseStructure;
  readonly topics: readonly Topic[];
}

export interface CourseChangeData {
  readonly kind: "course";
  readonly name: string;
  readonly courseOutline: string;
}

export interface TopicChangeData {
  readonly kind: "topic";
  readonly name: string;
}

export interface SubTopicChangeData {
  readonly kind: "subtopic";
  readonly name: string;
  readonly topicId: string;
}

export type ChangeData = CourseChangeData | TopicChangeData | SubTopicChangeData;

export interface ChangeOperation {
  readonly operation: OperationType;
  readonly entityType: EntityType;
  readonly entityId: string;
  readonly data: ChangeData;
}

export type SyncMode = "best_effort" | "strict";

export interface SyncTarget {
  courseId: string;
  courseKey: string; // key used by the external source
  name: string;
  examinationLevel: string;
  academicClass: string;
}
