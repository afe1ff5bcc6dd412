import type { ChangeData } from "./types.js";

export type StoredEntity = "Course" | "Topic" | "SubTopic";

export class InvalidStructureError extends Error {
  public readonly violations: string[];

  public constructor(violations: string[]) {
    super(`Invalid course structure: ${violations.join("; ")}`);
    this.name = "InvalidStructureError";
    this.violations = violations;
  }
}

/** Payload variant does not match the entity being changed. Never caught per operation. */
export class ShapeMismatchError extends Error {
  public readonly expected: ChangeData["kind"];
  public readonly actual: ChangeData["kind"];

  public constructor(expected: ChangeData["kind"], actual: ChangeData["kind"], operation: string) {
    super(`Expected ${expected} change data but got ${actual} data when ${operation}`);
    this.name = "ShapeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class NotFoundError extends Error {
  public readonly entity: StoredEntity;
  public readonly id: string;

  public constructor(entity: StoredEntity, id: string) {
    super(`${entity} ${id} does not exist`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

/** Lock contention or unavailability in the storage layer; safe to retry. */
export class TransientStoreError extends Error {
  public constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "TransientStoreError";
  }
}
