import fs from "node:fs";
import { z } from "zod";
import type { SyncTarget } from "./types.js";

const targetSchema = z.object({
  courseId: z.string().min(1),
  courseKey: z.string().min(1),
  name: z.string(),
  examinationLevel: z.string().min(1),
  academicClass: z.string().min(1),
});

const targetsSchema = z.array(targetSchema).superRefine((targets, ctx) => {
  const seen = new Set<string>();
  for (const [i, t] of targets.entries()) {
    if (seen.has(t.courseId)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "courseId"], message: `duplicate course ${t.courseId}` });
    }
    seen.add(t.courseId);
  }
});

export function parseSyncTargets(raw: unknown): SyncTarget[] {
  const parsed = targetsSchema.safeParse(raw);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid course list: ${errs}`);
  }
  return parsed.data;
}

export function loadSyncTargets(filePath: string): SyncTarget[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Course list not found at: ${filePath}`);
  }
  return parseSyncTargets(JSON.parse(fs.readFileSync(filePath, "utf8")));
}
