import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import fs from "node:fs";

loadDotenv();

const positiveInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => Math.max(1, parseInt(v, 10) || fallback));

const schema = z.object({
  EDX_BASE_URL: z.string().url().default("https://lms.example.org"),
  EDX_OUTLINE_PATH: z.string().default("/api/course_structure/v1/{courseKey}"),
  EDX_ACCESS_TOKEN: z.string().optional(),
  EDX_TIMEOUT_MS: positiveInt(20000),
  TELEGRAM_BOT_TOKEN: z.string().min(10).optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  CRON_SCHEDULE: z.string().default("*/15 * * * *"),
  SYNC_CONCURRENCY: positiveInt(3),
  SYNC_MODE: z.enum(["best_effort", "strict"]).default("best_effort"),
  SYNC_MAX_REPLAY_ATTEMPTS: positiveInt(5),
  SYNC_BASELINE_FROM_STORE: z
    .string()
    .default("false")
    .transform((v) => v.toLowerCase() === "true"),
  STORE_RETRY_ATTEMPTS: positiveInt(3),
  STORE_RETRY_BASE_DELAY_MS: positiveInt(200),
  COURSES_FILE: z.string().default("./config/courses.json"),
  DATA_DIR: z.string().default("./data"),
  FIRESTORE_STATE_COLLECTION: z.string().default("course_sync_state"),
  FIRESTORE_COURSES_COLLECTION: z.string().default("courses"),
  FIRESTORE_TOPICS_COLLECTION: z.string().default("topics"),
  FIRESTORE_SUBTOPICS_COLLECTION: z.string().default("subtopics"),
  FIRESTORE_SETTINGS_COLLECTION: z.string().default("settings"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  // Empty strings from .env templates count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = schema.safeParse(cleaned);
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}

export const appConfig = parseConfig(process.env);

if (!fs.existsSync(appConfig.DATA_DIR)) {
  fs.mkdirSync(appConfig.DATA_DIR, { recursive: true });
}
