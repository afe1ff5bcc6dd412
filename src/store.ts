import fs from "node:fs";
import path from "node:path";
import type { Firestore } from "firebase-admin/firestore";
import { z } from "zod";
import { firestore } from "./firebase.js";
import { appConfig } from "./config.js";
import { FileCourseRepository } from "./file-repository.js";
import { FirestoreCourseRepository } from "./firestore-repository.js";
import type { CourseRepository } from "./repository.js";
import { parseSyncState, type SyncState, type SyncStateStore } from "./sync-state.js";

const dataDir = path.resolve(appConfig.DATA_DIR);
const fsStatePath = path.join(dataDir, "sync-state.json");
const fsSettingsPath = path.join(dataDir, "settings.json");
const fsRepositoryPath = path.join(dataDir, "courses.json");

const jsonObject = z.record(z.unknown());

function readJson(p: string): Record<string, unknown> {
  if (!fs.existsSync(p)) return {};
  const parsed = jsonObject.safeParse(JSON.parse(fs.readFileSync(p, "utf8")));
  if (!parsed.success) {
    console.warn(`[STORE] ${p} is not a JSON object, starting empty`);
    return {};
  }
  return parsed.data;
}

function writeJson(p: string, data: unknown): void {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(data, null, 2), "utf8");
}

export class FileSyncStateStore implements SyncStateStore {
  constructor(private readonly filePath: string) {}

  async get(courseId: string): Promise<SyncState | null> {
    const raw = readJson(this.filePath)[courseId];
    return raw === undefined ? null : parseSyncState(raw);
  }

  async save(state: SyncState): Promise<void> {
    const all = readJson(this.filePath);
    all[state.courseId] = state;
    writeJson(this.filePath, all);
  }
}

export class FirestoreSyncStateStore implements SyncStateStore {
  constructor(
    private readonly db: Firestore,
    private readonly collection: string
  ) {}

  async get(courseId: string): Promise<SyncState | null> {
    const doc = await this.db.collection(this.collection).doc(courseId).get();
    if (!doc.exists) return null;
    return parseSyncState(doc.data());
  }

  async save(state: SyncState): Promise<void> {
    // Replace the whole document so cleared pending lists do not linger
    await this.db.collection(this.collection).doc(state.courseId).set(state);
  }
}

export function createSyncStateStore(): SyncStateStore {
  if (firestore) return new FirestoreSyncStateStore(firestore, appConfig.FIRESTORE_STATE_COLLECTION);
  return new FileSyncStateStore(fsStatePath);
}

export function createCourseRepository(): CourseRepository {
  if (firestore) {
    return new FirestoreCourseRepository(firestore, {
      courses: appConfig.FIRESTORE_COURSES_COLLECTION,
      topics: appConfig.FIRESTORE_TOPICS_COLLECTION,
      subTopics: appConfig.FIRESTORE_SUBTOPICS_COLLECTION,
    });
  }
  console.log(`[STORE] Firestore not configured, using ${fsRepositoryPath}`);
  return FileCourseRepository.open(fsRepositoryPath);
}

const settingsCollection = (db: Firestore) => db.collection(appConfig.FIRESTORE_SETTINGS_COLLECTION);
const telegramSettings = z.object({ chatId: z.string() });

export async function getStoredTelegramChatId(): Promise<string | null> {
  if (firestore) {
    const doc = await settingsCollection(firestore).doc("telegram").get();
    if (!doc.exists) return null;
    const parsed = telegramSettings.safeParse(doc.data());
    return parsed.success ? parsed.data.chatId : null;
  }
  const parsed = telegramSettings.safeParse(readJson(fsSettingsPath).telegram);
  return parsed.success ? parsed.data.chatId : null;
}

export async function saveTelegramChatId(chatId: string): Promise<void> {
  if (firestore) {
    await settingsCollection(firestore).doc("telegram").set({ chatId }, { merge: true });
    return;
  }
  const settings = readJson(fsSettingsPath);
  settings.telegram = { chatId };
  writeJson(fsSettingsPath, settings);
}
