import cron from "node-cron";
import { appConfig } from "./config.js";
import { loadSyncTargets } from "./courses.js";
import { fetchCoursePayload } from "./edx.js";
import { createCourseRepository, createSyncStateStore } from "./store.js";
import { runSyncOnce, type CourseSyncResult, type SyncDependencies, type SyncOptions } from "./sync.js";
import { createTelegramNotifier } from "./telegram.js";
import { errorMessage } from "./utils.js";

function summarize(results: CourseSyncResult[]): string {
  const counts = new Map<string, number>();
  for (const r of results) counts.set(r.status, (counts.get(r.status) ?? 0) + 1);
  return [...counts].map(([status, n]) => `${status}=${n}`).join(" ") || "no courses";
}

async function main(): Promise<void> {
  console.log(`[BOT] Course sync starting. Schedule: ${appConfig.CRON_SCHEDULE}, mode: ${appConfig.SYNC_MODE}`);

  const targets = loadSyncTargets(appConfig.COURSES_FILE);
  const deps: SyncDependencies = {
    repository: createCourseRepository(),
    states: createSyncStateStore(),
    fetchPayload: fetchCoursePayload,
    notifyFailures: createTelegramNotifier() ?? undefined,
  };
  const options: SyncOptions = {
    mode: appConfig.SYNC_MODE,
    retry: { attempts: appConfig.STORE_RETRY_ATTEMPTS, baseDelayMs: appConfig.STORE_RETRY_BASE_DELAY_MS },
    concurrency: appConfig.SYNC_CONCURRENCY,
    maxReplayAttempts: appConfig.SYNC_MAX_REPLAY_ATTEMPTS,
    baselineFromStore: appConfig.SYNC_BASELINE_FROM_STORE,
  };

  const runAndReport = async (label: string) => {
    try {
      const results = await runSyncOnce(targets, deps, options);
      console.log(`[BOT] ${label} run completed: ${summarize(results)}`);
    } catch (err) {
      console.error(`[BOT] ${label} run error:`, errorMessage(err));
    }
  };

  // Run immediately at startup
  await runAndReport("Initial");

  cron.schedule(appConfig.CRON_SCHEDULE, async () => {
    console.log(`[BOT] Scheduled run started at ${new Date().toISOString()}`);
    await runAndReport("Scheduled");
  });
}

main().catch((e) => {
  console.error("[BOT] Fatal:", e);
  process.exit(1);
});
