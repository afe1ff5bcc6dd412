import axios from "axios";
import { z } from "zod";
import { appConfig } from "./config.js";
import type { FailedChange } from "./processor.js";
import { getStoredTelegramChatId, saveTelegramChatId } from "./store.js";
import type { SyncTarget } from "./types.js";
import { describeChange } from "./utils.js";

const MAX_LINES = 50;

const apiBase = (token: string) => `https://api.telegram.org/bot${token}`;

const updatesSchema = z.object({
  result: z
    .array(z.object({ message: z.object({ chat: z.object({ id: z.number(), type: z.string() }) }).optional() }))
    .catch([]),
});

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export async function ensureTelegramChatId(token: string): Promise<string> {
  if (appConfig.TELEGRAM_CHAT_ID) return appConfig.TELEGRAM_CHAT_ID;

  const stored = await getStoredTelegramChatId();
  if (stored) return stored;

  // Attempt to auto-capture chat ID from recent updates
  const { data } = await axios.get<unknown>(`${apiBase(token)}/getUpdates`, { timeout: 15000 });
  const updates = updatesSchema.safeParse(data);
  const lastPrivate = (updates.success ? updates.data.result : [])
    .map((u) => u.message?.chat)
    .filter((c) => c?.type === "private")
    .pop();

  if (lastPrivate) {
    const chatId = String(lastPrivate.id);
    await saveTelegramChatId(chatId);
    return chatId;
  }

  throw new Error("TELEGRAM_CHAT_ID not set and could not auto-detect. Send /start to your bot then rerun.");
}

export async function sendTelegramMessage(token: string, chatId: string, html: string): Promise<void> {
  await axios.post(
    `${apiBase(token)}/sendMessage`,
    {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    },
    { timeout: 20000 }
  );
}

export function buildFailureMessage(courseName: string, failed: readonly FailedChange[]): string {
  const lines = failed.slice(0, MAX_LINES).map((f) => `✖ ${describeChange(f.change)}: ${f.reason}`);
  if (failed.length > MAX_LINES) lines.push(`… and ${failed.length - MAX_LINES} more`);
  return [
    `<b>${escapeHtml(courseName)}</b>`,
    `${failed.length} change(s) could not be applied and will be replayed`,
    "",
    ...lines.map((l) => escapeHtml(l)),
  ].join("\n");
}

/** Failure alert hook for syncCourse; null when no bot token is configured. */
export function createTelegramNotifier(): ((target: SyncTarget, failed: FailedChange[]) => Promise<void>) | null {
  const token = appConfig.TELEGRAM_BOT_TOKEN;
  if (!token) return null;
  return async (target, failed) => {
    const chatId = await ensureTelegramChatId(token);
    await sendTelegramMessage(token, chatId, buildFailureMessage(target.name, failed));
  };
}
