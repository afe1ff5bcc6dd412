import axios from "axios";
import { appConfig } from "./config.js";
import type { SyncTarget } from "./types.js";

export function outlineUrl(courseKey: string, baseUrl = appConfig.EDX_BASE_URL, pathTemplate = appConfig.EDX_OUTLINE_PATH): string {
  const path = pathTemplate.replace("{courseKey}", encodeURIComponent(courseKey));
  return new URL(path, baseUrl).toString();
}

/** Raw course-blocks document for one course; shape is checked by the transformer. */
export async function fetchCoursePayload(target: SyncTarget): Promise<unknown> {
  const url = outlineUrl(target.courseKey);
  const headers: Record<string, string> = { Accept: "application/json" };
  if (appConfig.EDX_ACCESS_TOKEN) headers.Authorization = `Bearer ${appConfig.EDX_ACCESS_TOKEN}`;

  console.log(`[EDX] Fetching outline for ${target.courseKey}`);
  const { data } = await axios.get<unknown>(url, { headers, timeout: appConfig.EDX_TIMEOUT_MS });
  return data;
}
