import crypto from "node:crypto";
import { TransientStoreError } from "./errors.js";
import type { ChangeOperation } from "./types.js";

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function changeKey(change: ChangeOperation): string {
  return `${change.entityType}:${change.entityId}`;
}

export function describeChange(change: ChangeOperation): string {
  return `${change.operation} ${change.entityType} ${change.entityId}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
}

export const noRetry: RetryOptions = { attempts: 1, baseDelayMs: 0 };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry an operation with exponential backoff while it fails with
 * TransientStoreError. Any other error is rethrown immediately.
 */
export async function retryTransient<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  label = "store call"
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  for (let i = 1; ; i++) {
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof TransientStoreError) || i >= attempts) throw err;
      const delay = options.baseDelayMs * Math.pow(2, i - 1) + Math.random() * options.baseDelayMs;
      console.warn(`[STORE] ${label} hit contention (attempt ${i}/${attempts}), retrying in ${Math.round(delay)}ms`);
      await sleep(delay);
    }
  }
}
