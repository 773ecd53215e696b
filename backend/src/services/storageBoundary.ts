import { isStorageError, type StorageError } from "../repositories/chatRepository";
import { err, type Result } from "./chatTypes";

export type RetryPolicy = Readonly<{
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}>;

const DEFAULT_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 10;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a storage-backed operation, retrying serialization failures with exponential
 * backoff and translating every other StorageError into a ServiceError. `onConflict`
 * lets the caller claim specific violations (e.g. a membership pair) before the
 * CONSTRAINT_VIOLATION fallback. Errors that are not StorageErrors propagate.
 */
export async function withStorageBoundary<T>(
  work: () => Promise<Result<T>>,
  policy: RetryPolicy = {},
  onConflict?: (e: StorageError) => Result<T> | null
): Promise<Result<T>> {
  const attempts = Math.max(1, policy.attempts ?? DEFAULT_ATTEMPTS);
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const sleep = policy.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await work();
    } catch (e) {
      if (!isStorageError(e)) throw e;
      if (e.kind === "serialization_failure") {
        if (attempt < attempts) {
          await sleep(baseDelayMs * 2 ** (attempt - 1));
          continue;
        }
        return err("CONSTRAINT_VIOLATION", "Storage is busy; retries exhausted.", { attempts });
      }
      const claimed = onConflict ? onConflict(e) : null;
      if (claimed) return claimed;
      return err("CONSTRAINT_VIOLATION", "Storage integrity check failed.", {
        kind: e.kind,
        ...(e.constraint ? { constraint: e.constraint } : {})
      });
    }
  }
}
