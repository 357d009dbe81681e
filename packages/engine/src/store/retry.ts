import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Transient conflict retry — serialization failures and deadlocks
// ---------------------------------------------------------------------------

/** serialization_failure, deadlock_detected */
const TRANSIENT_PG_CODES = new Set(["40001", "40P01"]);

function pgCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null) return null;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return pgCode(err.cause);
  return null;
}

export function isTransientConflict(err: unknown): boolean {
  const code = pgCode(err);
  return code !== null && TRANSIENT_PG_CODES.has(code);
}

/**
 * Run `work` up to `attempts` times, retrying only when the database
 * rejected the transaction as a transient conflict.
 */
export async function withRetry<T>(
  work: () => Promise<T>,
  attempts: number,
  logger?: Logger,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await work();
    } catch (err) {
      if (attempt >= attempts || !isTransientConflict(err)) throw err;
      logger?.warn({ attempt, code: pgCode(err) }, "transaction_retry");
    }
  }
}
