import type { Logger } from "pino";
import type { ConnectionPool, Db } from "./index.js";
import { TransactionError } from "../services/errors.js";

export interface RetryPolicy {
  /** Attempts before giving up with TransactionError. */
  attempts: number;
  /** Wait before the second attempt (ms). */
  intervalFirstMs: number;
  /** Each following wait is the previous one times this. */
  intervalFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 10,
  intervalFirstMs: 10,
  intervalFactor: 2,
};

/** SQLITE_BUSY and its extended codes: another connection won the race for the write lock or snapshot. */
export function isSerializationFailure(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const code = err.code;
  return typeof code === "string" && code.startsWith("SQLITE_BUSY");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SerializableOptions {
  pool: ConnectionPool;
  retry: RetryPolicy;
  log: Logger;
  /** Replaced in tests to observe backoff. */
  wait?: (ms: number) => Promise<void>;
}

/**
 * Run work inside one SQLite transaction on a pooled connection, retrying the
 * whole unit on serialization failures with exponential backoff. Anything
 * else rolls back and is rethrown as is.
 */
export async function runSerializable<T>(
  options: SerializableOptions,
  work: (db: Db) => Promise<T> | T,
): Promise<T> {
  const { pool, retry, log } = options;
  const wait = options.wait ?? sleep;
  return pool.use(async (db) => {
    let interval = retry.intervalFirstMs;
    for (let attempt = 1; ; attempt++) {
      try {
        db.exec("BEGIN");
        const result = await work(db);
        db.exec("COMMIT");
        return result;
      } catch (err) {
        if (db.inTransaction) db.exec("ROLLBACK");
        if (!isSerializationFailure(err)) throw err;
        if (attempt >= retry.attempts) {
          log.error({ err, attempts: attempt }, "Serializable transaction gave up");
          throw new TransactionError(attempt, { cause: err });
        }
        log.debug({ attempt, interval }, "Serialization conflict, retrying");
        await wait(interval);
        interval *= retry.intervalFactor;
      }
    }
  });
}
