import Database from "better-sqlite3";
import { dirname } from "path";
import { mkdirSync, existsSync } from "fs";
import { PoolTimeoutError } from "../services/errors.js";

export type Db = Database.Database;

function ensureDir(dir: string) {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Open one connection to the database file. WAL lets readers run beside the
 * single writer; a writer that loses a race gets SQLITE_BUSY / SQLITE_BUSY_SNAPSHOT.
 */
export function openDatabase(path: string, busyTimeoutMs = 100): Db {
  ensureDir(dirname(path));
  const db = new Database(path, { timeout: busyTimeoutMs });
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

export interface PoolOptions {
  path: string;
  size: number;
  acquireTimeoutMs: number;
  busyTimeoutMs?: number;
}

interface Waiter {
  resolve: (db: Db) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/** Fixed set of connections to one database file, handed out first come first served. */
export class ConnectionPool {
  private readonly idle: Db[] = [];
  private readonly all: Db[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly acquireTimeoutMs: number;
  private closed = false;

  constructor(options: PoolOptions) {
    if (options.size < 1) throw new Error("Pool size must be at least 1");
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    for (let i = 0; i < options.size; i++) {
      const db = openDatabase(options.path, options.busyTimeoutMs);
      this.all.push(db);
      this.idle.push(db);
    }
  }

  get size(): number {
    return this.all.length;
  }

  get idleCount(): number {
    return this.idle.length;
  }

  acquire(): Promise<Db> {
    if (this.closed) return Promise.reject(new Error("Pool is closed"));
    const db = this.idle.pop();
    if (db) return Promise.resolve(db);
    return new Promise<Db>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const i = this.waiters.indexOf(waiter);
          if (i >= 0) this.waiters.splice(i, 1);
          reject(new PoolTimeoutError(this.acquireTimeoutMs));
        }, this.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  release(db: Db): void {
    if (this.closed) return;
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve(db);
      return;
    }
    this.idle.push(db);
  }

  /** Run fn with a connection; the connection goes back to the pool however fn exits. */
  async use<T>(fn: (db: Db) => Promise<T> | T): Promise<T> {
    const db = await this.acquire();
    try {
      return await fn(db);
    } finally {
      this.release(db);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new Error("Pool is closed"));
    }
    this.idle.length = 0;
    for (const db of this.all) db.close();
  }
}
