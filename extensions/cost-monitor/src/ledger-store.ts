/**
 * Ledger persistence behind a small key-value interface with a scoped
 * lock, so the read-decide-write sequence of the pipeline is serialised
 * across overlapping runs.
 */

import { mkdir, open, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { Logger } from "../../../src/logging/logger.js";
import { CorruptStateError, errorMessage } from "./errors.js";
import { parseLedger, serializeLedger } from "./ledger.js";
import type { AlertCategory, AlertLedger } from "./types.js";

export interface AlertLedgerStore {
  load(): Promise<AlertLedger>;
  get(category: AlertCategory): Promise<number | undefined>;
  put(category: AlertCategory, epochSeconds: number): Promise<void>;
  /** Run `fn` holding the store's exclusive lock. Not reentrant. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (!isErrno(err, "ENOENT")) throw err;
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// File store
// =============================================================================

export type FileAlertLedgerStoreOptions = {
  filePath: string;
  logger?: Logger;
  /** A lock file older than this is considered abandoned (default 30 s). */
  staleLockMs?: number;
  /** Give up waiting for the lock after this long (default 10 s). */
  lockTimeoutMs?: number;
  lockRetryMs?: number;
};

export class LockTimeoutError extends Error {
  constructor(public readonly lockPath: string) {
    super(`Timed out waiting for lock ${lockPath}`);
    this.name = "LockTimeoutError";
  }
}

export class FileAlertLedgerStore implements AlertLedgerStore {
  readonly filePath: string;
  readonly lockPath: string;
  private readonly logger?: Logger;
  private readonly staleLockMs: number;
  private readonly lockTimeoutMs: number;
  private readonly lockRetryMs: number;

  constructor(options: FileAlertLedgerStoreOptions) {
    this.filePath = options.filePath;
    this.lockPath = `${options.filePath}.lock`;
    this.logger = options.logger;
    this.staleLockMs = options.staleLockMs ?? 30_000;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.lockRetryMs = options.lockRetryMs ?? 50;
  }

  /** A missing, unreadable or corrupt file loads as an empty ledger. */
  async load(): Promise<AlertLedger> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (!isErrno(err, "ENOENT")) {
        this.logger?.warn(`Alert state unreadable, treating as empty: ${errorMessage(err)}`, { path: this.filePath });
      }
      return new Map();
    }

    try {
      return parseLedger(text);
    } catch (err) {
      if (!(err instanceof CorruptStateError)) throw err;
      this.logger?.warn(`Alert state corrupt, treating as empty: ${err.message}`, { path: this.filePath });
      return new Map();
    }
  }

  async get(category: AlertCategory): Promise<number | undefined> {
    return (await this.load()).get(category);
  }

  async put(category: AlertCategory, epochSeconds: number): Promise<void> {
    const ledger = await this.load();
    ledger.set(category, epochSeconds);

    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, serializeLedger(ledger), "utf8");
    await rename(tmpPath, this.filePath);
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async acquire(): Promise<void> {
    await mkdir(dirname(this.lockPath), { recursive: true });
    const started = Date.now();

    for (;;) {
      try {
        const handle = await open(this.lockPath, "wx");
        await handle.writeFile(`${process.pid}\n`);
        await handle.close();
        return;
      } catch (err) {
        if (!isErrno(err, "EEXIST")) throw err;
      }

      if (await this.takeOverStaleLock()) continue;
      if (Date.now() - started >= this.lockTimeoutMs) throw new LockTimeoutError(this.lockPath);
      await sleep(this.lockRetryMs);
    }
  }

  private async isStale(path: string): Promise<boolean> {
    const info = await stat(path);
    return Date.now() - info.mtimeMs >= this.staleLockMs;
  }

  /**
   * Remove an abandoned lock. Takeovers are serialised through a second
   * `O_EXCL` guard file and the lock is judged stale again while holding it,
   * so a lock that another waiter has just taken over is never removed.
   */
  private async takeOverStaleLock(): Promise<boolean> {
    try {
      if (!(await this.isStale(this.lockPath))) return false;
    } catch (err) {
      // Released between our open() and stat(): retry immediately.
      if (isErrno(err, "ENOENT")) return true;
      throw err;
    }

    const guardPath = `${this.lockPath}.takeover`;
    try {
      const guard = await open(guardPath, "wx");
      await guard.close();
    } catch (err) {
      if (!isErrno(err, "EEXIST")) throw err;
      await this.clearAbandonedGuard(guardPath);
      return false;
    }

    try {
      if (!(await this.isStale(this.lockPath))) return false;
      this.logger?.warn("Removing stale alert state lock", { path: this.lockPath });
      await removeIfPresent(this.lockPath);
      return true;
    } catch (err) {
      if (isErrno(err, "ENOENT")) return true;
      throw err;
    } finally {
      await removeIfPresent(guardPath);
    }
  }

  /** A guard left behind by a process that died mid-takeover. */
  private async clearAbandonedGuard(guardPath: string): Promise<void> {
    try {
      if (await this.isStale(guardPath)) await removeIfPresent(guardPath);
    } catch (err) {
      if (!isErrno(err, "ENOENT")) throw err;
    }
  }

  private async release(): Promise<void> {
    await removeIfPresent(this.lockPath);
  }
}

// =============================================================================
// In-memory store
// =============================================================================

export class MemoryAlertLedgerStore implements AlertLedgerStore {
  private readonly ledger: AlertLedger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(initial?: Iterable<[AlertCategory, number]>) {
    this.ledger = new Map(initial);
  }

  async load(): Promise<AlertLedger> {
    return new Map(this.ledger);
  }

  async get(category: AlertCategory): Promise<number | undefined> {
    return this.ledger.get(category);
  }

  async put(category: AlertCategory, epochSeconds: number): Promise<void> {
    this.ledger.set(category, epochSeconds);
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.catch(() => undefined);
    return run;
  }

  snapshot(): AlertLedger {
    return new Map(this.ledger);
  }
}
