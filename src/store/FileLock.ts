/**
 * Cross-process advisory lock on a sibling `.lock` file.
 *
 * Acquisition creates the lock file exclusively (`wx`) and retries until a
 * deadline. Callers inside one process are additionally serialized through a
 * per-path promise chain, so the file is only contended between processes.
 * A lock left behind by a process that no longer exists, or held longer than
 * `staleMs`, is reclaimed.
 */

import { mkdir, readFile, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { LockTimeoutError } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('file-lock');

export interface FileLockOptions {
  /** Max total wait before LockTimeoutError (default: 10000) */
  timeoutMs?: number;
  /** Delay between attempts on a held lock (default: 25) */
  retryIntervalMs?: number;
  /** Age after which a held lock is considered abandoned (default: 60000) */
  staleMs?: number;
}

type LockOwner = {
  pid: number;
  acquiredAt: number;
};

const inProcessTails = new Map<string, Promise<void>>();

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else.
    return isErrnoException(err) && err.code === 'EPERM';
  }
}

function parseOwner(raw: string): LockOwner | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'pid' in parsed &&
      'acquiredAt' in parsed &&
      typeof parsed.pid === 'number' &&
      typeof parsed.acquiredAt === 'number'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
    }
  } catch {
    return null;
  }
  return null;
}

export class FileLock {
  readonly lockPath: string;
  private readonly timeoutMs: number;
  private readonly retryIntervalMs: number;
  private readonly staleMs: number;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.lockPath = lockPath;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryIntervalMs = options.retryIntervalMs ?? 25;
    this.staleMs = options.staleMs ?? 60_000;
  }

  /**
   * Run `fn` while holding the lock. The lock is released on every exit path.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.timeoutMs;

    const previous = inProcessTails.get(this.lockPath) ?? Promise.resolve();
    let releaseTurn: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      releaseTurn = resolve;
    });
    const tail = previous.then(() => turn);
    inProcessTails.set(this.lockPath, tail);

    try {
      await this.waitForTurn(previous, deadline);
      await this.acquire(deadline);
      try {
        return await fn();
      } finally {
        await this.release();
      }
    } finally {
      releaseTurn();
      if (inProcessTails.get(this.lockPath) === tail) {
        inProcessTails.delete(this.lockPath);
      }
    }
  }

  private async waitForTurn(previous: Promise<void>, deadline: number): Promise<void> {
    const remaining = deadline - Date.now();
    const controller = new AbortController();
    const timedOut = Symbol('timeout');
    try {
      const outcome = await Promise.race([
        previous,
        sleep(Math.max(0, remaining), timedOut, { signal: controller.signal }),
      ]);
      if (outcome === timedOut) {
        throw new LockTimeoutError(this.lockPath, this.timeoutMs);
      }
    } finally {
      controller.abort();
    }
  }

  private async acquire(deadline: number): Promise<void> {
    await mkdir(dirname(this.lockPath), { recursive: true });
    const owner: LockOwner = { pid: process.pid, acquiredAt: Date.now() };

    for (;;) {
      try {
        await writeFile(this.lockPath, JSON.stringify(owner), { flag: 'wx' });
        return;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'EEXIST') {
          throw err;
        }
      }

      if (await this.reclaimIfStale()) {
        continue;
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.lockPath, this.timeoutMs);
      }
      await sleep(this.retryIntervalMs);
    }
  }

  private async reclaimIfStale(): Promise<boolean> {
    let raw: string;
    try {
      raw = await readFile(this.lockPath, 'utf-8');
    } catch (err) {
      // Released between our attempt and this read.
      if (isErrnoException(err) && err.code === 'ENOENT') return true;
      throw err;
    }

    const owner = parseOwner(raw);
    // An unreadable owner may be a writer between create and write; judge it by mtime.
    const acquiredAt = owner?.acquiredAt ?? (await this.lockMtime());
    if (acquiredAt === null) return true;
    const abandoned = owner !== null && owner.pid !== process.pid && !isProcessAlive(owner.pid);
    const expired = Date.now() - acquiredAt > this.staleMs;
    if (!abandoned && !expired) {
      return false;
    }

    log.warn({ lockPath: this.lockPath, owner }, 'Reclaiming stale lock');
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
    }
    return true;
  }

  private async lockMtime(): Promise<number | null> {
    try {
      return (await stat(this.lockPath)).mtimeMs;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  private async release(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        log.warn({ lockPath: this.lockPath }, 'Lock file already removed on release');
        return;
      }
      throw err;
    }
  }
}
