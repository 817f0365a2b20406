import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { FileLock } from './FileLock.js';
import { LockTimeoutError } from '../core/errors.js';

describe('FileLock', () => {
  const testDir = resolve(process.cwd(), 'tmp/file-lock-test');
  const lockPath = resolve(testDir, 'state.json.lock');

  beforeEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('writes the holder pid while held and removes the file afterwards', async () => {
    const lock = new FileLock(lockPath);
    const raw = await lock.withLock(() => readFile(lockPath, 'utf-8'));
    expect(JSON.parse(raw)).toMatchObject({ pid: process.pid });
    expect(existsSync(lockPath)).toBe(false);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new FileLock(lockPath);
    await expect(lock.withLock(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(existsSync(lockPath)).toBe(false);
  });

  it('serializes callers in the same process', async () => {
    const events: string[] = [];
    const first = new FileLock(lockPath);
    const second = new FileLock(lockPath);

    await Promise.all([
      first.withLock(async () => {
        events.push('first:start');
        await new Promise((r) => setTimeout(r, 30));
        events.push('first:end');
      }),
      second.withLock(async () => {
        events.push('second:start');
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('times out while another live process holds the lock', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: process.ppid, acquiredAt: Date.now() }));
    const lock = new FileLock(lockPath, { timeoutMs: 100 });

    await expect(lock.withLock(async () => 'never')).rejects.toBeInstanceOf(LockTimeoutError);
    expect(existsSync(lockPath)).toBe(true);
  });

  it('reclaims a lock whose holder no longer exists', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: 2147483646, acquiredAt: Date.now() }));
    const lock = new FileLock(lockPath, { timeoutMs: 500 });

    await expect(lock.withLock(async () => 'acquired')).resolves.toBe('acquired');
  });

  it('reclaims a lock held longer than the stale threshold', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: process.ppid, acquiredAt: Date.now() - 120_000 }));
    const lock = new FileLock(lockPath, { timeoutMs: 500, staleMs: 60_000 });

    await expect(lock.withLock(async () => 'acquired')).resolves.toBe('acquired');
  });

  it('lets later callers proceed after an earlier one times out', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: process.ppid, acquiredAt: Date.now() }));
    const blocked = new FileLock(lockPath, { timeoutMs: 50 });
    await expect(blocked.withLock(async () => 'never')).rejects.toBeInstanceOf(LockTimeoutError);

    await rm(lockPath);
    const next = new FileLock(lockPath, { timeoutMs: 500 });
    await expect(next.withLock(async () => 'ok')).resolves.toBe('ok');
  });
});
