import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { StateStore } from './StateStore.js';
import { nextBackupPath } from './jsonFile.js';

describe('StateStore', () => {
  const testDir = resolve(process.cwd(), 'tmp/state-store-test');
  const filePath = resolve(testDir, 'state.json');

  beforeEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('reads a missing file as the defaults', async () => {
    const store = new StateStore(filePath, { defaults: { mode: 'idle' } });
    expect(await store.read()).toEqual({ mode: 'idle' });
    expect(existsSync(filePath)).toBe(false);
  });

  it('shallow-merges writes into the document', async () => {
    const store = new StateStore(filePath);
    await store.write({ a: 1, nested: { x: 1 } });
    await store.write({ b: 'two', nested: { y: 2 } });

    expect(await store.read()).toEqual({ a: 1, b: 'two', nested: { y: 2 } });
  });

  it('is idempotent when the same partial is written twice', async () => {
    const store = new StateStore(filePath);
    await store.write({ DG4202_last_alive: 1000 });
    const once = await store.read();
    await store.write({ DG4202_last_alive: 1000 });

    expect(await store.read()).toEqual(once);
  });

  it('sees writes made through another instance on the same file', async () => {
    const first = new StateStore(filePath);
    const second = new StateStore(filePath);

    await first.write({ a: 1 });
    await second.write({ b: 2 });

    expect(await first.read()).toEqual({ a: 1, b: 2 });
  });

  it('moves a corrupt file to exactly one numbered backup and reads empty', async () => {
    await writeFile(filePath, '{"a": 1,');
    const store = new StateStore(filePath);

    expect(await store.read()).toEqual({});
    const files = (await readdir(testDir)).sort();
    expect(files).toEqual(['state.bak_1']);
  });

  it('treats a non-object document as corrupt', async () => {
    await writeFile(filePath, '[1, 2, 3]');
    const store = new StateStore(filePath);

    expect(await store.read()).toEqual({});
    expect(existsSync(resolve(testDir, 'state.bak_1'))).toBe(true);
  });

  it('picks the first free backup number', async () => {
    await writeFile(resolve(testDir, 'state.bak_1'), 'older');
    await writeFile(filePath, 'not json');
    const store = new StateStore(filePath);

    await store.read();
    expect(existsSync(resolve(testDir, 'state.bak_2'))).toBe(true);
    expect(await nextBackupPath(filePath)).toBe(resolve(testDir, 'state.bak_3'));
  });

  it('returns a copy that does not alias stored data', async () => {
    const store = new StateStore(filePath);
    await store.write({ list: [1] });
    const doc = await store.read();
    doc['list'] = [];

    expect(await store.get('list')).toEqual([1]);
  });

  it('applies concurrent updates without losing any', async () => {
    const store = new StateStore(filePath);
    await Promise.all(
      Array.from({ length: 10 }, () =>
        store.update((draft) => {
          const current = typeof draft['count'] === 'number' ? draft['count'] : 0;
          draft['count'] = current + 1;
        })
      )
    );

    expect(await store.get('count')).toBe(10);
  });

  it('removes keys and reports which were present', async () => {
    const store = new StateStore(filePath);
    await store.write({ a: 1, b: 2 });

    expect(await store.remove(['a', 'missing'])).toEqual(['a']);
    expect(await store.read()).toEqual({ b: 2 });
  });

  it('leaves the file untouched when an update changes nothing', async () => {
    const store = new StateStore(filePath);
    const seen = await store.update((draft) => Object.keys(draft).length);

    expect(seen).toBe(0);
    expect(existsSync(filePath)).toBe(false);
  });
});
