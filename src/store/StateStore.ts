/**
 * Lock-protected JSON key/value document.
 *
 * The document is loaded wholesale, partially updated and flushed wholesale.
 * Every access holds the sibling `<file>.lock` and reloads from disk first,
 * so another process's writes are never overwritten with a stale snapshot.
 */

import { FileLock, type FileLockOptions } from './FileLock.js';
import { loadJsonObject, saveJsonAtomic, type JsonObject, type JsonValue } from './jsonFile.js';

export interface StateStoreOptions extends FileLockOptions {
  /** Values the document falls back to for keys the file does not have */
  defaults?: JsonObject;
}

export class StateStore {
  readonly filePath: string;
  private readonly lock: FileLock;
  private readonly defaults: JsonObject;

  constructor(filePath: string, options: StateStoreOptions = {}) {
    this.filePath = filePath;
    this.defaults = structuredClone(options.defaults ?? {});
    this.lock = new FileLock(`${filePath}.lock`, options);
  }

  get lockPath(): string {
    return this.lock.lockPath;
  }

  /**
   * Load the document from disk. A missing or corrupt file reads as the defaults.
   */
  async read(): Promise<JsonObject> {
    return this.lock.withLock(() => this.reload());
  }

  /**
   * Shallow-merge `partial` into the document and flush it.
   */
  async write(partial: JsonObject): Promise<void> {
    await this.lock.withLock(async () => {
      const current = await this.reload();
      await saveJsonAtomic(this.filePath, { ...current, ...structuredClone(partial) });
    });
  }

  async get(key: string): Promise<JsonValue | undefined> {
    const doc = await this.read();
    return doc[key];
  }

  /**
   * Read-modify-write under a single lock hold. `mutator` edits the draft in
   * place; the draft is flushed after it returns if anything changed.
   */
  async update<T>(mutator: (draft: JsonObject) => T | Promise<T>): Promise<T> {
    return this.lock.withLock(async () => {
      const draft = await this.reload();
      const before = JSON.stringify(draft);
      const result = await mutator(draft);
      if (JSON.stringify(draft) !== before) {
        await saveJsonAtomic(this.filePath, draft);
      }
      return result;
    });
  }

  /**
   * Delete keys. Returns the keys that were present.
   */
  async remove(keys: readonly string[]): Promise<string[]> {
    return this.update((draft) => {
      const removed: string[] = [];
      for (const key of keys) {
        if (Object.prototype.hasOwnProperty.call(draft, key)) {
          delete draft[key];
          removed.push(key);
        }
      }
      return removed;
    });
  }

  private async reload(): Promise<JsonObject> {
    const { data } = await loadJsonObject(this.filePath);
    return { ...structuredClone(this.defaults), ...data };
  }
}
