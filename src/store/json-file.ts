import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { FileHandle } from 'node:fs/promises';
import { StoreError, isStoreError, type StoreErrorKind } from '../errors.js';
import { RetryPolicy } from '../retry-policy.js';
import { Mutex } from './mutex.js';

export type JsonObject = Record<string, unknown>;

export type ReadOutcome =
  | { status: 'ok'; data: JsonObject }
  | { status: 'missing' }
  | { status: 'failed'; error: StoreError };

const MISSING = 'missing';

/**
 * A JSON object persisted in a single file.
 *
 * Writes go to a temp file in the same directory, are fsynced, then renamed
 * over the target, so readers see either the old or the new document. All
 * writes through one instance run inside an exclusive section.
 *
 * The instance remembers which version of the file (inode, size, mtime) it
 * last read or wrote, so `refresh` only re-reads when another writer has
 * replaced it since.
 */
export class JsonFile {
  readonly file: string;
  private mutex = new Mutex();
  private retry: RetryPolicy<StoreErrorKind>;
  private seen: string | null = null;

  constructor(file: string, retry: RetryPolicy<StoreErrorKind>) {
    this.file = file;
    this.retry = retry;
  }

  async read(): Promise<ReadOutcome> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(this.file, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        this.seen = MISSING;
        return { status: 'missing' };
      }
      return { status: 'failed', error: new StoreError('StoreReadFailure', this.file, { cause: error }) };
    }

    let content: string;
    try {
      const stat = await handle.stat();
      content = await handle.readFile('utf-8');
      // A document that does not parse is not re-read until it changes
      this.seen = versionOf(stat);
    } catch (error) {
      return { status: 'failed', error: new StoreError('StoreReadFailure', this.file, { cause: error }) };
    } finally {
      await handle.close();
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isJsonObject(parsed)) return { status: 'ok', data: parsed };
      return {
        status: 'failed',
        error: new StoreError('StoreReadFailure', this.file, {
          cause: new Error('expected a JSON object at the top level'),
        }),
      };
    } catch (error) {
      return { status: 'failed', error: new StoreError('StoreReadFailure', this.file, { cause: error }) };
    }
  }

  /** True when the file on disk is not the version this instance last read or wrote. */
  async changed(): Promise<boolean> {
    try {
      return versionOf(await fs.promises.stat(this.file)) !== this.seen;
    } catch (error) {
      return isNotFound(error) ? this.seen !== MISSING : true;
    }
  }

  /**
   * Re-read the file under the exclusive section if it changed, and hand the
   * outcome to `apply` before any queued update runs. Resolves to whether a
   * read happened.
   */
  refresh(apply: (outcome: ReadOutcome) => void): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      if (!(await this.changed())) return false;
      apply(await this.read());
      return true;
    });
  }

  /**
   * Read-modify-write under the exclusive section. `mutate` returns the new
   * document, or null to leave the file untouched.
   *
   * Without `fallback`, a file that exists but cannot be read is never
   * overwritten and the read failure is thrown. With it, `fallback()` stands
   * in for the unreadable document.
   */
  update<T>(
    mutate: (current: JsonObject) => { next: JsonObject | null; result: T },
    options?: { fallback?: () => JsonObject },
  ): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const outcome = await this.read();
      let current: JsonObject;
      if (outcome.status === 'failed') {
        if (!options?.fallback) throw outcome.error;
        current = options.fallback();
      } else {
        current = outcome.status === 'ok' ? outcome.data : {};
      }

      const { next, result } = mutate(current);
      if (next !== null) await this.writeWithRetry(next);
      return result;
    });
  }

  private writeWithRetry(document: JsonObject): Promise<void> {
    const content = JSON.stringify(document, null, 2) + '\n';
    return this.retry.run(
      () => this.writeAtomic(content),
      error => (isStoreError(error) ? error.kind : null),
    );
  }

  private async writeAtomic(content: string): Promise<void> {
    const dir = path.dirname(this.file);
    const tmp = path.join(
      dir,
      `.${path.basename(this.file)}.${process.pid}.${crypto.randomUUID()}.tmp`,
    );

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      const handle = await fs.promises.open(tmp, 'w');
      let version: string;
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
        // rename keeps inode, size and mtime
        version = versionOf(await handle.stat());
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tmp, this.file);
      this.seen = version;
    } catch (error) {
      // The temp file may not exist if open() itself failed
      await fs.promises.rm(tmp, { force: true }).catch(() => undefined);
      throw new StoreError('StoreWriteFailure', this.file, { cause: error });
    }
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function versionOf(stat: fs.Stats): string {
  return `${stat.ino}:${stat.size}:${stat.mtimeMs}`;
}
