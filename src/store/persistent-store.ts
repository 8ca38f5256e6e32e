import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type { StoreErrorKind } from '../errors.js';
import { RetryPolicy } from '../retry-policy.js';
import { JsonFile, type JsonObject, type ReadOutcome } from './json-file.js';
import {
  Verdict,
  parseVerdict,
  type CacheEntry,
  type PolicyLookup,
  type PolicyTable,
  type StoreStats,
} from './types.js';

export interface PersistentStoreOptions {
  /** Domain → category cache file. */
  cacheFile: string;
  /** Category → verdict policy file. Operators may edit it at any time. */
  policyFile: string;
  logger: Logger;
  /** Entries older than this read as misses. 0 or absent: never expire. */
  cacheTtlHours?: number;
  /** Attempts per durable write before a StoreWriteFailure is reported. */
  writeAttempts?: number;
  writeBackoffMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const CachedValueSchema = z.union([
  // Older cache files map the domain straight to its category
  z.string().min(1),
  z.object({
    category: z.string().min(1),
    observedAt: z.string().datetime({ offset: true }),
  }),
]);

/**
 * Durable owner of the domain cache and the category policy table.
 *
 * Every cache change is a locked read-modify-write of the one key involved,
 * so entries written by other processes (or removed by an operator) survive.
 * The in-memory view is re-read whenever the cache file has been replaced by
 * someone else. The policy file is re-read on every lookup so operator edits
 * apply to the next request. Changes that could not be persisted are kept in
 * memory and served until a later write lands.
 */
export class PersistentStore {
  private cacheFile: JsonFile;
  private policyFile: JsonFile;
  private logger: Logger;
  private ttlMs: number;
  private now: () => number;

  private cache = new Map<string, CacheEntry>();
  /** Cache entries not yet visible in the cache file. */
  private pendingCache = new Map<string, CacheEntry>();
  private cacheReadFailing = false;
  private loading: Promise<void> | null = null;

  /** Raw values from the last successful policy read. */
  private policySnapshot = new Map<string, unknown>();
  /** Registrations not yet visible in the policy file. */
  private pendingPolicy = new Map<string, Verdict>();
  private policyReadFailing = false;

  constructor(options: PersistentStoreOptions) {
    const retry = new RetryPolicy<StoreErrorKind>({
      maxAttempts: options.writeAttempts ?? 3,
      backoffMs: [options.writeBackoffMs ?? 50],
      retryOn: ['StoreWriteFailure'],
      sleep: options.sleep,
    });
    this.cacheFile = new JsonFile(options.cacheFile, retry);
    this.policyFile = new JsonFile(options.policyFile, retry);
    this.logger = options.logger.child({ component: 'store' });
    this.ttlMs = (options.cacheTtlHours ?? 0) * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Load both files. Unreadable files leave the store empty and are logged
   * once; they never fail startup.
   */
  load(): Promise<void> {
    this.loading ??= this.loadFromDisk();
    return this.loading;
  }

  // ── Domain cache ──

  async get(domain: string): Promise<CacheEntry | undefined> {
    await this.load();
    await this.refreshCache();

    const entry = this.cache.get(domain);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.cache.delete(domain);
      return undefined;
    }
    return entry;
  }

  /**
   * Replace the entry for `entry.domain` in the cache file, leaving every
   * other entry as the file has it. The entry serves this process even when
   * the write fails.
   */
  async put(entry: CacheEntry): Promise<void> {
    await this.load();
    const stored = { ...entry };
    this.cache.set(stored.domain, stored);
    this.pendingCache.set(stored.domain, stored);
    await this.writeCache(entries => {
      entries.set(stored.domain, stored);
    });
  }

  /** Drop one domain so the next request re-classifies it. */
  async invalidate(domain: string): Promise<boolean> {
    await this.load();
    const wasPending = this.pendingCache.delete(domain);
    const inMemory = this.cache.has(domain);
    const inFile = await this.writeCache(entries => entries.delete(domain));
    return inFile || inMemory || wasPending;
  }

  async clearCache(): Promise<number> {
    await this.load();
    this.pendingCache.clear();
    return this.writeCache(entries => {
      const removed = entries.size;
      entries.clear();
      return removed;
    });
  }

  async listCache(): Promise<CacheEntry[]> {
    await this.load();
    await this.refreshCache();
    return [...this.cache.values()]
      .filter(entry => !this.isExpired(entry))
      .sort((a, b) => a.domain.localeCompare(b.domain));
  }

  // ── Policy table ──

  async getPolicy(category: string): Promise<PolicyLookup> {
    await this.refreshPolicy();

    if (!this.policySnapshot.has(category)) {
      const pending = this.pendingPolicy.get(category);
      return pending ? { status: 'set', verdict: pending } : { status: 'absent' };
    }

    const raw = this.policySnapshot.get(category);
    const verdict = parseVerdict(raw);
    if (verdict) return { status: 'set', verdict };
    return { status: 'invalid', raw: typeof raw === 'string' ? raw : JSON.stringify(raw) };
  }

  /**
   * Add `category` with `defaultVerdict` unless the policy file already has
   * an entry for it, valid or not. Returns true when this call added it.
   *
   * Throws StoreError when the file cannot be read or written; the
   * registration still applies in memory for this process.
   */
  async registerCategory(category: string, defaultVerdict: Verdict): Promise<boolean> {
    await this.load();
    if (!this.policySnapshot.has(category) && !this.pendingPolicy.has(category)) {
      this.pendingPolicy.set(category, defaultVerdict);
    }

    const added = await this.policyFile.update((current) => {
      if (Object.hasOwn(current, category)) return { next: null, result: false };
      return { next: { ...current, [category]: defaultVerdict }, result: true };
    });

    this.pendingPolicy.delete(category);
    return added;
  }

  /** Valid entries of the current policy file plus in-memory registrations. */
  async listPolicy(): Promise<PolicyTable> {
    await this.refreshPolicy();

    const table: PolicyTable = new Map();
    for (const [category, raw] of this.policySnapshot) {
      const verdict = parseVerdict(raw);
      if (verdict) table.set(category, verdict);
    }
    for (const [category, verdict] of this.pendingPolicy) {
      if (!this.policySnapshot.has(category)) table.set(category, verdict);
    }
    return table;
  }

  /** Entries in the policy file whose value is neither allowed nor blocked. */
  async listInvalidPolicy(): Promise<Map<string, unknown>> {
    await this.refreshPolicy();
    const invalid = new Map<string, unknown>();
    for (const [category, raw] of this.policySnapshot) {
      if (parseVerdict(raw) === null) invalid.set(category, raw);
    }
    return invalid;
  }

  async stats(): Promise<StoreStats> {
    await this.load();
    await this.refreshCache();
    const invalid = await this.listInvalidPolicy();
    return {
      cacheEntries: this.cache.size,
      policyEntries: this.policySnapshot.size - invalid.size,
      invalidPolicyEntries: invalid.size,
      pendingRegistrations: this.pendingPolicy.size,
    };
  }

  // ── Internals ──

  private async loadFromDisk(): Promise<void> {
    await this.cacheFile.refresh(outcome => {
      if (outcome.status === 'missing') {
        this.logger.info({ file: this.cacheFile.file }, 'No domain cache file yet; starting empty');
      }
      this.applyCacheRead(outcome);
    });

    await this.refreshPolicy();
    this.logger.debug(
      { cacheEntries: this.cache.size, policyEntries: this.policySnapshot.size },
      'Store loaded',
    );
  }

  /** Pick up a cache file replaced by another process or an operator. */
  private async refreshCache(): Promise<void> {
    await this.cacheFile.refresh(outcome => this.applyCacheRead(outcome));
  }

  private applyCacheRead(outcome: ReadOutcome): void {
    if (outcome.status === 'failed') {
      // Keep serving what is in memory; report only the first failure of a streak
      if (!this.cacheReadFailing) {
        this.logger.error(
          { errorKind: outcome.error.kind, file: this.cacheFile.file, err: outcome.error },
          'Domain cache unreadable; serving entries held in memory',
        );
      }
      this.cacheReadFailing = true;
      return;
    }

    if (this.cacheReadFailing) {
      this.logger.info({ file: this.cacheFile.file }, 'Domain cache readable again');
    }
    this.cacheReadFailing = false;

    const { entries, skipped } = this.parseCacheDocument(outcome.status === 'ok' ? outcome.data : {});
    if (skipped > 0) {
      this.logger.warn({ file: this.cacheFile.file, skipped }, 'Skipped malformed domain cache entries');
    }
    for (const [domain, entry] of this.pendingCache) entries.set(domain, entry);
    this.cache = entries;
  }

  /**
   * Apply `change` to the cache file's current entries under its exclusive
   * section and write the result. Pending entries ride along with every
   * write. An unreadable cache file is replaced by the in-memory view.
   */
  private async writeCache<T>(change: (entries: Map<string, CacheEntry>) => T): Promise<T> {
    const carried = new Map<string, CacheEntry>();

    const result = await this.cacheFile.update(
      (current) => {
        const { entries } = this.parseCacheDocument(current);
        for (const [domain, entry] of this.pendingCache) {
          entries.set(domain, entry);
          carried.set(domain, entry);
        }
        const changed = change(entries);
        this.cache = new Map(entries);
        return { next: serializeCache(entries), result: changed };
      },
      { fallback: () => serializeCache(this.cache) },
    );

    for (const [domain, entry] of carried) {
      if (this.pendingCache.get(domain) === entry) this.pendingCache.delete(domain);
    }
    return result;
  }

  private parseCacheDocument(data: JsonObject): { entries: Map<string, CacheEntry>; skipped: number } {
    const loadedAt = new Date(this.now()).toISOString();
    const entries = new Map<string, CacheEntry>();
    let skipped = 0;

    for (const [key, value] of Object.entries(data)) {
      const parsed = CachedValueSchema.safeParse(value);
      const domain = key.trim().toLowerCase();
      if (!parsed.success || domain.length === 0) {
        skipped++;
        continue;
      }
      entries.set(domain, typeof parsed.data === 'string'
        ? { domain, category: parsed.data, observedAt: loadedAt }
        : { domain, category: parsed.data.category, observedAt: parsed.data.observedAt });
    }
    return { entries, skipped };
  }

  private async refreshPolicy(): Promise<void> {
    const outcome = await this.policyFile.read();

    if (outcome.status === 'failed') {
      // Keep serving the last good table; report only the first failure of a streak
      if (!this.policyReadFailing) {
        this.logger.error(
          { errorKind: outcome.error.kind, file: this.policyFile.file, err: outcome.error },
          'Policy file unreadable; serving last known policy',
        );
      }
      this.policyReadFailing = true;
      return;
    }

    if (this.policyReadFailing) {
      this.logger.info({ file: this.policyFile.file }, 'Policy file readable again');
    }
    this.policyReadFailing = false;

    this.policySnapshot = outcome.status === 'ok'
      ? new Map(Object.entries(outcome.data))
      : new Map();
    for (const category of this.pendingPolicy.keys()) {
      if (this.policySnapshot.has(category)) this.pendingPolicy.delete(category);
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    if (this.ttlMs <= 0) return false;
    const observed = Date.parse(entry.observedAt);
    return Number.isFinite(observed) && observed + this.ttlMs < this.now();
  }
}

function serializeCache(entries: Map<string, CacheEntry>): JsonObject {
  return Object.fromEntries(
    [...entries.values()].map(entry => [entry.domain, { category: entry.category, observedAt: entry.observedAt }]),
  );
}
