import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { PersistentStore } from '../../../src/store/persistent-store.js';
import { Verdict } from '../../../src/store/types.js';
import type { Logger } from '../../../src/logging/logger.js';
import {
  LEVEL,
  createCaptureLogger,
  makeTempDir,
  noSleep,
  readJson,
  writeJson,
  type CapturedLog,
} from '../../helpers/fixtures.js';

describe('PersistentStore', () => {
  let dir: string;
  let cacheFile: string;
  let policyFile: string;
  let logger: Logger;
  let logs: CapturedLog[];

  function openStore(options?: { now?: () => number; cacheTtlHours?: number; cacheFile?: string }): PersistentStore {
    return new PersistentStore({
      cacheFile: options?.cacheFile ?? cacheFile,
      policyFile,
      logger,
      now: options?.now,
      cacheTtlHours: options?.cacheTtlHours,
      writeAttempts: 2,
      sleep: noSleep,
    });
  }

  beforeEach(() => {
    dir = makeTempDir('category-gate-store-');
    cacheFile = path.join(dir, 'domain_cache.json');
    policyFile = path.join(dir, 'categories.json');
    ({ logger, entries: logs } = createCaptureLogger());
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  describe('domain cache', () => {
    it('returns undefined for an unknown domain', async () => {
      await expect(openStore().get('unknown.example')).resolves.toBeUndefined();
    });

    it('stores and retrieves an entry', async () => {
      const store = openStore();
      const entry = { domain: 'news.example', category: 'News', observedAt: '2026-01-02T03:04:05.000Z' };

      await store.put(entry);
      await expect(store.get('news.example')).resolves.toEqual(entry);
    });

    it('reloads an identical entry after a restart', async () => {
      const entry = { domain: 'news.example', category: 'News', observedAt: '2026-01-02T03:04:05.000Z' };
      await openStore().put(entry);

      const reopened = openStore();
      await expect(reopened.get('news.example')).resolves.toEqual(entry);
    });

    it('writes the documented file shape', async () => {
      await openStore().put({ domain: 'news.example', category: 'News', observedAt: '2026-01-02T03:04:05.000Z' });

      expect(readJson(cacheFile)).toEqual({
        'news.example': { category: 'News', observedAt: '2026-01-02T03:04:05.000Z' },
      });
    });

    it('loads the legacy domain → category shape', async () => {
      writeJson(cacheFile, { 'Video.Example': 'Video Streaming' });
      const store = openStore({ now: () => Date.parse('2026-03-01T00:00:00.000Z') });

      await expect(store.get('video.example')).resolves.toEqual({
        domain: 'video.example',
        category: 'Video Streaming',
        observedAt: '2026-03-01T00:00:00.000Z',
      });
    });

    it('skips malformed entries and keeps the rest', async () => {
      writeJson(cacheFile, {
        'good.example': { category: 'News', observedAt: '2026-01-01T00:00:00.000Z' },
        'bad.example': { category: 42 },
      });
      const store = openStore();

      await expect(store.get('good.example')).resolves.toMatchObject({ category: 'News' });
      await expect(store.get('bad.example')).resolves.toBeUndefined();
      expect(logs.some(l => l.level === LEVEL.warn && l.skipped === 1)).toBe(true);
    });

    it('starts empty and logs once when the cache file is unreadable', async () => {
      fs.writeFileSync(cacheFile, '{ not json', 'utf-8');
      const store = openStore();

      await store.load();
      await store.load();
      await expect(store.get('any.example')).resolves.toBeUndefined();

      const failures = logs.filter(l => l.errorKind === 'StoreReadFailure');
      expect(failures).toHaveLength(1);
      expect(failures[0]?.level).toBe(LEVEL.error);
    });

    it('keeps the last write for the same domain', async () => {
      const store = openStore();
      await Promise.all([
        store.put({ domain: 'same.example', category: 'News', observedAt: '2026-01-01T00:00:00.000Z' }),
        store.put({ domain: 'same.example', category: 'Business', observedAt: '2026-01-01T00:00:01.000Z' }),
      ]);

      await expect(store.get('same.example')).resolves.toMatchObject({ category: 'Business' });
      await expect(openStore().get('same.example')).resolves.toMatchObject({ category: 'Business' });
    });

    it('persists concurrent writes for different domains', async () => {
      const store = openStore();
      await Promise.all(
        Array.from({ length: 25 }, (_, i) =>
          store.put({ domain: `d${i}.example`, category: 'News', observedAt: '2026-01-01T00:00:00.000Z' }),
        ),
      );

      expect(Object.keys(readJson(cacheFile))).toHaveLength(25);
    });

    it('serves entries from memory when the cache file cannot be written', async () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, 'file', 'utf-8');
      const store = openStore({ cacheFile: path.join(blocker, 'domain_cache.json') });
      const entry = { domain: 'mem.example', category: 'News', observedAt: '2026-01-01T00:00:00.000Z' };

      await expect(store.put(entry)).rejects.toMatchObject({ kind: 'StoreWriteFailure' });
      await expect(store.get('mem.example')).resolves.toEqual(entry);
    });

    it('treats entries older than the TTL as misses', async () => {
      let now = Date.parse('2026-01-01T00:00:00.000Z');
      const store = openStore({ now: () => now, cacheTtlHours: 1 });
      await store.put({ domain: 'ttl.example', category: 'News', observedAt: '2026-01-01T00:00:00.000Z' });

      now += 30 * 60 * 1000;
      await expect(store.get('ttl.example')).resolves.toBeDefined();

      now += 60 * 60 * 1000;
      await expect(store.get('ttl.example')).resolves.toBeUndefined();
    });

    it('invalidates one domain and clears the rest', async () => {
      const store = openStore();
      await store.put({ domain: 'a.example', category: 'News', observedAt: '2026-01-01T00:00:00.000Z' });
      await store.put({ domain: 'b.example', category: 'Games', observedAt: '2026-01-01T00:00:00.000Z' });

      await expect(store.invalidate('a.example')).resolves.toBe(true);
      await expect(store.invalidate('a.example')).resolves.toBe(false);
      expect((await store.listCache()).map(e => e.domain)).toEqual(['b.example']);

      await expect(store.clearCache()).resolves.toBe(1);
      expect(readJson(cacheFile)).toEqual({});
    });
  });

  describe('shared cache file', () => {
    const at = '2026-01-01T00:00:00.000Z';

    it('keeps an operator clear from another process', async () => {
      const engine = openStore();
      const operator = openStore();
      await engine.put({ domain: 'old.example', category: 'News', observedAt: at });

      await operator.clearCache();
      expect(readJson(cacheFile)).toEqual({});
      await expect(engine.get('old.example')).resolves.toBeUndefined();

      await engine.put({ domain: 'new.example', category: 'News', observedAt: at });
      expect(Object.keys(readJson(cacheFile))).toEqual(['new.example']);
    });

    it('keeps entries written by another process', async () => {
      const engine = openStore();
      await engine.put({ domain: 'new.example', category: 'News', observedAt: at });

      await openStore().put({ domain: 'cli.example', category: 'Search Engine', observedAt: at });
      await engine.put({ domain: 'x.example', category: 'Games', observedAt: at });

      expect(Object.keys(readJson(cacheFile)).sort()).toEqual(['cli.example', 'new.example', 'x.example']);
      await expect(engine.get('cli.example')).resolves.toMatchObject({ category: 'Search Engine' });
    });

    it('drops a domain another process forgot', async () => {
      const engine = openStore();
      await engine.put({ domain: 'a.example', category: 'News', observedAt: at });
      await engine.put({ domain: 'b.example', category: 'News', observedAt: at });

      await expect(openStore().invalidate('a.example')).resolves.toBe(true);

      expect((await engine.listCache()).map(e => e.domain)).toEqual(['b.example']);
    });

    it('keeps an unpersisted entry across a reload and writes it with the next change', async () => {
      const store = openStore();
      fs.mkdirSync(cacheFile);
      const entry = { domain: 'mem.example', category: 'News', observedAt: at };

      await expect(store.put(entry)).rejects.toMatchObject({ kind: 'StoreWriteFailure' });
      fs.rmdirSync(cacheFile);
      await openStore().put({ domain: 'other.example', category: 'Games', observedAt: at });

      await expect(store.get('mem.example')).resolves.toEqual(entry);
      await store.put({ domain: 'third.example', category: 'Travel', observedAt: at });
      expect(Object.keys(readJson(cacheFile)).sort()).toEqual(['mem.example', 'other.example', 'third.example']);
    });

    it('replaces an unparseable cache file on the next write', async () => {
      fs.writeFileSync(cacheFile, '{ not json', 'utf-8');
      const store = openStore();

      await store.put({ domain: 'news.example', category: 'News', observedAt: at });

      expect(readJson(cacheFile)).toEqual({ 'news.example': { category: 'News', observedAt: at } });
    });

    it('round-trips a domain named like an object prototype key', async () => {
      const entry = { domain: '__proto__', category: 'News', observedAt: at };
      await openStore().put(entry);

      expect(Object.keys(readJson(cacheFile))).toEqual(['__proto__']);
      await expect(openStore().get('__proto__')).resolves.toEqual(entry);
    });
  });

  describe('policy table', () => {
    it('reports absent categories', async () => {
      await expect(openStore().getPolicy('News')).resolves.toEqual({ status: 'absent' });
    });

    it('reads verdicts case-insensitively', async () => {
      writeJson(policyFile, { 'Social Media': 'Blocked', News: 'allowed' });
      const store = openStore();

      await expect(store.getPolicy('Social Media')).resolves.toEqual({ status: 'set', verdict: Verdict.BLOCKED });
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.ALLOWED });
    });

    it('reports values that are not verdicts', async () => {
      writeJson(policyFile, { Gaming: 'maybe', Drugs: 3 });
      const store = openStore();

      await expect(store.getPolicy('Gaming')).resolves.toEqual({ status: 'invalid', raw: 'maybe' });
      await expect(store.getPolicy('Drugs')).resolves.toEqual({ status: 'invalid', raw: '3' });
    });

    it('sees operator edits on the next lookup', async () => {
      writeJson(policyFile, { News: 'allowed' });
      const store = openStore();
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.ALLOWED });

      writeJson(policyFile, { News: 'blocked' });
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.BLOCKED });
    });

    it('registers an unseen category once', async () => {
      writeJson(policyFile, { News: 'blocked' });
      const store = openStore();

      await expect(store.registerCategory('Travel', Verdict.ALLOWED)).resolves.toBe(true);
      await expect(store.registerCategory('Travel', Verdict.ALLOWED)).resolves.toBe(false);
      expect(readJson(policyFile)).toEqual({ News: 'blocked', Travel: 'allowed' });
    });

    it('does not replace an existing value, even an invalid one', async () => {
      writeJson(policyFile, { Gaming: 'maybe', News: 'blocked' });
      const store = openStore();

      await expect(store.registerCategory('Gaming', Verdict.ALLOWED)).resolves.toBe(false);
      await expect(store.registerCategory('News', Verdict.ALLOWED)).resolves.toBe(false);
      expect(readJson(policyFile)).toEqual({ Gaming: 'maybe', News: 'blocked' });
    });

    it('refuses to rewrite a policy file it cannot parse', async () => {
      fs.writeFileSync(policyFile, '{ "News": "blocked", ', 'utf-8');
      const store = openStore();

      await expect(store.registerCategory('Travel', Verdict.ALLOWED)).rejects.toMatchObject({
        kind: 'StoreReadFailure',
      });
      expect(fs.readFileSync(policyFile, 'utf-8')).toBe('{ "News": "blocked", ');
      // The registration still applies to this process
      await expect(store.getPolicy('Travel')).resolves.toEqual({ status: 'set', verdict: Verdict.ALLOWED });
    });

    it('lists valid entries and separates invalid ones', async () => {
      writeJson(policyFile, { News: 'allowed', 'Social Media': 'blocked', Gaming: 'maybe' });
      const store = openStore();

      const table = await store.listPolicy();
      expect([...table.entries()]).toEqual([
        ['News', Verdict.ALLOWED],
        ['Social Media', Verdict.BLOCKED],
      ]);
      expect([...(await store.listInvalidPolicy()).entries()]).toEqual([['Gaming', 'maybe']]);
      await expect(store.stats()).resolves.toEqual({
        cacheEntries: 0,
        policyEntries: 2,
        invalidPolicyEntries: 1,
        pendingRegistrations: 0,
      });
    });

    it('serves the last good table while the policy file is unreadable', async () => {
      writeJson(policyFile, { News: 'blocked' });
      const store = openStore();
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.BLOCKED });

      fs.writeFileSync(policyFile, '{ broken', 'utf-8');
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.BLOCKED });
      await expect(store.getPolicy('News')).resolves.toEqual({ status: 'set', verdict: Verdict.BLOCKED });

      expect(logs.filter(l => l.errorKind === 'StoreReadFailure')).toHaveLength(1);
    });
  });
});
