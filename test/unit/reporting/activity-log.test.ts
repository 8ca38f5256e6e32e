import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ActivityLog, summarizeActivity, type ActivityRecord } from '../../../src/reporting/activity-log.js';
import { Verdict } from '../../../src/store/types.js';
import type { Logger } from '../../../src/logging/logger.js';
import { LEVEL, createCaptureLogger, makeTempDir, type CapturedLog } from '../../helpers/fixtures.js';

function makeRecord(overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    timestamp: '2026-05-06T07:08:09.000Z',
    domain: 'news.example',
    category: 'News',
    verdict: Verdict.ALLOWED,
    cacheHit: false,
    latencyMs: 12.5,
    ...overrides,
  };
}

describe('ActivityLog', () => {
  let dir: string;
  let logDir: string;
  let logger: Logger;
  let logs: CapturedLog[];

  beforeEach(() => {
    dir = makeTempDir('category-gate-activity-');
    logDir = path.join(dir, 'activity');
    ({ logger, entries: logs } = createCaptureLogger());
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('names files by the UTC date of the record', () => {
    const log = new ActivityLog({ logDir, logger });
    expect(log.getLogFilePath('2026-05-06T23:59:59.000Z')).toBe(path.join(logDir, 'activity-2026-05-06.jsonl'));
  });

  it('appends one JSON line per record', async () => {
    const log = new ActivityLog({ logDir, logger });

    await log.record(makeRecord());
    await log.record(makeRecord({ domain: 'social.example', category: 'Social Media', verdict: Verdict.BLOCKED, scheme: 'https' }));

    const lines = fs.readFileSync(path.join(logDir, 'activity-2026-05-06.jsonl'), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? '')).toEqual({
      timestamp: '2026-05-06T07:08:09.000Z',
      domain: 'social.example',
      category: 'Social Media',
      verdict: 'blocked',
      cacheHit: false,
      latencyMs: 12.5,
      scheme: 'https',
    });
  });

  it('reads a day back and skips lines that do not parse', async () => {
    const log = new ActivityLog({ logDir, logger });
    await log.record(makeRecord({ errorKind: 'OracleTimeout' }));
    fs.appendFileSync(log.getLogFilePath('2026-05-06'), '{"torn":\nnot json\n', 'utf-8');
    await log.record(makeRecord({ domain: 'b.example', cacheHit: true }));

    const records = await log.read('2026-05-06');

    expect(records.map(r => r.domain)).toEqual(['news.example', 'b.example']);
    expect(records[0]?.errorKind).toBe('OracleTimeout');
  });

  it('reads an empty list for a day without a file', async () => {
    await expect(new ActivityLog({ logDir, logger }).read('2020-01-01')).resolves.toEqual([]);
  });

  it('writes nothing when disabled', async () => {
    const log = new ActivityLog({ logDir, logger, enabled: false });
    await log.record(makeRecord());
    expect(fs.existsSync(logDir)).toBe(false);
  });

  it('reports a failed append without rejecting', async () => {
    fs.writeFileSync(logDir, 'not a directory');
    const log = new ActivityLog({ logDir, logger });

    await expect(log.record(makeRecord())).resolves.toBeUndefined();
    expect(logs.find(l => l.msg === 'Activity record not written')).toMatchObject({
      level: LEVEL.warn,
      component: 'activity',
      domain: 'news.example',
    });
  });

  it('drain waits for records handed over without awaiting', async () => {
    const log = new ActivityLog({ logDir, logger });
    for (let i = 0; i < 5; i++) {
      void log.record(makeRecord({ domain: `d${i}.example` }));
    }

    await log.drain();

    expect(await log.read('2026-05-06')).toHaveLength(5);
  });
});

describe('summarizeActivity', () => {
  it('summarizes verdicts, cache hits, errors and latency', () => {
    const summary = summarizeActivity([
      { verdict: 'allowed', cacheHit: true, latencyMs: 1 },
      { verdict: 'allowed', cacheHit: true, latencyMs: 2 },
      { verdict: 'blocked', cacheHit: false, latencyMs: 3 },
      { verdict: 'allowed', cacheHit: false, latencyMs: 4, errorKind: 'OracleTimeout' },
      { verdict: 'allowed', cacheHit: false, latencyMs: 100, errorKind: 'OracleTimeout' },
    ]);

    expect(summary).toEqual({
      total: 5,
      allowed: 4,
      blocked: 1,
      cacheHits: 2,
      cacheHitRatio: 0.4,
      errors: { OracleTimeout: 2 },
      meanLatencyMs: 22,
      p95LatencyMs: 100,
    });
  });

  it('returns zeros for an empty day', () => {
    expect(summarizeActivity([])).toEqual({
      total: 0,
      allowed: 0,
      blocked: 0,
      cacheHits: 0,
      cacheHitRatio: 0,
      errors: {},
      meanLatencyMs: 0,
      p95LatencyMs: 0,
    });
  });
});
