import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { errorMessage, type ErrorKind } from '../errors.js';
import type { Verdict } from '../store/types.js';

/** One enforcement decision, as written to the activity log. */
export interface ActivityRecord {
  timestamp: string;
  domain: string;
  category: string;
  verdict: Verdict;
  cacheHit: boolean;
  latencyMs: number;
  errorKind?: ErrorKind;
  scheme?: string;
  method?: string;
}

/** Where the enforcement gateway sends its records. */
export interface ActivitySink {
  record(record: ActivityRecord): Promise<void>;
}

const ActivityRecordSchema = z.object({
  timestamp: z.string(),
  domain: z.string(),
  category: z.string(),
  verdict: z.enum(['allowed', 'blocked']),
  cacheHit: z.boolean(),
  latencyMs: z.number(),
  errorKind: z.string().optional(),
});

export type StoredActivityRecord = z.infer<typeof ActivityRecordSchema>;

/**
 * Structured JSONL activity log.
 *
 * Writes one JSON line per decision to:
 *   <logDir>/activity-YYYY-MM-DD.jsonl   (UTC date of the decision)
 *
 * Append failures are reported through the application logger and never
 * reach the request path.
 */
export class ActivityLog implements ActivitySink {
  private logDir: string;
  private enabled: boolean;
  private logger: Logger;
  private dirReady: Promise<void> | null = null;
  private inFlight = new Set<Promise<void>>();

  constructor(options: { logDir: string; logger: Logger; enabled?: boolean }) {
    this.logDir = options.logDir;
    this.logger = options.logger.child({ component: 'activity' });
    this.enabled = options.enabled ?? true;
  }

  record(record: ActivityRecord): Promise<void> {
    if (!this.enabled) return Promise.resolve();

    const write = this.append(record).finally(() => this.inFlight.delete(write));
    this.inFlight.add(write);
    return write;
  }

  /** Wait for every record handed over so far to be written. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async append(record: ActivityRecord): Promise<void> {
    try {
      await this.ensureLogDir();
      const line = JSON.stringify(record) + '\n';
      await fs.promises.appendFile(this.getLogFilePath(record.timestamp), line, 'utf-8');
    } catch (error) {
      this.dirReady = null;
      this.logger.warn({ err: errorMessage(error), domain: record.domain }, 'Activity record not written');
    }
  }

  /** Records for one UTC day; lines that do not parse are skipped. */
  async read(date: string): Promise<StoredActivityRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.getLogFilePath(date), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const records: StoredActivityRecord[] = [];
    for (const line of content.split('\n')) {
      if (line.trim().length === 0) continue;
      try {
        const parsed = ActivityRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) records.push(parsed.data);
      } catch {
        // Torn or hand-edited line
        continue;
      }
    }
    return records;
  }

  getLogFilePath(timestamp: string = new Date().toISOString()): string {
    const date = timestamp.slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `activity-${date}.jsonl`);
  }

  private ensureLogDir(): Promise<void> {
    this.dirReady ??= fs.promises.mkdir(this.logDir, { recursive: true }).then(() => undefined);
    return this.dirReady;
  }
}

export interface ActivitySummary {
  total: number;
  allowed: number;
  blocked: number;
  cacheHits: number;
  /** 0..1, 0 when there are no records. */
  cacheHitRatio: number;
  /** Records per errorKind, e.g. how often the oracle fallback applied. */
  errors: Record<string, number>;
  meanLatencyMs: number;
  p95LatencyMs: number;
}

export function summarizeActivity(
  records: ReadonlyArray<Pick<StoredActivityRecord, 'verdict' | 'cacheHit' | 'latencyMs' | 'errorKind'>>,
): ActivitySummary {
  const errors: Record<string, number> = {};
  let allowed = 0;
  let cacheHits = 0;
  let latencyTotal = 0;

  for (const record of records) {
    if (record.verdict === 'allowed') allowed++;
    if (record.cacheHit) cacheHits++;
    latencyTotal += record.latencyMs;
    if (record.errorKind) errors[record.errorKind] = (errors[record.errorKind] ?? 0) + 1;
  }

  const total = records.length;
  const latencies = records.map(r => r.latencyMs).sort((a, b) => a - b);
  const p95Index = Math.max(0, Math.ceil(total * 0.95) - 1);

  return {
    total,
    allowed,
    blocked: total - allowed,
    cacheHits,
    cacheHitRatio: total > 0 ? cacheHits / total : 0,
    errors,
    meanLatencyMs: total > 0 ? latencyTotal / total : 0,
    p95LatencyMs: latencies[p95Index] ?? 0,
  };
}
