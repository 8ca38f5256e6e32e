import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import pino from 'pino';
import type { Logger } from '../../src/logging/logger.js';
import type { CategoryOracle } from '../../src/classifier/classifier.js';
import type { ActivityRecord, ActivitySink } from '../../src/reporting/activity-log.js';

export function makeTempDir(prefix = 'category-gate-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export interface CapturedLog {
  level: number;
  msg?: string;
  errorKind?: string;
  [key: string]: unknown;
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/** A pino logger whose records land in `entries` as parsed objects. */
export function createCaptureLogger(): { logger: Logger; entries: CapturedLog[] } {
  const entries: CapturedLog[] = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

/** Oracle stand-in that records calls and answers through `answer`. */
export class FakeOracle implements CategoryOracle {
  calls: string[] = [];
  private answer: (domain: string, call: number) => Promise<string> | string;

  constructor(answer: (domain: string, call: number) => Promise<string> | string) {
    this.answer = answer;
  }

  async classify(domain: string): Promise<string> {
    this.calls.push(domain);
    return this.answer(domain, this.calls.length);
  }
}

export class MemorySink implements ActivitySink {
  records: ActivityRecord[] = [];

  async record(record: ActivityRecord): Promise<void> {
    this.records.push(record);
  }
}

export const delay = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export const noSleep = async (): Promise<void> => undefined;

export function writeJson(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value, null, 2), 'utf-8');
}

export function readJson(file: string): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
