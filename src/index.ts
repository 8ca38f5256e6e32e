#!/usr/bin/env node
import { loadConfig } from './config/loader.js';
import { resolvePaths } from './config/defaults.js';
import { createEngine, type Engine } from './engine.js';
import { ActivityLog, summarizeActivity } from './reporting/activity-log.js';
import { createLogger } from './logging/logger.js';
import { normalizeDomain } from './classifier/domain.js';

const VERSION = '0.1.0';

const HELP = `category-gate v${VERSION} - Domain categorization and enforcement engine

Usage:
  category-gate <command>

Commands:
  check <host>             Classify a host and print the decision record
  policy                   Print the category policy table
  cache list               Print cached domain categories
  cache clear              Remove every cached domain
  cache forget <domain>    Remove one cached domain
  stats [YYYY-MM-DD]       Summarize a day of activity (default: today, UTC)
  version                  Show version
  help                     Show this help
`;

async function withEngine(run: (engine: Engine) => Promise<void>): Promise<void> {
  const engine = await createEngine(loadConfig());
  try {
    await run(engine);
  } finally {
    await engine.close();
  }
}

async function check(host: string | undefined): Promise<void> {
  const target = host || fail('Usage: category-gate check <host>');
  await withEngine(async (engine) => {
    const { record } = await engine.gateway.decide({ host: target });
    print(JSON.stringify(record, null, 2));
  });
}

async function policy(): Promise<void> {
  await withEngine(async (engine) => {
    const table = await engine.store.listPolicy();
    const invalid = await engine.store.listInvalidPolicy();
    const rows = [...table].sort(([a], [b]) => a.localeCompare(b));
    for (const [category, verdict] of rows) print(`${verdict.padEnd(8)} ${category}`);
    for (const [category, raw] of invalid) print(`invalid  ${category} (${JSON.stringify(raw)})`);
  });
}

async function cache(action: string | undefined, domain: string | undefined): Promise<void> {
  await withEngine(async (engine) => {
    switch (action) {
      case 'list':
      case undefined: {
        for (const entry of await engine.store.listCache()) {
          print(`${entry.domain}\t${entry.category}\t${entry.observedAt}`);
        }
        break;
      }
      case 'clear':
        print(`Removed ${await engine.store.clearCache()} cached domains.`);
        break;
      case 'forget': {
        const normalized = (domain ? normalizeDomain(domain) : null)
          ?? fail('Usage: category-gate cache forget <domain>');
        const removed = await engine.store.invalidate(normalized);
        print(removed ? `Removed ${normalized}.` : `${normalized} was not cached.`);
        break;
      }
      default:
        fail(`Unknown cache action: ${action}`);
    }
  });
}

async function stats(date: string | undefined): Promise<void> {
  const day = date ?? new Date().toISOString().slice(0, 10);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) fail('Usage: category-gate stats [YYYY-MM-DD]');

  const config = loadConfig();
  const log = new ActivityLog({ logDir: resolvePaths(config).activityDir, logger: createLogger(config) });
  const summary = summarizeActivity(await log.read(day));
  print(JSON.stringify({ date: day, ...summary }, null, 2));
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

function fail(message: string): never {
  process.stderr.write(`${message}\n`);
  process.exit(1);
}

async function main(args: string[]): Promise<void> {
  const [command, ...rest] = args;

  switch (command) {
    case 'check':
      return check(rest[0]);
    case 'policy':
      return policy();
    case 'cache':
      return cache(rest[0], rest[1]);
    case 'stats':
      return stats(rest[0]);
    case 'version':
      print(`category-gate v${VERSION}`);
      return;
    case 'help':
    case undefined:
      process.stdout.write(HELP);
      return;
    default:
      fail(`Unknown command: ${command}`);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  process.stderr.write(
    `[category-gate] ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
});
