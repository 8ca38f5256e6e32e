import * as path from 'node:path';
import * as os from 'node:os';
import type { CategoryGateConfig } from './schema.js';

/** Directory used when `store.dataDir` is not configured. */
export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.category-gate');

/**
 * Default category-gate configuration values.
 * Used as fallbacks when environment variables or config file are absent.
 */
export const DEFAULT_CONFIG: CategoryGateConfig = {
  apiKey: '',
  oracle: {
    apiUrl: 'https://generativelanguage.googleapis.com/v1beta',
    model: 'gemini-2.5-flash',
    timeoutMs: 5000,
  },
  retry: {
    maxAttempts: 2,
    backoffMs: [250],
    retryOn: ['OracleUnreachable', 'OracleRateLimited'],
  },
  store: {
    cacheFile: 'domain_cache.json',
    policyFile: 'categories.json',
    cacheTtlHours: 0,
    writeAttempts: 3,
    writeBackoffMs: 50,
  },
  fallback: {
    category: 'Uncategorized',
    verdict: 'allowed',
  },
  activity: {
    enabled: true,
  },
  logLevel: 'info',
};

/** Resolved on-disk locations derived from a config. */
export interface ResolvedPaths {
  dataDir: string;
  cacheFile: string;
  policyFile: string;
  activityDir: string;
}

export function resolvePaths(config: CategoryGateConfig): ResolvedPaths {
  const dataDir = config.store.dataDir ?? DEFAULT_DATA_DIR;
  return {
    dataDir,
    cacheFile: path.resolve(dataDir, config.store.cacheFile),
    policyFile: path.resolve(dataDir, config.store.policyFile),
    activityDir: config.activity.logDir ?? path.join(dataDir, 'activity'),
  };
}
