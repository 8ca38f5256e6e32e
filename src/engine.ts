import type { CategoryGateConfig } from './config/schema.js';
import { resolvePaths } from './config/defaults.js';
import { createLogger, type Logger } from './logging/logger.js';
import { PersistentStore } from './store/persistent-store.js';
import { Verdict, parseVerdict } from './store/types.js';
import { CategorizationClient, type FetchLike } from './categorization/client.js';
import { Classifier, type CategoryOracle } from './classifier/classifier.js';
import { PolicyResolver } from './policy/resolver.js';
import { EnforcementGateway } from './gateway/enforcement-gateway.js';
import { ActivityLog, type ActivitySink } from './reporting/activity-log.js';
import { RetryPolicy } from './retry-policy.js';
import type { OracleErrorKind } from './errors.js';

export interface EngineDependencies {
  logger?: Logger;
  /** Replaces the HTTP oracle client entirely. */
  oracle?: CategoryOracle;
  /** Used by the default oracle client. */
  fetchImpl?: FetchLike;
  /** Replaces the JSONL activity log. */
  activity?: ActivitySink;
  sleep?: (ms: number) => Promise<void>;
}

export interface Engine {
  config: CategoryGateConfig;
  logger: Logger;
  store: PersistentStore;
  classifier: Classifier;
  policy: PolicyResolver;
  gateway: EnforcementGateway;
  /** The JSONL log, when the default sink is in use. */
  activityLog?: ActivityLog;
  /** Wait for pending activity writes, e.g. before exit. */
  close(): Promise<void>;
}

/**
 * Build every component around one PersistentStore and load its files.
 * Unreadable files are logged and leave the store empty; startup does not
 * fail on them.
 */
export async function createEngine(
  config: CategoryGateConfig,
  deps: EngineDependencies = {},
): Promise<Engine> {
  const logger = deps.logger ?? createLogger(config);
  const paths = resolvePaths(config);

  const store = new PersistentStore({
    cacheFile: paths.cacheFile,
    policyFile: paths.policyFile,
    cacheTtlHours: config.store.cacheTtlHours,
    writeAttempts: config.store.writeAttempts,
    writeBackoffMs: config.store.writeBackoffMs,
    logger,
    sleep: deps.sleep,
  });
  await store.load();

  if (!config.apiKey && !deps.oracle) {
    logger.warn('No categorization credential configured; uncached domains will use the fallback category');
  }

  const oracle = deps.oracle ?? new CategorizationClient(
    {
      apiKey: config.apiKey,
      apiUrl: config.oracle.apiUrl,
      model: config.oracle.model,
      timeoutMs: config.oracle.timeoutMs,
    },
    { fetchImpl: deps.fetchImpl },
  );

  const classifier = new Classifier({
    store,
    oracle,
    retry: new RetryPolicy<OracleErrorKind>({
      maxAttempts: config.retry.maxAttempts,
      backoffMs: config.retry.backoffMs,
      retryOn: config.retry.retryOn,
      sleep: deps.sleep,
    }),
    logger,
    fallbackCategory: config.fallback.category,
    maxRetryDelayMs: config.oracle.timeoutMs,
  });

  const policy = new PolicyResolver({ store, logger, defaultVerdict: Verdict.ALLOWED });

  const activityLog = deps.activity
    ? undefined
    : new ActivityLog({ logDir: paths.activityDir, enabled: config.activity.enabled, logger });

  const gateway = new EnforcementGateway({
    classifier,
    policy,
    activity: deps.activity ?? activityLog ?? noopSink,
    logger,
    fallbackCategory: config.fallback.category,
    fallbackVerdict: parseVerdict(config.fallback.verdict) ?? Verdict.ALLOWED,
  });

  logger.info(
    {
      cacheFile: paths.cacheFile,
      policyFile: paths.policyFile,
      fallbackVerdict: config.fallback.verdict,
      oracleTimeoutMs: config.oracle.timeoutMs,
    },
    'Categorization engine ready',
  );

  return {
    config,
    logger,
    store,
    classifier,
    policy,
    gateway,
    activityLog,
    close: async () => {
      await activityLog?.drain();
    },
  };
}

const noopSink: ActivitySink = { record: async () => undefined };

export { loadConfig } from './config/loader.js';
export { Verdict } from './store/types.js';
export type { CategoryGateConfig } from './config/schema.js';
export type { CacheEntry, PolicyLookup, PolicyTable } from './store/types.js';
export type { RequestDescriptor, Decision } from './gateway/enforcement-gateway.js';
export type { ActivityRecord, ActivitySink } from './reporting/activity-log.js';
export type { Resolution, CategoryOracle } from './classifier/classifier.js';
export type { ErrorKind, OracleErrorKind } from './errors.js';
