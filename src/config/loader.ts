import * as fs from 'node:fs';
import * as path from 'node:path';
import { CategoryGateConfigSchema, type CategoryGateConfig } from './schema.js';
import { DEFAULT_DATA_DIR } from './defaults.js';

type Section = Record<string, unknown>;

const SECTIONS = ['oracle', 'retry', 'store', 'fallback', 'activity'] as const;

/**
 * Load category-gate configuration from environment variables and optional
 * config file.
 *
 * Priority: Environment variables > config file > defaults.
 *
 * Config file locations (first found wins):
 *   1. CATEGORY_GATE_CONFIG env var
 *   2. ~/.category-gate/config.json
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CategoryGateConfig {
  const fileCfg = loadConfigFile(env) ?? {};
  const envCfg = loadEnvConfig(env);

  // Merge: env overrides file, schema provides defaults
  const merged: Section = { ...fileCfg, ...envCfg };
  for (const section of SECTIONS) {
    merged[section] = {
      ...asSection(fileCfg[section]),
      ...asSection(envCfg[section]),
    };
  }

  const result = CategoryGateConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.issues
      .map(i => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    process.stderr.write(`[category-gate] Configuration errors:\n${errors}\n`);
    process.stderr.write('[category-gate] Using defaults where possible.\n');

    return CategoryGateConfigSchema.parse({
      apiKey: typeof merged.apiKey === 'string' ? merged.apiKey : '',
    });
  }

  return result.data;
}

function loadConfigFile(env: NodeJS.ProcessEnv): Section | undefined {
  const configPath = env.CATEGORY_GATE_CONFIG ?? path.join(DEFAULT_DATA_DIR, 'config.json');

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch {
    // No config file is the common case
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isSection(parsed)) return parsed;
    process.stderr.write(`[category-gate] Ignoring ${configPath}: expected a JSON object.\n`);
  } catch (error) {
    process.stderr.write(
      `[category-gate] Ignoring ${configPath}: ${error instanceof Error ? error.message : error}\n`,
    );
  }
  return undefined;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Section {
  const config: Section = {};

  const apiKey = env.CATEGORY_GATE_API_KEY || env.GOOGLE_API_KEY;
  if (apiKey) config.apiKey = apiKey;

  if (env.CATEGORY_GATE_LOG_LEVEL) config.logLevel = env.CATEGORY_GATE_LOG_LEVEL;
  if (env.CATEGORY_GATE_LOG_DIR) config.logDir = env.CATEGORY_GATE_LOG_DIR;

  // Oracle
  const oracle: Section = {};
  if (env.CATEGORY_GATE_ORACLE_URL) oracle.apiUrl = env.CATEGORY_GATE_ORACLE_URL;
  if (env.CATEGORY_GATE_ORACLE_MODEL) oracle.model = env.CATEGORY_GATE_ORACLE_MODEL;
  if (env.CATEGORY_GATE_ORACLE_TIMEOUT_MS) {
    oracle.timeoutMs = parseInt(env.CATEGORY_GATE_ORACLE_TIMEOUT_MS, 10);
  }
  if (Object.keys(oracle).length > 0) config.oracle = oracle;

  // Retry
  const retry: Section = {};
  if (env.CATEGORY_GATE_RETRY_MAX_ATTEMPTS) {
    retry.maxAttempts = parseInt(env.CATEGORY_GATE_RETRY_MAX_ATTEMPTS, 10);
  }
  if (env.CATEGORY_GATE_RETRY_BACKOFF_MS) {
    retry.backoffMs = splitList(env.CATEGORY_GATE_RETRY_BACKOFF_MS).map(v => parseInt(v, 10));
  }
  if (env.CATEGORY_GATE_RETRY_ON) {
    retry.retryOn = splitList(env.CATEGORY_GATE_RETRY_ON);
  }
  if (Object.keys(retry).length > 0) config.retry = retry;

  // Store
  const store: Section = {};
  if (env.CATEGORY_GATE_DATA_DIR) store.dataDir = env.CATEGORY_GATE_DATA_DIR;
  if (env.CATEGORY_GATE_CACHE_FILE) store.cacheFile = env.CATEGORY_GATE_CACHE_FILE;
  if (env.CATEGORY_GATE_POLICY_FILE) store.policyFile = env.CATEGORY_GATE_POLICY_FILE;
  if (env.CATEGORY_GATE_CACHE_TTL_HOURS) {
    store.cacheTtlHours = parseFloat(env.CATEGORY_GATE_CACHE_TTL_HOURS);
  }
  if (Object.keys(store).length > 0) config.store = store;

  // Fallback
  const fallback: Section = {};
  if (env.CATEGORY_GATE_FALLBACK_CATEGORY) fallback.category = env.CATEGORY_GATE_FALLBACK_CATEGORY;
  if (env.CATEGORY_GATE_FALLBACK_VERDICT) {
    fallback.verdict = env.CATEGORY_GATE_FALLBACK_VERDICT.toLowerCase();
  }
  if (Object.keys(fallback).length > 0) config.fallback = fallback;

  // Activity
  const activity: Section = {};
  if (env.CATEGORY_GATE_ACTIVITY_ENABLED !== undefined) {
    activity.enabled = env.CATEGORY_GATE_ACTIVITY_ENABLED !== 'false';
  }
  if (env.CATEGORY_GATE_ACTIVITY_DIR) activity.logDir = env.CATEGORY_GATE_ACTIVITY_DIR;
  if (Object.keys(activity).length > 0) config.activity = activity;

  return config;
}

function splitList(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asSection(value: unknown): Section {
  return isSection(value) ? value : {};
}
