import { z } from 'zod';

export const VerdictValueSchema = z.enum(['allowed', 'blocked']);

export const OracleErrorKindSchema = z.enum([
  'OracleUnreachable',
  'OracleTimeout',
  'OracleMalformedResponse',
  'OracleRateLimited',
]);

/**
 * Zod schema for category-gate configuration.
 * Used to validate environment variables and config file values.
 */
export const CategoryGateConfigSchema = z.object({
  /** Categorization service credential. Empty disables oracle calls, not the engine. */
  apiKey: z.string().default(''),

  /** External categorization oracle. */
  oracle: z.object({
    apiUrl: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
    model: z.string().min(1).default('gemini-2.5-flash'),
    timeoutMs: z.number().int().positive().default(5000),
  }).default({}),

  /** Retry schedule applied by the classifier around oracle calls. */
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10).default(2),
    backoffMs: z.array(z.number().int().min(0)).default([250]),
    retryOn: z.array(OracleErrorKindSchema).default(['OracleUnreachable', 'OracleRateLimited']),
  }).default({}),

  /** Durable cache and policy files. */
  store: z.object({
    dataDir: z.string().optional(),
    cacheFile: z.string().min(1).default('domain_cache.json'),
    policyFile: z.string().min(1).default('categories.json'),
    /** 0 keeps entries until an operator clears them. */
    cacheTtlHours: z.number().min(0).default(0),
    writeAttempts: z.number().int().min(1).max(10).default(3),
    writeBackoffMs: z.number().int().min(0).default(50),
  }).default({}),

  /** What to return when classification fails. */
  fallback: z.object({
    category: z.string().min(1).max(50).default('Uncategorized'),
    verdict: VerdictValueSchema.default('allowed'),
  }).default({}),

  /** Per-decision JSONL activity log. */
  activity: z.object({
    enabled: z.boolean().default(true),
    logDir: z.string().optional(),
  }).default({}),

  /** Application log level and optional rotated log directory. */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logDir: z.string().optional(),
});

export type CategoryGateConfig = z.infer<typeof CategoryGateConfigSchema>;
export type VerdictValue = z.infer<typeof VerdictValueSchema>;
