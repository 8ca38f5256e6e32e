import type { Logger } from '../logging/logger.js';
import type { Classifier } from '../classifier/classifier.js';
import type { PolicyResolver } from '../policy/resolver.js';
import type { ActivityRecord, ActivitySink } from '../reporting/activity-log.js';
import { Verdict } from '../store/types.js';
import { errorMessage, isRequestAborted, type ErrorKind } from '../errors.js';
import { normalizeDomain } from '../classifier/domain.js';

/**
 * What the proxy transport hands over for each intercepted request. Only the
 * destination is inspected; the rest is copied onto the activity record.
 */
export interface RequestDescriptor {
  /** TLS SNI, when the transport has it. Preferred over `host`. */
  sni?: string;
  /** Host header or request authority. */
  host?: string;
  scheme?: string;
  method?: string;
}

export interface Decision {
  verdict: Verdict;
  record: ActivityRecord;
}

export interface EnforcementGatewayOptions {
  classifier: Classifier;
  policy: PolicyResolver;
  activity: ActivitySink;
  logger: Logger;
  fallbackCategory: string;
  /** Verdict when classification fails or the request is abandoned. */
  fallbackVerdict: Verdict;
  /** Monotonic milliseconds, for latency. */
  clock?: () => number;
  now?: () => number;
}

/**
 * Per-request entry point: descriptor in, verdict out, one activity record
 * per call. `decide` never rejects; every internal failure becomes either
 * the fallback verdict or a pass-through, with the errorKind recorded.
 */
export class EnforcementGateway {
  private classifier: Classifier;
  private policy: PolicyResolver;
  private activity: ActivitySink;
  private logger: Logger;
  private fallbackCategory: string;
  private fallbackVerdict: Verdict;
  private clock: () => number;
  private now: () => number;

  constructor(options: EnforcementGatewayOptions) {
    this.classifier = options.classifier;
    this.policy = options.policy;
    this.activity = options.activity;
    this.logger = options.logger.child({ component: 'gateway' });
    this.fallbackCategory = options.fallbackCategory;
    this.fallbackVerdict = options.fallbackVerdict;
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? Date.now;
  }

  async decide(descriptor: RequestDescriptor, options?: { signal?: AbortSignal }): Promise<Decision> {
    const started = this.clock();
    const timestamp = new Date(this.now()).toISOString();
    const rawHost = descriptor.sni || descriptor.host || '';
    const domain = normalizeDomain(rawHost);

    let category = this.fallbackCategory;
    let verdict = this.fallbackVerdict;
    let cacheHit = false;
    let errorKind: ErrorKind | undefined;

    if (!domain) {
      // Nothing to classify; let the request through untouched
      verdict = Verdict.ALLOWED;
      errorKind = 'InvalidDomain';
      this.logger.warn({ host: rawHost }, 'Could not extract a domain from request');
    } else {
      try {
        const resolution = await this.classifier.resolve(domain, options);
        category = resolution.category;
        cacheHit = resolution.cacheHit;

        if (resolution.errorKind) {
          errorKind = resolution.errorKind;
        } else {
          const decision = await this.policy.decide(category);
          verdict = decision.verdict;
          errorKind = decision.errorKind;
        }
      } catch (error) {
        if (isRequestAborted(error)) {
          errorKind = 'RequestAborted';
        } else {
          errorKind = 'EngineFailure';
          this.logger.error({ domain, err: errorMessage(error) }, 'Decision failed; applying fallback verdict');
        }
      }
    }

    const record: ActivityRecord = {
      timestamp,
      domain: domain ?? rawHost,
      category,
      verdict,
      cacheHit,
      latencyMs: roundLatency(this.clock() - started),
      ...(errorKind ? { errorKind } : {}),
      ...(descriptor.scheme ? { scheme: descriptor.scheme } : {}),
      ...(descriptor.method ? { method: descriptor.method } : {}),
    };

    if (verdict === Verdict.BLOCKED) {
      this.logger.warn({ domain: record.domain, category }, 'Blocking request');
    } else {
      this.logger.debug({ domain: record.domain, category, cacheHit }, 'Allowing request');
    }

    this.activity.record(record).catch((error: unknown) => {
      this.logger.warn({ err: errorMessage(error) }, 'Activity sink rejected a record');
    });

    return { verdict, record };
  }
}

function roundLatency(ms: number): number {
  return Math.round(Math.max(0, ms) * 1000) / 1000;
}
