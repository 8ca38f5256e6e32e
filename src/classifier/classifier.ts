import type { Logger } from '../logging/logger.js';
import type { PersistentStore } from '../store/persistent-store.js';
import { Verdict } from '../store/types.js';
import { RetryPolicy } from '../retry-policy.js';
import {
  RequestAbortedError,
  errorMessage,
  isOracleError,
  storeErrorKind,
  type ErrorKind,
  type OracleErrorKind,
} from '../errors.js';
import { normalizeDomain } from './domain.js';
import { SingleFlight } from './single-flight.js';

/** Anything that can turn a domain into a category label with one call. */
export interface CategoryOracle {
  classify(domain: string): Promise<string>;
}

export interface Resolution {
  /** Normalized domain, or the raw input when it could not be normalized. */
  domain: string;
  category: string;
  cacheHit: boolean;
  /** True when this caller joined a classification another caller started. */
  joined: boolean;
  /** Set when `category` is the fallback rather than a classification. */
  errorKind?: ErrorKind;
}

export interface ClassifierOptions {
  store: PersistentStore;
  oracle: CategoryOracle;
  retry: RetryPolicy<OracleErrorKind>;
  logger: Logger;
  /** Category reported when classification fails. Never cached. */
  fallbackCategory: string;
  /** Cap applied to server-requested waits between oracle attempts. */
  maxRetryDelayMs?: number;
  now?: () => number;
}

interface FlightOutcome {
  category: string;
  errorKind?: OracleErrorKind;
  /** The entry was already cached when the flight started. */
  cached: boolean;
}

/**
 * Resolves domains to categories.
 *
 * Cache hits never leave the process. Misses go through a per-domain
 * single-flight, so concurrent requests for one uncached domain share a
 * single (retried) oracle classification, its cache write and its policy
 * registration. Oracle failures come back as the fallback category with an
 * errorKind and are not cached.
 */
export class Classifier {
  private store: PersistentStore;
  private oracle: CategoryOracle;
  private retry: RetryPolicy<OracleErrorKind>;
  private logger: Logger;
  private fallbackCategory: string;
  private maxRetryDelayMs: number;
  private now: () => number;
  private flights = new SingleFlight<FlightOutcome>();

  constructor(options: ClassifierOptions) {
    this.store = options.store;
    this.oracle = options.oracle;
    this.retry = options.retry;
    this.logger = options.logger.child({ component: 'classifier' });
    this.fallbackCategory = options.fallbackCategory;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /** Domains with a classification currently in progress. */
  get inFlight(): number {
    return this.flights.size;
  }

  /**
   * Resolve `input` to a category. Rejects only with RequestAbortedError,
   * when `signal` fires before the answer arrives; the classification itself
   * carries on and still populates the cache.
   */
  async resolve(input: string, options?: { signal?: AbortSignal }): Promise<Resolution> {
    const domain = normalizeDomain(input);
    if (!domain) {
      return {
        domain: input,
        category: this.fallbackCategory,
        cacheHit: false,
        joined: false,
        errorKind: 'InvalidDomain',
      };
    }

    const cached = await this.store.get(domain);
    if (cached) {
      return { domain, category: cached.category, cacheHit: true, joined: false };
    }

    const { promise, joined } = this.flights.run(domain, () => this.classifyAndRecord(domain));
    const outcome = options?.signal
      ? await waitUnlessAborted(promise, options.signal, domain)
      : await promise;

    return {
      domain,
      category: outcome.category,
      cacheHit: outcome.cached,
      joined,
      ...(outcome.errorKind ? { errorKind: outcome.errorKind } : {}),
    };
  }

  private async classifyAndRecord(domain: string): Promise<FlightOutcome> {
    // A flight for this domain may have finished between our lookup and now
    const cached = await this.store.get(domain);
    if (cached) return { category: cached.category, cached: true };

    const started = this.now();
    let category: string;
    try {
      category = await this.retry.run(
        () => this.oracle.classify(domain),
        error => (isOracleError(error) ? error.kind : null),
        {
          delayHint: error =>
            isOracleError(error) && error.retryAfterMs !== undefined
              ? Math.min(error.retryAfterMs, this.maxRetryDelayMs)
              : undefined,
          onRetry: ({ attempt, delayMs, error }) =>
            this.logger.debug(
              { domain, attempt, delayMs, errorKind: isOracleError(error) ? error.kind : undefined },
              'Retrying oracle call',
            ),
        },
      );
    } catch (error) {
      const errorKind: OracleErrorKind = isOracleError(error) ? error.kind : 'OracleUnreachable';
      this.logger.warn(
        { domain, errorKind, err: errorMessage(error), fallbackCategory: this.fallbackCategory },
        'Classification failed; using fallback category',
      );
      return { category: this.fallbackCategory, errorKind, cached: false };
    }

    this.logger.info({ domain, category, oracleLatencyMs: this.now() - started }, 'Domain classified');

    try {
      await this.store.put({ domain, category, observedAt: new Date(this.now()).toISOString() });
    } catch (error) {
      this.logger.warn(
        { domain, errorKind: storeErrorKind(error), err: errorMessage(error) },
        'Domain cache write failed; entry kept in memory only',
      );
    }

    try {
      if (await this.store.registerCategory(category, Verdict.ALLOWED)) {
        this.logger.info({ category, verdict: Verdict.ALLOWED }, 'Registered new category');
      }
    } catch (error) {
      this.logger.warn(
        { category, errorKind: storeErrorKind(error), err: errorMessage(error) },
        'Policy registration not persisted; category allowed in memory',
      );
    }

    return { category, cached: false };
  }
}

function waitUnlessAborted<T>(promise: Promise<T>, signal: AbortSignal, domain: string): Promise<T> {
  if (signal.aborted) return Promise.reject(new RequestAbortedError(domain));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestAbortedError(domain));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
