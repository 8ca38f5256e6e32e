/**
 * Types shared by the persistent store, classifier and policy resolver.
 */

export enum Verdict {
  ALLOWED = 'allowed',
  BLOCKED = 'blocked',
}

/** One cached classification. Replaced whole, never patched. */
export interface CacheEntry {
  /** Normalized hostname. */
  domain: string;
  category: string;
  /** ISO 8601 time of the oracle answer that produced this entry. */
  observedAt: string;
}

/** Category → verdict, as currently readable from the policy file. */
export type PolicyTable = Map<string, Verdict>;

/** Result of looking a category up in the policy file. */
export type PolicyLookup =
  | { status: 'set'; verdict: Verdict }
  | { status: 'absent' }
  | { status: 'invalid'; raw: string };

export interface StoreStats {
  cacheEntries: number;
  policyEntries: number;
  invalidPolicyEntries: number;
  pendingRegistrations: number;
}

/**
 * Parse a policy file value. Matching is case-insensitive; anything other
 * than "allowed" or "blocked" is rejected.
 */
export function parseVerdict(raw: unknown): Verdict | null {
  if (typeof raw !== 'string') return null;
  switch (raw.toLowerCase()) {
    case 'allowed':
      return Verdict.ALLOWED;
    case 'blocked':
      return Verdict.BLOCKED;
    default:
      return null;
  }
}
