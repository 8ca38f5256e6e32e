import type { Logger } from '../logging/logger.js';
import type { PersistentStore } from '../store/persistent-store.js';
import { Verdict } from '../store/types.js';
import { errorMessage, storeErrorKind, type ErrorKind } from '../errors.js';

export interface PolicyDecision {
  verdict: Verdict;
  /** This lookup added the category to the policy table. */
  registered: boolean;
  /** Set when the table held a value that is not a verdict. */
  errorKind?: ErrorKind;
}

/**
 * Maps categories to verdicts against the live policy file.
 *
 * Unknown categories are registered with the default verdict as an explicit
 * side effect of the lookup. Entries an operator set to something other
 * than allowed/blocked are reported and treated as the default, and are
 * left as written.
 */
export class PolicyResolver {
  private store: PersistentStore;
  private logger: Logger;
  private defaultVerdict: Verdict;

  constructor(options: { store: PersistentStore; logger: Logger; defaultVerdict?: Verdict }) {
    this.store = options.store;
    this.logger = options.logger.child({ component: 'policy' });
    this.defaultVerdict = options.defaultVerdict ?? Verdict.ALLOWED;
  }

  async verdictFor(category: string): Promise<Verdict> {
    return (await this.decide(category)).verdict;
  }

  async decide(category: string): Promise<PolicyDecision> {
    const lookup = await this.store.getPolicy(category);

    switch (lookup.status) {
      case 'set':
        return { verdict: lookup.verdict, registered: false };

      case 'invalid':
        this.logger.warn(
          { errorKind: 'InvalidPolicyValue', category, value: lookup.raw, verdict: this.defaultVerdict },
          'Invalid policy value; treating category as unresolved',
        );
        return { verdict: this.defaultVerdict, registered: false, errorKind: 'InvalidPolicyValue' };

      case 'absent':
        return { verdict: this.defaultVerdict, registered: await this.register(category) };
    }
  }

  private async register(category: string): Promise<boolean> {
    try {
      const added = await this.store.registerCategory(category, this.defaultVerdict);
      if (added) {
        this.logger.info({ category, verdict: this.defaultVerdict }, 'Registered unseen category');
      }
      return added;
    } catch (error) {
      this.logger.warn(
        { category, errorKind: storeErrorKind(error), err: errorMessage(error) },
        'Policy registration not persisted; category allowed in memory',
      );
      return true;
    }
  }
}
