/**
 * Vote Policy
 * Day vote; abstains when no one clears the vote threshold
 */

import { DecisionPolicy, type PolicyDependencies } from './decisionPolicy.js';

export class VotePolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'vote', hostile: true }, deps);
  }
}
