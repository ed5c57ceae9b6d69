/**
 * Kill Policy
 * Night kill for the wolf team, scored by threat. Teammates are verified
 * allies in the wolf's context and are never eligible.
 */

import { DecisionPolicy, type PolicyDependencies } from './decisionPolicy.js';

export class KillPolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'kill', hostile: true }, deps);
  }
}
