/**
 * Check Policy
 * Seer night check: the most suspicious player whose alignment is still unknown
 */

import type { GameContext } from '../context/gameContext.js';
import { DecisionPolicy, type PolicyDependencies } from './decisionPolicy.js';

export class CheckPolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'check', hostile: true }, deps);
  }

  protected exclusionReason(id: string, context: GameContext): string | null {
    if (context.entity(id)?.verifiedAlignment) return 'already verified';
    return super.exclusionReason(id, context);
  }
}
