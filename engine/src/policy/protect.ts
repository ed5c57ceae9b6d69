/**
 * Protect Policy
 * Guard night protection; the same player may not be guarded two nights running
 */

import type { GameContext } from '../context/gameContext.js';
import { DecisionPolicy, type PolicyDependencies } from './decisionPolicy.js';

export class ProtectPolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'protect', hostile: false }, deps);
  }

  protected exclusionReason(id: string, context: GameContext): string | null {
    if (context.lastTarget('protect') === id) return 'guarded last night';
    return super.exclusionReason(id, context);
  }
}
