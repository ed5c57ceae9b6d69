/**
 * Potion Policies
 * Witch antidote and poison. Each potion is a one-shot resource.
 */

import type { GameContext } from '../context/gameContext.js';
import { DecisionPolicy, type OverrideChoice, type PolicyDependencies } from './decisionPolicy.js';

/**
 * Saves the night's victim. The first opportunity is always taken unless the
 * victim is already deeply distrusted; later ones must clear the protection threshold.
 */
export class AntidotePolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'antidote', hostile: false, resource: 'antidote' }, deps);
  }

  protected applyOverrides(eligible: string[], context: GameContext): OverrideChoice | null {
    const base = super.applyOverrides(eligible, context);
    if (base) return base;

    const previous = context.markOpportunity('antidote');
    const victim = eligible[0];
    const trust = context.observe(victim).trust;
    if (previous === 0 && trust >= this.config.policy.antidoteMinTrust) {
      return { target: victim, kind: 'first-antidote', reason: `First chance to save ${victim}` };
    }
    return null;
  }
}

export class PoisonPolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'poison', hostile: true, resource: 'poison' }, deps);
  }
}
