/**
 * Shoot Policy
 * Hunter and wolf king parting shot. One use per game; when the shooter was
 * voted out, the player who led that vote is taken first.
 */

import { DecisionPolicy, type PolicyDependencies } from './decisionPolicy.js';

export class ShootPolicy extends DecisionPolicy {
  constructor(deps: PolicyDependencies) {
    super({ action: 'shoot', hostile: true, resource: 'shoot', revenge: true }, deps);
  }
}
