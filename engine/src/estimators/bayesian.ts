/**
 * Bayesian Estimator
 * Likelihood-ratio update of the probability that a player is hostile,
 * starting from the share of wolves at the table
 */

import { clamp } from '../trust/trustEngine.js';
import type { ExternalProbabilityEstimator, PlayerFeatures } from './features.js';

export interface BayesianOptions {
  prior?: number;
  floor?: number;
  ceiling?: number;
  maxContradictions?: number;
}

export class BayesianEstimator implements ExternalProbabilityEstimator {
  readonly name = 'bayesian';
  private prior: number;
  private floor: number;
  private ceiling: number;
  private maxContradictions: number;

  constructor(options: BayesianOptions = {}) {
    this.prior = options.prior ?? 0.33;
    this.floor = options.floor ?? 0.01;
    this.ceiling = options.ceiling ?? 0.99;
    this.maxContradictions = options.maxContradictions ?? 5;
  }

  /**
   * Product of the likelihood ratios that apply to the features
   */
  likelihoodRatio(f: PlayerFeatures): number {
    let ratio = 1;

    if (f.injections > 0) ratio *= 7;
    if (f.falseQuotes > 0) ratio *= 4;

    if (f.resolvedVotes > 0) {
      if (f.voteAccuracy < 0.3) ratio *= 3;
      else if (f.voteAccuracy > 0.7) ratio *= 0.3;
    }

    if (f.speechSamples > 0) {
      if (f.speechQuality < 0.3) ratio *= 2;
      else if (f.speechQuality > 0.7) ratio *= 0.5;
    }

    if (f.contradictions > 0) ratio *= 1.5 ** Math.min(f.contradictions, this.maxContradictions);
    if (f.fakeRoleClaim > 0) ratio *= 10;

    return ratio;
  }

  predict(features: PlayerFeatures): number {
    const priorOdds = this.prior / (1 - this.prior);
    const odds = priorOdds * this.likelihoodRatio(features);
    return clamp(odds / (1 + odds), this.floor, this.ceiling);
  }
}
