import { DualStakeError } from '../errors/DualStakeError.js';
import type { SplitResult } from '../types/YieldState.js';
import { assertFinite, invariant } from '../utils/invariant.js';
import { FLOAT_TOLERANCE, approxEqual } from '../utils/math.js';
import type { FrozenMultiplierTier, FrozenRateSplitPolicyConfig, RateSplitPolicyConfig } from './PolicyConfig.js';
import { DEFAULT_RATE_SPLIT_POLICY, freezeRateSplitPolicyConfig } from './PolicyConfig.js';

function tierMatches(tier: FrozenMultiplierTier, beta: number): boolean {
  if (tier.upTo === undefined) return true;
  return tier.upTo.inclusive ? beta <= tier.upTo.beta : beta < tier.upTo.beta;
}

/**
 * Maps the native staking ratio to a reward split between native and
 * bridged-asset stakers.
 *
 * beta = ratio / target, gamma is picked from the tier table, and the split
 * solves nativeShare / bridgedShare = gamma with both shares summing to 1.
 */
export class RateSplitPolicy {
  readonly config: FrozenRateSplitPolicyConfig;

  constructor(config: RateSplitPolicyConfig = DEFAULT_RATE_SPLIT_POLICY) {
    this.config = freezeRateSplitPolicyConfig(config);
  }

  get targetStakingRatio(): number {
    return this.config.targetStakingRatio;
  }

  computeBeta(nativeStakingRatio: number): number {
    assertFinite(nativeStakingRatio, 'nativeStakingRatio');
    return nativeStakingRatio / this.config.targetStakingRatio;
  }

  computeMultiplier(beta: number): number {
    assertFinite(beta, 'beta');
    const tier = this.config.tiers.find((t) => tierMatches(t, beta));
    // Unreachable while the config keeps an unbounded last tier.
    if (!tier) {
      throw new DualStakeError('InvalidPolicyState', 'No multiplier tier matches beta', {
        details: { beta }
      });
    }
    return tier.gamma;
  }

  computeSplit(gamma: number): SplitResult {
    if (!Number.isFinite(gamma) || gamma + 1 === 0) {
      throw new DualStakeError('InvalidPolicyState', 'Invalid gamma value leading to division by zero', {
        details: { gamma }
      });
    }

    const bridgedShare = 1 / (gamma + 1);
    const nativeShare = 1 - bridgedShare;

    invariant(
      approxEqual(nativeShare + bridgedShare, 1, FLOAT_TOLERANCE),
      'split shares must sum to 1'
    );

    return { nativeShare, bridgedShare };
  }

  /** beta, gamma and split in one pass. */
  resolve(nativeStakingRatio: number): { beta: number; gamma: number; split: SplitResult } {
    const beta = this.computeBeta(nativeStakingRatio);
    const gamma = this.computeMultiplier(beta);
    return { beta, gamma, split: this.computeSplit(gamma) };
  }
}
