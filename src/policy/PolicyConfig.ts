import { z } from 'zod';
import { DualStakeError } from '../errors/DualStakeError.js';

export const TierBoundSchema = z.object({
  beta: z.number().finite(),
  inclusive: z.boolean()
});

export const MultiplierTierSchema = z.object({
  gamma: z.number().finite().min(0, 'gamma must be >= 0'),
  upTo: TierBoundSchema.optional()
});

/**
 * Tiers are matched in order; a tier with no `upTo` catches everything and
 * must come last.
 */
export const RateSplitPolicyConfigSchema = z
  .object({
    targetStakingRatio: z.number().finite().positive('targetStakingRatio must be > 0'),
    tiers: z.array(MultiplierTierSchema).min(1, 'at least one multiplier tier is required')
  })
  .superRefine((config, ctx) => {
    const last = config.tiers.length - 1;
    let previousBeta = -Infinity;
    config.tiers.forEach((tier, index) => {
      if (index === last) {
        if (tier.upTo !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tiers', index, 'upTo'],
            message: 'the last tier must be unbounded'
          });
        }
        return;
      }
      if (tier.upTo === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tiers', index, 'upTo'],
          message: 'only the last tier may be unbounded'
        });
        return;
      }
      if (tier.upTo.beta <= previousBeta) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tiers', index, 'upTo', 'beta'],
          message: 'tier bounds must be strictly ascending'
        });
      }
      previousBeta = tier.upTo.beta;
    });
  });

export type TierBound = z.infer<typeof TierBoundSchema>;
export type MultiplierTier = z.infer<typeof MultiplierTierSchema>;
export type RateSplitPolicyConfig = z.infer<typeof RateSplitPolicyConfigSchema>;

export type FrozenMultiplierTier = {
  readonly gamma: number;
  readonly upTo?: Readonly<TierBound>;
};

export type FrozenRateSplitPolicyConfig = {
  readonly targetStakingRatio: number;
  readonly tiers: readonly FrozenMultiplierTier[];
};

/** Target staking ratio 0.4; beta = 1 and beta = 2.4 both belong to the 2/3 tier. */
export const DEFAULT_RATE_SPLIT_POLICY: RateSplitPolicyConfig = {
  targetStakingRatio: 0.4,
  tiers: [
    { gamma: 1 / 3, upTo: { beta: 1, inclusive: false } },
    { gamma: 2 / 3, upTo: { beta: 2.4, inclusive: true } },
    { gamma: 1 }
  ]
};

export function parseRateSplitPolicyConfig(raw: unknown): RateSplitPolicyConfig {
  const parsed = RateSplitPolicyConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DualStakeError('InvalidPolicyState', 'Invalid rate split policy config', {
      details: { issues: parsed.error.issues }
    });
  }
  return parsed.data;
}

/** Validates, then deep-freezes, so the checked table cannot change afterwards. */
export function freezeRateSplitPolicyConfig(raw: unknown): FrozenRateSplitPolicyConfig {
  const config = parseRateSplitPolicyConfig(raw);
  const tiers = config.tiers.map((tier: MultiplierTier): FrozenMultiplierTier =>
    Object.freeze(
      tier.upTo === undefined ? { gamma: tier.gamma } : { gamma: tier.gamma, upTo: Object.freeze({ ...tier.upTo }) }
    )
  );
  return Object.freeze({
    targetStakingRatio: config.targetStakingRatio,
    tiers: Object.freeze(tiers)
  });
}
