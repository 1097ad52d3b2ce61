import { z } from 'zod';
import { DualStakeError } from '../errors/DualStakeError.js';

const rangeSchema = (opts: { min: number; max: number; maxSteps: number }) =>
  z
    .object({
      start: z.number().finite().min(opts.min).max(opts.max),
      end: z.number().finite().max(opts.max),
      steps: z.number().int().min(2).max(opts.maxSteps)
    })
    .refine((range) => range.end >= range.start, {
      message: 'end must be >= start',
      path: ['end']
    });

export const StakingRatioRangeSchema = rangeSchema({ min: 0, max: 1, maxSteps: 100 });

export const BridgedStakeRangeSchema = rangeSchema({
  min: 1_000_000_000,
  max: 100_000_000_000,
  maxSteps: 10
});

export const SweepParamsSchema = z.object({
  fixedYieldBudget: z.number().finite().min(0).max(1).default(0.08),
  nativeTotalSupply: z.number().finite().min(1_000_000_000).max(100_000_000_000).default(10_000_000_000),
  nativePrice: z.number().finite().min(0).max(1000).default(1.0),
  bridgedAssetPrice: z.number().finite().min(1000).max(1_000_000).default(75_000),
  stakingRatio: StakingRatioRangeSchema.default({ start: 0.1, end: 1.0, steps: 10 }),
  bridgedAssetStaked: BridgedStakeRangeSchema.default({
    start: 2_000_000_000,
    end: 10_000_000_000,
    steps: 5
  })
});

export type SweepRange = z.infer<typeof StakingRatioRangeSchema>;
export type SweepParams = z.infer<typeof SweepParamsSchema>;
export type SweepParamsInput = z.input<typeof SweepParamsSchema>;

export function parseSweepParams(raw: unknown): SweepParams {
  const parsed = SweepParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DualStakeError('InvalidArgument', 'Invalid sweep parameters', {
      details: { issues: parsed.error.issues }
    });
  }
  return parsed.data;
}
