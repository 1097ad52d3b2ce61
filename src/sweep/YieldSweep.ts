import { YieldEngine } from '../engine/YieldEngine.js';
import type { DualStakeErrorCode } from '../errors/DualStakeError.js';
import { isDualStakeError, DualStakeError } from '../errors/DualStakeError.js';
import type { InputSnapshot } from '../types/SnapshotState.js';
import type { YieldTrace } from '../types/YieldState.js';
import { linspace } from '../utils/math.js';
import type { SweepParamsInput, SweepRange } from './SweepParams.js';
import { parseSweepParams } from './SweepParams.js';

export type SweepPoint = {
  nativeStakingRatio: number;
  beta: number;
  nativeAPY: number;
  bridgedAssetAPY: number;
};

export type SweepFailure = {
  input: InputSnapshot;
  code: DualStakeErrorCode;
  message: string;
};

export type SweepSeries = {
  bridgedAssetStaked: number;
  points: SweepPoint[];
  failures: SweepFailure[];
  traces: YieldTrace[];
};

export type SweepResult = {
  series: SweepSeries[];
};

export function rangeValues(range: SweepRange): number[] {
  return linspace(range.start, range.end, range.steps);
}

/**
 * Runs the engine over every (bridgedAssetStaked, nativeStakingRatio) pair.
 * A calculation error at one point is recorded and the sweep moves on;
 * anything that is not a DualStakeError propagates.
 */
export function sweepYields(params: SweepParamsInput, engine: YieldEngine = new YieldEngine()): SweepResult {
  const p = parseSweepParams(params);

  const ratios = rangeValues(p.stakingRatio);
  const stakes = rangeValues(p.bridgedAssetStaked);

  const series = stakes.map((bridgedAssetStaked): SweepSeries => {
    const points: SweepPoint[] = [];
    const failures: SweepFailure[] = [];
    const traces: YieldTrace[] = [];

    for (const nativeStakingRatio of ratios) {
      const input: InputSnapshot = {
        fixedYieldBudget: p.fixedYieldBudget,
        nativeTotalSupply: p.nativeTotalSupply,
        bridgedAssetStaked,
        nativeStakingRatio,
        nativePrice: p.nativePrice,
        bridgedAssetPrice: p.bridgedAssetPrice
      };

      try {
        const breakdown = engine.explainYields(input);
        traces.push({ input, breakdown });
        points.push({
          nativeStakingRatio,
          beta: breakdown.beta,
          nativeAPY: breakdown.yields.nativeAPY,
          bridgedAssetAPY: breakdown.yields.bridgedAssetAPY
        });
      } catch (error) {
        if (!isDualStakeError(error)) throw error;
        failures.push({ input, code: error.code, message: error.message });
      }
    }

    return { bridgedAssetStaked, points, failures, traces };
  });

  return { series };
}

export function paginateTraces<T>(traces: readonly T[], pageSize = 10): T[][] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new DualStakeError('InvalidArgument', 'pageSize must be a positive integer');
  }
  const pages: T[][] = [];
  for (let i = 0; i < traces.length; i += pageSize) {
    pages.push(traces.slice(i, i + pageSize));
  }
  return pages;
}
