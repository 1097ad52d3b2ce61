import { describe, expect, it } from 'vitest';

import { YieldEngine } from '../engine/YieldEngine.js';
import type { InputSnapshot } from '../types/SnapshotState.js';
import type { YieldBreakdown } from '../types/YieldState.js';
import { catchDualStakeError } from '../testing/errors.js';
import { parseSweepParams } from './SweepParams.js';
import { paginateTraces, rangeValues, sweepYields } from './YieldSweep.js';

describe('parseSweepParams', () => {
  it('fills in the dashboard defaults', () => {
    expect(parseSweepParams({})).toEqual({
      fixedYieldBudget: 0.08,
      nativeTotalSupply: 10_000_000_000,
      nativePrice: 1,
      bridgedAssetPrice: 75_000,
      stakingRatio: { start: 0.1, end: 1, steps: 10 },
      bridgedAssetStaked: { start: 2_000_000_000, end: 10_000_000_000, steps: 5 }
    });
  });

  it('rejects a range whose end is below its start', () => {
    const error = catchDualStakeError(() => parseSweepParams({ stakingRatio: { start: 0.5, end: 0.2, steps: 3 } }));
    expect(error?.code).toBe('InvalidArgument');
  });

  it('caps the step counts', () => {
    expect(
      catchDualStakeError(() => parseSweepParams({ stakingRatio: { start: 0.1, end: 1, steps: 101 } }))?.code
    ).toBe('InvalidArgument');
    expect(
      catchDualStakeError(() =>
        parseSweepParams({ bridgedAssetStaked: { start: 1_000_000_000, end: 2_000_000_000, steps: 11 } })
      )?.code
    ).toBe('InvalidArgument');
    expect(
      catchDualStakeError(() => parseSweepParams({ stakingRatio: { start: 0.1, end: 1, steps: 1 } }))?.code
    ).toBe('InvalidArgument');
  });

  it('keeps supply, prices and bridged stake inside the dashboard bounds', () => {
    const rejected: unknown[] = [
      { nativeTotalSupply: 999_999_999 },
      { nativeTotalSupply: 100_000_000_001 },
      { nativePrice: 1000.5 },
      { bridgedAssetPrice: 999 },
      { bridgedAssetPrice: 1_000_001 },
      { bridgedAssetStaked: { start: 999_999_999, end: 2_000_000_000, steps: 2 } },
      { bridgedAssetStaked: { start: 2_000_000_000, end: 100_000_000_001, steps: 2 } }
    ];
    for (const raw of rejected) {
      expect(catchDualStakeError(() => parseSweepParams(raw))?.code).toBe('InvalidArgument');
    }

    const edges = parseSweepParams({
      nativeTotalSupply: 100_000_000_000,
      nativePrice: 1000,
      bridgedAssetPrice: 1_000_000,
      bridgedAssetStaked: { start: 1_000_000_000, end: 100_000_000_000, steps: 2 }
    });
    expect(edges.nativeTotalSupply).toBe(100_000_000_000);
    expect(edges.bridgedAssetStaked.end).toBe(100_000_000_000);
  });

  it('rejects a staking ratio above 1 and a zero bridged stake', () => {
    expect(
      catchDualStakeError(() => parseSweepParams({ stakingRatio: { start: 0.1, end: 1.5, steps: 3 } }))?.code
    ).toBe('InvalidArgument');
    expect(
      catchDualStakeError(() => parseSweepParams({ bridgedAssetStaked: { start: 0, end: 2, steps: 2 } }))?.code
    ).toBe('InvalidArgument');
  });
});

describe('sweepYields', () => {
  it('produces one series per bridged stake value', () => {
    const result = sweepYields({
      nativePrice: 0.1,
      stakingRatio: { start: 0.1, end: 0.3, steps: 3 },
      bridgedAssetStaked: { start: 2_000_000_000, end: 4_000_000_000, steps: 2 }
    });

    expect(result.series.map((s) => s.bridgedAssetStaked)).toEqual([2_000_000_000, 4_000_000_000]);

    const [first, second] = result.series;
    expect(first?.points).toHaveLength(3);
    expect(first?.failures).toEqual([]);
    expect(first?.points[0]?.nativeStakingRatio).toBe(0.1);
    expect(first?.points[2]?.nativeStakingRatio).toBe(0.3);

    const middle = first?.points[1];
    expect(middle?.nativeStakingRatio).toBeCloseTo(0.2, 12);
    expect(middle?.beta).toBeCloseTo(0.5, 12);
    expect(middle?.nativeAPY).toBeCloseTo(10, 9);
    expect(middle?.bridgedAssetAPY).toBeCloseTo(3, 9);

    expect(second?.points[1]?.bridgedAssetAPY).toBeCloseTo(1.5, 9);
  });

  it('collects one trace per computed point', () => {
    const { series } = sweepYields({
      nativePrice: 0.1,
      stakingRatio: { start: 0.1, end: 0.3, steps: 3 },
      bridgedAssetStaked: { start: 2_000_000_000, end: 4_000_000_000, steps: 2 }
    });

    const first = series[0];
    expect(first?.traces).toHaveLength(3);
    expect(first?.traces[0]?.input.nativeStakingRatio).toBe(0.1);
    expect(first?.traces[0]?.breakdown.yields.nativeAPY).toBe(first?.points[0]?.nativeAPY);
  });

  it('records a failing point and keeps going', () => {
    const { series } = sweepYields({
      nativePrice: 0.1,
      stakingRatio: { start: 0, end: 0.2, steps: 3 },
      bridgedAssetStaked: { start: 2_000_000_000, end: 2_000_000_000, steps: 2 }
    });

    for (const s of series) {
      expect(s.points).toHaveLength(2);
      expect(s.failures).toHaveLength(1);
      expect(s.failures[0]?.code).toBe('UndefinedRatio');
      expect(s.failures[0]?.input.nativeStakingRatio).toBe(0);
      expect(s.failures[0]?.message).toBe('Division by zero: nativeStakingRatio is 0');
    }
  });

  it('fails every point of an invalid snapshot without aborting', () => {
    const { series } = sweepYields({
      nativePrice: 0,
      stakingRatio: { start: 0.1, end: 0.3, steps: 3 },
      bridgedAssetStaked: { start: 2_000_000_000, end: 4_000_000_000, steps: 2 }
    });

    expect(series).toHaveLength(2);
    for (const s of series) {
      expect(s.points).toEqual([]);
      expect(s.failures.map((f) => f.code)).toEqual(['InvalidInput', 'InvalidInput', 'InvalidInput']);
    }
  });

  it('propagates errors that are not calculation errors', () => {
    class BrokenEngine extends YieldEngine {
      override explainYields(_input: InputSnapshot): YieldBreakdown {
        throw new Error('boom');
      }
    }

    expect(() =>
      sweepYields(
        {
          stakingRatio: { start: 0.1, end: 0.3, steps: 3 },
          bridgedAssetStaked: { start: 1_000_000_000, end: 2_000_000_000, steps: 2 }
        },
        new BrokenEngine()
      )
    ).toThrow('boom');
  });

  it('rejects invalid parameters before computing anything', () => {
    expect(catchDualStakeError(() => sweepYields({ fixedYieldBudget: 2 }))?.code).toBe('InvalidArgument');
  });
});

describe('rangeValues', () => {
  it('expands a range into its sample points', () => {
    expect(rangeValues({ start: 2_000_000_000, end: 10_000_000_000, steps: 5 })).toEqual([
      2_000_000_000, 4_000_000_000, 6_000_000_000, 8_000_000_000, 10_000_000_000
    ]);
  });
});

describe('paginateTraces', () => {
  it('groups records into pages of ten by default', () => {
    const records = Array.from({ length: 25 }, (_, i) => i);
    expect(paginateTraces(records).map((page) => page.length)).toEqual([10, 10, 5]);
    expect(paginateTraces(records)[2]).toEqual([20, 21, 22, 23, 24]);
  });

  it('returns no pages for no records', () => {
    expect(paginateTraces([])).toEqual([]);
  });

  it('rejects a non-positive page size', () => {
    expect(catchDualStakeError(() => paginateTraces([1], 0))?.code).toBe('InvalidArgument');
  });
});
