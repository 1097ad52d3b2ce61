import { describe, expect, it } from 'vitest';

import { computeYields, linspace, safeDiv } from '../index.js';
import type { InputSnapshot } from '../index.js';

const snapshot: InputSnapshot = {
  fixedYieldBudget: 0.08,
  nativeTotalSupply: 10_000_000_000,
  bridgedAssetStaked: 2_000_000_000,
  nativeStakingRatio: 0.2,
  nativePrice: 0.1,
  bridgedAssetPrice: 75_000
};

describe('smoke', () => {
  it('math helpers behave deterministically', () => {
    expect(safeDiv(6, 3, 'denominator')).toBe(2);
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('computeYields is a pure function of its snapshot', () => {
    const a = computeYields(snapshot);
    const b = computeYields({ ...snapshot });

    expect(Object.is(a.nativeAPY, b.nativeAPY)).toBe(true);
    expect(Object.is(a.bridgedAssetAPY, b.bridgedAssetAPY)).toBe(true);
  });
});
