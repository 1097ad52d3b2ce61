import { DualStakeError } from '../errors/DualStakeError.js';
import { RateSplitPolicy } from '../policy/RateSplitPolicy.js';
import type { InputSnapshot } from '../types/SnapshotState.js';
import { FRACTION_FIELDS, POSITIVE_FIELDS } from '../types/SnapshotState.js';
import type { TraceSink, YieldBreakdown, YieldResult } from '../types/YieldState.js';
import { ensureFinite, safeDiv, toPercent } from '../utils/math.js';

export type ComputeYieldsOptions = {
  /** Receives every intermediate value of the calculation. */
  onTrace?: TraceSink;
};

export type BridgedAssetYield = {
  nativeFullyDilutedValue: number;
  bridgedAssetAmountDistributed: number;
  bridgedAssetAPY: number;
};

export class YieldEngine {
  constructor(readonly policy: RateSplitPolicy = new RateSplitPolicy()) {}

  static validateSnapshot(input: InputSnapshot): void {
    for (const field of [...FRACTION_FIELDS, ...POSITIVE_FIELDS]) {
      const value = input[field];
      if (!Number.isFinite(value)) {
        throw new DualStakeError('InvalidInput', `${field} must be a finite number`, {
          details: { field, value }
        });
      }
    }

    for (const field of FRACTION_FIELDS) {
      const value = input[field];
      if (value < 0 || value > 1) {
        throw new DualStakeError('InvalidInput', `${field} must be in [0, 1]`, {
          details: { field, value }
        });
      }
    }

    for (const field of POSITIVE_FIELDS) {
      const value = input[field];
      if (value <= 0) {
        throw new DualStakeError('InvalidInput', `${field} must be > 0`, {
          details: { field, value }
        });
      }
    }
  }

  computeNativeAPY(input: InputSnapshot, nativeShare: number): number {
    const rate = safeDiv(input.fixedYieldBudget * nativeShare, input.nativeStakingRatio, 'nativeStakingRatio');
    return ensureFinite(toPercent(rate), 'nativeAPY');
  }

  computeBridgedAssetAPY(input: InputSnapshot, bridgedShare: number): number {
    return this.computeBridgedAssetYield(input, bridgedShare).bridgedAssetAPY;
  }

  computeBridgedAssetYield(input: InputSnapshot, bridgedShare: number): BridgedAssetYield {
    const nativeFullyDilutedValue = ensureFinite(
      input.nativeTotalSupply * input.nativePrice,
      'nativeFullyDilutedValue'
    );

    const bridgedAssetAmountDistributed = safeDiv(
      input.fixedYieldBudget * bridgedShare * nativeFullyDilutedValue,
      input.bridgedAssetPrice,
      'bridgedAssetPrice'
    );

    // Staked amount expressed in bridged-asset units at the current price.
    const stakedUnits = safeDiv(input.bridgedAssetStaked, input.bridgedAssetPrice, 'bridgedAssetPrice');

    const bridgedAssetAPY = ensureFinite(
      toPercent(safeDiv(bridgedAssetAmountDistributed, stakedUnits, 'bridgedAssetStaked')),
      'bridgedAssetAPY'
    );

    return { nativeFullyDilutedValue, bridgedAssetAmountDistributed, bridgedAssetAPY };
  }

  explainYields(input: InputSnapshot): YieldBreakdown {
    YieldEngine.validateSnapshot(input);

    const { beta, gamma, split } = this.policy.resolve(input.nativeStakingRatio);
    const nativeAPY = this.computeNativeAPY(input, split.nativeShare);
    const bridged = this.computeBridgedAssetYield(input, split.bridgedShare);

    return {
      beta,
      gamma,
      split,
      nativeFullyDilutedValue: bridged.nativeFullyDilutedValue,
      bridgedAssetAmountDistributed: bridged.bridgedAssetAmountDistributed,
      yields: { nativeAPY, bridgedAssetAPY: bridged.bridgedAssetAPY }
    };
  }

  computeYields(input: InputSnapshot, options?: ComputeYieldsOptions): YieldResult {
    const breakdown = this.explainYields(input);
    options?.onTrace?.({ input, breakdown });
    return { ...breakdown.yields };
  }
}

const defaultEngine = new YieldEngine();

/** Yields under the default policy. */
export function computeYields(input: InputSnapshot, options?: ComputeYieldsOptions): YieldResult {
  return defaultEngine.computeYields(input, options);
}
