import type { InputSnapshot } from './SnapshotState.js';

export type SplitResult = {
  nativeShare: number;
  bridgedShare: number;
};

/** Percentages (fraction x 100), unbounded above. */
export type YieldResult = {
  nativeAPY: number;
  bridgedAssetAPY: number;
};

export type YieldBreakdown = {
  beta: number;
  gamma: number;
  split: SplitResult;
  nativeFullyDilutedValue: number;
  bridgedAssetAmountDistributed: number;
  yields: YieldResult;
};

export type YieldTrace = {
  input: InputSnapshot;
  breakdown: YieldBreakdown;
};

export type TraceSink = (trace: YieldTrace) => void;
