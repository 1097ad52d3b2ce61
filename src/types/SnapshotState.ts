/**
 * Economic inputs for one yield calculation. Fractions are unit-less ratios in
 * [0, 1]; quantities and prices are strictly positive.
 */
export type InputSnapshot = {
  readonly fixedYieldBudget: number;
  readonly nativeTotalSupply: number;
  readonly bridgedAssetStaked: number;
  readonly nativeStakingRatio: number;
  readonly nativePrice: number;
  readonly bridgedAssetPrice: number;
};

export type SnapshotField = keyof InputSnapshot;

export const FRACTION_FIELDS: readonly SnapshotField[] = ['fixedYieldBudget', 'nativeStakingRatio'];

export const POSITIVE_FIELDS: readonly SnapshotField[] = [
  'nativeTotalSupply',
  'bridgedAssetStaked',
  'nativePrice',
  'bridgedAssetPrice'
];
