export * from './src/policy/RateSplitPolicy.js';
export * from './src/policy/PolicyConfig.js';

export * from './src/engine/YieldEngine.js';

export * from './src/sweep/YieldSweep.js';
export * from './src/sweep/SweepParams.js';

export * from './src/types/SnapshotState.js';
export * from './src/types/YieldState.js';

export * from './src/errors/DualStakeError.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
