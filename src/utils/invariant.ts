import { DualStakeError } from '../errors/DualStakeError.js';

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new DualStakeError('InvariantViolation', message);
  }
}

export function assertFinite(value: number, fieldName: string): number {
  if (!Number.isFinite(value)) {
    throw new DualStakeError('InvalidInput', `${fieldName} must be a finite number`, {
      details: { field: fieldName, value }
    });
  }
  return value;
}
