import { DualStakeError } from '../errors/DualStakeError.js';

export const FLOAT_TOLERANCE = 1e-9;

/** Throws UndefinedRatio when an intermediate result is Infinity or NaN. */
export function ensureFinite(value: number, label: string): number {
  if (!Number.isFinite(value)) {
    throw new DualStakeError('UndefinedRatio', `${label} is not a finite number`, {
      details: { field: label, value }
    });
  }
  return value;
}

/**
 * Divides two floats, refusing a zero denominator or a quotient that
 * overflows to Infinity.
 */
export function safeDiv(numerator: number, denominator: number, label: string): number {
  if (denominator === 0) {
    throw new DualStakeError('UndefinedRatio', `Division by zero: ${label} is 0`, {
      details: { field: label, numerator }
    });
  }
  const quotient = numerator / denominator;
  if (!Number.isFinite(quotient)) {
    throw new DualStakeError('UndefinedRatio', `Division by ${label} is not finite`, {
      details: { field: label, numerator, denominator }
    });
  }
  return quotient;
}

export function approxEqual(a: number, b: number, tolerance = FLOAT_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

export function toPercent(fraction: number): number {
  return fraction * 100;
}

/** Evenly spaced values from start to end, both ends included. */
export function linspace(start: number, end: number, steps: number): number[] {
  if (!Number.isInteger(steps) || steps < 2) {
    throw new DualStakeError('InvalidArgument', 'linspace steps must be an integer >= 2');
  }
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new DualStakeError('InvalidArgument', 'linspace bounds must be finite');
  }
  const step = (end - start) / (steps - 1);
  const values: number[] = [];
  for (let i = 0; i < steps; i++) {
    values.push(i === steps - 1 ? end : start + step * i);
  }
  return values;
}
