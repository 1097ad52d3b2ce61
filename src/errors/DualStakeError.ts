export type DualStakeErrorCode =
  | 'InvalidInput'
  | 'UndefinedRatio'
  | 'InvalidPolicyState'
  | 'InvalidArgument'
  | 'InvariantViolation';

export class DualStakeError extends Error {
  readonly code: DualStakeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: DualStakeErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DualStakeError';
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

export function isDualStakeError(error: unknown): error is DualStakeError {
  return error instanceof DualStakeError;
}
