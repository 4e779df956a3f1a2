/**
 * Failure information shared by the lattice model, path builder and selector.
 */

/**
 * Reasons why an operation on the lattice model can fail.
 */
export type LatticeErrorReason =
  | 'INVALID_RANGE'
  | 'INVALID_INDEX'
  | 'EMPTY_SELECTION'
  | 'DUPLICATE_ELEMENT'
  | 'INVALID_NODE'
  | 'INVALID_STACK'
  | 'AMBIGUOUS_NON_CONTIGUITY'
  | 'VIEWPORT_TOO_SMALL'
  | 'INVALID_CONFIG';

/**
 * Information about a failed operation.
 *
 * Returned (not thrown) by state-machine and rendering operations so the
 * caller can re-prompt without losing state.
 */
export interface LatticeFailure {
  readonly reason: LatticeErrorReason;
  readonly details?: string;
}

/**
 * Create a frozen failure value.
 */
export function latticeFailure(reason: LatticeErrorReason, details?: string): LatticeFailure {
  return Object.freeze(details === undefined ? { reason } : { reason, details });
}

/**
 * Type guard to check if a result is a LatticeFailure.
 */
export function isLatticeFailure(value: unknown): value is LatticeFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'reason' in value &&
    !(value instanceof Error)
  );
}

/**
 * Error thrown by constructors when a value would break a model invariant.
 */
export class LatticeError extends Error {
  constructor(
    public readonly reason: LatticeErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'LatticeError';
  }

  /**
   * Convert to the non-throwing failure form.
   */
  toFailure(): LatticeFailure {
    return latticeFailure(this.reason, this.message);
  }
}

export function isLatticeError(value: unknown): value is LatticeError {
  return value instanceof LatticeError;
}
