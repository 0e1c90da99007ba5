export const ErrorCodes = {
  // Invariant violations
  CANNOT_STAKE_ZERO: 'CANNOT_STAKE_ZERO',
  CANNOT_WITHDRAW_ZERO: 'CANNOT_WITHDRAW_ZERO',
  INSUFFICIENT_STAKE: 'INSUFFICIENT_STAKE',
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INVALID_ACCOUNT: 'INVALID_ACCOUNT',
  NOT_INITIALIZED: 'NOT_INITIALIZED',
  REENTRANT_CALL: 'REENTRANT_CALL',

  // Authorization
  NOT_OWNER: 'NOT_OWNER',
  NOT_REWARD_DISTRIBUTION: 'NOT_REWARD_DISTRIBUTION',
  MISSING_ADMIN_KEY: 'MISSING_ADMIN_KEY',
  INVALID_ADMIN_KEY: 'INVALID_ADMIN_KEY',

  // Allocation ledger
  ONLY_DISTRIBUTOR_ROLE: 'ONLY_DISTRIBUTOR_ROLE',
  INSUFFICIENT_ASSIGNED: 'INSUFFICIENT_ASSIGNED',
  ASSIGN_EXCEEDS_SUPPLY: 'ASSIGN_EXCEEDS_SUPPLY',

  // Wrapped reward token
  ONLY_TO_STAKER: 'ONLY_TO_STAKER',
  ONLY_STAKER: 'ONLY_STAKER',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',

  INVALID_QUERY: 'INVALID_QUERY',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Fatal error for a distributor operation. Any DistributorError thrown inside
 * an entry point aborts it and rolls back every change it made.
 */
export class DistributorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'DistributorError';
  }
}

export function isDistributorError(err: unknown): err is DistributorError {
  return err instanceof DistributorError;
}

/**
 * HTTP status for an error code. Codes not listed here map to 400.
 */
export function statusForCode(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.MISSING_ADMIN_KEY:
    case ErrorCodes.INVALID_ADMIN_KEY:
      return 401;
    case ErrorCodes.NOT_OWNER:
    case ErrorCodes.NOT_REWARD_DISTRIBUTION:
    case ErrorCodes.ONLY_DISTRIBUTOR_ROLE:
    case ErrorCodes.ONLY_STAKER:
    case ErrorCodes.ONLY_TO_STAKER:
      return 403;
    case ErrorCodes.REENTRANT_CALL:
      return 409;
    case ErrorCodes.INTERNAL_ERROR:
      return 500;
    default:
      return 400;
  }
}
