import { Response } from 'express';
import { DistributorError, ErrorCodes, isDistributorError, statusForCode } from '../errors';
import { parseUnits } from '../fixedPoint';
import { ErrorResponse } from './types';

/**
 * Send a DistributorError as its mapped status; anything else is a 500.
 */
export function sendError(res: Response, err: unknown, context: string): void {
  if (isDistributorError(err)) {
    const body: ErrorResponse = { success: false, error: err.message, code: err.code };
    res.status(statusForCode(err.code)).json(body);
    return;
  }

  console.error(`Error ${context}:`, err);
  const body: ErrorResponse = {
    success: false,
    error: `Failed ${context}`,
    code: ErrorCodes.INTERNAL_ERROR,
  };
  res.status(500).json(body);
}

/**
 * Read a base-unit amount (decimal integer string) from a request body field.
 */
export function readAmount(value: unknown, field = 'amount'): bigint {
  if (typeof value !== 'string') {
    throw new DistributorError(
      ErrorCodes.INVALID_AMOUNT,
      `Missing or invalid ${field}: expected a decimal integer string`
    );
  }
  try {
    return parseUnits(value);
  } catch {
    throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Invalid ${field}: "${value}"`);
  }
}

export function readAccount(value: unknown, field = 'account'): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new DistributorError(ErrorCodes.INVALID_ACCOUNT, `Missing required field: ${field}`);
  }
  return value;
}
