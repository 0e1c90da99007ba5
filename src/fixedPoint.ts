/**
 * Fixed-Point Arithmetic for Deterministic Reward Accounting
 *
 * All token amounts are bigint base units (1 token = 10^18 units, like wei).
 * The reward-per-token accumulator is scaled by the same factor so that
 * per-unit rewards far below one base unit still accumulate.
 *
 * Every division truncates toward zero. Inputs are never negative, so this
 * is floor division and dust always stays in the pool.
 */

/** Decimals of the staking and reward tokens */
export const TOKEN_DECIMALS = 18;

/**
 * Accumulator scale factor (10^18).
 */
export const SCALE = 10n ** 18n;

/** Base units per whole token */
export const UNITS_PER_TOKEN = 10n ** BigInt(TOKEN_DECIMALS);

/**
 * Parse a decimal token string ("80000000", "1.5") into base units.
 *
 * @throws Error if the string is not a non-negative decimal or has more
 *   fractional digits than TOKEN_DECIMALS
 */
export function parseTokens(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new Error(`Invalid token amount: "${value}"`);
  }

  const [whole, fraction = ''] = trimmed.split('.');
  if (fraction.length > TOKEN_DECIMALS) {
    throw new Error(`Too many decimal places (max ${TOKEN_DECIMALS}): "${value}"`);
  }

  return BigInt(whole) * UNITS_PER_TOKEN + BigInt(fraction.padEnd(TOKEN_DECIMALS, '0'));
}

/**
 * Format base units as a decimal token string, trimming trailing zeros.
 *
 * formatTokens(1_500_000_000_000_000_000n) === "1.5"
 */
export function formatTokens(units: bigint): string {
  if (units < 0n) {
    return `-${formatTokens(-units)}`;
  }

  const whole = units / UNITS_PER_TOKEN;
  const fraction = (units % UNITS_PER_TOKEN)
    .toString()
    .padStart(TOKEN_DECIMALS, '0')
    .replace(/0+$/, '');

  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}

/**
 * Parse a base-unit integer string ("1000000000000000000") into a bigint.
 * Used for JSON request bodies and persisted TEXT columns.
 *
 * @throws Error if the string is not a non-negative integer
 */
export function parseUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid integer amount: "${value}"`);
  }
  return BigInt(value);
}

/**
 * floor(a * b / denominator)
 *
 * @throws Error on a zero denominator or negative operand
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new Error('Division by zero');
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new Error(`Negative operand in mulDiv(${a}, ${b}, ${denominator})`);
  }
  return (a * b) / denominator;
}

/**
 * Subtract with an underflow check. Mirrors checked uint256 arithmetic:
 * a result below zero is a fatal error, never a wrap or a clamp.
 */
export function checkedSub(a: bigint, b: bigint, label = 'value'): bigint {
  if (b > a) {
    throw new Error(`Subtraction underflow on ${label}: ${a} - ${b}`);
  }
  return a - b;
}
