import * as crypto from 'crypto';

/**
 * Canonical JSON serialization for deterministic event hashing.
 *
 * Rules:
 * 1. Object keys sorted recursively (alphabetical)
 * 2. BigInt → decimal string
 * 3. Arrays preserved in order
 * 4. undefined → omitted (standard JSON)
 * 5. null, number, boolean, string → as-is
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map(v => canonicalize(v));
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, raw] of entries) {
      const v = canonicalize(raw);
      if (v !== undefined) {
        sorted[key] = v;
      }
    }
    return sorted;
  }

  return value;
}

export function computeHash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
