import * as crypto from 'crypto';

/**
 * Canonical JSON for hashing ledger events.
 *
 * - object keys sorted at every level
 * - bigint → decimal string
 * - undefined properties omitted
 * - arrays keep their order
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === 'bigint') return v.toString();
    if (v !== null && typeof v === 'object' && !Array.isArray(v)) {
      return Object.fromEntries(
        Object.entries(v)
          .filter(([, inner]) => inner !== undefined)
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return v;
  });
}

export function computeHash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
