/**
 * Address normalization
 *
 * Addresses are `0x` + 40 hex digits, compared case-insensitively.
 * Allowlist storage, per-wallet counters and ownership all key on the
 * normalized form produced here.
 */

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

export type Address = string;

/** Trim and lower-case. Does not validate. */
export function normalizeAddress(address: string): Address {
  return address.trim().toLowerCase();
}

export function isValidAddress(address: string): boolean {
  return ADDRESS_PATTERN.test(normalizeAddress(address));
}

/**
 * Normalize and validate in one step.
 * Returns null for anything that is not a well-formed address.
 */
export function parseAddress(address: string): Address | null {
  const normalized = normalizeAddress(address);
  return ADDRESS_PATTERN.test(normalized) ? normalized : null;
}
