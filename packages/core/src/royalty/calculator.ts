/**
 * Royalty arithmetic in basis points (10000 bps = 100%).
 * bigint throughout so sale prices of any size cannot overflow.
 */

import type { Address } from '../address.js';

export const BPS_DENOMINATOR = 10_000n;

export interface RoyaltyInfo {
  recipient: Address;
  amount: bigint;
}

/**
 * floor(salePrice * basisPoints / 10000)
 */
export function royalty(salePrice: bigint, basisPoints: bigint | number): bigint {
  const bps = BigInt(basisPoints);
  if (salePrice < 0n) throw new RangeError(`Sale price must be non-negative, got ${salePrice}`);
  if (bps < 0n || bps > BPS_DENOMINATOR) throw new RangeError(`Basis points must be within 0-10000, got ${bps}`);

  return (salePrice * bps) / BPS_DENOMINATOR;
}

export function royaltyInfo(recipient: Address, basisPoints: bigint | number, salePrice: bigint): RoyaltyInfo {
  return { recipient, amount: royalty(salePrice, basisPoints) };
}
