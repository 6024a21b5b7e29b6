/**
 * Mint phases and the rules each one carries.
 */

import type { MinterConfig } from '../config.js';

export const PHASES = ['Closed', 'Allowlist', 'Public', 'SoldOut'] as const;

export type Phase = (typeof PHASES)[number];

export interface MintRule {
  phase: Phase;
  maxPerWallet: number;
  priceWei: bigint;
  active: boolean;
}

export function isMintingPhase(phase: Phase): boolean {
  return phase === 'Allowlist' || phase === 'Public';
}

/**
 * Derive the rule for a phase from configuration.
 * Closed and SoldOut cap every wallet at 0 and report the public price.
 */
export function mintRuleFor(phase: Phase, config: MinterConfig): MintRule {
  switch (phase) {
    case 'Allowlist':
      return {
        phase,
        maxPerWallet: config.allowlistMaxPerWallet,
        priceWei: config.allowlistPriceWei,
        active: true,
      };
    case 'Public':
      return {
        phase,
        maxPerWallet: config.publicMaxPerWallet,
        priceWei: config.publicPriceWei,
        active: true,
      };
    case 'Closed':
    case 'SoldOut':
      return { phase, maxPerWallet: 0, priceWei: config.publicPriceWei, active: false };
  }
}
