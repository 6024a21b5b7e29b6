/**
 * Deterministic Trait Generator
 *
 * Every trait of a token is a pure function of (collection seed, token id).
 * The digest layout below is frozen: previously revealed tokens must
 * regenerate bit-identically.
 *
 * Layout (hex chars of the SHA-256 digest):
 *   [0..8)   Background
 *   [8..16)  Body
 *   [16..24) Eyes
 *   [24..32) Mouth
 *   [32..40) Headwear
 *   [40..48) Special gate: value % 5 === 0 adds a Special trait
 *   [48..56) Special value
 */

import { createHash } from 'crypto';
import { TRAIT_DIMENSIONS, type TraitDimension, type TraitTables } from './tables.js';

// ── Types ───────────────────────────────────────────────────────────

export interface TraitAttribute {
  traitType: TraitDimension | 'Special';
  value: string;
}

// ── Constants ───────────────────────────────────────────────────────

const SLICE_WIDTH = 8;

export const TRAIT_OFFSETS: Record<TraitDimension, number> = {
  Background: 0,
  Body: 8,
  Eyes: 16,
  Mouth: 24,
  Headwear: 32,
};

export const SPECIAL_GATE_OFFSET = 40;
export const SPECIAL_VALUE_OFFSET = 48;
export const SPECIAL_MODULUS = 5;

// ── Primitives ──────────────────────────────────────────────────────

/**
 * SHA-256 of `"{seed}-{tokenId}-{nonce}"` as 64 lowercase hex chars.
 */
export function digest(seed: string, tokenId: number, nonce = 0): string {
  return createHash('sha256').update(`${seed}-${tokenId}-${nonce}`).digest('hex');
}

/** First 8 hex chars of the slice as an unsigned 32-bit integer */
export function sliceValue(hexSlice: string): number {
  return parseInt(hexSlice.slice(0, SLICE_WIDTH), 16);
}

export function pick<T>(hexSlice: string, table: readonly T[]): T {
  return table[sliceValue(hexSlice) % table.length];
}

export function hasSpecial(hex: string): boolean {
  return sliceValue(hex.slice(SPECIAL_GATE_OFFSET)) % SPECIAL_MODULUS === 0;
}

// ── Trait Generation ────────────────────────────────────────────────

/**
 * Ordered attribute list for a token: the fixed dimensions, then
 * Special when the gate slice selects it.
 */
export function generateTraits(seed: string, tokenId: number, tables: TraitTables): TraitAttribute[] {
  const hex = digest(seed, tokenId);

  const attributes: TraitAttribute[] = TRAIT_DIMENSIONS.map((dimension) => ({
    traitType: dimension,
    value: pick(hex.slice(TRAIT_OFFSETS[dimension]), tables[dimension]),
  }));

  if (hasSpecial(hex)) {
    attributes.push({
      traitType: 'Special',
      value: pick(hex.slice(SPECIAL_VALUE_OFFSET), tables.Special),
    });
  }

  return attributes;
}
