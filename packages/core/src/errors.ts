/**
 * Minter error kinds
 *
 * Every failure the core can report is one member of the closed
 * `MinterError` union. Callers branch on `kind`; the context fields
 * carry the numbers behind the decision.
 */

import type { Phase } from './ledger/phase.js';

// ── Error Kinds ────────────────────────────────────────────────────

export type MinterError =
  | { kind: 'InvalidAddress'; address: string }
  | { kind: 'InvalidQuantity'; quantity: number }
  | { kind: 'NotAllowlisted'; address: string }
  | { kind: 'PhaseClosed'; phase: Phase }
  | { kind: 'SupplyExceeded'; current: number; requested: number; cap: number }
  | { kind: 'InsufficientPayment'; offered: bigint; required: bigint }
  | { kind: 'WalletLimitExceeded'; address: string; count: number; requested: number; limit: number }
  | { kind: 'InvalidTokenId'; tokenId: number }
  | { kind: 'RevealNotReady'; tokenId: number; readyAt: number; now: number };

export type MinterErrorKind = MinterError['kind'];

// ── Result ─────────────────────────────────────────────────────────

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: MinterError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: MinterError): Result<T> {
  return { ok: false, error };
}

// ── Rendering ──────────────────────────────────────────────────────

export function describeError(error: MinterError): string {
  switch (error.kind) {
    case 'InvalidAddress':
      return `Invalid address: ${error.address}`;
    case 'InvalidQuantity':
      return `Quantity must be a positive integer, got ${error.quantity}`;
    case 'NotAllowlisted':
      return `Address ${error.address} is not on the allowlist`;
    case 'PhaseClosed':
      return error.phase === 'SoldOut' ? 'Collection is sold out' : `Minting is closed (phase: ${error.phase})`;
    case 'SupplyExceeded':
      return `Would exceed max supply: ${error.current} + ${error.requested} > ${error.cap}`;
    case 'InsufficientPayment':
      return `Insufficient payment: offered ${error.offered} wei, required ${error.required} wei`;
    case 'WalletLimitExceeded':
      return `Wallet limit exceeded for ${error.address}: ${error.count} + ${error.requested} > ${error.limit}`;
    case 'InvalidTokenId':
      return `Token ${error.tokenId} does not exist`;
    case 'RevealNotReady':
      return `Token ${error.tokenId} is not ready to reveal (ready at ${error.readyAt}, now ${error.now})`;
  }
}

/**
 * Exception carrier for a MinterError, used only where a thrown error
 * is the sole channel back to the caller.
 */
export class MinterFault extends Error {
  readonly error: MinterError;

  constructor(error: MinterError) {
    super(describeError(error));
    this.name = 'MinterFault';
    this.error = error;
  }

  get kind(): MinterErrorKind {
    return this.error.kind;
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new MinterFault(result.error);
  return result.value;
}
