/**
 * Mint Ledger
 *
 * Phase state machine and bookkeeping for the whole collection:
 * supply counters, per-wallet counts, ownership, reveal readiness
 * and the domain event log.
 *
 * Phases: Allowlist → Public → SoldOut. SoldOut is entered
 * automatically the instant totalMinted reaches maxSupply and is
 * never left. Closed exists only as an initial/administrative state.
 *
 * Every method is synchronous, so each call completes before the next
 * one can start; a batch mint is never observed half-applied.
 */

import { type Address, normalizeAddress, parseAddress } from '../address.js';
import { AllowlistRegistry } from '../allowlist/registry.js';
import { type Clock, systemClock } from '../clock.js';
import type { MinterConfig } from '../config.js';
import { describeError, fail, ok, type MinterError, type Result } from '../errors.js';
import { EventLog } from '../events.js';
import { Logger } from '../logger.js';
import { copyMetadata, MetadataBuilder, type TokenMetadata } from '../metadata/builder.js';
import type { TraitTables } from '../traits/tables.js';
import { isMintingPhase, mintRuleFor, type MintRule, type Phase } from './phase.js';

// ── Types ───────────────────────────────────────────────────────────

export interface MintLedgerOptions {
  config: MinterConfig;
  clock?: Clock;
  logger?: Logger;
  events?: EventLog;
  tables?: TraitTables;
  initialPhase?: 'Allowlist' | 'Closed';
}

export interface MintCheck {
  allowed: boolean;
  reason?: string;
  error?: MinterError;
}

interface ValidatedMint {
  to: Address;
  rule: MintRule;
}

// ── Ledger ──────────────────────────────────────────────────────────

export class MintLedger {
  readonly config: MinterConfig;
  readonly allowlist: AllowlistRegistry;
  readonly events: EventLog;

  private clock: Clock;
  private logger: Logger;
  private metadata: MetadataBuilder;

  private _phase: Phase;
  private nextTokenId = 1;
  private totalMinted = 0;

  private walletCounts: Map<Address, number> = new Map();
  private ownerById: Map<number, Address> = new Map();
  private metadataById: Map<number, TokenMetadata> = new Map();
  private revealReadyAtById: Map<number, number> = new Map();
  private ownerIndex: Map<Address, number[]> = new Map();

  constructor(options: MintLedgerOptions) {
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? Logger.forCollection(options.config)).child('ledger');
    this.events = options.events ?? new EventLog();
    this.allowlist = new AllowlistRegistry(this.events, this.clock);
    this.metadata = new MetadataBuilder(options.config, this.clock, options.tables);
    this._phase = options.initialPhase ?? 'Allowlist';
  }

  // ── Phase ─────────────────────────────────────────────────────────

  get phase(): Phase {
    return this._phase;
  }

  mintRule(): MintRule {
    return mintRuleFor(this._phase, this.config);
  }

  /**
   * Open public minting. Rejected once sold out; already-public is a no-op.
   */
  advanceToPublic(): Result<Phase> {
    if (this._phase === 'SoldOut') return fail({ kind: 'PhaseClosed', phase: this._phase });
    if (this._phase === 'Public') return ok(this._phase);

    this.transition('Public', this.clock.now());
    return ok(this._phase);
  }

  private transition(to: Phase, now: number): void {
    const from = this._phase;
    this._phase = to;
    this.events.append({ type: 'PhaseAdvanced', from, to }, now);
    this.logger.info(`Phase ${from} → ${to}`);
  }

  // ── Validation ────────────────────────────────────────────────────

  /**
   * Dry run of mint(). Same checks, same order, no state change.
   */
  canMint(address: string, quantity: number, valueOffered: bigint): MintCheck {
    const result = this.validate(address, quantity, valueOffered);
    if (result.ok) return { allowed: true };
    return { allowed: false, reason: describeError(result.error), error: result.error };
  }

  private validate(address: string, quantity: number, valueOffered: bigint): Result<ValidatedMint> {
    const to = parseAddress(address);
    if (!to) return fail({ kind: 'InvalidAddress', address });
    if (!Number.isSafeInteger(quantity) || quantity < 1) return fail({ kind: 'InvalidQuantity', quantity });

    const rule = this.mintRule();

    if (!isMintingPhase(rule.phase)) {
      return fail({ kind: 'PhaseClosed', phase: rule.phase });
    }

    if (this.totalMinted + quantity > this.config.maxSupply) {
      return fail({ kind: 'SupplyExceeded', current: this.totalMinted, requested: quantity, cap: this.config.maxSupply });
    }

    const required = rule.priceWei * BigInt(quantity);
    if (valueOffered < required) {
      return fail({ kind: 'InsufficientPayment', offered: valueOffered, required });
    }

    if (rule.phase === 'Allowlist' && !this.allowlist.contains(to)) {
      return fail({ kind: 'NotAllowlisted', address: to });
    }

    // One counter across phases: allowlist mints count against the public cap
    const count = this.walletMintCount(to);
    if (count + quantity > rule.maxPerWallet) {
      return fail({ kind: 'WalletLimitExceeded', address: to, count, requested: quantity, limit: rule.maxPerWallet });
    }

    return ok({ to, rule });
  }

  // ── Minting ───────────────────────────────────────────────────────

  mint(toAddress: string, quantity: number, valueOffered: bigint): Result<number[]> {
    const validated = this.validate(toAddress, quantity, valueOffered);
    if (!validated.ok) return validated;

    const { to, rule } = validated.value;
    const now = this.clock.now();
    const minted: number[] = [];

    for (let i = 0; i < quantity; i++) {
      if (this.totalMinted >= this.config.maxSupply) break;

      const tokenId = this.nextTokenId++;
      this.totalMinted++;

      this.ownerById.set(tokenId, to);
      this.indexOwner(to, tokenId);
      this.revealReadyAtById.set(tokenId, now + this.config.revealDelaySec);
      this.metadataById.set(tokenId, this.metadata.build(tokenId, false, now));
      this.events.append({ type: 'MintRequested', tokenId, to, pricePaidWei: rule.priceWei }, now);

      minted.push(tokenId);
    }

    this.walletCounts.set(to, this.walletMintCount(to) + minted.length);
    this.logger.debug(`Minted ${minted.join(', ')} to ${to} (${this.totalMinted}/${this.config.maxSupply})`);

    if (this.totalMinted >= this.config.maxSupply) {
      this.transition('SoldOut', now);
    }

    return ok(minted);
  }

  private indexOwner(owner: Address, tokenId: number): void {
    const owned = this.ownerIndex.get(owner);
    if (owned) owned.push(tokenId);
    else this.ownerIndex.set(owner, [tokenId]);
  }

  // ── Reveal ────────────────────────────────────────────────────────

  reveal(tokenId: number): Result<TokenMetadata> {
    const readyAt = this.revealReadyAtById.get(tokenId);
    if (readyAt === undefined) return fail({ kind: 'InvalidTokenId', tokenId });

    const now = this.clock.now();
    if (now < readyAt) return fail({ kind: 'RevealNotReady', tokenId, readyAt, now });

    const metadata = this.metadata.build(tokenId, true, now);
    this.metadataById.set(tokenId, metadata);
    this.events.append({ type: 'TokenRevealed', tokenId }, now);
    this.logger.debug(`Revealed #${tokenId}`);

    return ok(copyMetadata(metadata));
  }

  revealReadyAt(tokenId: number): number | undefined {
    return this.revealReadyAtById.get(tokenId);
  }

  isRevealed(tokenId: number): boolean {
    return this.metadataById.get(tokenId)?.revealed ?? false;
  }

  now(): number {
    return this.clock.now();
  }

  // ── Queries ───────────────────────────────────────────────────────

  ownerOf(tokenId: number): Result<Address> {
    const owner = this.ownerById.get(tokenId);
    return owner === undefined ? fail({ kind: 'InvalidTokenId', tokenId }) : ok(owner);
  }

  /** Returns a copy; edits to it do not reach the ledger */
  getMetadata(tokenId: number): Result<TokenMetadata> {
    const metadata = this.metadataById.get(tokenId);
    return metadata === undefined ? fail({ kind: 'InvalidTokenId', tokenId }) : ok(copyMetadata(metadata));
  }

  balanceOf(address: string): number {
    return this.ownerIndex.get(normalizeAddress(address))?.length ?? 0;
  }

  tokensOfOwner(address: string): number[] {
    return [...(this.ownerIndex.get(normalizeAddress(address)) ?? [])];
  }

  walletMintCount(address: string): number {
    return this.walletCounts.get(normalizeAddress(address)) ?? 0;
  }

  totalSupply(): number {
    return this.totalMinted;
  }

  maxSupply(): number {
    return this.config.maxSupply;
  }

  remainingSupply(): number {
    return this.config.maxSupply - this.totalMinted;
  }

  /** All minted ids, ascending */
  tokenIds(): number[] {
    return Array.from(this.ownerById.keys());
  }
}
