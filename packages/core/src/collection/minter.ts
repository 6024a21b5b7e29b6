/**
 * MangoTango Collection Minter
 *
 * Call-style surface over the ledger, shaped like the contract ABI the
 * execution layer calls into. Failures come back as values with a
 * readable message and a stable `errorKind`; only a malformed uint256
 * string for `valueOffered` throws (ZodError).
 *
 * Caller authorization for the admin methods belongs to the host.
 */

import type { Address } from '../address.js';
import { type Clock, systemClock } from '../clock.js';
import { type MinterConfig, WeiSchema } from '../config.js';
import { describeError, type MinterErrorKind, type Result } from '../errors.js';
import type { MinterEvent } from '../events.js';
import { MintLedger } from '../ledger/ledger.js';
import type { MintRule, Phase } from '../ledger/phase.js';
import { Logger } from '../logger.js';
import { serializeMetadata, type TokenMetadata } from '../metadata/builder.js';
import { RevealScheduler } from '../reveal/scheduler.js';
import { royaltyInfo, type RoyaltyInfo } from '../royalty/calculator.js';
import type { TraitTables } from '../traits/tables.js';

// ── Types ───────────────────────────────────────────────────────────

export interface CallResult {
  success: boolean;
  error?: string;
  errorKind?: MinterErrorKind;
}

export interface MintCallResult extends CallResult {
  tokenIds: number[];
}

export interface RoyaltyRate {
  recipient: Address;
  bps: number;
}

export interface CollectionMinterOptions {
  config: MinterConfig;
  clock?: Clock;
  logger?: Logger;
  tables?: TraitTables;
}

function toCallResult(result: Result<unknown>): CallResult {
  if (result.ok) return { success: true };
  return { success: false, error: describeError(result.error), errorKind: result.error.kind };
}

// ── Minter ──────────────────────────────────────────────────────────

export class CollectionMinter {
  readonly ledger: MintLedger;
  readonly scheduler: RevealScheduler;
  private config: MinterConfig;
  private logger: Logger;

  constructor(options: CollectionMinterOptions) {
    this.config = options.config;
    this.logger = options.logger ?? Logger.forCollection(options.config);
    this.ledger = new MintLedger({
      config: options.config,
      clock: options.clock ?? systemClock,
      logger: this.logger,
      tables: options.tables,
    });
    this.scheduler = new RevealScheduler(this.ledger, this.logger);
  }

  // ── Collection Info ───────────────────────────────────────────────

  name(): string {
    return this.config.collectionName;
  }

  symbol(): string {
    return this.config.symbol;
  }

  totalSupply(): number {
    return this.ledger.totalSupply();
  }

  maxSupply(): number {
    return this.ledger.maxSupply();
  }

  phase(): Phase {
    return this.ledger.phase;
  }

  mintRule(): MintRule {
    return this.ledger.mintRule();
  }

  royaltyInfo(): RoyaltyRate {
    return { recipient: this.config.royaltyRecipient, bps: this.config.royaltyBps };
  }

  /** ERC-2981 style: royalty owed on a given sale */
  royaltyFor(salePrice: bigint | string): RoyaltyInfo {
    return royaltyInfo(this.config.royaltyRecipient, this.config.royaltyBps, WeiSchema.parse(salePrice));
  }

  // ── Minting ───────────────────────────────────────────────────────

  mint(to: string, quantity: number, valueOffered: bigint | string): MintCallResult {
    const result = this.ledger.mint(to, quantity, WeiSchema.parse(valueOffered));
    if (!result.ok) {
      this.logger.debug(`Mint rejected for ${to}: ${result.error.kind}`);
      return { ...toCallResult(result), tokenIds: [] };
    }
    return { success: true, tokenIds: result.value };
  }

  // ── Tokens ────────────────────────────────────────────────────────

  ownerOf(tokenId: number): Address | null {
    const result = this.ledger.ownerOf(tokenId);
    return result.ok ? result.value : null;
  }

  tokenURI(tokenId: number): string | null {
    const result = this.ledger.getMetadata(tokenId);
    return result.ok ? serializeMetadata(result.value) : null;
  }

  balanceOf(address: string): number {
    return this.ledger.balanceOf(address);
  }

  tokensOfOwner(address: string): number[] {
    return this.ledger.tokensOfOwner(address);
  }

  /** Unknown ids are skipped */
  batchMetadata(tokenIds: readonly number[]): TokenMetadata[] {
    const found: TokenMetadata[] = [];
    for (const tokenId of tokenIds) {
      const result = this.ledger.getMetadata(tokenId);
      if (result.ok) found.push(result.value);
    }
    return found;
  }

  reveal(tokenId: number): CallResult {
    return toCallResult(this.ledger.reveal(tokenId));
  }

  events(): readonly MinterEvent[] {
    return this.ledger.events.all();
  }

  // ── Admin ─────────────────────────────────────────────────────────

  addToAllowlist(addresses: readonly string[]): CallResult {
    return toCallResult(this.ledger.allowlist.add(addresses));
  }

  removeFromAllowlist(address: string): CallResult {
    return toCallResult(this.ledger.allowlist.remove(address));
  }

  advanceToPublic(): CallResult {
    return toCallResult(this.ledger.advanceToPublic());
  }

  // ── Status ────────────────────────────────────────────────────────

  printStatus(): void {
    const rule = this.ledger.mintRule();
    this.logger.status('Collection', `${this.config.collectionName} (${this.config.symbol})`);
    this.logger.status('Phase', rule.phase, rule.active ? 'green' : 'red');
    this.logger.status('Minted', `${this.ledger.totalSupply()} / ${this.ledger.maxSupply()}`);
    this.logger.status('Price', rule.priceWei);
    this.logger.status('Per wallet', rule.maxPerWallet);
    this.logger.status('Allowlist', this.ledger.allowlist.size());
  }
}
