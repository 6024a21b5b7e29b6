/**
 * Token Metadata Builder
 *
 * Composes generated traits into the record served from tokenURI.
 * Records are rebuilt from scratch on every reveal-state change.
 */

import type { Clock } from '../clock.js';
import type { MinterConfig } from '../config.js';
import { generateTraits, type TraitAttribute } from '../traits/generator.js';
import { defaultTraitTables, type TraitTables } from '../traits/tables.js';

// ── Types ───────────────────────────────────────────────────────────

export interface TokenMetadata {
  tokenId: number;
  name: string;
  description: string;
  image: string;
  attributes: TraitAttribute[];
  revealed: boolean;
  revealedAt?: number;     // Clock seconds, set only when revealed
}

/** tokenURI wire shape */
export interface TokenMetadataJson {
  token_id: number;
  name: string;
  description: string;
  image: string;
  attributes: Array<{ trait_type: string; value: string }>;
  revealed: boolean;
}

export type MetadataSettings = Pick<
  MinterConfig,
  'collectionName' | 'description' | 'collectionSeed' | 'baseUri' | 'placeholderImage' | 'imageExtension'
>;

// ── Builder ─────────────────────────────────────────────────────────

export class MetadataBuilder {
  private settings: MetadataSettings;
  private clock: Clock;
  private tables: TraitTables;

  constructor(settings: MetadataSettings, clock: Clock, tables: TraitTables = defaultTraitTables()) {
    this.settings = settings;
    this.clock = clock;
    this.tables = tables;
  }

  /** `now` lets a caller stamp the record with the time it already read */
  build(tokenId: number, revealed: boolean, now: number = this.clock.now()): TokenMetadata {
    const metadata: TokenMetadata = {
      tokenId,
      name: `${this.settings.collectionName} #${tokenId}`,
      description: this.settings.description,
      image: revealed ? this.imageFor(tokenId) : this.settings.placeholderImage,
      attributes: generateTraits(this.settings.collectionSeed, tokenId, this.tables),
      revealed,
    };

    if (revealed) metadata.revealedAt = now;
    return metadata;
  }

  imageFor(tokenId: number): string {
    return `${this.settings.baseUri}${tokenId}.${this.settings.imageExtension}`;
  }
}

/** Detached copy; stored records never leave the ledger */
export function copyMetadata(metadata: TokenMetadata): TokenMetadata {
  return { ...metadata, attributes: metadata.attributes.map((a) => ({ ...a })) };
}

// ── Serialization ───────────────────────────────────────────────────

export function toMetadataJson(metadata: TokenMetadata): TokenMetadataJson {
  return {
    token_id: metadata.tokenId,
    name: metadata.name,
    description: metadata.description,
    image: metadata.image,
    attributes: metadata.attributes.map((a) => ({ trait_type: a.traitType, value: a.value })),
    revealed: metadata.revealed,
  };
}

export function serializeMetadata(metadata: TokenMetadata): string {
  return JSON.stringify(toMetadataJson(metadata));
}
