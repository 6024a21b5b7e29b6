/**
 * @mangotango/core
 *
 * Mint lifecycle for the MangoTango collection: phase-gated minting,
 * deterministic traits, delayed reveal and royalty accounting.
 */

export { type Address, normalizeAddress, isValidAddress, parseAddress } from './address.js';
export { type Clock, systemClock, ManualClock } from './clock.js';
export {
  type MinterConfig,
  type MinterConfigInput,
  type LoadConfigOptions,
  MinterConfigSchema,
  WeiSchema,
  DEFAULT_CONFIG,
  loadConfig,
} from './config.js';
export {
  type MinterError,
  type MinterErrorKind,
  type Result,
  ok,
  fail,
  describeError,
  unwrap,
  MinterFault,
} from './errors.js';
export { type MinterEvent, type MinterEventPayload, type MinterEventType, EventLog } from './events.js';
export { type LogLevel, type LogSink, type LoggerOptions, Logger, formatEther } from './logger.js';
export {
  type TraitAttribute,
  digest,
  pick,
  sliceValue,
  hasSpecial,
  generateTraits,
  TRAIT_OFFSETS,
  SPECIAL_GATE_OFFSET,
  SPECIAL_VALUE_OFFSET,
  SPECIAL_MODULUS,
} from './traits/generator.js';
export {
  type TraitTables,
  type TraitDimension,
  TRAIT_DIMENSIONS,
  TraitTablesSchema,
  loadTraitTables,
  defaultTraitTables,
} from './traits/tables.js';
export {
  type TokenMetadata,
  type TokenMetadataJson,
  type MetadataSettings,
  MetadataBuilder,
  copyMetadata,
  toMetadataJson,
  serializeMetadata,
} from './metadata/builder.js';
export { AllowlistRegistry } from './allowlist/registry.js';
export { type Phase, type MintRule, PHASES, isMintingPhase, mintRuleFor } from './ledger/phase.js';
export { type MintLedgerOptions, type MintCheck, MintLedger } from './ledger/ledger.js';
export { RevealScheduler } from './reveal/scheduler.js';
export { type RoyaltyInfo, BPS_DENOMINATOR, royalty, royaltyInfo } from './royalty/calculator.js';
export {
  type CallResult,
  type MintCallResult,
  type RoyaltyRate,
  type CollectionMinterOptions,
  CollectionMinter,
} from './collection/minter.js';
