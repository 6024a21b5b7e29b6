/**
 * Minter Configuration
 *
 * Precedence, lowest first: defaults, MINTER_* environment variables,
 * JSON config file, explicit overrides.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { isValidAddress, normalizeAddress } from './address.js';

// ── Schema ─────────────────────────────────────────────────────────

const AddressSchema = z.string()
  .refine(isValidAddress, 'must be 0x followed by 40 hex digits')
  .transform(normalizeAddress);

/**
 * Wei amounts: bigint, safe integer, or base-10 digit string. Numbers
 * past 2^53 have already lost precision, so those must come as strings.
 */
export const WeiSchema = z.union([
  z.bigint().nonnegative(),
  z.number().int().nonnegative().safe(),
  z.string().trim().regex(/^\d+$/, 'must be a non-negative integer'),
]).transform((v) => BigInt(v));

const FlagSchema = z.union([z.boolean(), z.enum(['true', 'false'])])
  .transform((v) => v === true || v === 'true');

export const MinterConfigSchema = z.object({
  collectionName: z.string().min(1),
  symbol: z.string().min(1),
  description: z.string(),
  collectionSeed: z.string().min(1),
  maxSupply: z.coerce.number().int().min(1),
  allowlistPriceWei: WeiSchema,
  publicPriceWei: WeiSchema,
  allowlistMaxPerWallet: z.coerce.number().int().min(0),
  publicMaxPerWallet: z.coerce.number().int().min(0),
  revealDelaySec: z.coerce.number().min(0),
  royaltyBps: z.coerce.number().int().min(0).max(10_000),
  royaltyRecipient: AddressSchema,
  treasury: AddressSchema,
  owner: AddressSchema,
  baseUri: z.string().min(1),
  placeholderImage: z.string().min(1).optional(),
  imageExtension: z.string().min(1),
  verbose: FlagSchema,
}).strict();

export type MinterConfigInput = z.input<typeof MinterConfigSchema>;

export type MinterConfig = Omit<z.output<typeof MinterConfigSchema>, 'placeholderImage'> & {
  placeholderImage: string;
};

// ── Defaults ───────────────────────────────────────────────────────

export const DEFAULT_CONFIG: MinterConfigInput = {
  collectionName: 'MangoTango',
  symbol: 'MTNG',
  description: 'MangoTango is a fixed-supply collection of 9999 dancers, each with traits drawn from the collection seed.',
  collectionSeed: '0x2e4f6a8c0e2b4d6f8a0c2e4b6d8f0a2c4e6b8d0e2f4a6c8b0d2e4f6a8c0e2b4d6f8',
  maxSupply: 9999,
  allowlistPriceWei: 50_000_000_000_000_000n,  // 0.05 ether
  publicPriceWei: 50_000_000_000_000_000n,
  allowlistMaxPerWallet: 2,
  publicMaxPerWallet: 5,
  revealDelaySec: 300,
  royaltyBps: 750,  // 7.5%
  royaltyRecipient: '0x7d2F4a6C8e0B2d4F6a8C0e2B4d6F8a0C2e4B6d81',
  treasury: '0x5c1E3a7B9d0F2b4D6e8A0c2E4b6D8f0A2c4E6b83',
  owner: '0x9e3A5c7F1b9D2e4F6a8b0C2d4E6f8A0b2C4d6E85',
  baseUri: 'ipfs://QmMangoTangoCollectionBaseUriPlaceholder/',
  imageExtension: 'png',
  verbose: false,
};

const ENV_KEYS: Record<string, keyof MinterConfigInput> = {
  MINTER_MAX_SUPPLY: 'maxSupply',
  MINTER_REVEAL_DELAY_SEC: 'revealDelaySec',
  MINTER_BASE_URI: 'baseUri',
  MINTER_ROYALTY_BPS: 'royaltyBps',
  MINTER_SEED: 'collectionSeed',
  MINTER_VERBOSE: 'verbose',
};

// ── Loading ────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: Partial<MinterConfigInput>;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') values[key] = value;
  }
  return values;
}

/**
 * Build a validated config. Throws a ZodError naming every bad field.
 */
export function loadConfig(options: LoadConfigOptions = {}): MinterConfig {
  const merged: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    ...readEnv(options.env ?? process.env),
    ...(options.configPath ? readConfigFile(options.configPath) : {}),
    ...options.overrides,
  };

  const config = MinterConfigSchema.parse(merged);
  return {
    ...config,
    placeholderImage: config.placeholderImage ?? `${config.baseUri}hidden.png`,
  };
}
