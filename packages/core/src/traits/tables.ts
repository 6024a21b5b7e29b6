/**
 * Trait tables
 *
 * Loaded from data/traits.json. A value's weight is its share of the
 * table, so repeating an entry makes it more common.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

// Dimension order is part of the attribute layout; do not reorder.
export const TRAIT_DIMENSIONS = ['Background', 'Body', 'Eyes', 'Mouth', 'Headwear'] as const;

export type TraitDimension = (typeof TRAIT_DIMENSIONS)[number];

const TableSchema = z.array(z.string().min(1)).min(1);

export const TraitTablesSchema = z.object({
  Background: TableSchema,
  Body: TableSchema,
  Eyes: TableSchema,
  Mouth: TableSchema,
  Headwear: TableSchema,
  Special: TableSchema,
}).strict();

export type TraitTables = z.infer<typeof TraitTablesSchema>;

const DEFAULT_TABLES_URL = new URL('../../data/traits.json', import.meta.url);

let cached: TraitTables | null = null;

export function loadTraitTables(path: string | URL = DEFAULT_TABLES_URL): TraitTables {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return TraitTablesSchema.parse(raw);
}

/** The bundled tables, read once per process */
export function defaultTraitTables(): TraitTables {
  if (!cached) cached = loadTraitTables();
  return cached;
}
