/**
 * Zod schemas for ElectrumX responses
 *
 * Objects use `passthrough()` so fields added by newer servers survive.
 *
 * @module api/schemas
 */

import { z } from 'zod';
import { DataError } from '../utils/errors.js';
import type { DataKind } from '../utils/errors.js';

// =============================================================================
// Primitives
// =============================================================================

/** 64 hex chars: transaction hashes, block hashes, scripthashes */
export const Hash256Schema = z.string().regex(/^[a-fA-F0-9]{64}$/, 'Expected a 32-byte hex hash');

/** Block height; 0 or negative heights mark mempool entries */
export const HeightSchema = z.number().int();

export const SatoshiSchema = z.number().int();

// =============================================================================
// Scripthash methods
// =============================================================================

export const BalanceSchema = z
  .object({
    confirmed: SatoshiSchema,
    unconfirmed: SatoshiSchema,
  })
  .passthrough();

export const UnspentOutputSchema = z
  .object({
    tx_hash: Hash256Schema,
    tx_pos: z.number().int().nonnegative(),
    height: HeightSchema,
    value: SatoshiSchema,
  })
  .passthrough();

export const HistoryItemSchema = z
  .object({
    tx_hash: Hash256Schema,
    height: HeightSchema,
    fee: SatoshiSchema.optional(),
  })
  .passthrough();

export const UnspentListSchema = z.array(UnspentOutputSchema);
export const HistoryListSchema = z.array(HistoryItemSchema);

// =============================================================================
// Blocks and proofs
// =============================================================================

export const BlockHeaderInfoSchema = z
  .object({
    block_height: z.number().int().nonnegative(),
    merkle_root: Hash256Schema,
  })
  .passthrough();

export const MerkleProofSchema = z
  .object({
    block_height: z.number().int().nonnegative(),
    merkle: z.array(Hash256Schema),
    pos: z.number().int().nonnegative(),
  })
  .passthrough();

/** Fee rate in BTC/kB; -1 when the server cannot estimate */
export const FeeRateSchema = z.number();

export type Balance = z.infer<typeof BalanceSchema>;
export type UnspentOutput = z.infer<typeof UnspentOutputSchema>;
export type HistoryItem = z.infer<typeof HistoryItemSchema>;
export type BlockHeaderInfo = z.infer<typeof BlockHeaderInfoSchema>;
export type MerkleProof = z.infer<typeof MerkleProofSchema>;

/**
 * Parses `data` or throws a DataError naming the failed field
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, kind: DataKind): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const reason = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : result.error.message;
    throw DataError.schemaViolation(kind, reason, data);
  }
  return result.data;
}
