/**
 * Subscription and client event types
 *
 * @module subscriptions/types
 */

import { z } from 'zod';

// ============================================================================
// CLIENT EVENTS
// ============================================================================

export enum ClientEventType {
  // Connection lifecycle
  CONNECTED = 'CONNECTED',
  DISCONNECTED = 'DISCONNECTED',
  FAILOVER_STARTED = 'FAILOVER_STARTED',
  SERVER_FAILED = 'SERVER_FAILED',
  FAILOVER_EXHAUSTED = 'FAILOVER_EXHAUSTED',

  // Subscription lifecycle
  SUBSCRIPTION_CREATED = 'SUBSCRIPTION_CREATED',
  SUBSCRIPTIONS_RESTORED = 'SUBSCRIPTIONS_RESTORED',

  // Live data
  SCRIPTHASH_STATUS_CHANGED = 'SCRIPTHASH_STATUS_CHANGED',
  BLOCK_HEADER_RECEIVED = 'BLOCK_HEADER_RECEIVED',

  FATAL_ERROR = 'FATAL_ERROR',
}

export interface ClientEvent<T = unknown> {
  type: ClientEventType;
  timestamp: Date;
  data: T;
}

export type EventListener = (event: ClientEvent) => void;

// ============================================================================
// SUBSCRIPTION KINDS
// ============================================================================

export const SCRIPTHASH_SUBSCRIBE = 'blockchain.scripthash.subscribe';
export const HEADERS_SUBSCRIBE = 'blockchain.headers.subscribe';

/** `status` is null when the scripthash has no history */
export type ScripthashStatus = string | null;

export const BlockHeaderSchema = z
  .object({
    height: z.number().int().nonnegative(),
    hex: z.string(),
  })
  .passthrough();

export type BlockHeader = z.infer<typeof BlockHeaderSchema>;

export const ScripthashStatusSchema = z.string().nullable();

/**
 * Per-key callback: receives the caller's identifier (e.g. the address),
 * never the raw scripthash
 */
export type ScripthashStatusCallback = (externalId: string, status: ScripthashStatus) => void;

/**
 * Broadcast callback for new chain tips
 */
export type BlockHeaderCallback = (header: BlockHeader) => void;

export interface ScripthashStatusUpdate {
  scripthash: string;
  externalId: string;
  status: ScripthashStatus;
}
