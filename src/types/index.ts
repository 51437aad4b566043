/**
 * Shared types for the ElectrumX client
 *
 * @module types
 */

import type { RpcErrorPayload } from '../utils/errors.js';

/**
 * A candidate server as loaded from the catalog
 */
export interface ServerDescriptor {
  host: string;
  /** Port for TLS connections (catalog key `s`) */
  tlsPort?: number;
  /** Port for plain TCP connections (catalog key `t`) */
  plainPort?: number;
  /** Explicit opt-out; absent means usable */
  usable: boolean;
}

/**
 * Raw catalog entry, keyed by host in the catalog file
 */
export interface CatalogEntry {
  s?: number;
  t?: number;
  usable?: boolean;
  pruning?: string;
  version?: string;
}

export type ServerCatalog = Record<string, CatalogEntry>;

/**
 * A host/port pair selected for a connection attempt
 */
export interface ServerEndpoint {
  host: string;
  port: number;
  useTls: boolean;
}

export type RequestId = number;

export type RpcParams = readonly unknown[];

/**
 * A method + params pair, the unit a batch is made of
 */
export interface RpcRequest {
  method: string;
  params: RpcParams;
}

/**
 * Outcome of one request. Exactly one of `data` / `error` is meaningful:
 * `error` is set when the server answered with an error, otherwise `data`
 * holds the result (which may itself be null).
 */
export interface RpcResult<T = unknown> {
  method: string;
  params: RpcParams;
  data?: T;
  error?: RpcErrorPayload;
}

/**
 * Inclusive protocol version range advertised during the handshake
 */
export type ProtocolVersionRange = readonly [min: string, max: string];

export type BitcoinNetworkName = 'bitcoin' | 'testnet' | 'regtest';

export function endpointLabel(endpoint: Pick<ServerEndpoint, 'host' | 'port'>): string {
  return `${endpoint.host}:${endpoint.port}`;
}

export const toRequest = (method: string, params: RpcParams = []): RpcRequest => ({ method, params });
