/**
 * RPC engine types
 *
 * Configuration and state types for the failover controller and the
 * request batcher.
 *
 * @module rpc/types
 */

import type { ProtocolVersionRange } from '../types/index.js';

/**
 * Failover controller state
 */
export type ControllerState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'disconnected'
  | 'reconnecting'
  | 'failed'
  | 'closed';

/**
 * Handshake settings advertised with `server.version`
 */
export interface HandshakeConfig {
  /** Client identity string */
  clientName: string;
  /** Supported protocol versions, inclusive */
  protocolVersion: ProtocolVersionRange;
}

/**
 * What the server reported during the handshake
 */
export interface ServerVersionInfo {
  /** e.g. "ElectrumX 1.16.0" */
  serverSoftware: string;
  /** Negotiated protocol version */
  protocolVersion: string;
}

/**
 * Maximum distinct servers per failover sequence
 */
export const DEFAULT_MAX_SERVERS = 5;

export const PROTOCOL_VERSION = '1.4';

export const CLIENT_NAME = 'electrumx-failover-client';

export const DEFAULT_HANDSHAKE_CONFIG: HandshakeConfig = {
  clientName: CLIENT_NAME,
  protocolVersion: [PROTOCOL_VERSION, PROTOCOL_VERSION],
};

export const SERVER_VERSION_METHOD = 'server.version';
