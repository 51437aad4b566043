/**
 * Request builders, one per ElectrumX method
 *
 * @module api/requests
 */

import { toRequest } from '../types/index.js';
import type { ProtocolVersionRange, RpcRequest } from '../types/index.js';

export const Methods = {
  BLOCK_GET_HEADER: 'blockchain.block.get_header',
  TRANSACTION_GET_MERKLE: 'blockchain.transaction.get_merkle',
  TRANSACTION_GET: 'blockchain.transaction.get',
  TRANSACTION_BROADCAST: 'blockchain.transaction.broadcast',
  ESTIMATE_FEE: 'blockchain.estimatefee',
  RELAY_FEE: 'blockchain.relayfee',
  SCRIPTHASH_GET_BALANCE: 'blockchain.scripthash.get_balance',
  SCRIPTHASH_LIST_UNSPENT: 'blockchain.scripthash.listunspent',
  SCRIPTHASH_GET_MEMPOOL: 'blockchain.scripthash.get_mempool',
  SCRIPTHASH_GET_HISTORY: 'blockchain.scripthash.get_history',
  SERVER_DONATION_ADDRESS: 'server.donation_address',
  SERVER_BANNER: 'server.banner',
  SERVER_VERSION: 'server.version',
  SERVER_FEATURES: 'server.features',
  SERVER_PEERS_SUBSCRIBE: 'server.peers.subscribe',
} as const;

/** A confirmed transaction to prove: its hash and block height */
export interface TxRef {
  tx_hash: string;
  height: number;
}

export const blockHeaderRequests = (heights: readonly number[]): RpcRequest[] =>
  heights.map((height) => toRequest(Methods.BLOCK_GET_HEADER, [height]));

export const merkleRequests = (txs: readonly TxRef[]): RpcRequest[] =>
  txs.map((tx) => toRequest(Methods.TRANSACTION_GET_MERKLE, [tx.tx_hash, tx.height]));

export const transactionRequests = (hashes: readonly string[]): RpcRequest[] =>
  hashes.map((hash) => toRequest(Methods.TRANSACTION_GET, [hash]));

export const scripthashRequests = (method: string, scripthashes: readonly string[]): RpcRequest[] =>
  scripthashes.map((scripthash) => toRequest(method, [scripthash]));

export const estimateFeeRequest = (targetBlocks: number): RpcRequest =>
  toRequest(Methods.ESTIMATE_FEE, [targetBlocks]);

export const broadcastRequest = (rawTx: string): RpcRequest => toRequest(Methods.TRANSACTION_BROADCAST, [rawTx]);

export const serverVersionRequest = (clientName: string, protocolVersion: ProtocolVersionRange | string): RpcRequest =>
  toRequest(Methods.SERVER_VERSION, [clientName, protocolVersion]);
