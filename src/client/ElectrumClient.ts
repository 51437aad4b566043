/**
 * ElectrumX client facade
 *
 * Owns the registry, failover controller, batcher, subscription registry
 * and fee cache for one logical connection, and exposes the protocol's
 * RPC methods on top of them.
 *
 * @module client/ElectrumClient
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import {
  BalanceSchema,
  BlockHeaderInfoSchema,
  FeeRateSchema,
  HistoryListSchema,
  MerkleProofSchema,
  UnspentListSchema,
  parseResponse,
} from '../api/schemas.js';
import type { Balance, BlockHeaderInfo, HistoryItem, MerkleProof, UnspentOutput } from '../api/schemas.js';
import {
  Methods,
  blockHeaderRequests,
  broadcastRequest,
  estimateFeeRequest,
  merkleRequests,
  scripthashRequests,
  serverVersionRequest,
  transactionRequests,
} from '../api/requests.js';
import type { TxRef } from '../api/requests.js';
import { ConfigurationService } from '../infrastructure/config/ConfigurationService.js';
import type { ElectrumClientConfig } from '../infrastructure/config/ConfigurationService.js';
import { FeeCache } from '../performance/FeeCache.js';
import { ServerRegistry } from '../registry/ServerRegistry.js';
import { TimeoutManager } from '../resilience/TimeoutManager.js';
import { FailoverController } from '../rpc/FailoverController.js';
import { RequestBatcher } from '../rpc/RequestBatcher.js';
import type { ControllerState, ServerVersionInfo } from '../rpc/types.js';
import type { Session } from '../session/Session.js';
import { EventBus } from '../subscriptions/EventBus.js';
import { SubscriptionRegistry } from '../subscriptions/SubscriptionRegistry.js';
import { ClientEventType } from '../subscriptions/types.js';
import type { BlockHeaderCallback, EventListener, ScripthashStatusCallback } from '../subscriptions/types.js';
import { createTcpConnectionFactory } from '../transport/TcpConnection.js';
import type { ConnectionFactory } from '../transport/types.js';
import { DataError, ErrorUtils, RpcError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { scripthashMap } from '../utils/scripthash.js';
import type { ProtocolVersionRange, RpcRequest, RpcResult, ServerEndpoint } from '../types/index.js';

export interface ElectrumClientOptions {
  /** Overrides merged on top of defaults and ELECTRUM_* variables */
  config?: Partial<ElectrumClientConfig>;
  /** Pre-built configuration; `config` is ignored when set */
  configuration?: ConfigurationService;
  /** @default TCP/TLS sockets */
  connectionFactory?: ConnectionFactory;
  /** Server selection randomness @default Math.random */
  random?: () => number;
  /** Clock for the fee cache @default Date.now */
  now?: () => number;
  logger?: Logger;
}

/** scripthash -> external id (usually the address) */
export type ScripthashTargets = Record<string, string>;

export type AddressBalance = Balance & { address: string; total: number };
export type AddressUnspent = UnspentOutput & { address: string };
export type AddressTransaction = HistoryItem & { address: string };
export type MerkleData = MerkleProof & { merkle_root: string };

const StringResultSchema = z.string();
const ServerVersionResultSchema = z.tuple([z.string(), z.string()]);
const FeaturesSchema = z.record(z.unknown());
const PeersSchema = z.array(z.unknown());

export class ElectrumClient {
  readonly events: EventBus;

  private configuration: ConfigurationService;
  private registry: ServerRegistry;
  private controller: FailoverController;
  private batcher: RequestBatcher;
  private subscriptions: SubscriptionRegistry;
  private feeCache: FeeCache;
  private logger: Logger;
  private fatalError: Error | null = null;

  constructor(options: ElectrumClientOptions = {}) {
    this.logger = options.logger ?? createLogger('client');
    this.configuration =
      options.configuration ?? new ConfigurationService(options.config, { logger: this.logger });
    const config = this.configuration.getConfig();

    this.events = new EventBus(this.logger);
    const timeouts = new TimeoutManager(this.configuration.getTimeouts());

    this.registry = ServerRegistry.fromCatalog(this.configuration.getCatalog(), {
      useTls: config.useTls,
      random: options.random,
      logger: this.logger,
    });

    this.subscriptions = new SubscriptionRegistry({ eventBus: this.events, logger: this.logger });

    this.controller = new FailoverController({
      registry: this.registry,
      connectionFactory:
        options.connectionFactory ??
        createTcpConnectionFactory({
          connectTimeoutMs: config.connectTimeoutMs,
          allowSelfSignedCert: config.allowSelfSignedCert,
          logger: this.logger,
        }),
      router: (message) => this.subscriptions.dispatch(message),
      onFatal: (error) => this.recordFatal(error),
      eventBus: this.events,
      timeouts,
      maxServers: config.maxServers,
      handshake: { clientName: config.clientName, protocolVersion: config.protocolVersion },
      logger: this.logger,
    });

    this.controller.onConnected((session) => {
      this.subscriptions.resubscribe(session);
    });
    this.controller.onDisconnected(() => this.reconnectForSubscriptions());

    this.batcher = new RequestBatcher(this.controller, { timeouts, logger: this.logger });
    this.feeCache = new FeeCache((target) => this.estimateFee(target), {
      now: options.now,
      logger: this.logger,
    });
  }

  // ---- Lifecycle ----

  /**
   * Opens the first session: the configured host if any, else a random pick
   */
  async connect(): Promise<ServerVersionInfo | null> {
    this.assertUsable();
    if (this.controller.getState() === 'connected') {
      return this.controller.getServerInfo();
    }
    await this.controller.connect(this.configuration.getPreferredEndpoint());
    return this.controller.getServerInfo();
  }

  async close(): Promise<void> {
    await this.controller.close();
    this.logger.info('Client closed');
  }

  on(type: ClientEventType, listener: EventListener): () => void {
    return this.events.on(type, listener);
  }

  getState(): ControllerState {
    return this.controller.getState();
  }

  getCurrentServer(): ServerEndpoint | null {
    return this.controller.getCurrentServer();
  }

  getServerInfo(): ServerVersionInfo | null {
    return this.controller.getServerInfo();
  }

  getFailedHosts(): string[] {
    return this.controller.getFailedHosts();
  }

  getFatalError(): Error | null {
    return this.fatalError;
  }

  getConfig(): Readonly<ElectrumClientConfig> {
    return this.configuration.getConfig();
  }

  // ---- Core primitives ----

  /**
   * Results in request order; server errors stay in `result.error`
   */
  async sendAndAwaitAll(requests: readonly RpcRequest[]): Promise<RpcResult[]> {
    this.assertUsable();
    return this.batcher.sendAndAwaitAll(requests);
  }

  /**
   * @throws RpcError when the server answers with an error
   */
  async runCommand(method: string, params: readonly unknown[] = []): Promise<unknown> {
    this.assertUsable();
    return this.batcher.runCommand(method, params);
  }

  // ---- Blocks and transactions ----

  async blockHeader(...heights: number[]): Promise<BlockHeaderInfo[]> {
    const results = await this.sendAndAwaitAll(blockHeaderRequests(heights));
    return results.map((result) => parseResponse(BlockHeaderInfoSchema, this.unwrap(result), 'HEADER'));
  }

  async getMerkle(...txs: TxRef[]): Promise<MerkleProof[]> {
    const results = await this.sendAndAwaitAll(merkleRequests(txs));
    return results.map((result) => parseResponse(MerkleProofSchema, this.unwrap(result), 'MERKLE'));
  }

  /**
   * Merkle proofs with the merkle root of their block attached.
   * Headers and proofs travel in one batch.
   */
  async getAllMerkleData(...txs: TxRef[]): Promise<MerkleData[]> {
    const heights = Array.from(new Set(txs.map((tx) => tx.height)));
    const results = await this.sendAndAwaitAll([...blockHeaderRequests(heights), ...merkleRequests(txs)]);

    const roots = new Map<number, string>();
    for (const result of results.slice(0, heights.length)) {
      const header = parseResponse(BlockHeaderInfoSchema, this.unwrap(result), 'HEADER');
      roots.set(header.block_height, header.merkle_root);
    }

    return results.slice(heights.length).map((result) => {
      const proof = parseResponse(MerkleProofSchema, this.unwrap(result), 'MERKLE');
      const root = roots.get(proof.block_height);
      if (root === undefined) {
        throw DataError.schemaViolation('MERKLE', `No header for block ${proof.block_height}`, proof);
      }
      return { ...proof, merkle_root: root };
    });
  }

  async getTxs(...hashes: string[]): Promise<RpcResult[]> {
    return this.sendAndAwaitAll(transactionRequests(hashes));
  }

  /**
   * @returns the transaction id reported by the server
   */
  async broadcastTransaction(rawTx: string): Promise<string> {
    const { method, params } = broadcastRequest(rawTx);
    return parseResponse(StringResultSchema, await this.runCommand(method, params), 'FRAME');
  }

  // ---- Fees ----

  async estimateFee(targetBlocks: number): Promise<number> {
    const { method, params } = estimateFeeRequest(targetBlocks);
    return parseResponse(FeeRateSchema, await this.runCommand(method, params), 'FRAME');
  }

  /**
   * Fee estimate served from cache while younger than `ttlMinutes`
   */
  async estimateFeeCached(targetBlocks: number, ttlMinutes?: number): Promise<number> {
    this.assertUsable();
    return this.feeCache.get(targetBlocks, ttlMinutes);
  }

  async relayFee(): Promise<number> {
    return parseResponse(FeeRateSchema, await this.runCommand(Methods.RELAY_FEE), 'FRAME');
  }

  // ---- Server ----

  async serverDonationAddress(): Promise<string> {
    return parseResponse(StringResultSchema, await this.runCommand(Methods.SERVER_DONATION_ADDRESS), 'FRAME');
  }

  async serverBanner(): Promise<string> {
    return parseResponse(StringResultSchema, await this.runCommand(Methods.SERVER_BANNER), 'FRAME');
  }

  async serverVersion(
    protocolVersion?: ProtocolVersionRange | string,
    clientName?: string,
  ): Promise<readonly [string, string]> {
    const config = this.configuration.getConfig();
    const { method, params } = serverVersionRequest(
      clientName ?? config.clientName,
      protocolVersion ?? config.protocolVersion,
    );
    return parseResponse(ServerVersionResultSchema, await this.runCommand(method, params), 'FRAME');
  }

  async serverFeatures(): Promise<Record<string, unknown>> {
    return parseResponse(FeaturesSchema, await this.runCommand(Methods.SERVER_FEATURES), 'FRAME');
  }

  /**
   * Current peer list; later peer pushes are not tracked
   */
  async subscribeToPeers(): Promise<unknown[]> {
    return parseResponse(PeersSchema, await this.runCommand(Methods.SERVER_PEERS_SUBSCRIBE), 'FRAME');
  }

  // ---- Scripthashes ----

  async getBalance(targets: ScripthashTargets): Promise<AddressBalance[]> {
    const scripthashes = Object.keys(targets);
    const results = await this.sendAndAwaitAll(scripthashRequests(Methods.SCRIPTHASH_GET_BALANCE, scripthashes));
    return results.map((result, i) => {
      const balance = parseResponse(BalanceSchema, this.unwrap(result), 'BALANCE');
      return {
        ...balance,
        address: this.addressFor(targets, scripthashes[i]),
        total: balance.confirmed + balance.unconfirmed,
      };
    });
  }

  async unspent(targets: ScripthashTargets): Promise<AddressUnspent[]> {
    return this.flatten(targets, Methods.SCRIPTHASH_LIST_UNSPENT, UnspentListSchema, 'UTXO');
  }

  async getMempool(targets: ScripthashTargets): Promise<AddressTransaction[]> {
    return this.flatten(targets, Methods.SCRIPTHASH_GET_MEMPOOL, HistoryListSchema, 'MEMPOOL');
  }

  async history(targets: ScripthashTargets): Promise<AddressTransaction[]> {
    return this.flatten(targets, Methods.SCRIPTHASH_GET_HISTORY, HistoryListSchema, 'HISTORY');
  }

  // ---- Subscriptions ----

  /**
   * `callback` receives the external id from `targets`, never the scripthash.
   * The current status arrives first, through the same callback.
   */
  async subscribeToScripthashes(targets: ScripthashTargets, callback: ScripthashStatusCallback): Promise<void> {
    await this.withSession((session) => this.subscriptions.subscribeScripthashes(session, targets, callback));
  }

  async subscribeToAddresses(addresses: readonly string[], callback: ScripthashStatusCallback): Promise<void> {
    const targets = scripthashMap(addresses, this.configuration.getConfig().network);
    await this.subscribeToScripthashes(targets, callback);
  }

  async subscribeToBlockHeaders(callback: BlockHeaderCallback): Promise<void> {
    await this.withSession((session) => this.subscriptions.subscribeHeaders(session, callback));
  }

  // ---- Private helpers ----

  /**
   * Registers a subscription on the live session. If the send fails, the
   * failover that follows replays every recorded subscription.
   */
  private async withSession(register: (session: Session) => void): Promise<void> {
    this.assertUsable();
    const session = await this.controller.getSession();
    try {
      register(session);
    } catch (error) {
      if (!(error instanceof Error) || !ErrorUtils.isRetriable(error)) {
        throw error;
      }
      await this.controller.failover(error, session);
    }
  }

  private async flatten<T extends object>(
    targets: ScripthashTargets,
    method: string,
    schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
    kind: 'UTXO' | 'MEMPOOL' | 'HISTORY',
  ): Promise<(T & { address: string })[]> {
    const scripthashes = Object.keys(targets);
    const results = await this.sendAndAwaitAll(scripthashRequests(method, scripthashes));
    return results.flatMap((result, i) => {
      const address = this.addressFor(targets, scripthashes[i]);
      return parseResponse(schema, this.unwrap(result), kind).map((item) => ({ ...item, address }));
    });
  }

  private unwrap(result: RpcResult): unknown {
    if (result.error) {
      throw new RpcError(result.method, result.error);
    }
    return result.data;
  }

  private addressFor(targets: ScripthashTargets, scripthash: string | undefined): string {
    return scripthash === undefined ? '' : (targets[scripthash] ?? scripthash);
  }

  private reconnectForSubscriptions(): void {
    if (this.subscriptions.size === 0 || this.fatalError) {
      return;
    }
    void this.controller.getSession().catch((error: unknown) => {
      this.logger.error({ err: error }, 'Could not restore subscriptions');
    });
  }

  private recordFatal(error: Error): void {
    if (this.fatalError) {
      this.logger.error({ err: error }, 'Further fatal error after the client stopped');
      return;
    }
    this.fatalError = error;
    this.logger.error({ err: error }, 'Fatal protocol error; closing client');
    this.events.emit(ClientEventType.FATAL_ERROR, { error });
    void this.controller.close().catch((closeError: unknown) => {
      this.logger.error({ err: closeError }, 'Could not close after fatal error');
    });
  }

  private assertUsable(): void {
    if (this.fatalError) {
      throw this.fatalError;
    }
  }
}
