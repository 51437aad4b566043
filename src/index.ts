// Client - Public API
export { ElectrumClient } from './client/ElectrumClient.js';
export type {
  ElectrumClientOptions,
  ScripthashTargets,
  AddressBalance,
  AddressUnspent,
  AddressTransaction,
  MerkleData,
} from './client/ElectrumClient.js';
export { createElectrumClient } from './createElectrumClient.js';

// Protocol requests and response schemas
export { Methods } from './api/requests.js';
export type { TxRef } from './api/requests.js';
export {
  BalanceSchema,
  UnspentOutputSchema,
  HistoryItemSchema,
  BlockHeaderInfoSchema,
  MerkleProofSchema,
  FeeRateSchema,
  parseResponse,
} from './api/schemas.js';
export type { Balance, UnspentOutput, HistoryItem, BlockHeaderInfo, MerkleProof } from './api/schemas.js';

// Core engine
export { ServerRegistry } from './registry/ServerRegistry.js';
export type { ServerRegistryOptions } from './registry/ServerRegistry.js';
export { Session } from './session/Session.js';
export type { SessionOptions, ResponseHandler, UnsolicitedRouter } from './session/Session.js';
export { FailoverController } from './rpc/FailoverController.js';
export type { FailoverControllerOptions, ConnectedListener } from './rpc/FailoverController.js';
export { RequestBatcher } from './rpc/RequestBatcher.js';
export type { RequestBatcherOptions } from './rpc/RequestBatcher.js';
export {
  CLIENT_NAME,
  PROTOCOL_VERSION,
  DEFAULT_MAX_SERVERS,
  DEFAULT_HANDSHAKE_CONFIG,
} from './rpc/types.js';
export type { ControllerState, HandshakeConfig, ServerVersionInfo } from './rpc/types.js';
export { TimeoutManager, TimeoutLevel, DEFAULT_TIMEOUT_CONFIG } from './resilience/TimeoutManager.js';
export type { TimeoutConfig } from './resilience/TimeoutManager.js';

// Transport
export { TcpConnection, createTcpConnectionFactory } from './transport/TcpConnection.js';
export type { TcpConnectionOptions } from './transport/TcpConnection.js';
export { JsonRpcCodec, JSONRPC_VERSION } from './transport/JsonRpcCodec.js';
export type { InboundMessage, ResponseMessage, NotificationMessage } from './transport/JsonRpcCodec.js';
export type { Connection, ConnectionFactory, ConnectionHandlers } from './transport/types.js';

// Subscriptions and events
export { EventBus } from './subscriptions/EventBus.js';
export { SubscriptionRegistry } from './subscriptions/SubscriptionRegistry.js';
export type { SubscriptionRegistryOptions } from './subscriptions/SubscriptionRegistry.js';
export { ClientEventType, SCRIPTHASH_SUBSCRIBE, HEADERS_SUBSCRIBE } from './subscriptions/types.js';
export type {
  ClientEvent,
  EventListener,
  BlockHeader,
  BlockHeaderCallback,
  ScripthashStatus,
  ScripthashStatusCallback,
  ScripthashStatusUpdate,
} from './subscriptions/types.js';

// Caching
export { CacheManager } from './performance/CacheManager.js';
export type { CacheConfig, CacheEntry, CacheStats } from './performance/CacheManager.js';
export { FeeCache, DEFAULT_FEE_TTL_MINUTES } from './performance/FeeCache.js';
export type { FeeFetcher, FeeCacheOptions } from './performance/FeeCache.js';

// Configuration
export {
  ConfigurationService,
  DEFAULT_TLS_PORT,
  DEFAULT_TCP_PORT,
  ServerCatalogSchema,
} from './infrastructure/config/ConfigurationService.js';
export type {
  ElectrumClientConfig,
  ConfigurationServiceOptions,
} from './infrastructure/config/ConfigurationService.js';

// Types
export * from './types/index.js';

// Errors
export {
  ElectrumError,
  TransportError,
  TimeoutError,
  RpcError,
  FailoverExhaustedError,
  NoServersAvailableError,
  PushProtocolViolationError,
  RequestStateError,
  ValidationError,
  DataError,
  ErrorUtils,
} from './utils/errors.js';
export type { TransportFailure, RpcErrorPayload, DataKind } from './utils/errors.js';

// Utils
export { createLogger, createSilentLogger, resetLoggerCache } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export {
  addressToScripthash,
  scripthashFromScript,
  scripthashMap,
  isValidScripthash,
} from './utils/scripthash.js';
