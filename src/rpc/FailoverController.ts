/**
 * Failover Controller
 *
 * Keeps exactly one live Session. On a transport error, a request timeout
 * or a failed handshake it closes the stale connection, marks the host as
 * failed for the current sequence and connects to a fresh random pick.
 * A sequence gives up after `maxServers` distinct failed hosts.
 *
 * @module rpc/FailoverController
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { ServerRegistry } from '../registry/ServerRegistry.js';
import { Session } from '../session/Session.js';
import type { UnsolicitedRouter } from '../session/Session.js';
import { TimeoutLevel, TimeoutManager } from '../resilience/TimeoutManager.js';
import { EventBus } from '../subscriptions/EventBus.js';
import { ClientEventType } from '../subscriptions/types.js';
import type { Connection, ConnectionFactory } from '../transport/types.js';
import {
  DataError,
  ElectrumError,
  ErrorUtils,
  FailoverExhaustedError,
  NoServersAvailableError,
  RpcError,
  TransportError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { endpointLabel } from '../types/index.js';
import type { ServerEndpoint } from '../types/index.js';
import {
  ControllerState,
  DEFAULT_HANDSHAKE_CONFIG,
  DEFAULT_MAX_SERVERS,
  HandshakeConfig,
  SERVER_VERSION_METHOD,
  ServerVersionInfo,
} from './types.js';

const ServerVersionSchema = z.tuple([z.string(), z.string()]);

export type ConnectedListener = (session: Session) => void;

export interface FailoverControllerOptions {
  registry: ServerRegistry;
  connectionFactory: ConnectionFactory;
  /** Receives unsolicited frames from every session */
  router: UnsolicitedRouter;
  /** Receives dispatch errors from every session */
  onFatal: (error: Error) => void;
  eventBus: EventBus;
  timeouts?: TimeoutManager;
  maxServers?: number;
  handshake?: HandshakeConfig;
  logger?: Logger;
}

export class FailoverController {
  private registry: ServerRegistry;
  private connectionFactory: ConnectionFactory;
  private router: UnsolicitedRouter;
  private onFatal: (error: Error) => void;
  private eventBus: EventBus;
  private timeouts: TimeoutManager;
  private maxServers: number;
  private handshakeConfig: HandshakeConfig;
  private logger: Logger;

  private state: ControllerState = 'idle';
  private session: Session | null = null;
  private current: ServerEndpoint | null = null;
  private failedHosts = new Set<string>();
  private reconnecting: Promise<Session> | null = null;
  private terminalError: ElectrumError | null = null;
  private serverInfo: ServerVersionInfo | null = null;
  private connectedListeners = new Set<ConnectedListener>();
  private disconnectedListeners = new Set<(error: Error) => void>();

  constructor(options: FailoverControllerOptions) {
    this.registry = options.registry;
    this.connectionFactory = options.connectionFactory;
    this.router = options.router;
    this.onFatal = options.onFatal;
    this.eventBus = options.eventBus;
    this.timeouts = options.timeouts ?? new TimeoutManager();
    this.maxServers = options.maxServers ?? DEFAULT_MAX_SERVERS;
    this.handshakeConfig = options.handshake ?? DEFAULT_HANDSHAKE_CONFIG;
    this.logger = options.logger ?? createLogger('failover');
  }

  getState(): ControllerState {
    return this.state;
  }

  getCurrentServer(): ServerEndpoint | null {
    return this.current;
  }

  getServerInfo(): ServerVersionInfo | null {
    return this.serverInfo;
  }

  getFailedHosts(): string[] {
    return Array.from(this.failedHosts);
  }

  /**
   * Opens the first session. `preferred` is tried before any random pick;
   * if it fails, normal failover takes over.
   */
  connect(preferred?: ServerEndpoint): Promise<Session> {
    if (this.state === 'closed') {
      return Promise.reject(new ElectrumError('Client is closed', 'CLIENT_CLOSED', false));
    }
    if (this.reconnecting) {
      return this.reconnecting;
    }
    if (this.session && this.session.isOpen()) {
      return Promise.resolve(this.session);
    }
    if (this.state === 'failed') {
      // An explicit connect starts a new sequence
      this.terminalError = null;
      this.failedHosts.clear();
      this.current = null;
    }

    this.setState('connecting');
    return this.track(this.reopen(preferred ?? null));
  }

  /**
   * Returns the live session, reconnecting first if the connection dropped
   */
  getSession(): Promise<Session> {
    if (this.terminalError) {
      return Promise.reject(this.terminalError);
    }
    if (this.state === 'closed') {
      return Promise.reject(new ElectrumError('Client is closed', 'CLIENT_CLOSED', false));
    }
    if (this.reconnecting) {
      return this.reconnecting;
    }
    if (this.session && this.session.isOpen()) {
      return Promise.resolve(this.session);
    }
    if (!this.session && this.state === 'idle') {
      return this.connect();
    }

    const reason = this.session?.getCloseReason() ?? TransportError.closed(this.currentLabel());
    return this.failover(reason, this.session ?? undefined);
  }

  /**
   * Replaces the current session after `cause`.
   * `stale` is the session the caller saw fail; if it has already been
   * replaced, the replacement is returned and no host is marked failed.
   */
  failover(cause: Error, stale?: Session): Promise<Session> {
    if (this.terminalError) {
      return Promise.reject(this.terminalError);
    }
    if (this.reconnecting) {
      return this.reconnecting;
    }
    if (stale && this.session !== stale && this.session?.isOpen()) {
      return Promise.resolve(this.session);
    }

    return this.track(this.runFailover(cause));
  }

  /**
   * Clears the failed-host set; called after a fully successful batch
   */
  resetFailures(): void {
    if (this.failedHosts.size > 0) {
      this.logger.debug({ failedHosts: this.getFailedHosts() }, 'Clearing failed hosts');
      this.failedHosts.clear();
    }
  }

  /**
   * Runs after every successful (re)connection, before callers get the session
   */
  onConnected(listener: ConnectedListener): () => void {
    this.connectedListeners.add(listener);
    return () => {
      this.connectedListeners.delete(listener);
    };
  }

  /**
   * Runs when the live connection drops on its own
   */
  onDisconnected(listener: (error: Error) => void): () => void {
    this.disconnectedListeners.add(listener);
    return () => {
      this.disconnectedListeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    this.setState('closed');
    await this.closeSession();
  }

  // ---- Private helpers ----

  private track(attempt: Promise<Session>): Promise<Session> {
    const tracked = attempt.finally(() => {
      if (this.reconnecting === tracked) {
        this.reconnecting = null;
      }
    });
    this.reconnecting = tracked;
    return tracked;
  }

  private async reopen(preferred: ServerEndpoint | null): Promise<Session> {
    await this.closeSession();
    return this.connectLoop(preferred, undefined);
  }

  private async runFailover(cause: Error): Promise<Session> {
    this.setState('reconnecting');
    this.logger.warn({ server: this.currentLabel(), err: cause }, 'Failing over');
    this.eventBus.emit(ClientEventType.FAILOVER_STARTED, {
      host: this.current?.host,
      reason: cause.message,
    });

    // The stale connection is fully torn down before another is opened
    await this.closeSession();
    return this.connectLoop(null, cause);
  }

  private async connectLoop(first: ServerEndpoint | null, cause: Error | undefined): Promise<Session> {
    let next = first;
    let lastError = cause;

    for (;;) {
      if (!next) {
        if (this.current) {
          this.markFailed(this.current.host, lastError);
        }
        if (this.failedHosts.size >= this.maxServers) {
          throw this.exhaust(lastError);
        }
        next = this.pick(lastError);
      }

      const endpoint: ServerEndpoint = next;
      this.current = endpoint;
      next = null;

      try {
        const session = await this.openSession(endpoint);
        if (this.state === 'closed') {
          await session.close();
          throw new ElectrumError('Client is closed', 'CLIENT_CLOSED', false);
        }
        this.session = session;
        for (const listener of this.connectedListeners) {
          listener(session);
        }
        this.setState('connected');
        this.eventBus.emit(ClientEventType.CONNECTED, {
          host: endpoint.host,
          port: endpoint.port,
          ...this.serverInfo,
        });
        return session;
      } catch (error) {
        if (error instanceof ElectrumError && error.code === 'CLIENT_CLOSED') {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn({ server: endpointLabel(endpoint), err: lastError }, 'Server unusable');
        if (this.session) {
          await this.closeSession();
        }
      }
    }
  }

  private pick(lastError: Error | undefined): ServerEndpoint {
    try {
      return this.registry.pickRandom(this.failedHosts);
    } catch (error) {
      if (error instanceof NoServersAvailableError && this.failedHosts.size > 0) {
        throw this.exhaust(error);
      }
      if (error instanceof NoServersAvailableError) {
        this.terminalError = error;
        this.setState('failed');
        this.logger.error({ err: error, cause: lastError }, 'No servers available');
        this.eventBus.emit(ClientEventType.FATAL_ERROR, { error });
      }
      throw error;
    }
  }

  private markFailed(host: string, error: Error | undefined): void {
    if (this.failedHosts.has(host)) return;
    this.failedHosts.add(host);
    this.eventBus.emit(ClientEventType.SERVER_FAILED, {
      host,
      reason: error?.message,
      failedCount: this.failedHosts.size,
    });
  }

  private exhaust(cause: Error | undefined): FailoverExhaustedError {
    const error = new FailoverExhaustedError(this.getFailedHosts(), cause);
    this.terminalError = error;
    this.setState('failed');
    this.logger.error({ failedHosts: error.failedHosts, err: cause }, 'Failover exhausted');
    this.eventBus.emit(ClientEventType.FAILOVER_EXHAUSTED, { failedHosts: error.failedHosts });
    return error;
  }

  private async openSession(endpoint: ServerEndpoint): Promise<Session> {
    const session: Session = new Session(endpoint, {
      router: this.router,
      onFatal: this.onFatal,
      onDisconnect: (error) => this.handleDisconnect(session, error),
      logger: this.logger,
    });

    const label = endpointLabel(endpoint);
    const opening = this.connectionFactory(endpoint, session.handlers);
    let connection: Connection;
    try {
      connection = await this.timeouts.execute(() => opening, TimeoutLevel.CONNECTION, 'connect', label);
    } catch (error) {
      // A connection that completes after the timeout is never used
      void opening
        .then((late) => late.close(), () => undefined)
        .catch((closeError: unknown) => {
          this.logger.debug({ server: label, err: closeError }, 'Could not close late connection');
        });
      throw error;
    }
    session.attach(connection);

    try {
      this.serverInfo = await this.handshake(session);
    } catch (error) {
      await session.close();
      throw error;
    }

    this.logger.info({ server: label, ...this.serverInfo }, 'Handshake complete');
    return session;
  }

  private async handshake(session: Session): Promise<ServerVersionInfo> {
    const { clientName, protocolVersion } = this.handshakeConfig;
    const label = endpointLabel(session.endpoint);

    const result = await this.timeouts.execute(
      () => session.call(SERVER_VERSION_METHOD, [clientName, protocolVersion]),
      TimeoutLevel.REQUEST,
      SERVER_VERSION_METHOD,
      label,
    );

    if (result.error) {
      throw new RpcError(SERVER_VERSION_METHOD, result.error);
    }
    const parsed = ServerVersionSchema.safeParse(result.data);
    if (!parsed.success) {
      throw DataError.schemaViolation('FRAME', 'server.version must return [software, protocol]', result.data);
    }

    const [serverSoftware, negotiated] = parsed.data;
    return { serverSoftware, protocolVersion: negotiated };
  }

  private handleDisconnect(session: Session, error: Error): void {
    if (session !== this.session || this.state === 'closed') return;

    this.setState('disconnected');
    this.logger.warn({ server: this.currentLabel(), err: error }, 'Connection lost');
    this.eventBus.emit(ClientEventType.DISCONNECTED, {
      host: session.endpoint.host,
      retriable: ErrorUtils.isRetriable(error),
      reason: error.message,
    });
    for (const listener of this.disconnectedListeners) {
      listener(error);
    }
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await session.close();
    }
  }

  private currentLabel(): string {
    return this.current ? endpointLabel(this.current) : 'none';
  }

  private setState(state: ControllerState): void {
    if (this.state === state) return;
    this.logger.debug({ from: this.state, to: state }, 'State change');
    this.state = state;
  }
}
