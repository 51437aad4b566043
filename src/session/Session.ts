/**
 * Session
 *
 * Owns one Connection, allocates request ids and keeps the pending-request
 * table. Inbound frames resolve pending ids; everything unsolicited goes
 * to the router (the subscription registry).
 *
 * @module session/Session
 */

import type { Logger } from 'pino';
import { JsonRpcCodec } from '../transport/JsonRpcCodec.js';
import type { InboundMessage, ResponseMessage } from '../transport/JsonRpcCodec.js';
import type { Connection, ConnectionHandlers } from '../transport/types.js';
import { ErrorUtils, RequestStateError, TransportError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { endpointLabel } from '../types/index.js';
import type { RequestId, RpcParams, RpcResult, ServerEndpoint } from '../types/index.js';

export type ResponseHandler = (result: RpcResult) => void;

export type UnsolicitedRouter = (message: InboundMessage) => void;

interface Waiter {
  resolve: (result: RpcResult) => void;
  reject: (error: Error) => void;
}

interface PendingRequest {
  id: RequestId;
  method: string;
  params: RpcParams;
  result?: RpcResult;
  failure?: Error;
  waiter?: Waiter;
  /** Set for subscription requests: the response goes here instead of a waiter */
  handler?: ResponseHandler;
}

export interface SessionOptions {
  /** Receives notifications and responses for ids this session never issued */
  router: UnsolicitedRouter;
  /** Called with errors raised while dispatching inbound frames */
  onFatal?: (error: Error) => void;
  /** Called once when the connection drops without `close()` */
  onDisconnect?: (error: Error) => void;
  codec?: JsonRpcCodec;
  logger?: Logger;
}

export class Session {
  readonly endpoint: ServerEndpoint;
  readonly handlers: ConnectionHandlers;

  private connection: Connection | null = null;
  private pending = new Map<RequestId, PendingRequest>();
  private nextId: RequestId = 0;
  private closeReason: Error | null = null;
  private droppedResponses = 0;
  private codec: JsonRpcCodec;
  private logger: Logger;
  private router: UnsolicitedRouter;
  private onFatal: (error: Error) => void;
  private onDisconnect?: (error: Error) => void;

  constructor(endpoint: ServerEndpoint, options: SessionOptions) {
    this.endpoint = endpoint;
    this.router = options.router;
    this.codec = options.codec ?? new JsonRpcCodec();
    this.logger = (options.logger ?? createLogger('session')).child({ endpoint: endpointLabel(endpoint) });
    this.onDisconnect = options.onDisconnect;
    this.onFatal = options.onFatal ?? ((error) => this.logger.error({ err: error }, 'Unhandled dispatch error'));
    this.handlers = {
      onFrame: (frame) => this.handleFrame(frame),
      onClose: (error) => this.handleClose(error),
    };
  }

  /**
   * Binds the connection opened with `this.handlers`
   */
  attach(connection: Connection): void {
    if (this.connection) {
      throw new Error(`Session for ${endpointLabel(this.endpoint)} already has a connection`);
    }
    this.connection = connection;
  }

  isOpen(): boolean {
    return this.closeReason === null && this.connection !== null && this.connection.isOpen();
  }

  getCloseReason(): Error | null {
    return this.closeReason;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  /** Responses dropped because their id was already settled or cancelled */
  getDroppedResponseCount(): number {
    return this.droppedResponses;
  }

  /**
   * Writes a request and records it as pending. Does not wait.
   * @throws TransportError if the connection is closed or the write fails
   */
  send(method: string, params: RpcParams, handler?: ResponseHandler): RequestId {
    const connection = this.connection;
    if (!connection || this.closeReason) {
      throw this.closeReason ?? TransportError.closed(endpointLabel(this.endpoint));
    }

    const id = this.nextId++;
    this.pending.set(id, { id, method, params, handler });

    try {
      connection.send(this.codec.encodeRequest(id, method, params));
    } catch (error) {
      this.pending.delete(id);
      throw error instanceof Error
        ? ErrorUtils.toTransportError(error, endpointLabel(this.endpoint))
        : TransportError.closed(endpointLabel(this.endpoint));
    }

    this.logger.trace({ id, method }, 'Request sent');
    return id;
  }

  /**
   * Waits for the response to `id`, then forgets the id
   */
  awaitResult(id: RequestId): Promise<RpcResult> {
    const entry = this.pending.get(id);
    if (!entry || entry.handler) {
      return Promise.reject(RequestStateError.unknown(id));
    }
    if (entry.waiter) {
      return Promise.reject(RequestStateError.alreadyAwaited(id));
    }

    if (entry.result) {
      this.pending.delete(id);
      return Promise.resolve(entry.result);
    }
    if (entry.failure) {
      this.pending.delete(id);
      return Promise.reject(entry.failure);
    }

    return new Promise<RpcResult>((resolve, reject) => {
      entry.waiter = { resolve, reject };
    });
  }

  /**
   * Sends one request and waits for it
   */
  call(method: string, params: RpcParams): Promise<RpcResult> {
    try {
      return this.awaitResult(this.send(method, params));
    } catch (error) {
      return Promise.reject(error);
    }
  }

  /**
   * Stops tracking `id`. A response arriving later is dropped.
   * Safe to call for ids that are already gone.
   */
  cancel(id: RequestId): boolean {
    return this.pending.delete(id);
  }

  /**
   * Settles the pending request `id` with an inbound response.
   * Returns false, and logs, when the id is not pending or already settled.
   */
  resolve(id: RequestId, response: Pick<ResponseMessage, 'result' | 'error'>): boolean {
    const entry = this.pending.get(id);
    if (!entry || entry.result || entry.failure) {
      this.droppedResponses++;
      this.logger.warn({ id }, 'Dropping response for a settled or cancelled request');
      return false;
    }

    const result: RpcResult = response.error
      ? { method: entry.method, params: entry.params, error: response.error }
      : { method: entry.method, params: entry.params, data: response.result };

    if (entry.handler) {
      this.pending.delete(id);
      entry.handler(result);
    } else if (entry.waiter) {
      this.pending.delete(id);
      entry.waiter.resolve(result);
    } else {
      entry.result = result;
    }
    return true;
  }

  /**
   * Closes the connection. Pending waiters are rejected with TransportError.
   */
  async close(): Promise<void> {
    if (!this.closeReason) {
      this.closeReason = TransportError.closed(endpointLabel(this.endpoint));
      this.failPending(this.closeReason);
    }
    const connection = this.connection;
    if (connection) {
      await connection.close();
    }
  }

  handleFrame(frame: string): void {
    let messages: InboundMessage[];
    try {
      messages = this.codec.decode(frame);
    } catch (error) {
      this.logger.error({ err: error }, 'Dropping undecodable frame');
      return;
    }

    for (const message of messages) {
      try {
        this.route(message);
      } catch (error) {
        this.onFatal(error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  private route(message: InboundMessage): void {
    if (message.kind === 'response' && typeof message.id === 'number') {
      if (this.pending.has(message.id) || (message.id >= 0 && message.id < this.nextId)) {
        this.resolve(message.id, message);
        return;
      }
    }
    this.router(message);
  }

  private handleClose(error?: Error): void {
    if (this.closeReason) return;

    const reason = error ?? TransportError.closed(endpointLabel(this.endpoint));
    this.closeReason = reason;
    this.failPending(reason);
    this.onDisconnect?.(reason);
  }

  private failPending(error: Error): void {
    for (const [id, entry] of this.pending) {
      if (entry.handler) {
        this.pending.delete(id);
      } else if (entry.waiter) {
        this.pending.delete(id);
        entry.waiter.reject(error);
      } else if (!entry.result) {
        entry.failure = error;
      }
    }
  }
}
