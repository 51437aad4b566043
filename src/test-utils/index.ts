/**
 * Test utilities: an in-process stand-in for ElectrumX servers
 *
 * `FakeNetwork.factory` is a ConnectionFactory. Each host is scripted
 * through its `FakeServer`; replies are delivered on a microtask, so they
 * arrive after the caller's synchronous code, as socket data would.
 */

import type { Connection, ConnectionFactory, ConnectionHandlers } from '../transport/types.js';
import { TransportError } from '../utils/errors.js';
import type { RpcErrorPayload } from '../utils/errors.js';
import { endpointLabel } from '../types/index.js';
import type { ServerCatalog, ServerEndpoint } from '../types/index.js';

export type FakeReply = { result: unknown } | { error: RpcErrorPayload };

/** Returning undefined holds the request until `reply()` is called */
export type FakeHandler = (params: unknown[]) => FakeReply | undefined;

export interface ReceivedRequest {
  id: number;
  method: string;
  params: unknown[];
}

export const FAKE_SERVER_SOFTWARE = 'FakeElectrumX 1.16.0';

export class FakeServer {
  readonly host: string;
  refuse = false;
  handshake: 'ok' | 'error' | 'silent' = 'ok';
  /** Delay before a connection is accepted */
  connectDelayMs = 0;
  /** Hold every non-handshake request */
  silent = false;
  readonly received: ReceivedRequest[] = [];
  readonly connections: FakeConnection[] = [];
  private handlers = new Map<string, FakeHandler>();

  constructor(host: string) {
    this.host = host;
  }

  on(method: string, handler: FakeHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  get connection(): FakeConnection | undefined {
    return this.connections[this.connections.length - 1];
  }

  /** Requests received other than the handshake */
  requests(method?: string): ReceivedRequest[] {
    return this.received.filter(
      (request) => request.method !== 'server.version' && (method === undefined || request.method === method),
    );
  }

  reply(id: number, reply: FakeReply): void {
    this.connection?.deliver({ jsonrpc: '2.0', id, ...reply });
  }

  push(method: string, params: unknown[]): void {
    this.connection?.deliver({ jsonrpc: '2.0', method, params });
  }

  sendRaw(frame: string): void {
    this.connection?.deliverRaw(frame);
  }

  dropConnection(): void {
    this.connection?.drop();
  }

  handle(connection: FakeConnection, request: ReceivedRequest): void {
    this.received.push(request);

    if (request.method === 'server.version') {
      switch (this.handshake) {
        case 'ok':
          connection.deliver({ jsonrpc: '2.0', id: request.id, result: [FAKE_SERVER_SOFTWARE, '1.4'] });
          return;
        case 'error':
          connection.deliver({
            jsonrpc: '2.0',
            id: request.id,
            error: { code: 1, message: 'unsupported protocol version' },
          });
          return;
        case 'silent':
          return;
      }
    }

    if (this.silent) return;

    const handler = this.handlers.get(request.method);
    const reply: FakeReply | undefined = handler
      ? handler(request.params)
      : { error: { code: -32601, message: `unknown method "${request.method}"` } };
    if (reply) {
      connection.deliver({ jsonrpc: '2.0', id: request.id, ...reply });
    }
  }
}

export class FakeConnection implements Connection {
  readonly endpoint: ServerEndpoint;
  private open = true;
  private handlers: ConnectionHandlers;
  private server: FakeServer;

  constructor(endpoint: ServerEndpoint, handlers: ConnectionHandlers, server: FakeServer) {
    this.endpoint = endpoint;
    this.handlers = handlers;
    this.server = server;
  }

  isOpen(): boolean {
    return this.open;
  }

  send(frame: string): void {
    if (!this.open) {
      throw TransportError.closed(endpointLabel(this.endpoint));
    }
    const message: unknown = JSON.parse(frame);
    if (typeof message !== 'object' || message === null) return;
    const id = 'id' in message && typeof message.id === 'number' ? message.id : -1;
    const method = 'method' in message && typeof message.method === 'string' ? message.method : '';
    const params = 'params' in message && Array.isArray(message.params) ? message.params : [];
    this.server.handle(this, { id, method, params });
  }

  async close(): Promise<void> {
    this.open = false;
  }

  deliver(message: object): void {
    this.deliverRaw(JSON.stringify(message));
  }

  deliverRaw(frame: string): void {
    queueMicrotask(() => {
      if (this.open) {
        this.handlers.onFrame(frame);
      }
    });
  }

  drop(): void {
    if (!this.open) return;
    this.open = false;
    this.handlers.onClose(TransportError.reset(endpointLabel(this.endpoint)));
  }
}

export class FakeNetwork {
  readonly servers = new Map<string, FakeServer>();
  /** Hosts in connection-attempt order */
  readonly attempts: string[] = [];

  readonly factory: ConnectionFactory = async (endpoint, handlers) => {
    this.attempts.push(endpoint.host);
    const server = this.servers.get(endpoint.host);
    if (!server || server.refuse) {
      throw TransportError.refused(endpointLabel(endpoint));
    }
    if (server.connectDelayMs > 0) {
      await sleep(server.connectDelayMs);
    }
    const connection = new FakeConnection(endpoint, handlers, server);
    server.connections.push(connection);
    return connection;
  };

  constructor(hosts: readonly string[] = []) {
    for (const host of hosts) {
      this.server(host);
    }
  }

  server(host: string): FakeServer {
    let server = this.servers.get(host);
    if (!server) {
      server = new FakeServer(host);
      this.servers.set(host, server);
    }
    return server;
  }

  /** Catalog listing every scripted host with a TLS and a TCP port */
  catalog(): ServerCatalog {
    const catalog: ServerCatalog = {};
    for (const host of this.servers.keys()) {
      catalog[host] = { s: 50002, t: 50001 };
    }
    return catalog;
  }
}

/**
 * Deterministic random source cycling through `values`
 */
export function sequenceRandom(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}

/**
 * Lets queued microtasks and one macrotask turn run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
