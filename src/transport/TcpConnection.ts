/**
 * TCP / TLS connection to one ElectrumX server
 *
 * Newline-delimited framing over `node:net`, optionally wrapped in
 * `node:tls`. The connection reports complete frames and its own close;
 * it never retries, failover is the controller's job.
 *
 * @module transport/TcpConnection
 */

import net from 'node:net';
import tls from 'node:tls';
import type { Logger } from 'pino';
import { ErrorUtils, TransportError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { endpointLabel } from '../types/index.js';
import type { ServerEndpoint } from '../types/index.js';
import type { Connection, ConnectionFactory, ConnectionHandlers } from './types.js';

export interface TcpConnectionOptions {
  /** Connection + TLS handshake timeout (ms) @default 10000 */
  connectTimeoutMs?: number;
  /** Accept self-signed server certificates @default true */
  allowSelfSignedCert?: boolean;
  /** TCP keepalive initial delay (ms) @default 30000 */
  keepAliveMs?: number;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_KEEPALIVE_MS = 30_000;

export class TcpConnection implements Connection {
  readonly endpoint: ServerEndpoint;
  private socket: net.Socket;
  private handlers: ConnectionHandlers;
  private logger: Logger;
  private buffer = '';
  private open = true;
  private closed: Promise<void>;

  private constructor(
    endpoint: ServerEndpoint,
    socket: net.Socket,
    handlers: ConnectionHandlers,
    logger: Logger,
  ) {
    this.endpoint = endpoint;
    this.socket = socket;
    this.handlers = handlers;
    this.logger = logger;

    this.closed = new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
    });

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (error: Error) => this.handleTermination(error));
    socket.on('end', () => this.handleTermination());
    socket.on('close', () => this.handleTermination());
  }

  /**
   * Opens a connection and resolves once it is ready to send
   * (after the TLS handshake when `endpoint.useTls` is set)
   */
  static open(
    endpoint: ServerEndpoint,
    handlers: ConnectionHandlers,
    options: TcpConnectionOptions = {},
  ): Promise<TcpConnection> {
    const logger = options.logger ?? createLogger('transport');
    const timeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const label = endpointLabel(endpoint);

    return new Promise<TcpConnection>((resolve, reject) => {
      let settled = false;

      const socket: net.Socket = endpoint.useTls
        ? tls.connect({
            host: endpoint.host,
            port: endpoint.port,
            servername: net.isIP(endpoint.host) ? undefined : endpoint.host,
            rejectUnauthorized: !(options.allowSelfSignedCert ?? true),
          })
        : net.connect({ host: endpoint.host, port: endpoint.port });

      const readyEvent = endpoint.useTls ? 'secureConnect' : 'connect';

      const timer = setTimeout(() => {
        fail(TransportError.connectTimeout(label, timeoutMs));
      }, timeoutMs);

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        logger.warn({ endpoint: label, err: error }, 'Connection attempt failed');
        const transportError = endpoint.useTls && !('code' in error)
          ? TransportError.tls(label, error)
          : ErrorUtils.toTransportError(error, label);
        reject(transportError);
      };

      socket.once('error', fail);
      socket.once(readyEvent, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('error', fail);

        socket.setNoDelay(true);
        socket.setKeepAlive(true, options.keepAliveMs ?? DEFAULT_KEEPALIVE_MS);

        logger.info({ endpoint: label, tls: endpoint.useTls }, 'Connected');
        resolve(new TcpConnection(endpoint, socket, handlers, logger));
      });
    });
  }

  isOpen(): boolean {
    return this.open;
  }

  send(frame: string): void {
    if (!this.open) {
      throw TransportError.closed(endpointLabel(this.endpoint));
    }
    this.socket.write(frame);
  }

  async close(): Promise<void> {
    this.open = false;
    this.socket.destroy();
    await this.closed;
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) continue;
      this.handlers.onFrame(line);
    }
  }

  private handleTermination(error?: Error): void {
    if (!this.open) return;
    this.open = false;

    const label = endpointLabel(this.endpoint);
    if (error) {
      this.logger.warn({ endpoint: label, err: error }, 'Connection lost');
    } else {
      this.logger.info({ endpoint: label }, 'Connection closed by server');
    }
    this.handlers.onClose(error ? ErrorUtils.toTransportError(error, label) : TransportError.closed(label));
  }
}

/**
 * Connection factory for the failover controller
 */
export function createTcpConnectionFactory(options: TcpConnectionOptions = {}): ConnectionFactory {
  return (endpoint, handlers) => TcpConnection.open(endpoint, handlers, options);
}
