/**
 * Transport contracts
 *
 * The session only needs a connection that can write one framed message,
 * report inbound frames, and be closed.
 *
 * @module transport/types
 */

import type { ServerEndpoint } from '../types/index.js';

export interface ConnectionHandlers {
  /** One complete inbound frame (a single JSON line, newline stripped) */
  onFrame(frame: string): void;
  /** The transport is gone. `error` is absent for a clean close. */
  onClose(error?: Error): void;
}

export interface Connection {
  readonly endpoint: ServerEndpoint;
  isOpen(): boolean;
  /** Writes one frame. Throws TransportError when the connection is not open. */
  send(frame: string): void;
  /** Closes the transport and resolves once it is fully torn down */
  close(): Promise<void>;
}

export type ConnectionFactory = (
  endpoint: ServerEndpoint,
  handlers: ConnectionHandlers,
) => Promise<Connection>;
