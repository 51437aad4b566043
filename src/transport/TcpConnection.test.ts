import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import net from 'node:net';
import { TcpConnection } from './TcpConnection.js';
import type { ConnectionHandlers } from './types.js';
import { TransportError } from '../utils/errors.js';
import { createSilentLogger } from '../utils/logger.js';

interface LocalServer {
  server: net.Server;
  port: number;
  sockets: net.Socket[];
  received: string[];
}

function startServer(): Promise<LocalServer> {
  const sockets: net.Socket[] = [];
  const received: string[] = [];
  const server = net.createServer((socket) => {
    sockets.push(socket);
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => received.push(chunk));
  });
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve({ server, port, sockets, received });
    });
  });
}

function stopServer(local: LocalServer): Promise<void> {
  for (const socket of local.sockets) {
    socket.destroy();
  }
  return new Promise((resolve) => local.server.close(() => resolve()));
}

function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  return vi.waitFor(() => {
    if (!predicate()) throw new Error('condition not met');
  }, { timeout: timeoutMs, interval: 5 });
}

describe('TcpConnection', () => {
  let local: LocalServer;
  let frames: string[];
  let onClose: Mock<(error?: Error) => void>;
  let handlers: ConnectionHandlers;
  const logger = createSilentLogger();

  beforeEach(async () => {
    local = await startServer();
    frames = [];
    onClose = vi.fn<(error?: Error) => void>();
    handlers = { onFrame: (frame) => frames.push(frame), onClose };
  });

  afterEach(async () => {
    await stopServer(local);
  });

  const open = () =>
    TcpConnection.open({ host: '127.0.0.1', port: local.port, useTls: false }, handlers, { logger });

  it('should write frames to the socket', async () => {
    const connection = await open();
    connection.send('{"id":0}\n');

    await waitFor(() => local.received.join('') === '{"id":0}\n');
    await connection.close();
  });

  it('should split inbound data into frames at newlines', async () => {
    const connection = await open();
    await waitFor(() => local.sockets.length === 1);
    const [socket] = local.sockets;

    socket?.write('{"id":1,"res');
    socket?.write('ult":1}\n{"id":2,"result":2}\n\n{"id":3');

    await waitFor(() => frames.length === 2);
    expect(frames).toEqual(['{"id":1,"result":1}', '{"id":2,"result":2}']);

    socket?.write(',"result":3}\n');
    await waitFor(() => frames.length === 3);
    expect(frames[2]).toBe('{"id":3,"result":3}');
    await connection.close();
  });

  it('should report a close initiated by the server', async () => {
    const connection = await open();
    await waitFor(() => local.sockets.length === 1);

    local.sockets[0]?.end();

    await waitFor(() => onClose.mock.calls.length === 1);
    const [error] = onClose.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(TransportError);
    expect(connection.isOpen()).toBe(false);
    expect(() => connection.send('{}\n')).toThrow(TransportError);
  });

  it('should not report a local close', async () => {
    const connection = await open();
    await connection.close();

    expect(connection.isOpen()).toBe(false);
    expect(onClose).not.toHaveBeenCalled();
  });

  it('should reject with a refused TransportError when nothing listens', async () => {
    const port = local.port;
    await stopServer(local);
    local = await startServer();

    await expect(
      TcpConnection.open({ host: '127.0.0.1', port, useTls: false }, handlers, { logger }),
    ).rejects.toMatchObject({ failure: 'REFUSED', retriable: true });
  });
});
