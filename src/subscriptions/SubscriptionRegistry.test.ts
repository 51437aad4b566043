import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { SubscriptionRegistry } from './SubscriptionRegistry.js';
import { EventBus } from './EventBus.js';
import { ClientEventType } from './types.js';
import type { BlockHeader, ClientEvent, ScripthashStatusCallback } from './types.js';
import { Session } from '../session/Session.js';
import type { Connection } from '../transport/types.js';
import { PushProtocolViolationError, TransportError } from '../utils/errors.js';
import { createSilentLogger } from '../utils/logger.js';
import type { ServerEndpoint } from '../types/index.js';

const SH_A = 'a'.repeat(64);
const SH_B = 'b'.repeat(64);
const STATUS = 'c'.repeat(64);

class RecordingConnection implements Connection {
  readonly sent: Array<{ id: number; method: string; params: unknown[] }> = [];
  constructor(readonly endpoint: ServerEndpoint) {}

  isOpen(): boolean {
    return true;
  }

  send(frame: string): void {
    this.sent.push(JSON.parse(frame));
  }

  async close(): Promise<void> {}
}

describe('SubscriptionRegistry', () => {
  const logger = createSilentLogger();
  let registry: SubscriptionRegistry;
  let events: ClientEvent[];
  let onFatal: Mock<(error: Error) => void>;

  const openSession = (host = 'a.example') => {
    const endpoint: ServerEndpoint = { host, port: 50002, useTls: true };
    const session = new Session(endpoint, {
      router: (message) => registry.dispatch(message),
      onFatal,
      logger,
    });
    const connection = new RecordingConnection(endpoint);
    session.attach(connection);
    const frame = (message: object) => session.handlers.onFrame(JSON.stringify({ jsonrpc: '2.0', ...message }));
    return { session, connection, frame };
  };

  beforeEach(() => {
    const eventBus = new EventBus(logger);
    events = [];
    eventBus.onAll((event) => events.push(event));
    onFatal = vi.fn<(error: Error) => void>();
    registry = new SubscriptionRegistry({ eventBus, logger });
  });

  describe('scripthash subscriptions', () => {
    it('should subscribe each scripthash and record it', () => {
      const { session, connection } = openSession();

      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a', [SH_B]: 'addr-b' }, vi.fn());

      expect(connection.sent).toEqual([
        { jsonrpc: '2.0', method: 'blockchain.scripthash.subscribe', params: [SH_A], id: 0 },
        { jsonrpc: '2.0', method: 'blockchain.scripthash.subscribe', params: [SH_B], id: 1 },
      ]);
      expect(registry.size).toBe(2);
      expect(registry.hasScripthash(SH_A)).toBe(true);
      expect(events[0]).toMatchObject({
        type: ClientEventType.SUBSCRIPTION_CREATED,
        data: { method: 'blockchain.scripthash.subscribe', count: 2 },
      });
    });

    it('should deliver the initial status under the external id', () => {
      const { session, frame } = openSession();
      const callback = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, callback);

      frame({ id: 0, result: STATUS });

      expect(callback).toHaveBeenCalledWith('addr-a', STATUS);
    });

    it('should deliver a null status for a scripthash without history', () => {
      const { session, frame } = openSession();
      const callback = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, callback);

      frame({ id: 0, result: null });

      expect(callback).toHaveBeenCalledWith('addr-a', null);
    });

    it('should route pushes to the callbacks of that scripthash only', () => {
      const { session, frame } = openSession();
      const first = vi.fn<ScripthashStatusCallback>();
      const second = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, first);
      registry.subscribeScripthashes(session, { [SH_B]: 'addr-b' }, second);

      frame({ method: 'blockchain.scripthash.subscribe', params: [SH_B, STATUS] });

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledWith('addr-b', STATUS);
      expect(events.at(-1)).toMatchObject({
        type: ClientEventType.SCRIPTHASH_STATUS_CHANGED,
        data: { scripthash: SH_B, externalId: 'addr-b', status: STATUS },
      });
    });

    it('should add callbacks for a scripthash subscribed twice without a second request', () => {
      const { session, connection, frame } = openSession();
      const first = vi.fn<ScripthashStatusCallback>();
      const second = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, first);
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, second);

      frame({ method: 'blockchain.scripthash.subscribe', params: [SH_A, STATUS] });

      expect(connection.sent).toHaveLength(1);
      expect(first).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledOnce();
      expect(registry.size).toBe(1);
    });

    it('should hand a later subscriber the last known status', () => {
      const { session, connection, frame } = openSession();
      const first = vi.fn<ScripthashStatusCallback>();
      const second = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, first);
      frame({ id: 0, result: STATUS });

      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a', [SH_B]: 'addr-b' }, second);

      expect(connection.sent.map((request) => request.params)).toEqual([[SH_A], [SH_B]]);
      expect(first).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledWith('addr-a', STATUS);
      const created = events.filter((event) => event.type === ClientEventType.SUBSCRIPTION_CREATED);
      expect(created.map((event) => event.data)).toEqual([
        { method: 'blockchain.scripthash.subscribe', count: 1 },
        { method: 'blockchain.scripthash.subscribe', count: 1 },
      ]);
    });

    it('should ignore pushes for unknown scripthashes and malformed statuses', () => {
      const { session, frame } = openSession();
      const callback = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, callback);

      frame({ method: 'blockchain.scripthash.subscribe', params: [SH_B, STATUS] });
      frame({ method: 'blockchain.scripthash.subscribe', params: [SH_A, 42] });

      expect(callback).not.toHaveBeenCalled();
      expect(onFatal).not.toHaveBeenCalled();
    });

    it('should keep delivering when a callback throws', () => {
      const { session, frame } = openSession();
      const after = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, () => {
        throw new Error('callback failed');
      });
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, after);

      frame({ method: 'blockchain.scripthash.subscribe', params: [SH_A, STATUS] });

      expect(after).toHaveBeenCalledWith('addr-a', STATUS);
      expect(onFatal).not.toHaveBeenCalled();
    });
  });

  describe('header subscriptions', () => {
    const tip: BlockHeader = { height: 840_000, hex: '00'.repeat(80) };

    it('should deliver the current tip from the subscription response', () => {
      const { session, connection, frame } = openSession();
      const callback = vi.fn<(header: BlockHeader) => void>();

      registry.subscribeHeaders(session, callback);
      frame({ id: 0, result: tip });

      expect(connection.sent[0]).toMatchObject({ method: 'blockchain.headers.subscribe', params: [] });
      expect(callback).toHaveBeenCalledWith(tip);
      expect(registry.size).toBe(1);
    });

    it('should broadcast header pushes to every header callback', () => {
      const { session, frame } = openSession();
      const first = vi.fn<(header: BlockHeader) => void>();
      const second = vi.fn<(header: BlockHeader) => void>();
      registry.subscribeHeaders(session, first);
      registry.subscribeHeaders(session, second);

      frame({ method: 'blockchain.headers.subscribe', params: [{ ...tip, height: 840_001 }] });

      expect(first).toHaveBeenCalledWith({ ...tip, height: 840_001 });
      expect(second).toHaveBeenCalledWith({ ...tip, height: 840_001 });
      expect(events.at(-1)).toMatchObject({
        type: ClientEventType.BLOCK_HEADER_RECEIVED,
        data: { height: 840_001 },
      });
    });

    it('should subscribe headers once and hand later callbacks the last tip', () => {
      const { session, connection, frame } = openSession();
      const first = vi.fn<(header: BlockHeader) => void>();
      const second = vi.fn<(header: BlockHeader) => void>();
      registry.subscribeHeaders(session, first);
      frame({ id: 0, result: tip });

      registry.subscribeHeaders(session, second);

      expect(connection.sent).toHaveLength(1);
      expect(first).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledWith(tip);
    });
  });

  describe('push errors', () => {
    it('should throw PushProtocolViolationError for a notification carrying an error', () => {
      expect(() =>
        registry.dispatch({
          kind: 'notification',
          method: 'blockchain.scripthash.subscribe',
          params: [],
          error: { code: -1, message: 'bad push' },
        }),
      ).toThrow(PushProtocolViolationError);
    });

    it('should throw for an unsolicited error response and drop a plain one', () => {
      expect(() =>
        registry.dispatch({ kind: 'response', id: 7, result: undefined, error: { code: -1, message: 'stray' } }),
      ).toThrow(PushProtocolViolationError);
      expect(() => registry.dispatch({ kind: 'response', id: 7, result: 'stray' })).not.toThrow();
    });

    it('should report an errored subscription response as fatal', () => {
      const { session, frame } = openSession();
      registry.subscribeScripthashes(session, { [SH_A]: 'addr-a' }, vi.fn());

      frame({ id: 0, error: { code: 1, message: 'subscription refused' } });

      expect(onFatal).toHaveBeenCalledOnce();
      expect(onFatal.mock.calls[0]?.[0]).toBeInstanceOf(PushProtocolViolationError);
    });

    it('should report an errored push through the session as fatal', () => {
      openSession().frame({ method: 'blockchain.headers.subscribe', params: [], error: { code: 2, message: 'x' } });
      expect(onFatal.mock.calls[0]?.[0]).toBeInstanceOf(PushProtocolViolationError);
    });
  });

  describe('resubscribe', () => {
    it('should replay every subscription on a new session', () => {
      const old = openSession('a.example');
      const callback = vi.fn<ScripthashStatusCallback>();
      registry.subscribeScripthashes(old.session, { [SH_A]: 'addr-a', [SH_B]: 'addr-b' }, callback);
      registry.subscribeHeaders(old.session, vi.fn());
      old.session.handlers.onClose(TransportError.reset('a.example:50002'));

      const fresh = openSession('b.example');
      expect(registry.resubscribe(fresh.session)).toBe(3);

      expect(fresh.connection.sent.map((request) => request.method)).toEqual([
        'blockchain.scripthash.subscribe',
        'blockchain.scripthash.subscribe',
        'blockchain.headers.subscribe',
      ]);
      expect(events.at(-1)).toMatchObject({ type: ClientEventType.SUBSCRIPTIONS_RESTORED, data: { count: 3 } });

      fresh.frame({ id: 1, result: STATUS });
      expect(callback).toHaveBeenCalledWith('addr-b', STATUS);
    });

    it('should send nothing when there are no subscriptions', () => {
      const { session, connection } = openSession();
      expect(registry.resubscribe(session)).toBe(0);
      expect(connection.sent).toEqual([]);
      expect(events).toEqual([]);
    });
  });
});
