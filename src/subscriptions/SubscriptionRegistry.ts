/**
 * Subscription Registry
 *
 * Append-only map from notification key to callbacks. Scripthash pushes
 * go to the callbacks of that scripthash, with the caller's external id;
 * header pushes go to every header callback. Subscription requests are
 * recorded so they can be replayed on a new session after failover.
 *
 * @module subscriptions/SubscriptionRegistry
 */

import type { Logger } from 'pino';
import type { Session } from '../session/Session.js';
import type { InboundMessage } from '../transport/JsonRpcCodec.js';
import type { RpcResult } from '../types/index.js';
import { PushProtocolViolationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { EventBus } from './EventBus.js';
import {
  BlockHeader,
  BlockHeaderCallback,
  BlockHeaderSchema,
  ClientEventType,
  HEADERS_SUBSCRIBE,
  ScripthashStatus,
  ScripthashStatusCallback,
  ScripthashStatusSchema,
  ScripthashStatusUpdate,
  SCRIPTHASH_SUBSCRIBE,
} from './types.js';

interface ScripthashEntry {
  externalId: string;
  callbacks: Set<ScripthashStatusCallback>;
  /** Last status seen; undefined until the first one arrives */
  status?: ScripthashStatus;
}

export interface SubscriptionRegistryOptions {
  eventBus: EventBus;
  logger?: Logger;
}

export class SubscriptionRegistry {
  private scripthashes = new Map<string, ScripthashEntry>();
  private headerCallbacks = new Set<BlockHeaderCallback>();
  private lastHeader: BlockHeader | null = null;
  private eventBus: EventBus;
  private logger: Logger;

  constructor(options: SubscriptionRegistryOptions) {
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? createLogger('subscriptions');
  }

  /** Number of subscribed scripthashes plus one if headers are subscribed */
  get size(): number {
    return this.scripthashes.size + (this.headerCallbacks.size > 0 ? 1 : 0);
  }

  hasScripthash(scripthash: string): boolean {
    return this.scripthashes.has(scripthash);
  }

  /**
   * Registers `callback` for each scripthash. Only scripthashes not yet
   * subscribed are sent on `session`; for the others the callback gets the
   * last known status, if any.
   * @param targets - scripthash to external id (usually the address)
   */
  subscribeScripthashes(
    session: Session,
    targets: Record<string, string>,
    callback: ScripthashStatusCallback,
  ): void {
    const added: string[] = [];
    const known: ScripthashEntry[] = [];
    for (const scripthash of Object.keys(targets)) {
      const externalId = targets[scripthash] ?? scripthash;
      const entry = this.scripthashes.get(scripthash);
      if (!entry) {
        this.scripthashes.set(scripthash, { externalId, callbacks: new Set([callback]) });
        added.push(scripthash);
        continue;
      }
      entry.externalId = externalId;
      if (!entry.callbacks.has(callback)) {
        entry.callbacks.add(callback);
        known.push(entry);
      }
    }

    if (added.length > 0) {
      this.eventBus.emit(ClientEventType.SUBSCRIPTION_CREATED, {
        method: SCRIPTHASH_SUBSCRIBE,
        count: added.length,
      });
    }
    for (const scripthash of added) {
      this.issueScripthash(session, scripthash);
    }
    for (const entry of known) {
      if (entry.status !== undefined) {
        this.notifyStatus(callback, entry.externalId, entry.status);
      }
    }
  }

  /**
   * Registers a header callback. The first one subscribes on `session`
   * and gets the current tip from the response; later ones get the last
   * header seen.
   */
  subscribeHeaders(session: Session, callback: BlockHeaderCallback): void {
    if (this.headerCallbacks.has(callback)) return;

    const first = this.headerCallbacks.size === 0;
    this.headerCallbacks.add(callback);
    if (first) {
      this.eventBus.emit(ClientEventType.SUBSCRIPTION_CREATED, { method: HEADERS_SUBSCRIBE, count: 1 });
      this.issueHeaders(session);
      return;
    }
    if (this.lastHeader) {
      this.notifyHeader(callback, this.lastHeader);
    }
  }

  /**
   * Replays every recorded subscription on a fresh session
   * @returns number of requests sent
   */
  resubscribe(session: Session): number {
    let sent = 0;
    for (const scripthash of this.scripthashes.keys()) {
      this.issueScripthash(session, scripthash);
      sent++;
    }
    if (this.headerCallbacks.size > 0) {
      this.issueHeaders(session);
      sent++;
    }

    if (sent > 0) {
      this.logger.info({ count: sent }, 'Subscriptions restored');
      this.eventBus.emit(ClientEventType.SUBSCRIPTIONS_RESTORED, { count: sent });
    }
    return sent;
  }

  /**
   * Routes an unsolicited inbound message
   * @throws PushProtocolViolationError if the message carries an error
   */
  dispatch(message: InboundMessage): void {
    if (message.kind === 'response') {
      if (message.error) {
        throw new PushProtocolViolationError(`response ${String(message.id)}`, message.error);
      }
      this.logger.warn({ id: message.id }, 'Dropping response for an id this session never issued');
      return;
    }

    if (message.error) {
      throw new PushProtocolViolationError(message.method, message.error);
    }

    switch (message.method) {
      case SCRIPTHASH_SUBSCRIBE: {
        const [scripthash, status] = message.params;
        if (typeof scripthash !== 'string') {
          this.logger.warn({ params: message.params }, 'Scripthash push without a scripthash');
          return;
        }
        this.deliverStatus(scripthash, status);
        return;
      }
      case HEADERS_SUBSCRIBE:
        this.deliverHeader(message.params[0]);
        return;
      default:
        this.logger.warn({ method: message.method }, 'Unknown notification');
    }
  }

  // ---- Private helpers ----

  private issueScripthash(session: Session, scripthash: string): void {
    session.send(SCRIPTHASH_SUBSCRIBE, [scripthash], (result) => {
      this.assertNoError(result);
      this.deliverStatus(scripthash, result.data);
    });
  }

  private issueHeaders(session: Session): void {
    session.send(HEADERS_SUBSCRIBE, [], (result) => {
      this.assertNoError(result);
      this.deliverHeader(result.data);
    });
  }

  private assertNoError(result: RpcResult): void {
    if (result.error) {
      throw new PushProtocolViolationError(result.method, result.error);
    }
  }

  private deliverStatus(scripthash: string, raw: unknown): void {
    const entry = this.scripthashes.get(scripthash);
    if (!entry) {
      this.logger.warn({ scripthash }, 'Status push for an unknown scripthash');
      return;
    }

    const parsed = ScripthashStatusSchema.safeParse(raw ?? null);
    if (!parsed.success) {
      this.logger.warn({ scripthash, status: raw }, 'Dropping malformed scripthash status');
      return;
    }
    const status: ScripthashStatus = parsed.data;
    entry.status = status;

    for (const callback of entry.callbacks) {
      this.notifyStatus(callback, entry.externalId, status);
    }

    const update: ScripthashStatusUpdate = { scripthash, externalId: entry.externalId, status };
    this.eventBus.emit(ClientEventType.SCRIPTHASH_STATUS_CHANGED, update);
  }

  private deliverHeader(raw: unknown): void {
    const parsed = BlockHeaderSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ header: raw }, 'Dropping malformed block header');
      return;
    }
    const header: BlockHeader = parsed.data;
    this.lastHeader = header;

    for (const callback of this.headerCallbacks) {
      this.notifyHeader(callback, header);
    }

    this.eventBus.emit(ClientEventType.BLOCK_HEADER_RECEIVED, header);
  }

  private notifyStatus(callback: ScripthashStatusCallback, externalId: string, status: ScripthashStatus): void {
    try {
      callback(externalId, status);
    } catch (error) {
      this.logger.error({ err: error, externalId }, 'Scripthash callback threw');
    }
  }

  private notifyHeader(callback: BlockHeaderCallback, header: BlockHeader): void {
    try {
      callback(header);
    } catch (error) {
      this.logger.error({ err: error, height: header.height }, 'Header callback threw');
    }
  }
}
