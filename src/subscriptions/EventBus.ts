/**
 * EventBus for client events
 *
 * Lifecycle transitions and server pushes are emitted here so consumers
 * are decoupled from the socket's data handler.
 *
 * @module subscriptions/EventBus
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import {
  ClientEvent,
  ClientEventType,
  EventListener,
} from './types.js';

export class EventBus {
  private listeners = new Map<ClientEventType, Set<EventListener>>();
  private allListeners = new Set<EventListener>();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('events');
  }

  on(type: ClientEventType, listener: EventListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  onAll(listener: EventListener): () => void {
    this.allListeners.add(listener);
    return () => {
      this.allListeners.delete(listener);
    };
  }

  emit<T>(type: ClientEventType, data: T): void {
    const event: ClientEvent<T> = {
      type,
      timestamp: new Date(),
      data,
    };

    const listeners = this.listeners.get(type);
    if (listeners) {
      for (const listener of listeners) {
        this.deliver(listener, event);
      }
    }

    for (const listener of this.allListeners) {
      this.deliver(listener, event);
    }
  }

  removeAllListeners(): void {
    this.listeners.clear();
    this.allListeners.clear();
  }

  // A throwing listener must not stop propagation to the others
  private deliver(listener: EventListener, event: ClientEvent): void {
    try {
      listener(event);
    } catch (error) {
      this.logger.error({ err: error, eventType: event.type }, 'Event listener threw');
    }
  }
}
