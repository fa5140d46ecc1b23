/**
 * Synchronous pool notifications
 *
 * Listeners run in registration order after an operation commits. A listener
 * that throws cannot undo the committed operation; its error is logged and the
 * remaining listeners still run.
 */

import type { PoolEventMap, PoolEventName } from './types.js';
import { logger } from './utils/logger.js';

const log = logger.child('Events');

export type PoolEventListener<E extends PoolEventName> = (event: PoolEventMap[E]) => void;

type ListenerTable = {
  [E in PoolEventName]: Set<PoolEventListener<E>>;
};

export class PoolEvents {
  private readonly listeners: ListenerTable = {
    LiquidityAdded: new Set(),
    LiquidityRemoved: new Set(),
    Swap: new Set(),
  };

  /**
   * Register a listener. Returns a function that removes it.
   */
  on<E extends PoolEventName>(name: E, listener: PoolEventListener<E>): () => void {
    this.table(name).add(listener);
    return () => this.off(name, listener);
  }

  off<E extends PoolEventName>(name: E, listener: PoolEventListener<E>): void {
    this.table(name).delete(listener);
  }

  listenerCount(name: PoolEventName): number {
    return this.listeners[name].size;
  }

  emit<E extends PoolEventName>(name: E, event: PoolEventMap[E]): void {
    for (const listener of [...this.table(name)]) {
      try {
        listener(event);
      } catch (error) {
        log.error(`${name} listener failed`, error);
      }
    }
  }

  private table<E extends PoolEventName>(name: E): Set<PoolEventListener<E>> {
    return this.listeners[name];
  }
}
