/**
 * apkman Engine — Keyed Event Bus
 *
 * A typed publish/subscribe channel where every event belongs to one key
 * (an artifact or expansion-file identity). Download gateways and
 * installers publish on a bus; the orchestrator subscribes per identity
 * and disposes the subscription on every terminal transition.
 */

import type { Subscription } from "./types";
import type { Logger } from "./utils/logger";

export type KeyedListener<E> = (event: E, key: string) => void;

export class KeyedEventBus<E extends { type: string }> {
  private listeners = new Map<string, Set<KeyedListener<E>>>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  subscribe(key: string, listener: KeyedListener<E>): Subscription {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    set.add(listener);

    let disposed = false;
    return {
      dispose: () => {
        if (disposed) return;
        disposed = true;
        const current = this.listeners.get(key);
        if (!current) return;
        current.delete(listener);
        if (current.size === 0) this.listeners.delete(key);
      },
    };
  }

  /**
   * Deliver an event to every listener of `key`, in subscription order.
   * A throwing listener is logged; the others still receive the event.
   */
  publish(key: string, event: E): void {
    const set = this.listeners.get(key);
    if (!set) return;

    // Copy: listeners commonly dispose themselves while handling
    for (const listener of [...set]) {
      try {
        listener(event, key);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger?.error(
          { key, event: event.type, error: message },
          "Event listener failed",
        );
      }
    }
  }

  listenerCount(key: string): number {
    return this.listeners.get(key)?.size ?? 0;
  }
}
