/**
 * Event Bus - Internal pub/sub for state-change notifications
 */

export type EventHandler<T> = (data: T) => void;

export type AnyEventHandler<E> = (event: keyof E, data: E[keyof E]) => void;

export interface IEventBus<E> {
  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void;
  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void;
  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void;
  emit<K extends keyof E>(event: K, data: E[K]): void;
  removeAllListeners(event?: keyof E): void;
}

interface Subscription<T> {
  handler(data: T): void;
  once: boolean;
}

/**
 * Typed event bus. `E` maps each event name to its payload type.
 */
export class EventBus<E> implements IEventBus<E> {
  private handlers = new Map<keyof E, Array<Subscription<E[keyof E]>>>();
  private anyHandlers = new Set<AnyEventHandler<E>>();

  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void {
    this.subscribe(event, { handler, once: false });
    return () => this.off(event, handler);
  }

  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void {
    this.subscribe(event, { handler, once: true });
    return () => this.off(event, handler);
  }

  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void {
    const subscriptions = this.subscriptionsFor(event);
    const remaining = subscriptions.filter((s) => s.handler !== handler);
    if (remaining.length > 0) {
      this.setSubscriptions(event, remaining);
    } else {
      this.handlers.delete(event);
    }
  }

  emit<K extends keyof E>(event: K, data: E[K]): void {
    const subscriptions = this.subscriptionsFor(event);
    if (subscriptions.some((s) => s.once)) {
      this.setSubscriptions(event, subscriptions.filter((s) => !s.once));
    }

    for (const { handler } of subscriptions) {
      try {
        handler(data);
      } catch (error) {
        console.error(`[EventBus] Error in handler for '${String(event)}':`, error);
      }
    }

    // Notify any handlers
    for (const handler of this.anyHandlers) {
      try {
        handler(event, data);
      } catch (error) {
        console.error(`[EventBus] Error in any handler for '${String(event)}':`, error);
      }
    }
  }

  /**
   * Subscribe to all events
   */
  onAny(handler: AnyEventHandler<E>): () => void {
    this.anyHandlers.add(handler);
    return () => {
      this.anyHandlers.delete(handler);
    };
  }

  removeAllListeners(event?: keyof E): void {
    if (event !== undefined) {
      this.handlers.delete(event);
    } else {
      this.handlers.clear();
      this.anyHandlers.clear();
    }
  }

  listenerCount(event: keyof E): number {
    return this.handlers.get(event)?.length ?? 0;
  }

  private subscribe<K extends keyof E>(event: K, subscription: Subscription<E[K]>): void {
    this.setSubscriptions(event, [...this.subscriptionsFor(event), subscription]);
  }

  private subscriptionsFor<K extends keyof E>(event: K): Array<Subscription<E[K]>> {
    return this.handlers.get(event) ?? [];
  }

  private setSubscriptions<K extends keyof E>(event: K, subscriptions: Array<Subscription<E[K]>>): void {
    this.handlers.set(event, subscriptions);
  }
}
