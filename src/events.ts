/**
 * Calendar notifications (season-changed, day-advanced, event-started,
 * event-ended). Publishing is synchronous; a throwing or rejecting handler
 * is logged and never reaches the clock that published.
 */

import type { BusEvent } from './types.ts';

type BusEventKind = BusEvent['kind'];

type Handler<K extends BusEventKind> = (event: Extract<BusEvent, { kind: K }>) => void | Promise<void>;

type AnyHandler = (event: BusEvent) => void | Promise<void>;

export class EventBus {
  private handlers = new Map<BusEventKind, Set<AnyHandler>>();
  private listeners = new Set<AnyHandler>();

  subscribe<K extends BusEventKind>(kind: K, handler: Handler<K>): () => void {
    const set = this.handlers.get(kind) ?? new Set<AnyHandler>();
    const wrapped: AnyHandler = (event) => {
      if (event.kind !== kind) return;
      return handler(event as Extract<BusEvent, { kind: K }>);
    };
    set.add(wrapped);
    this.handlers.set(kind, set);
    return () => {
      this.handlers.get(kind)?.delete(wrapped);
    };
  }

  /** Receives every notification after the handlers subscribed to its kind. */
  subscribeAll(handler: AnyHandler): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  publish(event: BusEvent): void {
    const targeted = this.handlers.get(event.kind) ?? [];
    for (const handler of [...targeted, ...this.listeners]) {
      this.deliver(handler, event);
    }
  }

  clear(): void {
    this.handlers.clear();
    this.listeners.clear();
  }

  private deliver(handler: AnyHandler, event: BusEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        // Fire and forget async handlers
        result.catch(error => console.error(`Async error in event handler for ${event.kind}:`, error));
      }
    } catch (error) {
      console.error(`Error in event handler for ${event.kind}:`, error);
    }
  }
}
