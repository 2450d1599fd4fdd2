/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * All primitives extend this to gain event capabilities.
 */

import type { IKnxEmitter, EventListener } from "../interfaces/event-emitter.js";
import type { UnixTimestamp } from "../types/branded.js";
import type { KnxEventMap, KnxEventType } from "../types/events.js";

/**
 * Concrete typed event emitter for link setup events.
 * Uses a Map of Sets for O(1) listener registration and removal.
 */
export class KnxEmitter implements IKnxEmitter {
  private readonly listeners = new Map<
    KnxEventType,
    Set<EventListener<KnxEventType>>
  >();

  on<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<KnxEventType>);
  }

  once<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<KnxEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends KnxEventType>(event: KnxEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }

  /**
   * Re-emit the given event types of `source` from this emitter until the
   * returned function is called.
   */
  protected forward(source: IKnxEmitter, eventTypes: readonly KnxEventType[]): () => void {
    const relay: EventListener<KnxEventType> = (event) => this.emit<KnxEventType>(event);
    for (const eventType of eventTypes) {
      source.on(eventType, relay);
    }
    return () => {
      for (const eventType of eventTypes) {
        source.off(eventType, relay);
      }
    };
  }
}

/** Current time in Unix seconds. */
export function timestamp(): UnixTimestamp {
  return Math.floor(Date.now() / 1000) as UnixTimestamp;
}
