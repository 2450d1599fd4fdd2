/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for link setup events.
 *
 * Every primitive implements IKnxEmitter. The event map ensures that
 * listeners receive correctly-typed payloads without runtime type checks.
 */

import type { KnxEventMap, KnxEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends KnxEventType> = (
  event: KnxEventMap[T]
) => void;

/**
 * @interface IKnxEmitter
 * @description Typed event emitter with compile-time checked event names
 * and payloads.
 */
export interface IKnxEmitter {
  /**
   * Register a listener for a specific event type.
   */
  on<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends KnxEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit<T extends KnxEventType>(event: KnxEventMap[T]): void;
}
