/**
 * TypedEventBus — typed internal pub/sub used as the per-invocation sink.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - EventBus cannot depend on any module.
 */

import { EventEmitter } from 'node:events'
import type { StoryloomEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `StoryloomEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof StoryloomEvents>(event: K, payload: StoryloomEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof StoryloomEvents>(
    event: K,
    handler: (payload: StoryloomEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof StoryloomEvents>(
    event: K,
    handler: (payload: StoryloomEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('story:moved', ({ storyId, to }) => {
 *   console.log(`${storyId} is now in ${to}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof StoryloomEvents>(event: K, payload: StoryloomEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof StoryloomEvents>(
    event: K,
    handler: (payload: StoryloomEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof StoryloomEvents>(
    event: K,
    handler: (payload: StoryloomEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
