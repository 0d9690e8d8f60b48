// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for engine events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit an engine event, stamping it when the timestamp is blank. */
  emitEvent(event: EngineEvent): void {
    const stamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', stamped);
  }
}
