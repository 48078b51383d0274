// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { MigrationEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: MigrationEvent) => void;
}

/**
 * Typed event bus for migration progress events.
 * Wraps eventemitter3 with typed MigrationEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed event, filling in the timestamp if it is empty. */
  emitEvent(event: MigrationEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
