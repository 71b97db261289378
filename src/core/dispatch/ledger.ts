// src/core/dispatch/ledger.ts
// Bounded event ledger and counters for a dispatch domain

import type { DispatchEvent, DispatchEventTag, DispatchStats } from "./types";

export function emptyStats(): DispatchStats {
  return {
    hits: 0,
    misses: 0,
    resolverCalls: 0,
    installs: 0,
    answers: 0,
    declines: 0,
    reservedMisses: 0,
    timeouts: 0,
  };
}

/**
 * EventLedger: Keeps the most recent `capacity` events.
 */
export class EventLedger {
  private readonly log: DispatchEvent[] = [];

  constructor(
    private readonly capacity: number,
    private readonly onEvent?: (event: DispatchEvent) => void
  ) {}

  /**
   * Record an event.
   */
  record(event: DispatchEvent): void {
    if (this.capacity > 0) {
      this.log.push(event);
      if (this.log.length > this.capacity) {
        this.log.splice(0, this.log.length - this.capacity);
      }
    }
    this.onEvent?.(event);
  }

  /**
   * Get recent events, oldest first.
   */
  recent(limit: number = 100): DispatchEvent[] {
    return limit <= 0 ? [] : this.log.slice(-limit);
  }

  /**
   * Count retained events by type.
   */
  count(tag: DispatchEventTag): number {
    return this.log.filter(e => e.tag === tag).length;
  }
}
