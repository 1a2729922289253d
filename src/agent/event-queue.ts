/**
 * Event Queue
 * Inbound chat events waiting for the loop, in arrival order
 */

import type { Event } from '../types.js'

export class EventQueue {
  private events: Event[] = []

  push(event: Event): void {
    this.events.push(event)
  }

  /**
   * Take every queued event
   */
  pollBatch(): Event[] {
    const batch = this.events
    this.events = []
    return batch
  }

  size(): number {
    return this.events.length
  }
}
