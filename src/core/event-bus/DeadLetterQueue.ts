// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Dead Letter Queue
// Events whose subscribers failed, kept for inspection
// ═══════════════════════════════════════════════════════════════════════════════

import type { Event } from './EventBus';

export interface DeadLetter {
  event: Event;
  error: Error;
  failedAt: number;
  failures: number;
}

export class DeadLetterQueue {
  private letters: Map<string, DeadLetter> = new Map();

  constructor(private readonly maxSize = 100) {}

  add(event: Event, error: Error): void {
    const existing = this.letters.get(event.id);

    if (existing) {
      existing.failures++;
      existing.error = error;
    } else {
      this.letters.set(event.id, { event, error, failedAt: Date.now(), failures: 1 });
    }

    this.prune();
  }

  getAll(): DeadLetter[] {
    return Array.from(this.letters.values());
  }

  size(): number {
    return this.letters.size;
  }

  clear(): void {
    this.letters.clear();
  }

  // Map keeps insertion order, so the oldest letters come first.
  private prune(): void {
    for (const id of this.letters.keys()) {
      if (this.letters.size <= this.maxSize) return;
      this.letters.delete(id);
    }
  }
}
