// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Event Bus
// Fan-out channel for robot, link and program events (renderers, loggers, tests)
// ═══════════════════════════════════════════════════════════════════════════════

import { DeadLetterQueue } from './DeadLetterQueue';

export interface Event<T = unknown> {
  id: string;
  type: string;
  payload: T;
  source: string;
  timestamp: number;
}

export type EventHandler<T = unknown> = (event: Event<T>) => Promise<void> | void;

export interface Subscription {
  id: string;
  pattern: string;
  handler: EventHandler;
  once: boolean;
}

export class EventBus {
  private subscriptions: Map<string, Subscription[]> = new Map();
  private deadLetter = new DeadLetterQueue();
  private history: Event[] = [];
  private counter = 0;

  constructor(private readonly maxHistory = 1000) {}

  // ─────────────────────────────────────────────────────────────────────────────
  // Publishing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Dispatch synchronously to every matching subscriber. A handler that throws
   * or rejects lands in the dead letter queue; the emitter never sees it.
   */
  emit<T>(type: string, payload: T, source = 'system'): string {
    const event: Event<T> = {
      id: this.generateId(),
      type,
      payload,
      source,
      timestamp: Date.now(),
    };

    this.recordHistory(event);
    this.dispatch(event);

    return event.id;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Subscribing
  // ─────────────────────────────────────────────────────────────────────────────

  on<T>(pattern: string, handler: EventHandler<T>): () => void {
    return this.subscribe(pattern, handler, false);
  }

  once<T>(pattern: string, handler: EventHandler<T>): () => void {
    return this.subscribe(pattern, handler, true);
  }

  off(pattern: string, handler?: EventHandler): void {
    const subs = this.subscriptions.get(pattern);
    if (!subs) return;

    if (handler) {
      const idx = subs.findIndex(s => s.handler === handler);
      if (idx > -1) subs.splice(idx, 1);
      if (subs.length === 0) this.subscriptions.delete(pattern);
    } else {
      this.subscriptions.delete(pattern);
    }
  }

  private subscribe<T>(pattern: string, handler: EventHandler<T>, once: boolean): () => void {
    // Payload types are a contract between emitter and subscriber, checked at the call sites.
    const erased = handler as EventHandler;
    const subscription: Subscription = {
      id: this.generateId(),
      pattern,
      handler: erased,
      once,
    };

    const subs = this.subscriptions.get(pattern) ?? [];
    subs.push(subscription);
    this.subscriptions.set(pattern, subs);

    return () => this.off(pattern, erased);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Dispatch
  // ─────────────────────────────────────────────────────────────────────────────

  private dispatch(event: Event): void {
    for (const sub of this.getMatchingHandlers(event.type)) {
      if (sub.once) {
        this.off(sub.pattern, sub.handler);
      }

      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.deadLetter.add(event, toError(error)));
        }
      } catch (error) {
        this.deadLetter.add(event, toError(error));
      }
    }
  }

  private getMatchingHandlers(eventType: string): Subscription[] {
    const handlers: Subscription[] = [];

    for (const [pattern, subs] of this.subscriptions) {
      if (matchPattern(eventType, pattern)) {
        handlers.push(...subs);
      }
    }

    return handlers;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // History & Dead Letters
  // ─────────────────────────────────────────────────────────────────────────────

  private recordHistory(event: Event): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-Math.floor(this.maxHistory / 2));
    }
  }

  getHistory(filter?: { type?: string; since?: number; limit?: number }): Event[] {
    let events = [...this.history];
    const type = filter?.type;
    const since = filter?.since;
    if (type) events = events.filter(e => matchPattern(e.type, type));
    if (since !== undefined) events = events.filter(e => e.timestamp >= since);
    if (filter?.limit) events = events.slice(-filter.limit);
    return events;
  }

  getDeadLetters(): ReturnType<DeadLetterQueue['getAll']> {
    return this.deadLetter.getAll();
  }

  clearHistory(): void {
    this.history = [];
    this.deadLetter.clear();
  }

  getStats(): { subscriptions: number; deadLetters: number; historySize: number } {
    return {
      subscriptions: Array.from(this.subscriptions.values()).reduce((acc, subs) => acc + subs.length, 0),
      deadLetters: this.deadLetter.size(),
      historySize: this.history.length,
    };
  }

  private generateId(): string {
    this.counter++;
    return `${Date.now().toString(36)}_${this.counter.toString(36)}`;
  }
}

/** `*` matches everything, `robot:*` a prefix, `*:error` a suffix */
export function matchPattern(eventType: string, pattern: string): boolean {
  if (pattern === '*') return true;
  if (pattern === eventType) return true;
  if (pattern.endsWith(':*')) {
    return eventType.startsWith(pattern.slice(0, -1));
  }
  if (pattern.startsWith('*:')) {
    return eventType.endsWith(pattern.slice(1));
  }
  return false;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// Singleton export
export const eventBus = new EventBus();
