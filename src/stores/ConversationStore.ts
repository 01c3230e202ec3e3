/**
 * In-memory conversation history, one bounded window per session.
 * Sessions live for the lifetime of the process.
 */

import type { Exchange } from '../types/models.js';

/** Fixed-capacity FIFO: pushing onto a full buffer overwrites the oldest entry. */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  push(item: T): void {
    const end = (this.start + this.length) % this.capacity;
    this.slots[end] = item;
    if (this.length < this.capacity) {
      this.length++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.length = 0;
  }
}

let sessionCounter = 0;

export class ConversationStore {
  private readonly sessions = new Map<string, RingBuffer<Exchange>>();

  constructor(private readonly maxHistory: number = 2) {}

  newSessionId(): string {
    let id: string;
    do {
      sessionCounter += 1;
      id = `session_${sessionCounter}`;
    } while (this.sessions.has(id));
    this.sessions.set(id, new RingBuffer<Exchange>(this.maxHistory));
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  record(sessionId: string, query: string, answer: string): void {
    let history = this.sessions.get(sessionId);
    if (!history) {
      history = new RingBuffer<Exchange>(this.maxHistory);
      this.sessions.set(sessionId, history);
    }
    history.push(Object.freeze({ query, answer }));
  }

  /**
   * "User: …\nAssistant: …" lines for the retained exchanges, oldest first;
   * null when there is nothing to show.
   */
  historyText(sessionId: string): string | null {
    const exchanges = this.sessions.get(sessionId)?.toArray() ?? [];
    if (exchanges.length === 0) return null;

    return exchanges
      .map((exchange) => `User: ${exchange.query}\nAssistant: ${exchange.answer}`)
      .join('\n');
  }

  clear(sessionId: string): void {
    this.sessions.get(sessionId)?.clear();
  }
}
