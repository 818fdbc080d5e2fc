import { WebhookHistoryEntry } from '../types';

export const DEFAULT_HISTORY_CAPACITY = 100;

/**
 * Fixed-capacity ring buffer of received webhook events. Once full, each new
 * entry overwrites the oldest one.
 */
export class WebhookHistory {
  private entries: (WebhookHistoryEntry | undefined)[];
  private next = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.entries = new Array<WebhookHistoryEntry | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  add(entry: WebhookHistoryEntry): void {
    this.entries[this.next] = entry;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /**
   * Entries from oldest to newest
   */
  toArray(): WebhookHistoryEntry[] {
    const start = (this.next - this.count + this.capacity) % this.capacity;
    const result: WebhookHistoryEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.entries[(start + i) % this.capacity];
      if (entry) result.push(entry);
    }
    return result;
  }

  latest(limit: number): WebhookHistoryEntry[] {
    if (limit <= 0) return [];
    return this.toArray().slice(-limit);
  }

  clear(): void {
    this.entries.fill(undefined);
    this.next = 0;
    this.count = 0;
  }
}
