export const DEFAULT_HISTORY_SIZE = 3;

/**
 * Bounded FIFO of a player's recent messages. Oldest entries are evicted first.
 */
export class ConversationHistory {
  readonly capacity: number;
  private readonly entries: string[] = [];

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  push(text: string): void {
    this.entries.push(text);
    while (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Copy of the entries, oldest first
   */
  toArray(): string[] {
    return [...this.entries];
  }
}
