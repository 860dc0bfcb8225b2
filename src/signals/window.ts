// Bounded history of collected values; oldest evicted first.
export class HistoryWindow<T> {
  private items: T[] = [];
  readonly capacity: number;
  constructor(capacity = 10) { this.capacity = Math.max(1, Math.floor(capacity)); }

  push(v: T) {
    this.items.push(v);
    if (this.items.length > this.capacity) this.items.shift();
  }

  get size() { return this.items.length; }

  newestFirst(): T[] { return [...this.items].reverse(); }
  oldestFirst(): T[] { return [...this.items]; }

  clear() { this.items = []; }
}
