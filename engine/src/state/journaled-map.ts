import { StateJournal } from './state-journal';

/** Map whose writes are reversed when the surrounding journal frame fails. */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly journal: StateJournal) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    this.journal.record(this.restorer(key));
    this.entries.set(key, value);
  }

  delete(key: K): void {
    if (!this.entries.has(key)) {
      return;
    }
    this.journal.record(this.restorer(key));
    this.entries.delete(key);
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  get size(): number {
    return this.entries.size;
  }

  private restorer(key: K): () => void {
    if (this.entries.has(key)) {
      const previous = this.entries.get(key);
      return () => {
        if (previous !== undefined) {
          this.entries.set(key, previous);
        }
      };
    }
    return () => {
      this.entries.delete(key);
    };
  }
}
