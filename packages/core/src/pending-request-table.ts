/**
 * PendingRequestTable — owns in-flight records and hands out integer ids,
 * so nothing outside the broker ever holds a live record across an
 * asynchronous boundary. Response functions carry the id instead and look
 * the record up again when they fire.
 *
 * Ids start at 1 and only grow. Should the counter ever pass
 * Number.MAX_SAFE_INTEGER it wraps, skipping ids that are still live.
 */

const FIRST_ID = 1;

export class PendingRequestTable<T> {
  private entries = new Map<number, T>();
  private nextId: number;

  constructor(startId = FIRST_ID) {
    this.nextId = startId;
  }

  /**
   * Store a record and return its fresh id.
   */
  add(record: T): number {
    const id = this.issueId();
    this.entries.set(id, record);
    return id;
  }

  /**
   * Returns `undefined` for ids that were never issued or were removed.
   */
  lookup(id: number): T | undefined {
    return this.entries.get(id);
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  /**
   * Remove a record. Returns `false` if the id was not live.
   */
  remove(id: number): boolean {
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Empty the table and return what it held, in insertion order.
   */
  drain(): Array<[number, T]> {
    const snapshot = [...this.entries];
    this.entries.clear();
    return snapshot;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): IterableIterator<[number, T]> {
    return this.entries.entries();
  }

  private issueId(): number {
    let id = this.nextId;
    while (this.entries.has(id)) {
      id = id >= Number.MAX_SAFE_INTEGER ? FIRST_ID : id + 1;
    }
    this.nextId = id >= Number.MAX_SAFE_INTEGER ? FIRST_ID : id + 1;
    return id;
  }
}
