import type { ListingSink } from '../../storage';

/** Keeps every saved batch in memory; set `failWith` to make saves throw */
export class MemorySink<T> implements ListingSink<T> {
  readonly name = 'memory';
  readonly batches: T[][] = [];
  failWith?: Error;
  closed = false;

  async save(listings: readonly T[]): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.batches.push([...listings]);
    return listings.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
