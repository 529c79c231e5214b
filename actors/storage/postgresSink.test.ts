import { describe, expect, it } from 'vitest';
import { SinkWriteError } from '../../shared/errors';
import type { CleanListing } from '../../shared/listing';
import {
  CREATE_LISTINGS_SQL,
  INSERT_LISTING_SQL,
  PostgresSink,
  type SqlClient,
  type SqlPool,
  type SqlResult,
} from './postgresSink';

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/**
 * In-memory stand-in for a pg pool: inserts honour the unique url and a
 * single statement can be made to fail.
 */
class FakePool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  readonly urls = new Set<unknown>();
  released = 0;
  ended = false;
  failOn?: string;

  async connect(): Promise<SqlClient> {
    return {
      query: async (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  private async query(text: string, values?: unknown[]): Promise<SqlResult> {
    this.queries.push({ text, values });
    if (this.failOn && text.includes(this.failOn)) {
      throw new Error(`statement failed: ${this.failOn}`);
    }
    if (text === INSERT_LISTING_SQL && values) {
      const url = values[5];
      if (url !== null && this.urls.has(url)) {
        return { rowCount: 0 };
      }
      this.urls.add(url);
      return { rowCount: 1 };
    }
    return { rowCount: null };
  }
}

function listing(url: string): CleanListing {
  return {
    platform: 'Airbnb',
    title: `Listing ${url || 'without url'}`,
    price: 35.5,
    location: 'Bangkok',
    rating: 4.82,
    url,
    description: '',
    scrapedAt: new Date('2024-05-01T00:00:00.000Z'),
  };
}

describe('PostgresSink', () => {
  it('should create the schema once and insert inside a transaction', async () => {
    const pool = new FakePool();
    const sink = new PostgresSink(pool);

    await expect(
      sink.save([listing('https://example.test/rooms/1')])
    ).resolves.toBe(1);
    await sink.save([listing('https://example.test/rooms/2')]);

    expect(pool.queries.map((query) => query.text)).toEqual([
      CREATE_LISTINGS_SQL,
      'BEGIN',
      INSERT_LISTING_SQL,
      'COMMIT',
      'BEGIN',
      INSERT_LISTING_SQL,
      'COMMIT',
    ]);
    expect(pool.released).toBe(3);
  });

  it('should count only rows that were not already stored', async () => {
    const pool = new FakePool();
    const sink = new PostgresSink(pool);

    await sink.save([listing('https://example.test/rooms/1')]);
    const inserted = await sink.save([
      listing('https://example.test/rooms/1'),
      listing('https://example.test/rooms/2'),
    ]);

    expect(inserted).toBe(1);
  });

  it('should store a missing url as NULL', async () => {
    const pool = new FakePool();
    const sink = new PostgresSink(pool);

    await expect(sink.save([listing(''), listing('')])).resolves.toBe(2);

    const insert = pool.queries.find(
      (query) => query.text === INSERT_LISTING_SQL
    );
    expect(insert?.values).toEqual([
      'Airbnb',
      'Listing without url',
      35.5,
      'Bangkok',
      4.82,
      null,
      '',
      new Date('2024-05-01T00:00:00.000Z'),
    ]);
  });

  it('should roll back and raise SinkWriteError when an insert fails', async () => {
    const pool = new FakePool();
    pool.failOn = 'INSERT INTO';
    const sink = new PostgresSink(pool);

    await expect(
      sink.save([listing('https://example.test/rooms/1')])
    ).rejects.toBeInstanceOf(SinkWriteError);

    expect(pool.queries.map((query) => query.text).slice(-2)).toEqual([
      INSERT_LISTING_SQL,
      'ROLLBACK',
    ]);
    expect(pool.released).toBe(2);
  });

  it('should not touch the database for an empty batch', async () => {
    const pool = new FakePool();
    const sink = new PostgresSink(pool);

    await expect(sink.save([])).resolves.toBe(0);
    expect(pool.queries).toEqual([]);
  });

  it('should end the pool on close', async () => {
    const pool = new FakePool();
    await new PostgresSink(pool).close();
    expect(pool.ended).toBe(true);
  });
});
