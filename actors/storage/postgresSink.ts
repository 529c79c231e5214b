import { Pool } from 'pg';
import { SinkWriteError } from '../../shared/errors';
import type { CleanListing } from '../../shared/listing';
import { logger } from '../../shared/logger';
import type { CleanSink } from './types';

const log = logger.child('postgres-sink');

// ================================================
// CONNECTION SEAM
// ================================================

export interface SqlResult {
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/** The subset of `pg.Pool` the sink needs */
export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

// ================================================
// SCHEMA
// ================================================

export const LISTINGS_TABLE = 'listings';

export const CREATE_LISTINGS_SQL = `
CREATE TABLE IF NOT EXISTS ${LISTINGS_TABLE} (
  id          SERIAL PRIMARY KEY,
  platform    VARCHAR(50)   NOT NULL,
  title       TEXT          NOT NULL,
  price       NUMERIC(10,2) DEFAULT 0,
  location    TEXT,
  rating      NUMERIC(4,2)  DEFAULT 0,
  url         TEXT UNIQUE,
  description TEXT,
  scraped_at  TIMESTAMP     NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_${LISTINGS_TABLE}_price    ON ${LISTINGS_TABLE} (price);
CREATE INDEX IF NOT EXISTS idx_${LISTINGS_TABLE}_location ON ${LISTINGS_TABLE} (location);
CREATE INDEX IF NOT EXISTS idx_${LISTINGS_TABLE}_platform ON ${LISTINGS_TABLE} (platform);
CREATE INDEX IF NOT EXISTS idx_${LISTINGS_TABLE}_rating   ON ${LISTINGS_TABLE} (rating);
`;

export const INSERT_LISTING_SQL = `
INSERT INTO ${LISTINGS_TABLE} (platform, title, price, location, rating, url, description, scraped_at)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
ON CONFLICT (url) DO NOTHING`;

export function listingValues(listing: CleanListing): unknown[] {
  return [
    listing.platform,
    listing.title,
    listing.price,
    listing.location,
    listing.rating,
    // NULLs never collide on the unique url
    listing.url || null,
    listing.description,
    listing.scrapedAt,
  ];
}

// ================================================
// SINK
// ================================================

/**
 * Clean-listing store. Each batch is inserted in one transaction; rows whose
 * URL already exists are skipped.
 */
export class PostgresSink implements CleanSink {
  readonly name = 'postgres';
  private readonly pool: SqlPool;
  private schemaReady = false;

  constructor(pool: SqlPool) {
    this.pool = pool;
  }

  static fromUrl(connectionString: string): PostgresSink {
    return new PostgresSink(
      new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5000,
        application_name: 'stay-harvester',
      })
    );
  }

  async ensureSchema(): Promise<void> {
    if (this.schemaReady) {
      return;
    }
    const client = await this.connect();
    try {
      await client.query(CREATE_LISTINGS_SQL);
      this.schemaReady = true;
      log.info(`Table '${LISTINGS_TABLE}' is ready`);
    } catch (error) {
      throw new SinkWriteError(`Failed to create table ${LISTINGS_TABLE}`, {
        cause: error,
      });
    } finally {
      client.release();
    }
  }

  async save(listings: readonly CleanListing[]): Promise<number> {
    if (listings.length === 0) {
      log.warn('No clean listings to insert');
      return 0;
    }

    await this.ensureSchema();
    const client = await this.connect();
    let inserted = 0;

    try {
      await client.query('BEGIN');
      for (const listing of listings) {
        const result = await client.query(
          INSERT_LISTING_SQL,
          listingValues(listing)
        );
        inserted += result.rowCount ?? 0;
      }
      await client.query('COMMIT');
    } catch (error) {
      await this.rollback(client);
      throw new SinkWriteError('Failed to insert clean listings', {
        cause: error,
      });
    } finally {
      client.release();
    }

    log.info(
      `Inserted ${inserted}/${listings.length} listings into PostgreSQL`
    );
    return inserted;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async connect(): Promise<SqlClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new SinkWriteError('Failed to connect to PostgreSQL', {
        cause: error,
      });
    }
  }

  private async rollback(client: SqlClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      log.error('Rollback failed:', error);
    }
  }
}
