import type { CleanListing, RawListing } from '../../shared/listing';

/**
 * Destination for one batch of listings per run
 */
export interface ListingSink<T> {
  readonly name: string;
  /**
   * @returns number of listings actually stored
   * @throws SinkWriteError
   */
  save(listings: readonly T[]): Promise<number>;
  close(): Promise<void>;
}

/** Overwrites per run; failures do not stop the pipeline */
export type RawSink = ListingSink<RawListing>;

/** System of record, idempotent by URL; failures are fatal */
export type CleanSink = ListingSink<CleanListing>;
