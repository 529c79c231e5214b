export {
  type JsonFileKind,
  JsonFileSink,
  type JsonFileSinkOptions,
} from './jsonFileSink';
export {
  CREATE_LISTINGS_SQL,
  INSERT_LISTING_SQL,
  LISTINGS_TABLE,
  listingValues,
  PostgresSink,
  type SqlClient,
  type SqlPool,
  type SqlResult,
} from './postgresSink';
export type { CleanSink, ListingSink, RawSink } from './types';
