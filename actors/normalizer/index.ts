export { normalizeListings } from './normalize';
export {
  cleanLocation,
  LISTING_PATTERNS,
  parsePrice,
  parseRating,
} from './parsers';
