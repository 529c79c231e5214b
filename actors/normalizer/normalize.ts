import {
  type CleanListing,
  listingFingerprint,
  type RawListing,
} from '../../shared/listing';
import { logger } from '../../shared/logger';
import { cleanLocation, parsePrice, parseRating } from './parsers';

const log = logger.child('normalizer');

function validDate(value: Date, fallback: () => Date): Date {
  return Number.isNaN(value.getTime()) ? fallback() : value;
}

/**
 * Turn the run's raw listings into clean ones. Listings without a title are
 * dropped; duplicates by fingerprint (on the cleaned location) keep their
 * first occurrence. Output order follows input order.
 */
export function normalizeListings(
  raw: readonly RawListing[],
  now: () => Date = () => new Date()
): CleanListing[] {
  const seen = new Set<string>();
  const clean: CleanListing[] = [];

  for (const listing of raw) {
    const title = listing.title.trim();
    if (!title) {
      log.debug('Skipping listing with empty title', { url: listing.url });
      continue;
    }

    const location = cleanLocation(listing.location);
    const fingerprint = listingFingerprint({
      url: listing.url,
      title,
      location,
    });
    if (seen.has(fingerprint)) {
      log.debug(`Skipping duplicate: ${title}`);
      continue;
    }
    seen.add(fingerprint);

    clean.push({
      platform: listing.platform.trim(),
      title,
      price: parsePrice(listing.rawPrice),
      location,
      rating: parseRating(listing.rawRating),
      url: listing.url.trim(),
      description: listing.description.trim(),
      scrapedAt: validDate(listing.fetchedAt, now),
    });
  }

  log.info(`Cleaned ${clean.length} listings from ${raw.length} raw records`);
  return clean;
}
