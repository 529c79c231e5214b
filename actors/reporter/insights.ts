import type { CleanListing } from '../../shared/listing';
import { logger } from '../../shared/logger';

const log = logger.child('insights');

export const DEFAULT_TOP_RATED = 5;

export interface InsightReport {
  totalListings: number;
  listingsByPlatform: Map<string, number>;
  /** Price aggregates cover listings with a known price only */
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  mostExpensive: CleanListing | null;
  /** Rated listings, best first; ties keep input order */
  topRated: CleanListing[];
  listingsByLocation: Map<string, number>;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Aggregate the cleaned dataset once, after normalization
 */
export function generateInsights(
  listings: readonly CleanListing[],
  topN: number = DEFAULT_TOP_RATED
): InsightReport {
  const report: InsightReport = {
    totalListings: listings.length,
    listingsByPlatform: new Map(),
    averagePrice: 0,
    minPrice: 0,
    maxPrice: 0,
    mostExpensive: null,
    topRated: [],
    listingsByLocation: new Map(),
  };

  if (listings.length === 0) {
    log.warn('No listings to generate insights from');
    return report;
  }

  let priced = 0;
  let priceSum = 0;

  for (const listing of listings) {
    increment(report.listingsByPlatform, listing.platform);
    if (listing.location) {
      increment(report.listingsByLocation, listing.location);
    }

    if (listing.price > 0) {
      priced++;
      priceSum += listing.price;
      if (priced === 1 || listing.price < report.minPrice) {
        report.minPrice = listing.price;
      }
      if (listing.price > report.maxPrice) {
        report.maxPrice = listing.price;
        report.mostExpensive = listing;
      }
    }
  }

  report.averagePrice = priced > 0 ? priceSum / priced : 0;
  report.topRated = listings
    .filter((listing) => listing.rating > 0)
    .sort((a, b) => b.rating - a.rating)
    .slice(0, Math.max(0, topN));

  return report;
}
