/**
 * Listing as extracted from a result card. Every field except `fetchedAt`
 * is raw page text; `description` may be filled once by the detail enricher.
 */
export interface RawListing {
  readonly platform: string;
  readonly title: string;
  readonly rawPrice: string;
  readonly location: string;
  readonly rawRating: string;
  readonly url: string;
  description: string;
  readonly fetchedAt: Date;
}

/** Normalized listing ready for storage and reporting */
export interface CleanListing {
  readonly platform: string;
  readonly title: string;
  /** Price per night, `0` when unknown */
  readonly price: number;
  readonly location: string;
  /** Rating in [0, 5], `0` when unknown */
  readonly rating: number;
  readonly url: string;
  readonly description: string;
  readonly scrapedAt: Date;
}

/**
 * Dedup key for a listing: its URL, or `title|location` when the URL is
 * missing.
 */
export function listingFingerprint(listing: {
  url: string;
  title: string;
  location: string;
}): string {
  const url = listing.url.trim();
  if (url) {
    return url;
  }
  return `${listing.title.trim()}|${listing.location.trim()}`;
}
