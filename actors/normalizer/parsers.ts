// ================================================
// TEXT PATTERNS
// ================================================

export const LISTING_PATTERNS = {
  dollarAmount: /\$\s*(\d+(?:\.\d+)?)/,
  number: /(\d+(?:\.\d+)?)/,
  nights: /for\s+(\d+)\s+nights?/i,
  rating: /(?<![\d.])([0-5]\.\d{1,2})/,
} as const;

const LOCATION_PREFIX_SEPARATOR = ' in ';
const LOCATION_PREFIX_MAX_INDEX = 30;

// ================================================
// FIELD PARSERS
// ================================================

/**
 * Per-night price from card text such as "$71 for 2 nights" or "$1,250".
 * Unparsable text yields `0`.
 */
export function parsePrice(raw: string): number {
  if (!raw.trim()) {
    return 0;
  }

  const text = raw.replaceAll(',', '');
  const match =
    text.match(LISTING_PATTERNS.dollarAmount) ??
    text.match(LISTING_PATTERNS.number);
  if (!match?.[1]) {
    return 0;
  }

  const amount = Number.parseFloat(match[1]);
  if (Number.isNaN(amount)) {
    return 0;
  }

  const nights = text.match(LISTING_PATTERNS.nights);
  if (nights?.[1]) {
    const count = Number.parseInt(nights[1], 10);
    if (count > 0) {
      return amount / count;
    }
  }

  return amount;
}

/**
 * Rating from text such as "4.82 out of 5 average rating". Anything above
 * 5 or without a `d.dd` token yields `0`.
 */
export function parseRating(raw: string): number {
  const match = raw.match(LISTING_PATTERNS.rating);
  if (!match?.[1]) {
    return 0;
  }

  const value = Number.parseFloat(match[1]);
  if (Number.isNaN(value) || value > 5) {
    return 0;
  }
  return value;
}

/**
 * Strip a leading property-type phrase: "Condo in Bangkok" → "Bangkok".
 */
export function cleanLocation(location: string): string {
  const trimmed = location.trim();
  const index = trimmed.lastIndexOf(LOCATION_PREFIX_SEPARATOR);
  if (index !== -1 && index < LOCATION_PREFIX_MAX_INDEX) {
    return trimmed.slice(index + LOCATION_PREFIX_SEPARATOR.length).trim();
  }
  return trimmed;
}
