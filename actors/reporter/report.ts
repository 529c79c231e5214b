import { type Logger, logger } from '../../shared/logger';
import type { InsightReport } from './insights';

const WIDTH = 55;
const LABEL_WIDTH = 24;
const LOCATION_WIDTH = 25;
const TITLE_WIDTH = 35;

const BORDER = '═'.repeat(WIDTH);
const RULE = '─'.repeat(WIDTH);

export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  return `${chars.slice(0, max - 3).join('')}...`;
}

function center(text: string, width: number): string {
  const length = Array.from(text).length;
  if (length >= width) {
    return text;
  }
  const left = Math.floor((width - length) / 2);
  return `${' '.repeat(left)}${text}${' '.repeat(width - length - left)}`;
}

const money = (value: number) => `$${value.toFixed(2)}`;

const row = (label: string, value: string | number) =>
  `  ${label.padEnd(LABEL_WIDTH)}: ${value}`;

/**
 * Render the insight report as terminal lines
 */
export function formatInsightReport(report: InsightReport): string[] {
  const lines = [
    BORDER,
    center('VACATION RENTAL MARKET INSIGHTS', WIDTH),
    BORDER,
    '',
    ' OVERVIEW',
    RULE,
    row('Total Listings Scraped', report.totalListings),
  ];

  for (const [platform, count] of report.listingsByPlatform) {
    lines.push(row(`${platform} Listings`, count));
  }

  lines.push(
    row('Average Price/Night', money(report.averagePrice)),
    row('Minimum Price/Night', money(report.minPrice)),
    row('Maximum Price/Night', money(report.maxPrice))
  );

  const expensive = report.mostExpensive;
  if (expensive) {
    lines.push(
      '',
      ' MOST EXPENSIVE PROPERTY',
      RULE,
      `  Title    : ${expensive.title}`,
      `  Price    : ${money(expensive.price)}/night`,
      `  Location : ${expensive.location}`,
      `  URL      : ${expensive.url}`
    );
  }

  if (report.listingsByLocation.size > 0) {
    lines.push('', ' LISTINGS PER LOCATION', RULE);
    const byCount = [...report.listingsByLocation].sort((a, b) => b[1] - a[1]);
    for (const [location, count] of byCount) {
      lines.push(
        `  ${`${location}:`.padEnd(LOCATION_WIDTH)} ${String(count).padStart(3)}  ${'▓'.repeat(count)}`
      );
    }
  }

  if (report.topRated.length > 0) {
    lines.push(
      '',
      ` TOP ${report.topRated.length} HIGHEST RATED PROPERTIES`,
      RULE
    );
    report.topRated.forEach((listing, index) => {
      lines.push(
        `  ${index + 1}. ${truncate(listing.title, TITLE_WIDTH).padEnd(TITLE_WIDTH)} ${listing.rating.toFixed(2)}`
      );
    });
  }

  lines.push('', BORDER);
  return lines;
}

export function logInsightReport(
  report: InsightReport,
  target: Logger = logger
): void {
  target.info(`\n${formatInsightReport(report).join('\n')}\n`);
}
