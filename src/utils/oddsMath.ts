/**
 * Odds conversion helpers used for display
 */

/**
 * Convert American odds to implied probability (0..1)
 *
 * @param price American odds, e.g. -110 or +150
 * @returns Implied probability, or null for a zero price
 */
export function americanToImplied(price: number): number | null {
  if (price === 0 || !Number.isFinite(price)) {
    return null;
  }
  if (price > 0) {
    return 100 / (price + 100);
  }
  return Math.abs(price) / (Math.abs(price) + 100);
}

/**
 * Expected stat value implied by a two-sided line.
 *
 * The vig is removed by normalizing both implied probabilities, then the
 * over side is weighted at line + 0.5 and the under side at line - 0.5.
 */
export function projectedValue(
  overPrice: number,
  underPrice: number,
  line: number
): number | null {
  const overProb = americanToImplied(overPrice);
  const underProb = americanToImplied(underPrice);
  if (overProb === null || underProb === null) {
    return null;
  }

  const total = overProb + underProb;
  const normalizedOver = overProb / total;
  const normalizedUnder = underProb / total;
  return normalizedOver * (line + 0.5) + normalizedUnder * (line - 0.5);
}

/**
 * Human-readable market label: 'player_pass_yds' -> 'Pass Yds'
 */
export function formatMarketLabel(marketKey: string): string {
  const parts = marketKey.split('_').filter(Boolean);
  const words = parts.length > 1 ? parts.slice(1) : parts;
  return words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Format American odds with an explicit sign: 150 -> '+150'
 */
export function formatAmericanOdds(price: number | null): string {
  if (price === null) {
    return '';
  }
  return price > 0 ? `+${price}` : String(price);
}

/**
 * Signed fixed-point number: 1.5 -> '+1.5', blank for null
 */
export function formatSigned(value: number | null, digits: number, suffix = ''): string {
  if (value === null) {
    return '';
  }
  return `${value > 0 ? '+' : ''}${value.toFixed(digits)}${suffix}`;
}
