/**
 * Core type definitions for the player props collector
 */

/**
 * Fully resolved runtime configuration, built once at startup
 */
export interface CollectorConfig {
  /** API key for The Odds API */
  apiKey: string;
  /** Sport keys to collect (e.g., 'americanfootball_nfl') */
  sports: readonly string[];
  /** Player-prop market keys requested for every event */
  markets: readonly string[];
  /** Bookmaker keys to restrict the response to */
  bookmakers: readonly string[];
  /** Region code (e.g., 'us') */
  region: string;
  /** Bookmaker used as the pricing reference (e.g., 'pinnacle') */
  referenceBookmaker: string;
  /** Directory receiving index.html, player_props.xlsx and odds.db */
  outputDir: string;
  /** Request timeout in milliseconds */
  requestTimeout: number;
}

/**
 * Event (game) data from provider
 */
export interface OddsEvent {
  /** Unique event ID from provider */
  id: string;
  /** Home team name */
  homeTeam: string;
  /** Away team name */
  awayTeam: string;
  /** Start time (ISO8601) */
  commenceTime: string;
  /** Sport key */
  sportKey: string;
}

/**
 * Single priced outcome within a market
 */
export interface MarketOutcome {
  /** 'Over', 'Under', 'Yes' or 'No' */
  name?: string;
  /** Player name for player-prop markets */
  description?: string;
  /** American odds */
  price?: number;
  /** Line value */
  point?: number;
}

/**
 * Bookmaker odds for a specific market
 */
export interface BookmakerMarket {
  /** Market key (e.g., 'player_pass_yds') */
  key?: string;
  /** Last update timestamp */
  lastUpdate?: string;
  outcomes: MarketOutcome[];
}

/**
 * Odds data from a single bookmaker
 */
export interface BookmakerOdds {
  /** Bookmaker key */
  key?: string;
  /** Bookmaker display name */
  title?: string;
  markets: BookmakerMarket[];
}

/**
 * Complete odds data for an event, as validated from the raw payload.
 * Fields stay optional: incomplete entries are filtered by the transformer.
 */
export interface EventOdds {
  id?: string;
  sportKey?: string;
  homeTeam?: string;
  awayTeam?: string;
  commenceTime?: string;
  bookmakers: BookmakerOdds[];
}

/**
 * Raw JSON body returned by the event odds endpoint
 */
export type RawOddsPayload = unknown;

/**
 * One flattened player prop quote from one bookmaker
 */
export interface PlayerPropRow {
  /** Event ID from provider */
  eventId: string;
  /** '<away> @ <home>' */
  eventName: string;
  /** Sport key */
  sportKey: string;
  /** Event start time (ISO8601) */
  commenceTime: string;
  playerName: string;
  /** Market key (e.g., 'player_rush_yds') */
  market: string;
  /** Bookmaker display name */
  bookmaker: string;
  /** Line value, null for yes/no markets */
  line: number | null;
  /** Over (or Yes) price in American odds */
  overPrice: number | null;
  /** Under (or No) price in American odds */
  underPrice: number | null;
  /** When this row's data was fetched (ISO8601), shared by the whole run */
  snapshotTime: string;
}

/**
 * Column order shared by every tabular sink
 */
export const PLAYER_PROP_COLUMNS = [
  'eventId',
  'eventName',
  'sportKey',
  'commenceTime',
  'playerName',
  'market',
  'bookmaker',
  'line',
  'overPrice',
  'underPrice',
  'snapshotTime',
] as const satisfies ReadonlyArray<keyof PlayerPropRow>;

/**
 * All rows captured by a single run
 */
export interface PropsSnapshot {
  /** Snapshot timestamp (ISO8601) */
  snapshotTime: string;
  rows: PlayerPropRow[];
  /**
   * Earliest stored reference-bookmaker rows for the props in this snapshot,
   * read before the snapshot is appended
   */
  baseline?: readonly PlayerPropRow[];
}

/**
 * API quota counters reported in response headers
 */
export interface ApiUsage {
  /** Requests used so far in the billing period */
  requestsUsed: number | null;
  /** Requests remaining in the billing period */
  requestsRemaining: number | null;
  /** Quota consumed by this process */
  consumed: number;
}

/**
 * Result of one collection run
 */
export interface CollectionSummary {
  snapshotTime: string;
  /** Events whose odds were fetched */
  eventsFetched: number;
  /** Rows written to every sink */
  rowCount: number;
  usage: ApiUsage;
  /** Quota units the odds requests were expected to cost */
  estimatedCost: number;
  /** Written file per sink name */
  outputs: Record<string, string>;
  durationMs: number;
}
