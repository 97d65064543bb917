/**
 * Default sports, markets and bookmakers collected on every run
 */

export const DEFAULT_SPORTS: readonly string[] = ['americanfootball_nfl'];

export const DEFAULT_REGION = 'us';

/**
 * Sharp book every other bookmaker is compared against
 */
export const DEFAULT_REFERENCE_BOOKMAKER = 'pinnacle';

/**
 * NFL player-prop markets
 * Reference: https://the-odds-api.com/sports-odds-data/betting-markets.html
 */
export const DEFAULT_MARKETS: readonly string[] = [
  'player_anytime_td',
  'player_pass_tds',
  'player_pass_yds',
  'player_pass_completions',
  'player_pass_attempts',
  'player_pass_interceptions',
  'player_rush_yds',
  'player_rush_attempts',
  'player_receptions',
  'player_reception_yds',
  'player_kicking_points',
];

export const DEFAULT_BOOKMAKERS: readonly string[] = [
  'fanduel',
  'draftkings',
  'espnbet',
  'williamhill_us',
  'betmgm',
  'betrivers',
  'hardrockbet',
  'pinnacle',
];

/**
 * Output file names, relative to the configured output directory
 */
export const OUTPUT_FILES = {
  html: 'index.html',
  spreadsheet: 'player_props.xlsx',
  database: 'odds.db',
  lock: '.collector.lock',
} as const;
