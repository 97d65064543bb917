import type { PlayerPropRow } from '../config/types';

export const FIXED_NOW = new Date('2026-10-18T12:00:00.000Z');
export const SNAPSHOT_TIME = FIXED_NOW.toISOString();

export const TEST_API_KEY = 'test-api-key';
export const TEST_SPORT = 'basketball_nba';
export const TEST_MARKET = 'player_points';

export interface RawEvent {
  id: string;
  sport_key: string;
  sport_title: string;
  commence_time: string;
  home_team: string;
  away_team: string;
}

export function eventFixture(overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    id: 'evt-1',
    sport_key: TEST_SPORT,
    sport_title: 'NBA',
    commence_time: '2026-10-19T00:20:00Z',
    home_team: 'Home Team',
    away_team: 'Away Team',
    ...overrides,
  };
}

function pointsMarket(player: string, line: number, over: number, under: number) {
  return {
    key: TEST_MARKET,
    last_update: '2026-10-18T11:55:00Z',
    outcomes: [
      { name: 'Over', description: player, price: over, point: line },
      { name: 'Under', description: player, price: under, point: line },
    ],
  };
}

/**
 * Two bookmakers each quoting one player's points total at 24.5, -110/-110
 */
export function twoBookPointsPayload(event: RawEvent = eventFixture()) {
  return {
    ...event,
    bookmakers: [
      {
        key: 'draftkings',
        title: 'DraftKings',
        last_update: '2026-10-18T11:55:00Z',
        markets: [pointsMarket('Test Player', 24.5, -110, -110)],
      },
      {
        key: 'fanduel',
        title: 'FanDuel',
        last_update: '2026-10-18T11:56:00Z',
        markets: [pointsMarket('Test Player', 24.5, -110, -110)],
      },
    ],
  };
}

/**
 * The two-bookmaker payload plus a Pinnacle quote for the same player
 */
export function withPinnaclePayload(
  line: number,
  over: number,
  under: number,
  event: RawEvent = eventFixture()
) {
  const payload = twoBookPointsPayload(event);
  return {
    ...payload,
    bookmakers: [
      ...payload.bookmakers,
      {
        key: 'pinnacle',
        title: 'Pinnacle',
        last_update: '2026-10-18T11:57:00Z',
        markets: [pointsMarket('Test Player', line, over, under)],
      },
    ],
  };
}

export function expectedPointsRow(bookmaker: string): PlayerPropRow {
  return {
    eventId: 'evt-1',
    eventName: 'Away Team @ Home Team',
    sportKey: TEST_SPORT,
    commenceTime: '2026-10-19T00:20:00Z',
    playerName: 'Test Player',
    market: TEST_MARKET,
    bookmaker,
    line: 24.5,
    overPrice: -110,
    underPrice: -110,
    snapshotTime: SNAPSHOT_TIME,
  };
}

export function rowFixture(overrides: Partial<PlayerPropRow> = {}): PlayerPropRow {
  return { ...expectedPointsRow('DraftKings'), ...overrides };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

/**
 * Stand-in for The Odds API: serves the events list and one odds payload per
 * event id, reporting one quota unit per odds request.
 */
export function oddsApiStub(
  events: RawEvent[],
  payloads: Record<string, unknown>
): (input: string | URL | Request) => Promise<Response> {
  let used = 0;

  return async (input) => {
    const url = new URL(input instanceof Request ? input.url : String(input));

    if (url.pathname.endsWith('/events')) {
      return jsonResponse(events, 200, {
        'x-requests-used': String(used),
        'x-requests-remaining': String(500 - used),
        'x-requests-last': '0',
      });
    }

    const match = url.pathname.match(/\/events\/([^/]+)\/odds$/);
    if (match && match[1] in payloads) {
      used += 1;
      return jsonResponse(payloads[match[1]], 200, {
        'x-requests-used': String(used),
        'x-requests-remaining': String(500 - used),
        'x-requests-last': '1',
      });
    }

    return jsonResponse({ message: 'Not found' }, 404);
  };
}
