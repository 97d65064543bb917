import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TheOddsApiProvider } from '../TheOddsApiProvider';
import { AuthError, NetworkError, QuotaExceeded } from '../../errors';
import {
  FIXED_NOW,
  TEST_API_KEY,
  TEST_MARKET,
  TEST_SPORT,
  eventFixture,
  jsonResponse,
  oddsApiStub,
  twoBookPointsPayload,
} from '../../__tests__/fixtures';

function createProvider(): TheOddsApiProvider {
  return new TheOddsApiProvider({
    apiKey: TEST_API_KEY,
    baseUrl: 'https://odds.test/v4',
    now: () => FIXED_NOW,
  });
}

function calledUrl(fetchMock: { mock: { calls: unknown[][] } }, call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

describe('TheOddsApiProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects an empty API key before any request', () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch');

    expect(() => new TheOddsApiProvider({ apiKey: '  ' })).toThrow(AuthError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  describe('fetchEvents()', () => {
    it('maps the events list and sends the key as a query parameter', async () => {
      const fetchMock = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(jsonResponse([eventFixture()]));

      const events = await createProvider().fetchEvents(TEST_SPORT);

      expect(events).toEqual([
        {
          id: 'evt-1',
          homeTeam: 'Home Team',
          awayTeam: 'Away Team',
          commenceTime: '2026-10-19T00:20:00Z',
          sportKey: TEST_SPORT,
        },
      ]);
      const url = calledUrl(fetchMock);
      expect(url.pathname).toBe('/v4/sports/basketball_nba/events');
      expect(url.searchParams.get('apiKey')).toBe(TEST_API_KEY);
    });

    it('fails with NetworkError on an unexpected body', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ events: [] }));

      await expect(createProvider().fetchEvents(TEST_SPORT)).rejects.toBeInstanceOf(
        NetworkError
      );
    });
  });

  describe('fetchEventOdds()', () => {
    it('requests every market in one call and returns the raw body', async () => {
      const payload = twoBookPointsPayload();
      const fetchMock = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(jsonResponse(payload));

      const result = await createProvider().fetchEventOdds(TEST_SPORT, 'evt-1', {
        markets: [TEST_MARKET, 'player_assists'],
        regions: 'us',
        bookmakers: ['draftkings', 'fanduel'],
      });

      expect(result).toEqual(payload);
      const url = calledUrl(fetchMock);
      expect(url.pathname).toBe('/v4/sports/basketball_nba/events/evt-1/odds');
      expect(url.searchParams.get('markets')).toBe('player_points,player_assists');
      expect(url.searchParams.get('regions')).toBe('us');
      expect(url.searchParams.get('bookmakers')).toBe('draftkings,fanduel');
      expect(url.searchParams.get('oddsFormat')).toBe('american');
    });

    it('omits the bookmakers filter when none is given', async () => {
      const fetchMock = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(jsonResponse(twoBookPointsPayload()));

      await createProvider().fetchEventOdds(TEST_SPORT, 'evt-1', {
        markets: [TEST_MARKET],
      });

      expect(calledUrl(fetchMock).searchParams.has('bookmakers')).toBe(false);
    });
  });

  describe('fetchPlayerProps()', () => {
    it('skips events that already started and tracks quota usage', async () => {
      const upcoming = eventFixture();
      const started = eventFixture({
        id: 'evt-0',
        commence_time: '2026-10-18T11:00:00Z',
      });
      const fetchMock = vi
        .spyOn(globalThis, 'fetch')
        .mockImplementation(
          oddsApiStub([started, upcoming], {
            'evt-0': twoBookPointsPayload(started),
            'evt-1': twoBookPointsPayload(upcoming),
          })
        );
      const provider = createProvider();

      const result = await provider.fetchPlayerProps({
        sports: [TEST_SPORT],
        markets: [TEST_MARKET],
        region: 'us',
      });

      expect(result.events.map((event) => event.id)).toEqual(['evt-1']);
      expect(result.payloads).toEqual([twoBookPointsPayload(upcoming)]);
      expect(result.estimatedCost).toBe(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(provider.getUsage()).toEqual({
        requestsUsed: 1,
        requestsRemaining: 499,
        consumed: 1,
      });
    });
  });

  describe('estimateCost()', () => {
    it('charges one unit per market per region', () => {
      expect(createProvider().estimateCost(3, 2)).toBe(6);
    });

    it('sums the cost of every priced event', async () => {
      vi.spyOn(globalThis, 'fetch').mockImplementation(
        oddsApiStub([eventFixture(), eventFixture({ id: 'evt-2' })], {
          'evt-1': twoBookPointsPayload(),
          'evt-2': twoBookPointsPayload(eventFixture({ id: 'evt-2' })),
        })
      );

      const result = await createProvider().fetchPlayerProps({
        sports: [TEST_SPORT],
        markets: [TEST_MARKET, 'player_assists', 'player_rebounds'],
        region: 'us,us2',
      });

      expect(result.estimatedCost).toBe(12);
    });
  });

  describe('error mapping', () => {
    it('maps 401 to AuthError', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        jsonResponse({ message: 'API key is not valid', error_code: 'INVALID_KEY' }, 401)
      );

      const error = await createProvider()
        .fetchEvents(TEST_SPORT)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ statusCode: 401, code: 'auth_error' });
    });

    it('maps 403 to AuthError', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        jsonResponse({ message: 'Forbidden' }, 403)
      );

      await expect(createProvider().fetchEvents(TEST_SPORT)).rejects.toBeInstanceOf(
        AuthError
      );
    });

    it('maps an exhausted usage quota to QuotaExceeded', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        jsonResponse(
          {
            message: 'Usage quota has been reached.',
            error_code: 'OUT_OF_USAGE_CREDITS',
          },
          401,
          { 'x-requests-remaining': '0', 'x-requests-used': '500' }
        )
      );
      const provider = createProvider();

      await expect(provider.fetchEvents(TEST_SPORT)).rejects.toBeInstanceOf(
        QuotaExceeded
      );
      expect(provider.getUsage()).toEqual({
        requestsUsed: 500,
        requestsRemaining: 0,
        consumed: 0,
      });
    });

    it('maps 429 to QuotaExceeded', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        jsonResponse({ message: 'Too many requests' }, 429)
      );

      await expect(createProvider().fetchEvents(TEST_SPORT)).rejects.toBeInstanceOf(
        QuotaExceeded
      );
    });

    it('maps server errors to NetworkError with the status', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        new Response('upstream unavailable', { status: 503, statusText: 'Service Unavailable' })
      );

      const error = await createProvider()
        .fetchEvents(TEST_SPORT)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        statusCode: 503,
        message: 'HTTP error! Status: 503 - upstream unavailable',
      });
    });

    it('maps connection failures to NetworkError', async () => {
      vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

      await expect(createProvider().fetchEvents(TEST_SPORT)).rejects.toThrow(
        'Request failed: fetch failed'
      );
    });

    it('maps aborted requests to a timeout NetworkError', async () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      vi.spyOn(globalThis, 'fetch').mockRejectedValue(abort);

      const provider = new TheOddsApiProvider({ apiKey: TEST_API_KEY, timeout: 50 });

      await expect(provider.fetchEvents(TEST_SPORT)).rejects.toThrow(
        'Request timeout after 50ms'
      );
    });

    it('times out a body that stalls after the headers arrive', async () => {
      vi.spyOn(globalThis, 'fetch').mockImplementation(async (_input, init) => {
        const signal = init?.signal;
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('[{"id":'));
            signal?.addEventListener('abort', () => {
              const abort = new Error('This operation was aborted');
              abort.name = 'AbortError';
              controller.error(abort);
            });
          },
        });
        return new Response(body, { status: 200 });
      });

      const provider = new TheOddsApiProvider({ apiKey: TEST_API_KEY, timeout: 20 });

      await expect(provider.fetchEvents(TEST_SPORT)).rejects.toThrow(
        'Request timeout after 20ms'
      );
    });

    it('maps a non-JSON success body to NetworkError', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        new Response('<html>maintenance</html>', { status: 200 })
      );

      await expect(
        createProvider().fetchEventOdds(TEST_SPORT, 'evt-1', { markets: [TEST_MARKET] })
      ).rejects.toThrow('Response body is not valid JSON');
    });
  });
});
