/**
 * The Odds API provider implementation
 * Documentation: https://the-odds-api.com/liveapi/guides/v4/
 */

import type { ApiUsage, OddsEvent, RawOddsPayload } from '../config/types';
import { AuthError, NetworkError, QuotaExceeded } from '../errors';
import { apiErrorSchema, parseEventsResponse } from './schemas';

export interface TheOddsApiConfig {
  /** API key for The Odds API */
  apiKey: string;
  /** Base URL for the API (defaults to production) */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Clock used to skip events that already started */
  now?: () => Date;
}

export interface EventOddsOptions {
  /** Market keys, sent comma-separated */
  markets: readonly string[];
  /** Region code */
  regions?: string;
  /** Restrict to these bookmaker keys */
  bookmakers?: readonly string[];
  /** 'american' or 'decimal' */
  oddsFormat?: 'american' | 'decimal';
}

export interface PlayerPropsRequest {
  sports: readonly string[];
  markets: readonly string[];
  region: string;
  bookmakers?: readonly string[];
}

export interface PlayerPropsResult {
  /** Events that were priced */
  events: OddsEvent[];
  /** One raw odds payload per event, same order as events */
  payloads: RawOddsPayload[];
  /** Quota units the odds requests were expected to cost */
  estimatedCost: number;
}

const QUOTA_ERROR_CODES = new Set(['OUT_OF_USAGE_CREDITS', 'EXCEEDED_FREQ_LIMIT']);

export class TheOddsApiProvider {
  private apiKey: string;
  private baseUrl: string;
  private timeout: number;
  private now: () => Date;
  private usage: ApiUsage = {
    requestsUsed: null,
    requestsRemaining: null,
    consumed: 0,
  };

  constructor(config: TheOddsApiConfig) {
    if (!config.apiKey || !config.apiKey.trim()) {
      throw new AuthError('API key for The Odds API is required');
    }

    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl || 'https://api.the-odds-api.com/v4';
    this.timeout = config.timeout || 30000;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * List events for a sport (free, does not count against the quota)
   */
  async fetchEvents(sportKey: string): Promise<OddsEvent[]> {
    const url = this.buildUrl(`/sports/${sportKey}/events`, {
      dateFormat: 'iso',
    });

    const response = await this.makeRequest(url);
    const events = parseEventsResponse(response);
    if (!events) {
      throw new NetworkError(`Unexpected events response for ${sportKey}`);
    }
    return events;
  }

  /**
   * Fetch odds for every requested market of one event.
   * The body is returned untouched for the transformer.
   */
  async fetchEventOdds(
    sportKey: string,
    eventId: string,
    options: EventOddsOptions
  ): Promise<RawOddsPayload> {
    const params: Record<string, string> = {
      regions: options.regions ?? 'us',
      markets: options.markets.join(','),
      oddsFormat: options.oddsFormat ?? 'american',
      dateFormat: 'iso',
    };
    if (options.bookmakers && options.bookmakers.length > 0) {
      params.bookmakers = options.bookmakers.join(',');
    }

    const url = this.buildUrl(
      `/sports/${sportKey}/events/${eventId}/odds`,
      params
    );

    return this.makeRequest(url);
  }

  /**
   * Discover upcoming events for each sport and fetch their player props.
   * Events that already started are skipped.
   */
  async fetchPlayerProps(request: PlayerPropsRequest): Promise<PlayerPropsResult> {
    const events: OddsEvent[] = [];
    const payloads: RawOddsPayload[] = [];
    const now = this.now().getTime();
    const costPerEvent = this.estimateCost(
      request.markets.length,
      request.region.split(',').filter((region) => region.trim()).length
    );
    let estimatedCost = 0;

    for (const sportKey of request.sports) {
      console.log(`\n  🔍 Discovering events for ${sportKey}...`);
      const discovered = await this.fetchEvents(sportKey);
      const upcoming = discovered.filter(
        (event) => new Date(event.commenceTime).getTime() > now
      );
      console.log(
        `     Found ${discovered.length} events (${upcoming.length} not yet started, ~${costPerEvent * upcoming.length} credits)`
      );

      for (const event of upcoming) {
        const payload = await this.fetchEventOdds(sportKey, event.id, {
          markets: request.markets,
          regions: request.region,
          bookmakers: request.bookmakers,
        });
        events.push(event);
        payloads.push(payload);
        estimatedCost += costPerEvent;
        console.log(`     📥 ${event.awayTeam} @ ${event.homeTeam}`);
      }
    }

    return { events, payloads, estimatedCost };
  }

  /**
   * Quota counters seen so far
   */
  getUsage(): ApiUsage {
    return { ...this.usage };
  }

  /**
   * Estimate quota cost of an event odds request: one per market per region
   */
  estimateCost(markets: number, regions: number): number {
    return markets * regions;
  }

  private buildUrl(pathname: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('apiKey', this.apiKey);
    return url.toString();
  }

  /**
   * Make HTTP request with error handling.
   * The timeout covers the body as well as the headers.
   */
  private async makeRequest(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
        });
      } catch (error) {
        throw this.toNetworkError(error, 'Request failed');
      }

      this.recordUsage(response.headers);

      if (!response.ok) {
        throw await this.toHttpError(response);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        throw this.toNetworkError(error, 'Failed to read response body');
      }

      try {
        return JSON.parse(body);
      } catch (error) {
        throw new NetworkError(
          'Response body is not valid JSON',
          response.status,
          error
        );
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toNetworkError(error: unknown, prefix: string): NetworkError {
    if (error instanceof Error && error.name === 'AbortError') {
      return new NetworkError(
        `Request timeout after ${this.timeout}ms`,
        undefined,
        error
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new NetworkError(`${prefix}: ${reason}`, undefined, error);
  }

  private recordUsage(headers: Headers): void {
    const used = parseHeaderNumber(headers.get('x-requests-used'));
    const remaining = parseHeaderNumber(headers.get('x-requests-remaining'));
    const last = parseHeaderNumber(headers.get('x-requests-last'));

    if (used !== null) {
      this.usage.requestsUsed = used;
    }
    if (remaining !== null) {
      this.usage.requestsRemaining = remaining;
    }
    if (last !== null) {
      this.usage.consumed += last;
    }
  }

  private async toHttpError(response: Response): Promise<Error> {
    const status = response.status;
    const body = await response.text().catch(() => '');
    const details = parseApiError(body);
    const message = `HTTP error! Status: ${status} - ${details.message ?? response.statusText}`;

    const isQuota =
      status === 429 ||
      (details.errorCode !== undefined && QUOTA_ERROR_CODES.has(details.errorCode)) ||
      /quota/i.test(details.message ?? '');

    if (isQuota) {
      return new QuotaExceeded(message, status);
    }
    if (status === 401 || status === 403) {
      return new AuthError(message, status);
    }
    return new NetworkError(message, status);
  }
}

function parseHeaderNumber(value: string | null): number | null {
  if (value === null || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseApiError(body: string): { message?: string; errorCode?: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { message: body.trim() || undefined };
  }

  const result = apiErrorSchema.safeParse(parsed);
  if (!result.success) {
    return {};
  }
  return { message: result.data.message, errorCode: result.data.error_code };
}
