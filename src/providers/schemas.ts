/**
 * Response schemas for The Odds API v4
 *
 * Odds payloads are parsed leniently: every field may be missing or of the
 * wrong type without failing the whole payload.
 */

import { z } from 'zod';
import type { EventOdds, OddsEvent } from '../config/types';

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);

const outcomeSchema = z.object({
  name: optionalString,
  description: optionalString,
  price: optionalNumber,
  point: optionalNumber,
});

const marketSchema = z.object({
  key: optionalString,
  last_update: optionalString,
  outcomes: z.array(outcomeSchema.catch({})).catch([]).default([]),
});

const bookmakerSchema = z.object({
  key: optionalString,
  title: optionalString,
  markets: z.array(marketSchema.catch({ outcomes: [] })).catch([]).default([]),
});

const eventOddsSchema = z.object({
  id: optionalString,
  sport_key: optionalString,
  home_team: optionalString,
  away_team: optionalString,
  commence_time: optionalString,
  bookmakers: z
    .array(bookmakerSchema.catch({ markets: [] }))
    .catch([])
    .default([]),
});

const eventSchema = z.object({
  id: z.string(),
  sport_key: z.string(),
  home_team: z.string(),
  away_team: z.string(),
  commence_time: z.string(),
});

export const eventsResponseSchema = z.array(eventSchema);

export const apiErrorSchema = z.object({
  message: z.string().optional(),
  error_code: z.string().optional(),
});

/**
 * Map an events list response to standard format
 */
export function parseEventsResponse(response: unknown): OddsEvent[] | null {
  const result = eventsResponseSchema.safeParse(response);
  if (!result.success) {
    return null;
  }

  return result.data.map((event) => ({
    id: event.id,
    homeTeam: event.home_team,
    awayTeam: event.away_team,
    commenceTime: event.commence_time,
    sportKey: event.sport_key,
  }));
}

/**
 * Map an event odds payload to standard format.
 * Returns null when the payload is not an object at all.
 */
export function parseEventOdds(payload: unknown): EventOdds | null {
  const result = eventOddsSchema.safeParse(payload);
  if (!result.success) {
    return null;
  }

  const response = result.data;
  return {
    id: response.id,
    sportKey: response.sport_key,
    homeTeam: response.home_team,
    awayTeam: response.away_team,
    commenceTime: response.commence_time,
    bookmakers: response.bookmakers.map((bookmaker) => ({
      key: bookmaker.key,
      title: bookmaker.title,
      markets: bookmaker.markets.map((market) => ({
        key: market.key,
        lastUpdate: market.last_update,
        outcomes: market.outcomes.map((outcome) => ({
          name: outcome.name,
          description: outcome.description,
          price: outcome.price,
          point: outcome.point,
        })),
      })),
    })),
  };
}
