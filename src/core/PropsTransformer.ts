/**
 * Flattens event odds payloads into one row per player, market and bookmaker
 */

import type {
  BookmakerMarket,
  EventOdds,
  MarketOutcome,
  PlayerPropRow,
} from '../config/types';
import { parseEventOdds } from '../providers/schemas';

const OVER_SIDES = new Set(['over', 'yes']);
const UNDER_SIDES = new Set(['under', 'no']);

/**
 * Transform raw odds payloads. Payloads that are not objects are skipped
 * with a warning; entries missing an event id, player or market are dropped.
 */
export function transformPayloads(
  payloads: readonly unknown[],
  snapshotTime: string
): PlayerPropRow[] {
  const rows: PlayerPropRow[] = [];

  payloads.forEach((payload, index) => {
    const odds = parseEventOdds(payload);
    if (!odds) {
      console.warn(`⚠️  Skipping unreadable odds payload #${index}`);
      return;
    }
    rows.push(...flattenEventOdds(odds, snapshotTime));
  });

  return rows;
}

/**
 * Flatten a single event, preserving bookmaker, market and outcome order
 */
export function flattenEventOdds(
  odds: EventOdds,
  snapshotTime: string
): PlayerPropRow[] {
  if (!odds.id) {
    return [];
  }

  const rows: PlayerPropRow[] = [];
  const eventName = `${odds.awayTeam ?? ''} @ ${odds.homeTeam ?? ''}`;

  for (const bookmaker of odds.bookmakers) {
    const bookmakerName = bookmaker.title ?? bookmaker.key ?? '';

    for (const market of bookmaker.markets) {
      if (!market.key) {
        continue;
      }

      for (const [playerName, outcomes] of groupByPlayer(market)) {
        rows.push({
          eventId: odds.id,
          eventName,
          sportKey: odds.sportKey ?? '',
          commenceTime: odds.commenceTime ?? '',
          playerName,
          market: market.key,
          bookmaker: bookmakerName,
          line: firstPoint(outcomes),
          overPrice: priceFor(outcomes, OVER_SIDES),
          underPrice: priceFor(outcomes, UNDER_SIDES),
          snapshotTime,
        });
      }
    }
  }

  return rows;
}

/**
 * Group outcomes by player, in first-seen order
 */
function groupByPlayer(market: BookmakerMarket): Map<string, MarketOutcome[]> {
  const groups = new Map<string, MarketOutcome[]>();

  for (const outcome of market.outcomes) {
    const player = outcome.description;
    if (!player || !player.trim()) {
      continue;
    }
    const group = groups.get(player);
    if (group) {
      group.push(outcome);
    } else {
      groups.set(player, [outcome]);
    }
  }

  return groups;
}

function firstPoint(outcomes: MarketOutcome[]): number | null {
  const withPoint = outcomes.find((outcome) => outcome.point !== undefined);
  return withPoint?.point ?? null;
}

function priceFor(
  outcomes: MarketOutcome[],
  sides: ReadonlySet<string>
): number | null {
  const match = outcomes.find(
    (outcome) =>
      outcome.name !== undefined && sides.has(outcome.name.toLowerCase())
  );
  return match?.price ?? null;
}
