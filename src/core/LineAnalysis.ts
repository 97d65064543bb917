/**
 * Compares every bookmaker's quote with a reference bookmaker and measures
 * how the reference line moved since it was first stored.
 *
 * Results are for display only; rows are never modified.
 */

import type { PlayerPropRow } from '../config/types';
import { americanToImplied, projectedValue } from '../utils/oddsMath';

/**
 * One quote measured against the reference bookmaker's quote for the same prop
 */
export interface ReferenceComparison {
  reference: PlayerPropRow;
  /** Reference line minus this line; positive means a cheaper over here */
  lineDelta: number | null;
  /** Reference minus this book's implied over probability */
  overProbDelta: number | null;
  /** Reference minus this book's implied under probability */
  underProbDelta: number | null;
  projection: number | null;
  referenceProjection: number | null;
  /** Reference projection minus this book's projection */
  projectionDelta: number | null;
}

/**
 * Current reference quote measured against the earliest stored one
 */
export interface LineMovement {
  baseline: PlayerPropRow;
  /** Current minus earliest line */
  pointMove: number | null;
  /** Current minus earliest implied over probability */
  overProbMove: number | null;
  /** Line rose, or held with a shorter over price (yes/no markets: shorter yes price) */
  overFavorable: boolean | null;
  /** Line fell, or held with a shorter under price */
  underFavorable: boolean | null;
}

export interface AnalyzedRow {
  row: PlayerPropRow;
  /** Null for the reference bookmaker itself or when it does not quote the prop */
  comparison: ReferenceComparison | null;
  /** Null when the reference has no current or stored quote for the prop */
  movement: LineMovement | null;
}

export interface LineAnalysisOptions {
  /** Reference bookmaker, matched case-insensitively against the row's bookmaker */
  referenceBookmaker: string;
  /** Earliest stored reference rows */
  baseline?: readonly PlayerPropRow[];
}

/**
 * Identity of a prop across bookmakers and snapshots
 */
export function propKey(row: Pick<PlayerPropRow, 'eventId' | 'playerName' | 'market'>): string {
  return JSON.stringify([row.eventId, row.playerName, row.market]);
}

export function isReferenceRow(row: PlayerPropRow, referenceBookmaker: string): boolean {
  return row.bookmaker.toLowerCase() === referenceBookmaker.toLowerCase();
}

/**
 * Analyze every row, preserving input order
 */
export function analyzeRows(
  rows: readonly PlayerPropRow[],
  options: LineAnalysisOptions
): AnalyzedRow[] {
  const references = indexByProp(
    rows.filter((row) => isReferenceRow(row, options.referenceBookmaker))
  );
  const baseline = indexByProp(options.baseline ?? []);

  return rows.map((row) => {
    const key = propKey(row);
    const reference = references.get(key);
    const earliest = baseline.get(key);

    return {
      row,
      comparison:
        reference && !isReferenceRow(row, options.referenceBookmaker)
          ? compareWithReference(row, reference)
          : null,
      movement: reference && earliest ? measureMovement(reference, earliest) : null,
    };
  });
}

export function compareWithReference(
  row: PlayerPropRow,
  reference: PlayerPropRow
): ReferenceComparison {
  const projection = projectionOf(row);
  const referenceProjection = projectionOf(reference);

  return {
    reference,
    lineDelta: difference(reference.line, row.line),
    overProbDelta: difference(impliedOf(reference.overPrice), impliedOf(row.overPrice)),
    underProbDelta: difference(impliedOf(reference.underPrice), impliedOf(row.underPrice)),
    projection,
    referenceProjection,
    projectionDelta: difference(referenceProjection, projection),
  };
}

export function measureMovement(
  current: PlayerPropRow,
  baseline: PlayerPropRow
): LineMovement {
  return {
    baseline,
    pointMove: difference(current.line, baseline.line),
    overProbMove: difference(impliedOf(current.overPrice), impliedOf(baseline.overPrice)),
    overFavorable: sideFavorable(current, baseline, 'over'),
    underFavorable: sideFavorable(current, baseline, 'under'),
  };
}

function sideFavorable(
  current: PlayerPropRow,
  baseline: PlayerPropRow,
  side: 'over' | 'under'
): boolean | null {
  const currentPrice = side === 'over' ? current.overPrice : current.underPrice;
  const baselinePrice = side === 'over' ? baseline.overPrice : baseline.underPrice;

  if (current.line === null || baseline.line === null) {
    // Yes/no markets: only the yes side is judged
    if (side === 'under' || currentPrice === null || baselinePrice === null) {
      return null;
    }
    return currentPrice < baselinePrice;
  }

  const moved = side === 'over' ? current.line > baseline.line : current.line < baseline.line;
  if (moved) {
    return true;
  }
  return (
    current.line === baseline.line &&
    currentPrice !== null &&
    baselinePrice !== null &&
    currentPrice < baselinePrice
  );
}

function indexByProp(rows: readonly PlayerPropRow[]): Map<string, PlayerPropRow> {
  const index = new Map<string, PlayerPropRow>();
  for (const row of rows) {
    const key = propKey(row);
    if (!index.has(key)) {
      index.set(key, row);
    }
  }
  return index;
}

function impliedOf(price: number | null): number | null {
  return price === null ? null : americanToImplied(price);
}

/**
 * Projected stat value of a two-sided quote
 */
export function projectionOf(row: PlayerPropRow): number | null {
  if (row.overPrice === null || row.underPrice === null || row.line === null) {
    return null;
  }
  return projectedValue(row.overPrice, row.underPrice, row.line);
}

function difference(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a - b;
}
