import * as fs from 'fs';
import { DEFAULT_REFERENCE_BOOKMAKER } from '../config/markets';
import type { PlayerPropRow, PropsSnapshot } from '../config/types';
import {
  analyzeRows,
  projectionOf,
  type AnalyzedRow,
  type LineMovement,
} from '../core/LineAnalysis';
import {
  americanToImplied,
  formatAmericanOdds,
  formatMarketLabel,
  formatSigned,
} from '../utils/oddsMath';
import type { IExporter, StagedExport } from './IExporter';
import { stageFile } from './atomicFile';

export interface HtmlExporterConfig {
  /** Destination of the rendered page */
  filePath: string;
  /** Page title */
  title?: string;
  /** Time zone used to display start times */
  timeZone?: string;
  /** Bookmaker the other quotes are compared against */
  referenceBookmaker?: string;
}

/**
 * Static HTML table of the latest snapshot, rewritten wholesale each run
 */
export class HtmlExporter implements IExporter {
  readonly sink = 'html';
  private filePath: string;
  private title: string;
  private timeZone: string;
  private referenceBookmaker: string;

  constructor(config: HtmlExporterConfig) {
    this.filePath = config.filePath;
    this.title = config.title ?? 'Player Props';
    this.timeZone = config.timeZone ?? 'America/New_York';
    this.referenceBookmaker = config.referenceBookmaker ?? DEFAULT_REFERENCE_BOOKMAKER;
  }

  async stage(snapshot: PropsSnapshot): Promise<StagedExport> {
    const html = renderPropsHtml(snapshot, {
      title: this.title,
      timeZone: this.timeZone,
      referenceBookmaker: this.referenceBookmaker,
    });

    return stageFile(this.sink, this.filePath, async (tempPath) => {
      await fs.promises.writeFile(tempPath, html, 'utf8');
    });
  }
}

/**
 * Sort rows by start time, event, player, market and bookmaker
 */
export function sortRowsForDisplay(rows: readonly PlayerPropRow[]): PlayerPropRow[] {
  return [...rows].sort(
    (a, b) =>
      compareText(a.commenceTime, b.commenceTime) ||
      compareText(a.eventName, b.eventName) ||
      compareText(a.playerName, b.playerName) ||
      compareText(a.market, b.market) ||
      compareText(a.bookmaker, b.bookmaker)
  );
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Render a complete, self-contained HTML document.
 * Reference comparison and line movement columns come from the snapshot's
 * rows and baseline.
 */
export function renderPropsHtml(
  snapshot: PropsSnapshot,
  options: { title?: string; timeZone?: string; referenceBookmaker?: string } = {}
): string {
  const title = escapeHtml(options.title ?? 'Player Props');
  const timeZone = options.timeZone ?? 'America/New_York';
  const referenceBookmaker = options.referenceBookmaker ?? DEFAULT_REFERENCE_BOOKMAKER;

  const formatDate = (isoString: string) => {
    const date = new Date(isoString);
    if (Number.isNaN(date.getTime())) {
      return isoString;
    }
    return date.toLocaleString('en-US', {
      dateStyle: 'short',
      timeStyle: 'short',
      hour12: false,
      timeZone,
    });
  };

  const rows = sortRowsForDisplay(snapshot.rows);
  const analyzed = analyzeRows(rows, { referenceBookmaker, baseline: snapshot.baseline });
  const eventCount = new Set(rows.map((row) => row.eventId)).size;

  const body =
    rows.length > 0
      ? `
    <table>
      <thead>
        <tr>
          <th>Start Time</th>
          <th>Event</th>
          <th>Player</th>
          <th>Prop</th>
          <th>Book</th>
          <th>Line</th>
          <th>Over</th>
          <th>Under</th>
          <th>Over %</th>
          <th>Projected</th>
          <th>Reference</th>
          <th>Line Δ</th>
          <th>Over % Δ</th>
          <th>Proj Δ</th>
          <th>Line Move</th>
          <th>Odds Move</th>
          <th>Favorable</th>
        </tr>
      </thead>
      <tbody>
${analyzed.map((entry) => renderRow(entry, formatDate)).join('\n')}
      </tbody>
    </table>`
      : '<p class="empty">No player props available.</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: #f9fafb;
      color: #1f2937;
      padding: 2rem;
    }
    .container {
      max-width: 1400px;
      margin: 0 auto;
      background: white;
      border-radius: 12px;
      padding: 2rem;
      box-shadow: 0 4px 6px rgba(0, 0, 0, 0.1);
    }
    h1 {
      font-size: 1.75rem;
      color: #111827;
      margin-bottom: 0.5rem;
    }
    .meta {
      color: #6b7280;
      font-size: 0.875rem;
      margin-bottom: 1.5rem;
    }
    table {
      width: 100%;
      border-collapse: collapse;
      font-size: 0.875rem;
    }
    th {
      text-align: left;
      padding: 0.75rem;
      border-bottom: 2px solid #e5e7eb;
    }
    td {
      padding: 0.5rem 0.75rem;
      border-bottom: 1px solid #e5e7eb;
    }
    tbody tr:nth-child(even) { background: #f9fafb; }
    .num { text-align: right; font-variant-numeric: tabular-nums; }
    .empty { color: #6b7280; }
    .favorable { color: #047857; font-weight: 600; }
  </style>
</head>
<body>
  <div class="container">
    <h1>${title}</h1>
    <p class="meta">Snapshot: ${escapeHtml(formatDate(snapshot.snapshotTime))} • ${eventCount} events • ${rows.length} props • Reference: ${escapeHtml(referenceBookmaker)}</p>
    ${body}
  </div>
</body>
</html>
`;
}

function renderRow(
  { row, comparison, movement }: AnalyzedRow,
  formatDate: (isoString: string) => string
): string {
  const overProbability =
    row.overPrice !== null ? americanToImplied(row.overPrice) : null;
  const projection = projectionOf(row);
  const favorable = formatFavorable(movement);

  const cells = [
    `<td>${escapeHtml(formatDate(row.commenceTime))}</td>`,
    `<td>${escapeHtml(row.eventName)}</td>`,
    `<td>${escapeHtml(row.playerName)}</td>`,
    `<td title="${escapeHtml(row.market)}">${escapeHtml(formatMarketLabel(row.market))}</td>`,
    `<td>${escapeHtml(row.bookmaker)}</td>`,
    `<td class="num">${row.line ?? ''}</td>`,
    `<td class="num">${formatAmericanOdds(row.overPrice)}</td>`,
    `<td class="num">${formatAmericanOdds(row.underPrice)}</td>`,
    `<td class="num">${overProbability !== null ? `${(overProbability * 100).toFixed(1)}%` : ''}</td>`,
    `<td class="num">${projection !== null ? projection.toFixed(2) : ''}</td>`,
    `<td>${comparison ? escapeHtml(formatQuote(comparison.reference)) : ''}</td>`,
    `<td class="num">${formatSigned(comparison?.lineDelta ?? null, 1)}</td>`,
    `<td class="num">${formatSigned(percent(comparison?.overProbDelta ?? null), 1, '%')}</td>`,
    `<td class="num">${formatSigned(comparison?.projectionDelta ?? null, 2)}</td>`,
    `<td class="num">${formatSigned(movement?.pointMove ?? null, 1)}</td>`,
    `<td class="num">${formatSigned(percent(movement?.overProbMove ?? null), 1, '%')}</td>`,
    favorable.highlight ? `<td class="favorable">${favorable.text}</td>` : `<td>${favorable.text}</td>`,
  ];

  return `        <tr class="prop-row">${cells.join('')}</tr>`;
}

/**
 * '25.5 -120/+100', or '+145' for a yes-only market
 */
export function formatQuote(row: PlayerPropRow): string {
  const prices = [row.overPrice, row.underPrice]
    .map(formatAmericanOdds)
    .filter((price) => price !== '')
    .join('/');
  return row.line === null ? prices : `${row.line} ${prices}`.trim();
}

function formatFavorable(movement: LineMovement | null): { text: string; highlight: boolean } {
  if (!movement || (movement.overFavorable === null && movement.underFavorable === null)) {
    return { text: '', highlight: false };
  }
  const sides = [
    movement.overFavorable ? 'Over' : null,
    movement.underFavorable ? 'Under' : null,
  ].filter((side): side is string => side !== null);

  return sides.length > 0
    ? { text: sides.join(', '), highlight: true }
    : { text: 'No', highlight: false };
}

function percent(value: number | null): number | null {
  return value === null ? null : value * 100;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
