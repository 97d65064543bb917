/**
 * Main orchestrator for a player props collection run
 *
 * Coordinates fetching, transformation and export to every sink
 */

import * as path from 'path';
import { DEFAULT_REFERENCE_BOOKMAKER, OUTPUT_FILES } from '../config/markets';
import type {
  CollectionSummary,
  CollectorConfig,
  PlayerPropRow,
  PropsSnapshot,
} from '../config/types';
import { describeError } from '../errors';
import { TheOddsApiProvider } from '../providers/TheOddsApiProvider';
import { HtmlExporter } from '../storage/HtmlExporter';
import type { IExporter, StagedExport } from '../storage/IExporter';
import { SpreadsheetExporter } from '../storage/SpreadsheetExporter';
import { SqliteExporter } from '../storage/SqliteExporter';
import { ensureDirectoryExists } from '../storage/atomicFile';
import { transformPayloads } from './PropsTransformer';
import { RunLock } from './RunLock';

/**
 * Source of the earliest stored reference quotes used for line movement
 */
export interface BaselineReader {
  getEarliestRows(bookmaker: string, eventIds: readonly string[]): PlayerPropRow[];
}

export interface PropsCollectorConfig {
  /** Odds provider instance */
  provider: TheOddsApiProvider;

  /** Sinks, committed in this order */
  exporters: IExporter[];

  /** Sport keys to collect */
  sports: readonly string[];

  /** Market keys requested per event */
  markets: readonly string[];

  /** Region code */
  region: string;

  /** Bookmaker keys (default: all bookmakers in the region) */
  bookmakers?: readonly string[];

  /** Bookmaker whose earliest stored quotes form the baseline */
  referenceBookmaker?: string;

  /** Stored history for line movement (default: none) */
  baseline?: BaselineReader;

  /** Guard against overlapping runs (default: none) */
  lock?: RunLock;

  /** Clock for the snapshot timestamp */
  now?: () => Date;
}

export class PropsCollector {
  private provider: TheOddsApiProvider;
  private exporters: IExporter[];
  private sports: readonly string[];
  private markets: readonly string[];
  private region: string;
  private bookmakers?: readonly string[];
  private referenceBookmaker: string;
  private baseline?: BaselineReader;
  private lock?: RunLock;
  private now: () => Date;

  constructor(config: PropsCollectorConfig) {
    this.provider = config.provider;
    this.exporters = config.exporters;
    this.sports = config.sports;
    this.markets = config.markets;
    this.region = config.region;
    this.bookmakers = config.bookmakers;
    this.referenceBookmaker = config.referenceBookmaker ?? DEFAULT_REFERENCE_BOOKMAKER;
    this.baseline = config.baseline;
    this.lock = config.lock;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Main execution
   *
   * 1. Fetch player props for every upcoming event
   * 2. Flatten them into rows
   * 3. Stage every sink, then commit them in order
   */
  async run(): Promise<CollectionSummary> {
    console.log('🚀 Player Props Collector starting...');
    console.log(`📊 Sports: ${this.sports.join(', ')}`);
    console.log(`🎯 Markets: ${this.markets.length} (${this.markets.join(', ')})`);

    const startTime = Date.now();
    this.lock?.acquire();

    try {
      const snapshotTime = this.now().toISOString();

      // Phase 1: Fetch
      console.log('\n📡 Phase 1: Fetch');
      const { events, payloads, estimatedCost } = await this.provider.fetchPlayerProps({
        sports: this.sports,
        markets: this.markets,
        region: this.region,
        bookmakers: this.bookmakers,
      });

      // Phase 2: Transform
      console.log('\n🔄 Phase 2: Transform');
      const rows = transformPayloads(payloads, snapshotTime);
      console.log(`  ${rows.length} player props from ${payloads.length} events`);

      const eventIds = [...new Set(rows.map((row) => row.eventId))];
      const baseline = this.baseline?.getEarliestRows(this.referenceBookmaker, eventIds) ?? [];
      console.log(`  ${baseline.length} stored ${this.referenceBookmaker} quotes for line movement`);

      // Phase 3: Export
      console.log('\n💾 Phase 3: Export');
      const outputs = await this.export({ snapshotTime, rows, baseline });

      const usage = this.provider.getUsage();
      const summary: CollectionSummary = {
        snapshotTime,
        eventsFetched: events.length,
        rowCount: rows.length,
        usage,
        estimatedCost,
        outputs,
        durationMs: Date.now() - startTime,
      };

      console.log('\n📊 Summary:');
      console.log(`  🕒 Snapshot: ${snapshotTime}`);
      console.log(`  🏟️  Events: ${summary.eventsFetched}`);
      console.log(`  📝 Rows: ${summary.rowCount}`);
      console.log(`  💳 Quota used this run: ${usage.consumed} (estimated ${estimatedCost})`);
      if (usage.requestsRemaining !== null) {
        console.log(`  💳 Quota remaining: ${usage.requestsRemaining}`);
      }
      console.log(`  ⏱️  Duration: ${(summary.durationMs / 1000).toFixed(2)}s`);
      console.log('\n✅ Player Props Collector finished!');

      return summary;
    } finally {
      this.lock?.release();
    }
  }

  /**
   * Stage every sink first so a failure leaves all previous outputs intact,
   * then commit in configured order.
   */
  private async export(snapshot: PropsSnapshot): Promise<Record<string, string>> {
    const staged: StagedExport[] = [];

    try {
      for (const exporter of this.exporters) {
        staged.push(await exporter.stage(snapshot));
      }
    } catch (error) {
      await discardAll(staged);
      throw error;
    }

    const outputs: Record<string, string> = {};
    for (const [index, output] of staged.entries()) {
      try {
        await output.commit();
      } catch (error) {
        await discardAll(staged.slice(index + 1));
        throw error;
      }
      outputs[output.sink] = output.path;
      console.log(`  ✅ ${output.sink} → ${output.path}`);
    }

    return outputs;
  }
}

async function discardAll(staged: StagedExport[]): Promise<void> {
  for (const output of staged) {
    try {
      await output.discard();
    } catch (error) {
      console.error(`  ❌ Failed to discard ${output.sink} output:`, describeError(error));
    }
  }
}

/**
 * Wire a collector with the default sinks for a resolved configuration.
 * Commit order: database, spreadsheet, HTML.
 */
export function createCollector(
  config: CollectorConfig,
  options: { now?: () => Date; baseUrl?: string } = {}
): PropsCollector {
  ensureDirectoryExists(config.outputDir);
  const output = (name: string) => path.join(config.outputDir, name);

  const database = new SqliteExporter({ filePath: output(OUTPUT_FILES.database) });

  return new PropsCollector({
    provider: new TheOddsApiProvider({
      apiKey: config.apiKey,
      timeout: config.requestTimeout,
      baseUrl: options.baseUrl,
      now: options.now,
    }),
    exporters: [
      database,
      new SpreadsheetExporter({ filePath: output(OUTPUT_FILES.spreadsheet) }),
      new HtmlExporter({
        filePath: output(OUTPUT_FILES.html),
        referenceBookmaker: config.referenceBookmaker,
      }),
    ],
    sports: config.sports,
    markets: config.markets,
    region: config.region,
    bookmakers: config.bookmakers,
    referenceBookmaker: config.referenceBookmaker,
    baseline: database,
    lock: new RunLock({ filePath: output(OUTPUT_FILES.lock), now: options.now }),
    now: options.now,
  });
}
