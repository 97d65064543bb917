/**
 * Player Props Collector - scheduled player-prop odds snapshots
 *
 * Main exports for programmatic use
 */

// Core types
export * from './config/types';
export * from './config/markets';
export { loadConfig, API_KEY_VARIABLE } from './config/env';
export * from './errors';

// Providers
export { TheOddsApiProvider } from './providers/TheOddsApiProvider';
export type {
  TheOddsApiConfig,
  EventOddsOptions,
  PlayerPropsRequest,
  PlayerPropsResult,
} from './providers/TheOddsApiProvider';
export { parseEventOdds, parseEventsResponse } from './providers/schemas';

// Storage
export type { IExporter, StagedExport } from './storage/IExporter';
export { HtmlExporter, formatQuote, renderPropsHtml } from './storage/HtmlExporter';
export type { HtmlExporterConfig } from './storage/HtmlExporter';
export {
  SpreadsheetExporter,
  buildWorkbook,
  readSpreadsheet,
} from './storage/SpreadsheetExporter';
export type { SpreadsheetExporterConfig } from './storage/SpreadsheetExporter';
export { SqliteExporter } from './storage/SqliteExporter';
export type { SqliteExporterConfig, SnapshotSummary } from './storage/SqliteExporter';

// Core
export { PropsCollector, createCollector } from './core/PropsCollector';
export type { BaselineReader, PropsCollectorConfig } from './core/PropsCollector';
export {
  analyzeRows,
  compareWithReference,
  isReferenceRow,
  measureMovement,
  projectionOf,
  propKey,
} from './core/LineAnalysis';
export type {
  AnalyzedRow,
  LineAnalysisOptions,
  LineMovement,
  ReferenceComparison,
} from './core/LineAnalysis';
export { transformPayloads, flattenEventOdds } from './core/PropsTransformer';
export { RunLock } from './core/RunLock';
export type { RunLockConfig } from './core/RunLock';

// Utils
export * from './utils/oddsMath';
