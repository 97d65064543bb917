import type { PropsSnapshot } from '../config/types';

/**
 * A sink write that has been prepared but is not visible yet
 */
export interface StagedExport {
  /** Sink name used in logs and errors */
  readonly sink: string;
  /** Final path of the output */
  readonly path: string;

  /**
   * Make the staged output visible
   */
  commit(): Promise<void>;

  /**
   * Drop the staged output, leaving the previous one in place
   */
  discard(): Promise<void>;
}

/**
 * Output sink for a props snapshot
 * Implemented by HtmlExporter, SpreadsheetExporter and SqliteExporter
 */
export interface IExporter {
  readonly sink: string;

  /**
   * Prepare the output for a snapshot without touching the current one
   */
  stage(snapshot: PropsSnapshot): Promise<StagedExport>;
}
