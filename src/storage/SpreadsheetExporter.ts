import ExcelJS from 'exceljs';
import {
  PLAYER_PROP_COLUMNS,
  type PlayerPropRow,
  type PropsSnapshot,
} from '../config/types';
import type { IExporter, StagedExport } from './IExporter';
import { stageFile } from './atomicFile';

export interface SpreadsheetExporterConfig {
  /** Destination workbook (.xlsx) */
  filePath: string;
  /** Worksheet name (defaults to 'Player Props') */
  sheetName?: string;
}

export const DEFAULT_SHEET_NAME = 'Player Props';

type PropColumn = (typeof PLAYER_PROP_COLUMNS)[number];

const NUMERIC_COLUMNS: ReadonlySet<PropColumn> = new Set<PropColumn>([
  'line',
  'overPrice',
  'underPrice',
]);

/**
 * Spreadsheet of the latest snapshot, one column per PlayerPropRow attribute
 *
 * Features:
 * - Frozen header row with an auto-filter
 * - Column widths fitted to content
 * - Empty cells for missing prices or lines
 */
export class SpreadsheetExporter implements IExporter {
  readonly sink = 'spreadsheet';
  private filePath: string;
  private sheetName: string;

  constructor(config: SpreadsheetExporterConfig) {
    this.filePath = config.filePath;
    this.sheetName = config.sheetName ?? DEFAULT_SHEET_NAME;
  }

  async stage(snapshot: PropsSnapshot): Promise<StagedExport> {
    const workbook = buildWorkbook(snapshot.rows, this.sheetName);

    return stageFile(this.sink, this.filePath, async (tempPath) => {
      await workbook.xlsx.writeFile(tempPath);
    });
  }
}

export function buildWorkbook(
  rows: readonly PlayerPropRow[],
  sheetName: string = DEFAULT_SHEET_NAME
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const worksheet = workbook.addWorksheet(sheetName, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  worksheet.columns = PLAYER_PROP_COLUMNS.map((column) => ({
    header: column,
    key: column,
    width: fitWidth(column, rows),
  }));
  worksheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    worksheet.addRow(
      Object.fromEntries(
        PLAYER_PROP_COLUMNS.map((column) => [column, row[column] ?? undefined])
      )
    );
  }

  worksheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: 1, column: PLAYER_PROP_COLUMNS.length },
  };

  return workbook;
}

/**
 * Read a workbook written by SpreadsheetExporter back into rows
 */
export async function readSpreadsheet(
  filePath: string,
  sheetName: string = DEFAULT_SHEET_NAME
): Promise<PlayerPropRow[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const worksheet = workbook.getWorksheet(sheetName);
  if (!worksheet) {
    throw new Error(`Worksheet '${sheetName}' not found in ${filePath}`);
  }

  const headerIndex = new Map<string, number>();
  worksheet.getRow(1).eachCell((cell, columnNumber) => {
    headerIndex.set(String(cell.value), columnNumber);
  });

  const rows: PlayerPropRow[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    if (!row.hasValues) {
      continue;
    }

    const text = (column: PropColumn): string => {
      const value = cellValue(row, headerIndex, column);
      return value === null ? '' : String(value);
    };
    const numeric = (column: PropColumn): number | null => {
      const value = cellValue(row, headerIndex, column);
      if (typeof value === 'number') {
        return value;
      }
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
      }
      return null;
    };

    rows.push({
      eventId: text('eventId'),
      eventName: text('eventName'),
      sportKey: text('sportKey'),
      commenceTime: text('commenceTime'),
      playerName: text('playerName'),
      market: text('market'),
      bookmaker: text('bookmaker'),
      line: numeric('line'),
      overPrice: numeric('overPrice'),
      underPrice: numeric('underPrice'),
      snapshotTime: text('snapshotTime'),
    });
  }

  return rows;
}

function cellValue(
  row: ExcelJS.Row,
  headerIndex: ReadonlyMap<string, number>,
  column: PropColumn
): string | number | null {
  const columnNumber = headerIndex.get(column);
  if (columnNumber === undefined) {
    return null;
  }

  const value = row.getCell(columnNumber).value;
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === null || value === undefined) {
    return null;
  }
  return row.getCell(columnNumber).text;
}

function fitWidth(column: PropColumn, rows: readonly PlayerPropRow[]): number {
  let length = column.length;
  for (const row of rows) {
    const value = row[column];
    if (value !== null) {
      length = Math.max(length, String(value).length);
    }
  }
  return NUMERIC_COLUMNS.has(column) ? length + 4 : length + 2;
}
