import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../errors';
import type { StagedExport } from './IExporter';

/**
 * Ensure directory exists
 */
export function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Write content to `<filePath>.tmp` and return a staged export that renames
 * it over the final path on commit (atomic on most filesystems).
 */
export async function stageFile(
  sink: string,
  filePath: string,
  write: (tempPath: string) => Promise<void>
): Promise<StagedExport> {
  const tempPath = filePath + '.tmp';

  try {
    ensureDirectoryExists(path.dirname(filePath));
    await write(tempPath);
  } catch (error) {
    removeIfExists(tempPath);
    throw new WriteError(sink, filePath, error);
  }

  return {
    sink,
    path: filePath,
    async commit() {
      try {
        fs.renameSync(tempPath, filePath);
      } catch (error) {
        removeIfExists(tempPath);
        throw new WriteError(sink, filePath, error);
      }
    },
    async discard() {
      removeIfExists(tempPath);
    },
  };
}

function removeIfExists(filePath: string): void {
  if (fs.existsSync(filePath)) {
    fs.unlinkSync(filePath);
  }
}
