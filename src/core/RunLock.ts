/**
 * Advisory lock file guarding the output directory against overlapping runs
 *
 * The lock is published with a hard link from a fully written temp file, so
 * it never appears empty. A stale lock is renamed aside before it is replaced,
 * and only a lock whose content is still the one judged stale is discarded.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import { z } from 'zod';
import { LockError } from '../errors';

export interface RunLockConfig {
  /** Lock file path */
  filePath: string;
  /** Age after which an abandoned lock is replaced (default: 2 hours) */
  staleAfterMs?: number;
  now?: () => Date;
}

const lockContentSchema = z.object({
  pid: z.number(),
  startedAt: z.string(),
  token: z.string().optional(),
});

interface LockSnapshot {
  /** Raw file content, compared byte for byte before replacing */
  raw: string;
  /** Start time from the content, or the file's mtime when unreadable */
  startedAt: number;
}

export class RunLock {
  private filePath: string;
  private staleAfterMs: number;
  private now: () => Date;
  /** Content this instance wrote, while it holds the lock */
  private ownContent: string | null = null;

  constructor(config: RunLockConfig) {
    this.filePath = config.filePath;
    this.staleAfterMs = config.staleAfterMs ?? 2 * 60 * 60 * 1000;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Take the lock or throw LockError if a live run holds it
   */
  acquire(): void {
    if (this.tryCreate()) {
      return;
    }

    const current = this.inspect();
    if (current === null) {
      // Removed between our create attempt and the read
      if (this.tryCreate()) {
        return;
      }
      throw new LockError(`Could not acquire ${this.filePath}`);
    }

    const age = this.now().getTime() - current.startedAt;
    if (age < this.staleAfterMs) {
      throw new LockError(
        `Another collection run holds ${this.filePath} (started ${new Date(current.startedAt).toISOString()})`
      );
    }

    console.warn(`⚠️  Replacing stale lock ${this.filePath}`);
    this.setAside(current);

    if (!this.tryCreate()) {
      throw new LockError(`Another collection run replaced the stale lock ${this.filePath} first`);
    }
  }

  /**
   * Remove the lock file if it still holds this instance's content
   */
  release(): void {
    if (this.ownContent === null) {
      return;
    }

    const own = this.ownContent;
    this.ownContent = null;

    const raw = readIfExists(this.filePath);
    if (raw !== own) {
      console.warn(`⚠️  Lock ${this.filePath} no longer belongs to this run; leaving it`);
      return;
    }
    fs.rmSync(this.filePath, { force: true });
  }

  isHeld(): boolean {
    return this.ownContent !== null;
  }

  /**
   * Publish a complete lock file atomically; false when one already exists
   */
  private tryCreate(): boolean {
    const token = crypto.randomUUID();
    const content = JSON.stringify({
      pid: process.pid,
      startedAt: this.now().toISOString(),
      token,
    });
    const tempPath = `${this.filePath}.${token}.tmp`;

    try {
      fs.writeFileSync(tempPath, content, { flag: 'wx' });
      fs.linkSync(tempPath, this.filePath);
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        return false;
      }
      throw new LockError(
        `Could not create ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      fs.rmSync(tempPath, { force: true });
    }

    this.ownContent = content;
    return true;
  }

  /**
   * Move a stale lock out of the way. When the moved file is not the one
   * judged stale, another run has taken the lock: put it back and give up.
   */
  private setAside(stale: LockSnapshot): void {
    const asidePath = `${this.filePath}.${crypto.randomUUID()}.stale`;

    try {
      fs.renameSync(this.filePath, asidePath);
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return;
      }
      throw new LockError(
        `Could not replace ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    try {
      if (readIfExists(asidePath) !== stale.raw) {
        restore(asidePath, this.filePath);
        throw new LockError(`Another collection run replaced the stale lock ${this.filePath} first`);
      }
    } finally {
      fs.rmSync(asidePath, { force: true });
    }
  }

  /**
   * Current lock content and start time, null when the file is gone
   */
  private inspect(): LockSnapshot | null {
    const raw = readIfExists(this.filePath);
    if (raw === null) {
      return null;
    }

    const startedAt = parseStartedAt(raw) ?? modifiedAt(this.filePath);
    if (startedAt === null) {
      return null;
    }
    return { raw, startedAt };
  }
}

function parseStartedAt(raw: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = lockContentSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  const startedAt = new Date(result.data.startedAt).getTime();
  return Number.isNaN(startedAt) ? null : startedAt;
}

function modifiedAt(filePath: string): number | null {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch (error) {
    if (hasCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

function readIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (hasCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * Put a live lock back without overwriting one created meanwhile
 */
function restore(asidePath: string, filePath: string): void {
  try {
    fs.linkSync(asidePath, filePath);
  } catch (error) {
    if (!hasCode(error, 'EEXIST')) {
      throw error;
    }
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
