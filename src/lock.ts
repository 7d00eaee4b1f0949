/**
 * Single-writer lock file kept beside the mapping database
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONSTANTS } from './constants';
import { describeError } from './errors';
import { logger } from './logger';

const lockDataSchema = z.object({
  pid: z.number(),
  timestamp: z.number(),
  startedAt: z.string().optional(),
});

export type LockData = z.infer<typeof lockDataSchema>;

export function lockPathFor(dbPath: string): string {
  return path.join(path.dirname(path.resolve(dbPath)), '.sync.lock');
}

export class SyncLock {
  private held = false;

  constructor(
    readonly filePath: string,
    private readonly staleAfterMs: number = CONSTANTS.STALE_LOCK_MS,
  ) {}

  /**
   * Returns false when another live process holds the lock. A lock older
   * than the stale limit, or one that cannot be parsed, is replaced.
   */
  acquire(now: number = Date.now()): boolean {
    if (fs.existsSync(this.filePath)) {
      const existing = this.read();
      if (existing && now - existing.timestamp <= this.staleAfterMs) {
        logger.info('Another sync instance is already running.');
        logger.info(`Lock acquired at: ${new Date(existing.timestamp).toISOString()}`);
        logger.info(`PID: ${existing.pid}`);
        return false;
      }
      logger.info('Removing stale lock file...');
      fs.unlinkSync(this.filePath);
    }

    const lockData: LockData = {
      pid: process.pid,
      timestamp: now,
      startedAt: new Date(now).toISOString(),
    };
    try {
      // `wx` fails if another process created the file in the meantime
      fs.writeFileSync(this.filePath, JSON.stringify(lockData, null, 2), { flag: 'wx' });
    } catch (error) {
      logger.error(`Failed to acquire lock: ${describeError(error)}`);
      return false;
    }
    this.held = true;
    logger.debug(`Lock acquired (PID: ${process.pid})`);
    return true;
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    try {
      if (fs.existsSync(this.filePath)) fs.unlinkSync(this.filePath);
      logger.debug('Lock released');
    } catch (error) {
      logger.error(`Failed to release lock: ${describeError(error)}`);
    }
  }

  private read(): LockData | null {
    try {
      const parsed = lockDataSchema.safeParse(JSON.parse(fs.readFileSync(this.filePath, 'utf8')));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.warn(`Unreadable lock file ${this.filePath}: ${describeError(error)}`);
      return null;
    }
  }
}
