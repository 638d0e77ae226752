import { appendFile, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { AirQualityStore } from './db/store';
import type { Logger } from './logger';
import type { RunLogEntry } from './types';

export type RunLogOutcome = 'stored' | 'duplicate' | 'journaled' | 'lost';

export interface RunLoggerOptions {
  store: AirQualityStore;
  journalPath: string;
  logger: Logger;
}

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const journalEntrySchema = z.object({
  runId: z.string().min(1),
  executedAt: isoDate,
  source: z.string(),
  inserted: z.number().int().nonnegative(),
  updated: z.number().int().nonnegative(),
  omitted: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  status: z.enum(['success', 'partial', 'error']),
  message: z.string(),
  windowStart: isoDate.nullable(),
  windowEnd: isoDate.nullable()
});

const serialize = (entry: RunLogEntry): string =>
  JSON.stringify({
    ...entry,
    executedAt: entry.executedAt.toISOString(),
    windowStart: entry.windowStart ? entry.windowStart.toISOString() : null,
    windowEnd: entry.windowEnd ? entry.windowEnd.toISOString() : null
  });

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Appends one `etl_log` row per pipeline run. Recording never throws: entries the store
 * cannot accept go to a JSONL journal that is replayed on the next run.
 */
export class RunLogger {
  private readonly store: AirQualityStore;
  private readonly journalPath: string;
  private readonly logger: Logger;

  constructor(options: RunLoggerOptions) {
    this.store = options.store;
    this.journalPath = path.resolve(options.journalPath);
    this.logger = options.logger;
  }

  getJournalPath(): string {
    return this.journalPath;
  }

  async record(entry: RunLogEntry): Promise<RunLogOutcome> {
    try {
      const stored = await this.store.appendRunLog(entry);
      this.logger.info(
        { runId: entry.runId, status: entry.status, inserted: entry.inserted, updated: entry.updated },
        'run log recorded'
      );
      return stored ? 'stored' : 'duplicate';
    } catch (error) {
      this.logger.error(
        { runId: entry.runId, err: error, journalPath: this.journalPath },
        'failed to write run log to the store; journaling it'
      );
    }

    try {
      await mkdir(path.dirname(this.journalPath), { recursive: true });
      await appendFile(this.journalPath, `${serialize(entry)}\n`, 'utf8');
      return 'journaled';
    } catch (error) {
      this.logger.fatal({ runId: entry.runId, entry, err: error }, 'run log could not be journaled');
      return 'lost';
    }
  }

  /** Moves journaled entries into `etl_log`. Entries that still fail stay in the journal. */
  async replayPending(): Promise<number> {
    let text: string;
    try {
      text = await readFile(this.journalPath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn({ err: error, journalPath: this.journalPath }, 'failed to read run log journal');
      }
      return 0;
    }

    const remaining: string[] = [];
    let replayed = 0;
    for (const line of text.split('\n')) {
      if (!line.trim()) {
        continue;
      }

      let candidate: unknown;
      try {
        candidate = JSON.parse(line);
      } catch (error) {
        this.logger.warn({ line, reason: describeError(error) }, 'dropping malformed run log journal line');
        continue;
      }
      const parsed = journalEntrySchema.safeParse(candidate);
      if (!parsed.success) {
        this.logger.warn({ line, issues: parsed.error.issues }, 'dropping invalid run log journal line');
        continue;
      }

      if (remaining.length > 0) {
        remaining.push(line);
        continue;
      }
      try {
        await this.store.appendRunLog(parsed.data);
        replayed += 1;
      } catch (error) {
        this.logger.warn({ runId: parsed.data.runId, err: error }, 'run log replay failed; keeping it journaled');
        remaining.push(line);
      }
    }

    try {
      if (remaining.length === 0) {
        await rm(this.journalPath, { force: true });
      } else {
        await writeFile(this.journalPath, `${remaining.join('\n')}\n`, 'utf8');
      }
    } catch (error) {
      this.logger.warn({ err: error, journalPath: this.journalPath }, 'failed to rewrite run log journal');
    }

    if (replayed > 0) {
      this.logger.info({ replayed, pending: remaining.length }, 'replayed journaled run logs');
    }
    return replayed;
  }
}
