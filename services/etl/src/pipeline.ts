import os from 'node:os';

import { nanoid } from 'nanoid';

import {
  RunCancelledError,
  bucketKey,
  bucketStart,
  deduplicate,
  imputeGaps,
  normalizeRows,
  type CanonicalMeasurement,
  type GapUnfillable,
  type RejectedRow
} from '@airq/core';

import type { EtlConfig } from './config';
import type { AirQualityStore } from './db/store';
import type { RawBatchInput } from './extract';
import { Loader, type LoadResult } from './loader';
import type { Logger } from './logger';
import type { EtlMetrics } from './metrics';
import type { PipelineResources } from './resources';
import type { RunLogger, RunLogOutcome } from './runLogger';
import type { RunStatus, RunWindow } from './types';

export const RUN_LOCK_NAME = 'airq-etl';

const MAX_LOGGED_REJECTIONS = 20;

export type BatchProvider = RawBatchInput | ((signal: AbortSignal | undefined) => Promise<RawBatchInput>);

/** Resources given directly, or loaded once the run has started so a failure is logged as the run's error. */
export type ResourceProvider = PipelineResources | (() => Promise<PipelineResources>);

export type WindowProvider = Partial<RunWindow> | (() => Partial<RunWindow>);

export interface PipelineDependencies {
  config: EtlConfig;
  store: AirQualityStore;
  runLogger: RunLogger;
  resources: ResourceProvider;
  logger: Logger;
  metrics?: EtlMetrics;
  loader?: Loader;
}

export interface PipelineRunOptions {
  batch: BatchProvider;
  /** Source recorded in the run log when the batch never loads. */
  sourceLabel?: string;
  /** Buckets starting at or after `from` and strictly before `to` are kept. */
  window?: WindowProvider;
  signal?: AbortSignal;
  runId?: string;
}

export interface PipelineRunSummary {
  runId: string;
  source: string;
  status: RunStatus;
  message: string;
  inputRows: number;
  normalized: number;
  rejected: RejectedRow[];
  unparsableTimestamps: number;
  outsideWindow: number;
  duplicatesCollapsed: number;
  imputed: number;
  discardedNulls: number;
  unfillable: GapUnfillable[];
  missingTables: string[];
  load: LoadResult | null;
  durationSeconds: number;
  runLog: RunLogOutcome | null;
  error: Error | null;
}

const checkSignal = (signal: AbortSignal | undefined, stage: string): void => {
  if (signal?.aborted) {
    throw new RunCancelledError(stage);
  }
};

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

export const omittedCount = (summary: PipelineRunSummary): number =>
  summary.rejected.length +
  summary.unparsableTimestamps +
  summary.outsideWindow +
  summary.discardedNulls +
  (summary.load?.measurementsKeptObserved ?? 0);

/** Human-readable outcome stored in `etl_log.mensaje`. */
export const describeRun = (summary: PipelineRunSummary): string => {
  if (summary.error) {
    const code = 'code' in summary.error && typeof summary.error.code === 'string' ? ` [${summary.error.code}]` : '';
    return `Run failed${code}: ${summary.error.message}`;
  }

  const parts = [
    `${plural(summary.inputRows, 'raw row')} read`,
    `${summary.normalized} normalized`,
    `${summary.load?.measurementsInserted ?? 0} inserted`,
    `${summary.load?.measurementsUpdated ?? 0} updated`
  ];
  if (summary.rejected.length > 0) {
    parts.push(`${plural(summary.rejected.length, 'row')} rejected for schema mismatch`);
  }
  if (summary.unparsableTimestamps > 0) {
    parts.push(`${plural(summary.unparsableTimestamps, 'unparsable timestamp')} dropped`);
  }
  if (summary.outsideWindow > 0) {
    parts.push(`${plural(summary.outsideWindow, 'row')} outside the run window`);
  }
  if (summary.duplicatesCollapsed > 0) {
    parts.push(`${plural(summary.duplicatesCollapsed, 'duplicate')} collapsed`);
  }
  if (summary.imputed > 0) {
    parts.push(`${plural(summary.imputed, 'value')} imputed`);
  }
  if (summary.unfillable.length > 0) {
    const series = summary.unfillable
      .map((gap) => `${gap.stationCode}/${gap.pollutantCode} from ${bucketKey(gap.firstMissing)} (${gap.missingHours}h)`)
      .join(', ');
    parts.push(`${plural(summary.unfillable.length, 'unfillable gap')}: ${series}`);
  }
  if (summary.missingTables.length > 0) {
    parts.push(`no breakpoint table for ${summary.missingTables.join(', ')}`);
  }
  return parts.join('; ');
};

const statusOf = (summary: PipelineRunSummary): RunStatus => {
  if (summary.error) {
    return 'error';
  }
  const degraded =
    summary.rejected.length > 0 ||
    summary.unparsableTimestamps > 0 ||
    summary.outsideWindow > 0 ||
    summary.missingTables.length > 0;
  return degraded ? 'partial' : 'success';
};

const inWindow = (row: CanonicalMeasurement, window: RunWindow): boolean => {
  const start = bucketStart(row.bucket).getTime();
  if (window.from && start < window.from.getTime()) {
    return false;
  }
  if (window.to && start >= window.to.getTime()) {
    return false;
  }
  return true;
};

/**
 * Runs one pass of normalize, window filter, deduplicate, impute and load, and records
 * exactly one run log entry whatever the outcome.
 */
export class PipelineRunner {
  private readonly config: EtlConfig;
  private readonly store: AirQualityStore;
  private readonly runLogger: RunLogger;
  private readonly resources: ResourceProvider;
  private readonly logger: Logger;
  private readonly metrics: EtlMetrics | undefined;
  private readonly loader: Loader | undefined;

  constructor(dependencies: PipelineDependencies) {
    this.config = dependencies.config;
    this.store = dependencies.store;
    this.runLogger = dependencies.runLogger;
    this.resources = dependencies.resources;
    this.logger = dependencies.logger;
    this.metrics = dependencies.metrics;
    this.loader = dependencies.loader;
  }

  async run(options: PipelineRunOptions): Promise<PipelineRunSummary> {
    const runId = options.runId ?? nanoid(12);
    const executedAt = new Date();
    const startedAt = performance.now();
    const log = this.logger.child({ runId });
    const window: RunWindow = { from: null, to: null };

    const summary: PipelineRunSummary = {
      runId,
      source: typeof options.batch === 'function' ? options.sourceLabel ?? 'unknown' : options.batch.source,
      status: 'error',
      message: '',
      inputRows: 0,
      normalized: 0,
      rejected: [],
      unparsableTimestamps: 0,
      outsideWindow: 0,
      duplicatesCollapsed: 0,
      imputed: 0,
      discardedNulls: 0,
      unfillable: [],
      missingTables: [],
      load: null,
      durationSeconds: 0,
      runLog: null,
      error: null
    };

    try {
      await this.execute(summary, options, window, log);
    } catch (error) {
      summary.error = toError(error);
      log.error({ err: error }, 'pipeline run failed');
    } finally {
      summary.status = statusOf(summary);
      summary.durationSeconds = (performance.now() - startedAt) / 1000;
      summary.message = describeRun(summary);
      summary.runLog = await this.runLogger.record({
        runId,
        executedAt,
        source: summary.source,
        inserted: summary.load?.measurementsInserted ?? 0,
        updated: summary.load?.measurementsUpdated ?? 0,
        omitted: omittedCount(summary),
        durationSeconds: summary.durationSeconds,
        status: summary.status,
        message: summary.message,
        windowStart: window.from,
        windowEnd: window.to
      });
      this.observe(summary);
    }

    log.info({ status: summary.status, durationSeconds: summary.durationSeconds }, summary.message);
    return summary;
  }

  private async execute(
    summary: PipelineRunSummary,
    options: PipelineRunOptions,
    window: RunWindow,
    log: Logger
  ): Promise<void> {
    const { signal } = options;
    if (!this.store.isOpen()) {
      await this.store.open();
    }
    await this.runLogger.replayPending();
    checkSignal(signal, 'start');

    const requested = typeof options.window === 'function' ? options.window() : options.window;
    window.from = requested?.from ?? null;
    window.to = requested?.to ?? null;
    const { profiles, registry } = typeof this.resources === 'function' ? await this.resources() : this.resources;
    const loader =
      this.loader ??
      new Loader({
        store: this.store,
        registry,
        priority: this.config.pollutantPriority,
        logger: this.logger.child({ component: 'loader' })
      });

    const batch = typeof options.batch === 'function' ? await options.batch(signal) : options.batch;
    summary.source = batch.source;
    summary.inputRows = batch.rows.length;
    log.info({ source: batch.source, rows: batch.rows.length }, 'batch extracted');
    checkSignal(signal, 'extraction');

    const holder = `${os.hostname()}:${process.pid}:${summary.runId}`;
    const lease =
      this.config.lockMode === 'table'
        ? await this.store.acquireRunLock(RUN_LOCK_NAME, holder, this.config.lockTtlMs)
        : null;

    try {
      const reference = await this.store.readReferenceData();
      const normalized = normalizeRows(batch.rows, { profiles, reference });
      summary.normalized = normalized.rows.length;
      summary.rejected = normalized.rejected;
      summary.unparsableTimestamps = normalized.unparsableTimestamps;
      this.logRejections(normalized.rejected, log);
      if (normalized.unparsableTimestamps > 0) {
        log.warn({ count: normalized.unparsableTimestamps }, 'dropped rows with unparsable timestamps');
      }
      checkSignal(signal, 'normalization');

      const windowed = normalized.rows.filter((row) => inWindow(row, window));
      summary.outsideWindow = normalized.rows.length - windowed.length;

      const deduplicated = deduplicate(windowed);
      summary.duplicatesCollapsed = deduplicated.duplicatesCollapsed;

      const imputation = imputeGaps(deduplicated.rows, { maxGapHours: this.config.maxGapHours });
      summary.imputed = imputation.imputed;
      summary.discardedNulls = imputation.discardedNulls;
      summary.unfillable = imputation.unfillable;
      for (const gap of imputation.unfillable) {
        log.warn(
          {
            station: gap.stationCode,
            pollutant: gap.pollutantCode,
            firstMissing: bucketKey(gap.firstMissing),
            lastMissing: bucketKey(gap.lastMissing),
            missingHours: gap.missingHours
          },
          'gap too long to impute'
        );
      }
      log.info(
        {
          normalized: summary.normalized,
          outsideWindow: summary.outsideWindow,
          duplicatesCollapsed: summary.duplicatesCollapsed,
          imputed: summary.imputed
        },
        'batch transformed'
      );
      checkSignal(signal, 'imputation');

      summary.load = await loader.load(imputation.rows, { signal });
      summary.missingTables = summary.load.missingTables;
      if (summary.missingTables.length > 0) {
        log.warn({ pollutants: summary.missingTables }, 'no breakpoint table configured; omitted from the index');
      }
    } finally {
      if (lease) {
        await this.releaseLock(holder, log);
      }
    }
  }

  private async releaseLock(holder: string, log: Logger): Promise<void> {
    try {
      await this.store.releaseRunLock(RUN_LOCK_NAME, holder);
    } catch (error) {
      log.warn({ err: error }, 'failed to release run lock; it expires on its own');
    }
  }

  private logRejections(rejected: readonly RejectedRow[], log: Logger): void {
    for (const row of rejected.slice(0, MAX_LOGGED_REJECTIONS)) {
      log.warn(
        { source: row.source, rowIndex: row.rowIndex, column: row.column, field: row.error.field },
        row.error.message
      );
    }
    if (rejected.length > MAX_LOGGED_REJECTIONS) {
      log.warn({ omitted: rejected.length - MAX_LOGGED_REJECTIONS }, 'further rejected rows not logged');
    }
  }

  private observe(summary: PipelineRunSummary): void {
    if (!this.metrics) {
      return;
    }
    const labels = { source: summary.source };
    this.metrics.rowsNormalized.inc(labels, summary.normalized);
    this.metrics.rowsRejected.inc(labels, summary.rejected.length);
    this.metrics.timestampsDropped.inc(labels, summary.unparsableTimestamps);
    this.metrics.duplicatesCollapsed.inc(labels, summary.duplicatesCollapsed);
    this.metrics.rowsImputed.inc(labels, summary.imputed);
    this.metrics.gapsUnfillable.inc(labels, summary.unfillable.length);
    if (summary.load) {
      this.metrics.measurementsLoaded.inc({ operation: 'insert' }, summary.load.measurementsInserted);
      this.metrics.measurementsLoaded.inc({ operation: 'update' }, summary.load.measurementsUpdated);
      this.metrics.indicesLoaded.inc({ operation: 'insert' }, summary.load.indicesInserted);
      this.metrics.indicesLoaded.inc({ operation: 'update' }, summary.load.indicesUpdated);
      this.metrics.indicesLoaded.inc({ operation: 'delete' }, summary.load.indicesDeleted);
    }
    this.metrics.runs.inc({ status: summary.status });
    this.metrics.runDuration.observe({ status: summary.status }, summary.durationSeconds);
    this.metrics.lastRunTimestamp.set({ status: summary.status }, Date.now() / 1000);
  }
}
