import { writeFile } from 'node:fs/promises';

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface EtlMetrics {
  register: Registry;
  rowsNormalized: Counter<'source'>;
  rowsRejected: Counter<'source'>;
  timestampsDropped: Counter<'source'>;
  duplicatesCollapsed: Counter<'source'>;
  rowsImputed: Counter<'source'>;
  gapsUnfillable: Counter<'source'>;
  measurementsLoaded: Counter<'operation'>;
  indicesLoaded: Counter<'operation'>;
  runs: Counter<'status'>;
  runDuration: Histogram<'status'>;
  lastRunTimestamp: Gauge<'status'>;
}

export const createMetrics = (): EtlMetrics => {
  const register = new Registry();

  const rowsNormalized = new Counter({
    name: 'airq_etl_rows_normalized_total',
    help: 'Canonical measurements produced by the normalizer',
    registers: [register],
    labelNames: ['source'] as const
  });

  const rowsRejected = new Counter({
    name: 'airq_etl_rows_rejected_total',
    help: 'Raw rows or cells rejected for a schema mismatch',
    registers: [register],
    labelNames: ['source'] as const
  });

  const timestampsDropped = new Counter({
    name: 'airq_etl_timestamps_dropped_total',
    help: 'Raw rows dropped because their timestamp could not be parsed',
    registers: [register],
    labelNames: ['source'] as const
  });

  const duplicatesCollapsed = new Counter({
    name: 'airq_etl_duplicates_collapsed_total',
    help: 'Observations discarded while collapsing duplicates',
    registers: [register],
    labelNames: ['source'] as const
  });

  const rowsImputed = new Counter({
    name: 'airq_etl_rows_imputed_total',
    help: 'Hourly values filled by linear interpolation',
    registers: [register],
    labelNames: ['source'] as const
  });

  const gapsUnfillable = new Counter({
    name: 'airq_etl_gaps_unfillable_total',
    help: 'Gaps longer than the imputation limit',
    registers: [register],
    labelNames: ['source'] as const
  });

  const measurementsLoaded = new Counter({
    name: 'airq_etl_measurements_loaded_total',
    help: 'Measurement rows written to the store',
    registers: [register],
    labelNames: ['operation'] as const
  });

  const indicesLoaded = new Counter({
    name: 'airq_etl_indices_loaded_total',
    help: 'ICA rows written to or removed from the store',
    registers: [register],
    labelNames: ['operation'] as const
  });

  const runs = new Counter({
    name: 'airq_etl_runs_total',
    help: 'Pipeline runs by outcome',
    registers: [register],
    labelNames: ['status'] as const
  });

  const runDuration = new Histogram({
    name: 'airq_etl_run_duration_seconds',
    help: 'Wall-clock duration of pipeline runs',
    registers: [register],
    labelNames: ['status'] as const,
    buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60, 300]
  });

  const lastRunTimestamp = new Gauge({
    name: 'airq_etl_last_run_timestamp_seconds',
    help: 'Unix time at which the last run finished',
    registers: [register],
    labelNames: ['status'] as const
  });

  return {
    register,
    rowsNormalized,
    rowsRejected,
    timestampsDropped,
    duplicatesCollapsed,
    rowsImputed,
    gapsUnfillable,
    measurementsLoaded,
    indicesLoaded,
    runs,
    runDuration,
    lastRunTimestamp
  };
};

/** Writes the registry in the Prometheus text exposition format, for node_exporter's textfile collector. */
export const writeMetricsTextfile = async (metrics: EtlMetrics, filePath: string): Promise<void> => {
  await writeFile(filePath, await metrics.register.metrics(), 'utf8');
};
