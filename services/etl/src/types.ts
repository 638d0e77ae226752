export type RunStatus = 'success' | 'partial' | 'error';

export interface RunWindow {
  from: Date | null;
  to: Date | null;
}

/** One row of `etl_log`. */
export interface RunLogEntry {
  runId: string;
  executedAt: Date;
  source: string;
  inserted: number;
  updated: number;
  omitted: number;
  durationSeconds: number;
  status: RunStatus;
  message: string;
  windowStart: Date | null;
  windowEnd: Date | null;
}

export interface StoredRunLog extends RunLogEntry {
  id: number;
}

export interface UpsertCounts {
  inserted: number;
  updated: number;
}
