import type { SchemaMismatchError } from './errors';

export type ValueSource = 'observed' | 'imputed';

/** Hourly granularity at which measurements and indices are keyed (UTC wall clock). */
export interface TimeBucket {
  year: number;
  month: number;
  day: number;
  hour: number;
}

export interface RawRow {
  source: string;
  extractedAt: Date;
  fields: Record<string, unknown>;
}

export interface CanonicalMeasurement {
  stationCode: string;
  pollutantCode: string;
  bucket: TimeBucket;
  observedAt: Date;
  value: number | null;
  unit: string;
  source: string;
  extractedAt: Date;
  valueSource: ValueSource;
}

/** The slice of a measurement the index calculator reads. */
export type IndexInput = Pick<CanonicalMeasurement, 'stationCode' | 'pollutantCode' | 'bucket' | 'value'>;

export interface IcaRecord {
  stationCode: string;
  bucket: TimeBucket;
  overallIndex: number;
  dominantPollutant: string;
  category: string | null;
  subIndices: Record<string, number>;
}

export interface RejectedRow {
  source: string;
  rowIndex: number;
  column: string | null;
  error: SchemaMismatchError;
}

export interface GapUnfillable {
  stationCode: string;
  pollutantCode: string;
  firstMissing: TimeBucket;
  lastMissing: TimeBucket;
  missingHours: number;
}
