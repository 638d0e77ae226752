import { SchemaMismatchError } from './errors';
import type { LongSourceProfile, Pollutant, SourceProfile, Station, WideSourceProfile } from './schema';
import { toTimeBucket } from './timeBucket';
import { parseTimestamp } from './timestamps';
import type { CanonicalMeasurement, RawRow, RejectedRow } from './types';
import { canonicalUnit, resolveConverter } from './units';

export interface ReferenceData {
  stations: Station[];
  pollutants: Pollutant[];
}

const matchKey = (label: string): string => label.trim().toUpperCase().replace(/[\s.,_-]+/g, '');

/** Case- and punctuation-insensitive lookup of stations and pollutants by code, name or alias. */
export class ReferenceIndex {
  private readonly stations = new Map<string, Station>();
  private readonly pollutants = new Map<string, Pollutant>();

  constructor(reference: ReferenceData) {
    for (const station of reference.stations) {
      for (const label of [station.code, station.name, ...station.aliases]) {
        this.stations.set(matchKey(label), station);
      }
    }
    for (const pollutant of reference.pollutants) {
      for (const label of [pollutant.code, pollutant.name, ...pollutant.aliases]) {
        this.pollutants.set(matchKey(label), pollutant);
      }
    }
  }

  resolveStation(label: string): Station | null {
    return this.stations.get(matchKey(label)) ?? null;
  }

  resolvePollutant(label: string): Pollutant | null {
    return this.pollutants.get(matchKey(label)) ?? null;
  }
}

/** Splits `O3 (ug/m3)` into `{ name: 'O3', unit: 'ug/m3' }`. */
export const splitPollutantLabel = (text: string): { name: string; unit: string | null } => {
  const match = /\((.*?)\)/.exec(text);
  const unit = match && match[1].trim() ? match[1].trim() : null;
  const name = text.replace(/\s*\(.*?\)/g, '').trim();
  return { name, unit };
};

export const parseMeasurementValue = (raw: unknown, nullTokens: readonly string[]): number | null => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string') {
    return null;
  }
  const text = raw.trim();
  if (nullTokens.some((token) => token.toLowerCase() === text.toLowerCase())) {
    return null;
  }
  const normalized = /^-?\d+,\d+$/.test(text) ? text.replace(',', '.') : text;
  if (!normalized) {
    return null;
  }
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
};

const readText = (fields: Record<string, unknown>, key: string): string | null => {
  const raw = fields[key];
  if (raw === undefined || raw === null) {
    return null;
  }
  const text = typeof raw === 'string' ? raw.trim() : String(raw);
  return text.length > 0 ? text : null;
};

export interface NormalizeOptions {
  profiles: readonly SourceProfile[];
  reference: ReferenceData;
}

export interface NormalizationResult {
  inputRows: number;
  rows: CanonicalMeasurement[];
  rejected: RejectedRow[];
  unparsableTimestamps: number;
}

interface RowContext {
  row: RawRow;
  rowIndex: number;
  index: ReferenceIndex;
  result: NormalizationResult;
}

const reject = (context: RowContext, error: SchemaMismatchError, column: string | null = null): void => {
  context.result.rejected.push({
    source: context.row.source,
    rowIndex: context.rowIndex,
    column,
    error
  });
};

const missingField = (field: string, source: string): SchemaMismatchError =>
  new SchemaMismatchError(`Required field "${field}" is missing from ${source} row`, field);

const resolveStationOrReject = (context: RowContext, label: string | null, field: string): Station | null => {
  if (!label) {
    reject(context, missingField(field, context.row.source));
    return null;
  }
  const station = context.index.resolveStation(label);
  if (!station) {
    reject(context, new SchemaMismatchError(`Unknown station ${label}`, field));
    return null;
  }
  return station;
};

const resolveTimestampOrSkip = (
  context: RowContext,
  raw: unknown,
  field: string,
  profile: SourceProfile
): Date | null => {
  if (raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '')) {
    reject(context, missingField(field, context.row.source));
    return null;
  }
  const parsed = parseTimestamp(raw, profile.timestampFormats);
  if (!parsed) {
    context.result.unparsableTimestamps += 1;
    return null;
  }
  return parsed;
};

const buildMeasurement = (
  context: RowContext,
  station: Station,
  pollutantLabel: string,
  explicitUnit: string | null,
  rawValue: unknown,
  observedAt: Date,
  profile: SourceProfile,
  column: string | null
): CanonicalMeasurement | null => {
  const { name, unit: labelUnit } = splitPollutantLabel(pollutantLabel);
  const pollutant = name ? context.index.resolvePollutant(name) : null;
  if (!pollutant) {
    reject(context, new SchemaMismatchError(`Unknown pollutant ${pollutantLabel}`, column ?? 'pollutant'), column);
    return null;
  }

  const sourceUnit = explicitUnit ?? labelUnit ?? pollutant.unit;
  let value = parseMeasurementValue(rawValue, profile.nullTokens);
  try {
    const convert = resolveConverter(sourceUnit, pollutant.unit, pollutant.molecularWeight);
    value = value === null ? null : convert(value);
  } catch (error) {
    if (error instanceof SchemaMismatchError) {
      reject(context, error, column);
      return null;
    }
    throw error;
  }

  return {
    stationCode: station.code,
    pollutantCode: pollutant.code,
    bucket: toTimeBucket(observedAt),
    observedAt,
    value,
    unit: canonicalUnit(pollutant.unit) ?? pollutant.unit,
    source: context.row.source,
    extractedAt: context.row.extractedAt,
    valueSource: 'observed'
  };
};

const normalizeLongRow = (context: RowContext, profile: LongSourceProfile): void => {
  const { fields } = context.row;
  const station = resolveStationOrReject(context, readText(fields, profile.fields.station), profile.fields.station);
  if (!station) {
    return;
  }

  const pollutantLabel = readText(fields, profile.fields.pollutant);
  if (!pollutantLabel) {
    reject(context, missingField(profile.fields.pollutant, context.row.source));
    return;
  }

  if (!(profile.fields.value in fields)) {
    reject(context, missingField(profile.fields.value, context.row.source));
    return;
  }

  const observedAt = resolveTimestampOrSkip(context, fields[profile.fields.timestamp], profile.fields.timestamp, profile);
  if (!observedAt) {
    return;
  }

  const unit = profile.fields.unit ? readText(fields, profile.fields.unit) : null;
  const measurement = buildMeasurement(
    context,
    station,
    pollutantLabel,
    unit,
    fields[profile.fields.value],
    observedAt,
    profile,
    null
  );
  if (measurement) {
    context.result.rows.push(measurement);
  }
};

const widePollutantColumns = (profile: WideSourceProfile, fields: Record<string, unknown>): Array<[string, string]> => {
  if (profile.pollutantColumns) {
    return Object.entries(profile.pollutantColumns);
  }
  const excluded = new Set([profile.timestampField, ...profile.ignoreColumns]);
  if ('column' in profile.station) {
    excluded.add(profile.station.column);
  }
  return Object.keys(fields)
    .filter((column) => !excluded.has(column))
    .map((column): [string, string] => [column, column]);
};

const normalizeWideRow = (context: RowContext, profile: WideSourceProfile): void => {
  const { fields } = context.row;
  const station =
    'fixed' in profile.station
      ? resolveStationOrReject(context, profile.station.fixed, 'station')
      : resolveStationOrReject(context, readText(fields, profile.station.column), profile.station.column);
  if (!station) {
    return;
  }

  const observedAt = resolveTimestampOrSkip(context, fields[profile.timestampField], profile.timestampField, profile);
  if (!observedAt) {
    return;
  }

  for (const [column, pollutantLabel] of widePollutantColumns(profile, fields)) {
    if (!(column in fields)) {
      continue;
    }
    const measurement = buildMeasurement(
      context,
      station,
      pollutantLabel,
      null,
      fields[column],
      observedAt,
      profile,
      column
    );
    if (measurement) {
      context.result.rows.push(measurement);
    }
  }
};

/**
 * Maps raw rows from heterogeneous feeds onto canonical measurements. Rows that cannot be
 * mapped are collected in `rejected`; rows whose timestamp cannot be parsed are dropped
 * and counted. Neither aborts the batch.
 */
export function normalizeRows(rows: readonly RawRow[], options: NormalizeOptions): NormalizationResult {
  const profiles = new Map(options.profiles.map((profile) => [profile.id, profile]));
  const index = new ReferenceIndex(options.reference);
  const result: NormalizationResult = {
    inputRows: rows.length,
    rows: [],
    rejected: [],
    unparsableTimestamps: 0
  };

  rows.forEach((row, rowIndex) => {
    const context: RowContext = { row, rowIndex, index, result };
    const profile = profiles.get(row.source);
    if (!profile) {
      reject(context, new SchemaMismatchError(`No source profile is configured for ${row.source}`, 'source'));
      return;
    }

    switch (profile.shape) {
      case 'long':
        normalizeLongRow(context, profile);
        break;
      case 'wide':
        normalizeWideRow(context, profile);
        break;
    }
  });

  return result;
}
