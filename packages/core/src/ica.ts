import { BreakpointTableMissingError, ConfigurationError } from './errors';
import type { BreakpointConfig, BreakpointTable, IcaCategory, Pollutant } from './schema';
import { bucketEpochHour, bucketKey } from './timeBucket';
import type { IcaRecord, IndexInput, TimeBucket } from './types';
import { resolveConverter, type ConcentrationConverter } from './units';

export const MAX_SUB_INDEX = 500;

export const DEFAULT_POLLUTANT_PRIORITY = ['PM2.5', 'PM10', 'O3', 'NO2', 'CO', 'SO2', 'H2S'] as const;

export class BreakpointRegistry {
  private readonly tables = new Map<string, BreakpointTable>();
  private readonly categories: IcaCategory[];

  constructor(config: BreakpointConfig) {
    for (const table of config.tables) {
      this.tables.set(table.pollutant, table);
    }
    this.categories = [...config.categories].sort((left, right) => left.min - right.min);
  }

  get(pollutantCode: string): BreakpointTable | undefined {
    return this.tables.get(pollutantCode);
  }

  require(pollutantCode: string): BreakpointTable {
    const table = this.tables.get(pollutantCode);
    if (!table) {
      throw new BreakpointTableMissingError(pollutantCode);
    }
    return table;
  }

  pollutants(): string[] {
    return Array.from(this.tables.keys()).sort();
  }

  categoryFor(index: number): IcaCategory | null {
    return this.categories.find((category) => index >= category.min && index <= category.max) ?? null;
  }
}

/**
 * Piecewise-linear sub-index of a concentration, rounded to the nearest integer.
 * Band edges are inclusive. A value between two bands' edges is read against the upper
 * band and clamped into its index range; values under the first floor take the lowest
 * sub-index and values over the last ceiling take {@link MAX_SUB_INDEX}.
 */
export function computeSubIndex(concentration: number, table: BreakpointTable): number {
  if (!Number.isFinite(concentration)) {
    throw new RangeError(`Concentration for ${table.pollutant} must be a finite number`);
  }

  const first = table.bands[0];
  const last = table.bands[table.bands.length - 1];
  if (concentration < first.concentrationLow) {
    return first.indexLow;
  }
  if (concentration > last.concentrationHigh) {
    return MAX_SUB_INDEX;
  }

  const band = table.bands.find((candidate) => concentration <= candidate.concentrationHigh) ?? last;
  const raw =
    band.indexLow +
    ((concentration - band.concentrationLow) * (band.indexHigh - band.indexLow)) /
      (band.concentrationHigh - band.concentrationLow);
  return Math.min(band.indexHigh, Math.max(band.indexLow, Math.round(raw)));
}

export const computeSubIndexFor = (
  registry: BreakpointRegistry,
  pollutantCode: string,
  concentration: number
): number => computeSubIndex(concentration, registry.require(pollutantCode));

const priorityRank = (priority: readonly string[], pollutantCode: string): number => {
  const rank = priority.indexOf(pollutantCode);
  return rank === -1 ? priority.length : rank;
};

/** Orders pollutants by the configured priority; unlisted pollutants follow alphabetically. */
export const comparePriority = (priority: readonly string[], left: string, right: string): number =>
  priorityRank(priority, left) - priorityRank(priority, right) || left.localeCompare(right);

export interface DominantPollutant {
  pollutantCode: string;
  index: number;
}

export function selectDominant(
  subIndices: Readonly<Record<string, number>>,
  priority: readonly string[] = DEFAULT_POLLUTANT_PRIORITY
): DominantPollutant | null {
  let dominant: DominantPollutant | null = null;
  for (const [pollutantCode, index] of Object.entries(subIndices)) {
    if (
      !dominant ||
      index > dominant.index ||
      (index === dominant.index && comparePriority(priority, pollutantCode, dominant.pollutantCode) < 0)
    ) {
      dominant = { pollutantCode, index };
    }
  }
  return dominant;
}

export interface IcaCalculationOptions {
  registry: BreakpointRegistry;
  priority?: readonly string[];
  /**
   * Pollutants whose unit the input values are expressed in. Values are converted into
   * each breakpoint table's unit; without an entry they are read in the table's unit.
   */
  pollutants?: readonly Pollutant[];
}

const identity: ConcentrationConverter = (value) => value;

/** Converter from a pollutant's unit into the unit its breakpoint table is written in. */
export function resolveTableConverter(table: BreakpointTable, pollutant: Pollutant | undefined): ConcentrationConverter {
  if (!pollutant) {
    return identity;
  }
  try {
    return resolveConverter(pollutant.unit, table.unit, pollutant.molecularWeight);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Breakpoint table for ${table.pollutant} is in ${table.unit} but ${pollutant.code} is measured in ${pollutant.unit}: ${reason}`
    );
  }
}

export interface IcaCalculationResult {
  records: IcaRecord[];
  /** Pollutants present in the input that have no breakpoint table, omitted from aggregation. */
  missingTables: string[];
}

interface BucketGroup {
  stationCode: string;
  bucket: TimeBucket;
  subIndices: Map<string, number>;
}

/**
 * Derives one IcaRecord per station and time bucket from the measurements given. A bucket
 * without any computable sub-index yields no record.
 */
export function calculateIcaRecords(
  measurements: readonly IndexInput[],
  options: IcaCalculationOptions
): IcaCalculationResult {
  const priority = options.priority ?? DEFAULT_POLLUTANT_PRIORITY;
  const groups = new Map<string, BucketGroup>();
  const missingTables = new Set<string>();
  const pollutants = new Map((options.pollutants ?? []).map((pollutant) => [pollutant.code, pollutant]));
  const converters = new Map<string, ConcentrationConverter>();

  for (const measurement of measurements) {
    if (measurement.value === null) {
      continue;
    }
    const table = options.registry.get(measurement.pollutantCode);
    if (!table) {
      missingTables.add(measurement.pollutantCode);
      continue;
    }

    const key = `${measurement.stationCode}|${bucketKey(measurement.bucket)}`;
    let group = groups.get(key);
    if (!group) {
      group = { stationCode: measurement.stationCode, bucket: measurement.bucket, subIndices: new Map() };
      groups.set(key, group);
    }
    let convert = converters.get(table.pollutant);
    if (!convert) {
      convert = resolveTableConverter(table, pollutants.get(measurement.pollutantCode));
      converters.set(table.pollutant, convert);
    }
    const subIndex = computeSubIndex(convert(measurement.value), table);
    const previous = group.subIndices.get(measurement.pollutantCode);
    group.subIndices.set(measurement.pollutantCode, previous === undefined ? subIndex : Math.max(previous, subIndex));
  }

  const records: IcaRecord[] = [];
  for (const group of groups.values()) {
    const ordered = Array.from(group.subIndices.entries()).sort(([left], [right]) =>
      comparePriority(priority, left, right)
    );
    const subIndices = Object.fromEntries(ordered);
    const dominant = selectDominant(subIndices, priority);
    if (!dominant) {
      continue;
    }
    records.push({
      stationCode: group.stationCode,
      bucket: group.bucket,
      overallIndex: dominant.index,
      dominantPollutant: dominant.pollutantCode,
      category: options.registry.categoryFor(dominant.index)?.name ?? null,
      subIndices
    });
  }

  records.sort(
    (left, right) =>
      left.stationCode.localeCompare(right.stationCode) || bucketEpochHour(left.bucket) - bucketEpochHour(right.bucket)
  );

  return { records, missingTables: Array.from(missingTables).sort() };
}
