import { compareByKey } from './deduplicator';
import { bucketEpochHour, bucketFromEpochHour, bucketStart } from './timeBucket';
import type { CanonicalMeasurement, GapUnfillable } from './types';

export interface ImputationOptions {
  /** Longest run of consecutive missing hours that may be interpolated; 0 disables imputation. */
  maxGapHours: number;
}

export interface ImputationResult {
  rows: CanonicalMeasurement[];
  imputed: number;
  unfillable: GapUnfillable[];
  /** Null-valued rows that were not replaced by an imputed value. */
  discardedNulls: number;
}

const laterOf = (left: Date, right: Date): Date => (left.getTime() >= right.getTime() ? left : right);

/**
 * Fills short gaps of one (station, pollutant) series by linear interpolation between the
 * surrounding observed values. Never extrapolates past the first or last observation.
 */
export function imputeSeries(
  series: readonly CanonicalMeasurement[],
  options: ImputationOptions
): ImputationResult {
  const maxGapHours = Math.max(0, Math.floor(options.maxGapHours));
  const ordered = [...series].sort((left, right) => bucketEpochHour(left.bucket) - bucketEpochHour(right.bucket));
  const observed = ordered.filter((row) => row.value !== null);
  const nullHours = ordered.filter((row) => row.value === null).map((row) => bucketEpochHour(row.bucket));

  const rows: CanonicalMeasurement[] = [];
  const unfillable: GapUnfillable[] = [];
  const imputedHours = new Set<number>();

  observed.forEach((current, index) => {
    rows.push(current);
    const next = observed[index + 1];
    if (!next || current.value === null || next.value === null) {
      return;
    }

    const fromHour = bucketEpochHour(current.bucket);
    const toHour = bucketEpochHour(next.bucket);
    const missingHours = toHour - fromHour - 1;
    if (missingHours < 1) {
      return;
    }

    if (missingHours > maxGapHours) {
      unfillable.push({
        stationCode: current.stationCode,
        pollutantCode: current.pollutantCode,
        firstMissing: bucketFromEpochHour(fromHour + 1),
        lastMissing: bucketFromEpochHour(toHour - 1),
        missingHours
      });
      return;
    }

    const slope = (next.value - current.value) / (toHour - fromHour);
    for (let hour = fromHour + 1; hour < toHour; hour += 1) {
      const bucket = bucketFromEpochHour(hour);
      rows.push({
        ...current,
        bucket,
        observedAt: bucketStart(bucket),
        value: current.value + slope * (hour - fromHour),
        extractedAt: laterOf(current.extractedAt, next.extractedAt),
        valueSource: 'imputed'
      });
      imputedHours.add(hour);
    }
  });

  return {
    rows,
    imputed: imputedHours.size,
    unfillable,
    discardedNulls: nullHours.filter((hour) => !imputedHours.has(hour)).length
  };
}

const seriesKey = (row: CanonicalMeasurement): string => `${row.stationCode}|${row.pollutantCode}`;

/** Applies {@link imputeSeries} to every (station, pollutant) series of a deduplicated batch. */
export function imputeGaps(rows: readonly CanonicalMeasurement[], options: ImputationOptions): ImputationResult {
  const groups = new Map<string, CanonicalMeasurement[]>();
  for (const row of rows) {
    const key = seriesKey(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }

  const combined: ImputationResult = { rows: [], imputed: 0, unfillable: [], discardedNulls: 0 };
  for (const group of groups.values()) {
    const result = imputeSeries(group, options);
    for (const row of result.rows) {
      combined.rows.push(row);
    }
    combined.imputed += result.imputed;
    combined.unfillable.push(...result.unfillable);
    combined.discardedNulls += result.discardedNulls;
  }

  combined.rows.sort(compareByKey);
  combined.unfillable.sort(
    (left, right) =>
      left.stationCode.localeCompare(right.stationCode) ||
      left.pollutantCode.localeCompare(right.pollutantCode) ||
      bucketEpochHour(left.firstMissing) - bucketEpochHour(right.firstMissing)
  );
  return combined;
}
