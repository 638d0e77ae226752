import { bucketEpochHour, bucketKey } from './timeBucket';
import type { CanonicalMeasurement } from './types';

export const measurementKey = (row: Pick<CanonicalMeasurement, 'stationCode' | 'pollutantCode' | 'bucket'>): string =>
  `${row.stationCode}|${row.pollutantCode}|${bucketKey(row.bucket)}`;

const compareStrings = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

/**
 * Orders two observations of the same key; a negative result means `left` wins.
 * Most recent extraction first, then non-null over null, then the smaller source label,
 * then the larger value, then the later observation time.
 */
export const comparePrecedence = (left: CanonicalMeasurement, right: CanonicalMeasurement): number => {
  const extracted = right.extractedAt.getTime() - left.extractedAt.getTime();
  if (extracted !== 0) {
    return extracted;
  }

  if ((left.value === null) !== (right.value === null)) {
    return left.value === null ? 1 : -1;
  }

  const source = compareStrings(left.source, right.source);
  if (source !== 0) {
    return source;
  }

  if (left.value !== null && right.value !== null && left.value !== right.value) {
    return right.value - left.value;
  }

  return right.observedAt.getTime() - left.observedAt.getTime();
};

export const compareByKey = (left: CanonicalMeasurement, right: CanonicalMeasurement): number =>
  compareStrings(left.stationCode, right.stationCode) ||
  compareStrings(left.pollutantCode, right.pollutantCode) ||
  bucketEpochHour(left.bucket) - bucketEpochHour(right.bucket);

export interface DeduplicationResult {
  rows: CanonicalMeasurement[];
  duplicatesCollapsed: number;
}

/** Collapses observations sharing (station, pollutant, bucket) to a single row per key. */
export function deduplicate(rows: readonly CanonicalMeasurement[]): DeduplicationResult {
  const winners = new Map<string, CanonicalMeasurement>();

  for (const row of rows) {
    const key = measurementKey(row);
    const current = winners.get(key);
    if (!current || comparePrecedence(row, current) < 0) {
      winners.set(key, row);
    }
  }

  return {
    rows: Array.from(winners.values()).sort(compareByKey),
    duplicatesCollapsed: rows.length - winners.size
  };
}
