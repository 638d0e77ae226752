import type { TimeBucket } from './types';

export const HOUR_MS = 60 * 60 * 1000;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

const weekdayFormatter = new Intl.DateTimeFormat('en-US', { weekday: 'long', timeZone: 'UTC' });
const monthFormatter = new Intl.DateTimeFormat('en-US', { month: 'long', timeZone: 'UTC' });

export const toTimeBucket = (date: Date): TimeBucket => ({
  year: date.getUTCFullYear(),
  month: date.getUTCMonth() + 1,
  day: date.getUTCDate(),
  hour: date.getUTCHours()
});

export const bucketStart = (bucket: TimeBucket): Date =>
  new Date(Date.UTC(bucket.year, bucket.month - 1, bucket.day, bucket.hour));

export const bucketEpochHour = (bucket: TimeBucket): number => Math.floor(bucketStart(bucket).getTime() / HOUR_MS);

export const bucketFromEpochHour = (epochHour: number): TimeBucket => toTimeBucket(new Date(epochHour * HOUR_MS));

/** `YYYY-MM-DDTHH`, sortable lexicographically. */
export const bucketKey = (bucket: TimeBucket): string =>
  `${pad(bucket.year, 4)}-${pad(bucket.month)}-${pad(bucket.day)}T${pad(bucket.hour)}`;

export const compareBuckets = (left: TimeBucket, right: TimeBucket): number =>
  bucketEpochHour(left) - bucketEpochHour(right);

export interface TimeBucketAttributes {
  date: string;
  datetime: string;
  weekday: string;
  monthName: string;
  quarter: number;
}

export const describeBucket = (bucket: TimeBucket): TimeBucketAttributes => {
  const start = bucketStart(bucket);
  const date = `${pad(bucket.year, 4)}-${pad(bucket.month)}-${pad(bucket.day)}`;
  return {
    date,
    datetime: `${date} ${pad(bucket.hour)}:00:00`,
    weekday: weekdayFormatter.format(start),
    monthName: monthFormatter.format(start),
    quarter: Math.floor((bucket.month - 1) / 3) + 1
  };
};
