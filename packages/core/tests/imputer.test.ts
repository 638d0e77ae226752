import assert from 'node:assert/strict';
import { test } from 'node:test';

import { bucketKey, imputeGaps, imputeSeries } from '../src';
import { measurementAt } from './fixtures';

test('interpolates gaps up to the configured length', () => {
  const result = imputeSeries([measurementAt(0, 10), measurementAt(3, 40)], { maxGapHours: 3 });

  assert.equal(result.imputed, 2);
  assert.deepEqual(
    result.rows.map((row) => [bucketKey(row.bucket), row.value, row.valueSource]),
    [
      ['2024-03-01T00', 10, 'observed'],
      ['2024-03-01T01', 20, 'imputed'],
      ['2024-03-01T02', 30, 'imputed'],
      ['2024-03-01T03', 40, 'observed']
    ]
  );
  assert.equal(result.rows[1].observedAt.toISOString(), '2024-03-01T01:00:00.000Z');
  assert.deepEqual(result.unfillable, []);
});

test('reports gaps longer than the limit without filling them', () => {
  const result = imputeSeries([measurementAt(0, 10), measurementAt(5, 60)], { maxGapHours: 3 });

  assert.equal(result.imputed, 0);
  assert.equal(result.rows.length, 2);
  assert.deepEqual(result.unfillable, [
    {
      stationCode: 'PANCE',
      pollutantCode: 'PM10',
      firstMissing: { year: 2024, month: 3, day: 1, hour: 1 },
      lastMissing: { year: 2024, month: 3, day: 1, hour: 4 },
      missingHours: 4
    }
  ]);
});

test('never extrapolates before the first or after the last observation', () => {
  const result = imputeSeries(
    [
      measurementAt(0, null),
      measurementAt(1, 10),
      measurementAt(2, null),
      measurementAt(3, 20),
      measurementAt(4, null)
    ],
    { maxGapHours: 3 }
  );

  assert.deepEqual(
    result.rows.map((row) => [row.bucket.hour, row.value]),
    [
      [1, 10],
      [2, 15],
      [3, 20]
    ]
  );
  assert.equal(result.imputed, 1);
  assert.equal(result.discardedNulls, 2);
});

test('does not impute when the limit is zero', () => {
  const result = imputeSeries([measurementAt(0, 10), measurementAt(2, 30)], { maxGapHours: 0 });

  assert.equal(result.imputed, 0);
  assert.equal(result.rows.length, 2);
  assert.equal(result.unfillable.length, 1);
  assert.equal(result.unfillable[0].missingHours, 1);
});

test('stamps imputed rows with the later extraction of their neighbours', () => {
  const early = new Date('2024-03-01T12:00:00Z');
  const late = new Date('2024-03-02T12:00:00Z');
  const result = imputeSeries(
    [measurementAt(0, 10, { extractedAt: late }), measurementAt(2, 30, { extractedAt: early })],
    { maxGapHours: 3 }
  );

  assert.equal(result.rows[1].valueSource, 'imputed');
  assert.equal(result.rows[1].extractedAt, late);
});

test('imputes each station and pollutant series independently', () => {
  const result = imputeGaps(
    [
      measurementAt(0, 10),
      measurementAt(2, 20),
      measurementAt(0, 1, { stationCode: 'ERMITA' }),
      measurementAt(6, 7, { stationCode: 'ERMITA' })
    ],
    { maxGapHours: 3 }
  );

  assert.equal(result.imputed, 1);
  assert.deepEqual(
    result.rows.map((row) => `${row.stationCode}@${row.bucket.hour}=${String(row.value)}`),
    ['ERMITA@0=1', 'ERMITA@6=7', 'PANCE@0=10', 'PANCE@1=15', 'PANCE@2=20']
  );
  assert.equal(result.unfillable.length, 1);
  assert.equal(result.unfillable[0].stationCode, 'ERMITA');
  assert.equal(result.unfillable[0].missingHours, 5);
});
