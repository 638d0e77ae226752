import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  BreakpointRegistry,
  BreakpointTableMissingError,
  ConfigurationError,
  calculateIcaRecords,
  computeSubIndex,
  computeSubIndexFor,
  selectDominant,
  type IndexInput,
  type Pollutant
} from '../src';
import { breakpoints, pollutants } from './fixtures';

const registry = new BreakpointRegistry(breakpoints);
const pm25 = registry.require('PM2.5');

const input = (pollutantCode: string, value: number | null, hour = 8, stationCode = 'PANCE'): IndexInput => ({
  stationCode,
  pollutantCode,
  bucket: { year: 2024, month: 3, day: 1, hour },
  value
});

test('reads band edges inclusively', () => {
  assert.equal(computeSubIndex(0, pm25), 0);
  assert.equal(computeSubIndex(12.0, pm25), 50);
  assert.equal(computeSubIndex(35.4, pm25), 100);
  assert.equal(computeSubIndex(35.5, pm25), 101);
  assert.equal(computeSubIndex(55.4, pm25), 150);
});

test('clamps values between bands into the upper band', () => {
  assert.equal(computeSubIndex(12.05, pm25), 51);
});

test('clamps values outside the table', () => {
  assert.equal(computeSubIndex(-1, pm25), 0);
  assert.equal(computeSubIndex(600, pm25), 500);
  assert.throws(() => computeSubIndex(Number.NaN, pm25), RangeError);
});

test('is monotonically non-decreasing in the concentration', () => {
  const pm10 = registry.require('PM10');
  let previous = -1;
  for (let concentration = 0; concentration <= 700; concentration += 0.5) {
    const subIndex = computeSubIndex(concentration, pm10);
    assert.ok(subIndex >= previous, `sub-index dropped at ${concentration}`);
    previous = subIndex;
  }
});

test('fails for pollutants without a breakpoint table', () => {
  assert.throws(
    () => computeSubIndexFor(registry, 'H2S', 10),
    (error: unknown) => error instanceof BreakpointTableMissingError && error.pollutantCode === 'H2S'
  );
});

test('selects the maximum sub-index as the dominant pollutant', () => {
  assert.deepEqual(selectDominant({ 'PM2.5': 120, PM10: 80, O3: 95 }), { pollutantCode: 'PM2.5', index: 120 });
});

test('breaks ties by pollutant priority', () => {
  assert.deepEqual(selectDominant({ O3: 100, PM10: 100 }), { pollutantCode: 'PM10', index: 100 });
  assert.deepEqual(selectDominant({ O3: 100, PM10: 100 }, ['O3', 'PM10']), { pollutantCode: 'O3', index: 100 });
  assert.equal(selectDominant({}), null);
});

test('aggregates one record per station and hour', () => {
  const result = calculateIcaRecords(
    [
      input('O3', 0.06),
      input('PM10', 100),
      input('PM2.5', 35.4),
      input('H2S', 12),
      input('PM10', null, 9),
      input('PM10', 20, 7, 'ERMITA')
    ],
    { registry }
  );

  assert.deepEqual(result.missingTables, ['H2S']);
  assert.equal(result.records.length, 2);

  const [ermita, pance] = result.records;
  assert.equal(ermita.stationCode, 'ERMITA');
  assert.equal(ermita.overallIndex, 19);
  assert.equal(ermita.category, 'Buena');

  assert.equal(pance.stationCode, 'PANCE');
  assert.deepEqual(pance.bucket, { year: 2024, month: 3, day: 1, hour: 8 });
  assert.deepEqual(pance.subIndices, { 'PM2.5': 100, PM10: 73, O3: 67 });
  assert.deepEqual(Object.keys(pance.subIndices), ['PM2.5', 'PM10', 'O3']);
  assert.equal(pance.overallIndex, 100);
  assert.equal(pance.dominantPollutant, 'PM2.5');
  assert.equal(pance.category, 'Moderada');
});

test('emits no record for a bucket with only unindexable pollutants', () => {
  const result = calculateIcaRecords([input('H2S', 40), input('PM10', null)], { registry });

  assert.deepEqual(result.records, []);
  assert.deepEqual(result.missingTables, ['H2S']);
});

test('maps indices to categories', () => {
  assert.equal(registry.categoryFor(150)?.name, 'Dañina a grupos sensibles');
  assert.equal(registry.categoryFor(500)?.color, '#7e0023');
  assert.deepEqual(registry.pollutants(), ['O3', 'PM10', 'PM2.5']);
});

test('converts values into the unit of the breakpoint table', () => {
  const ozoneByMass: Pollutant = {
    code: 'O3',
    name: 'Ozone',
    unit: 'µg/m³',
    limitValue: 100,
    molecularWeight: 48,
    aliases: []
  };

  const result = calculateIcaRecords([input('O3', 60)], { registry, pollutants: [ozoneByMass] });

  assert.equal(result.records.length, 1);
  assert.deepEqual(result.records[0].subIndices, { O3: 28 });
  assert.equal(result.records[0].category, 'Buena');
});

test('reads values unchanged when the pollutant shares the table unit', () => {
  const result = calculateIcaRecords([input('PM2.5', 35.4), input('O3', 0.06)], { registry, pollutants });

  assert.deepEqual(result.records[0].subIndices, { 'PM2.5': 100, O3: 67 });
});

test('refuses a table whose unit the pollutant cannot be converted to', () => {
  const ozoneWithoutWeight: Pollutant = { code: 'O3', name: 'Ozone', unit: 'µg/m³', limitValue: 100, aliases: [] };

  assert.throws(
    () => calculateIcaRecords([input('O3', 60)], { registry, pollutants: [ozoneWithoutWeight] }),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message ===
        'Breakpoint table for O3 is in ppm but O3 is measured in µg/m³: Converting µg/m³ to ppm requires a molecular weight'
  );
});
