import assert from 'node:assert/strict';
import { test } from 'node:test';

import { SchemaMismatchError, canonicalUnit, convertConcentration, resolveConverter } from '../src';

test('canonicalizes unit spellings', () => {
  assert.equal(canonicalUnit('ug/m3'), 'µg/m³');
  assert.equal(canonicalUnit(' µg/m³ '), 'µg/m³');
  assert.equal(canonicalUnit('PPM'), 'ppm');
  assert.equal(canonicalUnit('furlongs'), null);
});

test('scales within a unit family', () => {
  assert.equal(convertConcentration(1, 'mg/m3', 'µg/m³'), 1000);
  assert.equal(convertConcentration(2, 'ppm', 'ppb'), 2000);
  assert.equal(convertConcentration(17, 'ug/m3', 'µg/m³'), 17);
});

test('crosses between mass and volume units with a molecular weight', () => {
  const sulfurDioxide = convertConcentration(10, 'ppb', 'ug/m3', 64.07);
  assert.ok(Math.abs(sulfurDioxide - 26.2045) < 1e-4);

  const roundTrip = convertConcentration(sulfurDioxide, 'ug/m3', 'ppb', 64.07);
  assert.ok(Math.abs(roundTrip - 10) < 1e-9);
});

test('rejects unknown units and missing molecular weights', () => {
  assert.throws(() => resolveConverter('furlongs', 'ppb'), SchemaMismatchError);
  assert.throws(
    () => resolveConverter('ppm', 'ug/m3'),
    (error: unknown) =>
      error instanceof SchemaMismatchError && error.message === 'Converting ppm to µg/m³ requires a molecular weight'
  );
});
