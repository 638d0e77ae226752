import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { ConfigurationError } from '@airq/core';

import { createProgram } from '../src';
import { createTempDir, logger, pancePm } from './helpers';

interface CliHarness {
  databasePath: string;
  dir: string;
  out: string[];
  err: string[];
  cli(...args: string[]): Promise<void>;
}

const setup = async (t: TestContext, env: NodeJS.ProcessEnv = {}): Promise<CliHarness> => {
  const dir = await createTempDir(t, 'airq-cli-test-');
  const databasePath = path.join(dir, 'airq.db');
  const out: string[] = [];
  const err: string[] = [];
  const cli = async (...args: string[]): Promise<void> => {
    out.length = 0;
    err.length = 0;
    const program = createProgram({
      env: { ...env, AIRQ_LOG_LEVEL: 'silent' },
      io: { log: (line) => out.push(line), error: (line) => err.push(line) },
      logger
    });
    await program.parseAsync(['--database', databasePath, ...args], { from: 'user' });
  };
  t.after(() => {
    process.exitCode = undefined;
  });
  return { databasePath, dir, out, err, cli };
};

test('initializes and seeds the database', async (t) => {
  const { databasePath, out, cli } = await setup(t);

  await cli('init-db');
  assert.deepEqual(out, [
    `Database ready at ${databasePath}`,
    'Applied migrations: 001_create_dimensional_model, 002_create_run_lock, 003_create_reporting_views'
  ]);

  await cli('init-db');
  assert.deepEqual(out, [`Database ready at ${databasePath}`, 'Schema is up to date']);

  await cli('seed');
  assert.deepEqual(out, ['Stations: 4 inserted, 0 updated', 'Pollutants: 7 inserted, 0 updated']);

  await cli('seed');
  assert.deepEqual(out, ['Stations: 0 inserted, 4 updated', 'Pollutants: 0 inserted, 7 updated']);
});

test('runs a batch file and reports on it', async (t) => {
  const { dir, out, cli } = await setup(t);
  const input = path.join(dir, 'batch.json');
  const metricsFile = path.join(dir, 'airq.prom');
  await writeFile(input, JSON.stringify({ source: 'mediciones', extractedAt: '2024-03-02T00:00:00Z', rows: pancePm() }));

  await cli('seed');
  await cli('run', '--input', input, '--metrics-file', metricsFile);
  assert.equal(out.length, 2);
  assert.match(out[0], /^Run \S+ finished with status success$/);
  assert.equal(out[1], '3 raw rows read; 3 normalized; 4 inserted; 0 updated; 1 value imputed');
  assert.equal(process.exitCode, undefined);

  const metrics = await readFile(metricsFile, 'utf8');
  assert.ok(metrics.split('\n').includes('airq_etl_runs_total{status="success"} 1'));

  await cli('report', 'ica', '--station', 'PANCE');
  assert.deepEqual(out, [
    '2024-03-01 08:00:00  100  PM2.5  Moderada',
    '2024-03-01 09:00:00   63  PM10   Moderada',
    '2024-03-01 10:00:00   53  PM10   Moderada'
  ]);

  await cli('report', 'kpis', '--station', 'PANCE', '--from', '01/03/2024');
  assert.deepEqual(out, [
    'PM10   mean 80 µg/m³  max 100 µg/m³  limit 106.7%  trend —',
    'PM2.5  mean 35.4 µg/m³  max 35.4 µg/m³  limit 95.7%  trend —'
  ]);

  await cli('report', 'runs', '--json');
  const runs: unknown = JSON.parse(out.join('\n'));
  assert.ok(Array.isArray(runs));
  assert.equal(runs.length, 1);
});

test('exits with a failure code when the run fails', async (t) => {
  const { dir, out, cli } = await setup(t);

  await cli('seed');
  await cli('run', '--input', path.join(dir, 'missing.json'), '--source', 'mediciones');

  assert.equal(process.exitCode, 1);
  assert.match(out[0], /^Run \S+ finished with status error$/);
  assert.ok(out[1].startsWith('Run failed [ENOENT]: ENOENT: no such file or directory'));

  await cli('report', 'runs', '--json');
  const runs: unknown = JSON.parse(out.join('\n'));
  assert.ok(Array.isArray(runs));
  assert.equal(runs.length, 1);
});

test('rejects malformed options', async (t) => {
  const { cli } = await setup(t);

  await assert.rejects(cli('report', 'runs', '--limit', 'ten'), ConfigurationError);
  await assert.rejects(cli('report', 'ica', '--station', 'PANCE', '--from', 'yesterday'), ConfigurationError);
});

test('prints the station when it has no data', async (t) => {
  const { out, cli } = await setup(t);

  await cli('seed');
  await cli('report', 'kpis', '--station', 'FLORA');
  assert.deepEqual(out, ['No measurements for FLORA']);
});

test('logs the run when a resource file is invalid', async (t) => {
  const dir = await createTempDir(t, 'airq-cli-resources-');
  const breakpointsFile = path.join(dir, 'breakpoints.json');
  await writeFile(breakpointsFile, JSON.stringify({ tables: 'nope' }));
  const { out, cli } = await setup(t, { AIRQ_BREAKPOINTS_FILE: breakpointsFile });
  const input = path.join(dir, 'batch.json');
  await writeFile(input, JSON.stringify({ source: 'mediciones', extractedAt: '2024-03-02T00:00:00Z', rows: pancePm() }));

  await cli('seed');
  await cli('run', '--input', input);

  assert.equal(process.exitCode, 1);
  assert.match(out[0], /^Run \S+ finished with status error$/);
  assert.ok(out[1].startsWith(`Run failed [INVALID_CONFIGURATION]: ${breakpointsFile} failed validation`));

  await cli('report', 'runs', '--json');
  const runs: unknown = JSON.parse(out.join('\n'));
  assert.ok(Array.isArray(runs));
  assert.equal(runs.length, 1);
});

test('logs the run when the window option is malformed', async (t) => {
  const { dir, out, cli } = await setup(t);
  const input = path.join(dir, 'batch.json');
  await writeFile(input, JSON.stringify({ source: 'mediciones', extractedAt: '2024-03-02T00:00:00Z', rows: pancePm() }));

  await cli('seed');
  await cli('run', '--input', input, '--from', 'soon');

  assert.equal(process.exitCode, 1);
  assert.equal(out[1], 'Run failed [INVALID_CONFIGURATION]: --from must be an ISO-8601 or DD/MM/YYYY timestamp, got soon');
});

test('keeps the run status when the metrics file cannot be written', async (t) => {
  const { dir, out, err, cli } = await setup(t);
  const input = path.join(dir, 'batch.json');
  const metricsFile = path.join(dir, 'missing', 'airq.prom');
  await writeFile(input, JSON.stringify({ source: 'mediciones', extractedAt: '2024-03-02T00:00:00Z', rows: pancePm() }));

  await cli('seed');
  await cli('run', '--input', input, '--metrics-file', metricsFile);

  assert.match(out[0], /^Run \S+ finished with status success$/);
  assert.equal(process.exitCode, undefined);
  assert.equal(err.length, 1);
  assert.ok(err[0].startsWith(`Failed to write metrics to ${metricsFile}: ENOENT`));
});

test('writes JSON schemas for batch and resource files', async (t) => {
  const { dir, out, cli } = await setup(t);
  const schemaDir = path.join(dir, 'schemas');

  await cli('schemas', '--out', schemaDir);

  const files = ['raw-batch', 'sources', 'breakpoints', 'stations', 'pollutants'].map((name) =>
    path.join(schemaDir, `${name}.schema.json`)
  );
  assert.deepEqual(
    out,
    files.map((file) => `Wrote ${file}`)
  );
  const breakpoints: unknown = JSON.parse(await readFile(files[2], 'utf8'));
  assert.ok(typeof breakpoints === 'object' && breakpoints !== null && '$ref' in breakpoints);
  assert.equal(breakpoints.$ref, '#/definitions/BreakpointConfig');
});
