import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { TestContext } from 'node:test';

import type { RawRow } from '@airq/core';

import {
  AirQualityStore,
  createSilentLogger,
  loadBreakpointRegistry,
  loadEtlConfig,
  loadPollutants,
  loadSourceProfiles,
  loadStations,
  type EtlConfig,
  type RawBatchInput
} from '../src';

export const logger = createSilentLogger();

export async function createTempDir(t: TestContext, prefix = 'airq-etl-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

export const testConfig = (dir: string, env: NodeJS.ProcessEnv = {}): EtlConfig =>
  loadEtlConfig({ AIRQ_DATABASE_PATH: path.join(dir, 'airq.db'), AIRQ_LOG_LEVEL: 'silent', ...env });

/** Opens a migrated store in `dir` seeded with the bundled stations and pollutants. */
export async function openSeededStore(t: TestContext, dir: string): Promise<AirQualityStore> {
  const config = testConfig(dir);
  const store = new AirQualityStore({ databasePath: config.databasePath, retries: 0, logger });
  await store.open();
  t.after(() => store.close());
  await store.upsertStations(await loadStations(config.stationsFile));
  await store.upsertPollutants(await loadPollutants(config.pollutantsFile));
  return store;
}

export const loadBundledResources = async (config: EtlConfig) => ({
  profiles: await loadSourceProfiles(config.sourcesFile),
  registry: await loadBreakpointRegistry(config.breakpointsFile)
});

export const EXTRACTED_AT = new Date('2024-03-02T00:00:00Z');

export const pancePm = (): Array<Record<string, unknown>> => [
  { estacion: 'Pance', componente: 'PM2.5', fecha_hora: '2024-03-01T08:00:00Z', valor: '35,4', unidad: 'ug/m3' },
  { estacion: 'Pance', componente: 'PM10', fecha_hora: '2024-03-01T08:00:00Z', valor: 100 },
  { estacion: 'Pance', componente: 'PM10', fecha_hora: '2024-03-01T10:00:00Z', valor: 60 }
];

export const batchOf = (
  fields: Array<Record<string, unknown>>,
  source = 'mediciones',
  extractedAt = EXTRACTED_AT
): RawBatchInput => ({
  source,
  extractedAt,
  rows: fields.map((row): RawRow => ({ source, extractedAt, fields: row }))
});

export const countRows = async (store: AirQualityStore, table: string): Promise<number> =>
  store.run('count', (db) => {
    const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
    return row ? row.total : 0;
  });
