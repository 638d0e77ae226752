import type { Database as SqliteDatabase } from 'better-sqlite3';

import {
  BreakpointRegistry,
  RunCancelledError,
  SchemaMismatchError,
  bucketKey,
  calculateIcaRecords,
  describeBucket,
  type CanonicalMeasurement,
  type IcaRecord,
  type IndexInput,
  type TimeBucket
} from '@airq/core';

import type { Logger } from './logger';
import type { AirQualityStore, ReferenceSnapshot } from './db/store';

export interface LoaderOptions {
  store: AirQualityStore;
  registry: BreakpointRegistry;
  priority?: readonly string[];
  logger?: Logger;
}

export interface LoadOptions {
  /** Checked after the measurement writes and once more before commit. */
  signal?: AbortSignal;
}

export interface LoadResult {
  measurementsInserted: number;
  measurementsUpdated: number;
  measurementsUnchanged: number;
  /** Imputed values that would have replaced a stored observation. */
  measurementsKeptObserved: number;
  indicesInserted: number;
  indicesUpdated: number;
  indicesDeleted: number;
  missingTables: string[];
}

type StoredMeasurementRow = {
  id_medicion: number;
  valor: number;
  origen_valor: string;
  fuente: string;
};

type StoredIndexRow = {
  id_indice: number;
  ica: number;
  categoria: string | null;
  id_contaminante_dominante: number;
  subindices: string;
  fuente_calculo: string;
};

type BucketMeasurementRow = {
  codigo: string;
  valor: number;
  origen_valor: string;
};

interface AffectedPair {
  stationCode: string;
  stationId: number;
  bucket: TimeBucket;
  timeId: number;
}

const emptyResult = (): LoadResult => ({
  measurementsInserted: 0,
  measurementsUpdated: 0,
  measurementsUnchanged: 0,
  measurementsKeptObserved: 0,
  indicesInserted: 0,
  indicesUpdated: 0,
  indicesDeleted: 0,
  missingTables: []
});

const checkSignal = (signal: AbortSignal | undefined, stage: string): void => {
  if (signal?.aborted) {
    throw new RunCancelledError(stage);
  }
};

/**
 * Writes a batch of canonical measurements and the indices derived from them in a
 * single immediate transaction. Indices are always recomputed from the stored
 * measurements of each affected station and hour, so rerunning a batch leaves the
 * store unchanged.
 */
export class Loader {
  private readonly store: AirQualityStore;
  private readonly registry: BreakpointRegistry;
  private readonly priority: readonly string[] | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: LoaderOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.priority = options.priority;
    this.logger = options.logger;
  }

  async load(rows: readonly CanonicalMeasurement[], options: LoadOptions = {}): Promise<LoadResult> {
    if (rows.length === 0) {
      return emptyResult();
    }

    const reference = await this.store.readReferenceData();
    const result = await this.store.transaction('load batch', (db) => this.loadWithin(db, reference, rows, options));

    this.logger?.info(
      {
        measurementsInserted: result.measurementsInserted,
        measurementsUpdated: result.measurementsUpdated,
        indicesInserted: result.indicesInserted,
        indicesUpdated: result.indicesUpdated,
        indicesDeleted: result.indicesDeleted
      },
      'batch committed'
    );
    return result;
  }

  private loadWithin(
    db: SqliteDatabase,
    reference: ReferenceSnapshot,
    rows: readonly CanonicalMeasurement[],
    options: LoadOptions
  ): LoadResult {
    const result = emptyResult();
    const now = new Date().toISOString();
    const affected = new Map<string, AffectedPair>();
    const timeIds = new Map<string, number>();

    const insertTime = db.prepare(`
      INSERT INTO tiempo (anio, mes, dia, hora, fecha, fecha_hora, dia_semana, nombre_mes, trimestre)
      VALUES (@year, @month, @day, @hour, @date, @datetime, @weekday, @monthName, @quarter)
      ON CONFLICT(anio, mes, dia, hora) DO NOTHING
    `);
    const selectTime = db.prepare<[number, number, number, number], { id_tiempo: number }>(
      'SELECT id_tiempo FROM tiempo WHERE anio = ? AND mes = ? AND dia = ? AND hora = ?'
    );
    const selectMeasurement = db.prepare<[number, number, number], StoredMeasurementRow>(
      'SELECT id_medicion, valor, origen_valor, fuente FROM medicion WHERE id_estacion = ? AND id_contaminante = ? AND id_tiempo = ?'
    );
    const insertMeasurement = db.prepare(`
      INSERT INTO medicion (id_estacion, id_contaminante, id_tiempo, valor, origen_valor, fuente, extraido_en, actualizado_en)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const updateMeasurement = db.prepare(`
      UPDATE medicion SET valor = ?, origen_valor = ?, fuente = ?, extraido_en = ?, actualizado_en = ?
      WHERE id_medicion = ?
    `);

    const resolveTimeId = (bucket: TimeBucket): number => {
      const key = bucketKey(bucket);
      const cached = timeIds.get(key);
      if (cached !== undefined) {
        return cached;
      }
      insertTime.run({ ...bucket, ...describeBucket(bucket) });
      const row = selectTime.get(bucket.year, bucket.month, bucket.day, bucket.hour);
      if (!row) {
        throw new SchemaMismatchError(`Time bucket ${key} could not be stored`, 'bucket');
      }
      timeIds.set(key, row.id_tiempo);
      return row.id_tiempo;
    };

    for (const row of rows) {
      if (row.value === null) {
        continue;
      }
      const stationId = reference.stationIds.get(row.stationCode);
      if (stationId === undefined) {
        throw new SchemaMismatchError(`Station ${row.stationCode} has not been seeded`, 'station');
      }
      const pollutantId = reference.pollutantIds.get(row.pollutantCode);
      if (pollutantId === undefined) {
        throw new SchemaMismatchError(`Pollutant ${row.pollutantCode} has not been seeded`, 'pollutant');
      }

      const timeId = resolveTimeId(row.bucket);
      const extractedAt = row.extractedAt.toISOString();
      const existing = selectMeasurement.get(stationId, pollutantId, timeId);

      if (!existing) {
        insertMeasurement.run(stationId, pollutantId, timeId, row.value, row.valueSource, row.source, extractedAt, now);
        result.measurementsInserted += 1;
      } else if (existing.origen_valor === 'observed' && row.valueSource === 'imputed') {
        result.measurementsKeptObserved += 1;
      } else if (
        existing.valor === row.value &&
        existing.origen_valor === row.valueSource &&
        existing.fuente === row.source
      ) {
        result.measurementsUnchanged += 1;
      } else {
        updateMeasurement.run(row.value, row.valueSource, row.source, extractedAt, now, existing.id_medicion);
        result.measurementsUpdated += 1;
      }

      affected.set(`${row.stationCode}|${bucketKey(row.bucket)}`, {
        stationCode: row.stationCode,
        stationId,
        bucket: row.bucket,
        timeId
      });
    }

    checkSignal(options.signal, 'measurement load');
    this.refreshIndices(db, reference, Array.from(affected.values()), result, now);
    checkSignal(options.signal, 'commit');
    return result;
  }

  private refreshIndices(
    db: SqliteDatabase,
    reference: ReferenceSnapshot,
    pairs: readonly AffectedPair[],
    result: LoadResult,
    now: string
  ): void {
    const selectBucketMeasurements = db.prepare<[number, number], BucketMeasurementRow>(`
      SELECT c.codigo AS codigo, m.valor AS valor, m.origen_valor AS origen_valor
      FROM medicion m
      JOIN contaminante c ON c.id_contaminante = m.id_contaminante
      WHERE m.id_estacion = ? AND m.id_tiempo = ?
    `);
    const selectIndex = db.prepare<[number, number], StoredIndexRow>(
      'SELECT id_indice, ica, categoria, id_contaminante_dominante, subindices, fuente_calculo FROM indice_ica WHERE id_estacion = ? AND id_tiempo = ?'
    );
    const insertIndex = db.prepare(`
      INSERT INTO indice_ica (id_estacion, id_tiempo, id_contaminante_dominante, ica, categoria, subindices, fuente_calculo, actualizado_en)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const updateIndex = db.prepare(`
      UPDATE indice_ica
      SET id_contaminante_dominante = ?, ica = ?, categoria = ?, subindices = ?, fuente_calculo = ?, actualizado_en = ?
      WHERE id_indice = ?
    `);
    const deleteIndex = db.prepare('DELETE FROM indice_ica WHERE id_indice = ?');

    const missingTables = new Set<string>();

    for (const pair of pairs) {
      const stored = selectBucketMeasurements.all(pair.stationId, pair.timeId);
      const inputs: IndexInput[] = stored.map((row) => ({
        stationCode: pair.stationCode,
        pollutantCode: row.codigo,
        bucket: pair.bucket,
        value: row.valor
      }));
      const calculation = calculateIcaRecords(inputs, {
        registry: this.registry,
        priority: this.priority,
        pollutants: reference.pollutants
      });
      calculation.missingTables.forEach((code) => missingTables.add(code));

      const record: IcaRecord | undefined = calculation.records[0];
      const existing = selectIndex.get(pair.stationId, pair.timeId);

      if (!record) {
        if (existing) {
          deleteIndex.run(existing.id_indice);
          result.indicesDeleted += 1;
        }
        continue;
      }

      const dominantId = reference.pollutantIds.get(record.dominantPollutant);
      if (dominantId === undefined) {
        throw new SchemaMismatchError(`Pollutant ${record.dominantPollutant} has not been seeded`, 'pollutant');
      }
      const subIndices = JSON.stringify(record.subIndices);
      const basis = stored.some((row) => row.origen_valor === 'imputed') ? 'includes-imputed' : 'observed';

      if (!existing) {
        insertIndex.run(pair.stationId, pair.timeId, dominantId, record.overallIndex, record.category, subIndices, basis, now);
        result.indicesInserted += 1;
        continue;
      }

      const unchanged =
        existing.ica === record.overallIndex &&
        existing.categoria === record.category &&
        existing.id_contaminante_dominante === dominantId &&
        existing.subindices === subIndices &&
        existing.fuente_calculo === basis;
      if (!unchanged) {
        updateIndex.run(dominantId, record.overallIndex, record.category, subIndices, basis, now, existing.id_indice);
        result.indicesUpdated += 1;
      }
    }

    result.missingTables = Array.from(missingTables).sort();
  }
}
