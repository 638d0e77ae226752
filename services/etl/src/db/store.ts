import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { z } from 'zod';

import {
  RunLockUnavailableError,
  StoreUnavailableError,
  TimeoutError,
  type Pollutant,
  type ReferenceData,
  type Station
} from '@airq/core';

import type { Logger } from '../logger';
import type { RunLogEntry, RunStatus, StoredRunLog, UpsertCounts } from '../types';
import { migrateIfNeeded } from './migrations';

const DEFAULT_BUSY_TIMEOUT_MS = 5_000;
const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 100;

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const aliasListSchema = z.array(z.string());

type SqliteFailure = Error & { code: string };

const isSqliteError = (error: unknown): error is SqliteFailure =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_');

const isBusySqliteError = (error: SqliteFailure): boolean =>
  error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED');

type StationRow = {
  id_estacion: number;
  codigo: string;
  nombre: string;
  municipio: string | null;
  departamento: string | null;
  latitud: number;
  longitud: number;
  altitud: number | null;
  alias: string;
  activa: number;
};

type PollutantRow = {
  id_contaminante: number;
  codigo: string;
  nombre: string;
  unidad: string;
  valor_limite: number | null;
  peso_molecular: number | null;
  alias: string;
};

type RunLogRow = {
  id_log: number;
  id_ejecucion: string;
  fecha_ejecucion: string;
  fuente: string;
  registros_insertados: number;
  registros_actualizados: number;
  registros_omitidos: number;
  duracion_segundos: number;
  estado: RunStatus;
  mensaje: string;
  ventana_inicio: string | null;
  ventana_fin: string | null;
};

/** Reference data plus the surrogate keys the fact tables reference. */
export interface ReferenceSnapshot extends ReferenceData {
  stationIds: Map<string, number>;
  pollutantIds: Map<string, number>;
}

export interface RunLockLease {
  name: string;
  holder: string;
  expiresAt: Date;
}

export interface AirQualityStoreOptions {
  databasePath: string;
  busyTimeoutMs?: number;
  /** Attempts after the first when SQLite reports the database busy or locked. */
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

const parseAliases = (raw: string): string[] => {
  const parsed = aliasListSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : [];
};

const toStation = (row: StationRow): Station => ({
  code: row.codigo,
  name: row.nombre,
  municipality: row.municipio ?? undefined,
  department: row.departamento ?? undefined,
  latitude: row.latitud,
  longitude: row.longitud,
  altitude: row.altitud ?? undefined,
  aliases: parseAliases(row.alias),
  active: row.activa === 1
});

const toPollutant = (row: PollutantRow): Pollutant => ({
  code: row.codigo,
  name: row.nombre,
  unit: row.unidad,
  limitValue: row.valor_limite,
  molecularWeight: row.peso_molecular ?? undefined,
  aliases: parseAliases(row.alias)
});

const toRunLog = (row: RunLogRow): StoredRunLog => ({
  id: row.id_log,
  runId: row.id_ejecucion,
  executedAt: new Date(row.fecha_ejecucion),
  source: row.fuente,
  inserted: row.registros_insertados,
  updated: row.registros_actualizados,
  omitted: row.registros_omitidos,
  durationSeconds: row.duracion_segundos,
  status: row.estado,
  message: row.mensaje,
  windowStart: row.ventana_inicio ? new Date(row.ventana_inicio) : null,
  windowEnd: row.ventana_fin ? new Date(row.ventana_fin) : null
});

/**
 * SQLite-backed dimensional store. Every call is bounded by SQLite's busy timeout and
 * retried a limited number of times while the database is busy or locked.
 */
export class AirQualityStore {
  private readonly databasePath: string;
  private readonly busyTimeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger | undefined;
  private db: SqliteDatabase | null = null;

  constructor(options: AirQualityStoreOptions) {
    this.databasePath = path.resolve(options.databasePath);
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger;
  }

  getDatabasePath(): string {
    return this.databasePath;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  /** Opens the database file, configures it and applies pending migrations. */
  async open(): Promise<string[]> {
    if (this.db) {
      return [];
    }

    try {
      await mkdir(path.dirname(this.databasePath), { recursive: true });
      this.db = new Database(this.databasePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`Failed to open database at ${this.databasePath}: ${message}`, error);
    }

    const migrations = await this.run('migrate', (db) => {
      db.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      return migrateIfNeeded(db);
    });
    if (migrations.length > 0) {
      this.logger?.info({ migrations, databasePath: this.databasePath }, 'applied schema migrations');
    }
    return migrations;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /** Runs `work` against the connection, mapping SQLite failures onto the store error taxonomy. */
  async run<T>(operation: string, work: (db: SqliteDatabase) => T): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return work(this.getDb());
      } catch (error) {
        if (!isSqliteError(error)) {
          throw error;
        }
        if (!isBusySqliteError(error)) {
          throw new StoreUnavailableError(`Store operation ${operation} failed: ${error.message}`, error);
        }
        if (attempt >= this.retries) {
          throw new TimeoutError('store', this.busyTimeoutMs);
        }
        const delayMs = this.retryDelayMs * (attempt + 1);
        this.logger?.warn({ operation, attempt: attempt + 1, delayMs, code: error.code }, 'store busy, retrying');
        await sleep(delayMs);
      }
    }
  }

  /** Runs `work` inside an immediate transaction; any thrown error rolls it back. */
  async transaction<T>(operation: string, work: (db: SqliteDatabase) => T): Promise<T> {
    return this.run(operation, (db) => db.transaction(() => work(db)).immediate());
  }

  async readReferenceData(): Promise<ReferenceSnapshot> {
    return this.run('read reference data', (db) => {
      const stationRows = db.prepare<[], StationRow>('SELECT * FROM estacion ORDER BY codigo').all();
      const pollutantRows = db.prepare<[], PollutantRow>('SELECT * FROM contaminante ORDER BY codigo').all();
      return {
        stations: stationRows.map(toStation),
        pollutants: pollutantRows.map(toPollutant),
        stationIds: new Map(stationRows.map((row) => [row.codigo, row.id_estacion])),
        pollutantIds: new Map(pollutantRows.map((row) => [row.codigo, row.id_contaminante]))
      };
    });
  }

  async upsertStations(stations: readonly Station[]): Promise<UpsertCounts> {
    return this.transaction('seed stations', (db) => {
      const exists = db.prepare<[string], { id_estacion: number }>('SELECT id_estacion FROM estacion WHERE codigo = ?');
      const upsert = db.prepare(`
        INSERT INTO estacion (codigo, nombre, municipio, departamento, latitud, longitud, altitud, alias, activa, actualizado_en)
        VALUES (@code, @name, @municipality, @department, @latitude, @longitude, @altitude, @aliases, @active, @now)
        ON CONFLICT(codigo) DO UPDATE SET
          nombre = excluded.nombre,
          municipio = excluded.municipio,
          departamento = excluded.departamento,
          latitud = excluded.latitud,
          longitud = excluded.longitud,
          altitud = excluded.altitud,
          alias = excluded.alias,
          activa = excluded.activa,
          actualizado_en = excluded.actualizado_en
      `);
      const counts: UpsertCounts = { inserted: 0, updated: 0 };
      const now = new Date().toISOString();
      for (const station of stations) {
        const existed = exists.get(station.code) !== undefined;
        upsert.run({
          code: station.code,
          name: station.name,
          municipality: station.municipality ?? null,
          department: station.department ?? null,
          latitude: station.latitude,
          longitude: station.longitude,
          altitude: station.altitude ?? null,
          aliases: JSON.stringify(station.aliases),
          active: station.active ? 1 : 0,
          now
        });
        counts[existed ? 'updated' : 'inserted'] += 1;
      }
      return counts;
    });
  }

  async upsertPollutants(pollutants: readonly Pollutant[]): Promise<UpsertCounts> {
    return this.transaction('seed pollutants', (db) => {
      const exists = db.prepare<[string], { id_contaminante: number }>(
        'SELECT id_contaminante FROM contaminante WHERE codigo = ?'
      );
      const upsert = db.prepare(`
        INSERT INTO contaminante (codigo, nombre, unidad, valor_limite, peso_molecular, alias, actualizado_en)
        VALUES (@code, @name, @unit, @limitValue, @molecularWeight, @aliases, @now)
        ON CONFLICT(codigo) DO UPDATE SET
          nombre = excluded.nombre,
          unidad = excluded.unidad,
          valor_limite = excluded.valor_limite,
          peso_molecular = excluded.peso_molecular,
          alias = excluded.alias,
          actualizado_en = excluded.actualizado_en
      `);
      const counts: UpsertCounts = { inserted: 0, updated: 0 };
      const now = new Date().toISOString();
      for (const pollutant of pollutants) {
        const existed = exists.get(pollutant.code) !== undefined;
        upsert.run({
          code: pollutant.code,
          name: pollutant.name,
          unit: pollutant.unit,
          limitValue: pollutant.limitValue,
          molecularWeight: pollutant.molecularWeight ?? null,
          aliases: JSON.stringify(pollutant.aliases),
          now
        });
        counts[existed ? 'updated' : 'inserted'] += 1;
      }
      return counts;
    });
  }

  /**
   * Takes the named run lock for `ttlMs`. An expired lease, or one already held by the
   * same holder, is taken over.
   */
  async acquireRunLock(name: string, holder: string, ttlMs: number, now: Date = new Date()): Promise<RunLockLease> {
    return this.transaction('acquire run lock', (db) => {
      const current = db
        .prepare<[string], { titular: string; expira_en: string }>(
          'SELECT titular, expira_en FROM etl_run_lock WHERE nombre = ?'
        )
        .get(name);
      if (current && current.titular !== holder && Date.parse(current.expira_en) > now.getTime()) {
        throw new RunLockUnavailableError(name, current.titular, current.expira_en);
      }

      const expiresAt = new Date(now.getTime() + ttlMs);
      db.prepare(`
        INSERT INTO etl_run_lock (nombre, titular, adquirido_en, expira_en)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(nombre) DO UPDATE SET
          titular = excluded.titular,
          adquirido_en = excluded.adquirido_en,
          expira_en = excluded.expira_en
      `).run(name, holder, now.toISOString(), expiresAt.toISOString());
      return { name, holder, expiresAt };
    });
  }

  /** Releases the lock if `holder` still owns it; returns whether a lease was removed. */
  async releaseRunLock(name: string, holder: string): Promise<boolean> {
    return this.run('release run lock', (db) => {
      const result = db.prepare('DELETE FROM etl_run_lock WHERE nombre = ? AND titular = ?').run(name, holder);
      return result.changes > 0;
    });
  }

  /** Appends a run log row; an entry whose run id is already stored is ignored. */
  async appendRunLog(entry: RunLogEntry): Promise<boolean> {
    return this.run('append run log', (db) => {
      const result = db
        .prepare(`
          INSERT INTO etl_log (
            id_ejecucion, fecha_ejecucion, fuente, registros_insertados, registros_actualizados,
            registros_omitidos, duracion_segundos, estado, mensaje, ventana_inicio, ventana_fin
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(id_ejecucion) DO NOTHING
        `)
        .run(
          entry.runId,
          entry.executedAt.toISOString(),
          entry.source,
          entry.inserted,
          entry.updated,
          entry.omitted,
          entry.durationSeconds,
          entry.status,
          entry.message,
          entry.windowStart ? entry.windowStart.toISOString() : null,
          entry.windowEnd ? entry.windowEnd.toISOString() : null
        );
      return result.changes > 0;
    });
  }

  async listRunLogs(limit = 20): Promise<StoredRunLog[]> {
    return this.run('list run logs', (db) =>
      db
        .prepare<[number], RunLogRow>('SELECT * FROM etl_log ORDER BY id_log DESC LIMIT ?')
        .all(limit)
        .map(toRunLog)
    );
  }

  private getDb(): SqliteDatabase {
    if (!this.db) {
      throw new StoreUnavailableError(`Store at ${this.databasePath} has not been opened`);
    }
    return this.db;
  }
}
