import type { Database as BetterSqlite3Database } from 'better-sqlite3';

export const createDimensionalModelMigration = {
  id: '001_create_dimensional_model',
  run(db: BetterSqlite3Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS estacion (
        id_estacion INTEGER PRIMARY KEY AUTOINCREMENT,
        codigo TEXT NOT NULL UNIQUE,
        nombre TEXT NOT NULL,
        municipio TEXT,
        departamento TEXT,
        latitud REAL NOT NULL,
        longitud REAL NOT NULL,
        altitud REAL,
        alias TEXT NOT NULL DEFAULT '[]',
        activa INTEGER NOT NULL DEFAULT 1,
        actualizado_en TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS contaminante (
        id_contaminante INTEGER PRIMARY KEY AUTOINCREMENT,
        codigo TEXT NOT NULL UNIQUE,
        nombre TEXT NOT NULL,
        unidad TEXT NOT NULL,
        valor_limite REAL,
        peso_molecular REAL,
        alias TEXT NOT NULL DEFAULT '[]',
        actualizado_en TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS tiempo (
        id_tiempo INTEGER PRIMARY KEY AUTOINCREMENT,
        anio INTEGER NOT NULL,
        mes INTEGER NOT NULL CHECK (mes BETWEEN 1 AND 12),
        dia INTEGER NOT NULL CHECK (dia BETWEEN 1 AND 31),
        hora INTEGER NOT NULL CHECK (hora BETWEEN 0 AND 23),
        fecha TEXT NOT NULL,
        fecha_hora TEXT NOT NULL UNIQUE,
        dia_semana TEXT NOT NULL,
        nombre_mes TEXT NOT NULL,
        trimestre INTEGER NOT NULL CHECK (trimestre BETWEEN 1 AND 4),
        UNIQUE (anio, mes, dia, hora)
      );

      CREATE TABLE IF NOT EXISTS medicion (
        id_medicion INTEGER PRIMARY KEY AUTOINCREMENT,
        id_estacion INTEGER NOT NULL REFERENCES estacion(id_estacion),
        id_contaminante INTEGER NOT NULL REFERENCES contaminante(id_contaminante),
        id_tiempo INTEGER NOT NULL REFERENCES tiempo(id_tiempo),
        valor REAL NOT NULL,
        origen_valor TEXT NOT NULL CHECK (origen_valor IN ('observed', 'imputed')),
        fuente TEXT NOT NULL,
        extraido_en TEXT NOT NULL,
        actualizado_en TEXT NOT NULL,
        UNIQUE (id_estacion, id_contaminante, id_tiempo)
      );

      CREATE INDEX IF NOT EXISTS idx_medicion_estacion_tiempo
        ON medicion(id_estacion, id_tiempo);

      CREATE TABLE IF NOT EXISTS indice_ica (
        id_indice INTEGER PRIMARY KEY AUTOINCREMENT,
        id_estacion INTEGER NOT NULL REFERENCES estacion(id_estacion),
        id_tiempo INTEGER NOT NULL REFERENCES tiempo(id_tiempo),
        id_contaminante_dominante INTEGER NOT NULL REFERENCES contaminante(id_contaminante),
        ica INTEGER NOT NULL CHECK (ica BETWEEN 0 AND 500),
        categoria TEXT,
        subindices TEXT NOT NULL,
        fuente_calculo TEXT NOT NULL,
        actualizado_en TEXT NOT NULL,
        UNIQUE (id_estacion, id_tiempo)
      );

      CREATE TABLE IF NOT EXISTS etl_log (
        id_log INTEGER PRIMARY KEY AUTOINCREMENT,
        id_ejecucion TEXT NOT NULL UNIQUE,
        fecha_ejecucion TEXT NOT NULL,
        fuente TEXT NOT NULL,
        registros_insertados INTEGER NOT NULL DEFAULT 0,
        registros_actualizados INTEGER NOT NULL DEFAULT 0,
        registros_omitidos INTEGER NOT NULL DEFAULT 0,
        duracion_segundos REAL NOT NULL,
        estado TEXT NOT NULL CHECK (estado IN ('success', 'partial', 'error')),
        mensaje TEXT NOT NULL,
        ventana_inicio TEXT,
        ventana_fin TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_etl_log_fecha
        ON etl_log(fecha_ejecucion);
    `);
  }
};
