import type { Database as BetterSqlite3Database } from 'better-sqlite3';

export const createReportingViewsMigration = {
  id: '003_create_reporting_views',
  run(db: BetterSqlite3Database) {
    db.exec(`
      CREATE VIEW IF NOT EXISTS v_medicion AS
        SELECT
          e.codigo AS estacion,
          e.nombre AS nombre_estacion,
          c.codigo AS contaminante,
          c.unidad AS unidad,
          t.fecha_hora AS fecha_hora,
          t.fecha AS fecha,
          t.hora AS hora,
          m.valor AS valor,
          m.origen_valor AS origen_valor,
          m.fuente AS fuente
        FROM medicion m
        JOIN estacion e ON e.id_estacion = m.id_estacion
        JOIN contaminante c ON c.id_contaminante = m.id_contaminante
        JOIN tiempo t ON t.id_tiempo = m.id_tiempo;

      CREATE VIEW IF NOT EXISTS v_indice_ica AS
        SELECT
          e.codigo AS estacion,
          e.nombre AS nombre_estacion,
          t.fecha_hora AS fecha_hora,
          t.fecha AS fecha,
          i.ica AS ica,
          i.categoria AS categoria,
          c.codigo AS contaminante_dominante,
          i.subindices AS subindices,
          i.fuente_calculo AS fuente_calculo
        FROM indice_ica i
        JOIN estacion e ON e.id_estacion = i.id_estacion
        JOIN tiempo t ON t.id_tiempo = i.id_tiempo
        JOIN contaminante c ON c.id_contaminante = i.id_contaminante_dominante;
    `);
  }
};
