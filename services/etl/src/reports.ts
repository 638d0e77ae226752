import { z } from 'zod';

import type { AirQualityStore } from './db/store';
import type { RunWindow } from './types';

export type TrendDirection = 'up' | 'down' | 'flat';

export interface IcaSeriesPoint {
  datetime: string;
  overallIndex: number;
  category: string | null;
  dominantPollutant: string;
  subIndices: Record<string, number>;
  basis: string;
}

export interface PollutantKpi {
  pollutantCode: string;
  unit: string;
  count: number;
  mean: number;
  max: number;
  limitValue: number | null;
  /** Mean as a percentage of the regulatory limit, one decimal. */
  percentOfLimit: number | null;
  /** Last quarter of the series against the first; `null` below {@link MIN_TREND_POINTS} points. */
  trend: TrendDirection | null;
}

export const MIN_TREND_POINTS = 8;

const subIndexMapSchema = z.record(z.string(), z.number());

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const mean = (values: readonly number[]): number => values.reduce((sum, value) => sum + value, 0) / values.length;

const toBucketText = (date: Date | null): string | null =>
  date ? date.toISOString().slice(0, 13).replace('T', ' ') + ':00:00' : null;

export const trendOf = (values: readonly number[]): TrendDirection | null => {
  if (values.length < MIN_TREND_POINTS) {
    return null;
  }
  const quarter = Math.floor(values.length / 4);
  const first = mean(values.slice(0, quarter));
  const last = mean(values.slice(values.length - quarter));
  if (last > first) {
    return 'up';
  }
  return last < first ? 'down' : 'flat';
};

type IcaRow = {
  fecha_hora: string;
  ica: number;
  categoria: string | null;
  contaminante_dominante: string;
  subindices: string;
  fuente_calculo: string;
};

type MeasurementRow = {
  contaminante: string;
  unidad: string;
  valor_limite: number | null;
  valor: number;
};

const windowClause = (column: string, window: RunWindow): { sql: string; params: string[] } => {
  const clauses: string[] = [];
  const params: string[] = [];
  const from = toBucketText(window.from);
  const to = toBucketText(window.to);
  if (from) {
    clauses.push(`${column} >= ?`);
    params.push(from);
  }
  if (to) {
    clauses.push(`${column} < ?`);
    params.push(to);
  }
  return { sql: clauses.map((clause) => ` AND ${clause}`).join(''), params };
};

/** Hourly ICA of one station, oldest first. */
export async function icaSeries(
  store: AirQualityStore,
  stationCode: string,
  window: RunWindow = { from: null, to: null }
): Promise<IcaSeriesPoint[]> {
  const range = windowClause('fecha_hora', window);
  const rows = await store.run('report ica series', (db) =>
    db
      .prepare<string[], IcaRow>(
        `SELECT fecha_hora, ica, categoria, contaminante_dominante, subindices, fuente_calculo
         FROM v_indice_ica
         WHERE estacion = ?${range.sql}
         ORDER BY fecha_hora`
      )
      .all(stationCode, ...range.params)
  );

  return rows.map((row) => {
    const subIndices = subIndexMapSchema.safeParse(JSON.parse(row.subindices));
    return {
      datetime: row.fecha_hora,
      overallIndex: row.ica,
      category: row.categoria,
      dominantPollutant: row.contaminante_dominante,
      subIndices: subIndices.success ? subIndices.data : {},
      basis: row.fuente_calculo
    };
  });
}

/** Per-pollutant indicators of one station over the window. */
export async function pollutantKpis(
  store: AirQualityStore,
  stationCode: string,
  window: RunWindow = { from: null, to: null }
): Promise<PollutantKpi[]> {
  const range = windowClause('v.fecha_hora', window);
  const rows = await store.run('report pollutant kpis', (db) =>
    db
      .prepare<string[], MeasurementRow>(
        `SELECT v.contaminante AS contaminante, v.unidad AS unidad, c.valor_limite AS valor_limite, v.valor AS valor
         FROM v_medicion v
         JOIN contaminante c ON c.codigo = v.contaminante
         WHERE v.estacion = ?${range.sql}
         ORDER BY v.contaminante, v.fecha_hora`
      )
      .all(stationCode, ...range.params)
  );

  const series = new Map<string, { unit: string; limitValue: number | null; values: number[] }>();
  for (const row of rows) {
    const entry = series.get(row.contaminante);
    if (entry) {
      entry.values.push(row.valor);
    } else {
      series.set(row.contaminante, { unit: row.unidad, limitValue: row.valor_limite, values: [row.valor] });
    }
  }

  return Array.from(series.entries()).map(([pollutantCode, entry]) => {
    const average = mean(entry.values);
    return {
      pollutantCode,
      unit: entry.unit,
      count: entry.values.length,
      mean: round(average, 2),
      max: round(entry.values.reduce((top, value) => Math.max(top, value), Number.NEGATIVE_INFINITY), 2),
      limitValue: entry.limitValue,
      percentOfLimit: entry.limitValue ? round((average / entry.limitValue) * 100, 1) : null,
      trend: trendOf(entry.values)
    };
  });
}
