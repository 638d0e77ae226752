import { Command } from 'commander';

import { icaSeries, pollutantKpis } from '../reports';
import {
  parseDateOption,
  parsePositiveInt,
  resolveContext,
  withStore,
  type CliEnvironment,
  type CommandContext
} from './context';

type SeriesOptions = {
  station: string;
  from?: string;
  to?: string;
  json?: boolean;
};

type RunsOptions = {
  limit: string;
  json?: boolean;
};

const TREND_ARROWS = { up: '↑', down: '↓', flat: '→' } as const;

const printJson = (context: CommandContext, value: unknown): void => {
  context.io.log(JSON.stringify(value, null, 2));
};

const seriesWindow = (options: SeriesOptions) => ({
  from: parseDateOption(options.from, '--from'),
  to: parseDateOption(options.to, '--to')
});

export function registerReportCommands(program: Command, environment: CliEnvironment): void {
  const report = program.command('report').description('Query loaded measurements, indices and run logs');

  report
    .command('ica')
    .description('Hourly ICA series of a station')
    .requiredOption('--station <code>', 'station code')
    .option('--from <timestamp>', 'first hour to include')
    .option('--to <timestamp>', 'first hour to exclude')
    .option('--json', 'print JSON')
    .action(async (options: SeriesOptions, command: Command) => {
      const context = resolveContext(command, environment);
      const points = await withStore(context, (store) => icaSeries(store, options.station, seriesWindow(options)));
      if (options.json) {
        printJson(context, points);
        return;
      }
      if (points.length === 0) {
        context.io.log(`No ICA records for ${options.station}`);
        return;
      }
      for (const point of points) {
        context.io.log(
          `${point.datetime}  ${String(point.overallIndex).padStart(3)}  ${point.dominantPollutant.padEnd(5)}  ${point.category ?? '—'}`
        );
      }
    });

  report
    .command('kpis')
    .description('Mean, maximum, share of the regulatory limit and trend per pollutant')
    .requiredOption('--station <code>', 'station code')
    .option('--from <timestamp>', 'first hour to include')
    .option('--to <timestamp>', 'first hour to exclude')
    .option('--json', 'print JSON')
    .action(async (options: SeriesOptions, command: Command) => {
      const context = resolveContext(command, environment);
      const kpis = await withStore(context, (store) => pollutantKpis(store, options.station, seriesWindow(options)));
      if (options.json) {
        printJson(context, kpis);
        return;
      }
      if (kpis.length === 0) {
        context.io.log(`No measurements for ${options.station}`);
        return;
      }
      for (const kpi of kpis) {
        const share = kpi.percentOfLimit === null ? 'N/A' : `${kpi.percentOfLimit}%`;
        const trend = kpi.trend ? TREND_ARROWS[kpi.trend] : '—';
        context.io.log(
          `${kpi.pollutantCode.padEnd(5)}  mean ${kpi.mean} ${kpi.unit}  max ${kpi.max} ${kpi.unit}  limit ${share}  trend ${trend}`
        );
      }
    });

  report
    .command('runs')
    .description('Most recent pipeline runs')
    .option('--limit <n>', 'number of runs', '10')
    .option('--json', 'print JSON')
    .action(async (options: RunsOptions, command: Command) => {
      const context = resolveContext(command, environment);
      const limit = parsePositiveInt(options.limit, '--limit');
      const runs = await withStore(context, (store) => store.listRunLogs(limit));
      if (options.json) {
        printJson(context, runs);
        return;
      }
      for (const run of runs) {
        context.io.log(
          `#${run.id} ${run.executedAt.toISOString()} ${run.source} ${run.status} +${run.inserted} ~${run.updated} -${run.omitted} ${run.durationSeconds.toFixed(2)}s  ${run.message}`
        );
      }
    });
}
