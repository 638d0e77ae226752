import path from 'node:path';

import { Command } from 'commander';

import { readRawBatch } from '../extract';
import { createMetrics, writeMetricsTextfile } from '../metrics';
import { PipelineRunner } from '../pipeline';
import { loadPipelineResources } from '../resources';
import { RunLogger } from '../runLogger';
import { createStore, parseDateOption, resolveContext, type CliEnvironment } from './context';

type RunOptions = {
  input: string;
  source?: string;
  from?: string;
  to?: string;
  metricsFile?: string;
};

export function registerRunCommand(program: Command, environment: CliEnvironment): void {
  program
    .command('run')
    .description('Transform, load and index one batch of raw rows')
    .requiredOption('-i, --input <file>', 'raw batch file (JSON envelope, JSON array or NDJSON)')
    .option('-s, --source <profile>', 'source profile id when the file does not name one')
    .option('--from <timestamp>', 'keep buckets starting at or after this time')
    .option('--to <timestamp>', 'keep buckets starting before this time')
    .option('--metrics-file <file>', 'write Prometheus metrics to this textfile')
    .action(async (options: RunOptions, command: Command) => {
      const context = resolveContext(command, environment);
      const inputPath = path.resolve(process.cwd(), options.input);

      const store = createStore(context);
      const metrics = createMetrics();
      const runLogger = new RunLogger({
        store,
        journalPath: context.config.fallbackJournalPath,
        logger: context.logger.child({ component: 'run-log' })
      });
      const runner = new PipelineRunner({
        config: context.config,
        store,
        runLogger,
        resources: () => loadPipelineResources(context.config),
        logger: context.logger.child({ component: 'pipeline' }),
        metrics
      });

      const controller = new AbortController();
      const cancel = () => controller.abort();
      process.once('SIGINT', cancel);
      process.once('SIGTERM', cancel);

      try {
        const summary = await runner.run({
          batch: (signal) =>
            readRawBatch(inputPath, {
              source: options.source,
              timeoutMs: context.config.extractionTimeoutMs,
              signal
            }),
          sourceLabel: options.source ?? path.basename(inputPath),
          window: () => ({
            from: parseDateOption(options.from, '--from'),
            to: parseDateOption(options.to, '--to')
          }),
          signal: controller.signal
        });

        context.io.log(`Run ${summary.runId} finished with status ${summary.status}`);
        context.io.log(summary.message);
        if (summary.runLog === 'journaled') {
          context.io.error(`Run log kept in ${runLogger.getJournalPath()} until the store accepts it`);
        }
        if (options.metricsFile) {
          const metricsPath = path.resolve(process.cwd(), options.metricsFile);
          try {
            await writeMetricsTextfile(metrics, metricsPath);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            context.io.error(`Failed to write metrics to ${metricsPath}: ${message}`);
          }
        }
        if (summary.status === 'error') {
          process.exitCode = 1;
        }
      } finally {
        process.removeListener('SIGINT', cancel);
        process.removeListener('SIGTERM', cancel);
        store.close();
      }
    });
}
