import { Command } from 'commander';

import { loadPollutants, loadStations } from '../resources';
import { createStore, resolveContext, withStore, type CliEnvironment } from './context';

type SeedOptions = {
  stations?: string;
  pollutants?: string;
};

export function registerDatabaseCommands(program: Command, environment: CliEnvironment): void {
  program
    .command('init-db')
    .description('Create or migrate the dimensional schema')
    .action(async (_options: Record<string, never>, command: Command) => {
      const context = resolveContext(command, environment);
      const store = createStore(context);
      try {
        const applied = await store.open();
        context.io.log(`Database ready at ${store.getDatabasePath()}`);
        context.io.log(applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Schema is up to date');
      } finally {
        store.close();
      }
    });

  program
    .command('seed')
    .description('Upsert stations and pollutants from the reference files')
    .option('--stations <file>', 'stations JSON file')
    .option('--pollutants <file>', 'pollutants JSON file')
    .action(async (options: SeedOptions, command: Command) => {
      const context = resolveContext(command, environment);
      const [stations, pollutants] = await Promise.all([
        loadStations(options.stations ?? context.config.stationsFile),
        loadPollutants(options.pollutants ?? context.config.pollutantsFile)
      ]);

      await withStore(context, async (store) => {
        const stationCounts = await store.upsertStations(stations);
        const pollutantCounts = await store.upsertPollutants(pollutants);
        context.io.log(`Stations: ${stationCounts.inserted} inserted, ${stationCounts.updated} updated`);
        context.io.log(`Pollutants: ${pollutantCounts.inserted} inserted, ${pollutantCounts.updated} updated`);
      });
    });
}
