#!/usr/bin/env node

import { Command } from 'commander';

import { registerDatabaseCommands } from './commands/database';
import { registerReportCommands } from './commands/report';
import { registerRunCommand } from './commands/run';
import { registerSchemaCommands } from './commands/schemas';
import { consoleIo, type CliEnvironment } from './commands/context';

export function createProgram(environment: CliEnvironment = { env: process.env, io: consoleIo }): Command {
  const program = new Command();

  program
    .name('airq-etl')
    .description('Air-quality transform, load and index pipeline')
    .version('0.1.0')
    .option('--database <path>', 'SQLite database file (overrides AIRQ_DATABASE_PATH)');

  registerDatabaseCommands(program, environment);
  registerRunCommand(program, environment);
  registerReportCommands(program, environment);
  registerSchemaCommands(program, environment);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
