import path from 'node:path';

import type { Command } from 'commander';

import { ConfigurationError, parseTimestamp } from '@airq/core';

import { loadEtlConfig, type EtlConfig } from '../config';
import { AirQualityStore } from '../db/store';
import { createLogger, type Logger } from '../logger';

export interface CliIo {
  log(line: string): void;
  error(line: string): void;
}

export const consoleIo: CliIo = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  io: CliIo;
  /** Replaces the pino logger built from the configured level. */
  logger?: Logger;
}

export interface CommandContext {
  config: EtlConfig;
  logger: Logger;
  io: CliIo;
}

type GlobalOptions = {
  database?: string;
};

export const resolveContext = (command: Command, environment: CliEnvironment): CommandContext => {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = loadEtlConfig(
    environment.env,
    globals.database ? { databasePath: path.resolve(process.cwd(), globals.database) } : {}
  );
  return {
    config,
    logger: environment.logger ?? createLogger(config.logLevel),
    io: environment.io
  };
};

export const createStore = (context: CommandContext): AirQualityStore =>
  new AirQualityStore({
    databasePath: context.config.databasePath,
    busyTimeoutMs: context.config.storeTimeoutMs,
    retries: context.config.storeRetries,
    retryDelayMs: context.config.storeRetryDelayMs,
    logger: context.logger.child({ component: 'store' })
  });

export async function withStore<T>(context: CommandContext, work: (store: AirQualityStore) => Promise<T>): Promise<T> {
  const store = createStore(context);
  await store.open();
  try {
    return await work(store);
  } finally {
    store.close();
  }
}

export const parseDateOption = (value: string | undefined, flag: string): Date | null => {
  if (value === undefined) {
    return null;
  }
  const parsed = parseTimestamp(value, ['iso', 'dmy']);
  if (!parsed) {
    throw new ConfigurationError(`${flag} must be an ISO-8601 or DD/MM/YYYY timestamp, got ${value}`);
  }
  return parsed;
};

export const parsePositiveInt = (value: string, flag: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new ConfigurationError(`${flag} must be a positive integer, got ${value}`);
  }
  return parsed;
};
