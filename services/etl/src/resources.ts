import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import {
  BreakpointRegistry,
  ConfigurationError,
  breakpointConfigSchema,
  pollutantListSchema,
  sourceProfileListSchema,
  stationListSchema,
  type Pollutant,
  type SourceProfile,
  type Station
} from '@airq/core';

import type { EtlConfig } from './config';

async function readJsonFile<Schema extends z.ZodTypeAny>(filePath: string, schema: Schema): Promise<z.infer<Schema>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read ${filePath}: ${message}`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${filePath} is not valid JSON: ${message}`);
  }

  const parsed = schema.safeParse(parsedJson);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`${filePath} failed validation: ${summary}`, parsed.error.issues);
  }
  return parsed.data;
}

export const loadStations = (filePath: string): Promise<Station[]> => readJsonFile(filePath, stationListSchema);

export const loadPollutants = (filePath: string): Promise<Pollutant[]> => readJsonFile(filePath, pollutantListSchema);

export const loadSourceProfiles = (filePath: string): Promise<SourceProfile[]> =>
  readJsonFile(filePath, sourceProfileListSchema);

export const loadBreakpointRegistry = async (filePath: string): Promise<BreakpointRegistry> =>
  new BreakpointRegistry(await readJsonFile(filePath, breakpointConfigSchema));

export interface PipelineResources {
  profiles: SourceProfile[];
  registry: BreakpointRegistry;
}

export const loadPipelineResources = async (config: EtlConfig): Promise<PipelineResources> => {
  const [profiles, registry] = await Promise.all([
    loadSourceProfiles(config.sourcesFile),
    loadBreakpointRegistry(config.breakpointsFile)
  ]);
  return { profiles, registry };
};
