import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Command } from 'commander';

import {
  buildBreakpointConfigJsonSchema,
  buildPollutantsJsonSchema,
  buildRawBatchJsonSchema,
  buildSourceProfilesJsonSchema,
  buildStationsJsonSchema
} from '@airq/core';

import type { CliEnvironment } from './context';

type SchemaOptions = {
  out: string;
};

const SCHEMA_FILES: ReadonlyArray<readonly [string, () => unknown]> = [
  ['raw-batch.schema.json', () => buildRawBatchJsonSchema()],
  ['sources.schema.json', () => buildSourceProfilesJsonSchema()],
  ['breakpoints.schema.json', () => buildBreakpointConfigJsonSchema()],
  ['stations.schema.json', () => buildStationsJsonSchema()],
  ['pollutants.schema.json', () => buildPollutantsJsonSchema()]
];

export function registerSchemaCommands(program: Command, environment: CliEnvironment): void {
  program
    .command('schemas')
    .description('Write JSON Schemas for batch files and resource files')
    .option('-o, --out <dir>', 'target directory', 'schemas')
    .action(async (options: SchemaOptions) => {
      const schemaDir = path.resolve(process.cwd(), options.out);
      await mkdir(schemaDir, { recursive: true });
      for (const [filename, build] of SCHEMA_FILES) {
        const target = path.join(schemaDir, filename);
        await writeFile(target, `${JSON.stringify(build(), null, 2)}\n`, 'utf8');
        environment.io.log(`Wrote ${target}`);
      }
    });
}
