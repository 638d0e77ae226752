import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const codeSchema = z
  .string()
  .min(1, 'Code must not be empty')
  .max(50, 'Code must be at most 50 characters long')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Code must start with an alphanumeric character and contain only alphanumerics, dot, underscore, or dash');

export const stationSchema = z.object({
  code: codeSchema,
  name: z.string().min(1),
  municipality: z.string().min(1).optional(),
  department: z.string().min(1).optional(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  altitude: z.number().optional(),
  aliases: z.array(z.string().min(1)).default([]),
  active: z.boolean().default(true)
});

export type Station = z.infer<typeof stationSchema>;

export const pollutantSchema = z.object({
  code: codeSchema,
  name: z.string().min(1),
  unit: z.string().min(1),
  limitValue: z.number().positive().nullable().default(null),
  molecularWeight: z.number().positive().optional(),
  aliases: z.array(z.string().min(1)).default([])
});

export type Pollutant = z.infer<typeof pollutantSchema>;

const uniqueBy = <T>(key: (value: T) => string, label: string) =>
  (values: T[], ctx: z.RefinementCtx) => {
    const seen = new Set<string>();
    for (const value of values) {
      const id = key(value);
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate ${label} ${id}`
        });
      }
      seen.add(id);
    }
  };

export const stationListSchema = z.array(stationSchema).superRefine(uniqueBy((station) => station.code, 'station code'));

export const pollutantListSchema = z
  .array(pollutantSchema)
  .superRefine(uniqueBy((pollutant) => pollutant.code, 'pollutant code'));

export const timestampFormatSchema = z.enum(['iso', 'dmy', 'spreadsheet-serial']);

export type TimestampFormat = z.infer<typeof timestampFormatSchema>;

const profileBaseShape = {
  id: z.string().min(1),
  description: z.string().optional(),
  nullTokens: z.array(z.string()).default(['ND', 'N/D', 'NaN', 'None', 'null', '']),
  timestampFormats: z.array(timestampFormatSchema).min(1).default(['iso', 'dmy', 'spreadsheet-serial'])
};

export const longSourceProfileSchema = z.object({
  ...profileBaseShape,
  shape: z.literal('long'),
  fields: z.object({
    station: z.string().min(1),
    pollutant: z.string().min(1),
    timestamp: z.string().min(1),
    value: z.string().min(1),
    unit: z.string().min(1).optional()
  })
});

export const wideStationSourceSchema = z.union([
  z.object({ column: z.string().min(1) }).strict(),
  z.object({ fixed: z.string().min(1) }).strict()
]);

export const wideSourceProfileSchema = z.object({
  ...profileBaseShape,
  shape: z.literal('wide'),
  station: wideStationSourceSchema,
  timestampField: z.string().min(1),
  pollutantColumns: z.record(z.string(), z.string().min(1)).optional(),
  ignoreColumns: z.array(z.string()).default(['_id'])
});

export const sourceProfileSchema = z.discriminatedUnion('shape', [longSourceProfileSchema, wideSourceProfileSchema]);

export type LongSourceProfile = z.infer<typeof longSourceProfileSchema>;
export type WideSourceProfile = z.infer<typeof wideSourceProfileSchema>;
export type SourceProfile = z.infer<typeof sourceProfileSchema>;

export const sourceProfileListSchema = z
  .array(sourceProfileSchema)
  .superRefine(uniqueBy((profile) => profile.id, 'source profile'));

export const breakpointBandSchema = z
  .object({
    concentrationLow: z.number().nonnegative(),
    concentrationHigh: z.number().positive(),
    indexLow: z.number().int().min(0).max(500),
    indexHigh: z.number().int().min(0).max(500),
    category: z.string().min(1).optional()
  })
  .refine((band) => band.concentrationHigh > band.concentrationLow, {
    message: 'concentrationHigh must be greater than concentrationLow'
  })
  .refine((band) => band.indexHigh >= band.indexLow, {
    message: 'indexHigh must not be lower than indexLow'
  });

export type BreakpointBand = z.infer<typeof breakpointBandSchema>;

export const breakpointTableSchema = z
  .object({
    pollutant: codeSchema,
    unit: z.string().min(1),
    bands: z.array(breakpointBandSchema).min(1)
  })
  .superRefine((table, ctx) => {
    for (let index = 1; index < table.bands.length; index += 1) {
      const previous = table.bands[index - 1];
      const current = table.bands[index];
      if (current.concentrationLow < previous.concentrationHigh) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', index, 'concentrationLow'],
          message: `Band ${index} of ${table.pollutant} overlaps the previous band`
        });
      }
      if (current.indexLow < previous.indexHigh) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', index, 'indexLow'],
          message: `Band ${index} of ${table.pollutant} lowers the index range`
        });
      }
    }
  });

export type BreakpointTable = z.infer<typeof breakpointTableSchema>;

export const icaCategorySchema = z
  .object({
    name: z.string().min(1),
    min: z.number().int().min(0),
    max: z.number().int().max(500),
    color: z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Color must be a #rrggbb hex value').optional()
  })
  .refine((category) => category.max >= category.min, { message: 'max must not be lower than min' });

export type IcaCategory = z.infer<typeof icaCategorySchema>;

export const breakpointConfigSchema = z.object({
  categories: z.array(icaCategorySchema).default([]),
  tables: z.array(breakpointTableSchema).superRefine(uniqueBy((table) => table.pollutant, 'breakpoint table'))
});

export type BreakpointConfig = z.infer<typeof breakpointConfigSchema>;

export const rawBatchSchema = z.object({
  source: z.string().min(1),
  extractedAt: z.string().datetime({ offset: true }).optional(),
  rows: z.array(z.record(z.string(), z.unknown()))
});

export type RawBatch = z.infer<typeof rawBatchSchema>;

export interface SchemaExportOptions {
  title?: string;
}

export const buildRawBatchJsonSchema = (options: SchemaExportOptions = {}) =>
  zodToJsonSchema(rawBatchSchema, { name: options.title ?? 'RawBatch' });

export const buildSourceProfilesJsonSchema = (options: SchemaExportOptions = {}) =>
  zodToJsonSchema(sourceProfileListSchema, { name: options.title ?? 'SourceProfiles' });

export const buildBreakpointConfigJsonSchema = (options: SchemaExportOptions = {}) =>
  zodToJsonSchema(breakpointConfigSchema, { name: options.title ?? 'BreakpointConfig' });

export const buildStationsJsonSchema = (options: SchemaExportOptions = {}) =>
  zodToJsonSchema(stationListSchema, { name: options.title ?? 'Stations' });

export const buildPollutantsJsonSchema = (options: SchemaExportOptions = {}) =>
  zodToJsonSchema(pollutantListSchema, { name: options.title ?? 'Pollutants' });
