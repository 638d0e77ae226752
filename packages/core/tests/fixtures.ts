import {
  toTimeBucket,
  type BreakpointConfig,
  type CanonicalMeasurement,
  type Pollutant,
  type ReferenceData,
  type SourceProfile,
  type Station
} from '../src';

export const stations: Station[] = [
  {
    code: 'PANCE',
    name: 'Pance',
    municipality: 'Cali',
    latitude: 3.3318,
    longitude: -76.5345,
    aliases: ['Estacion Pance'],
    active: true
  },
  {
    code: 'ERMITA',
    name: 'Ermita',
    municipality: 'Cali',
    latitude: 3.4516,
    longitude: -76.5331,
    aliases: [],
    active: true
  }
];

export const pollutants: Pollutant[] = [
  { code: 'PM2.5', name: 'Particulate matter 2.5', unit: 'µg/m³', limitValue: 37, aliases: ['PM25'] },
  { code: 'PM10', name: 'Particulate matter 10', unit: 'µg/m³', limitValue: 75, aliases: [] },
  { code: 'O3', name: 'Ozone', unit: 'ppm', limitValue: 0.051, molecularWeight: 48.0, aliases: ['Ozono'] },
  { code: 'NO2', name: 'Nitrogen dioxide', unit: 'ppb', limitValue: 106, molecularWeight: 46.01, aliases: [] },
  { code: 'H2S', name: 'Hydrogen sulfide', unit: 'ppb', limitValue: 72, molecularWeight: 34.08, aliases: [] }
];

export const reference: ReferenceData = { stations, pollutants };

export const longProfile: SourceProfile = {
  id: 'long-feed',
  shape: 'long',
  nullTokens: ['ND', ''],
  timestampFormats: ['iso', 'dmy', 'spreadsheet-serial'],
  fields: {
    station: 'estacion',
    pollutant: 'componente',
    timestamp: 'fecha_hora',
    value: 'valor',
    unit: 'unidad'
  }
};

export const wideProfile: SourceProfile = {
  id: 'portal-pance',
  shape: 'wide',
  nullTokens: ['ND', ''],
  timestampFormats: ['iso', 'dmy', 'spreadsheet-serial'],
  station: { fixed: 'PANCE' },
  timestampField: 'Fecha & Hora',
  ignoreColumns: ['_id']
};

export const breakpoints: BreakpointConfig = {
  categories: [
    { name: 'Buena', min: 0, max: 50, color: '#00e400' },
    { name: 'Moderada', min: 51, max: 100, color: '#ffff00' },
    { name: 'Dañina a grupos sensibles', min: 101, max: 150, color: '#ff7e00' },
    { name: 'Dañina', min: 151, max: 200, color: '#ff0000' },
    { name: 'Muy dañina', min: 201, max: 300, color: '#8f3f97' },
    { name: 'Peligrosa', min: 301, max: 500, color: '#7e0023' }
  ],
  tables: [
    {
      pollutant: 'PM2.5',
      unit: 'µg/m³',
      bands: [
        { concentrationLow: 0, concentrationHigh: 12.0, indexLow: 0, indexHigh: 50 },
        { concentrationLow: 12.1, concentrationHigh: 35.4, indexLow: 51, indexHigh: 100 },
        { concentrationLow: 35.5, concentrationHigh: 55.4, indexLow: 101, indexHigh: 150 },
        { concentrationLow: 55.5, concentrationHigh: 150.4, indexLow: 151, indexHigh: 200 },
        { concentrationLow: 150.5, concentrationHigh: 250.4, indexLow: 201, indexHigh: 300 },
        { concentrationLow: 250.5, concentrationHigh: 500.4, indexLow: 301, indexHigh: 500 }
      ]
    },
    {
      pollutant: 'PM10',
      unit: 'µg/m³',
      bands: [
        { concentrationLow: 0, concentrationHigh: 54, indexLow: 0, indexHigh: 50 },
        { concentrationLow: 55, concentrationHigh: 154, indexLow: 51, indexHigh: 100 },
        { concentrationLow: 155, concentrationHigh: 254, indexLow: 101, indexHigh: 150 },
        { concentrationLow: 255, concentrationHigh: 354, indexLow: 151, indexHigh: 200 },
        { concentrationLow: 355, concentrationHigh: 424, indexLow: 201, indexHigh: 300 },
        { concentrationLow: 425, concentrationHigh: 604, indexLow: 301, indexHigh: 500 }
      ]
    },
    {
      pollutant: 'O3',
      unit: 'ppm',
      bands: [
        { concentrationLow: 0, concentrationHigh: 0.054, indexLow: 0, indexHigh: 50 },
        { concentrationLow: 0.055, concentrationHigh: 0.07, indexLow: 51, indexHigh: 100 },
        { concentrationLow: 0.071, concentrationHigh: 0.085, indexLow: 101, indexHigh: 150 },
        { concentrationLow: 0.086, concentrationHigh: 0.105, indexLow: 151, indexHigh: 200 },
        { concentrationLow: 0.106, concentrationHigh: 0.2, indexLow: 201, indexHigh: 300 }
      ]
    }
  ]
};

export const EXTRACTED_AT = new Date('2024-03-02T00:00:00Z');

/** Builds an observed measurement at `hour` hours after 2024-03-01T00:00Z. */
export const measurementAt = (
  hour: number,
  value: number | null,
  overrides: Partial<CanonicalMeasurement> = {}
): CanonicalMeasurement => {
  const observedAt = new Date(Date.UTC(2024, 2, 1, hour));
  return {
    stationCode: 'PANCE',
    pollutantCode: 'PM10',
    bucket: toTimeBucket(observedAt),
    observedAt,
    value,
    unit: 'µg/m³',
    source: 'long-feed',
    extractedAt: EXTRACTED_AT,
    valueSource: 'observed',
    ...overrides
  };
};
