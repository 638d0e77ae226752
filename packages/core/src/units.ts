import { SchemaMismatchError } from './errors';

type UnitKind = 'mass' | 'volume';

interface UnitDefinition {
  label: string;
  kind: UnitKind;
  /** Multiplier to the kind's base unit (µg/m³ or ppb). */
  factor: number;
}

/** Litres per mole of an ideal gas at 25 °C and 1 atm. */
export const MOLAR_VOLUME_LITRES = 24.45;

const UNITS: Record<string, UnitDefinition> = {
  'ng/m3': { label: 'ng/m³', kind: 'mass', factor: 0.001 },
  'ug/m3': { label: 'µg/m³', kind: 'mass', factor: 1 },
  'mg/m3': { label: 'mg/m³', kind: 'mass', factor: 1000 },
  ppb: { label: 'ppb', kind: 'volume', factor: 1 },
  ppm: { label: 'ppm', kind: 'volume', factor: 1000 }
};

const unitKey = (label: string): string =>
  label
    .trim()
    .toLowerCase()
    .replace(/[µμ]/g, 'u')
    .replace(/³/g, '3')
    .replace(/\s+/g, '');

const lookupUnit = (label: string): UnitDefinition | null => UNITS[unitKey(label)] ?? null;

/** Returns the canonical spelling of a unit label, or `null` when the unit is not recognised. */
export const canonicalUnit = (label: string): string | null => lookupUnit(label)?.label ?? null;

export type ConcentrationConverter = (value: number) => number;

/**
 * Resolves a converter between two concentration units. Converting between mass and
 * volume units needs the pollutant's molecular weight (g/mol).
 */
export function resolveConverter(
  fromLabel: string,
  toLabel: string,
  molecularWeight?: number
): ConcentrationConverter {
  const from = lookupUnit(fromLabel);
  if (!from) {
    throw new SchemaMismatchError(`Unknown concentration unit ${fromLabel}`, 'unit');
  }
  const to = lookupUnit(toLabel);
  if (!to) {
    throw new SchemaMismatchError(`Unknown concentration unit ${toLabel}`, 'unit');
  }

  if (from.kind === to.kind) {
    if (from.factor === to.factor) {
      return (value) => value;
    }
    return (value) => (value * from.factor) / to.factor;
  }

  if (!molecularWeight) {
    throw new SchemaMismatchError(
      `Converting ${from.label} to ${to.label} requires a molecular weight`,
      'unit'
    );
  }

  const crossFactor =
    from.kind === 'mass' ? MOLAR_VOLUME_LITRES / molecularWeight : molecularWeight / MOLAR_VOLUME_LITRES;
  return (value) => (value * from.factor * crossFactor) / to.factor;
}

export const convertConcentration = (
  value: number,
  fromLabel: string,
  toLabel: string,
  molecularWeight?: number
): number => resolveConverter(fromLabel, toLabel, molecularWeight)(value);
