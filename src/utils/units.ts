/**
 * Quantity conversion for the units health providers report.
 * Covers only the dimensions the export needs; anything else is rejected.
 */

import { UnitConversionError } from '../errors';

import type { Quantity, QuantityKind } from '../types';

type Dimension = 'count' | 'energy' | 'frequency' | 'length' | 'power' | 'speed';

// Size of one unit, expressed in the dimension's reference unit
// (kcal, m, count, count/min, m/s, W).
const UNIT_SCALES: Record<Dimension, ReadonlyMap<string, number>> = {
  count: new Map([['count', 1]]),
  energy: new Map([
    ['Cal', 1],
    ['J', 1 / 4184],
    ['kJ', 1 / 4.184],
    ['kcal', 1],
  ]),
  frequency: new Map([
    ['Hz', 60],
    ['count/min', 1],
    ['count/s', 60],
  ]),
  length: new Map([
    ['cm', 0.01],
    ['ft', 0.3048],
    ['km', 1000],
    ['m', 1],
    ['mi', 1609.344],
    ['yd', 0.9144],
  ]),
  power: new Map([
    ['W', 1],
    ['kW', 1000],
  ]),
  speed: new Map([
    ['ft/s', 0.3048],
    ['km/hr', 1000 / 3600],
    ['m/s', 1],
    ['mi/hr', 0.447_04],
  ]),
};

/**
 * Unit every stored sample of a kind is normalized to before aggregation.
 */
export const BASE_UNITS: Record<QuantityKind, string> = {
  activeEnergyBurned: 'kcal',
  distanceWalkingRunning: 'm',
  heartRate: 'count/min',
  runningPower: 'W',
  runningSpeed: 'm/s',
  stepCount: 'count',
};

const DIMENSIONS: readonly Dimension[] = ['count', 'energy', 'frequency', 'length', 'power', 'speed'];

function findDimension(unit: string): Dimension | undefined {
  return DIMENSIONS.find((dimension) => UNIT_SCALES[dimension].has(unit));
}

/**
 * Check whether quantities in `fromUnit` can be expressed in `toUnit`.
 */
export function canConvert(fromUnit: string, toUnit: string): boolean {
  const dimension = findDimension(fromUnit);
  return dimension !== undefined && UNIT_SCALES[dimension].has(toUnit);
}

/**
 * Express a quantity as a plain number in the target unit.
 *
 * @throws UnitConversionError if either unit is unknown or they measure different things
 */
export function convertQuantity(quantity: Quantity, toUnit: string): number {
  if (quantity.unit === toUnit) return quantity.value;

  const dimension = findDimension(quantity.unit);
  const scales = dimension === undefined ? undefined : UNIT_SCALES[dimension];
  const fromScale = scales?.get(quantity.unit);
  const toScale = scales?.get(toUnit);
  if (fromScale === undefined || toScale === undefined) {
    throw new UnitConversionError(quantity.unit, toUnit);
  }

  return (quantity.value * fromScale) / toScale;
}
