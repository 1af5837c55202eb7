/**
 * Range statistics computed from stored quantity samples.
 * This is how the file store answers "statistics for kind X over range R".
 */

import { BASE_UNITS, convertQuantity } from '../utils/units';

import type { DateRange, QuantityKind, QuantityStatistics, StoredQuantitySample } from '../types';

// Cumulative kinds add up; the rest are point measurements and get averaged.
const CUMULATIVE_KINDS: ReadonlySet<QuantityKind> = new Set<QuantityKind>([
  'activeEnergyBurned',
  'distanceWalkingRunning',
  'stepCount',
]);

/**
 * Whether a sample's start falls inside [range.start, range.end].
 */
export function isSampleInRange(sample: StoredQuantitySample, range: DateRange): boolean {
  const start = Date.parse(sample.start);
  return start >= range.start.getTime() && start <= range.end.getTime();
}

/**
 * Aggregate the samples of one kind that start inside the range.
 * Values are normalized to the kind's base unit first.
 * Returns undefined when no sample falls in range.
 */
export function aggregateSamples(
  kind: QuantityKind,
  samples: StoredQuantitySample[],
  range: DateRange,
): QuantityStatistics | undefined {
  const unit = BASE_UNITS[kind];
  const values = samples
    .filter((sample) => isSampleInRange(sample, range))
    .map((sample) => convertQuantity({ unit: sample.units, value: sample.qty }, unit));

  if (values.length === 0) return undefined;

  const sum = values.reduce((total, value) => total + value, 0);
  if (CUMULATIVE_KINDS.has(kind)) {
    return { sum: { unit, value: sum } };
  }

  return {
    average: { unit, value: sum / values.length },
    maximum: { unit, value: values.reduce((max, value) => Math.max(max, value)) },
    minimum: { unit, value: values.reduce((min, value) => Math.min(min, value)) },
  };
}
