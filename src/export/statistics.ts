/**
 * Statistics extraction.
 * Turns the provider's per-kind aggregates into unit-normalized export values.
 */

import { convertQuantity } from '../utils/units';

import type {
  QuantityKind,
  QuantityStatistics,
  StatisticField,
  StatisticsSource,
  WorkoutStatistics,
} from '../types';

interface StatisticMapping {
  aggregate: keyof QuantityStatistics;
  field: StatisticField;
  kind: QuantityKind;
  label: string;
  unit: string;
}

// One row per export field. Heart rate feeds two fields.
const STATISTIC_MAPPINGS: readonly StatisticMapping[] = [
  {
    aggregate: 'sum',
    field: 'activeEnergyBurned',
    kind: 'activeEnergyBurned',
    label: 'kcal',
    unit: 'kcal',
  },
  { aggregate: 'sum', field: 'distance', kind: 'distanceWalkingRunning', label: 'km', unit: 'km' },
  { aggregate: 'sum', field: 'stepCount', kind: 'stepCount', label: 'steps', unit: 'count' },
  {
    aggregate: 'average',
    field: 'averageHeartRate',
    kind: 'heartRate',
    label: 'bpm',
    unit: 'count/min',
  },
  {
    aggregate: 'maximum',
    field: 'maxHeartRate',
    kind: 'heartRate',
    label: 'bpm',
    unit: 'count/min',
  },
  { aggregate: 'average', field: 'averageSpeed', kind: 'runningSpeed', label: 'm/s', unit: 'm/s' },
  { aggregate: 'average', field: 'averagePower', kind: 'runningPower', label: 'W', unit: 'W' },
];

/**
 * Quantity kinds the extractor reads. Stores use this to know what to aggregate.
 */
export const STATISTIC_QUANTITY_KINDS: readonly QuantityKind[] = [
  ...new Set(STATISTIC_MAPPINGS.map((mapping) => mapping.kind)),
];

/**
 * Build the statistics block for a workout or one of its sub-activities.
 *
 * A field is present only when the source reports the aggregate it needs; a recorded
 * zero stays a zero. Errors from the source or from unit conversion propagate.
 */
export function extractStatistics(source: StatisticsSource): WorkoutStatistics {
  const statistics: WorkoutStatistics = {};
  const byKind = new Map<QuantityKind, QuantityStatistics | undefined>();

  for (const mapping of STATISTIC_MAPPINGS) {
    if (!byKind.has(mapping.kind)) {
      byKind.set(mapping.kind, source.statistics(mapping.kind));
    }

    const quantity = byKind.get(mapping.kind)?.[mapping.aggregate];
    if (!quantity) continue;

    statistics[mapping.field] = {
      unit: mapping.label,
      value: convertQuantity(quantity, mapping.unit),
    };
  }

  return statistics;
}
