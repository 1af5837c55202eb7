/**
 * Workout data transformation utilities.
 * Raw ingest records -> stored records -> provider records.
 */

import { workoutTypeName } from '../export/kinds';

import type {
  ActivityKindTag,
  DateRange,
  ProviderLocation,
  ProviderQuantitySample,
  ProviderWorkout,
  ProviderWorkoutSummary,
  QuantityKind,
  QuantityStatistics,
  RawSample,
  RawWorkout,
  StoredLocation,
  StoredQuantitySample,
  StoredRoute,
  StoredWorkout,
} from '../types';

/** One row of the workout listing served over HTTP. */
export interface WorkoutListEntry {
  duration: number;
  end: string;
  id: string;
  sourceApp: string;
  start: string;
  type: ActivityKindTag;
}

/** Aggregates for a kind over a range, answered by whoever holds the samples. */
export type RangeStatistics = (kind: QuantityKind, range: DateRange) => QuantityStatistics | undefined;

// The provider reports unavailable accuracy/speed as -1; unknown altitude as 0.
const UNAVAILABLE = -1;

function toIso(value: string): string {
  return new Date(value).toISOString();
}

export function mapRoute(data: RawWorkout): StoredRoute {
  return {
    locations:
      data.route?.map((location) => ({
        ...location,
        timestamp: toIso(location.timestamp),
      })) ?? [],
    workoutId: data.id,
  };
}

export function mapSample(data: RawSample): StoredQuantitySample {
  const start = toIso(data.start);
  return {
    end: data.end === undefined ? start : toIso(data.end),
    qty: data.qty,
    source: data.source ?? '',
    start,
    units: data.units,
  };
}

export function mapWorkoutData(data: RawWorkout): StoredWorkout {
  return {
    activities:
      data.activities?.map((activity) => ({
        activityType: activity.activityType,
        duration: activity.duration,
        start: toIso(activity.start),
        ...(activity.end === undefined ? {} : { end: toIso(activity.end) }),
      })) ?? [],
    activityType: data.activityType,
    duration: data.duration,
    end: toIso(data.end),
    events:
      data.events?.map((event) => ({
        start: toIso(event.start),
        type: event.type,
        ...(event.end === undefined ? {} : { end: toIso(event.end) }),
      })) ?? [],
    sourceName: data.sourceName,
    start: toIso(data.start),
    workoutId: data.id,
  };
}

export function toProviderLocation(stored: StoredLocation): ProviderLocation {
  return {
    altitude: stored.altitude ?? 0,
    horizontalAccuracy: stored.horizontalAccuracy ?? UNAVAILABLE,
    latitude: stored.latitude,
    longitude: stored.longitude,
    speed: stored.speed ?? UNAVAILABLE,
    timestamp: new Date(stored.timestamp),
  };
}

export function toProviderSample(stored: StoredQuantitySample): ProviderQuantitySample {
  return {
    endDate: new Date(stored.end),
    quantity: { unit: stored.units, value: stored.qty },
    startDate: new Date(stored.start),
  };
}

export function toProviderWorkoutSummary(stored: StoredWorkout): ProviderWorkoutSummary {
  return {
    activityType: stored.activityType,
    duration: stored.duration,
    endDate: new Date(stored.end),
    id: stored.workoutId,
    sourceName: stored.sourceName,
    startDate: new Date(stored.start),
  };
}

export function toWorkoutListEntry(summary: ProviderWorkoutSummary): WorkoutListEntry {
  return {
    duration: summary.duration,
    end: summary.endDate.toISOString(),
    id: summary.id,
    sourceApp: summary.sourceName,
    start: summary.startDate.toISOString(),
    type: workoutTypeName(summary.activityType),
  };
}

/**
 * Revive a stored workout. Statistics are answered lazily per kind, the workout
 * scoped to its own range and each sub-activity to [start, end ?? start + duration].
 */
export function toProviderWorkout(
  stored: StoredWorkout,
  statistics: RangeStatistics,
): ProviderWorkout {
  const range = { end: new Date(stored.end), start: new Date(stored.start) };

  return {
    activities: stored.activities.map((activity) => {
      const startDate = new Date(activity.start);
      const endDate = activity.end === undefined ? undefined : new Date(activity.end);
      const activityRange = {
        end: endDate ?? new Date(startDate.getTime() + activity.duration * 1000),
        start: startDate,
      };
      return {
        activityType: activity.activityType,
        duration: activity.duration,
        startDate,
        statistics: (kind: QuantityKind) => statistics(kind, activityRange),
        ...(endDate === undefined ? {} : { endDate }),
      };
    }),
    activityType: stored.activityType,
    duration: stored.duration,
    endDate: range.end,
    events: stored.events.map((event) => ({
      startDate: new Date(event.start),
      type: event.type,
      ...(event.end === undefined ? {} : { endDate: new Date(event.end) }),
    })),
    id: stored.workoutId,
    sourceName: stored.sourceName,
    startDate: range.start,
    statistics: (kind: QuantityKind) => statistics(kind, range),
  };
}
