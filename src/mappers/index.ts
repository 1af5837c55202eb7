/**
 * Data mapper exports.
 * Functions for transforming raw API data into stored and provider records.
 */

export {
  mapRoute,
  mapSample,
  mapWorkoutData,
  toProviderLocation,
  toProviderSample,
  toProviderWorkout,
  toProviderWorkoutSummary,
  toWorkoutListEntry,
} from './workoutMapper';
export type { RangeStatistics, WorkoutListEntry } from './workoutMapper';
