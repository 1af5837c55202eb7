/**
 * Event and sub-activity extraction. Pure mapping, no provider I/O.
 */

import { eventTypeName, workoutTypeName } from './kinds';
import { extractStatistics } from './statistics';

import type { ActivityData, ProviderWorkout, WorkoutEventData } from '../types';

/**
 * Workout events in provider order. Instantaneous events (no end, or an end equal to
 * the start) carry no endDate.
 */
export function extractEvents(workout: ProviderWorkout): WorkoutEventData[] {
  return workout.events.map((event) => {
    const hasInterval =
      event.endDate !== undefined && event.endDate.getTime() !== event.startDate.getTime();

    return {
      startDate: event.startDate,
      type: eventTypeName(event.type),
      ...(hasInterval ? { endDate: event.endDate } : {}),
    };
  });
}

/**
 * Sub-activities in provider order, each with statistics scoped to its own range.
 * A missing end date is derived from start + duration; a present one is taken as is.
 */
export function extractActivities(workout: ProviderWorkout): ActivityData[] {
  return workout.activities.map((activity) => ({
    duration: activity.duration,
    endDate: activity.endDate ?? new Date(activity.startDate.getTime() + activity.duration * 1000),
    startDate: activity.startDate,
    statistics: extractStatistics(activity),
    type: workoutTypeName(activity.activityType),
  }));
}
