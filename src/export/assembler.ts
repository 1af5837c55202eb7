/**
 * Export assembly: the single entry point that turns one provider workout into a
 * versioned WorkoutExport document.
 */

import { ExportConfig } from '../config';
import { extractActivities, extractEvents } from './extractors';
import { fetchHeartRateSamples, fetchRoute } from './fetchers';
import { workoutTypeName } from './kinds';
import { extractStatistics } from './statistics';

import type {
  ActivityData,
  HealthDataProvider,
  ProviderWorkout,
  WorkoutData,
  WorkoutEventData,
  WorkoutExport,
  WorkoutStatistics,
} from '../types';
import type { Logger } from '../utils/logger';

export interface BuildExportOptions {
  log?: Logger;
  /** Clock used for exportDate. */
  now?: () => Date;
  /** Abandons both fetches; an aborted build never resolves to a document. */
  signal?: AbortSignal;
}

/**
 * Assemble the export document for a workout.
 *
 * Heart-rate and route fetches run concurrently while statistics, events and
 * activities are extracted inline. Both fetches must succeed: when both fail the
 * heart-rate error is thrown and the route error is logged. Errors are rethrown
 * as received, without retry or translation.
 */
export async function buildExport(
  provider: HealthDataProvider,
  workout: ProviderWorkout,
  options: BuildExportOptions = {},
): Promise<WorkoutExport> {
  const { now = () => new Date(), signal } = options;
  const log = options.log?.child({ workoutId: workout.id });
  const timer = log?.startTimer('buildExport');

  signal?.throwIfAborted();

  // Fetches follow the caller's signal and are also abandoned when extraction fails
  const fetchController = new AbortController();
  const followCaller = () => {
    fetchController.abort(signal?.reason);
  };
  signal?.addEventListener('abort', followCaller, { once: true });

  try {
    // allSettled attaches handlers immediately, so neither fetch can reject unobserved
    const fetches = Promise.allSettled([
      fetchHeartRateSamples(provider, workout, { signal: fetchController.signal }),
      fetchRoute(provider, workout, { signal: fetchController.signal }),
    ]);

    let activities: ActivityData[];
    let events: WorkoutEventData[];
    let statistics: WorkoutStatistics;
    try {
      statistics = extractStatistics(workout);
      events = extractEvents(workout);
      activities = extractActivities(workout);
    } catch (error) {
      fetchController.abort(error);
      timer?.end('error', 'Extraction failed, export aborted');
      throw error;
    }

    const [heartRateResult, routeResult] = await fetches;

    if (heartRateResult.status === 'rejected') {
      if (routeResult.status === 'rejected') {
        log?.error('Route fetch also failed', routeResult.reason);
      }
      timer?.end('error', 'Heart-rate fetch failed, export aborted');
      throw heartRateResult.reason;
    }
    if (routeResult.status === 'rejected') {
      timer?.end('error', 'Route fetch failed, export aborted');
      throw routeResult.reason;
    }

    signal?.throwIfAborted();

    const workoutData: WorkoutData = {
      activities,
      duration: workout.duration,
      endDate: workout.endDate,
      events,
      heartRateSamples: heartRateResult.value,
      route: routeResult.value,
      sourceApp: workout.sourceName,
      startDate: workout.startDate,
      statistics,
      type: workoutTypeName(workout.activityType),
    };

    timer?.end('info', 'Export assembled', {
      activities: activities.length,
      events: events.length,
      heartRateSamples: workoutData.heartRateSamples.length,
      routePoints: workoutData.route.length,
      statistics: Object.keys(statistics).length,
    });

    return {
      exportDate: now(),
      exportVersion: ExportConfig.schemaVersion,
      workout: workoutData,
    };
  } finally {
    signal?.removeEventListener('abort', followCaller);
  }
}
