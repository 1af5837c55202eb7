/**
 * Time-series fetchers.
 * Each makes its own provider round trip and owns the array it returns.
 */

import { ExportConfig } from '../config';
import { convertQuantity } from '../utils/units';

import type {
  HealthDataProvider,
  HeartRateSample,
  ProviderLocation,
  ProviderQueryOptions,
  ProviderWorkout,
  RoutePoint,
} from '../types';

/**
 * Heart-rate samples recorded during the workout, oldest first, capped at
 * ExportConfig.heartRateSampleLimit.
 */
export async function fetchHeartRateSamples(
  provider: HealthDataProvider,
  workout: ProviderWorkout,
  options: ProviderQueryOptions = {},
): Promise<HeartRateSample[]> {
  const samples = await provider.querySamples(
    {
      kind: 'heartRate',
      limit: ExportConfig.heartRateSampleLimit,
      order: 'ascending',
      range: { end: workout.endDate, start: workout.startDate },
    },
    options,
  );

  return samples.map((sample) => ({
    bpm: convertQuantity(sample.quantity, 'count/min'),
    date: sample.startDate,
  }));
}

/**
 * Route points of the workout in recorded order. A workout without a GPS track
 * yields an empty array.
 */
export async function fetchRoute(
  provider: HealthDataProvider,
  workout: ProviderWorkout,
  options: ProviderQueryOptions = {},
): Promise<RoutePoint[]> {
  const route = await provider.queryRoute(workout, options);
  if (!route) return [];

  const points: RoutePoint[] = [];
  for await (const location of provider.routeLocations(route, options)) {
    options.signal?.throwIfAborted();
    points.push(toRoutePoint(location));
  }
  return points;
}

// Negative accuracy/speed means "not measured"; the field is omitted rather than passed on.
function toRoutePoint(location: ProviderLocation): RoutePoint {
  return {
    altitude: location.altitude,
    latitude: location.latitude,
    longitude: location.longitude,
    timestamp: location.timestamp,
    ...(location.horizontalAccuracy >= 0 ? { horizontalAccuracy: location.horizontalAccuracy } : {}),
    ...(location.speed >= 0 ? { speed: location.speed } : {}),
  };
}
