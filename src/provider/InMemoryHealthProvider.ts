/**
 * HealthDataProvider held entirely in memory.
 * Used by tests and by anything that already has provider records at hand.
 */

import type {
  HealthDataProvider,
  ProviderLocation,
  ProviderQuantitySample,
  ProviderQueryOptions,
  ProviderRoute,
  ProviderWorkout,
  ProviderWorkoutSummary,
  QuantityKind,
  QuantityStatistics,
  SampleQuery,
  StatisticsSource,
  WorkoutListQuery,
} from '../types';

export type ProviderOperation =
  | 'getWorkout'
  | 'listWorkouts'
  | 'queryRoute'
  | 'querySamples'
  | 'routeLocations';

export interface InMemoryHealthData {
  /** Route locations by workout id. A present key means the workout has a route. */
  routes?: Record<string, ProviderLocation[]>;
  samples?: Partial<Record<QuantityKind, ProviderQuantitySample[]>>;
  workouts?: ProviderWorkout[];
}

/**
 * Statistics source answering from a fixed table.
 */
export function fixedStatistics(
  table: Partial<Record<QuantityKind, QuantityStatistics>> = {},
): StatisticsSource['statistics'] {
  return (kind) => table[kind];
}

export class InMemoryHealthProvider implements HealthDataProvider {
  /** Operations in the order they were called. */
  readonly calls: ProviderOperation[] = [];
  readonly sampleQueries: SampleQuery[] = [];

  private failures = new Map<ProviderOperation, unknown>();
  private routes: Map<string, ProviderLocation[]>;
  private samples: Partial<Record<QuantityKind, ProviderQuantitySample[]>>;
  private workouts: Map<string, ProviderWorkout>;

  constructor(data: InMemoryHealthData = {}) {
    this.routes = new Map(Object.entries(data.routes ?? {}));
    this.samples = data.samples ?? {};
    this.workouts = new Map((data.workouts ?? []).map((workout) => [workout.id, workout]));
  }

  /**
   * Make every later call of `operation` reject with `error`.
   */
  failOn(operation: ProviderOperation, error: unknown = new Error(`${operation} failed`)): this {
    this.failures.set(operation, error);
    return this;
  }

  async getWorkout(
    id: string,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderWorkout | undefined> {
    this.enter('getWorkout', options);
    return this.workouts.get(id);
  }

  async listWorkouts(
    query: WorkoutListQuery,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderWorkoutSummary[]> {
    this.enter('listWorkouts', options);

    const kinds = new Set(query.kinds);
    const direction = query.order === 'ascending' ? 1 : -1;
    const matching = [...this.workouts.values()]
      .filter((workout) => kinds.has(workout.activityType))
      .sort((a, b) => direction * (a.endDate.getTime() - b.endDate.getTime()));
    const limited = query.limit === undefined ? matching : matching.slice(0, query.limit);

    return limited.map(({ activityType, duration, endDate, id, sourceName, startDate }) => ({
      activityType,
      duration,
      endDate,
      id,
      sourceName,
      startDate,
    }));
  }

  async querySamples(
    query: SampleQuery,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderQuantitySample[]> {
    this.enter('querySamples', options);
    this.sampleQueries.push(query);

    const start = query.range.start.getTime();
    const end = query.range.end.getTime();
    const direction = query.order === 'ascending' ? 1 : -1;
    const matching = (this.samples[query.kind] ?? [])
      .filter((sample) => sample.startDate.getTime() >= start && sample.startDate.getTime() <= end)
      .sort((a, b) => direction * (a.startDate.getTime() - b.startDate.getTime()));

    return query.limit === undefined ? matching : matching.slice(0, query.limit);
  }

  async queryRoute(
    workout: ProviderWorkout,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderRoute | undefined> {
    this.enter('queryRoute', options);
    return this.routes.has(workout.id)
      ? { id: `route-${workout.id}`, workoutId: workout.id }
      : undefined;
  }

  async *routeLocations(
    route: ProviderRoute,
    options: ProviderQueryOptions = {},
  ): AsyncGenerator<ProviderLocation> {
    this.enter('routeLocations', options);
    const locations = [...(this.routes.get(route.workoutId) ?? [])].sort(
      (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
    );
    for (const location of locations) {
      options.signal?.throwIfAborted();
      yield location;
    }
  }

  private enter(operation: ProviderOperation, options: ProviderQueryOptions): void {
    this.calls.push(operation);
    options.signal?.throwIfAborted();
    if (this.failures.has(operation)) {
      throw this.failures.get(operation);
    }
  }
}
