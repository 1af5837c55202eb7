/**
 * Health-data provider boundary.
 * Records as the provider hands them over, before any normalization.
 * Kind identifiers are open-ended strings: the provider's enumerations grow over time.
 */

export const QUANTITY_KINDS = [
  'activeEnergyBurned',
  'distanceWalkingRunning',
  'heartRate',
  'runningPower',
  'runningSpeed',
  'stepCount',
] as const;

export type QuantityKind = (typeof QUANTITY_KINDS)[number];

export type SortOrder = 'ascending' | 'descending';

export interface DateRange {
  end: Date;
  start: Date;
}

export interface Quantity {
  unit: string;
  value: number;
}

/**
 * Aggregates for one quantity kind over a time range.
 * Cumulative kinds carry `sum`, discrete kinds carry `average`/`minimum`/`maximum`.
 */
export interface QuantityStatistics {
  average?: Quantity;
  maximum?: Quantity;
  minimum?: Quantity;
  sum?: Quantity;
}

/**
 * Anything the provider can report statistics for: a whole workout or one of its
 * sub-activities, each scoped to its own time range.
 * Returns undefined when no samples of the kind exist in range.
 */
export interface StatisticsSource {
  statistics(kind: QuantityKind): QuantityStatistics | undefined;
}

export interface ProviderWorkoutEvent {
  startDate: Date;
  type: string;
  endDate?: Date;
}

export interface ProviderWorkoutActivity extends StatisticsSource {
  activityType: string;
  duration: number;
  startDate: Date;
  endDate?: Date;
}

export interface ProviderWorkout extends StatisticsSource {
  activities: ProviderWorkoutActivity[];
  activityType: string;
  duration: number;
  endDate: Date;
  events: ProviderWorkoutEvent[];
  id: string;
  sourceName: string;
  startDate: Date;
}

/** Identity and timing of a completed workout, as returned by listings. */
export type ProviderWorkoutSummary = Pick<
  ProviderWorkout,
  'activityType' | 'duration' | 'endDate' | 'id' | 'sourceName' | 'startDate'
>;

export interface ProviderQuantitySample {
  endDate: Date;
  quantity: Quantity;
  startDate: Date;
}

export interface ProviderRoute {
  id: string;
  workoutId: string;
}

/**
 * A single recorded location.
 * Negative `horizontalAccuracy` or `speed` is the provider's way of saying "unavailable".
 */
export interface ProviderLocation {
  altitude: number;
  horizontalAccuracy: number;
  latitude: number;
  longitude: number;
  speed: number;
  timestamp: Date;
}

export interface SampleQuery {
  kind: QuantityKind;
  order: SortOrder;
  range: DateRange;
  limit?: number;
}

export interface WorkoutListQuery {
  /** Provider activity kinds to include. */
  kinds: readonly string[];
  /** By end date. */
  order: SortOrder;
  limit?: number;
}

export interface ProviderQueryOptions {
  signal?: AbortSignal;
}

/**
 * Read-only access to a health-data store.
 * Every operation may reject with a provider-defined error.
 */
export interface HealthDataProvider {
  getWorkout(id: string, options?: ProviderQueryOptions): Promise<ProviderWorkout | undefined>;
  /** Completed workouts of the requested kinds. */
  listWorkouts(
    query: WorkoutListQuery,
    options?: ProviderQueryOptions,
  ): Promise<ProviderWorkoutSummary[]>;
  querySamples(query: SampleQuery, options?: ProviderQueryOptions): Promise<ProviderQuantitySample[]>;
  /** At most one route exists per workout. */
  queryRoute(
    workout: ProviderWorkout,
    options?: ProviderQueryOptions,
  ): Promise<ProviderRoute | undefined>;
  /** Locations in chronological order. */
  routeLocations(route: ProviderRoute, options?: ProviderQueryOptions): AsyncIterable<ProviderLocation>;
}
