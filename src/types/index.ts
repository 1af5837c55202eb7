/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Export document types
export { ACTIVITY_KIND_TAGS, EVENT_KIND_TAGS } from './export';
export type {
  ActivityData,
  ActivityKindTag,
  EventKindTag,
  HeartRateSample,
  RoutePoint,
  StatisticField,
  StatValue,
  WorkoutData,
  WorkoutEventData,
  WorkoutExport,
  WorkoutStatistics,
} from './export';

// Ingest types
export type { IngestData, IngestResponse, RawLocation, RawSample, RawWorkout } from './ingest';

// Provider boundary types
export { QUANTITY_KINDS } from './provider';
export type {
  DateRange,
  HealthDataProvider,
  ProviderLocation,
  ProviderQuantitySample,
  ProviderQueryOptions,
  ProviderRoute,
  ProviderWorkout,
  ProviderWorkoutActivity,
  ProviderWorkoutEvent,
  ProviderWorkoutSummary,
  Quantity,
  QuantityKind,
  QuantityStatistics,
  SampleQuery,
  SortOrder,
  StatisticsSource,
  WorkoutListQuery,
} from './provider';

// Storage types
export type {
  SampleDailyFile,
  SaveResult,
  StoredLocation,
  StoredQuantitySample,
  StoredRoute,
  StoredWorkout,
  StoredWorkoutActivity,
  StoredWorkoutEvent,
  WorkoutDailyFile,
  WorkoutIndexFile,
} from './storage';
