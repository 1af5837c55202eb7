/**
 * Export document type definitions.
 * The shape of the versioned workout export handed to downstream consumers.
 * Any change to a field here requires bumping ExportConfig.schemaVersion.
 */

export const ACTIVITY_KIND_TAGS = [
  'functional_strength',
  'other',
  'running',
  'strength_training',
] as const;

export const EVENT_KIND_TAGS = [
  'lap',
  'marker',
  'motionPaused',
  'motionResumed',
  'pause',
  'resume',
  'segment',
  'unknown',
] as const;

/** Normalized workout / sub-activity kind. */
export type ActivityKindTag = (typeof ACTIVITY_KIND_TAGS)[number];

/** Normalized workout event kind. */
export type EventKindTag = (typeof EVENT_KIND_TAGS)[number];

export interface ActivityData {
  duration: number;
  endDate: Date;
  startDate: Date;
  statistics: WorkoutStatistics;
  type: ActivityKindTag;
}

export interface HeartRateSample {
  bpm: number;
  date: Date;
}

export interface RoutePoint {
  altitude: number;
  latitude: number;
  longitude: number;
  timestamp: Date;
  horizontalAccuracy?: number;
  speed?: number;
}

export interface StatValue {
  unit: string;
  value: number;
}

export interface WorkoutData {
  activities: ActivityData[];
  duration: number; // seconds, as reported by the provider
  endDate: Date;
  events: WorkoutEventData[];
  heartRateSamples: HeartRateSample[];
  route: RoutePoint[];
  sourceApp: string;
  startDate: Date;
  statistics: WorkoutStatistics;
  type: ActivityKindTag;
}

export interface WorkoutEventData {
  startDate: Date;
  type: EventKindTag;
  endDate?: Date;
}

export interface WorkoutExport {
  exportDate: Date;
  exportVersion: string;
  workout: WorkoutData;
}

/**
 * Per-workout summary statistics.
 * An absent field means the provider had no samples of that kind; zero is a recorded value.
 */
export interface WorkoutStatistics {
  activeEnergyBurned?: StatValue;
  averageHeartRate?: StatValue;
  averagePower?: StatValue;
  averageSpeed?: StatValue;
  distance?: StatValue;
  maxHeartRate?: StatValue;
  stepCount?: StatValue;
}

export type StatisticField = keyof WorkoutStatistics;
