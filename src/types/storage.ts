import type { QuantityKind } from './provider';

// Dates are kept as ISO 8601 strings on disk; mappers revive them.

export interface SampleDailyFile {
  date: string; // YYYY-MM-DD
  samples: Partial<Record<QuantityKind, StoredQuantitySample[]>>;
  version: number;
}

export interface WorkoutDailyFile {
  date: string; // YYYY-MM-DD
  routes: Record<string, StoredRoute>; // keyed by workoutId
  version: number;
  workouts: Record<string, StoredWorkout>; // keyed by workoutId
}

export interface WorkoutIndexFile {
  version: number;
  workouts: Record<string, string>; // workoutId -> YYYY-MM-DD
}

export interface StoredLocation {
  latitude: number;
  longitude: number;
  timestamp: string;
  altitude?: number;
  horizontalAccuracy?: number;
  speed?: number;
}

export interface StoredQuantitySample {
  end: string;
  qty: number;
  source: string;
  start: string;
  units: string;
}

export interface StoredRoute {
  locations: StoredLocation[];
  workoutId: string;
}

export interface StoredWorkout {
  activities: StoredWorkoutActivity[];
  activityType: string;
  duration: number;
  end: string;
  events: StoredWorkoutEvent[];
  sourceName: string;
  start: string;
  workoutId: string;
}

export interface StoredWorkoutActivity {
  activityType: string;
  duration: number;
  start: string;
  end?: string;
}

export interface StoredWorkoutEvent {
  start: string;
  type: string;
  end?: string;
}

export interface SaveResult {
  saved: number;
  success: boolean;
  updated: number;
  errors?: string[];
}
