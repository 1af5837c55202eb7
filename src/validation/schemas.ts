import { z } from 'zod';

import { WorkoutListConfig } from '../config';
import { ACTIVITY_KIND_TAGS, EVENT_KIND_TAGS, QUANTITY_KINDS } from '../types';
import { BASE_UNITS, canConvert } from '../utils/units';

// =============================================================================
// INGEST PAYLOAD
// =============================================================================

// Any string Date.parse understands; mappers normalize to ISO 8601
const DateStringSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid date',
});

// Location schema for workout routes
export const RawLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  altitude: z.number().optional(),
  horizontalAccuracy: z.number().optional(),
  speed: z.number().optional(),
  timestamp: DateStringSchema,
});

const RawWorkoutEventSchema = z.object({
  type: z.string().min(1),
  start: DateStringSchema,
  end: DateStringSchema.optional(),
});

const RawWorkoutActivitySchema = z.object({
  activityType: z.string().min(1),
  start: DateStringSchema,
  end: DateStringSchema.optional(),
  duration: z.number().nonnegative(),
});

export const RawWorkoutSchema = z
  .object({
    id: z.string().min(1),
    activityType: z.string().min(1),
    sourceName: z.string(),
    start: DateStringSchema,
    end: DateStringSchema,
    duration: z.number().nonnegative(),
    events: z.array(RawWorkoutEventSchema).optional(),
    activities: z.array(RawWorkoutActivitySchema).optional(),
    route: z.array(RawLocationSchema).optional(),
  })
  .refine((workout) => Date.parse(workout.end) >= Date.parse(workout.start), {
    message: 'Workout end must not precede its start',
    path: ['end'],
  });

export const RawSampleSchema = z
  .object({
    kind: z.enum(QUANTITY_KINDS),
    start: DateStringSchema,
    end: DateStringSchema.optional(),
    qty: z.number().finite(),
    units: z.string(),
    source: z.string().optional(),
  })
  .refine((sample) => canConvert(sample.units, BASE_UNITS[sample.kind]), {
    message: 'Unit does not match quantity kind',
    path: ['units'],
  });

// Main ingest data schema
export const IngestDataSchema = z.object({
  data: z.object({
    samples: z.array(RawSampleSchema).optional(),
    workouts: z.array(RawWorkoutSchema).optional(),
  }),
});

// Query string of GET /api/workouts
export const WorkoutListQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .positive()
    .max(WorkoutListConfig.maxLimit)
    .default(WorkoutListConfig.defaultLimit),
});

// =============================================================================
// EXPORT DOCUMENT
// =============================================================================

const IsoInstantSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const StatValueSchema = z.object({
  unit: z.string(),
  value: z.number(),
});

const WorkoutStatisticsSchema = z.object({
  activeEnergyBurned: StatValueSchema.optional(),
  averageHeartRate: StatValueSchema.optional(),
  averagePower: StatValueSchema.optional(),
  averageSpeed: StatValueSchema.optional(),
  distance: StatValueSchema.optional(),
  maxHeartRate: StatValueSchema.optional(),
  stepCount: StatValueSchema.optional(),
});

const HeartRateSampleSchema = z.object({
  bpm: z.number(),
  date: IsoInstantSchema,
});

const RoutePointSchema = z.object({
  altitude: z.number(),
  horizontalAccuracy: z.number().nonnegative().optional(),
  latitude: z.number(),
  longitude: z.number(),
  speed: z.number().nonnegative().optional(),
  timestamp: IsoInstantSchema,
});

const WorkoutEventDataSchema = z.object({
  endDate: IsoInstantSchema.optional(),
  startDate: IsoInstantSchema,
  type: z.enum(EVENT_KIND_TAGS),
});

const ActivityDataSchema = z.object({
  duration: z.number(),
  endDate: IsoInstantSchema,
  startDate: IsoInstantSchema,
  statistics: WorkoutStatisticsSchema,
  type: z.enum(ACTIVITY_KIND_TAGS),
});

const WorkoutDataSchema = z.object({
  activities: z.array(ActivityDataSchema),
  duration: z.number(),
  endDate: IsoInstantSchema,
  events: z.array(WorkoutEventDataSchema),
  heartRateSamples: z.array(HeartRateSampleSchema),
  route: z.array(RoutePointSchema),
  sourceApp: z.string(),
  startDate: IsoInstantSchema,
  statistics: WorkoutStatisticsSchema,
  type: z.enum(ACTIVITY_KIND_TAGS),
});

export const WorkoutExportSchema = z.object({
  exportDate: IsoInstantSchema,
  exportVersion: z.string(),
  workout: WorkoutDataSchema,
});
