/**
 * Ingest API type definitions.
 * Request types are inferred from the zod schemas so the two never drift apart.
 */

import type { z } from 'zod';

import type {
  IngestDataSchema,
  RawLocationSchema,
  RawSampleSchema,
  RawWorkoutSchema,
} from '../validation/schemas';

export type IngestData = z.infer<typeof IngestDataSchema>;

export type RawLocation = z.infer<typeof RawLocationSchema>;

export type RawSample = z.infer<typeof RawSampleSchema>;

export type RawWorkout = z.infer<typeof RawWorkoutSchema>;

export interface IngestResponse {
  samples?: {
    success: boolean;
    error?: string;
    message?: string;
  };
  workouts?: {
    success: boolean;
    error?: string;
    message?: string;
  };
}
