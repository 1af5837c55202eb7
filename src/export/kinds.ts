/**
 * Provider kind identifiers -> normalized export tags.
 * The provider adds kinds over time, so lookups fall back instead of failing.
 */

import type { ActivityKindTag, EventKindTag } from '../types';

const ACTIVITY_KINDS: ReadonlyMap<string, ActivityKindTag> = new Map([
  ['functionalStrengthTraining', 'functional_strength'],
  ['running', 'running'],
  ['traditionalStrengthTraining', 'strength_training'],
]);

const EVENT_KINDS: ReadonlyMap<string, EventKindTag> = new Map([
  ['lap', 'lap'],
  ['marker', 'marker'],
  ['motionPaused', 'motionPaused'],
  ['motionResumed', 'motionResumed'],
  ['pause', 'pause'],
  ['resume', 'resume'],
  ['segment', 'segment'],
]);

/**
 * Tag for a workout or sub-activity kind; unmapped kinds become 'other'.
 */
export function workoutTypeName(activityType: string): ActivityKindTag {
  return ACTIVITY_KINDS.get(activityType) ?? 'other';
}

/**
 * Tag for a workout event kind; unmapped kinds become 'unknown'.
 */
export function eventTypeName(eventType: string): EventKindTag {
  return EVENT_KINDS.get(eventType) ?? 'unknown';
}
