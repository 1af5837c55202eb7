/**
 * Export document encoding.
 * Canonical JSON: keys sorted at every level, ISO 8601 instants, two-space indent.
 */

import { SerializationError } from '../errors';
import { WorkoutExportSchema } from '../validation/schemas';

import type { WorkoutData, WorkoutExport } from '../types';

export interface SerializedExport {
  bytes: Buffer;
  filename: string;
}

export interface SerializeOptions {
  /** IANA time zone that decides the calendar day in the filename. */
  timeZone?: string;
}

const DEFAULT_TIME_ZONE = 'UTC';

/**
 * Encode an export document and propose a filename for it.
 *
 * @throws SerializationError for non-finite numbers, invalid dates or an unknown time zone
 */
export function serializeExport(
  workoutExport: WorkoutExport,
  options: SerializeOptions = {},
): SerializedExport {
  const canonical = toCanonicalJson(workoutExport, '$');
  const filename = exportFilename(workoutExport.workout, options.timeZone);

  return {
    bytes: Buffer.from(JSON.stringify(canonical, undefined, 2), 'utf8'),
    filename,
  };
}

/**
 * `workout-{type}-{yyyy-MM-dd}.json`, the day being the workout's start date in `timeZone`.
 */
export function exportFilename(
  workout: Pick<WorkoutData, 'startDate' | 'type'>,
  timeZone: string = DEFAULT_TIME_ZONE,
): string {
  return `workout-${workout.type}-${formatDay(workout.startDate, timeZone)}.json`;
}

/**
 * Decode and validate a serialized export document.
 *
 * @throws SerializationError if the bytes are not JSON or do not match the export schema
 */
export function parseExport(input: string | Uint8Array): WorkoutExport {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SerializationError('Export document is not valid JSON', { cause: error });
  }

  const result = WorkoutExportSchema.safeParse(raw);
  if (!result.success) {
    throw new SerializationError('Export document does not match the export schema', {
      cause: result.error,
    });
  }
  return result.data;
}

function formatDay(date: Date, timeZone: string): string {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      day: '2-digit',
      month: '2-digit',
      timeZone,
      year: 'numeric',
    }).formatToParts(date);
  } catch (error) {
    throw new SerializationError(`Cannot derive export filename date in "${timeZone}"`, {
      cause: error,
    });
  }

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((entry) => entry.type === type)?.value ?? '';
  // 'numeric' years below 1000 come back unpadded
  return `${part('year').padStart(4, '0')}-${part('month')}-${part('day')}`;
}

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

// Dates become ISO strings, object keys are sorted and undefined members are dropped.
function toCanonicalJson(value: unknown, path: string): unknown {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError(`Invalid date at ${path}`);
    }
    return value.toISOString();
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new SerializationError(`Non-finite number at ${path}`);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toCanonicalJson(item, `${path}[${String(index)}]`));
  }

  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    const sorted: Record<string, unknown> = {};
    for (const [key, member] of entries.sort(compareKeys)) {
      if (member === undefined) continue;
      sorted[key] = toCanonicalJson(member, `${path}.${key}`);
    }
    return sorted;
  }

  return value;
}
