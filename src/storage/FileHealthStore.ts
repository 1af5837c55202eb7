import path from 'node:path';

import { StorageConfig } from '../config';
import { ProviderQueryError } from '../errors';
import { STATISTIC_QUANTITY_KINDS } from '../export/statistics';
import {
  mapRoute,
  mapSample,
  mapWorkoutData,
  toProviderLocation,
  toProviderSample,
  toProviderWorkout,
  toProviderWorkoutSummary,
} from '../mappers';
import { debugProviderQuery, debugStorage } from '../utils/debugLogger';
import { logger as rootLogger } from '../utils/logger';
import {
  atomicWrite,
  dateKeysInRange,
  ensureDirectory,
  getDateKey,
  getFilePath,
  ownEntry,
  readJsonFile,
  readJsonFileOptional,
  withLock,
} from './fileHelpers';
import { aggregateSamples, isSampleInRange } from './sampleStatistics';

import type {
  DateRange,
  HealthDataProvider,
  ProviderLocation,
  ProviderQuantitySample,
  ProviderQueryOptions,
  ProviderRoute,
  ProviderWorkout,
  ProviderWorkoutSummary,
  QuantityKind,
  RawSample,
  RawWorkout,
  SampleDailyFile,
  SampleQuery,
  SaveResult,
  StoredQuantitySample,
  StoredRoute,
  StoredWorkout,
  WorkoutDailyFile,
  WorkoutIndexFile,
  WorkoutListQuery,
} from '../types';
import type { Logger } from '../utils/logger';

export interface FileHealthStoreOptions {
  dataDir?: string;
  log?: Logger;
}

interface FileSaveResult {
  saved: number;
  updated: number;
}

interface WorkoutEntry {
  day: WorkoutDailyFile;
  workout: StoredWorkout;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function groupByDay<T>(items: T[], startOf: (item: T) => string): Map<string, T[]> {
  const byDate = new Map<string, T[]>();
  for (const item of items) {
    const dateKey = getDateKey(startOf(item));
    const group = byDate.get(dateKey);
    if (group) {
      group.push(item);
    } else {
      byDate.set(dateKey, [item]);
    }
  }
  return byDate;
}

/**
 * Upsert identity of a sample within its kind.
 */
function sampleKey(sample: StoredQuantitySample): string {
  return `${sample.start}|${sample.source}`;
}

/**
 * Smallest range covering a workout and every sub-activity, so one sample load
 * answers all of their statistics.
 */
function coveringRange(workout: StoredWorkout): DateRange {
  let start = Date.parse(workout.start);
  let end = Date.parse(workout.end);
  for (const activity of workout.activities) {
    const activityStart = Date.parse(activity.start);
    const activityEnd =
      activity.end === undefined ? activityStart + activity.duration * 1000 : Date.parse(activity.end);
    start = Math.min(start, activityStart);
    end = Math.max(end, activityEnd);
  }
  return { end: new Date(end), start: new Date(start) };
}

/**
 * Health data store kept as daily JSON files under a data directory.
 *
 * Layout:
 *   workouts/YYYY/MM/YYYY-MM-DD.json  workouts and routes by UTC start day
 *   samples/YYYY/MM/YYYY-MM-DD.json   quantity samples by UTC start day
 *   workout-index.json                workout id -> day key
 *
 * Writes hold a per-file lock and go through temp file + rename.
 * A missing file reads as "no data"; any other read failure is a ProviderQueryError.
 */
export class FileHealthStore implements HealthDataProvider {
  private dataDir: string;
  private log: Logger;

  constructor(options: FileHealthStoreOptions = {}) {
    this.dataDir = options.dataDir ?? StorageConfig.dataDir;
    this.log = options.log ?? rootLogger;
  }

  /**
   * Initialize storage directories.
   */
  async init(): Promise<void> {
    const resolvedPath = path.resolve(this.dataDir);
    this.log.info('Initializing health data store', { dataDir: resolvedPath });

    await ensureDirectory(this.samplesDir);
    await ensureDirectory(this.workoutsDir);

    this.log.info('Health data store initialized', { dataDir: resolvedPath });
  }

  // === PATH HELPERS ===

  private get indexPath(): string {
    return path.join(this.dataDir, StorageConfig.indexFile);
  }

  private get samplesDir(): string {
    return path.join(this.dataDir, StorageConfig.samplesDir);
  }

  private get workoutsDir(): string {
    return path.join(this.dataDir, StorageConfig.workoutsDir);
  }

  // === SAMPLES ===

  /**
   * Save quantity samples, grouped by start day.
   * A sample with the same kind, start and source as a stored one replaces it.
   */
  async saveSamples(samples: RawSample[]): Promise<SaveResult> {
    if (samples.length === 0) {
      return { saved: 0, success: true, updated: 0 };
    }

    this.log.debug('Saving samples to storage', { count: samples.length });

    const byDate = groupByDay(samples, (sample) => sample.start);
    const result = await this.saveByDay(
      'samples',
      this.samplesDir,
      byDate,
      (filePath, dateKey, group) => this.saveSamplesToFile(group, filePath, dateKey),
    );

    this.log.debug('Samples saved to storage', {
      filesWritten: byDate.size,
      hasErrors: !result.success,
      saved: result.saved,
      updated: result.updated,
    });
    return result;
  }

  private async saveSamplesToFile(
    samples: RawSample[],
    filePath: string,
    dateKey: string,
  ): Promise<FileSaveResult> {
    return withLock(filePath, async () => {
      const content = await readJsonFile<SampleDailyFile>(filePath, {
        date: dateKey,
        samples: {},
        version: StorageConfig.fileVersion,
      });

      // Per-kind lookup for O(1) deduplication
      const lookups = new Map<QuantityKind, Map<string, number>>();
      let saved = 0;
      let updated = 0;

      for (const sample of samples) {
        const stored = mapSample(sample);
        const existing = content.samples[sample.kind] ?? [];
        content.samples[sample.kind] = existing;

        let lookup = lookups.get(sample.kind);
        if (!lookup) {
          lookup = new Map(existing.map((entry, index) => [sampleKey(entry), index]));
          lookups.set(sample.kind, lookup);
        }

        const key = sampleKey(stored);
        const existingIndex = lookup.get(key);
        if (existingIndex === undefined) {
          existing.push(stored);
          lookup.set(key, existing.length - 1);
          saved++;
        } else {
          existing[existingIndex] = stored;
          updated++;
        }
      }

      await atomicWrite(filePath, content);
      debugStorage(this.log, 'Wrote sample day file', { filePath, metadata: { saved, updated } });
      return { saved, updated };
    });
  }

  // === WORKOUTS ===

  /**
   * Save workouts (and their routes) grouped by start day, then record each
   * written workout in the index.
   *
   * A workout re-uploaded with a start on another day moves to that day's file,
   * taking its stored route along when the upload brings no route points.
   */
  async saveWorkouts(workouts: RawWorkout[]): Promise<SaveResult> {
    if (workouts.length === 0) {
      return { saved: 0, success: true, updated: 0 };
    }

    this.log.debug('Saving workouts to storage', { count: workouts.length });

    const byDate = groupByDay(workouts, (workout) => workout.start);
    const previousDays = await this.readIndexEntries();
    const indexed = new Map<string, string>();
    const moved = new Map<string, string>();
    const result = await this.saveByDay(
      'workouts',
      this.workoutsDir,
      byDate,
      async (filePath, dateKey, group) => {
        const carried = await this.routesToCarry(group, dateKey, previousDays);
        const fileResult = await this.saveWorkoutsToFile(group, filePath, dateKey, carried);
        for (const workout of group) {
          indexed.set(workout.id, dateKey);
          const previousDay = ownEntry(previousDays, workout.id);
          if (previousDay !== undefined && previousDay !== dateKey) {
            moved.set(workout.id, previousDay);
          }
        }
        return fileResult;
      },
    );

    if (indexed.size > 0) {
      try {
        await this.updateIndex(indexed);
      } catch (error) {
        this.log.error('Failed to update workout index', error);
        return {
          errors: [...(result.errors ?? []), `index: ${errorMessage(error)}`],
          saved: result.saved,
          success: false,
          updated: result.updated,
        };
      }
    }

    await this.pruneMovedWorkouts(moved);

    this.log.debug('Workouts saved to storage', {
      filesWritten: byDate.size,
      hasErrors: !result.success,
      saved: result.saved,
      updated: result.updated,
    });
    return result;
  }

  private async saveWorkoutsToFile(
    workouts: RawWorkout[],
    filePath: string,
    dateKey: string,
    carriedRoutes: Map<string, StoredRoute>,
  ): Promise<FileSaveResult> {
    return withLock(filePath, async () => {
      const content = await readJsonFile<WorkoutDailyFile>(filePath, {
        date: dateKey,
        routes: {},
        version: StorageConfig.fileVersion,
        workouts: {},
      });

      let saved = 0;
      let updated = 0;

      for (const workout of workouts) {
        if (ownEntry(content.workouts, workout.id)) {
          updated++;
        } else {
          saved++;
        }

        content.workouts[workout.id] = mapWorkoutData(workout);

        // A re-upload without route points keeps the stored route
        const carried = carriedRoutes.get(workout.id);
        if (workout.route && workout.route.length > 0) {
          content.routes[workout.id] = mapRoute(workout);
        } else if (carried) {
          content.routes[workout.id] = carried;
        }
      }

      await atomicWrite(filePath, content);
      debugStorage(this.log, 'Wrote workout day file', { filePath, metadata: { saved, updated } });
      return { saved, updated };
    });
  }

  /**
   * Current workout id -> day entries. An unreadable index only loses route
   * carry-over here; the index update that follows reports the failure.
   */
  private async readIndexEntries(): Promise<Record<string, string>> {
    try {
      const index = await readJsonFileOptional<WorkoutIndexFile>(this.indexPath);
      return index?.workouts ?? {};
    } catch (error) {
      this.log.warn('Workout index unreadable, stored routes of moved workouts are not carried', {
        error: errorMessage(error),
      });
      return {};
    }
  }

  /**
   * Stored routes of workouts that move to `dateKey` without bringing route points.
   */
  private async routesToCarry(
    workouts: RawWorkout[],
    dateKey: string,
    previousDays: Record<string, string>,
  ): Promise<Map<string, StoredRoute>> {
    const carried = new Map<string, StoredRoute>();
    const days = new Map<string, WorkoutDailyFile | undefined>();

    for (const workout of workouts) {
      const previousDay = ownEntry(previousDays, workout.id);
      if (previousDay === undefined || previousDay === dateKey) continue;
      if (workout.route && workout.route.length > 0) continue;

      if (!days.has(previousDay)) {
        const filePath = getFilePath(this.workoutsDir, previousDay);
        days.set(previousDay, await readJsonFileOptional<WorkoutDailyFile>(filePath));
      }
      const previous = days.get(previousDay);
      const route = previous ? ownEntry(previous.routes, workout.id) : undefined;
      if (route) carried.set(workout.id, route);
    }
    return carried;
  }

  /**
   * Remove moved workouts and their routes from the day files they left.
   * The index no longer points there, so a failure only leaves unreachable entries.
   */
  private async pruneMovedWorkouts(moved: Map<string, string>): Promise<void> {
    const byPreviousDay = new Map<string, string[]>();
    for (const [workoutId, previousDay] of moved) {
      byPreviousDay.set(previousDay, [...(byPreviousDay.get(previousDay) ?? []), workoutId]);
    }

    for (const [dateKey, workoutIds] of byPreviousDay) {
      const filePath = getFilePath(this.workoutsDir, dateKey);
      try {
        await withLock(filePath, async () => {
          const content = await readJsonFileOptional<WorkoutDailyFile>(filePath);
          if (!content) return;
          for (const workoutId of workoutIds) {
            delete content.workouts[workoutId];
            delete content.routes[workoutId];
          }
          await atomicWrite(filePath, content);
          debugStorage(this.log, 'Removed moved workouts from day file', {
            filePath,
            metadata: { removed: workoutIds.length },
          });
        });
      } catch (error) {
        this.log.warn('Failed to remove moved workouts from their previous day file', {
          dateKey,
          error: errorMessage(error),
        });
      }
    }
  }

  private async updateIndex(entries: Map<string, string>): Promise<void> {
    const indexPath = this.indexPath;
    await withLock(indexPath, async () => {
      const index = await readJsonFile<WorkoutIndexFile>(indexPath, {
        version: StorageConfig.fileVersion,
        workouts: {},
      });
      for (const [workoutId, dateKey] of entries) {
        index.workouts[workoutId] = dateKey;
      }
      await atomicWrite(indexPath, index);
      debugStorage(this.log, 'Updated workout index', {
        filePath: indexPath,
        metadata: { entries: entries.size },
      });
    });
  }

  private async saveByDay<T>(
    label: string,
    baseDirectory: string,
    byDate: Map<string, T[]>,
    save: (filePath: string, dateKey: string, group: T[]) => Promise<FileSaveResult>,
  ): Promise<SaveResult> {
    let totalSaved = 0;
    let totalUpdated = 0;
    const errors: string[] = [];

    // One day file at a time keeps the lock order simple
    for (const [dateKey, group] of byDate) {
      const filePath = getFilePath(baseDirectory, dateKey);
      try {
        const result = await save(filePath, dateKey, group);
        totalSaved += result.saved;
        totalUpdated += result.updated;
      } catch (error) {
        this.log.error(`Failed to save ${label} to file`, error, { dateKey });
        errors.push(`${dateKey}: ${errorMessage(error)}`);
      }
    }

    return {
      saved: totalSaved,
      success: errors.length === 0,
      updated: totalUpdated,
      ...(errors.length > 0 ? { errors } : {}),
    };
  }

  // === PROVIDER QUERIES ===

  async getWorkout(
    id: string,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderWorkout | undefined> {
    return this.runQuery('getWorkout', options, async () => {
      const entry = await this.findWorkout(id, options.signal);
      if (!entry) {
        debugProviderQuery(this.log, 'getWorkout', { found: false, workoutId: id });
        return undefined;
      }

      const samples = await this.loadSamples(
        STATISTIC_QUANTITY_KINDS,
        coveringRange(entry.workout),
        options.signal,
      );
      debugProviderQuery(this.log, 'getWorkout', {
        found: true,
        statisticKinds: samples.size,
        workoutId: id,
      });

      return toProviderWorkout(entry.workout, (kind, range) =>
        aggregateSamples(kind, samples.get(kind) ?? [], range),
      );
    });
  }

  /**
   * Indexed workouts of the requested kinds, ordered by end date.
   */
  async listWorkouts(
    query: WorkoutListQuery,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderWorkoutSummary[]> {
    return this.runQuery('listWorkouts', options, async () => {
      const index = await readJsonFileOptional<WorkoutIndexFile>(this.indexPath, options.signal);

      const idsByDay = new Map<string, string[]>();
      for (const [workoutId, dateKey] of Object.entries(index?.workouts ?? {})) {
        idsByDay.set(dateKey, [...(idsByDay.get(dateKey) ?? []), workoutId]);
      }

      const kinds = new Set(query.kinds);
      const matching: StoredWorkout[] = [];
      for (const [dateKey, workoutIds] of idsByDay) {
        const filePath = getFilePath(this.workoutsDir, dateKey);
        const day = await readJsonFileOptional<WorkoutDailyFile>(filePath, options.signal);
        if (!day) continue;

        for (const workoutId of workoutIds) {
          const workout = ownEntry(day.workouts, workoutId);
          if (workout && kinds.has(workout.activityType)) matching.push(workout);
        }
      }

      const direction = query.order === 'ascending' ? 1 : -1;
      matching.sort((a, b) => direction * (Date.parse(a.end) - Date.parse(b.end)));
      const limited = query.limit === undefined ? matching : matching.slice(0, query.limit);

      debugProviderQuery(this.log, 'listWorkouts', {
        days: idsByDay.size,
        limit: query.limit,
        matched: matching.length,
        returned: limited.length,
      });
      return limited.map((workout) => toProviderWorkoutSummary(workout));
    });
  }

  async querySamples(
    query: SampleQuery,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderQuantitySample[]> {
    return this.runQuery('querySamples', options, async () => {
      const samples = await this.loadSamples([query.kind], query.range, options.signal);
      const direction = query.order === 'ascending' ? 1 : -1;
      const sorted = (samples.get(query.kind) ?? []).sort(
        (a, b) => direction * (Date.parse(a.start) - Date.parse(b.start)),
      );
      const limited = query.limit === undefined ? sorted : sorted.slice(0, query.limit);

      debugProviderQuery(this.log, 'querySamples', {
        kind: query.kind,
        limit: query.limit,
        matched: sorted.length,
        returned: limited.length,
      });
      return limited.map((sample) => toProviderSample(sample));
    });
  }

  async queryRoute(
    workout: ProviderWorkout,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderRoute | undefined> {
    return this.runQuery('queryRoute', options, async () => {
      const entry = await this.findWorkout(workout.id, options.signal);
      const route = entry ? ownEntry(entry.day.routes, workout.id) : undefined;
      const found = route !== undefined && route.locations.length > 0;

      debugProviderQuery(this.log, 'queryRoute', { found, workoutId: workout.id });
      return found ? { id: `route-${workout.id}`, workoutId: workout.id } : undefined;
    });
  }

  async *routeLocations(
    route: ProviderRoute,
    options: ProviderQueryOptions = {},
  ): AsyncGenerator<ProviderLocation> {
    const locations = await this.runQuery('routeLocations', options, async () => {
      const entry = await this.findWorkout(route.workoutId, options.signal);
      const stored = entry ? ownEntry(entry.day.routes, route.workoutId) : undefined;
      return stored?.locations ?? [];
    });

    debugProviderQuery(this.log, 'routeLocations', {
      count: locations.length,
      routeId: route.id,
    });

    const chronological = [...locations].sort(
      (a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp),
    );
    for (const location of chronological) {
      options.signal?.throwIfAborted();
      yield toProviderLocation(location);
    }
  }

  // === READ HELPERS ===

  private async findWorkout(id: string, signal?: AbortSignal): Promise<WorkoutEntry | undefined> {
    const index = await readJsonFileOptional<WorkoutIndexFile>(this.indexPath, signal);
    const dateKey = index ? ownEntry(index.workouts, id) : undefined;
    if (dateKey === undefined) return undefined;

    const filePath = getFilePath(this.workoutsDir, dateKey);
    debugStorage(this.log, 'Reading workout day file', { filePath });
    const day = await readJsonFileOptional<WorkoutDailyFile>(filePath, signal);
    const workout = day ? ownEntry(day.workouts, id) : undefined;

    return day && workout ? { day, workout } : undefined;
  }

  /**
   * Samples of the given kinds whose start lies within the range.
   */
  private async loadSamples(
    kinds: readonly QuantityKind[],
    range: DateRange,
    signal?: AbortSignal,
  ): Promise<Map<QuantityKind, StoredQuantitySample[]>> {
    const byKind = new Map<QuantityKind, StoredQuantitySample[]>();
    if (range.end < range.start) return byKind;

    for (const dateKey of dateKeysInRange(range)) {
      const filePath = getFilePath(this.samplesDir, dateKey);
      const day = await readJsonFileOptional<SampleDailyFile>(filePath, signal);
      if (!day) continue;

      for (const kind of kinds) {
        const inRange = (day.samples[kind] ?? []).filter((sample) => isSampleInRange(sample, range));
        if (inRange.length === 0) continue;
        byKind.set(kind, [...(byKind.get(kind) ?? []), ...inRange]);
      }
    }
    return byKind;
  }

  /**
   * Run a read, turning failures into ProviderQueryError.
   * Cancellation is passed through as the signal's own reason.
   */
  private async runQuery<T>(
    operation: string,
    options: ProviderQueryOptions,
    query: () => Promise<T>,
  ): Promise<T> {
    options.signal?.throwIfAborted();
    try {
      return await query();
    } catch (error) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      throw new ProviderQueryError(operation, error);
    }
  }
}
