import { HttpStatus, WorkoutListConfig } from '../config';
import { ProviderQueryError } from '../errors';
import { toWorkoutListEntry } from '../mappers';
import { healthStore } from '../storage';
import { debugTransform, debugValidation } from '../utils/debugLogger';
import { WorkoutListQuerySchema } from '../validation/schemas';

import type { IngestData, IngestResponse } from '../types';
import type { Logger } from '../utils/logger';
import type { Request, Response } from 'express';

export const saveWorkouts = async (
  ingestData: IngestData,
  log?: Logger,
): Promise<IngestResponse> => {
  const timer = log?.startTimer('saveWorkouts');

  try {
    const response: IngestResponse = {};
    const workouts = ingestData.data.workouts ?? [];

    if (workouts.length === 0) {
      log?.debug('No workout data provided');
      response.workouts = {
        message: 'No workout data provided',
        success: true,
      };
      timer?.end('info', 'No workouts to save');
      return response;
    }

    log?.debug('Processing workouts', { count: workouts.length });

    const result = await healthStore.saveWorkouts(workouts);
    debugTransform(log, 'saveWorkouts', workouts.length, result.saved + result.updated);

    response.workouts = {
      message: `${String(result.saved)} workouts saved, ${String(result.updated)} updated`,
      success: result.success,
      ...(result.errors ? { error: result.errors.join('; ') } : {}),
    };

    timer?.end(result.success ? 'info' : 'warn', 'Workouts saved', {
      errors: result.errors,
      saved: result.saved,
      updated: result.updated,
    });

    return response;
  } catch (error) {
    timer?.end('error', 'Failed to save workouts', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });

    return {
      workouts: {
        error: error instanceof Error ? error.message : 'An error occurred',
        message: 'Workouts not saved',
        success: false,
      },
    };
  }
};

/**
 * GET /api/workouts?limit=N
 * Exportable workouts, most recently finished first.
 */
export const listWorkouts = async (req: Request, res: Response) => {
  const { log } = req;
  const timer = log.startTimer('listWorkouts');

  const parseResult = WorkoutListQuerySchema.safeParse(req.query);
  debugValidation(log, parseResult.success, undefined, parseResult.error?.issues);
  if (!parseResult.success) {
    timer.end('warn', 'Invalid workout list query', { errors: parseResult.error.issues });
    res.status(HttpStatus.BAD_REQUEST).json({
      details: parseResult.error.issues,
      error: 'Invalid query',
    });
    return;
  }

  try {
    const workouts = await healthStore.listWorkouts({
      kinds: WorkoutListConfig.kinds,
      limit: parseResult.data.limit,
      order: 'descending',
    });

    timer.end('info', 'Workouts listed', { count: workouts.length });
    res.status(HttpStatus.OK).json({
      workouts: workouts.map((workout) => toWorkoutListEntry(workout)),
    });
  } catch (error) {
    const unavailable = error instanceof ProviderQueryError;
    timer.end('error', 'Failed to list workouts', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    res
      .status(unavailable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.INTERNAL_SERVER_ERROR)
      .json({
        error: unavailable ? 'Health data unavailable' : 'Failed to list workouts',
        message: error instanceof Error ? error.message : 'An error occurred',
      });
  }
};
