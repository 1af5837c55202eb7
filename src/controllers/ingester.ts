import { HttpStatus } from '../config';
import { debugRequest, debugValidation } from '../utils/debugLogger';
import { IngestDataSchema } from '../validation/schemas';
import { saveSamples } from './samples';
import { saveWorkouts } from './workouts';

import type { IngestResponse } from '../types';
import type { Request, Response } from 'express';

function reasonMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : 'Unknown error';
}

export const ingestData = async (req: Request, res: Response) => {
  const { log } = req;
  const timer = log.startTimer('ingestData');
  let response: IngestResponse = {};

  try {
    debugRequest(log, req.body);

    const parseResult = IngestDataSchema.safeParse(req.body);
    debugValidation(log, parseResult.success, undefined, parseResult.error?.issues);
    if (!parseResult.success) {
      timer.end('warn', 'Invalid request body', { errors: parseResult.error.issues });
      res.status(HttpStatus.BAD_REQUEST).json({
        details: parseResult.error.issues,
        error: 'Invalid request format',
      });
      return;
    }

    const data = parseResult.data;

    log.info('Processing ingestion request', {
      samplesCount: data.data.samples?.length ?? 0,
      workoutsCount: data.data.workouts?.length ?? 0,
    });

    // One failure doesn't stop the other
    const [samplesResult, workoutsResult] = await Promise.allSettled([
      saveSamples(data, log),
      saveWorkouts(data, log),
    ]);

    if (samplesResult.status === 'fulfilled') {
      response = { ...response, ...samplesResult.value };
    } else {
      log.error('Samples save failed', samplesResult.reason);
      response.samples = { error: reasonMessage(samplesResult.reason), success: false };
    }
    if (workoutsResult.status === 'fulfilled') {
      response = { ...response, ...workoutsResult.value };
    } else {
      log.error('Workouts save failed', workoutsResult.reason);
      response.workouts = { error: reasonMessage(workoutsResult.reason), success: false };
    }

    const outcomes = [response.samples, response.workouts].filter((outcome) => outcome !== undefined);
    const hasErrors = outcomes.some((outcome) => !outcome.success);
    const allFailed = outcomes.every((outcome) => !outcome.success);

    if (allFailed) {
      timer.end('error', 'Ingestion completely failed', { response });
      res.status(HttpStatus.INTERNAL_SERVER_ERROR).json(response);
      return;
    }

    timer.end(hasErrors ? 'warn' : 'info', 'Ingestion completed', {
      hasPartialErrors: hasErrors,
      samplesResult: response.samples,
      workoutsResult: response.workouts,
    });

    res.status(hasErrors ? HttpStatus.MULTI_STATUS : HttpStatus.OK).json(response);
  } catch (error) {
    timer.end('error', 'Failed to process ingestion request', {
      error: reasonMessage(error),
    });
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      error: 'Failed to process request',
      message: error instanceof Error ? error.message : 'An error occurred',
    });
  }
};
