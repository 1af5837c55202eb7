import { ExportConfig, HttpStatus } from '../config';
import { ProviderQueryError } from '../errors';
import { buildExport, serializeExport } from '../export';
import { exportWriter, healthStore } from '../storage';

import type { Request, Response } from 'express';

/**
 * POST /api/workouts/:id/export
 * Assemble the workout's export document and write it to the exports directory.
 * The document itself is not sent back; the response describes the written file.
 */
export const exportWorkout = async (req: Request, res: Response) => {
  const { log } = req;
  const workoutId = req.params.id;
  const timer = log.startTimer('exportWorkout');

  // The listener is removed before this handler responds, so a close seen while it
  // is registered means the client went away or a timeout already answered.
  const controller = new AbortController();
  const abortOnClose = () => {
    controller.abort(new Error('Response closed before the export completed'));
  };
  res.on('close', abortOnClose);

  const { signal } = controller;

  try {
    const workout = await healthStore.getWorkout(workoutId, { signal });
    if (!workout) {
      timer.end('warn', 'Workout not found', { workoutId });
      res.status(HttpStatus.NOT_FOUND).json({
        error: 'Workout not found',
        message: `No workout with id "${workoutId}"`,
      });
      return;
    }

    const workoutExport = await buildExport(healthStore, workout, { log, signal });
    const serialized = serializeExport(workoutExport, { timeZone: ExportConfig.timeZone });
    signal.throwIfAborted();
    const filePath = await exportWriter.write(serialized);

    timer.end('info', 'Workout exported', {
      bytes: serialized.bytes.length,
      filename: serialized.filename,
      workoutId,
    });

    res.status(HttpStatus.CREATED).json({
      bytes: serialized.bytes.length,
      exportVersion: workoutExport.exportVersion,
      filename: serialized.filename,
      path: filePath,
    });
  } catch (error) {
    if (signal.aborted) {
      timer.end('warn', 'Export cancelled', { reason: String(signal.reason), workoutId });
      return;
    }

    const unavailable = error instanceof ProviderQueryError;
    timer.end('error', 'Failed to export workout', {
      error: error instanceof Error ? error.message : 'Unknown error',
      workoutId,
    });
    res
      .status(unavailable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.INTERNAL_SERVER_ERROR)
      .json({
        error: unavailable ? 'Health data unavailable' : 'Failed to export workout',
        message: error instanceof Error ? error.message : 'An error occurred',
      });
  } finally {
    res.off('close', abortOnClose);
  }
};
