import { healthStore } from '../storage';
import { debugTransform } from '../utils/debugLogger';

import type { IngestData, IngestResponse } from '../types';
import type { Logger } from '../utils/logger';

export const saveSamples = async (
  ingestData: IngestData,
  log?: Logger,
): Promise<IngestResponse> => {
  const timer = log?.startTimer('saveSamples');
  const samples = ingestData.data.samples ?? [];

  if (samples.length === 0) {
    log?.debug('No sample data provided');
    timer?.end('info', 'No samples to save');
    return { samples: { message: 'No sample data provided', success: true } };
  }

  try {
    const result = await healthStore.saveSamples(samples);
    debugTransform(log, 'saveSamples', samples.length, result.saved + result.updated);

    timer?.end(result.success ? 'info' : 'warn', 'Samples saved', {
      errors: result.errors,
      saved: result.saved,
      updated: result.updated,
    });

    return {
      samples: {
        message: `${String(result.saved)} samples saved, ${String(result.updated)} updated`,
        success: result.success,
        ...(result.errors ? { error: result.errors.join('; ') } : {}),
      },
    };
  } catch (error) {
    timer?.end('error', 'Failed to save samples', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });

    return {
      samples: {
        error: error instanceof Error ? error.message : 'An error occurred',
        message: 'Samples not saved',
        success: false,
      },
    };
  }
};
