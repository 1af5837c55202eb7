import assert from 'node:assert/strict';
import test from 'node:test';

import { UnitConversionError } from '../errors';
import { fixedStatistics, InMemoryHealthProvider } from '../provider/InMemoryHealthProvider';
import { Logger } from '../utils/logger';
import { buildExport } from './assembler';

import type { InMemoryHealthData } from '../provider/InMemoryHealthProvider';
import type {
  ProviderQuantitySample,
  ProviderQueryOptions,
  ProviderRoute,
  ProviderWorkout,
  SampleQuery,
} from '../types';

const start = new Date('2024-03-07T08:15:00.000Z');
const end = new Date('2024-03-07T08:45:00.000Z');
const exportedAt = new Date('2024-03-07T09:00:00.000Z');

function runningWorkout(overrides: Partial<ProviderWorkout> = {}): ProviderWorkout {
  return {
    activities: [],
    activityType: 'running',
    duration: 1800,
    endDate: end,
    events: [{ startDate: new Date('2024-03-07T08:25:00.000Z'), type: 'lap' }],
    id: 'w-1',
    sourceName: 'Watch',
    startDate: start,
    statistics: fixedStatistics({
      activeEnergyBurned: { sum: { unit: 'kcal', value: 320 } },
      distanceWalkingRunning: { sum: { unit: 'm', value: 5000 } },
    }),
    ...overrides,
  };
}

const oneHeartRateSample: InMemoryHealthData = {
  samples: {
    heartRate: [
      {
        endDate: new Date('2024-03-07T08:20:00.000Z'),
        quantity: { unit: 'count/min', value: 142 },
        startDate: new Date('2024-03-07T08:20:00.000Z'),
      },
    ],
  },
};

function providerWithOneSample(): InMemoryHealthProvider {
  return new InMemoryHealthProvider(oneHeartRateSample);
}

/**
 * Heart-rate reads hold until the gate opens, either from the test or when the
 * route is asked for. Once released they answer without looking at the signal.
 */
class GatedProvider extends InMemoryHealthProvider {
  readonly sampleSignals: (AbortSignal | undefined)[] = [];
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor(
    private readonly openOnRoute: boolean,
    data: InMemoryHealthData = {},
  ) {
    super(data);
  }

  open(): void {
    this.release();
  }

  async querySamples(
    query: SampleQuery,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderQuantitySample[]> {
    this.sampleSignals.push(options.signal);
    await this.gate;
    return super.querySamples(query);
  }

  async queryRoute(
    workout: ProviderWorkout,
    options: ProviderQueryOptions = {},
  ): Promise<ProviderRoute | undefined> {
    if (this.openOnRoute) this.open();
    return super.queryRoute(workout, options);
  }
}

test('a running workout with one sample, no route and a lap assembles fully', async () => {
  const workoutExport = await buildExport(providerWithOneSample(), runningWorkout(), {
    now: () => exportedAt,
  });

  assert.deepEqual(workoutExport, {
    exportDate: exportedAt,
    exportVersion: '1.0',
    workout: {
      activities: [],
      duration: 1800,
      endDate: end,
      events: [{ startDate: new Date('2024-03-07T08:25:00.000Z'), type: 'lap' }],
      heartRateSamples: [{ bpm: 142, date: new Date('2024-03-07T08:20:00.000Z') }],
      route: [],
      sourceApp: 'Watch',
      startDate: start,
      statistics: {
        activeEnergyBurned: { unit: 'kcal', value: 320 },
        distance: { unit: 'km', value: 5 },
      },
      type: 'running',
    },
  });
  assert.equal('endDate' in workoutExport.workout.events[0], false);
});

test('the route fetch starts while the heart-rate fetch is still pending', { timeout: 2000 }, async () => {
  const provider = new GatedProvider(true, oneHeartRateSample);

  const workoutExport = await buildExport(provider, runningWorkout());

  assert.deepEqual(provider.calls, ['queryRoute', 'querySamples']);
  assert.deepEqual(workoutExport.workout.heartRateSamples, [
    { bpm: 142, date: new Date('2024-03-07T08:20:00.000Z') },
  ]);
});

test('a route failure rejects the export even when heart rate succeeded', async () => {
  const failure = new Error('route read failed');
  const provider = providerWithOneSample().failOn('queryRoute', failure);

  await assert.rejects(buildExport(provider, runningWorkout()), (error: unknown) => error === failure);
});

test('when both fetches fail the heart-rate error wins and the route error is logged', async () => {
  const heartRateFailure = new Error('samples unreadable');
  const routeFailure = new Error('route unreadable');
  const provider = new InMemoryHealthProvider()
    .failOn('querySamples', heartRateFailure)
    .failOn('queryRoute', routeFailure);

  const errors: string[] = [];
  const log = new Logger({
    json: true,
    minLevel: 'error',
    write: (_level, line) => {
      errors.push(line);
    },
  });

  await assert.rejects(
    buildExport(provider, runningWorkout(), { log }),
    (error: unknown) => error === heartRateFailure,
  );

  const routeEntry = errors
    .map((line) => JSON.parse(line))
    .find((entry) => entry.message === 'Route fetch also failed');
  assert.equal(routeEntry?.error.message, 'route unreadable');
  assert.deepEqual(routeEntry?.bindings, { workoutId: 'w-1' });
});

test('an already aborted signal rejects with its reason before any query', async () => {
  const provider = providerWithOneSample();
  const controller = new AbortController();
  const reason = new Error('client went away');
  controller.abort(reason);

  await assert.rejects(
    buildExport(provider, runningWorkout(), { signal: controller.signal }),
    (error: unknown) => error === reason,
  );
  assert.deepEqual(provider.calls, []);
});

test('an abort while a fetch is pending rejects with its reason', { timeout: 2000 }, async () => {
  const provider = new GatedProvider(false, oneHeartRateSample);
  const controller = new AbortController();
  const reason = new Error('client went away');

  const pending = buildExport(provider, runningWorkout(), { signal: controller.signal });
  controller.abort(reason);
  provider.open();

  await assert.rejects(pending, (error: unknown) => error === reason);
  assert.equal(provider.sampleSignals[0]?.aborted, true);
});

test('an extraction failure abandons the fetches already started', async () => {
  const provider = new GatedProvider(false, oneHeartRateSample);
  const workout = runningWorkout({
    statistics: fixedStatistics({ heartRate: { average: { unit: 'lightyear', value: 3 } } }),
  });

  await assert.rejects(buildExport(provider, workout), UnitConversionError);

  const [sampleSignal] = provider.sampleSignals;
  assert.equal(sampleSignal?.aborted, true);
  assert.ok(sampleSignal?.reason instanceof UnitConversionError);
});

test('sub-activities are exported with their own statistics', async () => {
  const workoutExport = await buildExport(
    new InMemoryHealthProvider(),
    runningWorkout({
      activities: [
        {
          activityType: 'functionalStrengthTraining',
          duration: 600,
          startDate: start,
          statistics: fixedStatistics({ heartRate: { maximum: { unit: 'count/min', value: 171 } } }),
        },
      ],
      events: [],
    }),
    { now: () => exportedAt },
  );

  assert.deepEqual(workoutExport.workout.activities, [
    {
      duration: 600,
      endDate: new Date('2024-03-07T08:25:00.000Z'),
      startDate: start,
      statistics: { maxHeartRate: { unit: 'bpm', value: 171 } },
      type: 'functional_strength',
    },
  ]);
  assert.deepEqual(workoutExport.workout.heartRateSamples, []);
});
