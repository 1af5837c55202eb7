import assert from 'node:assert/strict';
import test from 'node:test';

import {
  IngestDataSchema,
  RawSampleSchema,
  WorkoutExportSchema,
  WorkoutListQuerySchema,
} from './schemas';

const workout = {
  activityType: 'running',
  duration: 1800,
  end: '2024-03-07T08:45:00Z',
  id: 'w-1',
  sourceName: 'Watch',
  start: '2024-03-07T08:15:00Z',
};

test('a payload with workouts and samples is accepted', () => {
  const result = IngestDataSchema.safeParse({
    data: {
      samples: [{ kind: 'heartRate', qty: 142, start: '2024-03-07T08:20:00Z', units: 'count/min' }],
      workouts: [workout],
    },
  });

  assert.equal(result.success, true);
});

test('an empty data object is accepted', () => {
  assert.equal(IngestDataSchema.safeParse({ data: {} }).success, true);
});

test('a workout ending before it starts is rejected on its end field', () => {
  const result = IngestDataSchema.safeParse({
    data: { workouts: [{ ...workout, end: '2024-03-07T08:00:00Z' }] },
  });

  assert.equal(result.success, false);
  assert.deepEqual(result.error?.issues[0].path, ['data', 'workouts', 0, 'end']);
});

test('unparseable dates are rejected', () => {
  const result = IngestDataSchema.safeParse({
    data: { workouts: [{ ...workout, start: 'yesterday-ish' }] },
  });

  assert.equal(result.success, false);
});

test('samples must use a unit of their kind', () => {
  const sample = { kind: 'heartRate', qty: 142, start: '2024-03-07T08:20:00Z' };

  assert.equal(RawSampleSchema.safeParse({ ...sample, units: 'Hz' }).success, true);

  const result = RawSampleSchema.safeParse({ ...sample, units: 'km' });
  assert.equal(result.success, false);
  assert.deepEqual(result.error?.issues[0].path, ['units']);
});

test('unknown sample kinds are rejected', () => {
  const result = RawSampleSchema.safeParse({
    kind: 'bloodGlucose',
    qty: 5.4,
    start: '2024-03-07T08:20:00Z',
    units: 'mmol/L',
  });

  assert.equal(result.success, false);
});

test('export documents revive instants and reject negative accuracy', () => {
  const document = {
    exportDate: '2024-03-07T09:00:00.000Z',
    exportVersion: '1.0',
    workout: {
      activities: [],
      duration: 1800,
      endDate: '2024-03-07T08:45:00.000Z',
      events: [],
      heartRateSamples: [],
      route: [
        {
          altitude: 0,
          horizontalAccuracy: 5,
          latitude: 52.37,
          longitude: 4.89,
          timestamp: '2024-03-07T08:15:00.000Z',
        },
      ],
      sourceApp: 'Watch',
      startDate: '2024-03-07T08:15:00.000Z',
      statistics: {},
      type: 'running',
    },
  };

  const parsed = WorkoutExportSchema.parse(document);
  assert.deepEqual(parsed.exportDate, new Date('2024-03-07T09:00:00.000Z'));

  const negative = {
    ...document,
    workout: {
      ...document.workout,
      route: [{ ...document.workout.route[0], horizontalAccuracy: -1 }],
    },
  };
  assert.equal(WorkoutExportSchema.safeParse(negative).success, false);
});

test('the workout list limit defaults to 50 and must be a positive integer up to 500', () => {
  assert.deepEqual(WorkoutListQuerySchema.parse({}), { limit: 50 });
  assert.deepEqual(WorkoutListQuerySchema.parse({ limit: '20' }), { limit: 20 });

  for (const limit of ['0', '501', '2.5', 'many']) {
    assert.equal(WorkoutListQuerySchema.safeParse({ limit }).success, false, limit);
  }
});
