import assert from 'node:assert/strict';
import test from 'node:test';

import { SerializationError } from '../errors';
import { exportFilename, parseExport, serializeExport } from './serializer';

import type { WorkoutData, WorkoutExport } from '../types';

function minimalExport(overrides: Partial<WorkoutData> = {}): WorkoutExport {
  return {
    exportDate: new Date('2024-03-07T09:00:00.000Z'),
    exportVersion: '1.0',
    workout: {
      activities: [],
      duration: 1800,
      endDate: new Date('2024-03-07T08:45:00.000Z'),
      events: [],
      heartRateSamples: [],
      route: [],
      sourceApp: 'Watch',
      startDate: new Date('2024-03-07T08:15:00.000Z'),
      statistics: { distance: { unit: 'km', value: 5 } },
      type: 'running',
      ...overrides,
    },
  };
}

test('documents are written as sorted, indented JSON with ISO instants', () => {
  const { bytes } = serializeExport(minimalExport());

  assert.equal(
    bytes.toString('utf8'),
    [
      '{',
      '  "exportDate": "2024-03-07T09:00:00.000Z",',
      '  "exportVersion": "1.0",',
      '  "workout": {',
      '    "activities": [],',
      '    "duration": 1800,',
      '    "endDate": "2024-03-07T08:45:00.000Z",',
      '    "events": [],',
      '    "heartRateSamples": [],',
      '    "route": [],',
      '    "sourceApp": "Watch",',
      '    "startDate": "2024-03-07T08:15:00.000Z",',
      '    "statistics": {',
      '      "distance": {',
      '        "unit": "km",',
      '        "value": 5',
      '      }',
      '    },',
      '    "type": "running"',
      '  }',
      '}',
    ].join('\n'),
  );
});

test('the filename uses the workout type and its UTC start day by default', () => {
  assert.equal(serializeExport(minimalExport()).filename, 'workout-running-2024-03-07.json');
});

test('the filename day follows the requested time zone', () => {
  const workout = { startDate: new Date('2024-03-07T03:00:00.000Z'), type: 'other' as const };

  assert.equal(exportFilename(workout), 'workout-other-2024-03-07.json');
  assert.equal(
    exportFilename(workout, 'America/Los_Angeles'),
    'workout-other-2024-03-06.json',
  );
});

test('the filename year is always four digits', () => {
  const workout = { startDate: new Date('0999-01-02T12:00:00.000Z'), type: 'running' as const };

  assert.equal(exportFilename(workout), 'workout-running-0999-01-02.json');
});

test('an unknown time zone is a serialization error', () => {
  assert.throws(
    () => serializeExport(minimalExport(), { timeZone: 'Mars/Olympus_Mons' }),
    SerializationError,
  );
});

test('parsing a serialized document gives back the same document', () => {
  const original = minimalExport({
    activities: [
      {
        duration: 600,
        endDate: new Date('2024-03-07T08:25:00.000Z'),
        startDate: new Date('2024-03-07T08:15:00.000Z'),
        statistics: {},
        type: 'strength_training',
      },
    ],
    events: [
      { startDate: new Date('2024-03-07T08:20:00.000Z'), type: 'lap' },
      {
        endDate: new Date('2024-03-07T08:31:30.250Z'),
        startDate: new Date('2024-03-07T08:30:00.000Z'),
        type: 'pause',
      },
    ],
    heartRateSamples: [{ bpm: 148.5, date: new Date('2024-03-07T08:16:00.000Z') }],
    route: [
      {
        altitude: 3.5,
        horizontalAccuracy: 3.2,
        latitude: 52.370216,
        longitude: 4.895168,
        timestamp: new Date('2024-03-07T08:15:01.000Z'),
      },
      {
        altitude: 0,
        latitude: 52.37022,
        longitude: 4.89517,
        speed: 3.05,
        timestamp: new Date('2024-03-07T08:15:02.000Z'),
      },
    ],
    statistics: {
      activeEnergyBurned: { unit: 'kcal', value: 0 },
      averageHeartRate: { unit: 'bpm', value: 151.25 },
    },
  });

  assert.deepEqual(parseExport(serializeExport(original).bytes), original);
});

test('absent optional fields are omitted from the output', () => {
  const text = serializeExport(
    minimalExport({ events: [{ startDate: new Date('2024-03-07T08:20:00.000Z'), type: 'lap' }] }),
  ).bytes.toString('utf8');

  assert.deepEqual(JSON.parse(text).workout.events, [
    { startDate: '2024-03-07T08:20:00.000Z', type: 'lap' },
  ]);
});

test('non-finite numbers cannot be serialized', () => {
  assert.throws(
    () => serializeExport(minimalExport({ statistics: { distance: { unit: 'km', value: Number.NaN } } })),
    (error: unknown) =>
      error instanceof SerializationError &&
      error.message === 'Non-finite number at $.workout.statistics.distance.value',
  );
});

test('invalid dates cannot be serialized', () => {
  assert.throws(
    () => serializeExport(minimalExport({ startDate: new Date('not a date') })),
    (error: unknown) =>
      error instanceof SerializationError && error.message === 'Invalid date at $.workout.startDate',
  );
});

test('parseExport rejects malformed and incomplete documents', () => {
  assert.throws(() => parseExport('{"exportDate":'), SerializationError);
  assert.throws(() => parseExport('{}'), SerializationError);
  assert.throws(
    () =>
      parseExport(
        JSON.stringify({
          exportDate: '2024-03-07T09:00:00.000Z',
          exportVersion: '1.0',
          workout: { type: 'running' },
        }),
      ),
    SerializationError,
  );
});
