import assert from 'node:assert/strict';
import test from 'node:test';

import { fixedStatistics } from '../provider/InMemoryHealthProvider';
import { extractActivities, extractEvents } from './extractors';

import type { ProviderWorkout } from '../types';

function workoutWith(overrides: Partial<ProviderWorkout>): ProviderWorkout {
  return {
    activities: [],
    activityType: 'running',
    duration: 1800,
    endDate: new Date('2024-03-07T08:45:00.000Z'),
    events: [],
    id: 'w-1',
    sourceName: 'Watch',
    startDate: new Date('2024-03-07T08:15:00.000Z'),
    statistics: fixedStatistics(),
    ...overrides,
  };
}

test('events keep provider order and only intervals carry an end date', () => {
  const lapStart = new Date('2024-03-07T08:20:00.000Z');
  const segmentStart = new Date('2024-03-07T08:25:00.000Z');
  const segmentEnd = new Date('2024-03-07T08:30:00.000Z');
  const markerAt = new Date('2024-03-07T08:31:00.000Z');

  const events = extractEvents(
    workoutWith({
      events: [
        { startDate: lapStart, type: 'lap' },
        { endDate: segmentEnd, startDate: segmentStart, type: 'segment' },
        { endDate: markerAt, startDate: markerAt, type: 'marker' },
        { startDate: markerAt, type: 'swimStroke' },
      ],
    }),
  );

  assert.deepEqual(events, [
    { startDate: lapStart, type: 'lap' },
    { endDate: segmentEnd, startDate: segmentStart, type: 'segment' },
    { startDate: markerAt, type: 'marker' },
    { startDate: markerAt, type: 'unknown' },
  ]);
  assert.equal('endDate' in events[0], false);
});

test('no events and no activities give empty arrays', () => {
  const workout = workoutWith({});
  assert.deepEqual(extractEvents(workout), []);
  assert.deepEqual(extractActivities(workout), []);
});

test('activity end date falls back to start plus duration', () => {
  const startDate = new Date('2024-03-07T08:15:00.000Z');

  const [activity] = extractActivities(
    workoutWith({
      activities: [
        { activityType: 'running', duration: 600, startDate, statistics: fixedStatistics() },
      ],
    }),
  );

  assert.deepEqual(activity.endDate, new Date('2024-03-07T08:25:00.000Z'));
});

test('a present activity end date is used as is', () => {
  const startDate = new Date('2024-03-07T08:15:00.000Z');
  const endDate = new Date('2024-03-07T08:40:00.000Z');

  const [activity] = extractActivities(
    workoutWith({
      activities: [
        {
          activityType: 'traditionalStrengthTraining',
          duration: 600,
          endDate,
          startDate,
          statistics: fixedStatistics(),
        },
      ],
    }),
  );

  assert.equal(activity.endDate, endDate);
  assert.equal(activity.type, 'strength_training');
});

test('activity statistics come from the activity, not the workout', () => {
  const [activity] = extractActivities(
    workoutWith({
      activities: [
        {
          activityType: 'cycling',
          duration: 300,
          startDate: new Date('2024-03-07T08:15:00.000Z'),
          statistics: fixedStatistics({ activeEnergyBurned: { sum: { unit: 'kcal', value: 40 } } }),
        },
      ],
      statistics: fixedStatistics({ activeEnergyBurned: { sum: { unit: 'kcal', value: 400 } } }),
    }),
  );

  assert.deepEqual(activity, {
    duration: 300,
    endDate: new Date('2024-03-07T08:20:00.000Z'),
    startDate: new Date('2024-03-07T08:15:00.000Z'),
    statistics: { activeEnergyBurned: { unit: 'kcal', value: 40 } },
    type: 'other',
  });
});
