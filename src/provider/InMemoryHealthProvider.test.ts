import assert from 'node:assert/strict';
import test from 'node:test';

import { fixedStatistics, InMemoryHealthProvider } from './InMemoryHealthProvider';

import type { ProviderWorkout } from '../types';

function workout(id: string, activityType: string, end: string): ProviderWorkout {
  const endDate = new Date(end);
  return {
    activities: [],
    activityType,
    duration: 1800,
    endDate,
    events: [],
    id,
    sourceName: 'Watch',
    startDate: new Date(endDate.getTime() - 1_800_000),
    statistics: fixedStatistics(),
  };
}

const provider = new InMemoryHealthProvider({
  workouts: [
    workout('w-1', 'running', '2024-03-07T08:45:00.000Z'),
    workout('w-2', 'swimming', '2024-03-08T08:45:00.000Z'),
    workout('w-3', 'traditionalStrengthTraining', '2024-03-09T08:45:00.000Z'),
    workout('w-4', 'running', '2024-03-06T08:45:00.000Z'),
  ],
});

test('listings keep the requested kinds, newest first, up to the limit', async () => {
  const listed = await provider.listWorkouts({
    kinds: ['running', 'traditionalStrengthTraining'],
    limit: 2,
    order: 'descending',
  });

  assert.deepEqual(listed, [
    {
      activityType: 'traditionalStrengthTraining',
      duration: 1800,
      endDate: new Date('2024-03-09T08:45:00.000Z'),
      id: 'w-3',
      sourceName: 'Watch',
      startDate: new Date('2024-03-09T08:15:00.000Z'),
    },
    {
      activityType: 'running',
      duration: 1800,
      endDate: new Date('2024-03-07T08:45:00.000Z'),
      id: 'w-1',
      sourceName: 'Watch',
      startDate: new Date('2024-03-07T08:15:00.000Z'),
    },
  ]);
});

test('ascending listings start with the earliest end date', async () => {
  const listed = await provider.listWorkouts({ kinds: ['running'], order: 'ascending' });

  assert.deepEqual(
    listed.map((entry) => entry.id),
    ['w-4', 'w-1'],
  );
});

test('an injected listing failure is thrown as given', async () => {
  const failure = new Error('store offline');
  const failing = new InMemoryHealthProvider().failOn('listWorkouts', failure);

  await assert.rejects(
    failing.listWorkouts({ kinds: ['running'], order: 'descending' }),
    (error: unknown) => error === failure,
  );
  assert.deepEqual(failing.calls, ['listWorkouts']);
});
