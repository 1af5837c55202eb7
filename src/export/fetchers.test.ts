import assert from 'node:assert/strict';
import test from 'node:test';

import { fixedStatistics, InMemoryHealthProvider } from '../provider/InMemoryHealthProvider';
import { fetchHeartRateSamples, fetchRoute } from './fetchers';

import type { ProviderLocation, ProviderWorkout } from '../types';

const start = new Date('2024-03-07T08:15:00.000Z');
const end = new Date('2024-03-07T08:45:00.000Z');

const workout: ProviderWorkout = {
  activities: [],
  activityType: 'running',
  duration: 1800,
  endDate: end,
  events: [],
  id: 'w-1',
  sourceName: 'Watch',
  startDate: start,
  statistics: fixedStatistics(),
};

function location(timestamp: string, overrides: Partial<ProviderLocation> = {}): ProviderLocation {
  return {
    altitude: 12,
    horizontalAccuracy: 4,
    latitude: 52.37,
    longitude: 4.89,
    speed: 2.9,
    timestamp: new Date(timestamp),
    ...overrides,
  };
}

test('heart-rate samples within the workout come back oldest first in bpm', async () => {
  const provider = new InMemoryHealthProvider({
    samples: {
      heartRate: [
        {
          endDate: new Date('2024-03-07T08:30:00.000Z'),
          quantity: { unit: 'Hz', value: 2.5 },
          startDate: new Date('2024-03-07T08:30:00.000Z'),
        },
        {
          endDate: new Date('2024-03-07T08:20:00.000Z'),
          quantity: { unit: 'count/min', value: 131 },
          startDate: new Date('2024-03-07T08:20:00.000Z'),
        },
        {
          endDate: new Date('2024-03-07T09:30:00.000Z'),
          quantity: { unit: 'count/min', value: 80 },
          startDate: new Date('2024-03-07T09:30:00.000Z'),
        },
      ],
    },
  });

  const samples = await fetchHeartRateSamples(provider, workout);

  assert.deepEqual(samples, [
    { bpm: 131, date: new Date('2024-03-07T08:20:00.000Z') },
    { bpm: 150, date: new Date('2024-03-07T08:30:00.000Z') },
  ]);
  assert.deepEqual(provider.sampleQueries, [
    { kind: 'heartRate', limit: 5000, order: 'ascending', range: { end, start } },
  ]);
});

test('no heart-rate samples gives an empty array', async () => {
  assert.deepEqual(await fetchHeartRateSamples(new InMemoryHealthProvider(), workout), []);
});

test('a workout without a route yields no points and reads no locations', async () => {
  const provider = new InMemoryHealthProvider();

  assert.deepEqual(await fetchRoute(provider, workout), []);
  assert.deepEqual(provider.calls, ['queryRoute']);
});

test('route points come back in chronological order', async () => {
  const provider = new InMemoryHealthProvider({
    routes: {
      'w-1': [
        location('2024-03-07T08:15:02.000Z'),
        location('2024-03-07T08:15:00.000Z'),
        location('2024-03-07T08:15:01.000Z'),
      ],
    },
  });

  const points = await fetchRoute(provider, workout);

  assert.deepEqual(
    points.map((point) => point.timestamp.toISOString()),
    ['2024-03-07T08:15:00.000Z', '2024-03-07T08:15:01.000Z', '2024-03-07T08:15:02.000Z'],
  );
});

test('unavailable accuracy and speed are left out, measured ones kept', async () => {
  const provider = new InMemoryHealthProvider({
    routes: {
      'w-1': [
        location('2024-03-07T08:15:00.000Z', { horizontalAccuracy: -1, speed: -1 }),
        location('2024-03-07T08:15:01.000Z', { horizontalAccuracy: 3.2, speed: 0 }),
      ],
    },
  });

  const [unmeasured, measured] = await fetchRoute(provider, workout);

  assert.deepEqual(unmeasured, {
    altitude: 12,
    latitude: 52.37,
    longitude: 4.89,
    timestamp: new Date('2024-03-07T08:15:00.000Z'),
  });
  assert.equal(measured.horizontalAccuracy, 3.2);
  assert.equal(measured.speed, 0);
});

test('provider failures are passed through as is', async () => {
  const failure = new Error('route store offline');
  const provider = new InMemoryHealthProvider({
    routes: { 'w-1': [location('2024-03-07T08:15:00.000Z')] },
  }).failOn('routeLocations', failure);

  await assert.rejects(fetchRoute(provider, workout), (error: unknown) => error === failure);
});

test('an aborted signal stops the heart-rate query', async () => {
  const controller = new AbortController();
  const reason = new Error('stop');
  controller.abort(reason);

  await assert.rejects(
    fetchHeartRateSamples(new InMemoryHealthProvider(), workout, { signal: controller.signal }),
    (error: unknown) => error === reason,
  );
});
