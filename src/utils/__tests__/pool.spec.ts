import test from 'node:test';
import assert from 'node:assert/strict';

import { mapOrdered } from '../pool';

const tick = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

test('results follow input order whatever the completion order', async () => {
  const delays = [30, 5, 20, 0, 10];
  const out = await mapOrdered(delays, 3, async (ms, index) => {
    await tick(ms);
    return `${index}:${ms}`;
  });
  assert.deepEqual(out, ['0:30', '1:5', '2:20', '3:0', '4:10']);
});

test('never runs more than the requested number of calls at once', async () => {
  let active = 0;
  let peak = 0;
  await mapOrdered([1, 2, 3, 4, 5, 6, 7], 2, async () => {
    active += 1;
    peak = Math.max(peak, active);
    await tick(2);
    active -= 1;
  });
  assert.equal(peak, 2);
});

test('an empty input resolves to an empty array', async () => {
  assert.deepEqual(await mapOrdered([], 4, async () => 1), []);
});

test('a rejection stops new work from starting', async () => {
  const started: number[] = [];
  await assert.rejects(
    mapOrdered([0, 1, 2, 3, 4], 1, async item => {
      started.push(item);
      if (item === 1) throw new Error('boom');
      return item;
    }),
    /boom/,
  );
  assert.deepEqual(started, [0, 1]);
});
