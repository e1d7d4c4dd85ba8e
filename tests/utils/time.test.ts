import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { nextWeeklyOccurrence, timestampId } from '../../src/utils/time.js';

function local(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

describe('timestampId', () => {
  test('renders a compact UTC stamp', () => {
    assert.strictEqual(timestampId(new Date('2026-10-18T14:25:01.123Z')), '20261018T142501Z');
  });
});

describe('nextWeeklyOccurrence', () => {
  // 2026-06-07 is a Sunday
  test('moves forward to the weekday', () => {
    assert.strictEqual(local(nextWeeklyOccurrence(new Date(2026, 5, 3, 10, 0), 0, 2)), '2026-06-07 02:00');
  });

  test('uses later the same day', () => {
    assert.strictEqual(local(nextWeeklyOccurrence(new Date(2026, 5, 7, 1, 30), 0, 2)), '2026-06-07 02:00');
  });

  test('skips to next week once the time has passed', () => {
    assert.strictEqual(local(nextWeeklyOccurrence(new Date(2026, 5, 7, 2, 0), 0, 2)), '2026-06-14 02:00');
    assert.strictEqual(local(nextWeeklyOccurrence(new Date(2026, 5, 7, 23, 0), 0, 2)), '2026-06-14 02:00');
  });
});
