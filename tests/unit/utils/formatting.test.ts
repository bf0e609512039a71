import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  formatDurationClock,
  formatLogDate,
  formatLogTime,
  stripAnsi,
  table,
} from '../../../src/utils/formatting.js';

describe('formatDurationClock', () => {
  it('pads each unit to two digits', () => {
    expect(formatDurationClock(0)).toBe('00:00:00');
    expect(formatDurationClock(((1 * 60 + 2) * 60 + 3) * 1000)).toBe('01:02:03');
  });

  it('does not wrap past a day', () => {
    expect(formatDurationClock(26 * 3600 * 1000)).toBe('26:00:00');
  });
});

describe('formatDuration', () => {
  it('drops leading zero units', () => {
    expect(formatDuration(42_000)).toBe('42s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_725_000)).toBe('1h 2m 5s');
  });
});

describe('formatLogDate / formatLogTime', () => {
  it('zero-pads every field', () => {
    const date = new Date(2025, 0, 9, 7, 3, 4);
    expect(formatLogDate(date)).toBe('2025-01-09');
    expect(formatLogTime(date)).toBe('07:03:04');
  });
});

describe('table', () => {
  it('pads columns to the widest cell', () => {
    const lines = stripAnsi(table(['Event', 'Notes'], [['Meal', 'x'], ['Walk', 'longer']])).split('\n');
    expect(lines).toEqual([
      'Event  Notes ',
      '─────────────',
      'Meal   x     ',
      'Walk   longer',
    ]);
  });
});
