import { describe, it, expect } from 'vitest';
import { SessionState, buildRecord } from '../../src/session-state.js';
import { InvalidTransitionError, NoActiveEventError } from '../../src/errors.js';

const at = (h: number, m: number, s = 0) => new Date(2025, 3, 7, h, m, s);

describe('SessionState', () => {
  it('starts idle', () => {
    const state = new SessionState();
    expect(state.current()).toBeNull();
    expect(state.isActive()).toBe(false);
  });

  it('becomes active on start', () => {
    const state = new SessionState();
    state.start('Meal', at(12, 0));
    expect(state.current()).toEqual({ eventType: 'Meal', startedAt: at(12, 0) });
    expect(state.isActive()).toBe(true);
    expect(state.isActive('Meal')).toBe(true);
    expect(state.isActive('Break')).toBe(false);
  });

  it('refuses a second start while active', () => {
    const state = new SessionState();
    state.start('Meal', at(12, 0));
    expect(() => state.start('Break', at(12, 5))).toThrow(InvalidTransitionError);
    expect(state.current()?.eventType).toBe('Meal');
  });

  it('builds the closed record without clearing', () => {
    const state = new SessionState();
    state.start('Walk', at(9, 15, 30));
    const record = state.close(at(9, 45, 5), 'around the ward');
    expect(record).toEqual({
      eventType: 'Walk',
      startDate: '2025-04-07',
      startTime: '09:15:30',
      endDate: '2025-04-07',
      endTime: '09:45:05',
      notes: 'around the ward',
    });
    expect(state.isActive('Walk')).toBe(true);

    state.clear();
    expect(state.current()).toBeNull();
  });

  it('cannot close while idle', () => {
    expect(() => new SessionState().close(at(10, 0), '')).toThrow(NoActiveEventError);
  });
});

describe('buildRecord', () => {
  it('uses separate dates when the event crosses midnight', () => {
    const record = buildRecord('Sleep Period', new Date(2025, 3, 7, 23, 30), new Date(2025, 3, 8, 6, 45), '');
    expect(record.startDate).toBe('2025-04-07');
    expect(record.startTime).toBe('23:30:00');
    expect(record.endDate).toBe('2025-04-08');
    expect(record.endTime).toBe('06:45:00');
  });
});
