import { InvalidTransitionError, NoActiveEventError } from './errors.js';
import { formatLogDate, formatLogTime } from './utils/formatting.js';
import type { ActiveEvent, EventRecord, SessionStatus } from './types.js';

/**
 * The in-progress event of one logging session: `idle`, or `active` with the
 * event type and its start time. Closing an event is split into `close`
 * (build the row) and `clear` (go idle) so the caller can persist the row
 * before the state changes.
 */
export class SessionState {
  private state: SessionStatus = { kind: 'idle' };

  current(): ActiveEvent | null {
    if (this.state.kind === 'idle') return null;
    return { eventType: this.state.eventType, startedAt: this.state.startedAt };
  }

  isActive(eventType?: string): boolean {
    if (this.state.kind === 'idle') return false;
    return eventType === undefined || this.state.eventType === eventType;
  }

  start(eventType: string, now: Date): void {
    if (this.state.kind === 'active') {
      throw new InvalidTransitionError(
        `Cannot start ${eventType} while ${this.state.eventType} is active`,
      );
    }
    this.state = { kind: 'active', eventType, startedAt: now };
  }

  close(now: Date, notes: string): EventRecord {
    if (this.state.kind === 'idle') {
      throw new NoActiveEventError();
    }
    return buildRecord(this.state.eventType, this.state.startedAt, now, notes);
  }

  clear(): void {
    this.state = { kind: 'idle' };
  }
}

export function buildRecord(eventType: string, start: Date, end: Date, notes: string): EventRecord {
  return {
    eventType,
    startDate: formatLogDate(start),
    startTime: formatLogTime(start),
    endDate: formatLogDate(end),
    endTime: formatLogTime(end),
    notes,
  };
}
