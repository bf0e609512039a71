import { isValid, parse } from 'date-fns';
import { SessionState, buildRecord } from './session-state.js';
import { InvalidTimeRangeError, NoActiveEventError, UnknownEventError } from './errors.js';
import { logger } from './utils/logger.js';
import { TIME_FORMAT, formatDurationClock, formatLogDate, formatLogTime } from './utils/formatting.js';
import type {
  EventLogStore,
  EventRecord,
  LoggerStatus,
  MissingEventInput,
  TransitionResult,
} from './types.js';

export const IDLE_STATUS = 'Press a button to start an event';
export const SESSION_START_EVENT = 'SESSION START';
export const SESSION_END_EVENT = 'SESSION END';
const NOT_AVAILABLE = 'N/A';

export interface EventLoggerOptions {
  store: EventLogStore;
  eventTypes: readonly string[];
  clock?: () => Date;
}

export interface EndSessionOptions {
  /** Abort (and log) an event that is still active before writing the end marker. */
  abortActive: boolean;
  notes?: string;
}

export interface EndSessionResult {
  aborted: EventRecord | null;
  record: EventRecord;
  durationMs: number | null;
}

/**
 * Owns one logging session: the active event and the log it is written to.
 * Every public method runs synchronously, so callers on the same event loop
 * never interleave between the row write and the state change.
 */
export class EventLogger {
  private readonly session = new SessionState();
  private readonly store: EventLogStore;
  private readonly eventTypes: ReadonlySet<string>;
  private readonly clock: () => Date;
  private sessionStartedAt: Date | null = null;

  constructor(options: EventLoggerOptions) {
    this.store = options.store;
    this.eventTypes = new Set(options.eventTypes);
    this.clock = options.clock ?? (() => new Date());
    this.store.open();
  }

  get logFile(): string {
    return this.store.path;
  }

  get activeEvent(): string | null {
    return this.session.current()?.eventType ?? null;
  }

  listEventTypes(): string[] {
    return [...this.eventTypes];
  }

  toggleEvent(eventName: string, notes = ''): TransitionResult {
    if (!this.eventTypes.has(eventName)) {
      throw new UnknownEventError(eventName);
    }

    const now = this.clock();
    const active = this.session.current();
    const closingNotes = notes.trim();

    if (active?.eventType === eventName) {
      const record = this.commitClose(now, closingNotes);
      logger.info(`Ended ${eventName}`);
      return {
        status: `Ended ${eventName}. ${IDLE_STATUS}`,
        activeEvent: null,
        record,
        previousClosed: false,
      };
    }

    let record: EventRecord | null = null;
    if (active) {
      // A failed write throws here, before the new event starts.
      record = this.commitClose(now, closingNotes);
      logger.info(`Ended ${active.eventType}`);
    }

    this.session.start(eventName, now);
    logger.info(`Started ${eventName}`);

    return {
      status: active ? `Ended ${active.eventType}. ${eventName} has started` : `${eventName} has started`,
      activeEvent: eventName,
      record,
      previousClosed: active !== null,
    };
  }

  abortEvent(notes = ''): TransitionResult {
    const active = this.session.current();
    if (!active) {
      throw new NoActiveEventError('No active event to abort');
    }

    const trimmed = notes.trim();
    const record = this.commitClose(this.clock(), trimmed ? `ABORTED: ${trimmed}` : 'ABORTED');
    logger.warn(`Aborted ${active.eventType}`);

    return {
      status: 'Event aborted',
      activeEvent: null,
      record,
      previousClosed: false,
    };
  }

  /**
   * Logs an event that was not captured live. Times are `HH:mm:ss` on the
   * current date; the active event is left alone.
   */
  addMissingEvent(input: MissingEventInput): TransitionResult {
    if (!this.eventTypes.has(input.eventType)) {
      throw new UnknownEventError(input.eventType);
    }

    const today = this.clock();
    const start = parseClockTime(input.startTime, today);
    const end = parseClockTime(input.endTime, today);
    if (end.getTime() <= start.getTime()) {
      throw new InvalidTimeRangeError();
    }

    const extra = input.notes?.trim();
    const record = buildRecord(input.eventType, start, end, extra ? `Missing event: ${extra}` : 'Missing event');
    this.store.append(record);
    logger.success(`Missing event '${input.eventType}' logged`);

    return {
      status: `Missing event '${input.eventType}' has been logged`,
      activeEvent: this.activeEvent,
      record,
      previousClosed: false,
    };
  }

  recordSessionStart(): EventRecord {
    const now = this.clock();
    const record: EventRecord = {
      eventType: SESSION_START_EVENT,
      startDate: formatLogDate(now),
      startTime: formatLogTime(now),
      endDate: NOT_AVAILABLE,
      endTime: NOT_AVAILABLE,
      notes: 'Session started',
    };
    this.store.append(record);
    this.sessionStartedAt = now;
    logger.info(`Session started at ${record.startDate} ${record.startTime}`);
    return record;
  }

  endSession(options: EndSessionOptions): EndSessionResult {
    let aborted: EventRecord | null = null;
    if (this.session.isActive()) {
      if (options.abortActive) {
        aborted = this.abortEvent(options.notes).record;
      } else {
        logger.warn(`Ending session with ${this.activeEvent} still active; it will not be logged`);
        this.session.clear();
      }
    }

    const now = this.clock();
    const started = this.sessionStartedAt;
    const durationMs = started ? now.getTime() - started.getTime() : null;
    const record: EventRecord = {
      eventType: SESSION_END_EVENT,
      startDate: started ? formatLogDate(started) : NOT_AVAILABLE,
      startTime: started ? formatLogTime(started) : NOT_AVAILABLE,
      endDate: formatLogDate(now),
      endTime: formatLogTime(now),
      notes: durationMs === null
        ? 'Session ended, duration: N/A (session start was skipped)'
        : `Session ended, duration: ${formatDurationClock(durationMs)}`,
    };
    this.store.append(record);
    this.sessionStartedAt = null;
    logger.info(`Session ended at ${record.endDate} ${record.endTime}`);

    return { aborted, record, durationMs };
  }

  status(): LoggerStatus {
    const active = this.session.current();
    return {
      activeEvent: active?.eventType ?? null,
      startedAt: active ? active.startedAt.toISOString() : null,
      logFile: this.store.path,
      sessionStartedAt: this.sessionStartedAt ? this.sessionStartedAt.toISOString() : null,
    };
  }

  /** Writes the row for the active event, then goes idle. State is untouched if the write throws. */
  private commitClose(now: Date, notes: string): EventRecord {
    const record = this.session.close(now, notes);
    this.store.append(record);
    this.session.clear();
    return record;
  }
}

export function parseClockTime(value: string, referenceDate: Date): Date {
  const trimmed = value.trim();
  const parsed = parse(trimmed, TIME_FORMAT, referenceDate);
  if (isValid(parsed)) return parsed;

  const short = parse(trimmed, 'HH:mm', referenceDate);
  if (isValid(short)) return short;

  throw new InvalidTimeRangeError(`Invalid time "${value}" (expected HH:MM:SS)`);
}
