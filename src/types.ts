export interface EventRecord {
  eventType: string;
  startDate: string; // yyyy-MM-dd
  startTime: string; // HH:mm:ss
  endDate: string;
  endTime: string;
  notes: string;
}

export interface ActiveEvent {
  eventType: string;
  startedAt: Date;
}

export type SessionStatus =
  | { kind: 'idle' }
  | ({ kind: 'active' } & ActiveEvent);

export interface TransitionResult {
  status: string;
  activeEvent: string | null;
  /** Row written by this transition, if any. */
  record: EventRecord | null;
  previousClosed: boolean;
}

export interface MissingEventInput {
  eventType: string;
  startTime: string; // HH:mm:ss
  endTime: string; // HH:mm:ss
  notes?: string;
}

export interface EventLogStore {
  readonly path: string;
  open(): void;
  append(record: EventRecord): void;
  readAll(): EventRecord[];
}

export interface LoggerStatus {
  activeEvent: string | null;
  startedAt: string | null; // ISO 8601
  logFile: string;
  sessionStartedAt: string | null;
}
