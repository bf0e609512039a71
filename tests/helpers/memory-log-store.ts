import type { EventLogStore, EventRecord } from '../../src/types.js';
import { WriteFailureError } from '../../src/errors.js';

export class MemoryLogStore implements EventLogStore {
  readonly path = '/memory/event_log.csv';
  readonly records: EventRecord[] = [];
  opened = false;
  failWrites = false;

  open(): void {
    this.opened = true;
  }

  append(record: EventRecord): void {
    if (this.failWrites) {
      throw new WriteFailureError(this.path, new Error('disk full'));
    }
    this.records.push({ ...record });
  }

  readAll(): EventRecord[] {
    return this.records.map(r => ({ ...r }));
  }
}

/** A clock the test moves by hand. */
export class ManualClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current);

  set(date: Date): void {
    this.current = date;
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}
