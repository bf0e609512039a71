import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { WriteFailureError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { formatCsvRow, parseCsv } from '../utils/csv.js';
import type { EventLogStore, EventRecord } from '../types.js';

export const CSV_HEADERS = ['Event', 'Start Date', 'Start Time', 'End Date', 'End Time', 'Notes'] as const;

export function recordToRow(record: EventRecord): string[] {
  return [
    record.eventType,
    record.startDate,
    record.startTime,
    record.endDate,
    record.endTime,
    record.notes,
  ];
}

export function rowToRecord(row: string[]): EventRecord {
  const [eventType = '', startDate = '', startTime = '', endDate = '', endTime = '', notes = ''] = row;
  return { eventType, startDate, startTime, endDate, endTime, notes };
}

/**
 * Append-only CSV log. Every append opens the file, writes one row, fsyncs and
 * closes, so a completed event survives a crash right after the call returns.
 */
export class CsvEventLog implements EventLogStore {
  constructor(public readonly path: string) {}

  open(): void {
    if (existsSync(this.path)) {
      logger.debug(`Appending to existing log ${this.path}`);
      return;
    }
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      this.writeLine(formatCsvRow(CSV_HEADERS), 'wx');
    } catch (err) {
      throw new WriteFailureError(this.path, err);
    }
    logger.debug(`Created log ${this.path}`);
  }

  append(record: EventRecord): void {
    try {
      this.writeLine(formatCsvRow(recordToRow(record)), 'a');
    } catch (err) {
      throw new WriteFailureError(this.path, err);
    }
    logger.debug(`Logged ${record.eventType} ${record.startDate} ${record.startTime} → ${record.endDate} ${record.endTime}`);
  }

  readAll(): EventRecord[] {
    return readLogFile(this.path);
  }

  private writeLine(line: string, flags: 'a' | 'wx'): void {
    const fd = openSync(this.path, flags);
    try {
      writeSync(fd, line, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

export function readLogFile(path: string): EventRecord[] {
  const rows = parseCsv(readFileSync(path, 'utf-8'));
  const [header, ...body] = rows;
  if (!header || header.join(',') !== CSV_HEADERS.join(',')) {
    throw new Error(`${path} is not an event log (unexpected header)`);
  }
  return body.map(rowToRecord);
}
