import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { buildLogFileName, resolveLogFilePath, validateProjectId } from '../../src/log-file.js';
import { InvalidProjectIdError } from '../../src/errors.js';

const now = new Date(2025, 3, 7, 9, 5, 59);

describe('buildLogFileName', () => {
  it('stamps month, day, hour and minute', () => {
    expect(buildLogFileName(now)).toBe('event_log_0407_09_05.csv');
  });

  it('prefixes the project id', () => {
    expect(buildLogFileName(now, 'TRBD001')).toBe('TRBD001_event_log_0407_09_05.csv');
  });

  it('rejects project ids that are not safe in a file name', () => {
    expect(() => buildLogFileName(now, '../etc')).toThrow(InvalidProjectIdError);
  });
});

describe('validateProjectId', () => {
  it('trims surrounding whitespace', () => {
    expect(validateProjectId('  P-12_a ')).toBe('P-12_a');
  });

  it('rejects spaces inside the id', () => {
    expect(() => validateProjectId('P 12')).toThrow(InvalidProjectIdError);
  });
});

describe('resolveLogFilePath', () => {
  it('nests the file under a date folder', () => {
    expect(resolveLogFilePath({ outputDir: '/data/logs', useDateFolder: true }, now)).toBe(
      join('/data/logs', '2025-04-07', 'event_log_0407_09_05.csv'),
    );
  });

  it('writes directly into the output dir without the date folder', () => {
    expect(resolveLogFilePath({ outputDir: '/data/logs', useDateFolder: false, projectId: 'AA7' }, now)).toBe(
      join('/data/logs', 'AA7_event_log_0407_09_05.csv'),
    );
  });

  it('resolves a relative output dir against the working directory', () => {
    expect(resolveLogFilePath({ outputDir: 'logs', useDateFolder: false }, now, '/home/staff')).toBe(
      join('/home/staff', 'logs', 'event_log_0407_09_05.csv'),
    );
  });

  it('defaults to the working directory', () => {
    expect(resolveLogFilePath({ useDateFolder: false }, now, '/home/staff')).toBe(
      join('/home/staff', 'event_log_0407_09_05.csv'),
    );
  });
});
