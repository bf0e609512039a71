import { join, resolve } from 'node:path';
import { format } from 'date-fns';
import { InvalidProjectIdError } from './errors.js';
import { DATE_FORMAT } from './utils/formatting.js';

const PROJECT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface LogFileOptions {
  outputDir?: string;
  useDateFolder: boolean;
  projectId?: string;
}

export function validateProjectId(projectId: string): string {
  const trimmed = projectId.trim();
  if (!PROJECT_ID_PATTERN.test(trimmed)) {
    throw new InvalidProjectIdError(projectId);
  }
  return trimmed;
}

/** `[<projectId>_]event_log_<MMDD>_<HH>_<MM>.csv` */
export function buildLogFileName(now: Date, projectId?: string): string {
  const stamp = format(now, 'MMdd_HH_mm');
  const base = `event_log_${stamp}.csv`;
  return projectId ? `${validateProjectId(projectId)}_${base}` : base;
}

export function resolveLogFilePath(options: LogFileOptions, now: Date, cwd = process.cwd()): string {
  const root = resolve(cwd, options.outputDir ?? '.');
  const dir = options.useDateFolder ? join(root, format(now, DATE_FORMAT)) : root;
  return join(dir, buildLogFileName(now, options.projectId || undefined));
}
