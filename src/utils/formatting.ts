import chalk from 'chalk';
import { format } from 'date-fns';

export const DATE_FORMAT = 'yyyy-MM-dd';
export const TIME_FORMAT = 'HH:mm:ss';

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/** Zero-padded `HH:MM:SS`; hours are not wrapped at 24. */
export function formatDurationClock(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map(n => String(n).padStart(2, '0')).join(':');
}

export function formatLogDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function formatLogTime(date: Date): string {
  return format(date, TIME_FORMAT);
}

export function box(content: string, title?: string): string {
  const lines = content.split('\n');
  const maxLen = Math.max(...lines.map(l => stripAnsi(l).length), title ? stripAnsi(title).length + 4 : 0);
  const width = maxLen + 2;

  const top = title
    ? `╭─ ${chalk.bold(title)} ${'─'.repeat(Math.max(0, width - stripAnsi(title).length - 4))}╮`
    : `╭${'─'.repeat(width)}╮`;
  const bottom = `╰${'─'.repeat(width)}╯`;

  const body = lines
    .map(line => {
      const padding = ' '.repeat(Math.max(0, maxLen - stripAnsi(line).length));
      return `│ ${line}${padding} │`;
    })
    .join('\n');

  return `${top}\n${body}\n${bottom}`;
}

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function table(headers: string[], rows: string[][]): string {
  const colWidths = headers.map((h, i) => {
    const maxDataWidth = Math.max(0, ...rows.map(r => stripAnsi(r[i] ?? '').length));
    return Math.max(stripAnsi(h).length, maxDataWidth);
  });

  const headerRow = headers
    .map((h, i) => chalk.bold(h.padEnd(colWidths[i] ?? 0)))
    .join('  ');
  const separator = colWidths.map(w => '─'.repeat(w)).join('──');
  const bodyRows = rows.map(row =>
    row.map((cell, i) => {
      const padding = ' '.repeat(Math.max(0, (colWidths[i] ?? 0) - stripAnsi(cell).length));
      return cell + padding;
    }).join('  ')
  );

  return [headerRow, separator, ...bodyRows].join('\n');
}
