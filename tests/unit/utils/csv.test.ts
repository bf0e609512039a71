import { describe, it, expect } from 'vitest';
import { escapeCsvField, formatCsvRow, parseCsv } from '../../../src/utils/csv.js';

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('Meal')).toBe('Meal');
    expect(escapeCsvField('')).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvField('soup, bread')).toBe('"soup, bread"');
    expect(escapeCsvField('said "done"')).toBe('"said ""done"""');
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
  });
});

describe('formatCsvRow', () => {
  it('joins fields and ends with CRLF', () => {
    expect(formatCsvRow(['Meal', '2025-04-07', 'a,b'])).toBe('Meal,2025-04-07,"a,b"\r\n');
  });
});

describe('parseCsv', () => {
  it('parses CRLF and LF rows', () => {
    expect(parseCsv('a,b\r\nc,d\ne,f\n')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
      ['e', 'f'],
    ]);
  });

  it('keeps empty trailing fields', () => {
    expect(parseCsv('Meal,,\r\n')).toEqual([['Meal', '', '']]);
  });

  it('reads quoted fields back to their original value', () => {
    const fields = ['Other', 'he said "wait", then left', 'two\r\nlines', ''];
    expect(parseCsv(formatCsvRow(fields))).toEqual([fields]);
  });

  it('handles a last row without a line break', () => {
    expect(parseCsv('x,y')).toEqual([['x', 'y']]);
  });
});
