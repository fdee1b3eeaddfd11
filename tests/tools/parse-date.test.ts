import { describe, it, expect } from 'vitest';
import { parseDateResult, parseDateTool } from '../../src/tools/parse-date.js';
import { normalizeDateTool } from '../../src/tools/normalize-date.js';
import { listKeywords } from '../../src/tools/list-keywords.js';

const config = { dateOnlyAsUtc: false };

describe('parseDateResult', () => {
  it('returns the record and its canonical form', () => {
    expect(parseDateResult({ date: '5 Jan 2020 10:30 EST' }, config)).toEqual({
      input: '5 Jan 2020 10:30 EST',
      valid: true,
      record: {
        year: 2020,
        month: 0,
        day: 5,
        hour: 10,
        minute: 30,
        second: 0,
        millisecond: 0,
        utc_offset_seconds: -18000,
      },
      canonical: '2020-01-05T10:30:00.000-05:00',
    });
  });

  it('reports strings that are not dates', () => {
    expect(parseDateResult({ date: 'next tuesday' }, config)).toEqual({
      input: 'next tuesday',
      valid: false,
      error: 'Not a recognizable date',
    });
  });

  it('lets the argument override the configured date-only policy', () => {
    expect(parseDateResult({ date: '2020-01-05' }, config).canonical).toBe('2020-01-05T00:00:00.000');
    expect(parseDateResult({ date: '2020-01-05', date_only_as_utc: true }, config).canonical).toBe(
      '2020-01-05T00:00:00.000+00:00',
    );
    expect(parseDateResult({ date: '2020-01-05', date_only_as_utc: false }, { dateOnlyAsUtc: true }).canonical).toBe(
      '2020-01-05T00:00:00.000',
    );
  });
});

describe('parseDateTool', () => {
  it('wraps the result with response metadata', async () => {
    const response = await parseDateTool({ date: '2020-01-05' }, config);

    expect(response.results.valid).toBe(true);
    expect(response._metadata.server).toBe('date-string-mcp');
    expect(response._metadata.version).toBe('1.0.0');
  });
});

describe('normalizeDateTool', () => {
  it('rewrites a lenient date in canonical form', async () => {
    const response = await normalizeDateTool({ date: '12/25/99 11:59 PM' }, config);

    expect(response.results).toEqual({
      original: '12/25/99 11:59 PM',
      normalized: '1999-12-25T23:59:00.000',
      has_offset: false,
    });
  });

  it('returns null for garbage', async () => {
    const response = await normalizeDateTool({ date: 'garbage' }, config);

    expect(response.results).toEqual({ original: 'garbage', normalized: null, has_offset: false });
  });
});

describe('listKeywords', () => {
  it('lists every keyword by default', async () => {
    const response = await listKeywords({});

    expect(response.results.prefix_length).toBe(3);
    expect(response.results.keywords).toHaveLength(27);
  });

  it('filters by type', async () => {
    const months = await listKeywords({ type: 'MonthName' });
    const separators = await listKeywords({ type: 'TimeSeparator' });

    expect(months.results.keywords.map((entry) => entry.prefix)).toEqual([
      'jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
    ]);
    expect(separators.results.keywords).toEqual([{ prefix: 't', type: 'TimeSeparator', value: 0 }]);
  });
});
