import { expect, test } from '@playwright/test';
import {
  activityAt,
  filterActiveAt,
  filterByTerm,
  isActiveAt,
  parseDate,
} from '../src/reconciliation/term-filter';

test.describe('Term and date filter', () => {
  const at = parseDate('2024-01-01T00:00:00Z') ?? new Date(Number.NaN);

  test('filterByTerm should keep records of the requested Knesset only', () => {
    const records = [
      { id: 1, knessetNum: 25 },
      { id: 2, knessetNum: 24 },
      { id: 3, knessetNum: null },
      { id: 4, knessetNum: 25 },
    ];
    expect(filterByTerm(records, 25).map((record) => record.id)).toEqual([1, 4]);
    expect(filterByTerm(records, 23)).toEqual([]);
  });

  test('parseDate should reject missing and unparsable values', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('  ')).toBeNull();
    expect(parseDate('not-a-date')).toBeNull();
    expect(parseDate('2024-01-01T00:00:00Z')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  test('parseDate should read values without an offset in the given zone', () => {
    expect(parseDate('2023-01-01T02:00:00', 'Asia/Jerusalem')?.toISOString()).toBe(
      '2023-01-01T00:00:00.000Z'
    );
    expect(parseDate('2023-07-01T03:00:00', 'Asia/Jerusalem')?.toISOString()).toBe(
      '2023-07-01T00:00:00.000Z'
    );
    expect(parseDate('2023-01-01', 'Asia/Jerusalem')?.toISOString()).toBe(
      '2022-12-31T22:00:00.000Z'
    );
    expect(parseDate('2023-01-01T02:00:00', 'UTC')?.toISOString()).toBe(
      '2023-01-01T02:00:00.000Z'
    );
  });

  test('parseDate should keep an explicit offset', () => {
    expect(parseDate('2023-01-01T02:00:00+03:00', 'UTC')?.toISOString()).toBe(
      '2022-12-31T23:00:00.000Z'
    );
  });

  test('should read upstream timestamps as Israel time by default', () => {
    const justAfterMidnightUtc = new Date('2023-01-01T00:30:00Z');
    const record = { startDate: '2023-01-01T02:00:00', finishDate: null };
    expect(activityAt(record, justAfterMidnightUtc)).toBe('active');
  });

  test('should treat an open-ended record that has started as active', () => {
    expect(isActiveAt({ startDate: '2023-01-01T00:00:00Z', finishDate: null }, at)).toBe(true);
    expect(isActiveAt({ startDate: '2023-01-01T00:00:00Z', finishDate: '' }, at)).toBe(true);
  });

  test('should include both window boundaries', () => {
    expect(isActiveAt({ startDate: '2024-01-01T00:00:00Z', finishDate: null }, at)).toBe(true);
    expect(
      isActiveAt({ startDate: '2023-01-01T00:00:00Z', finishDate: '2024-01-01T00:00:00Z' }, at)
    ).toBe(true);
  });

  test('should compare instants across time zones', () => {
    // 02:00 in UTC+2 is midnight UTC
    expect(isActiveAt({ startDate: '2024-01-01T02:00:00+02:00', finishDate: null }, at)).toBe(true);
    expect(isActiveAt({ startDate: '2024-01-01T01:00:00Z', finishDate: null }, at)).toBe(false);
  });

  test('should reject records that start later or finished earlier', () => {
    expect(activityAt({ startDate: '2024-06-01T00:00:00Z', finishDate: null }, at)).toBe('inactive');
    expect(
      activityAt({ startDate: '2022-01-01T00:00:00Z', finishDate: '2023-12-31T23:59:59Z' }, at)
    ).toBe('inactive');
  });

  test('should mark records with unusable dates as undated instead of throwing', () => {
    expect(activityAt({ startDate: null, finishDate: null }, at)).toBe('undated');
    expect(activityAt({ startDate: 'garbage', finishDate: null }, at)).toBe('undated');
    expect(activityAt({ startDate: '2023-01-01T00:00:00Z', finishDate: 'garbage' }, at)).toBe(
      'undated'
    );
    expect(isActiveAt({ startDate: 'garbage', finishDate: null }, at)).toBe(false);
  });

  test('should reject an invalid point in time', () => {
    const invalid = new Date('bad');
    const record = { startDate: '2023-01-01T00:00:00Z', finishDate: null };

    expect(() => activityAt(record, invalid)).toThrow(RangeError);
    expect(() => filterActiveAt([], invalid)).toThrow('Invalid point in time: Invalid Date');
  });

  test('filterActiveAt should keep active records in order', () => {
    const records = [
      { id: 'a', startDate: '2023-01-01T00:00:00Z', finishDate: null },
      { id: 'b', startDate: 'garbage', finishDate: null },
      { id: 'c', startDate: '2022-01-01T00:00:00Z', finishDate: '2022-12-31T00:00:00Z' },
      { id: 'd', startDate: '2023-06-01T00:00:00Z', finishDate: '2024-06-01T00:00:00Z' },
    ];
    expect(filterActiveAt(records, at).map((record) => record.id)).toEqual(['a', 'd']);
  });
});
